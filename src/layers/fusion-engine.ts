/**
 * Context Fusion Engine — multi-source weighted voting.
 *
 * Foreground, Background, Session and Pattern each propose a chat; valid
 * proposals vote with weight × confidence. The Session Priority Boost keeps
 * a batch together when the user leaves the source app mid-download.
 */

import { extname } from "node:path";
import { performance } from "node:perf_hooks";
import type {
  DetectionResult,
  DetectionStatistics,
  ForegroundProvider,
  FusionConfig,
  Pattern,
  PatternStore,
  Signal,
  SignalBreakdown,
  SignalOutcome,
  SourceApp,
} from "../types.js";
import { DEFAULT_CONFIG, DEFAULT_SOURCE_APP, UNSORTED } from "../types.js";
import { applySettings, FUSION_RULES } from "../config.js";
import { withTimeout } from "../utils/async.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { errorMessage } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import { DetectionObserver } from "./observability.js";
import type { DetectionReport, DetectionTrace } from "./observability.js";
import type { SessionManager } from "./session-manager.js";
import { isAbsent, SignalCollector } from "./signal-collector.js";
import { vote, votingSignals } from "./voting.js";
import type { WindowTracker } from "./window-tracker.js";

export class MissingDependencyError extends Error {
  constructor(readonly dependency: string) {
    super(`ContextFusionEngine requires a ${dependency}`);
    this.name = "MissingDependencyError";
  }
}

export interface FusionEngineOptions {
  foreground?: ForegroundProvider;
  windows?: WindowTracker;
  patterns?: PatternStore;
  sessions?: SessionManager;
  logger?: Logger;
  config?: Partial<FusionConfig>;
  sourceApp?: SourceApp;
  clock?: Clock;
}

export interface SignalWeights {
  foreground: number;
  background: number;
  pattern: number;
  session: number;
}

function required<T>(value: T | undefined, name: string): T {
  if (value === undefined || value === null) throw new MissingDependencyError(name);
  return value;
}

export class ContextFusionEngine {
  private config: FusionConfig;
  private readonly collector: SignalCollector;
  private readonly observer = new DetectionObserver();
  private readonly patterns: PatternStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: FusionEngineOptions) {
    const foreground = required(opts.foreground, "foreground provider");
    const windows = required(opts.windows, "window tracker");
    this.patterns = required(opts.patterns, "pattern store");
    const sessions = required(opts.sessions, "session manager");
    this.logger = required(opts.logger, "logger");
    this.clock = opts.clock ?? systemClock;
    this.config = applySettings(DEFAULT_CONFIG.fusion, opts.config ?? {}, FUSION_RULES, this.logger, "fusion").settings;

    this.collector = new SignalCollector(
      { foreground, windows, sessions, patterns: this.patterns },
      () => this.config,
      opts.sourceApp ?? DEFAULT_SOURCE_APP,
      this.logger,
    );
  }

  // --- Detection ---

  async detect(fileName: string, time: number = this.clock.now()): Promise<string> {
    return (await this.detectWithDetails(fileName, time)).detectedContext;
  }

  async detectWithDetails(fileName: string, time: number = this.clock.now()): Promise<DetectionResult> {
    const started = performance.now();
    try {
      const outcomes = await this.collector.collect(fileName, time);
      const collected = presentSignals(outcomes);
      const voting = votingSignals(collected, this.config.minimumConfidenceThreshold);

      let result: DetectionResult;
      if (voting.length === 0) {
        this.logger.debug(`[fusion] No valid signals for ${fileName}, using '${UNSORTED}'`);
        result = unsortedResult(collected, performance.now() - started);
      } else {
        const outcome = vote(voting, this.config);
        if (outcome.boost.applied) {
          this.logger.info(`[fusion] Session Priority Boost: ${outcome.boost.reason}`);
        } else if (outcome.boost.groupMismatch) {
          const session = voting.find(s => s.source === "Session");
          const foreground = voting.find(s => s.source === "Foreground");
          this.logger.warn(`[fusion] Switched from '${session?.detectedContext}' to '${foreground?.detectedContext}' ` +
            "in the source app; treating as a new batch (no boost)");
        }
        this.logger.debug(`[fusion] Votes: ${outcome.tallies.map(t => `${t.context}=${t.total.toFixed(2)}`).join(", ")}`);

        // voting signals carry their adjusted weights into the result
        const adjusted = new Map(voting.map((s, i): [Signal, Signal] => [s, outcome.boost.signals[i]]));
        result = {
          detectedContext: outcome.detectedContext,
          overallConfidence: outcome.overallConfidence,
          signals: collected.map(s => adjusted.get(s) ?? s),
          signalBreakdown: outcome.breakdown,
          winningScore: outcome.winningScore,
          detectionDurationMs: performance.now() - started,
          boostApplied: outcome.boost.applied,
          boostReason: outcome.boost.reason,
          hasConsensus: outcome.hasConsensus,
        };
      }

      this.observer.record(fileName, time, result);
      this.logger.info(`[fusion] ${fileName} -> ${describeResult(result)}`);
      return result;
    } catch (err) {
      this.logger.error(`[fusion] Detection failed for ${fileName}: ${errorMessage(err)}`);
      return unsortedResult([], performance.now() - started);
    }
  }

  /** Every source's outcome, Absent included. */
  collectOutcomes(fileName: string, time: number = this.clock.now()): Promise<SignalOutcome[]> {
    return this.collector.collect(fileName, time);
  }

  /** Signals the sources produced, before validity and threshold filtering. */
  async collectAllSignals(fileName: string, time: number = this.clock.now()): Promise<Signal[]> {
    return presentSignals(await this.collector.collect(fileName, time));
  }

  // --- Feedback ---

  /**
   * Teach the pattern store which chat this kind of file belongs to.
   * Resolves false when the store rejected the observation.
   */
  async recordFeedback(fileName: string, detectedContext: string, actualContext: string | undefined, wasCorrect: boolean): Promise<boolean> {
    const groupName = wasCorrect ? detectedContext : (actualContext ?? detectedContext);
    const now = this.clock.now();
    const pattern: Pattern = {
      extension: extname(fileName),
      groupName,
      confidenceScore: wasCorrect ? 0.6 : 0.4,
      timesSeen: 1,
      timesCorrect: wasCorrect ? 1 : 0,
      firstSeen: now,
      lastSeen: now,
    };

    try {
      await withTimeout(() => this.patterns.savePattern(pattern), this.config.storeTimeoutMs, "pattern save");
      this.logger.debug(`[fusion] Feedback: ${fileName} -> ${groupName} (correct: ${wasCorrect})`);
      return true;
    } catch (err) {
      this.logger.error(`[fusion] Failed to record feedback for ${fileName}: ${errorMessage(err)}`);
      return false;
    }
  }

  // --- Diagnostics ---

  lastResult(): DetectionResult | null {
    return this.observer.last();
  }

  lastConfidence(): number {
    return this.observer.lastConfidence();
  }

  lastBreakdown(): SignalBreakdown {
    return this.observer.lastBreakdown();
  }

  lastSignals(): Signal[] {
    return this.observer.lastSignals();
  }

  statistics(): DetectionStatistics {
    return this.observer.statistics();
  }

  recentDetections(limit = 10): DetectionTrace[] {
    return this.observer.recent(limit);
  }

  /** Rates over the in-memory detection trace. */
  detectionReport(): DetectionReport {
    return this.observer.report();
  }

  resetStatistics(): void {
    this.observer.reset();
    this.logger.debug("[fusion] Statistics reset");
  }

  // --- Configuration ---

  settings(): FusionConfig {
    return { ...this.config };
  }

  configure(patch: Partial<FusionConfig>): (keyof FusionConfig)[] {
    const { settings, rejected } = applySettings(this.config, patch, FUSION_RULES, this.logger, "fusion");
    this.config = settings;
    return rejected;
  }

  weights(): SignalWeights {
    return {
      foreground: this.config.foregroundWeight,
      background: this.config.backgroundWeight,
      pattern: this.config.patternWeight,
      session: this.config.sessionWeight,
    };
  }

  setWeights(weights: Partial<SignalWeights>): (keyof FusionConfig)[] {
    return this.configure({
      foregroundWeight: weights.foreground,
      backgroundWeight: weights.background,
      patternWeight: weights.pattern,
      sessionWeight: weights.session,
    });
  }

  get useSessionPriorityBoost(): boolean {
    return this.config.useSessionPriorityBoost;
  }

  set useSessionPriorityBoost(enabled: boolean) {
    this.config = { ...this.config, useSessionPriorityBoost: enabled };
  }
}

function presentSignals(outcomes: SignalOutcome[]): Signal[] {
  const signals: Signal[] = [];
  for (const o of outcomes) {
    if (!isAbsent(o)) signals.push(o);
  }
  return signals;
}

function unsortedResult(signals: Signal[], durationMs: number): DetectionResult {
  return {
    detectedContext: UNSORTED,
    overallConfidence: 0,
    signals,
    signalBreakdown: {},
    winningScore: 0,
    detectionDurationMs: durationMs,
    boostApplied: false,
    hasConsensus: false,
  };
}

export function describeResult(r: DetectionResult): string {
  const boost = r.boostApplied ? " [BOOSTED]" : "";
  const consensus = r.hasConsensus ? " consensus" : "";
  return `'${r.detectedContext}' (confidence ${r.overallConfidence.toFixed(2)}, ` +
    `score ${r.winningScore.toFixed(2)}, ${r.signals.length} signals${consensus})${boost}`;
}
