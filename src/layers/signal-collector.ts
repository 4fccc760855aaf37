/**
 * One Signal or Absent per source, in a fixed order:
 * Foreground, Background, Session, Pattern.
 * A source that throws or times out becomes Absent; nothing propagates.
 * Provider and store calls are bounded by `storeTimeoutMs`.
 */

import { extname } from "node:path";
import type {
  Absent,
  ForegroundProvider,
  FusionConfig,
  PatternStore,
  Signal,
  SignalOutcome,
  SignalSource,
  SourceApp,
} from "../types.js";
import { UNSORTED } from "../types.js";
import { withTimeout } from "../utils/async.js";
import { secondsBetween } from "../utils/clock.js";
import { extractGroupName, isSourceWindow } from "../utils/group-name.js";
import { errorMessage } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import type { WindowTracker } from "./window-tracker.js";
import type { SessionManager } from "./session-manager.js";
import { describePattern } from "./memory-store.js";

export interface SignalSources {
  foreground: ForegroundProvider;
  windows: WindowTracker;
  sessions: SessionManager;
  patterns: PatternStore;
}

export function isAbsent(outcome: SignalOutcome): outcome is Absent {
  return "absent" in outcome;
}

export function absent(source: SignalSource, reason: string): Absent {
  return { source, absent: true, reason };
}

function signal(source: SignalSource, detectedContext: string, weight: number, confidence: number, timestamp: number, metadata?: string): Signal {
  return { source, detectedContext, weight, originalWeight: weight, confidence, timestamp, wasBoosted: false, metadata };
}

/** Linear fall-off to 0 at `maxAgeSeconds`. */
export function ageDecay(ageSeconds: number, maxAgeSeconds: number): number {
  return Math.max(0, 1 - ageSeconds / maxAgeSeconds);
}

export class SignalCollector {
  constructor(
    private readonly sources: SignalSources,
    private readonly settings: () => FusionConfig,
    private readonly sourceApp: SourceApp,
    private readonly logger: Logger,
  ) {}

  async collect(fileName: string, time: number): Promise<SignalOutcome[]> {
    const outcomes = [
      await this.guard("Foreground", () => this.foreground(time)),
      await this.guard("Background", () => this.background(time)),
      await this.guard("Session", () => this.session(time)),
      await this.guard("Pattern", () => this.pattern(fileName, time)),
    ];
    for (const o of outcomes) {
      this.logger.debug(isAbsent(o)
        ? `[fusion] ${o.source}: unavailable (${o.reason})`
        : `[fusion] ${o.source}: '${o.detectedContext}' w=${o.weight.toFixed(2)} c=${o.confidence.toFixed(2)}`);
    }
    return outcomes;
  }

  private async guard(source: SignalSource, fn: () => Promise<SignalOutcome>): Promise<SignalOutcome> {
    try {
      return await fn();
    } catch (err) {
      return absent(source, errorMessage(err));
    }
  }

  async foreground(time: number): Promise<SignalOutcome> {
    const cfg = this.settings();
    const foreground = this.sources.foreground;
    const title = await withTimeout(async () => foreground.activeTitle(), cfg.storeTimeoutMs, "foreground lookup");
    const processName = await withTimeout(async () => foreground.activeProcessName(), cfg.storeTimeoutMs, "foreground lookup");

    if (!isSourceWindow(title, processName, this.sourceApp)) {
      return absent("Foreground", `not a ${this.sourceApp.name} window`);
    }
    const groupName = extractGroupName(title, this.sourceApp);
    if (groupName === UNSORTED) return absent("Foreground", "no chat name in title");

    return signal("Foreground", groupName, cfg.foregroundWeight, cfg.foregroundConfidence, time, `Window: ${title}`);
  }

  async background(time: number): Promise<SignalOutcome> {
    const cfg = this.settings();
    const windows = this.sources.windows;
    if (!windows.isMonitoring) return absent("Background", "window tracker not monitoring");

    const best = windows.bestRecentGroupName(undefined, time);
    if (best) {
      const age = secondsBetween(best.lastSeen, time);
      const confidence = best.confidence * ageDecay(age, cfg.maxSignalAgeSeconds);
      if (confidence < cfg.minimumConfidenceThreshold) {
        return absent("Background", `best recent group too old (${age.toFixed(1)}s)`);
      }
      return signal("Background", best.groupName, cfg.backgroundWeight, confidence, best.lastSeen, "Best recent group");
    }

    const latest = windows.mostRecent();
    if (!latest?.extractedGroupName) return absent("Background", "no recent chat window");

    const age = secondsBetween(latest.lastSeen, time);
    const confidence = latest.confidenceScore * ageDecay(age, cfg.maxSignalAgeSeconds);
    if (confidence < cfg.minimumConfidenceThreshold) {
      return absent("Background", `most recent window too old (${age.toFixed(1)}s)`);
    }
    return signal("Background", latest.extractedGroupName, cfg.backgroundWeight, confidence, latest.lastSeen,
      `Age: ${age.toFixed(1)}s, Window: ${latest.title}`);
  }

  async session(time: number): Promise<SignalOutcome> {
    const cfg = this.settings();
    const session = await withTimeout(() => this.sources.sessions.active(), cfg.storeTimeoutMs, "session lookup");
    if (!session) return absent("Session", "no active session");

    const age = secondsBetween(session.lastActivity, time);
    const penalty = Math.max(0, 1 - age / (2 * session.timeoutSeconds));
    const confidence = session.confidenceScore * penalty;
    this.logger.debug(`[fusion] Session #${session.id} '${session.groupName}': files=${session.fileCount}, ` +
      `age=${age.toFixed(1)}s, base=${session.confidenceScore.toFixed(2)}, penalty=${penalty.toFixed(2)}`);

    if (confidence < cfg.minimumConfidenceThreshold) {
      return absent("Session", `session #${session.id} confidence ${confidence.toFixed(2)} below threshold`);
    }
    return signal("Session", session.groupName, cfg.sessionWeight, confidence, session.lastActivity,
      `Session #${session.id}, Files: ${session.fileCount}, Age: ${age.toFixed(1)}s`);
  }

  async pattern(fileName: string, time: number): Promise<SignalOutcome> {
    const cfg = this.settings();
    const pattern = await withTimeout(
      () => this.sources.patterns.bestPattern(fileName, extname(fileName), time),
      cfg.storeTimeoutMs,
      "pattern lookup",
    );
    if (!pattern) return absent("Pattern", "no matching pattern");
    if (pattern.confidenceScore < cfg.minimumConfidenceThreshold) {
      return absent("Pattern", `pattern confidence ${pattern.confidenceScore.toFixed(2)} below threshold`);
    }

    const bonus = Math.min(0.1, pattern.timesSeen / 100);
    const confidence = Math.min(1.0, pattern.confidenceScore + bonus);
    return signal("Pattern", pattern.groupName, cfg.patternWeight, confidence, pattern.lastSeen ?? time,
      `Pattern: ${describePattern(pattern)}, Seen: ${pattern.timesSeen}x`);
  }
}
