/**
 * Context Fusion — Main Entry
 * Decides which chat an observed download belongs to by fusing four
 * signals (foreground window, background windows, active session, learned
 * patterns), and keeps batches together with sessions and burst detection.
 *
 * Wiring:
 *   observe(file) → burst.record → engine.detectWithDetails → sessions.addFile
 *   maintenance → sessions.sweepTimedOut / windows.evictExpired
 */

import type {
  ContextFusionConfig,
  ForegroundProvider,
  PatternStore,
  SessionStore,
  WindowEnumerationProvider,
} from "./types.js";
import { loadConfig } from "./config.js";
import type { ConfigOverrides } from "./config.js";
import { BurstDetector } from "./layers/burst-detector.js";
import { ContextFusionEngine } from "./layers/fusion-engine.js";
import { InMemoryPatternStore, InMemorySessionStore } from "./layers/memory-store.js";
import { FileObservationPipeline } from "./layers/pipeline.js";
import { MaintenanceScheduler } from "./layers/scheduler.js";
import { SessionManager } from "./layers/session-manager.js";
import { WindowTracker } from "./layers/window-tracker.js";
import { systemClock } from "./utils/clock.js";
import type { Clock } from "./utils/clock.js";
import { createConsoleLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";

export * from "./types.js";
export { applySettings, loadConfig } from "./config.js";
export type { ConfigOverrides, RangeRule, SettingRules } from "./config.js";
export { BurstDetector, burstConfidence, describeBurst } from "./layers/burst-detector.js";
export type { BurstEvents } from "./layers/burst-detector.js";
export { WindowTracker, describeWindow } from "./layers/window-tracker.js";
export type { WindowEvents } from "./layers/window-tracker.js";
export { SessionManager } from "./layers/session-manager.js";
export type { AddFileOptions, GroupActivity, SessionEvents } from "./layers/session-manager.js";
export { InMemoryPatternStore, InMemorySessionStore, describePattern, patternMatches } from "./layers/memory-store.js";
export { SignalCollector, ageDecay, isAbsent } from "./layers/signal-collector.js";
export type { SignalSources } from "./layers/signal-collector.js";
export {
  applySessionBoost,
  breakdownOf,
  isValidSignal,
  overallConfidence,
  tally,
  vote,
  votingPower,
  votingSignals,
} from "./layers/voting.js";
export type { BoostDecision, ContextTally, VoteOutcome } from "./layers/voting.js";
export { DetectionObserver } from "./layers/observability.js";
export type { DetectionReport, DetectionTrace } from "./layers/observability.js";
export { ContextFusionEngine, MissingDependencyError, describeResult } from "./layers/fusion-engine.js";
export type { FusionEngineOptions, SignalWeights } from "./layers/fusion-engine.js";
export { MaintenanceScheduler } from "./layers/scheduler.js";
export type { MaintenanceJob, MaintenanceRun } from "./layers/scheduler.js";
export { FileObservationPipeline } from "./layers/pipeline.js";
export type { Observation, ObservedFile } from "./layers/pipeline.js";
export { extractGroupName, isSourceWindow } from "./utils/group-name.js";
export { createConsoleLogger, silentLogger } from "./utils/logger.js";
export type { ConsoleLoggerOptions, Logger } from "./utils/logger.js";
export { systemClock } from "./utils/clock.js";
export type { Clock } from "./utils/clock.js";
export { StoreTimeoutError } from "./utils/async.js";

export interface ContextFusionOptions {
  foreground: ForegroundProvider;
  windowEnumerator: WindowEnumerationProvider;
  /** Defaults to an in-memory store */
  sessionStore?: SessionStore;
  /** Defaults to an in-memory store */
  patternStore?: PatternStore;
  config?: ConfigOverrides;
  env?: Record<string, string | undefined>;
  logger?: Logger;
  clock?: Clock;
}

export interface ContextFusion {
  config: ContextFusionConfig;
  logger: Logger;
  burst: BurstDetector;
  windows: WindowTracker;
  sessions: SessionManager;
  engine: ContextFusionEngine;
  scheduler: MaintenanceScheduler;
  pipeline: FileObservationPipeline;
  /** Start window monitoring and the maintenance cadence */
  start(): void;
  stop(): void;
}

export function createContextFusion(opts: ContextFusionOptions): ContextFusion {
  const bootLogger = opts.logger ?? createConsoleLogger();
  const config = loadConfig(opts.config, opts.env ?? process.env, bootLogger);
  const logger = opts.logger ?? createConsoleLogger({ debug: config.debug });
  const clock = opts.clock ?? systemClock;

  logger.info(`[context-fusion] initializing for ${config.sourceApp.name}`);

  const burst = new BurstDetector({ config: config.burst, logger, clock });
  const windows = new WindowTracker({
    provider: opts.windowEnumerator,
    config: config.windows,
    sourceApp: config.sourceApp,
    logger,
    clock,
  });
  const sessions = new SessionManager({
    store: opts.sessionStore ?? new InMemorySessionStore(),
    config: config.session,
    logger,
    clock,
  });
  const engine = new ContextFusionEngine({
    foreground: opts.foreground,
    windows,
    patterns: opts.patternStore ?? new InMemoryPatternStore({ clock }),
    sessions,
    logger,
    config: config.fusion,
    sourceApp: config.sourceApp,
    clock,
  });
  const scheduler = new MaintenanceScheduler({ sessions, windows, config: config.maintenance, logger, clock });
  const pipeline = new FileObservationPipeline({ burst, engine, sessions, logger, clock });

  return {
    config,
    logger,
    burst,
    windows,
    sessions,
    engine,
    scheduler,
    pipeline,
    start() {
      windows.start();
      scheduler.start();
    },
    stop() {
      scheduler.stop();
      windows.stop();
      burst.reset();
    },
  };
}
