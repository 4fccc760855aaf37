/**
 * Session timeout sweep and window expiry, each on
 * its own interval. A tick still in flight makes the next one skip.
 */

import type { MaintenanceConfig } from "../types.js";
import { DEFAULT_CONFIG } from "../types.js";
import { applySettings, MAINTENANCE_RULES } from "../config.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { errorMessage, silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import type { SessionManager } from "./session-manager.js";
import type { WindowTracker } from "./window-tracker.js";

export type MaintenanceJob = "sweep" | "expiry";

export interface MaintenanceRun {
  job: MaintenanceJob;
  ok: boolean;
  skipped: boolean;
  count: number;
  durationMs: number;
  error?: string;
}

export class MaintenanceScheduler {
  private config: MaintenanceConfig;
  private timers: NodeJS.Timeout[] = [];
  private inFlight: Set<MaintenanceJob> = new Set();
  private readonly sessions: SessionManager;
  private readonly windows: WindowTracker;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: {
    sessions: SessionManager;
    windows: WindowTracker;
    config?: Partial<MaintenanceConfig>;
    logger?: Logger;
    clock?: Clock;
  }) {
    this.sessions = opts.sessions;
    this.windows = opts.windows;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
    this.config = applySettings(DEFAULT_CONFIG.maintenance, opts.config ?? {}, MAINTENANCE_RULES, this.logger, "maintenance").settings;
  }

  get isRunning(): boolean {
    return this.timers.length > 0;
  }

  start(): void {
    if (this.isRunning) return;
    const every = (job: MaintenanceJob, ms: number): NodeJS.Timeout => {
      const timer = setInterval(() => {
        this.run(job).catch(err => this.logger.error(`[maintenance] ${job} tick failed: ${errorMessage(err)}`));
      }, ms);
      timer.unref();
      return timer;
    };
    this.timers = [
      every("sweep", this.config.sweepIntervalMs),
      every("expiry", this.config.windowExpiryIntervalMs),
    ];
    this.logger.info(`[maintenance] Started (sweep ${this.config.sweepIntervalMs}ms, ` +
      `window expiry ${this.config.windowExpiryIntervalMs}ms)`);
  }

  stop(): void {
    if (!this.isRunning) return;
    for (const timer of this.timers) clearInterval(timer);
    this.timers = [];
    this.logger.info("[maintenance] Stopped");
  }

  /** Both jobs once, for hosts that drive the cadence themselves. */
  async runOnce(): Promise<{ timedOut: number; expired: number }> {
    const sweep = await this.run("sweep");
    const expiry = await this.run("expiry");
    return { timedOut: sweep.count, expired: expiry.count };
  }

  async run(job: MaintenanceJob): Promise<MaintenanceRun> {
    const startedAt = this.clock.now();
    if (this.inFlight.has(job)) {
      this.logger.debug(`[maintenance] ${job} skipped, previous run still in flight`);
      return { job, ok: false, skipped: true, count: 0, durationMs: 0 };
    }

    this.inFlight.add(job);
    try {
      const count = job === "sweep"
        ? await this.sessions.sweepTimedOut(startedAt)
        : this.windows.evictExpired(this.windows.settings().expirySeconds, startedAt);
      const durationMs = this.clock.now() - startedAt;
      if (count > 0) this.logger.debug(`[maintenance] ${job}: ${count} removed in ${durationMs}ms`);
      return { job, ok: true, skipped: false, count, durationMs };
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error(`[maintenance] ${job} failed: ${error}`);
      return { job, ok: false, skipped: false, count: 0, durationMs: this.clock.now() - startedAt, error };
    } finally {
      this.inFlight.delete(job);
    }
  }
}
