/**
 * Burst Detector — rolling time window over observed files.
 * Files closer together than `burstThresholdSeconds` form one batch once
 * `minimumFilesForBurst` of them are in the window; a batch longer than
 * `maxBurstDurationSeconds` is force-ended.
 */

import type { BurstConfig, BurstEvent, BurstStatus } from "../types.js";
import { DEFAULT_CONFIG } from "../types.js";
import { applySettings, BURST_RULES } from "../config.js";
import { secondsBetween, systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { TypedEmitter } from "../utils/emitter.js";
import { errorMessage, silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface BurstEvents {
  started: BurstStatus;
  continued: BurstStatus;
  ended: BurstStatus;
}

/** Batch confidence: file count and inter-file interval, averaged 50/50. */
export function burstConfidence(fileCount: number, averageIntervalSeconds: number, saturationCount = 10): number {
  if (fileCount < 2) return 0;
  if (fileCount >= saturationCount) return 1;

  const countScore = Math.min(fileCount / saturationCount, 1);
  const intervalScore = averageIntervalSeconds < 2
    ? 1
    : Math.max(0, 1 - averageIntervalSeconds / 10);

  return (countScore + intervalScore) / 2;
}

export class BurstDetector {
  private config: BurstConfig;
  private events: BurstEvent[] = [];
  private active = false;
  private burstStart: number | null = null;
  private readonly emitter: TypedEmitter<BurstEvents>;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: { config?: Partial<BurstConfig>; logger?: Logger; clock?: Clock } = {}) {
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
    this.config = applySettings(DEFAULT_CONFIG.burst, opts.config ?? {}, BURST_RULES, this.logger, "burst").settings;
    this.emitter = new TypedEmitter<BurstEvents>((event, err) =>
      this.logger.warn(`[burst] ${event} listener failed: ${errorMessage(err)}`)
    );
  }

  on<K extends keyof BurstEvents>(event: K, listener: (status: BurstStatus) => void): () => void {
    return this.emitter.on(event, listener);
  }

  settings(): BurstConfig {
    return { ...this.config };
  }

  configure(patch: Partial<BurstConfig>): (keyof BurstConfig)[] {
    const { settings, rejected } = applySettings(this.config, patch, BURST_RULES, this.logger, "burst");
    this.config = settings;
    return rejected;
  }

  /** Record an observed file and update burst state. */
  record(fileName: string, time: number = this.clock.now()): BurstStatus {
    this.evict(time);
    this.events.push({ fileName, time });
    this.logger.debug(`[burst] Recorded ${fileName} (window: ${this.events.length})`);

    if (this.events.length >= this.config.minimumFilesForBurst) {
      if (!this.active) {
        this.active = true;
        this.burstStart = this.events[0].time;
        const status = this.snapshot();
        this.logger.info(`[burst] Started: ${describeBurst(status)}`);
        this.emitter.emit("started", status);
      } else {
        const status = this.snapshot();
        this.logger.debug(`[burst] Continued: ${describeBurst(status)}`);
        this.emitter.emit("continued", status);
      }
    } else if (this.active) {
      this.end();
    }

    return this.snapshot();
  }

  /**
   * Would a file observed at `time` complete or continue a burst?
   * Reads the window as it would look after eviction without changing it.
   */
  isBurst(fileName: string, time: number = this.clock.now()): boolean {
    const window = this.retainedAt(time);
    if (window.length === 0 || window.length < this.config.minimumFilesForBurst - 1) return false;

    const last = window[window.length - 1];
    const sinceLast = secondsBetween(last.time, time);
    const burst = sinceLast <= this.config.burstThresholdSeconds;
    this.logger.debug(`[burst] isBurst ${fileName}: window=${window.length}, sinceLast=${sinceLast.toFixed(1)}s -> ${burst}`);
    return burst;
  }

  status(): BurstStatus {
    return this.snapshot();
  }

  /** Files in the active burst, 0 when none is active. */
  currentCount(): number {
    return this.active ? this.events.length : 0;
  }

  /** Seconds until the active burst lapses, or null when none is active. */
  remaining(now: number = this.clock.now()): number | null {
    if (!this.active || this.events.length === 0) return null;
    const last = this.events[this.events.length - 1];
    const left = this.config.burstThresholdSeconds - secondsBetween(last.time, now);
    return left > 0 ? left : 0;
  }

  reset(): void {
    if (this.active) this.end();
    this.events = [];
    this.burstStart = null;
    this.active = false;
    this.logger.debug("[burst] Reset");
  }

  // --- internals ---

  private retainedAt(time: number): BurstEvent[] {
    if (this.burstStart !== null && secondsBetween(this.burstStart, time) > this.config.maxBurstDurationSeconds) {
      return [];
    }
    return this.events.filter(e => secondsBetween(e.time, time) <= this.config.burstThresholdSeconds);
  }

  private evict(time: number): void {
    this.events = this.events.filter(e => secondsBetween(e.time, time) <= this.config.burstThresholdSeconds);

    if (this.burstStart !== null && secondsBetween(this.burstStart, time) > this.config.maxBurstDurationSeconds) {
      this.logger.info(`[burst] Max duration (${this.config.maxBurstDurationSeconds}s) exceeded, ending burst`);
      this.end();
      this.events = [];
    }
  }

  private end(): void {
    if (!this.active) return;
    const status = this.snapshot();
    this.active = false;
    this.burstStart = null;
    const ended = { ...status, isActive: false };
    this.logger.info(`[burst] Ended: ${describeBurst(ended)}`);
    this.emitter.emit("ended", ended);
  }

  private snapshot(): BurstStatus {
    const count = this.events.length;
    const first = count > 0 ? this.events[0].time : null;
    const last = count > 0 ? this.events[count - 1].time : null;
    const start = this.burstStart ?? first;
    const durationSeconds = start !== null && last !== null ? secondsBetween(start, last) : 0;
    const averageIntervalSeconds = count > 1 ? durationSeconds / (count - 1) : 0;

    return {
      isActive: this.active,
      fileCount: count,
      burstStartTime: start,
      lastFileTime: last,
      fileNames: this.events.map(e => e.fileName),
      durationSeconds,
      averageIntervalSeconds,
      confidence: burstConfidence(count, averageIntervalSeconds, this.config.confidenceSaturationCount),
    };
  }
}

export function describeBurst(status: BurstStatus): string {
  if (!status.isActive && status.fileCount === 0) return "no burst";
  return `${status.fileCount} files in ${status.durationSeconds.toFixed(1)}s ` +
    `(avg ${status.averageIntervalSeconds.toFixed(1)}s/file, confidence ${status.confidence.toFixed(2)})`;
}
