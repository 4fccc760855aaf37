/**
 * Window Tracker — bounded cache of recently seen source-app windows.
 * Fed by the enumeration provider on each scan; oldest `lastSeen` entry is
 * evicted on overflow and entries past expiry are swept.
 */

import type {
  RecentGroup,
  SourceApp,
  WindowCandidate,
  WindowEnumerationProvider,
  WindowSnapshot,
  WindowTrackerConfig,
} from "../types.js";
import { DEFAULT_CONFIG, DEFAULT_SOURCE_APP, UNSORTED } from "../types.js";
import { applySettings, WINDOW_RULES } from "../config.js";
import { secondsBetween, systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { StoreTimeoutError, withTimeout } from "../utils/async.js";
import { TypedEmitter } from "../utils/emitter.js";
import { extractGroupName } from "../utils/group-name.js";
import { errorMessage, silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface WindowEvents {
  detected: WindowCandidate;
  activated: WindowCandidate;
  removed: WindowCandidate;
}

const FOCUSED_CONFIDENCE = 1.0;
const VISIBLE_CONFIDENCE = 0.7;

export class WindowTracker {
  private config: WindowTrackerConfig;
  private windows: Map<string, WindowCandidate> = new Map();
  private monitoring = false;
  private scanTimer: NodeJS.Timeout | null = null;
  private scanning: Promise<number> | null = null;
  private readonly emitter: TypedEmitter<WindowEvents>;
  private readonly provider: WindowEnumerationProvider;
  private readonly sourceApp: SourceApp;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: {
    provider: WindowEnumerationProvider;
    config?: Partial<WindowTrackerConfig>;
    sourceApp?: SourceApp;
    logger?: Logger;
    clock?: Clock;
  }) {
    this.provider = opts.provider;
    this.sourceApp = opts.sourceApp ?? DEFAULT_SOURCE_APP;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
    this.config = applySettings(DEFAULT_CONFIG.windows, opts.config ?? {}, WINDOW_RULES, this.logger, "windows").settings;
    this.emitter = new TypedEmitter<WindowEvents>((event, err) =>
      this.logger.warn(`[windows] ${event} listener failed: ${errorMessage(err)}`)
    );
  }

  on<K extends keyof WindowEvents>(event: K, listener: (window: WindowCandidate) => void): () => void {
    return this.emitter.on(event, listener);
  }

  settings(): WindowTrackerConfig {
    return { ...this.config };
  }

  configure(patch: Partial<WindowTrackerConfig>): (keyof WindowTrackerConfig)[] {
    const { settings, rejected } = applySettings(this.config, patch, WINDOW_RULES, this.logger, "windows");
    const intervalChanged = settings.scanIntervalMs !== this.config.scanIntervalMs ||
      settings.autoScan !== this.config.autoScan;
    this.config = settings;
    this.enforceLimit();
    if (this.monitoring && intervalChanged) {
      this.stopTimer();
      this.startTimer();
    }
    return rejected;
  }

  // --- Start / Stop ---

  get isMonitoring(): boolean {
    return this.monitoring;
  }

  start(): void {
    if (this.monitoring) {
      this.logger.warn("[windows] Already monitoring");
      return;
    }
    this.monitoring = true;
    this.startTimer();
    this.logger.info(this.config.autoScan
      ? `[windows] Started, scanning every ${this.config.scanIntervalMs}ms`
      : "[windows] Started (manual scan mode)");
  }

  stop(): void {
    if (!this.monitoring) return;
    this.monitoring = false;
    this.stopTimer();
    this.logger.info(`[windows] Stopped (tracked ${this.windows.size} windows)`);
  }

  private startTimer(): void {
    if (!this.config.autoScan) return;
    const tick = (): void => {
      this.scan().catch(err => this.logger.error(`[windows] Scan failed: ${errorMessage(err)}`));
    };
    tick();
    this.scanTimer = setInterval(tick, this.config.scanIntervalMs);
    this.scanTimer.unref();
  }

  private stopTimer(): void {
    if (this.scanTimer) clearInterval(this.scanTimer);
    this.scanTimer = null;
  }

  // --- Scanning ---

  /**
   * Pull current windows from the provider and merge them into the cache.
   * Overlapping calls share one in-flight scan; an enumeration slower than
   * `enumerationTimeoutMs` counts as empty. Returns the number of windows
   * the provider reported.
   */
  scan(): Promise<number> {
    if (this.scanning) return this.scanning;
    this.scanning = this.runScan().finally(() => {
      this.scanning = null;
    });
    return this.scanning;
  }

  private async runScan(): Promise<number> {
    let current: WindowSnapshot[];
    try {
      current = await withTimeout(async () => this.provider.listWindows(), this.config.enumerationTimeoutMs, "window enumeration");
    } catch (err) {
      if (err instanceof StoreTimeoutError) this.logger.warn(`[windows] ${err.message}; keeping cached windows`);
      else this.logger.error(`[windows] Enumeration failed: ${errorMessage(err)}`);
      return 0;
    }
    this.merge(current, this.clock.now());
    return current.length;
  }

  private merge(current: WindowSnapshot[], now: number): void {
    for (const w of current) {
      const existing = this.windows.get(w.id);
      if (existing) {
        const wasActive = existing.isActive;
        const updated: WindowCandidate = {
          ...existing,
          title: w.title,
          processName: w.processName,
          isActive: w.isActiveFocus,
          lastSeen: now,
          seenCount: existing.seenCount + 1,
          confidenceScore: w.isActiveFocus ? FOCUSED_CONFIDENCE : VISIBLE_CONFIDENCE,
          // title change invalidates the cached name
          extractedGroupName: existing.title === w.title ? existing.extractedGroupName : undefined,
        };
        this.windows.set(w.id, updated);
        if (!wasActive && w.isActiveFocus) {
          this.logger.debug(`[windows] Activated: ${describeWindow(updated, now)}`);
          this.emitter.emit("activated", { ...updated });
        }
      } else {
        const added: WindowCandidate = {
          id: w.id,
          title: w.title,
          processName: w.processName,
          isActive: w.isActiveFocus,
          firstSeen: now,
          lastSeen: now,
          seenCount: 1,
          confidenceScore: w.isActiveFocus ? FOCUSED_CONFIDENCE : VISIBLE_CONFIDENCE,
        };
        this.windows.set(w.id, added);
        this.logger.info(`[windows] Detected: ${describeWindow(added, now)}`);
        this.emitter.emit("detected", { ...added });
        this.enforceLimit();
      }
    }
    this.logger.debug(`[windows] Scan: ${current.length} found, ${this.windows.size} tracked`);
  }

  private enforceLimit(): void {
    while (this.windows.size > this.config.maxTrackedWindows) {
      let oldest: WindowCandidate | null = null;
      for (const w of this.windows.values()) {
        if (!oldest || w.lastSeen < oldest.lastSeen) oldest = w;
      }
      if (!oldest) return;
      this.windows.delete(oldest.id);
      this.logger.debug(`[windows] Evicted: ${oldest.title}`);
      this.emitter.emit("removed", { ...oldest });
    }
  }

  // --- Queries (copies, most recent first) ---

  all(): WindowCandidate[] {
    return [...this.windows.values()]
      .sort((a, b) => b.lastSeen - a.lastSeen)
      .map(w => ({ ...w }));
  }

  mostRecent(): WindowCandidate | null {
    return this.all()[0] ?? null;
  }

  recent(withinSeconds = this.config.recentWindowSeconds, now: number = this.clock.now()): WindowCandidate[] {
    return this.all().filter(w => secondsBetween(w.lastSeen, now) <= withinSeconds);
  }

  byId(id: string): WindowCandidate | null {
    const w = this.windows.get(id);
    return w ? { ...w } : null;
  }

  trackedCount(): number {
    return this.windows.size;
  }

  /**
   * Best chat name among windows seen within `withinSeconds`: highest
   * confidence with an extracted name (ties → most recent), else extracted
   * from the single most recent window.
   */
  bestRecentGroupName(withinSeconds = this.config.recentWindowSeconds, now: number = this.clock.now()): RecentGroup | null {
    const recent = this.recent(withinSeconds, now);
    if (recent.length === 0) return null;

    let best: WindowCandidate | null = null;
    for (const w of recent) {
      if (!w.extractedGroupName) continue;
      if (!best || w.confidenceScore > best.confidenceScore) best = w;
    }
    if (best?.extractedGroupName) {
      this.logger.debug(`[windows] Best recent group: '${best.extractedGroupName}' (${best.confidenceScore.toFixed(2)})`);
      return { groupName: best.extractedGroupName, confidence: best.confidenceScore, lastSeen: best.lastSeen };
    }

    const latest = recent[0];
    const extracted = extractGroupName(latest.title, this.sourceApp);
    if (extracted === UNSORTED) return null;

    const cached = this.windows.get(latest.id);
    if (cached) this.windows.set(latest.id, { ...cached, extractedGroupName: extracted });
    this.logger.debug(`[windows] Extracted from most recent: '${extracted}' (${latest.confidenceScore.toFixed(2)})`);
    return { groupName: extracted, confidence: latest.confidenceScore, lastSeen: latest.lastSeen };
  }

  // --- Cleanup ---

  /** Drop windows not seen for `timeoutSeconds`; returns how many went. */
  evictExpired(timeoutSeconds = this.config.expirySeconds, now: number = this.clock.now()): number {
    const expired = [...this.windows.values()].filter(w => secondsBetween(w.lastSeen, now) > timeoutSeconds);
    for (const w of expired) {
      this.windows.delete(w.id);
      this.logger.debug(`[windows] Expired: ${w.title}`);
      this.emitter.emit("removed", { ...w });
    }
    if (expired.length > 0) this.logger.info(`[windows] Cleared ${expired.length} expired windows`);
    return expired.length;
  }
}

export function describeWindow(w: WindowCandidate, now: number): string {
  const state = w.isActive ? "ACTIVE" : "VISIBLE";
  return `${w.title} [${state}] (seen ${w.seenCount}x, confidence ${w.confidenceScore.toFixed(2)}, ` +
    `age ${secondsBetween(w.lastSeen, now).toFixed(0)}s)`;
}
