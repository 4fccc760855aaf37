/**
 * Session Manager — owns the "current classification target".
 * At most one session is active; a file for a different group ends it and
 * opens a new one. Persistence lives behind the injected SessionStore.
 */

import type { DownloadSession, SessionConfig, SessionHint, SessionStore } from "../types.js";
import { DEFAULT_CONFIG } from "../types.js";
import { applySettings, SESSION_RULES } from "../config.js";
import { SerialLock } from "../utils/async.js";
import { secondsBetween, systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { TypedEmitter } from "../utils/emitter.js";
import { errorMessage, silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";

export interface SessionEvents {
  started: DownloadSession;
  ended: DownloadSession;
  fileAdded: { session: DownloadSession; fileName: string };
  timedOut: DownloadSession;
}

export interface AddFileOptions {
  path?: string;
  size?: number;
  time?: number;
}

export interface GroupActivity {
  groupName: string;
  sessionCount: number;
}

const TOTAL_COUNT_SCAN = 10000;
const STATS_SCAN = 1000;

export class SessionManager {
  private config: SessionConfig;
  private readonly lock = new SerialLock();
  private readonly emitter: TypedEmitter<SessionEvents>;
  private readonly store: SessionStore;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: { store: SessionStore; config?: Partial<SessionConfig>; logger?: Logger; clock?: Clock }) {
    this.store = opts.store;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
    this.config = applySettings(DEFAULT_CONFIG.session, opts.config ?? {}, SESSION_RULES, this.logger, "session").settings;
    this.emitter = new TypedEmitter<SessionEvents>((event, err) =>
      this.logger.warn(`[session] ${event} listener failed: ${errorMessage(err)}`)
    );
  }

  on<K extends keyof SessionEvents>(event: K, listener: (payload: SessionEvents[K]) => void): () => void {
    return this.emitter.on(event, listener);
  }

  // --- Configuration ---

  defaultTimeout(): number {
    return this.config.defaultTimeoutSeconds;
  }

  /** Applies to sessions started afterwards. Returns false when rejected. */
  setDefaultTimeout(seconds: number): boolean {
    const rejected = this.configure({ defaultTimeoutSeconds: seconds });
    if (rejected.length > 0) return false;
    this.logger.info(`[session] Default timeout set to ${seconds}s`);
    return true;
  }

  configure(patch: Partial<SessionConfig>): (keyof SessionConfig)[] {
    const { settings, rejected } = applySettings(this.config, patch, SESSION_RULES, this.logger, "session");
    this.config = settings;
    return rejected;
  }

  // --- Current session ---

  async active(): Promise<DownloadSession | null> {
    try {
      return await this.store.getActive();
    } catch (err) {
      this.logger.warn(`[session] Failed to read active session: ${errorMessage(err)}`);
      return null;
    }
  }

  async isActive(): Promise<boolean> {
    return (await this.active()) !== null;
  }

  async currentGroupName(): Promise<string | null> {
    return (await this.active())?.groupName ?? null;
  }

  /** Seconds before the active session lapses (floored at 0), null without one. */
  async timeoutRemaining(now: number = this.clock.now()): Promise<number | null> {
    const session = await this.active();
    if (!session) return null;
    const left = session.timeoutSeconds - secondsBetween(session.lastActivity, now);
    return left > 0 ? left : 0;
  }

  /**
   * Open a session for `groupName`. An active session for the same group is
   * reused with its activity refreshed; one for another group is ended first.
   */
  start(groupName: string, hint: SessionHint = {}, confidence = 1.0, time: number = this.clock.now()): Promise<DownloadSession> {
    return this.lock.run(() => this.startLocked(groupName, hint, confidence, time));
  }

  /**
   * Attach a file to the active session for `groupName`, starting one when
   * there is none or it belongs to another group.
   */
  addFile(fileName: string, groupName: string, opts: AddFileOptions = {}): Promise<DownloadSession> {
    const time = opts.time ?? this.clock.now();
    return this.lock.run(async () => {
      try {
        let session = await this.store.getActive();
        if (!session || session.groupName !== groupName) {
          session = await this.startLocked(groupName, {}, 1.0, time);
        }

        if (session.fileNames.includes(fileName)) {
          this.logger.debug(`[session] '${fileName}' already in session #${session.id}`);
          return session;
        }

        await this.store.addFile(session.id, { fileName, path: opts.path, size: opts.size, addedAt: time });
        const updated: DownloadSession = {
          ...session,
          fileNames: [...session.fileNames, fileName],
          fileCount: session.fileNames.length + 1,
          lastActivity: time,
        };
        await this.store.update(updated);

        this.logger.debug(`[session] Added '${fileName}' to session #${updated.id} (total files: ${updated.fileCount})`);
        this.emitter.emit("fileAdded", { session: { ...updated }, fileName });
        return updated;
      } catch (err) {
        this.logger.error(`[session] Failed to add '${fileName}' to session: ${errorMessage(err)}`);
        throw err;
      }
    });
  }

  /** End one session. Store failures are logged; resolves to the ended session or null. */
  end(sessionId: number, time: number = this.clock.now()): Promise<DownloadSession | null> {
    return this.lock.run(async () => {
      try {
        return await this.endLocked(sessionId, time);
      } catch (err) {
        this.logger.error(`[session] Failed to end session #${sessionId}: ${errorMessage(err)}`);
        return null;
      }
    });
  }

  endCurrent(time: number = this.clock.now()): Promise<DownloadSession | null> {
    return this.lock.run(async () => {
      try {
        const session = await this.store.getActive();
        return session ? await this.endLocked(session.id, time) : null;
      } catch (err) {
        this.logger.error(`[session] Failed to end current session: ${errorMessage(err)}`);
        return null;
      }
    });
  }

  /** End every active session idle for longer than its timeout. */
  sweepTimedOut(now: number = this.clock.now()): Promise<number> {
    return this.lock.run(async () => {
      try {
        const active = await this.store.list({ active: true, limit: TOTAL_COUNT_SCAN });
        const expired = active.filter(s => secondsBetween(s.lastActivity, now) > s.timeoutSeconds);
        for (const session of expired) {
          const ended = await this.endLocked(session.id, now, false);
          if (ended) this.emitter.emit("timedOut", { ...ended });
        }
        if (expired.length > 0) this.logger.info(`[session] Ended ${expired.length} timed-out session(s)`);
        return expired.length;
      } catch (err) {
        this.logger.error(`[session] Timeout sweep failed: ${errorMessage(err)}`);
        return 0;
      }
    });
  }

  // --- History & statistics ---

  async recent(limit = 10, includeActive = true): Promise<DownloadSession[]> {
    try {
      return await this.store.list({ active: includeActive ? undefined : false, limit });
    } catch (err) {
      this.logger.warn(`[session] Failed to list recent sessions: ${errorMessage(err)}`);
      return [];
    }
  }

  async byId(id: number): Promise<DownloadSession | null> {
    try {
      return await this.store.get(id);
    } catch (err) {
      this.logger.warn(`[session] Failed to read session #${id}: ${errorMessage(err)}`);
      return null;
    }
  }

  async totalCount(): Promise<number> {
    return (await this.recent(TOTAL_COUNT_SCAN)).length;
  }

  async averageFilesPerSession(): Promise<number> {
    const sessions = await this.recent(STATS_SCAN);
    if (sessions.length === 0) return 0;
    return sessions.reduce((sum, s) => sum + s.fileCount, 0) / sessions.length;
  }

  /** Group with the most sessions; first seen (newest) wins a tie. */
  async mostActiveGroup(): Promise<GroupActivity | null> {
    const sessions = await this.recent(STATS_SCAN);
    const counts = new Map<string, number>();
    for (const s of sessions) counts.set(s.groupName, (counts.get(s.groupName) ?? 0) + 1);

    let best: GroupActivity | null = null;
    for (const [groupName, sessionCount] of counts) {
      if (!best || sessionCount > best.sessionCount) best = { groupName, sessionCount };
    }
    return best;
  }

  // --- internals (caller holds the lock) ---

  private async startLocked(groupName: string, hint: SessionHint, confidence: number, time: number): Promise<DownloadSession> {
    try {
      const current = await this.store.getActive();

      if (current && current.groupName === groupName) {
        const refreshed: DownloadSession = { ...current, lastActivity: time };
        await this.store.update(refreshed);
        this.logger.info(`[session] Reusing active session #${current.id} for '${groupName}'`);
        return refreshed;
      }

      if (current) {
        this.logger.info(`[session] Ending previous session #${current.id} for '${current.groupName}'`);
        await this.endLocked(current.id, time);
      }

      const created = await this.store.create({
        groupName,
        startTime: time,
        timeoutSeconds: this.config.defaultTimeoutSeconds,
        confidenceScore: confidence,
        windowTitle: hint.windowTitle,
        processName: hint.processName,
      });
      this.logger.info(`[session] Started session #${created.id} for '${groupName}' ` +
        `(confidence: ${confidence.toFixed(2)}, timeout: ${created.timeoutSeconds}s)`);
      this.emitter.emit("started", { ...created });
      return created;
    } catch (err) {
      this.logger.error(`[session] Failed to start session for '${groupName}': ${errorMessage(err)}`);
      throw err;
    }
  }

  private async endLocked(sessionId: number, time: number, log = true): Promise<DownloadSession | null> {
    const session = await this.store.get(sessionId);
    if (!session || !session.isActive) return null;

    await this.store.end(sessionId, time);
    const ended: DownloadSession = { ...session, isActive: false, endTime: time };
    if (log) {
      this.logger.info(`[session] Ended session #${sessionId} for '${session.groupName}' ` +
        `(files: ${session.fileCount}, duration: ${secondsBetween(session.startTime, time).toFixed(1)}s)`);
    }
    this.emitter.emit("ended", { ...ended });
    return ended;
  }
}
