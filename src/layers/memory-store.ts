/**
 * In-memory Session and Pattern stores.
 * Reference implementations of the store contracts; hosts plug a durable
 * store in behind the same interfaces.
 */

import type {
  DownloadSession,
  NewSession,
  Pattern,
  PatternStore,
  SessionFile,
  SessionQuery,
  SessionStore,
} from "../types.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";

function copySession(s: DownloadSession): DownloadSession {
  return { ...s, fileNames: [...s.fileNames] };
}

export class InMemorySessionStore implements SessionStore {
  private sessions: Map<number, DownloadSession> = new Map();
  private files: Map<number, SessionFile[]> = new Map();
  private nextId = 1;

  async getActive(): Promise<DownloadSession | null> {
    let latest: DownloadSession | null = null;
    for (const s of this.sessions.values()) {
      if (!s.isActive) continue;
      if (!latest || s.lastActivity > latest.lastActivity) latest = s;
    }
    return latest ? copySession(latest) : null;
  }

  async get(id: number): Promise<DownloadSession | null> {
    const s = this.sessions.get(id);
    return s ? copySession(s) : null;
  }

  async create(init: NewSession): Promise<DownloadSession> {
    const session: DownloadSession = {
      id: this.nextId++,
      groupName: init.groupName,
      startTime: init.startTime,
      lastActivity: init.startTime,
      timeoutSeconds: init.timeoutSeconds,
      confidenceScore: init.confidenceScore,
      fileCount: 0,
      fileNames: [],
      isActive: true,
      windowTitle: init.windowTitle,
      processName: init.processName,
    };
    this.sessions.set(session.id, session);
    this.files.set(session.id, []);
    return copySession(session);
  }

  async update(session: DownloadSession): Promise<void> {
    if (!this.sessions.has(session.id)) throw new Error(`Session #${session.id} not found`);
    this.sessions.set(session.id, copySession(session));
  }

  async addFile(sessionId: number, file: SessionFile): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) throw new Error(`Session #${sessionId} not found`);

    this.files.get(sessionId)?.push({ ...file });
    const fileNames = session.fileNames.includes(file.fileName)
      ? session.fileNames
      : [...session.fileNames, file.fileName];
    this.sessions.set(sessionId, { ...session, fileNames, fileCount: fileNames.length, lastActivity: file.addedAt });
  }

  async end(sessionId: number, endTime: number): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) return;
    this.sessions.set(sessionId, { ...session, isActive: false, endTime });
  }

  async list(query: SessionQuery): Promise<DownloadSession[]> {
    return [...this.sessions.values()]
      .filter(s => query.active === undefined || s.isActive === query.active)
      .sort((a, b) => b.startTime - a.startTime || b.id - a.id)
      .slice(0, query.limit)
      .map(copySession);
  }

  /** File records (with path and size) attached to a session. */
  filesOf(sessionId: number): SessionFile[] {
    return (this.files.get(sessionId) ?? []).map(f => ({ ...f }));
  }
}

// --- Patterns ---

/** Every criterion the pattern sets must hold for the file. */
export function patternMatches(pattern: Pattern, fileName: string, extension: string, time: number): boolean {
  if (pattern.extension && extension.toLowerCase() !== pattern.extension.toLowerCase()) return false;
  if (pattern.namePattern && !fileName.toLowerCase().includes(pattern.namePattern.toLowerCase())) return false;

  const at = new Date(time);
  if (pattern.hourOfDay !== undefined && at.getHours() !== pattern.hourOfDay) return false;
  if (pattern.dayOfWeek !== undefined && at.getDay() !== pattern.dayOfWeek) return false;
  return true;
}

export function describePattern(pattern: Pattern): string {
  const parts: string[] = [];
  if (pattern.extension) parts.push(`Extension: ${pattern.extension}`);
  if (pattern.namePattern) parts.push(`Name: *${pattern.namePattern}*`);
  if (pattern.hourOfDay !== undefined) parts.push(`Hour: ${pattern.hourOfDay}:00`);
  if (pattern.dayOfWeek !== undefined) parts.push(`Day: ${pattern.dayOfWeek}`);
  return parts.length > 0 ? parts.join(", ") : "Any file";
}

export class InMemoryPatternStore implements PatternStore {
  private patterns: Map<number, Pattern> = new Map();
  private nextId = 1;
  private readonly clock: Clock;

  constructor(opts: { clock?: Clock } = {}) {
    this.clock = opts.clock ?? systemClock;
  }

  async savePattern(pattern: Pattern): Promise<void> {
    const now = this.clock.now();
    const id = pattern.id !== undefined && this.patterns.has(pattern.id) ? pattern.id : this.nextId++;
    this.patterns.set(id, {
      ...pattern,
      id,
      firstSeen: pattern.firstSeen ?? now,
      lastSeen: pattern.lastSeen ?? now,
    });
  }

  /** Matching patterns, highest confidence first, then most observed. */
  async matchingPatterns(fileName: string, extension: string, time: number): Promise<Pattern[]> {
    return [...this.patterns.values()]
      .filter(p => patternMatches(p, fileName, extension, time))
      .sort((a, b) => b.confidenceScore - a.confidenceScore || b.timesSeen - a.timesSeen)
      .map(p => ({ ...p }));
  }

  async bestPattern(fileName: string, extension: string, time: number): Promise<Pattern | null> {
    return (await this.matchingPatterns(fileName, extension, time))[0] ?? null;
  }

  /** Count one more observation; confidence becomes timesCorrect / timesSeen. */
  async updateAccuracy(id: number, wasCorrect: boolean): Promise<Pattern | null> {
    const p = this.patterns.get(id);
    if (!p) return null;
    const timesSeen = p.timesSeen + 1;
    const timesCorrect = p.timesCorrect + (wasCorrect ? 1 : 0);
    const updated: Pattern = {
      ...p,
      timesSeen,
      timesCorrect,
      confidenceScore: timesCorrect / timesSeen,
      lastSeen: this.clock.now(),
    };
    this.patterns.set(id, updated);
    return { ...updated };
  }

  async patternsForGroup(groupName: string): Promise<Pattern[]> {
    return [...this.patterns.values()]
      .filter(p => p.groupName === groupName)
      .sort((a, b) => b.confidenceScore - a.confidenceScore)
      .map(p => ({ ...p }));
  }

  /** Drop well-observed patterns that keep predicting wrong. */
  async pruneLowConfidence(threshold = 0.3, minTimesSeen = 10): Promise<number> {
    let removed = 0;
    for (const [id, p] of this.patterns) {
      if (p.confidenceScore < threshold && p.timesSeen >= minTimesSeen) {
        this.patterns.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.patterns.size;
  }
}
