/**
 * Context Fusion — Type Definitions
 * Signals, detection results, sessions, bursts and tracked windows,
 * plus the configuration shared by every layer.
 */

/** Explicit "no classification" value. Never a valid signal context. */
export const UNSORTED = "Unsorted";

// --- Signals ---

export type SignalSource = "Foreground" | "Background" | "Session" | "Pattern";

export interface Signal {
  source: SignalSource;
  detectedContext: string;
  weight: number;
  originalWeight: number;
  confidence: number; // 0..1
  timestamp: number;
  wasBoosted: boolean;
  metadata?: string;
}

/** A source that produced nothing usable for this detection. */
export interface Absent {
  source: SignalSource;
  absent: true;
  reason: string;
}

export type SignalOutcome = Signal | Absent;

export type SignalBreakdown = Partial<Record<SignalSource, number>>;

export interface DetectionResult {
  detectedContext: string;
  overallConfidence: number;
  /** Every collected signal, in collection order; voting signals carry post-boost weights */
  signals: Signal[];
  signalBreakdown: SignalBreakdown;
  winningScore: number;
  detectionDurationMs: number;
  boostApplied: boolean;
  boostReason?: string;
  hasConsensus: boolean;
}

export interface DetectionStatistics {
  totalDetections: number;
  consensusDetections: number;
  averageDetectionTimeMs: number;
  sessionBoostCount: number;
}

// --- Sessions ---

export interface DownloadSession {
  id: number;
  groupName: string;
  startTime: number;
  endTime?: number;
  lastActivity: number;
  timeoutSeconds: number;
  confidenceScore: number;
  fileCount: number;
  fileNames: string[];
  isActive: boolean;
  windowTitle?: string;
  processName?: string;
}

export interface SessionFile {
  fileName: string;
  path?: string;
  size?: number;
  addedAt: number;
}

export interface SessionHint {
  windowTitle?: string;
  processName?: string;
}

// --- Bursts ---

export interface BurstEvent {
  fileName: string;
  time: number;
}

export interface BurstStatus {
  isActive: boolean;
  fileCount: number;
  burstStartTime: number | null;
  lastFileTime: number | null;
  fileNames: string[];
  durationSeconds: number;
  averageIntervalSeconds: number;
  confidence: number;
}

// --- Windows ---

/** One window as reported by the enumeration provider. */
export interface WindowSnapshot {
  id: string;
  title: string;
  processName: string;
  isActiveFocus: boolean;
}

export interface WindowCandidate {
  id: string;
  title: string;
  processName: string;
  isActive: boolean;
  firstSeen: number;
  lastSeen: number;
  seenCount: number;
  confidenceScore: number;
  extractedGroupName?: string;
}

export interface RecentGroup {
  groupName: string;
  confidence: number;
  lastSeen: number;
}

// --- Patterns ---

export interface Pattern {
  id?: number;
  extension?: string;
  namePattern?: string;
  hourOfDay?: number;
  dayOfWeek?: number; // 0=Sun..6=Sat
  groupName: string;
  confidenceScore: number;
  timesSeen: number;
  timesCorrect: number;
  firstSeen?: number;
  lastSeen?: number;
}

// --- External collaborators ---

export interface ForegroundProvider {
  activeTitle(): string | Promise<string>;
  activeProcessName(): string | Promise<string>;
}

export interface WindowEnumerationProvider {
  /** Visible top-level windows belonging to the source application */
  listWindows(): WindowSnapshot[] | Promise<WindowSnapshot[]>;
}

export interface NewSession {
  groupName: string;
  startTime: number;
  timeoutSeconds: number;
  confidenceScore: number;
  windowTitle?: string;
  processName?: string;
}

export interface SessionQuery {
  /** true: active only, false: ended only, omitted: both */
  active?: boolean;
  limit: number;
}

/** Durable session persistence. Lists come back newest first. */
export interface SessionStore {
  getActive(): Promise<DownloadSession | null>;
  get(id: number): Promise<DownloadSession | null>;
  create(init: NewSession): Promise<DownloadSession>;
  update(session: DownloadSession): Promise<void>;
  addFile(sessionId: number, file: SessionFile): Promise<void>;
  end(sessionId: number, endTime: number): Promise<void>;
  list(query: SessionQuery): Promise<DownloadSession[]>;
}

export interface PatternStore {
  bestPattern(fileName: string, extension: string, time: number): Promise<Pattern | null>;
  savePattern(pattern: Pattern): Promise<void>;
}

// --- Config ---

export interface FusionConfig {
  foregroundWeight: number;
  backgroundWeight: number;
  patternWeight: number;
  sessionWeight: number;
  minimumConfidenceThreshold: number;
  maxSignalAgeSeconds: number;
  useSessionPriorityBoost: boolean;
  foregroundWeakThreshold: number;
  sessionBoostMultiplier: number;
  otherSignalsDampening: number;
  foregroundConfidence: number;
  storeTimeoutMs: number;
}

export interface BurstConfig {
  burstThresholdSeconds: number;
  minimumFilesForBurst: number;
  maxBurstDurationSeconds: number;
  confidenceSaturationCount: number;
}

export interface WindowTrackerConfig {
  maxTrackedWindows: number;
  scanIntervalMs: number;
  autoScan: boolean;
  recentWindowSeconds: number;
  expirySeconds: number;
  /** A scan whose enumeration takes longer counts as empty */
  enumerationTimeoutMs: number;
}

export interface SessionConfig {
  defaultTimeoutSeconds: number;
}

export interface MaintenanceConfig {
  sweepIntervalMs: number;
  windowExpiryIntervalMs: number;
}

export interface SourceApp {
  name: string;
  processNames: string[];
}

export interface ContextFusionConfig {
  fusion: FusionConfig;
  burst: BurstConfig;
  windows: WindowTrackerConfig;
  session: SessionConfig;
  maintenance: MaintenanceConfig;
  sourceApp: SourceApp;
  debug: boolean;
}

export const DEFAULT_SOURCE_APP: SourceApp = {
  name: "Telegram",
  processNames: ["Telegram", "Telegram.exe"],
};

export const DEFAULT_CONFIG: ContextFusionConfig = {
  fusion: {
    foregroundWeight: 0.5,
    backgroundWeight: 0.3,
    patternWeight: 0.2,
    sessionWeight: 0.4,
    minimumConfidenceThreshold: 0.3,
    maxSignalAgeSeconds: 30,
    useSessionPriorityBoost: true,
    foregroundWeakThreshold: 0.3,
    sessionBoostMultiplier: 2.0,
    otherSignalsDampening: 0.5,
    foregroundConfidence: 0.95, // user is looking at the chat
    storeTimeoutMs: 250,
  },
  burst: {
    burstThresholdSeconds: 5,
    minimumFilesForBurst: 2,
    maxBurstDurationSeconds: 60,
    confidenceSaturationCount: 10,
  },
  windows: {
    maxTrackedWindows: 20,
    scanIntervalMs: 2000,
    autoScan: true,
    recentWindowSeconds: 60,
    expirySeconds: 300,
    enumerationTimeoutMs: 1000,
  },
  session: {
    defaultTimeoutSeconds: 30,
  },
  maintenance: {
    sweepIntervalMs: 5000,
    windowExpiryIntervalMs: 60000,
  },
  sourceApp: DEFAULT_SOURCE_APP,
  debug: false,
};
