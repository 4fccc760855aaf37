/**
 * Config layering (defaults ← environment ← explicit overrides)
 * plus the range validator every layer's configure() goes through.
 */

import { DEFAULT_CONFIG } from "./types.js";
import type {
  BurstConfig,
  ContextFusionConfig,
  FusionConfig,
  MaintenanceConfig,
  SessionConfig,
  SourceApp,
  WindowTrackerConfig,
} from "./types.js";
import { createConsoleLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";

export interface RangeRule {
  min: number;
  max: number;
  integer?: boolean;
}

export type SettingRules<T> = { [K in keyof T]?: RangeRule };

export const FUSION_RULES: SettingRules<FusionConfig> = {
  foregroundWeight: { min: 0, max: 10 },
  backgroundWeight: { min: 0, max: 10 },
  patternWeight: { min: 0, max: 10 },
  sessionWeight: { min: 0, max: 10 },
  minimumConfidenceThreshold: { min: 0, max: 1 },
  maxSignalAgeSeconds: { min: 1, max: 3600 },
  foregroundWeakThreshold: { min: 0, max: 1 },
  sessionBoostMultiplier: { min: 1, max: 10 },
  otherSignalsDampening: { min: 0, max: 1 },
  foregroundConfidence: { min: 0, max: 1 },
  storeTimeoutMs: { min: 1, max: 60000, integer: true },
};

export const BURST_RULES: SettingRules<BurstConfig> = {
  burstThresholdSeconds: { min: 1, max: 300 },
  minimumFilesForBurst: { min: 2, max: 100, integer: true },
  maxBurstDurationSeconds: { min: 1, max: 3600 },
  confidenceSaturationCount: { min: 2, max: 1000, integer: true },
};

export const WINDOW_RULES: SettingRules<WindowTrackerConfig> = {
  maxTrackedWindows: { min: 1, max: 500, integer: true },
  scanIntervalMs: { min: 100, max: 60000, integer: true },
  recentWindowSeconds: { min: 1, max: 3600 },
  expirySeconds: { min: 1, max: 86400 },
  enumerationTimeoutMs: { min: 10, max: 60000, integer: true },
};

export const SESSION_RULES: SettingRules<SessionConfig> = {
  defaultTimeoutSeconds: { min: 5, max: 300, integer: true },
};

export const MAINTENANCE_RULES: SettingRules<MaintenanceConfig> = {
  sweepIntervalMs: { min: 100, max: 600000, integer: true },
  windowExpiryIntervalMs: { min: 1000, max: 3600000, integer: true },
};

function violates(value: unknown, rule: RangeRule): string | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return "not a finite number";
  if (rule.integer && !Number.isInteger(value)) return "not an integer";
  if (value < rule.min || value > rule.max) return `outside ${rule.min}-${rule.max}`;
  return null;
}

/**
 * Merge `patch` into `current`. Out-of-range values are rejected: the prior
 * value stays and a warning is logged. Returns the merged settings and the
 * rejected keys.
 */
export function applySettings<T extends object>(
  current: T,
  patch: Partial<T>,
  rules: SettingRules<T>,
  logger: Logger,
  label: string,
): { settings: T; rejected: (keyof T)[] } {
  const settings: T = { ...current };
  const rejected: (keyof T)[] = [];

  for (const key in patch) {
    const value: T[typeof key] | undefined = patch[key];
    if (value === undefined) continue;

    const rule = rules[key];
    const problem = rule ? violates(value, rule) : typeof value !== typeof current[key] ? "wrong type" : null;
    if (problem) {
      rejected.push(key);
      logger.warn(`[${label}] Rejected ${String(key)}=${String(value)} (${problem}); keeping ${String(current[key])}`);
      continue;
    }
    settings[key] = value;
  }

  return { settings, rejected };
}

// --- Environment ---

type Env = Record<string, string | undefined>;

function envNumber(env: Env, name: string, logger: Logger): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    logger.warn(`[config] Ignoring ${name}="${raw}" (not a number)`);
    return undefined;
  }
  return value;
}

function envBool(env: Env, name: string): boolean | undefined {
  const raw = env[name];
  if (raw === undefined || raw === "") return undefined;
  return raw === "1" || raw.toLowerCase() === "true";
}

function defined<T extends object>(values: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in values) {
    const value = values[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

function envOverrides(env: Env, logger: Logger): ConfigOverrides {
  const processNames = env.CONTEXT_FUSION_SOURCE_PROCESSES;
  const sourceName = env.CONTEXT_FUSION_SOURCE_APP;
  return {
    fusion: defined({
      minimumConfidenceThreshold: envNumber(env, "CONTEXT_FUSION_MIN_CONFIDENCE", logger),
      maxSignalAgeSeconds: envNumber(env, "CONTEXT_FUSION_MAX_SIGNAL_AGE", logger),
      useSessionPriorityBoost: envBool(env, "CONTEXT_FUSION_SESSION_BOOST"),
      storeTimeoutMs: envNumber(env, "CONTEXT_FUSION_STORE_TIMEOUT_MS", logger),
    }),
    burst: defined({
      burstThresholdSeconds: envNumber(env, "CONTEXT_FUSION_BURST_THRESHOLD", logger),
      minimumFilesForBurst: envNumber(env, "CONTEXT_FUSION_BURST_MIN_FILES", logger),
      maxBurstDurationSeconds: envNumber(env, "CONTEXT_FUSION_BURST_MAX_DURATION", logger),
    }),
    windows: defined({
      maxTrackedWindows: envNumber(env, "CONTEXT_FUSION_MAX_WINDOWS", logger),
      scanIntervalMs: envNumber(env, "CONTEXT_FUSION_SCAN_INTERVAL_MS", logger),
      autoScan: envBool(env, "CONTEXT_FUSION_AUTO_SCAN"),
    }),
    session: defined({
      defaultTimeoutSeconds: envNumber(env, "CONTEXT_FUSION_SESSION_TIMEOUT", logger),
    }),
    maintenance: defined({
      sweepIntervalMs: envNumber(env, "CONTEXT_FUSION_SWEEP_INTERVAL_MS", logger),
    }),
    sourceApp: defined({
      name: sourceName || undefined,
      processNames: processNames
        ? processNames.split(",").map(p => p.trim()).filter(p => p.length > 0)
        : undefined,
    }),
    debug: envBool(env, "CONTEXT_FUSION_DEBUG"),
  };
}

// --- Loading ---

export interface ConfigOverrides {
  fusion?: Partial<FusionConfig>;
  burst?: Partial<BurstConfig>;
  windows?: Partial<WindowTrackerConfig>;
  session?: Partial<SessionConfig>;
  maintenance?: Partial<MaintenanceConfig>;
  sourceApp?: Partial<SourceApp>;
  debug?: boolean;
}

function mergeSourceApp(base: SourceApp, patch: Partial<SourceApp> | undefined, logger: Logger): SourceApp {
  if (!patch) return base;
  const name = patch.name?.trim();
  if (patch.name !== undefined && !name) {
    logger.warn("[config] Rejected empty sourceApp.name");
  }
  return {
    name: name || base.name,
    processNames: patch.processNames && patch.processNames.length > 0 ? [...patch.processNames] : base.processNames,
  };
}

function layer(base: ContextFusionConfig, patch: ConfigOverrides, logger: Logger): ContextFusionConfig {
  return {
    fusion: applySettings(base.fusion, patch.fusion ?? {}, FUSION_RULES, logger, "config").settings,
    burst: applySettings(base.burst, patch.burst ?? {}, BURST_RULES, logger, "config").settings,
    windows: applySettings(base.windows, patch.windows ?? {}, WINDOW_RULES, logger, "config").settings,
    session: applySettings(base.session, patch.session ?? {}, SESSION_RULES, logger, "config").settings,
    maintenance: applySettings(base.maintenance, patch.maintenance ?? {}, MAINTENANCE_RULES, logger, "config").settings,
    sourceApp: mergeSourceApp(base.sourceApp, patch.sourceApp, logger),
    debug: patch.debug ?? base.debug,
  };
}

export function loadConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env,
  logger: Logger = createConsoleLogger(),
): ContextFusionConfig {
  const fromEnv = layer(DEFAULT_CONFIG, envOverrides(env, logger), logger);
  return layer(fromEnv, overrides, logger);
}
