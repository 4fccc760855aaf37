/**
 * Weighted voting over valid signals.
 * Pure: Session Priority Boost → per-context tally → argmax with a
 * deterministic tie-break → overall confidence.
 */

import type { FusionConfig, Signal, SignalBreakdown } from "../types.js";
import { UNSORTED } from "../types.js";

const CONSENSUS_BONUS = 0.1;
const CONFLICT_PENALTY = 0.05;
const SCORE_EPSILON = 1e-9;

export function votingPower(s: Signal): number {
  return s.weight * s.confidence;
}

export function isValidSignal(s: Signal): boolean {
  return s.detectedContext.trim().length > 0 &&
    s.detectedContext !== UNSORTED &&
    s.weight > 0 &&
    s.confidence > 0;
}

/** Signals allowed to vote: valid and at or above the confidence floor. */
export function votingSignals(signals: Signal[], minimumConfidence: number): Signal[] {
  return signals.filter(s => isValidSignal(s) && s.confidence >= minimumConfidence);
}

export interface BoostDecision {
  applied: boolean;
  reason?: string;
  /** Same order as the input; weights adjusted when applied */
  signals: Signal[];
  /** Foreground is viewing a different chat than the session */
  groupMismatch: boolean;
}

type BoostSettings = Pick<
  FusionConfig,
  "useSessionPriorityBoost" | "foregroundWeakThreshold" | "sessionBoostMultiplier" | "otherSignalsDampening"
>;

/**
 * Session Priority Boost. Engages only with a voting Session signal and a
 * missing or weak Foreground. A strong Foreground on a different chat means
 * a new batch: no boost, the foreground is left to win.
 */
export function applySessionBoost(signals: Signal[], cfg: BoostSettings): BoostDecision {
  const unchanged: BoostDecision = { applied: false, signals, groupMismatch: false };
  if (!cfg.useSessionPriorityBoost) return unchanged;

  const session = signals.find(s => s.source === "Session" && isValidSignal(s));
  if (!session) return unchanged;

  const foreground = signals.find(s => s.source === "Foreground");
  const foregroundPower = foreground ? votingPower(foreground) : 0;

  if (foregroundPower >= cfg.foregroundWeakThreshold) {
    const mismatch = foreground !== undefined &&
      foreground.detectedContext.toLowerCase() !== session.detectedContext.toLowerCase();
    return { ...unchanged, groupMismatch: mismatch };
  }

  const reason = foreground
    ? `Foreground weak (power: ${foregroundPower.toFixed(2)} < threshold: ${cfg.foregroundWeakThreshold.toFixed(2)}) - maintaining batch consistency`
    : "Foreground missing (user switched apps) - maintaining batch consistency";

  const boosted = signals.map(s => s === session
    ? { ...s, weight: s.weight * cfg.sessionBoostMultiplier, wasBoosted: true }
    : { ...s, weight: s.weight * cfg.otherSignalsDampening });

  return { applied: true, reason, signals: boosted, groupMismatch: false };
}

export interface ContextTally {
  context: string;
  total: number;
  /** Highest single-signal confidence backing the context */
  maxConfidence: number;
  sources: SignalBreakdown;
}

function compareTallies(a: ContextTally, b: ContextTally): number {
  if (Math.abs(a.total - b.total) > SCORE_EPSILON) return b.total - a.total;
  if (a.maxConfidence !== b.maxConfidence) return b.maxConfidence - a.maxConfidence;
  return a.context < b.context ? -1 : a.context > b.context ? 1 : 0;
}

/** Totals per context (case-sensitive), winner first. */
export function tally(signals: Signal[]): ContextTally[] {
  const byContext = new Map<string, ContextTally>();
  for (const s of signals) {
    const power = votingPower(s);
    const entry = byContext.get(s.detectedContext) ??
      { context: s.detectedContext, total: 0, maxConfidence: 0, sources: {} };
    entry.total += power;
    entry.maxConfidence = Math.max(entry.maxConfidence, s.confidence);
    entry.sources[s.source] = (entry.sources[s.source] ?? 0) + power;
    byContext.set(s.detectedContext, entry);
  }
  return [...byContext.values()].sort(compareTallies);
}

export function breakdownOf(signals: Signal[]): SignalBreakdown {
  const breakdown: SignalBreakdown = {};
  for (const s of signals) breakdown[s.source] = votingPower(s);
  return breakdown;
}

/**
 * Mean confidence of agreeing signals, +0.1 when more than one agrees,
 * −0.05 per conflicting signal, clamped to [0, 1].
 */
export function overallConfidence(signals: Signal[], winner: string): number {
  const agreeing = signals.filter(s => s.detectedContext === winner);
  if (agreeing.length === 0) return 0;

  const mean = agreeing.reduce((sum, s) => sum + s.confidence, 0) / agreeing.length;
  const bonus = agreeing.length > 1 ? CONSENSUS_BONUS : 0;
  const conflicting = signals.filter(s => s.detectedContext !== winner && isValidSignal(s)).length;

  return Math.max(0, Math.min(1, mean + bonus - conflicting * CONFLICT_PENALTY));
}

export interface VoteOutcome {
  detectedContext: string;
  winningScore: number;
  overallConfidence: number;
  breakdown: SignalBreakdown;
  boost: BoostDecision;
  tallies: ContextTally[];
  hasConsensus: boolean;
}

/** Run the full vote over already-filtered voting signals. */
export function vote(signals: Signal[], cfg: BoostSettings): VoteOutcome {
  const boost = applySessionBoost(signals, cfg);
  const tallies = tally(boost.signals);
  const winner = tallies[0];

  if (!winner) {
    return {
      detectedContext: UNSORTED,
      winningScore: 0,
      overallConfidence: 0,
      breakdown: {},
      boost,
      tallies,
      hasConsensus: false,
    };
  }

  const agreeing = boost.signals.filter(s => s.detectedContext === winner.context).length;
  return {
    detectedContext: winner.context,
    winningScore: winner.total,
    overallConfidence: overallConfidence(boost.signals, winner.context),
    breakdown: breakdownOf(boost.signals),
    boost,
    tallies,
    hasConsensus: agreeing > 1,
  };
}
