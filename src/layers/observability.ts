/**
 * Detection observability: last result, running statistics and a bounded trace
 * of recent detections.
 */

import type { DetectionResult, DetectionStatistics, Signal, SignalBreakdown } from "../types.js";
import { UNSORTED } from "../types.js";

export interface DetectionTrace {
  fileName: string;
  timestamp: number;
  detectedContext: string;
  overallConfidence: number;
  boostApplied: boolean;
  hasConsensus: boolean;
  durationMs: number;
}

export interface DetectionReport {
  total: number;
  unsortedRate: number;
  consensusRate: number;
  boostRate: number;
  averageConfidence: number;
}

function copyResult(r: DetectionResult): DetectionResult {
  return {
    ...r,
    signals: r.signals.map(s => ({ ...s })),
    signalBreakdown: { ...r.signalBreakdown },
  };
}

export class DetectionObserver {
  private traces: DetectionTrace[] = [];
  private lastResult: DetectionResult | null = null;
  private total = 0;
  private consensus = 0;
  private boosts = 0;
  private totalTimeMs = 0;

  constructor(private readonly maxInMemory = 100) {}

  record(fileName: string, timestamp: number, result: DetectionResult): void {
    this.lastResult = copyResult(result);
    this.total++;
    this.totalTimeMs += result.detectionDurationMs;
    if (result.hasConsensus) this.consensus++;
    if (result.boostApplied) this.boosts++;

    this.traces.push({
      fileName,
      timestamp,
      detectedContext: result.detectedContext,
      overallConfidence: result.overallConfidence,
      boostApplied: result.boostApplied,
      hasConsensus: result.hasConsensus,
      durationMs: result.detectionDurationMs,
    });
    if (this.traces.length > this.maxInMemory) this.traces.shift();
  }

  last(): DetectionResult | null {
    return this.lastResult ? copyResult(this.lastResult) : null;
  }

  lastConfidence(): number {
    return this.lastResult?.overallConfidence ?? 0;
  }

  lastBreakdown(): SignalBreakdown {
    return { ...(this.lastResult?.signalBreakdown ?? {}) };
  }

  lastSignals(): Signal[] {
    return (this.lastResult?.signals ?? []).map(s => ({ ...s }));
  }

  statistics(): DetectionStatistics {
    return {
      totalDetections: this.total,
      consensusDetections: this.consensus,
      averageDetectionTimeMs: this.total > 0 ? this.totalTimeMs / this.total : 0,
      sessionBoostCount: this.boosts,
    };
  }

  /** Most recent first */
  recent(limit = 10): DetectionTrace[] {
    return this.traces.slice(-limit).reverse().map(t => ({ ...t }));
  }

  /** Summary over the in-memory trace window */
  report(): DetectionReport {
    const total = this.traces.length;
    if (total === 0) return { total: 0, unsortedRate: 0, consensusRate: 0, boostRate: 0, averageConfidence: 0 };

    const unsorted = this.traces.filter(t => t.detectedContext === UNSORTED).length;
    const consensus = this.traces.filter(t => t.hasConsensus).length;
    const boosted = this.traces.filter(t => t.boostApplied).length;
    const confidence = this.traces.reduce((s, t) => s + t.overallConfidence, 0);

    return {
      total,
      unsortedRate: unsorted / total,
      consensusRate: consensus / total,
      boostRate: boosted / total,
      averageConfidence: confidence / total,
    };
  }

  reset(): void {
    this.traces = [];
    this.lastResult = null;
    this.total = 0;
    this.consensus = 0;
    this.boosts = 0;
    this.totalTimeMs = 0;
  }
}
