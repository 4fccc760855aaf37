import { describe, it, expect } from "vitest";
import { DetectionObserver } from "../../src/layers/observability.js";
import { UNSORTED } from "../../src/types.js";
import type { DetectionResult } from "../../src/types.js";
import { T0 } from "./fakes.js";

function result(overrides: Partial<DetectionResult>): DetectionResult {
  return {
    detectedContext: "Alpha",
    overallConfidence: 0.5,
    signals: [],
    signalBreakdown: {},
    winningScore: 0.5,
    detectionDurationMs: 2,
    boostApplied: false,
    hasConsensus: false,
    ...overrides,
  };
}

describe("DetectionObserver", () => {
  it("summarises the trace window", () => {
    const observer = new DetectionObserver();
    observer.record("a.pdf", T0, result({ overallConfidence: 1, hasConsensus: true }));
    observer.record("b.pdf", T0, result({ overallConfidence: 0.5, boostApplied: true }));
    observer.record("c.pdf", T0, result({ detectedContext: UNSORTED, overallConfidence: 0 }));
    observer.record("d.pdf", T0, result({ overallConfidence: 0.5 }));

    expect(observer.report()).toEqual({
      total: 4,
      unsortedRate: 0.25,
      consensusRate: 0.25,
      boostRate: 0.25,
      averageConfidence: 0.5,
    });
    expect(observer.statistics().averageDetectionTimeMs).toBe(2);
  });

  it("keeps a bounded trace, newest first", () => {
    const observer = new DetectionObserver(2);
    observer.record("a.pdf", T0, result({}));
    observer.record("b.pdf", T0 + 1000, result({}));
    observer.record("c.pdf", T0 + 2000, result({}));

    expect(observer.recent().map(t => t.fileName)).toEqual(["c.pdf", "b.pdf"]);
    expect(observer.recent(1).map(t => t.timestamp)).toEqual([T0 + 2000]);
    expect(observer.statistics().totalDetections).toBe(3);
  });

  it("hands out copies of the last result", () => {
    const observer = new DetectionObserver();
    observer.record("a.pdf", T0, result({ signalBreakdown: { Session: 0.4 } }));

    const breakdown = observer.lastBreakdown();
    breakdown.Session = 9;

    expect(observer.lastBreakdown()).toEqual({ Session: 0.4 });
  });

  it("reports an empty window as zeros", () => {
    expect(new DetectionObserver().report()).toEqual({
      total: 0,
      unsortedRate: 0,
      consensusRate: 0,
      boostRate: 0,
      averageConfidence: 0,
    });
  });
});
