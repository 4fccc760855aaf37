import { describe, it, expect, beforeEach, vi } from "vitest";
import { ContextFusionEngine, MissingDependencyError } from "../../src/layers/fusion-engine.js";
import { InMemoryPatternStore, InMemorySessionStore } from "../../src/layers/memory-store.js";
import { SessionManager } from "../../src/layers/session-manager.js";
import { WindowTracker } from "../../src/layers/window-tracker.js";
import { UNSORTED } from "../../src/types.js";
import type { FusionConfig } from "../../src/types.js";
import { FakeClock, FakeForeground, FakeWindows, T0, mockLogger, snapshot } from "./fakes.js";

function setup(config: Partial<FusionConfig> = {}) {
  const clock = new FakeClock();
  const logger = mockLogger();
  const foreground = new FakeForeground("notes.txt - Notepad", "notepad.exe");
  const provider = new FakeWindows();
  const windows = new WindowTracker({ provider, config: { autoScan: false }, clock });
  const sessions = new SessionManager({ store: new InMemorySessionStore(), clock });
  const patterns = new InMemoryPatternStore({ clock });
  const engine = new ContextFusionEngine({ foreground, windows, patterns, sessions, logger, config, clock });
  return { clock, logger, foreground, provider, windows, sessions, patterns, engine };
}

describe("ContextFusionEngine", () => {
  let env: ReturnType<typeof setup>;

  beforeEach(() => {
    env = setup();
  });

  describe("session priority boost", () => {
    it("keeps the batch on the session when the user leaves the source app", async () => {
      await env.sessions.start("A");

      const result = await env.engine.detectWithDetails("a.pdf", T0);

      expect(result.detectedContext).toBe("A");
      expect(result.boostApplied).toBe(true);
      expect(result.boostReason).toBe("Foreground missing (user switched apps) - maintaining batch consistency");
      expect(result.winningScore).toBeCloseTo(0.8);
      expect(result.overallConfidence).toBe(1);
      expect(result.signals).toHaveLength(1);
      expect(result.signals[0]).toMatchObject({ source: "Session", originalWeight: 0.4, wasBoosted: true });
      expect(result.signalBreakdown.Session).toBeCloseTo(0.8);
    });

    it("lets a different chat in the source app win without a boost", async () => {
      await env.sessions.start("A");
      env.foreground.show("B – Telegram", "Telegram.exe");

      const result = await env.engine.detectWithDetails("a.pdf", T0);

      expect(result.detectedContext).toBe("B");
      expect(result.boostApplied).toBe(false);
      expect(result.hasConsensus).toBe(false);
      expect(result.overallConfidence).toBeCloseTo(0.9);
      expect(result.winningScore).toBeCloseTo(0.475);
      expect(env.logger.warn).toHaveBeenCalledTimes(1);
    });

    it("does not boost when the foreground agrees with the session", async () => {
      await env.sessions.start("A");
      env.foreground.show("A - Telegram", "Telegram.exe");

      const result = await env.engine.detectWithDetails("a.pdf", T0);

      expect(result.detectedContext).toBe("A");
      expect(result.boostApplied).toBe(false);
      expect(result.hasConsensus).toBe(true);
      expect(result.overallConfidence).toBe(1);
      expect(result.winningScore).toBeCloseTo(0.875);
    });

    it("can be switched off", async () => {
      env.engine.useSessionPriorityBoost = false;
      await env.sessions.start("A");

      const result = await env.engine.detectWithDetails("a.pdf", T0);

      expect(result.boostApplied).toBe(false);
      expect(result.winningScore).toBeCloseTo(0.4);
      expect(env.engine.useSessionPriorityBoost).toBe(false);
    });
  });

  describe("signals", () => {
    it("returns Unsorted with zero confidence when no source answers", async () => {
      const result = await env.engine.detectWithDetails("a.pdf", T0);

      expect(result.detectedContext).toBe(UNSORTED);
      expect(result.overallConfidence).toBe(0);
      expect(result.signals).toEqual([]);
      expect(await env.engine.detect("b.pdf", T0)).toBe(UNSORTED);
    });

    it("reports why each source is absent", async () => {
      const outcomes = await env.engine.collectOutcomes("a.pdf", T0);

      expect(outcomes).toEqual([
        { source: "Foreground", absent: true, reason: "not a Telegram window" },
        { source: "Background", absent: true, reason: "window tracker not monitoring" },
        { source: "Session", absent: true, reason: "no active session" },
        { source: "Pattern", absent: true, reason: "no matching pattern" },
      ]);
    });

    it("decays background windows with age", async () => {
      env.windows.start();
      env.provider.windows = [snapshot("w1", "Gamma - Telegram")];
      await env.windows.scan();

      const fresh = await env.engine.detectWithDetails("a.pdf", T0 + 15000);
      expect(fresh.detectedContext).toBe("Gamma");
      expect(fresh.overallConfidence).toBeCloseTo(0.35);

      const stale = await env.engine.detectWithDetails("b.pdf", T0 + 25000);
      expect(stale.detectedContext).toBe(UNSORTED);
      env.windows.stop();
    });

    it("applies the session age penalty", async () => {
      await env.sessions.start("A");

      const signals = await env.engine.collectAllSignals("a.pdf", T0 + 30000);
      expect(signals[0].confidence).toBeCloseTo(0.5);

      expect(await env.engine.detect("b.pdf", T0 + 45000)).toBe(UNSORTED);
    });

    it("adds the observation bonus to a matching pattern", async () => {
      await env.patterns.savePattern({ extension: ".pdf", groupName: "Docs", confidenceScore: 0.6, timesSeen: 5, timesCorrect: 3 });

      const result = await env.engine.detectWithDetails("report.pdf", T0);

      expect(result.detectedContext).toBe("Docs");
      expect(result.overallConfidence).toBeCloseTo(0.65);
    });

    it("drops a weak pattern before the bonus", async () => {
      await env.patterns.savePattern({ extension: ".pdf", groupName: "Docs", confidenceScore: 0.25, timesSeen: 50, timesCorrect: 12 });

      expect(await env.engine.detect("report.pdf", T0)).toBe(UNSORTED);
    });

    it("degrades a provider failure to an absent signal", async () => {
      await env.sessions.start("A");
      vi.spyOn(env.foreground, "activeTitle").mockImplementation(() => {
        throw new Error("no display");
      });

      const outcomes = await env.engine.collectOutcomes("a.pdf", T0);
      expect(outcomes[0]).toEqual({ source: "Foreground", absent: true, reason: "no display" });
      expect(await env.engine.detect("a.pdf", T0)).toBe("A");
    });

    it("degrades a slow store to an absent signal", async () => {
      const slow = setup({ storeTimeoutMs: 20 });
      await slow.sessions.start("A");
      vi.spyOn(slow.patterns, "bestPattern").mockReturnValue(new Promise(() => {}));

      const outcomes = await slow.engine.collectOutcomes("a.pdf", T0);

      expect(outcomes[3]).toEqual({ source: "Pattern", absent: true, reason: "pattern lookup timed out after 20ms" });
      expect(await slow.engine.detect("a.pdf", T0)).toBe("A");
    });

    it("degrades a hanging foreground provider to an absent signal", async () => {
      const slow = setup({ storeTimeoutMs: 20 });
      await slow.sessions.start("A");
      vi.spyOn(slow.foreground, "activeTitle").mockReturnValue(new Promise<string>(() => {}));

      const outcomes = await slow.engine.collectOutcomes("a.pdf", T0);

      expect(outcomes[0]).toEqual({ source: "Foreground", absent: true, reason: "foreground lookup timed out after 20ms" });
      expect(await slow.engine.detect("a.pdf", T0)).toBe("A");
    });
  });

  describe("feedback", () => {
    it("learns the detected group when it was correct", async () => {
      expect(await env.engine.recordFeedback("a.pdf", "Docs", undefined, true)).toBe(true);

      const [learned] = await env.patterns.patternsForGroup("Docs");
      expect(learned).toMatchObject({ extension: ".pdf", confidenceScore: 0.6, timesSeen: 1, timesCorrect: 1 });
      expect(await env.engine.detect("b.pdf", T0)).toBe("Docs");
    });

    it("learns the actual group when it was wrong", async () => {
      await env.engine.recordFeedback("a.pdf", "Docs", "Invoices", false);

      const [learned] = await env.patterns.patternsForGroup("Invoices");
      expect(learned).toMatchObject({ extension: ".pdf", confidenceScore: 0.4, timesSeen: 1, timesCorrect: 0 });
      expect(await env.patterns.patternsForGroup("Docs")).toEqual([]);
    });

    it("falls back to the detected group without an actual one", async () => {
      await env.engine.recordFeedback("a.pdf", "Docs", undefined, false);

      expect(await env.patterns.patternsForGroup("Docs")).toHaveLength(1);
    });

    it("reports a store failure without throwing", async () => {
      vi.spyOn(env.patterns, "savePattern").mockRejectedValue(new Error("read-only"));

      expect(await env.engine.recordFeedback("a.pdf", "Docs", undefined, true)).toBe(false);
      expect(env.logger.error).toHaveBeenCalledWith("[fusion] Failed to record feedback for a.pdf: read-only");
    });
  });

  describe("diagnostics", () => {
    it("keeps the last result and running statistics", async () => {
      await env.sessions.start("A");
      await env.engine.detect("a.pdf", T0);
      env.foreground.show("A - Telegram", "Telegram.exe");
      await env.engine.detect("b.pdf", T0);

      expect(env.engine.statistics()).toMatchObject({ totalDetections: 2, consensusDetections: 1, sessionBoostCount: 1 });
      expect(env.engine.lastConfidence()).toBe(1);
      expect(Object.keys(env.engine.lastBreakdown()).sort()).toEqual(["Foreground", "Session"]);
      expect(env.engine.lastSignals().map(s => s.source)).toEqual(["Foreground", "Session"]);
      expect(env.engine.lastResult()?.detectedContext).toBe("A");
      expect(env.engine.recentDetections().map(d => d.fileName)).toEqual(["b.pdf", "a.pdf"]);
      expect(env.engine.detectionReport()).toEqual({
        total: 2,
        unsortedRate: 0,
        consensusRate: 0.5,
        boostRate: 0.5,
        averageConfidence: 1,
      });
    });

    it("resets statistics", async () => {
      await env.engine.detect("a.pdf", T0);

      env.engine.resetStatistics();

      expect(env.engine.statistics()).toEqual({
        totalDetections: 0,
        consensusDetections: 0,
        averageDetectionTimeMs: 0,
        sessionBoostCount: 0,
      });
      expect(env.engine.lastResult()).toBeNull();
      expect(env.engine.lastConfidence()).toBe(0);
    });

    it("counts concurrent detections", async () => {
      await Promise.all([env.engine.detect("a.pdf", T0), env.engine.detect("b.pdf", T0), env.engine.detect("c.pdf", T0)]);

      expect(env.engine.statistics().totalDetections).toBe(3);
    });
  });

  describe("configuration", () => {
    it("updates weights and rejects out-of-range ones", () => {
      expect(env.engine.setWeights({ foreground: 0.6, session: 11 })).toEqual(["sessionWeight"]);

      expect(env.engine.weights()).toEqual({ foreground: 0.6, background: 0.3, pattern: 0.2, session: 0.4 });
      expect(env.logger.warn).toHaveBeenCalledTimes(1);
    });

    it("rejects a threshold outside 0-1", () => {
      expect(env.engine.configure({ minimumConfidenceThreshold: 1.5 })).toEqual(["minimumConfidenceThreshold"]);
      expect(env.engine.settings().minimumConfidenceThreshold).toBe(0.3);
    });

    it("refuses to start without a collaborator", () => {
      const { foreground, windows, sessions, logger } = env;

      expect(() => new ContextFusionEngine({ foreground, windows, sessions, logger })).toThrow(MissingDependencyError);
      expect(() => new ContextFusionEngine({ foreground, windows, sessions, logger })).toThrow(
        "ContextFusionEngine requires a pattern store",
      );
      expect(() => new ContextFusionEngine({ foreground, windows, sessions, patterns: env.patterns })).toThrow(
        "ContextFusionEngine requires a logger",
      );
    });
  });
});
