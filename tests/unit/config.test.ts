import { describe, it, expect, beforeEach } from "vitest";
import { applySettings, BURST_RULES, loadConfig } from "../../src/config.js";
import { DEFAULT_CONFIG } from "../../src/types.js";
import { mockLogger } from "./fakes.js";

describe("loadConfig", () => {
  let logger: ReturnType<typeof mockLogger>;

  beforeEach(() => {
    logger = mockLogger();
  });

  it("returns the defaults with no environment or overrides", () => {
    expect(loadConfig({}, {}, logger)).toEqual(DEFAULT_CONFIG);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("reads settings from the environment", () => {
    const config = loadConfig({}, {
      CONTEXT_FUSION_MIN_CONFIDENCE: "0.5",
      CONTEXT_FUSION_AUTO_SCAN: "false",
      CONTEXT_FUSION_DEBUG: "1",
      CONTEXT_FUSION_SOURCE_APP: "Signal",
      CONTEXT_FUSION_SOURCE_PROCESSES: "Signal, signal.exe,",
    }, logger);

    expect(config.fusion.minimumConfidenceThreshold).toBe(0.5);
    expect(config.windows.autoScan).toBe(false);
    expect(config.debug).toBe(true);
    expect(config.sourceApp).toEqual({ name: "Signal", processNames: ["Signal", "signal.exe"] });
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadConfig(
      { fusion: { minimumConfidenceThreshold: 0.4 } },
      { CONTEXT_FUSION_MIN_CONFIDENCE: "0.5" },
      logger,
    );

    expect(config.fusion.minimumConfidenceThreshold).toBe(0.4);
  });

  it("ignores a non-numeric environment value", () => {
    const config = loadConfig({}, { CONTEXT_FUSION_SESSION_TIMEOUT: "abc" }, logger);

    expect(config.session.defaultTimeoutSeconds).toBe(30);
    expect(logger.warn).toHaveBeenCalledWith('[config] Ignoring CONTEXT_FUSION_SESSION_TIMEOUT="abc" (not a number)');
  });

  it("keeps the default when an environment value is out of range", () => {
    const config = loadConfig({}, { CONTEXT_FUSION_SESSION_TIMEOUT: "600" }, logger);

    expect(config.session.defaultTimeoutSeconds).toBe(30);
    expect(logger.warn).toHaveBeenCalledWith("[config] Rejected defaultTimeoutSeconds=600 (outside 5-300); keeping 30");
  });

  it("rejects a blank source app name", () => {
    const config = loadConfig({ sourceApp: { name: "  " } }, {}, logger);

    expect(config.sourceApp.name).toBe("Telegram");
    expect(logger.warn).toHaveBeenCalledWith("[config] Rejected empty sourceApp.name");
  });
});

describe("applySettings", () => {
  it("merges valid values and reports rejected keys", () => {
    const logger = mockLogger();

    const { settings, rejected } = applySettings(
      DEFAULT_CONFIG.burst,
      { burstThresholdSeconds: 8, minimumFilesForBurst: 2.5, maxBurstDurationSeconds: Number.NaN },
      BURST_RULES,
      logger,
      "burst",
    );

    expect(settings.burstThresholdSeconds).toBe(8);
    expect(settings.minimumFilesForBurst).toBe(2);
    expect(settings.maxBurstDurationSeconds).toBe(60);
    expect(rejected).toEqual(["minimumFilesForBurst", "maxBurstDurationSeconds"]);
    expect(logger.warn).toHaveBeenCalledWith("[burst] Rejected minimumFilesForBurst=2.5 (not an integer); keeping 2");
    expect(logger.warn).toHaveBeenCalledWith("[burst] Rejected maxBurstDurationSeconds=NaN (not a finite number); keeping 60");
  });

  it("does not touch the current settings", () => {
    const current = { ...DEFAULT_CONFIG.burst };

    applySettings(current, { burstThresholdSeconds: 9 }, BURST_RULES, mockLogger(), "burst");

    expect(current.burstThresholdSeconds).toBe(5);
  });
});
