/**
 * What a host calls once per observed file:
 * burst bookkeeping, detection, then session attribution.
 */

import type { BurstStatus, DetectionResult, DownloadSession } from "../types.js";
import { UNSORTED } from "../types.js";
import { systemClock } from "../utils/clock.js";
import type { Clock } from "../utils/clock.js";
import { errorMessage, silentLogger } from "../utils/logger.js";
import type { Logger } from "../utils/logger.js";
import type { BurstDetector } from "./burst-detector.js";
import type { ContextFusionEngine } from "./fusion-engine.js";
import type { SessionManager } from "./session-manager.js";

export interface ObservedFile {
  path?: string;
  size?: number;
}

export interface Observation {
  result: DetectionResult;
  burst: BurstStatus;
  /** Session the file joined; null when it stayed Unsorted or the store failed */
  session: DownloadSession | null;
}

export class FileObservationPipeline {
  private readonly burst: BurstDetector;
  private readonly engine: ContextFusionEngine;
  private readonly sessions: SessionManager;
  private readonly logger: Logger;
  private readonly clock: Clock;

  constructor(opts: {
    burst: BurstDetector;
    engine: ContextFusionEngine;
    sessions: SessionManager;
    logger?: Logger;
    clock?: Clock;
  }) {
    this.burst = opts.burst;
    this.engine = opts.engine;
    this.sessions = opts.sessions;
    this.logger = opts.logger ?? silentLogger;
    this.clock = opts.clock ?? systemClock;
  }

  async observe(fileName: string, time: number = this.clock.now(), file: ObservedFile = {}): Promise<Observation> {
    const burst = this.burst.record(fileName, time);
    const result = await this.engine.detectWithDetails(fileName, time);

    if (result.detectedContext === UNSORTED) {
      this.logger.debug(`[fusion] ${fileName} left unsorted`);
      return { result, burst, session: null };
    }

    try {
      const session = await this.sessions.addFile(fileName, result.detectedContext, { ...file, time });
      return { result, burst, session };
    } catch (err) {
      this.logger.error(`[fusion] ${fileName} detected as '${result.detectedContext}' but not added to a session: ${errorMessage(err)}`);
      return { result, burst, session: null };
    }
  }
}
