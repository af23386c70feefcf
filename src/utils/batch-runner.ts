/**
 * @fileoverview Sequential batch loop over a list of video IDs. One browser
 * context is active at a time; results come back in input order and a video
 * that throws still yields a result.
 */

import type { Logger as WinstonLogger } from 'winston';
import { AdDetectionResult } from '../common/AdDetectionResult.js';
import { toError } from '../common/AppError.js';
import type { ProgressCallback } from '../common/types.js';
import { createEvidenceSet } from '../common/evidence.js';
import { DEFAULT_BATCH_DELAY_SECONDS } from '../config/app-config.js';
import { UNDECIDED } from './verdict.js';
import { BatchProgressTracer } from './telemetry.js';
import { sleep } from './sleep.js';

/**
 * Anything that can run a single-video detection.
 */
export interface VideoDetector {
  detect(videoId: string): Promise<AdDetectionResult>;
}

export interface BatchOptions {
  /** Pause between videos, in seconds. Not applied after the last video. */
  delaySeconds?: number;
  onProgress?: ProgressCallback<AdDetectionResult>;
  logger: WinstonLogger;
}

/**
 * Result for a video whose detection threw before producing one.
 */
export function createErrorResult(videoId: string, message: string): AdDetectionResult {
  return new AdDetectionResult(videoId, createEvidenceSet(), { ...UNDECIDED }, message);
}

export async function runBatch(
  detector: VideoDetector,
  videoIds: readonly string[],
  options: BatchOptions
): Promise<AdDetectionResult[]> {
  const { logger, onProgress } = options;
  const delaySeconds = options.delaySeconds ?? DEFAULT_BATCH_DELAY_SECONDS;
  const total = videoIds.length;
  const progress = new BatchProgressTracer(total, logger);
  const results: AdDetectionResult[] = [];

  for (const [index, videoId] of videoIds.entries()) {
    let result: AdDetectionResult;
    try {
      result = await detector.detect(videoId);
    } catch (thrown) {
      const error = toError(thrown);
      logger.error(`Detection for ${videoId} threw: ${error.message}`);
      result = createErrorResult(videoId, error.message);
    }

    results.push(result);
    const completed = index + 1;
    progress.recordProgress(completed, videoId, result.verdict);
    onProgress?.(completed, total, result);

    if (completed < total && delaySeconds > 0) {
      await sleep(delaySeconds * 1000);
    }
  }

  progress.finish();
  return results;
}
