/**
 * @fileoverview Runs a complete ad-presence check: collects the video IDs,
 * drives one browser session over all of them, and writes the results for the
 * report-generation step.
 */
import type { Logger as WinstonLogger } from 'winston';
import { AdDetector, AdDetectorOptions } from './ad-detector.js';
import type { AdDetectionResult } from './common/AdDetectionResult.js';
import type { ProgressCallback } from './common/types.js';
import { DEFAULT_BATCH_DELAY_SECONDS } from './config/app-config.js';
import { extractVideoId } from './utils/video-id.js';
import { loadVideoIds } from './utils/video-loader.js';
import {
  DetectionSummary,
  ResultFilePaths,
  logDetectionSummary,
  writeDetectionResults,
} from './utils/results-handler.js';
import {
  installProcessErrorHandler,
  uninstallProcessErrorHandler,
} from './utils/process-error-handler.js';

export interface MonitorOptions {
  videoIds: readonly string[];
  outputDir: string;
  logger: WinstonLogger;
  delaySeconds?: number;
  detector?: Omit<AdDetectorOptions, 'logger'>;
  onProgress?: ProgressCallback<AdDetectionResult>;
}

export interface MonitorRunResult {
  results: AdDetectionResult[];
  summary: DetectionSummary;
  files: ResultFilePaths;
}

/**
 * Merges IDs given inline with those from an input file. Inline entries come
 * first; invalid entries are skipped with a warning and duplicates dropped.
 */
export function collectVideoIds(
  inline: readonly string[],
  inputFile: string | undefined,
  logger: WinstonLogger
): string[] {
  const collected: string[] = [];
  for (const entry of inline) {
    const videoId = extractVideoId(entry);
    if (videoId === null) {
      logger.warn(`Skipping argument without a video ID: ${entry}`);
    } else {
      collected.push(videoId);
    }
  }
  if (inputFile) {
    collected.push(...loadVideoIds(inputFile, logger));
  }
  return [...new Set(collected)];
}

/**
 * Launches the browser, detects every video, closes the browser and writes
 * the result files.
 *
 * @throws {AppError} When the browser cannot be launched or results cannot be written.
 */
export async function runAdPresenceMonitor(options: MonitorOptions): Promise<MonitorRunResult> {
  const { logger, videoIds, outputDir } = options;
  const detector = new AdDetector({ ...options.detector, logger });

  installProcessErrorHandler(logger);
  let results: AdDetectionResult[];
  try {
    await detector.setup();
    logger.info(
      `Checking ${videoIds.length} video(s), ${detector.numLoads} load(s) each`
    );
    results = await detector.detectBatch(
      videoIds,
      options.delaySeconds ?? DEFAULT_BATCH_DELAY_SECONDS,
      options.onProgress
    );
  } finally {
    await detector.cleanup();
    uninstallProcessErrorHandler();
  }

  const files = writeDetectionResults(results, outputDir, logger);
  const summary = logDetectionSummary(results, logger);
  return { results, summary, files };
}
