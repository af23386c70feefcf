/**
 * @fileoverview Writes detection results for the report-generation step and
 * summarizes a run. The CSV holds one flattened record per video; the JSON
 * keeps the full evidence.
 */

import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import type { Logger as WinstonLogger } from 'winston';
import type { AdDetectionResult } from '../common/AdDetectionResult.js';
import { AppError, toError } from '../common/AppError.js';
import { RESULT_FILES } from '../config/app-config.js';

export interface ResultFilePaths {
  csvPath: string;
  jsonPath: string;
}

export interface DetectionSummary {
  total: number;
  withAds: number;
  withoutAds: number;
  unknown: number;
  errored: number;
}

export function summarizeResults(results: readonly AdDetectionResult[]): DetectionSummary {
  const summary: DetectionSummary = {
    total: results.length,
    withAds: 0,
    withoutAds: 0,
    unknown: 0,
    errored: 0,
  };
  for (const result of results) {
    if (result.verdict === true) {
      summary.withAds += 1;
    } else if (result.verdict === false) {
      summary.withoutAds += 1;
    } else {
      summary.unknown += 1;
    }
    if (result.hasError) {
      summary.errored += 1;
    }
  }
  return summary;
}

/**
 * Serializes results as CSV. Columns follow the key order of
 * `AdDetectionResult.toRecord()`; an empty list produces an empty string.
 */
export function resultsToCsv(results: readonly AdDetectionResult[]): string {
  if (results.length === 0) {
    return '';
  }
  const records = results.map((result) => result.toRecord());
  return stringify(records, {
    header: true,
    columns: Object.keys(records[0]),
  });
}

/**
 * Writes `ad_detection_results.csv` and `ad_detection_results.json` into
 * `outputDir`, creating it when needed.
 *
 * @throws {AppError} `RESULTS_WRITE_FAILED` when either file cannot be written.
 */
export function writeDetectionResults(
  results: readonly AdDetectionResult[],
  outputDir: string,
  logger: WinstonLogger
): ResultFilePaths {
  const csvPath = path.join(outputDir, RESULT_FILES.CSV);
  const jsonPath = path.join(outputDir, RESULT_FILES.JSON);

  try {
    fs.mkdirSync(outputDir, { recursive: true });
    fs.writeFileSync(csvPath, resultsToCsv(results), 'utf8');
    fs.writeFileSync(jsonPath, JSON.stringify(results, null, 2) + '\n', 'utf8');
  } catch (error) {
    const cause = toError(error);
    logger.error(`Failed to write detection results to ${outputDir}: ${cause.message}`);
    throw new AppError(`Failed to write detection results: ${cause.message}`, {
      errorCode: 'RESULTS_WRITE_FAILED',
      isOperational: true,
      originalError: cause,
    });
  }

  logger.info(`Wrote ${results.length} result(s) to ${csvPath} and ${jsonPath}`);
  return { csvPath, jsonPath };
}

/**
 * Logs the run summary and each errored video.
 */
export function logDetectionSummary(
  results: readonly AdDetectionResult[],
  logger: WinstonLogger
): DetectionSummary {
  const summary = summarizeResults(results);
  logger.info('========================================');
  logger.info('AD DETECTION SUMMARY');
  logger.info(`Videos checked: ${summary.total}`);
  logger.info(`With ads: ${summary.withAds}`);
  logger.info(`Without ads: ${summary.withoutAds}`);
  logger.info(`Unknown: ${summary.unknown}`);
  logger.info(`Errored: ${summary.errored}`);
  logger.info('========================================');
  for (const result of results) {
    if (result.error !== null) {
      logger.warn(`  ${result.videoId}: ${result.error}`);
    }
  }
  return summary;
}
