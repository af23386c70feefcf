/**
 * @fileoverview Loads the list of videos to check from a local file.
 * Supports `.txt` (one entry per line, `#` comments), `.csv` (a `url` or
 * `video_id` column, otherwise the first column) and `.json` (every string
 * anywhere in the document). Entries may be URLs or bare IDs.
 */

import * as fs from 'fs';
import { parse } from 'csv-parse/sync';
import type { Logger as WinstonLogger } from 'winston';
import { toError } from '../common/AppError.js';
import { extractVideoId } from './video-id.js';

const CSV_ID_COLUMNS = ['video_id', 'videoid', 'id', 'url', 'video_url'];

/**
 * Reads a file as UTF-8.
 *
 * @returns The content, or null when the file cannot be read (the failure is logged).
 */
export function loadFileContents(filePath: string, logger: WinstonLogger): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    logger.error(`Failed to read input file ${filePath}: ${toError(error).message}`);
    return null;
  }
}

function collectJsonStrings(data: unknown, into: string[]): void {
  if (typeof data === 'string') {
    into.push(data);
  } else if (Array.isArray(data)) {
    for (const item of data) {
      collectJsonStrings(item, into);
    }
  } else if (typeof data === 'object' && data !== null) {
    for (const value of Object.values(data)) {
      collectJsonStrings(value, into);
    }
  }
}

function csvEntries(fileName: string, content: string, logger: WinstonLogger): string[] {
  const records: string[][] = parse(content, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
  });
  if (records.length === 0) {
    return [];
  }

  const header = records[0].map((cell) => cell.toLowerCase());
  const columnIndex = header.findIndex((cell) => CSV_ID_COLUMNS.includes(cell));
  if (columnIndex === -1) {
    logger.debug(`No id/url header in ${fileName}; using the first column`);
    return records.map((row) => row[0] ?? '');
  }
  return records.slice(1).map((row) => row[columnIndex] ?? '');
}

/**
 * Extracts video IDs from the text of an input file. The file name selects
 * the format. Entries that are not a video are skipped with a warning and
 * duplicates are dropped, keeping first-seen order.
 */
export function processVideoFileContent(
  fileName: string,
  content: string,
  logger: WinstonLogger
): string[] {
  let entries: string[];
  const lowerName = fileName.toLowerCase();

  if (lowerName.endsWith('.json')) {
    try {
      const jsonData: unknown = JSON.parse(content);
      entries = [];
      collectJsonStrings(jsonData, entries);
    } catch (error) {
      logger.error(`Failed to parse JSON from ${fileName}: ${toError(error).message}`);
      return [];
    }
  } else if (lowerName.endsWith('.csv')) {
    try {
      entries = csvEntries(fileName, content, logger);
    } catch (error) {
      logger.error(`Failed to parse CSV from ${fileName}: ${toError(error).message}`);
      return [];
    }
  } else {
    entries = content
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'));
  }

  const seen = new Set<string>();
  const videoIds: string[] = [];
  for (const entry of entries) {
    if (entry === '') {
      continue;
    }
    const videoId = extractVideoId(entry);
    if (videoId === null) {
      logger.warn(`Skipping entry without a video ID: ${entry}`);
      continue;
    }
    if (!seen.has(videoId)) {
      seen.add(videoId);
      videoIds.push(videoId);
    }
  }

  logger.info(`Loaded ${videoIds.length} video ID(s) from ${fileName}`);
  return videoIds;
}

/**
 * Reads and parses an input file.
 *
 * @returns The video IDs in file order, or an empty array when the file cannot be read.
 */
export function loadVideoIds(filePath: string, logger: WinstonLogger): string[] {
  const content = loadFileContents(filePath, logger);
  if (content === null) {
    return [];
  }
  return processVideoFileContent(filePath, content, logger);
}
