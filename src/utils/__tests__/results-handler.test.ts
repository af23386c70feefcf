import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import path from 'path';
import {
  logDetectionSummary,
  resultsToCsv,
  summarizeResults,
  writeDetectionResults,
} from '../results-handler.js';
import { AdDetectionResult } from '../../common/AdDetectionResult.js';
import { AppError } from '../../common/AppError.js';
import { createEvidenceSet } from '../../common/evidence.js';
import { Confidence, DecisiveMethod, Verdict } from '../../common/types.js';
import { createTestLogger, loggedMessages } from './fakes.js';

const HAS_ADS: Verdict = { verdict: true, method: DecisiveMethod.UI, confidence: Confidence.HIGH };
const NO_ADS: Verdict = { verdict: false, method: DecisiveMethod.NONE, confidence: Confidence.MEDIUM };
const UNDECIDED: Verdict = { verdict: null, method: DecisiveMethod.NONE, confidence: Confidence.LOW };

function sampleResults(): AdDetectionResult[] {
  const withAds = createEvidenceSet();
  withAds.ui.sponsoredLabelSeen = true;
  return [
    new AdDetectionResult('aaaaaaaaaaa', withAds, HAS_ADS),
    new AdDetectionResult('bbbbbbbbbbb', createEvidenceSet(), NO_ADS),
    new AdDetectionResult('ccccccccccc', createEvidenceSet(), UNDECIDED, 'Target closed, retry later'),
  ];
}

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ad-presence-'));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe('summarizeResults', () => {
  it('counts verdicts and errors', () => {
    expect(summarizeResults(sampleResults())).toEqual({
      total: 3,
      withAds: 1,
      withoutAds: 1,
      unknown: 1,
      errored: 1,
    });
  });
});

describe('resultsToCsv', () => {
  it('writes a header row from the record keys and quotes values with commas', () => {
    const lines = resultsToCsv(sampleResults()).trimEnd().split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[0].startsWith('video_id,verdict,decisive_method,confidence,ui_sponsored_label,')).toBe(true);
    expect(lines[0].endsWith(',load_errors,error')).toBe(true);
    expect(lines[1].startsWith('aaaaaaaaaaa,Yes,ui,high,Yes,')).toBe(true);
    expect(lines[2].startsWith('bbbbbbbbbbb,No,none,medium,No,')).toBe(true);
    expect(lines[3].endsWith(',0,"Target closed, retry later"')).toBe(true);
  });

  it('returns an empty string for no results', () => {
    expect(resultsToCsv([])).toBe('');
  });
});

describe('writeDetectionResults', () => {
  it('writes the CSV and JSON files into a new directory', () => {
    const { logger } = createTestLogger();
    const outputDir = path.join(makeTempDir(), 'nested', 'output');

    const files = writeDetectionResults(sampleResults(), outputDir, logger);

    expect(files).toEqual({
      csvPath: path.join(outputDir, 'ad_detection_results.csv'),
      jsonPath: path.join(outputDir, 'ad_detection_results.json'),
    });
    const json = JSON.parse(fs.readFileSync(files.jsonPath, 'utf8'));
    expect(json).toHaveLength(3);
    expect(json[0].videoId).toBe('aaaaaaaaaaa');
    expect(json[0].uiEvidence.sponsoredLabelSeen).toBe(true);
    expect(json[2].error).toBe('Target closed, retry later');
    expect(fs.readFileSync(files.csvPath, 'utf8').split('\n')[1].startsWith('aaaaaaaaaaa,Yes')).toBe(true);
  });

  it('raises RESULTS_WRITE_FAILED when the directory cannot be created', () => {
    const { logger } = createTestLogger();
    const blocker = path.join(makeTempDir(), 'a-file');
    fs.writeFileSync(blocker, 'not a directory');

    let failure: unknown;
    try {
      writeDetectionResults(sampleResults(), path.join(blocker, 'output'), logger);
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(AppError);
    expect(failure instanceof AppError ? failure.code : undefined).toBe('RESULTS_WRITE_FAILED');
  });
});

describe('logDetectionSummary', () => {
  it('logs the counts and each errored video', () => {
    const { logger, transport } = createTestLogger();

    logDetectionSummary(sampleResults(), logger);

    const info = loggedMessages(transport, 'info');
    expect(info).toContain('Videos checked: 3');
    expect(info).toContain('With ads: 1');
    expect(info).toContain('Unknown: 1');
    expect(loggedMessages(transport, 'warn')).toEqual(['  ccccccccccc: Target closed, retry later']);
  });
});
