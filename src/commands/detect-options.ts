import { Args, Flags, Interfaces } from '@oclif/core';
import type { AdDetectorOptions } from '../ad-detector.js';
import type { AbsentEvidencePolicy } from '../common/types.js';
import {
  DEFAULT_BATCH_DELAY_SECONDS,
  DEFAULT_NUM_LOADS,
  METHODOLOGY_NUM_LOADS,
} from '../config/app-config.js';

/**
 * Videos given directly on the command line, as URLs or bare IDs.
 */
export const detectArgs = {
  videos: Args.string({
    description: 'Video URLs or IDs to check. Combined with --inputFile when both are given.',
    required: false,
  }),
};

const ABSENT_EVIDENCE_POLICIES: readonly AbsentEvidencePolicy[] = ['negative', 'unknown'];

/**
 * Flags for the `detect` command. Detection behavior maps onto
 * {@link AdDetectorOptions}; the rest control input, output and logging.
 */
export const detectFlags = {
  inputFile: Flags.string({
    char: 'i',
    description: 'File of video URLs or IDs (TXT, CSV, JSON).',
    required: false,
  }),
  numLoads: Flags.integer({
    char: 'n',
    description: `Page loads per video. The research methodology uses ${METHODOLOGY_NUM_LOADS}.`,
    default: DEFAULT_NUM_LOADS,
    min: 1,
  }),
  headless: Flags.boolean({
    description: 'Run the browser headless. Ads are served less reliably.',
    default: false,
    allowNo: true,
  }),
  stealth: Flags.boolean({
    description: 'Apply the puppeteer-extra stealth plugin.',
    default: true,
    allowNo: true,
  }),
  chromeChannel: Flags.boolean({
    description: 'Prefer the installed Chrome browser over --executablePath.',
    default: true,
    allowNo: true,
  }),
  executablePath: Flags.string({
    description: 'Chrome/Chromium binary to launch.',
    env: 'CHROME_EXECUTABLE_PATH',
    required: false,
  }),
  delay: Flags.integer({
    description: 'Seconds to wait between videos.',
    default: DEFAULT_BATCH_DELAY_SECONDS,
    min: 0,
  }),
  absentEvidence: Flags.string({
    description: "Verdict when no evidence is found: 'negative' reports no ads, 'unknown' reports undecided.",
    options: [...ABSENT_EVIDENCE_POLICIES],
    default: 'negative',
  }),
  outputDir: Flags.string({
    description: 'Directory for ad_detection_results.csv and .json.',
    default: 'output',
  }),
  logDir: Flags.string({
    description: 'Directory to save log files',
    default: 'logs',
  }),
  verbose: Flags.boolean({
    char: 'v',
    description: 'Enable verbose output, including stack traces.',
    default: false,
  }),
  trace: Flags.boolean({
    description: 'Export OpenTelemetry spans (OTLP when OTEL_EXPORTER_OTLP_ENDPOINT is set, else console).',
    default: false,
  }),
};

export type DetectFlags = Interfaces.InferredFlags<typeof detectFlags>;

export function parseAbsentEvidencePolicy(value: string): AbsentEvidencePolicy {
  const policy = ABSENT_EVIDENCE_POLICIES.find((candidate) => candidate === value);
  if (!policy) {
    throw new Error(`Unknown absent-evidence policy: ${value}`);
  }
  return policy;
}

/**
 * Maps parsed CLI flags onto session-driver options.
 */
export function buildDetectorOptions(
  flags: Pick<
    DetectFlags,
    'numLoads' | 'headless' | 'stealth' | 'chromeChannel' | 'executablePath' | 'absentEvidence'
  >
): AdDetectorOptions {
  return {
    numLoads: flags.numLoads,
    headless: flags.headless,
    stealthPatchesEnabled: flags.stealth,
    useFullBrowserChannel: flags.chromeChannel,
    executablePath: flags.executablePath,
    absentEvidencePolicy: parseAbsentEvidencePolicy(flags.absentEvidence),
  };
}
