/**
 * @fileoverview Session driver for ad-presence detection. Owns the single
 * browser process of a run: `setup()` launches it with the evasion
 * configuration, `detect()` runs one video in its own browser context, and
 * `cleanup()` tears the browser down.
 *
 * @example
 * const detector = new AdDetector({ numLoads: 5 });
 * await detector.setup();
 * try {
 *   const results = await detector.detectBatch(['dQw4w9WgXcQ'], 2);
 * } finally {
 *   await detector.cleanup();
 * }
 */
import puppeteer, {
  type Browser,
  type BrowserContext,
  type HTTPRequest,
  type PuppeteerLaunchOptions,
} from 'puppeteer-core';
import { addExtra } from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { Logger as WinstonLogger } from 'winston';

import loggerModule from './utils/logger.js';
import { AdDetectionResult } from './common/AdDetectionResult.js';
import { AppError, toError } from './common/AppError.js';
import type { AbsentEvidencePolicy, EvidenceSet, ProgressCallback } from './common/types.js';
import { createEvidenceSet } from './common/evidence.js';
import {
  DEFAULT_BATCH_DELAY_SECONDS,
  DEFAULT_DETECTION_TIMINGS,
  DEFAULT_NUM_LOADS,
  DEFAULT_USER_AGENT,
  DEFAULT_VIEWPORT,
  DetectionTimings,
  EXECUTABLE_PATH_ENV,
  IGNORED_DEFAULT_ARGS,
  PUPPETEER_PROTOCOL_TIMEOUT,
  STEALTH_LAUNCH_ARGS,
} from './config/app-config.js';
import { configurePage, runDetectionLoads } from './utils/detection-task.js';
import { recordRequest } from './utils/network-probe.js';
import { determineVerdict, resolveSessionVerdict } from './utils/verdict.js';
import {
  DetectionPhase,
  detectErrorType,
  formatDetailedError,
} from './utils/error-types.js';
import { DetectionTracer } from './utils/telemetry.js';
import { runBatch } from './utils/batch-runner.js';

/**
 * Launches a browser. Swappable so callers can supply their own launcher.
 */
export type LaunchBrowser = (options: PuppeteerLaunchOptions) => Promise<Browser>;

export interface AdDetectorOptions {
  /** Ad delivery is less reliable headless; a warning is logged. Defaults to false. */
  headless?: boolean;
  /** Page loads per video. Defaults to 1. */
  numLoads?: number;
  /** Apply the puppeteer-extra stealth plugin. Defaults to true. */
  stealthPatchesEnabled?: boolean;
  /** Prefer the installed Chrome channel over a bare executable. Defaults to true. */
  useFullBrowserChannel?: boolean;
  /** Browser binary. Falls back to the CHROME_EXECUTABLE_PATH environment variable. */
  executablePath?: string;
  absentEvidencePolicy?: AbsentEvidencePolicy;
  userAgent?: string;
  timings?: Partial<DetectionTimings>;
  logger?: WinstonLogger;
  /** Replaces the puppeteer launcher; stealth patches are not applied to it. */
  launcher?: LaunchBrowser;
}

interface ResolvedOptions {
  headless: boolean;
  numLoads: number;
  stealthPatchesEnabled: boolean;
  useFullBrowserChannel: boolean;
  executablePath?: string;
  absentEvidencePolicy: AbsentEvidencePolicy;
  userAgent: string;
  timings: DetectionTimings;
}

const TRACER_NAME = 'ad-presence-detector';

export class AdDetector {
  private readonly options: ResolvedOptions;
  private readonly customLauncher?: LaunchBrowser;
  private readonly injectedLogger?: WinstonLogger;
  private browser: Browser | null = null;

  constructor(options: AdDetectorOptions = {}) {
    const numLoads = options.numLoads ?? DEFAULT_NUM_LOADS;
    if (!Number.isInteger(numLoads) || numLoads < 1) {
      throw new AppError(`numLoads must be a positive integer, got ${numLoads}`, {
        errorCode: 'INVALID_CONFIGURATION',
        isOperational: true,
      });
    }

    this.options = {
      headless: options.headless ?? false,
      numLoads,
      stealthPatchesEnabled: options.stealthPatchesEnabled ?? true,
      useFullBrowserChannel: options.useFullBrowserChannel ?? true,
      executablePath: options.executablePath ?? process.env[EXECUTABLE_PATH_ENV],
      absentEvidencePolicy: options.absentEvidencePolicy ?? 'negative',
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      timings: { ...DEFAULT_DETECTION_TIMINGS, ...options.timings },
    };
    this.customLauncher = options.launcher;
    this.injectedLogger = options.logger;
  }

  private get logger(): WinstonLogger {
    return this.injectedLogger ?? loggerModule.instance;
  }

  get isReady(): boolean {
    return this.browser !== null;
  }

  get numLoads(): number {
    return this.options.numLoads;
  }

  /**
   * Launch attempts in preference order: the installed Chrome channel first
   * (when enabled), then the explicit executable.
   */
  buildLaunchAttempts(): PuppeteerLaunchOptions[] {
    const base: PuppeteerLaunchOptions = {
      headless: this.options.headless,
      protocolTimeout: PUPPETEER_PROTOCOL_TIMEOUT,
      defaultViewport: DEFAULT_VIEWPORT,
      ignoreDefaultArgs: [...IGNORED_DEFAULT_ARGS],
      args: [
        ...STEALTH_LAUNCH_ARGS,
        `--window-size=${DEFAULT_VIEWPORT.width},${DEFAULT_VIEWPORT.height}`,
      ],
    };

    const attempts: PuppeteerLaunchOptions[] = [];
    if (this.options.useFullBrowserChannel) {
      attempts.push({ ...base, channel: 'chrome' });
    }
    if (this.options.executablePath) {
      attempts.push({ ...base, executablePath: this.options.executablePath });
    }
    return attempts;
  }

  private resolveLauncher(): LaunchBrowser {
    const logger = this.logger;
    if (this.customLauncher) {
      logger.info('Using custom browser launcher; stealth patches not applied');
      return this.customLauncher;
    }
    if (!this.options.stealthPatchesEnabled) {
      logger.info('Stealth patches disabled');
      return (options) => puppeteer.launch(options);
    }

    try {
      // puppeteer-extra types its input against the full puppeteer package;
      // puppeteer-core exposes the same launcher surface.
      const extra = addExtra(puppeteer as unknown as Parameters<typeof addExtra>[0]);
      extra.use(StealthPlugin());
      logger.info('Stealth patches applied');
      return extra.launch.bind(extra) as unknown as LaunchBrowser;
    } catch (error) {
      logger.warn(`Stealth patches unavailable, continuing without: ${toError(error).message}`);
      return (options) => puppeteer.launch(options);
    }
  }

  /**
   * Launches the browser. Calling it again while a browser is open is a no-op.
   *
   * @throws {AppError} `BROWSER_LAUNCH_FAILED` when no launch attempt succeeds.
   */
  async setup(): Promise<void> {
    if (this.browser) {
      return;
    }
    const logger = this.logger;

    if (this.options.headless) {
      logger.warn(
        'Running headless: ad delivery is materially less reliable than in a headed browser'
      );
    }

    const attempts = this.buildLaunchAttempts();
    if (attempts.length === 0) {
      throw new AppError(
        `No browser to launch: enable the Chrome channel or set an executable path (${EXECUTABLE_PATH_ENV})`,
        { errorCode: 'BROWSER_LAUNCH_FAILED', isOperational: true }
      );
    }

    const launch = this.resolveLauncher();
    let lastError: Error | undefined;
    for (const attempt of attempts) {
      const target = attempt.channel ? `channel ${attempt.channel}` : attempt.executablePath;
      try {
        logger.info(`Launching browser (${target}, headless: ${this.options.headless})`);
        this.browser = await launch(attempt);
        logger.info('Browser launched');
        return;
      } catch (error) {
        lastError = toError(error);
        logger.warn(`Browser launch via ${target} failed: ${lastError.message}`);
      }
    }

    throw new AppError(`Failed to launch browser: ${lastError?.message ?? 'unknown error'}`, {
      errorCode: 'BROWSER_LAUNCH_FAILED',
      isOperational: true,
      originalError: lastError,
    });
  }

  /**
   * Closes the browser. Safe to call repeatedly or after a failed setup.
   */
  async cleanup(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) {
      return;
    }
    try {
      await browser.close();
      this.logger.info('Browser closed');
    } catch (error) {
      const detailed = detectErrorType(toError(error), DetectionPhase.CLEANUP, '');
      this.logger.warn(`Error while closing browser [${detailed.code}]: ${detailed.message}`);
    }
  }

  private buildResult(
    videoId: string,
    evidence: EvidenceSet,
    error: string | null
  ): AdDetectionResult {
    const verdict = resolveSessionVerdict(
      determineVerdict(
        evidence.dom,
        evidence.network,
        evidence.ui,
        this.options.absentEvidencePolicy
      ),
      error !== null
    );
    return new AdDetectionResult(videoId, evidence, verdict, error);
  }

  private logSummary(result: AdDetectionResult): void {
    const ui = result.uiEvidence;
    const logger = this.logger;
    logger.info(
      `UI summary for ${result.videoId}: sponsored=${ui.sponsoredLabelSeen}, badge=${ui.adBadgeSeen}, ` +
        `image=${ui.adImageMarkerSeen}, skip=${ui.skipButtonSeen}, countdown=${ui.adCountdownSeen}, ` +
        `overlay=${ui.adOverlaySeen}, adMode=${ui.adModeClassSeen}`
    );
    logger.info(
      `Network summary for ${result.videoId}: adRequests=${result.networkEvidence.adRequestCount}, ` +
        `adBreak=${result.networkEvidence.adBreakObserved}`
    );
    const verdict =
      result.verdict === null ? 'UNKNOWN' : result.verdict ? 'HAS ADS' : 'NO ADS';
    logger.info(
      `Verdict for ${result.videoId}: ${verdict} (method: ${result.decisiveMethod}, confidence: ${result.confidence})`
    );
  }

  /**
   * Runs the detection state machine for one video. Never throws: failures
   * end up in the result's `error` field alongside whatever evidence was
   * gathered before them.
   */
  async detect(videoId: string): Promise<AdDetectionResult> {
    const logger = this.logger;
    const evidence = createEvidenceSet();
    const browser = this.browser;

    if (!browser) {
      const message = 'Browser not initialized. Call setup() first.';
      logger.error(`Cannot detect ${videoId}: ${message}`);
      return this.buildResult(videoId, evidence, message);
    }

    logger.info(`Detecting ads for video ${videoId}`);
    const tracer = trace.getTracer(TRACER_NAME, '1.0.0');

    return tracer.startActiveSpan('ad-detector.detect', async (span) => {
      span.setAttribute('video.id', videoId);
      span.setAttribute('detection.num_loads', this.options.numLoads);
      const detectionTracer = new DetectionTracer(videoId, logger);

      let context: BrowserContext | undefined;
      let error: string | null = null;
      try {
        context = await browser.createBrowserContext();
        const page = await context.newPage();
        await configurePage(page, this.options.userAgent);

        page.on('request', (request: HTTPRequest) => {
          const url = request.url();
          if (recordRequest(evidence.network, url)) {
            logger.debug(`Ad request: ${url}`);
          }
        });

        const summary = await runDetectionLoads(page, videoId, evidence, {
          numLoads: this.options.numLoads,
          timings: this.options.timings,
          logger,
          tracer: detectionTracer,
        });

        if (summary.completedLoads === 0) {
          const codes = evidence.loadErrors.map((loadError) => loadError.code).join(', ');
          error = `All ${this.options.numLoads} page load(s) failed (${codes})`;
          logger.error(`Detection for ${videoId} gathered no page: ${error}`);
        }
      } catch (thrown) {
        const cause = toError(thrown);
        const detailed = detectErrorType(cause, DetectionPhase.CONTEXT, videoId);
        error = cause.message;
        logger.error(`Detection failed: ${formatDetailedError(detailed)}`);
        detectionTracer.recordError(cause, DetectionPhase.CONTEXT);
        span.recordException(cause);
      } finally {
        if (context) {
          try {
            await context.close();
          } catch (closeError) {
            logger.warn(
              `Failed to close browser context for ${videoId}: ${toError(closeError).message}`
            );
          }
        }
      }

      const result = this.buildResult(videoId, evidence, error);
      this.logSummary(result);

      span.setAttribute('detection.verdict', String(result.verdict));
      span.setAttribute('detection.method', result.decisiveMethod);
      span.setAttribute('detection.confidence', result.confidence);
      span.setStatus(
        error === null
          ? { code: SpanStatusCode.OK }
          : { code: SpanStatusCode.ERROR, message: error }
      );
      span.end();
      detectionTracer.finish(result.verdict);

      return result;
    });
  }

  /**
   * Detects every video in order, waiting `delaySeconds` between videos.
   * Every requested ID yields exactly one result.
   */
  async detectBatch(
    videoIds: readonly string[],
    delaySeconds: number = DEFAULT_BATCH_DELAY_SECONDS,
    onProgress?: ProgressCallback<AdDetectionResult>
  ): Promise<AdDetectionResult[]> {
    return runBatch(this, videoIds, {
      delaySeconds,
      onProgress,
      logger: this.logger,
    });
  }
}
