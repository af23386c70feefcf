/**
 * @fileoverview The per-video detection state machine. For each planned page
 * load it navigates, dismisses consent, lets the player settle, polls for a
 * pre-roll, checks the markup, and on the first successful load forces
 * playback and seeks to provoke mid-roll ads. Evidence is accumulated into the
 * session's containers as it is observed.
 *
 * Failures are absorbed at the lowest level that can absorb them: a probe
 * failure is "no evidence at this checkpoint", a navigation or markup failure
 * voids only the current load.
 */

import type { Page } from 'puppeteer-core';
import type { Logger as WinstonLogger } from 'winston';
import type { EvidenceSet, UiEvidence, UiMarkers } from '../common/types.js';
import { toError } from '../common/AppError.js';
import {
  CONSENT_SELECTORS,
  DEFAULT_USER_AGENT,
  DEFAULT_VIEWPORT,
  DetectionTimings,
  SEEK_POSITIONS,
  WATCH_URL_BASE,
} from '../config/app-config.js';
import { DetectionPhase, detectErrorType } from './error-types.js';
import { probeDom } from './dom-probe.js';
import { applyUiMarkers, isAdPlaying, probeUi } from './ui-probe.js';
import { sleep } from './sleep.js';
import type { DetectionTracer } from './telemetry.js';

export interface DetectionRunOptions {
  numLoads: number;
  timings: DetectionTimings;
  logger: WinstonLogger;
  tracer?: DetectionTracer;
}

export interface DetectionRunSummary {
  /** Loads that navigated successfully. */
  completedLoads: number;
  /** Whether the play-and-seek sequence ran. */
  playbackAttempted: boolean;
}

export function watchUrl(videoId: string): string {
  return `${WATCH_URL_BASE}${encodeURIComponent(videoId)}`;
}

/**
 * Applies viewport, user agent and the automation-flag override to a fresh
 * page. Must run before the first navigation so the override precedes any
 * page script.
 */
export async function configurePage(
  page: Page,
  userAgent: string = DEFAULT_USER_AGENT
): Promise<Page> {
  await page.setViewport(DEFAULT_VIEWPORT);
  await page.setUserAgent(userAgent);
  await page.evaluateOnNewDocument(() => {
    Object.defineProperty(navigator, 'webdriver', {
      get: () => undefined,
    });
    Object.defineProperty(navigator, 'languages', {
      get: () => ['en-US', 'en'],
    });
  });
  return page;
}

/**
 * Clicks the cookie-consent "accept all" control when one becomes visible in
 * time. All selectors are awaited together under one deadline, and the
 * remaining waits are aborted once one of them wins. Best effort: every
 * failure is logged at debug level and ignored.
 */
export async function dismissConsent(
  page: Page,
  timings: DetectionTimings,
  logger: WinstonLogger
): Promise<boolean> {
  const controller = new AbortController();
  const waits = CONSENT_SELECTORS.map(async (selector) => {
    const handle = await page.waitForSelector(selector, {
      visible: true,
      timeout: timings.consentTimeoutMs,
      signal: controller.signal,
    });
    if (!handle) {
      throw new Error(`Consent selector ${selector} did not match`);
    }
    return handle;
  });

  let button: Awaited<(typeof waits)[number]>;
  try {
    button = await Promise.any(waits);
  } catch (error) {
    logger.debug(`No consent banner visible: ${toError(error).message}`);
    return false;
  } finally {
    controller.abort();
  }

  try {
    logger.info('Dismissing consent banner');
    await button.click();
    await button.dispose();
    await sleep(timings.consentSettleMs);
    return true;
  } catch (error) {
    logger.debug(`Consent banner not dismissed: ${toError(error).message}`);
    return false;
  }
}

/**
 * Probes the player UI and merges the markers into sticky evidence.
 * Returns the raw markers of this checkpoint (or null when the probe failed).
 */
export async function checkUiMarkers(
  page: Page,
  ui: UiEvidence,
  checkpoint: string,
  logger: WinstonLogger
): Promise<UiMarkers | null> {
  const markers = await probeUi(page, logger);
  const newlyDetected = applyUiMarkers(ui, markers, checkpoint);
  if (newlyDetected.length > 0) {
    logger.info(`Ad markers detected (${checkpoint}): ${newlyDetected.join(', ')}`);
  }
  return markers;
}

/**
 * Polls for a pre-roll a bounded number of times, stopping as soon as the
 * sponsored label has been seen.
 */
async function pollPreRoll(
  page: Page,
  ui: UiEvidence,
  timings: DetectionTimings,
  logger: WinstonLogger,
  label: (name: string) => string
): Promise<void> {
  logger.info('Checking for pre-roll ads...');
  for (let poll = 1; poll <= timings.preRollPolls; poll++) {
    await checkUiMarkers(page, ui, label(`pre-roll ${poll}`), logger);
    if (ui.sponsoredLabelSeen) {
      logger.info('Pre-roll ad detected');
      return;
    }
    if (poll < timings.preRollPolls) {
      await sleep(timings.preRollIntervalMs);
    }
  }
}

/**
 * Reads the markup and records this load's DOM finding.
 *
 * @returns false when the markup could not be read (the load is not counted).
 */
async function checkDom(
  page: Page,
  evidence: EvidenceSet,
  load: number,
  videoId: string,
  logger: WinstonLogger
): Promise<boolean> {
  let markup: string;
  try {
    markup = await page.content();
  } catch (error) {
    recordLoadError(evidence, load, DetectionPhase.DOM_CHECK, error, videoId, logger);
    return false;
  }

  const finding = probeDom(markup);
  const { dom } = evidence;
  dom.totalLoads += 1;
  dom.rawFindings.push({ load, ...finding });
  dom.hasAdTimeOffsetMarker ||= finding.hasAdTimeOffsetMarker;
  dom.hasPlayerAdsMarker ||= finding.hasPlayerAdsMarker;
  if (finding.hasAdTimeOffsetMarker || finding.hasPlayerAdsMarker) {
    dom.loadsWithEvidence += 1;
  }

  logger.info(
    `DOM markers (load ${load}): adTimeOffset=${finding.hasAdTimeOffsetMarker}, playerAds=${finding.hasPlayerAdsMarker}`
  );
  return true;
}

/**
 * Starts muted playback, waits out an ad that is already playing, then seeks
 * through the video to provoke mid-roll insertion, probing the UI after each
 * step. Failures end the sequence early but are never propagated.
 */
export async function playAndSeek(
  page: Page,
  ui: UiEvidence,
  timings: DetectionTimings,
  logger: WinstonLogger
): Promise<void> {
  try {
    logger.info('Starting playback and seek sequence');

    const playback = await page.evaluate(async () => {
      const video = document.querySelector('video');
      if (!video) {
        return 'no-video';
      }
      video.muted = true;
      try {
        await video.play();
        return 'playing';
      } catch {
        return 'blocked';
      }
    });
    logger.debug(`Playback state: ${playback}`);

    await sleep(timings.playbackSettleMs);
    let markers = await checkUiMarkers(page, ui, 'after play', logger);

    if (isAdPlaying(markers)) {
      logger.info('Ad playing, waiting for it to finish...');
      for (let step = 0; step < timings.adWaitMaxSteps; step++) {
        await sleep(timings.adWaitStepMs);
        markers = await checkUiMarkers(page, ui, 'ad wait', logger);
        if (!isAdPlaying(markers)) {
          break;
        }
      }
    }

    for (const position of SEEK_POSITIONS) {
      const percent = Math.round(position * 100);
      logger.info(`Seeking to ${percent}%`);
      const seeked = await page.evaluate((fraction: number) => {
        const video = document.querySelector('video');
        if (!video || !Number.isFinite(video.duration) || video.duration <= 0) {
          return false;
        }
        video.currentTime = video.duration * fraction;
        return true;
      }, position);
      if (!seeked) {
        logger.debug(`Seek to ${percent}% skipped: no duration available`);
      }
      await sleep(timings.seekSettleMs);
      await checkUiMarkers(page, ui, `seek ${percent}%`, logger);
    }

    await sleep(timings.finalSettleMs);
    await checkUiMarkers(page, ui, 'final', logger);
  } catch (error) {
    logger.warn(`Playback/seek failed: ${toError(error).message}`);
  }
}

function recordLoadError(
  evidence: EvidenceSet,
  load: number,
  phase: DetectionPhase,
  thrown: unknown,
  videoId: string,
  logger: WinstonLogger
): void {
  const detailed = detectErrorType(toError(thrown), phase, videoId);
  evidence.loadErrors.push({
    load,
    phase,
    code: detailed.code,
    message: detailed.message,
  });
  logger.warn(`Load ${load} failed during ${phase} [${detailed.code}]: ${detailed.message}`);
}

/**
 * Runs every planned load for one video against an already configured page.
 * Evidence is written into `evidence`, which reflects the union of all
 * completed loads when this resolves.
 */
export async function runDetectionLoads(
  page: Page,
  videoId: string,
  evidence: EvidenceSet,
  options: DetectionRunOptions
): Promise<DetectionRunSummary> {
  const { numLoads, timings, logger, tracer } = options;
  const url = watchUrl(videoId);
  const summary: DetectionRunSummary = { completedLoads: 0, playbackAttempted: false };

  for (let load = 1; load <= numLoads; load++) {
    const label = (name: string): string =>
      numLoads > 1 ? `load ${load} ${name}` : name;

    logger.info(`Loading video page (load ${load}/${numLoads})...`);
    tracer?.checkpoint('navigate', load);
    try {
      await page.goto(url, {
        waitUntil: 'networkidle2',
        timeout: timings.navigationTimeoutMs,
      });
    } catch (error) {
      recordLoadError(evidence, load, DetectionPhase.NAVIGATION, error, videoId, logger);
      tracer?.recordError(toError(error), DetectionPhase.NAVIGATION);
      if (load < numLoads) {
        await sleep(timings.interLoadDelayMs);
      }
      continue;
    }
    summary.completedLoads += 1;

    tracer?.checkpoint('consent', load);
    await dismissConsent(page, timings, logger);

    await sleep(timings.settleMs);

    tracer?.checkpoint('pre-roll', load);
    await pollPreRoll(page, evidence.ui, timings, logger, label);

    tracer?.checkpoint('dom-check', load);
    await checkDom(page, evidence, load, videoId, logger);

    if (!summary.playbackAttempted) {
      summary.playbackAttempted = true;
      tracer?.checkpoint('play-and-seek', load);
      await playAndSeek(page, evidence.ui, timings, logger);
    }

    if (load < numLoads) {
      await sleep(timings.interLoadDelayMs);
    }
  }

  return summary;
}
