/**
 * @fileoverview UI probe. Queries the rendered player for visible ad
 * affordances and merges what it sees into sticky session evidence.
 *
 * `collectUiMarkers` runs inside the page via `page.evaluate`, so it must stay
 * self-contained: no imports, no module-level constants, no helpers.
 */

import type { Page } from 'puppeteer-core';
import type { Logger as WinstonLogger } from 'winston';
import type { UiEvidence, UiMarkers } from '../common/types.js';

type UiEvidenceFlag = Exclude<keyof UiEvidence, 'rawMarkerLog'>;

/**
 * Marker → evidence field, in the order newly detected markers are reported.
 */
const UI_MARKER_FIELDS: ReadonlyArray<readonly [keyof UiMarkers, UiEvidenceFlag]> = [
  ['sponsoredText', 'sponsoredLabelSeen'],
  ['adBadgeText', 'adBadgeSeen'],
  ['imageMarker', 'adImageMarkerSeen'],
  ['skipButton', 'skipButtonSeen'],
  ['adCountdown', 'adCountdownSeen'],
  ['adOverlay', 'adOverlaySeen'],
  ['adModeClass', 'adModeClassSeen'],
];

/**
 * Reads the player's ad markers from a live document. A player that has not
 * finished initializing simply reports every marker as false.
 */
export function collectUiMarkers(root: Document = document): UiMarkers {
  const player = root.querySelector('.html5-video-player');
  const normalize = (el: Element): string =>
    (el.textContent || '').trim().toLowerCase();

  const adModeClass =
    !!player &&
    (player.classList.contains('ad-showing') ||
      player.classList.contains('ad-interrupting'));

  const badgeTexts = Array.from(
    root.querySelectorAll(
      '.ytp-ad-badge__text, .ytp-ad-simple-ad-badge, .ytp-ad-badge'
    )
  ).map(normalize);
  const adBadgeText = badgeTexts.some((t) => t === 'ad' || /\bad\b/.test(t));

  const sponsoredInBadge = badgeTexts.some((t) => t.includes('sponsored'));
  const sponsoredInPlayer =
    !!player &&
    Array.from(player.querySelectorAll('*')).some((el) =>
      normalize(el).includes('sponsored')
    );

  return {
    adModeClass,
    adBadgeText,
    sponsoredText: sponsoredInBadge || sponsoredInPlayer,
    imageMarker: !!root.querySelector(
      '.ytp-ad-image, .ytp-ad-avatar, .ytp-ad-thumbnail-image, .ytp-ad-player-overlay-instream-info img'
    ),
    skipButton: !!root.querySelector(
      '.ytp-ad-skip-button, .ytp-ad-skip-button-modern, .ytp-skip-ad-button'
    ),
    adCountdown: !!root.querySelector(
      '.ytp-ad-preview-container, .ytp-ad-timed-pie-countdown-container, .ytp-ad-duration-remaining'
    ),
    adOverlay: !!root.querySelector(
      '.ytp-ad-overlay-container, .ytp-ad-overlay-slot, .ytp-ad-player-overlay'
    ),
  };
}

/**
 * Validates the untyped value returned from the page. Anything that is not an
 * object with a boolean for every marker is rejected.
 */
export function parseUiMarkers(raw: unknown): UiMarkers | null {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }
  const record: Record<string, unknown> = { ...raw };
  const markers: UiMarkers = {
    adModeClass: false,
    adBadgeText: false,
    sponsoredText: false,
    imageMarker: false,
    skipButton: false,
    adCountdown: false,
    adOverlay: false,
  };
  for (const [key] of UI_MARKER_FIELDS) {
    const value = record[key];
    if (typeof value !== 'boolean') {
      return null;
    }
    markers[key] = value;
  }
  return markers;
}

/**
 * Runs the UI collector in the page. Evaluation failures (player not ready,
 * navigation in flight) are reported as `null`, never thrown.
 */
export async function probeUi(
  page: Page,
  logger: WinstonLogger
): Promise<UiMarkers | null> {
  try {
    const raw: unknown = await page.evaluate(collectUiMarkers);
    const markers = parseUiMarkers(raw);
    if (!markers) {
      logger.debug('UI probe returned an unexpected payload', { raw });
    }
    return markers;
  } catch (error) {
    logger.warn(
      `UI marker check failed: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
}

/**
 * Merges one checkpoint's markers into the session evidence. Flags are
 * write-once-true: a marker that later disappears does not reset its flag.
 *
 * @returns the evidence fields that became true at this checkpoint.
 */
export function applyUiMarkers(
  ui: UiEvidence,
  markers: UiMarkers | null,
  checkpoint: string
): string[] {
  if (!markers) {
    return [];
  }

  const newlyDetected: string[] = [];
  for (const [marker, field] of UI_MARKER_FIELDS) {
    if (markers[marker] && !ui[field]) {
      ui[field] = true;
      newlyDetected.push(field);
    }
  }

  if (newlyDetected.length > 0) {
    ui.rawMarkerLog.push({ checkpoint, newlyDetected });
  }
  return newlyDetected;
}

/**
 * Whether the markers indicate an ad is on screen right now. Used to hold off
 * seeking, which the player blocks during ad playback.
 */
export function isAdPlaying(markers: UiMarkers | null): boolean {
  if (!markers) {
    return false;
  }
  return (
    markers.adModeClass ||
    markers.sponsoredText ||
    markers.skipButton ||
    markers.adCountdown
  );
}
