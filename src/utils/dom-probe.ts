/**
 * @fileoverview DOM-marker probe. Scans serialized page markup for the player
 * configuration keys that accompany an ad configuration.
 */

import type { DomProbeResult } from '../common/types.js';
import { DOM_MARKER_PATTERNS } from '../config/ad-patterns.js';

/**
 * Checks page markup for the ad-time-offset and player-ads configuration keys.
 * Case-insensitive; empty or absent markup yields both flags false.
 *
 * @example
 * probeDom('{"playerAds": [], "adTimeOffset": {}}');
 * // { hasAdTimeOffsetMarker: true, hasPlayerAdsMarker: true }
 */
export function probeDom(pageMarkup: string | null | undefined): DomProbeResult {
  if (!pageMarkup) {
    return { hasAdTimeOffsetMarker: false, hasPlayerAdsMarker: false };
  }

  return {
    hasAdTimeOffsetMarker: DOM_MARKER_PATTERNS.adTimeOffset.test(pageMarkup),
    hasPlayerAdsMarker: DOM_MARKER_PATTERNS.playerAds.test(pageMarkup),
  };
}
