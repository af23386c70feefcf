/**
 * @fileoverview Network probe. Classifies outbound request URLs against the
 * known ad-endpoint patterns and folds the classification into session
 * evidence.
 */

import type {
  NetworkEvidence,
  RequestClassification,
} from '../common/types.js';
import { REQUEST_PATTERNS } from '../config/ad-patterns.js';

/**
 * Classifies a single request URL.
 *
 * Every category flag is evaluated independently, so diagnostic fields are
 * populated even when an earlier pattern already matched. `matchedPattern`
 * names the first matching entry of {@link REQUEST_PATTERNS}.
 *
 * @example
 * classifyRequestUrl('https://www.youtube.com/api/stats/ads?ad_break=1');
 * // { isAdRelated: true, adBreak: true, matchedPattern: 'ad_break', ... }
 */
export function classifyRequestUrl(url: string): RequestClassification {
  const result: RequestClassification = {
    isAdRelated: false,
    adBreak: false,
    pagead: false,
    thirdPartyAdNetwork: false,
    adUnitParam: false,
    viewabilityTracker: false,
    matchedPattern: null,
  };

  for (const { name, category, pattern } of REQUEST_PATTERNS) {
    if (!pattern.test(url)) {
      continue;
    }
    result[category] = true;
    if (result.matchedPattern === null) {
      result.matchedPattern = name;
    }
  }

  result.isAdRelated = result.matchedPattern !== null;
  return result;
}

/**
 * Folds one classified request into the session's network evidence.
 * Non-ad requests leave the evidence untouched.
 *
 * @returns true when the request was ad-related.
 */
export function recordRequest(
  evidence: NetworkEvidence,
  url: string,
  classification: RequestClassification = classifyRequestUrl(url)
): boolean {
  if (!classification.isAdRelated) {
    return false;
  }

  evidence.adRequestCount += 1;
  evidence.matchedUrls.push(url);
  evidence.adBreakObserved ||= classification.adBreak;

  const flags = evidence.otherPatternFlags;
  flags.pagead ||= classification.pagead;
  flags.thirdPartyAdNetwork ||= classification.thirdPartyAdNetwork;
  flags.adUnitParam ||= classification.adUnitParam;
  flags.viewabilityTracker ||= classification.viewabilityTracker;

  return true;
}
