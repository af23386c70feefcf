/**
 * @fileoverview Verdict engine. Collapses the three evidence records into one
 * verdict using a fixed priority order; the first rule that matches wins.
 *
 * 1. sponsored label seen            → ads, UI, high
 * 2. ad-break request observed       → ads, network, high
 * 3. any other UI marker seen        → ads, UI, medium
 * 4. DOM ad configuration present    → ads, DOM, medium
 * 5. nothing                         → no ads, none, medium
 *                                      (or undecided, none, low under the
 *                                      `unknown` policy)
 */

import {
  AbsentEvidencePolicy,
  Confidence,
  DecisiveMethod,
  DomEvidence,
  NetworkEvidence,
  UiEvidence,
  Verdict,
} from '../common/types.js';
import {
  domHasAds,
  uiHasAds,
  uiHasCorroboratingMarker,
} from '../common/evidence.js';

/**
 * Verdict reported when no conclusion can be drawn.
 */
export const UNDECIDED: Readonly<Verdict> = Object.freeze({
  verdict: null,
  method: DecisiveMethod.NONE,
  confidence: Confidence.LOW,
});

export function determineVerdict(
  dom: DomEvidence,
  network: NetworkEvidence,
  ui: UiEvidence,
  policy: AbsentEvidencePolicy = 'negative'
): Verdict {
  if (uiHasAds(ui)) {
    return { verdict: true, method: DecisiveMethod.UI, confidence: Confidence.HIGH };
  }
  if (network.adBreakObserved) {
    return { verdict: true, method: DecisiveMethod.NETWORK, confidence: Confidence.HIGH };
  }
  if (uiHasCorroboratingMarker(ui)) {
    return { verdict: true, method: DecisiveMethod.UI, confidence: Confidence.MEDIUM };
  }
  if (domHasAds(dom)) {
    return { verdict: true, method: DecisiveMethod.DOM, confidence: Confidence.MEDIUM };
  }
  if (policy === 'unknown') {
    return { ...UNDECIDED };
  }
  return { verdict: false, method: DecisiveMethod.NONE, confidence: Confidence.MEDIUM };
}

/**
 * Applies the session outcome on top of the evidence cascade: a session that
 * failed and produced no evidence at all is undecided, not negative.
 */
export function resolveSessionVerdict(
  verdict: Verdict,
  sessionFailed: boolean
): Verdict {
  if (sessionFailed && verdict.method === DecisiveMethod.NONE) {
    return { ...UNDECIDED };
  }
  return verdict;
}
