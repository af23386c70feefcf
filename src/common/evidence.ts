/**
 * @fileoverview Factories for the per-session evidence containers. Every
 * `detect()` call gets fresh containers from here; nothing is reused across
 * videos.
 */

import type {
  DomEvidence,
  EvidenceSet,
  NetworkEvidence,
  UiEvidence,
} from './types.js';

export function createDomEvidence(): DomEvidence {
  return {
    hasAdTimeOffsetMarker: false,
    hasPlayerAdsMarker: false,
    loadsWithEvidence: 0,
    totalLoads: 0,
    rawFindings: [],
  };
}

export function createNetworkEvidence(): NetworkEvidence {
  return {
    adRequestCount: 0,
    adBreakObserved: false,
    otherPatternFlags: {
      pagead: false,
      thirdPartyAdNetwork: false,
      adUnitParam: false,
      viewabilityTracker: false,
    },
    matchedUrls: [],
  };
}

export function createUiEvidence(): UiEvidence {
  return {
    sponsoredLabelSeen: false,
    adBadgeSeen: false,
    adImageMarkerSeen: false,
    skipButtonSeen: false,
    adCountdownSeen: false,
    adOverlaySeen: false,
    adModeClassSeen: false,
    rawMarkerLog: [],
  };
}

export function createEvidenceSet(): EvidenceSet {
  return {
    dom: createDomEvidence(),
    network: createNetworkEvidence(),
    ui: createUiEvidence(),
    loadErrors: [],
  };
}

export function domHasAds(dom: DomEvidence): boolean {
  return dom.hasAdTimeOffsetMarker || dom.hasPlayerAdsMarker;
}

/**
 * The sponsored label is the only UI signal trusted on its own.
 */
export function uiHasAds(ui: UiEvidence): boolean {
  return ui.sponsoredLabelSeen;
}

/**
 * Any UI marker other than the sponsored label.
 */
export function uiHasCorroboratingMarker(ui: UiEvidence): boolean {
  return (
    ui.adBadgeSeen ||
    ui.adImageMarkerSeen ||
    ui.skipButtonSeen ||
    ui.adCountdownSeen ||
    ui.adOverlaySeen ||
    ui.adModeClassSeen
  );
}
