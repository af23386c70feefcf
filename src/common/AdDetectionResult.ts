/**
 * @file The immutable per-video output of a detection session.
 */

import type {
  Confidence,
  DecisiveMethod,
  DomEvidence,
  EvidenceSet,
  LoadError,
  NetworkEvidence,
  UiEvidence,
  Verdict,
} from './types.js';

/**
 * Flattened, string-only form of a result consumed by report writers.
 */
export type DetectionRecord = Record<string, string>;

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    const children: unknown[] = Object.values(value);
    for (const child of children) {
      deepFreeze(child);
    }
  }
  return value;
}

export class AdDetectionResult {
  public readonly videoId: string;
  public readonly domEvidence: Readonly<DomEvidence>;
  public readonly networkEvidence: Readonly<NetworkEvidence>;
  public readonly uiEvidence: Readonly<UiEvidence>;
  public readonly loadErrors: readonly LoadError[];
  /** true = ads delivered, false = none observed, null = undecided. */
  public readonly verdict: boolean | null;
  public readonly decisiveMethod: DecisiveMethod;
  public readonly confidence: Confidence;
  public readonly error: string | null;

  /**
   * Snapshots the evidence, so later mutation of the session containers
   * cannot leak into a returned result.
   */
  constructor(
    videoId: string,
    evidence: EvidenceSet,
    verdict: Verdict,
    error: string | null = null
  ) {
    const snapshot = deepFreeze(structuredClone(evidence));
    this.videoId = videoId;
    this.domEvidence = snapshot.dom;
    this.networkEvidence = snapshot.network;
    this.uiEvidence = snapshot.ui;
    this.loadErrors = snapshot.loadErrors;
    this.verdict = verdict.verdict;
    this.decisiveMethod = verdict.method;
    this.confidence = verdict.confidence;
    this.error = error;
    Object.freeze(this);
  }

  get hasError(): boolean {
    return this.error !== null;
  }

  /**
   * Flattens the result: evidence booleans become "Yes"/"No", an undecided
   * verdict becomes "Unknown", counts become decimal strings and a missing
   * error becomes "".
   */
  toRecord(): DetectionRecord {
    const dom = this.domEvidence;
    const network = this.networkEvidence;
    const ui = this.uiEvidence;

    return {
      video_id: this.videoId,
      verdict: this.verdict === null ? 'Unknown' : yesNo(this.verdict),
      decisive_method: this.decisiveMethod,
      confidence: this.confidence,
      ui_sponsored_label: yesNo(ui.sponsoredLabelSeen),
      ui_ad_badge: yesNo(ui.adBadgeSeen),
      ui_ad_image: yesNo(ui.adImageMarkerSeen),
      ui_skip_button: yesNo(ui.skipButtonSeen),
      ui_ad_countdown: yesNo(ui.adCountdownSeen),
      ui_ad_overlay: yesNo(ui.adOverlaySeen),
      ui_ad_mode_class: yesNo(ui.adModeClassSeen),
      network_ad_break: yesNo(network.adBreakObserved),
      network_pagead: yesNo(network.otherPatternFlags.pagead),
      network_third_party_ad_network: yesNo(network.otherPatternFlags.thirdPartyAdNetwork),
      network_ad_unit_param: yesNo(network.otherPatternFlags.adUnitParam),
      network_viewability_tracker: yesNo(network.otherPatternFlags.viewabilityTracker),
      network_ad_request_count: String(network.adRequestCount),
      dom_ad_time_offset: yesNo(dom.hasAdTimeOffsetMarker),
      dom_player_ads: yesNo(dom.hasPlayerAdsMarker),
      dom_loads_with_evidence: String(dom.loadsWithEvidence),
      dom_total_loads: String(dom.totalLoads),
      load_errors: String(this.loadErrors.length),
      error: this.error ?? '',
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      videoId: this.videoId,
      verdict: this.verdict,
      decisiveMethod: this.decisiveMethod,
      confidence: this.confidence,
      error: this.error,
      domEvidence: this.domEvidence,
      networkEvidence: this.networkEvidence,
      uiEvidence: this.uiEvidence,
      loadErrors: this.loadErrors,
    };
  }
}
