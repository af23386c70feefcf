/**
 * @fileoverview Shared type definitions for evidence records, probe outputs and
 * detection results. Centralizing them keeps the collectors, the state machine
 * and the verdict engine free of circular imports.
 */

import type { DetectionPhase } from '../utils/error-types.js';

/**
 * Which signal source decided a verdict.
 */
export enum DecisiveMethod {
  DOM = 'dom',
  NETWORK = 'network',
  UI = 'ui',
  NONE = 'none',
}

export enum Confidence {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

/**
 * How a session with no evidence of any kind is reported.
 * - `negative`: as a medium-confidence "no ads".
 * - `unknown`: as an undecided verdict (`null`) with low confidence.
 */
export type AbsentEvidencePolicy = 'negative' | 'unknown';

/**
 * Output of the DOM-marker probe for one page's markup.
 */
export interface DomProbeResult {
  hasAdTimeOffsetMarker: boolean;
  hasPlayerAdsMarker: boolean;
}

/**
 * The DOM probe result of a single page load.
 */
export interface LoadFinding extends DomProbeResult {
  /** 1-based index of the load within the session. */
  load: number;
}

export interface DomEvidence {
  hasAdTimeOffsetMarker: boolean;
  hasPlayerAdsMarker: boolean;
  /** Loads in which at least one marker was present. Never exceeds `totalLoads`. */
  loadsWithEvidence: number;
  /** Loads whose markup was actually inspected. Failed loads are not counted. */
  totalLoads: number;
  rawFindings: LoadFinding[];
}

/**
 * Diagnostic request categories. They corroborate but never decide a verdict.
 */
export interface NetworkPatternFlags {
  pagead: boolean;
  thirdPartyAdNetwork: boolean;
  adUnitParam: boolean;
  viewabilityTracker: boolean;
}

export interface NetworkEvidence {
  /** Number of ad-related requests observed. Only ever increases. */
  adRequestCount: number;
  /** True once a request carrying the ad-break marker has been seen. */
  adBreakObserved: boolean;
  otherPatternFlags: NetworkPatternFlags;
  matchedUrls: string[];
}

/**
 * Classification of a single outbound request URL.
 */
export interface RequestClassification extends NetworkPatternFlags {
  isAdRelated: boolean;
  adBreak: boolean;
  /** Name of the first pattern that matched, or null. */
  matchedPattern: string | null;
}

/**
 * Player UI markers observed at one checkpoint.
 */
export interface UiMarkers {
  /** The player carries its ad-playback state class. */
  adModeClass: boolean;
  /** An ad badge reads "Ad". */
  adBadgeText: boolean;
  /** "Sponsored" text is rendered inside the player. */
  sponsoredText: boolean;
  /** An ad-creative image/avatar element is present. */
  imageMarker: boolean;
  skipButton: boolean;
  adCountdown: boolean;
  adOverlay: boolean;
}

export interface UiMarkerLogEntry {
  checkpoint: string;
  newlyDetected: string[];
}

/**
 * Sticky UI evidence: each flag, once true, stays true for the session.
 */
export interface UiEvidence {
  sponsoredLabelSeen: boolean;
  adBadgeSeen: boolean;
  adImageMarkerSeen: boolean;
  skipButtonSeen: boolean;
  adCountdownSeen: boolean;
  adOverlaySeen: boolean;
  adModeClassSeen: boolean;
  rawMarkerLog: UiMarkerLogEntry[];
}

/**
 * A failure confined to one page load of a session.
 */
export interface LoadError {
  load: number;
  phase: DetectionPhase;
  code: string;
  message: string;
}

/**
 * The mutable evidence containers for one `detect()` call.
 */
export interface EvidenceSet {
  dom: DomEvidence;
  network: NetworkEvidence;
  ui: UiEvidence;
  loadErrors: LoadError[];
}

export interface Verdict {
  verdict: boolean | null;
  method: DecisiveMethod;
  confidence: Confidence;
}

/**
 * Called after each video of a batch completes.
 */
export type ProgressCallback<TResult> = (
  completed: number,
  total: number,
  result: TResult
) => void;
