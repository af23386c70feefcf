// src/config/ad-patterns.ts
import type { NetworkPatternFlags } from '../common/types.js';

/**
 * A named URL pattern and the request category it indicates.
 */
export interface RequestPattern {
  readonly name: string;
  readonly category: 'adBreak' | keyof NetworkPatternFlags;
  readonly pattern: RegExp;
}

/**
 * Outbound request patterns, in match-priority order. The first entry that
 * matches becomes `matchedPattern`; every category is still evaluated.
 * All patterns are case-insensitive and stateless (no `g` flag).
 */
export const REQUEST_PATTERNS: readonly RequestPattern[] = Object.freeze([
  {
    name: 'ad_break',
    category: 'adBreak',
    pattern: /[/?&]ad_break(?:[=&/?#]|$)/i,
  },
  {
    name: 'pagead',
    category: 'pagead',
    pattern: /(?:\/pagead\/|\/\/pagead\d*\.)/i,
  },
  {
    name: 'doubleclick',
    category: 'thirdPartyAdNetwork',
    pattern: /\.doubleclick\.net(?:[/:?]|$)/i,
  },
  {
    name: 'googlesyndication',
    category: 'thirdPartyAdNetwork',
    pattern: /\.googlesyndication\.com(?:[/:?]|$)/i,
  },
  {
    name: 'googleadservices',
    category: 'thirdPartyAdNetwork',
    pattern: /\.googleadservices\.com(?:[/:?]|$)/i,
  },
  {
    name: 'ad_unit',
    category: 'adUnitParam',
    pattern: /[?&](?:ad_unit|adunit|ad_slot|ad_format)=/i,
  },
  {
    name: 'activeview',
    category: 'viewabilityTracker',
    pattern: /(?:\/activeview|[?&]viewability=|\/pcs\/view)/i,
  },
]);

/**
 * Player-configuration keys whose presence in page markup signals that the
 * page was served with an ad configuration.
 * A key matches in `"key":`, `'key':`, `\"key\":` and `key:` form.
 */
export const DOM_MARKER_PATTERNS = Object.freeze({
  adTimeOffset: /\badTimeOffset\\?["']?\s*:/i,
  playerAds: /\bplayerAds\\?["']?\s*:/i,
});
