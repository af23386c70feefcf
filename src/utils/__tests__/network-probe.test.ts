import { describe, it, expect } from 'vitest';
import { classifyRequestUrl, recordRequest } from '../network-probe.js';
import { createNetworkEvidence } from '../../common/evidence.js';

describe('classifyRequestUrl', () => {
  it('flags an ad-break request case-insensitively', () => {
    const result = classifyRequestUrl(
      'https://www.youtube.com/api/stats/ads?AD_BREAK=1&ver=2'
    );

    expect(result.isAdRelated).toBe(true);
    expect(result.adBreak).toBe(true);
    expect(result.matchedPattern).toBe('ad_break');
  });

  it('matches ad_break as the last parameter without a value', () => {
    expect(classifyRequestUrl('https://example.com/x?ad_break').adBreak).toBe(true);
  });

  it('matches ad_break as a path segment', () => {
    expect(
      classifyRequestUrl('https://www.youtube.com/youtubei/v1/player/ad_break?prettyPrint=false').adBreak
    ).toBe(true);
    expect(classifyRequestUrl('https://www.youtube.com/youtubei/v1/player/ad_break').adBreak).toBe(true);
  });

  it('does not match ad_break inside a longer path segment', () => {
    expect(classifyRequestUrl('https://example.com/my_ad_break/x').adBreak).toBe(false);
    expect(classifyRequestUrl('https://example.com/ad_breaks').adBreak).toBe(false);
  });

  it('does not confuse a longer parameter name with ad_break', () => {
    const result = classifyRequestUrl('https://example.com/x?ad_breakfast=1');
    expect(result.adBreak).toBe(false);
    expect(result.isAdRelated).toBe(false);
  });

  it('leaves every flag false for an ordinary request', () => {
    expect(classifyRequestUrl('https://i.ytimg.com/vi/abc/hqdefault.jpg')).toEqual({
      isAdRelated: false,
      adBreak: false,
      pagead: false,
      thirdPartyAdNetwork: false,
      adUnitParam: false,
      viewabilityTracker: false,
      matchedPattern: null,
    });
  });

  it('evaluates every category even after the first match', () => {
    const result = classifyRequestUrl(
      'https://www.youtube.com/pagead/adview?ad_format=instream&viewability=1'
    );

    expect(result.matchedPattern).toBe('pagead');
    expect(result.pagead).toBe(true);
    expect(result.adUnitParam).toBe(true);
    expect(result.viewabilityTracker).toBe(true);
    expect(result.adBreak).toBe(false);
  });

  it('recognizes third-party ad network hosts', () => {
    const result = classifyRequestUrl('https://ad.doubleclick.net/ddm/trackimp/N123');
    expect(result.thirdPartyAdNetwork).toBe(true);
    expect(result.matchedPattern).toBe('doubleclick');
  });
});

describe('recordRequest', () => {
  it('counts ad requests and ORs their flags into the evidence', () => {
    const evidence = createNetworkEvidence();

    expect(recordRequest(evidence, 'https://www.youtube.com/pagead/id')).toBe(true);
    expect(recordRequest(evidence, 'https://www.youtube.com/api/stats/ads?ad_break=1')).toBe(true);
    expect(recordRequest(evidence, 'https://www.youtube.com/youtubei/v1/next')).toBe(false);

    expect(evidence.adRequestCount).toBe(2);
    expect(evidence.adBreakObserved).toBe(true);
    expect(evidence.otherPatternFlags).toEqual({
      pagead: true,
      thirdPartyAdNetwork: false,
      adUnitParam: false,
      viewabilityTracker: false,
    });
    expect(evidence.matchedUrls).toEqual([
      'https://www.youtube.com/pagead/id',
      'https://www.youtube.com/api/stats/ads?ad_break=1',
    ]);
  });

  it('never clears a flag once set', () => {
    const evidence = createNetworkEvidence();
    recordRequest(evidence, 'https://example.com/?ad_break=1');
    recordRequest(evidence, 'https://www.youtube.com/pagead/id');

    expect(evidence.adBreakObserved).toBe(true);
  });
});
