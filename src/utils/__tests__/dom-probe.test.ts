import { describe, it, expect } from 'vitest';
import { probeDom } from '../dom-probe.js';

describe('probeDom', () => {
  it('finds both markers in a JSON player response', () => {
    const markup =
      '<script>var ytInitialPlayerResponse = {"playerAds":[{"playerLegacyDesktopWatchAdsRenderer":{}}],"adPlacements":[{"adTimeOffset":{"offsetStartMilliseconds":"0"}}]};</script>';

    expect(probeDom(markup)).toEqual({
      hasAdTimeOffsetMarker: true,
      hasPlayerAdsMarker: true,
    });
  });

  it.each([
    ['double quotes', '{"adTimeOffset": {}}'],
    ['single quotes', "{'adTimeOffset': {}}"],
    ['escaped quotes', '{\\"adTimeOffset\\":{}}'],
    ['bare key', '{ adTimeOffset: {} }'],
    ['different case', '{"ADTIMEOFFSET": {}}'],
  ])('matches the ad time offset key with %s', (_label, markup) => {
    expect(probeDom(markup).hasAdTimeOffsetMarker).toBe(true);
    expect(probeDom(markup).hasPlayerAdsMarker).toBe(false);
  });

  it('does not treat the word on its own as a configuration key', () => {
    expect(probeDom('<p>playerAds are disabled for this upload</p>')).toEqual({
      hasAdTimeOffsetMarker: false,
      hasPlayerAdsMarker: false,
    });
  });

  it.each([null, undefined, ''])('reports nothing for %j markup', (markup) => {
    expect(probeDom(markup)).toEqual({
      hasAdTimeOffsetMarker: false,
      hasPlayerAdsMarker: false,
    });
  });

  it('returns the same answer for the same input', () => {
    const markup = '{"playerAds": []}';
    expect(probeDom(markup)).toEqual(probeDom(markup));
    expect(probeDom(markup).hasPlayerAdsMarker).toBe(true);
  });
});
