/**
 * @fileoverview Session driver tests against an in-process fake browser.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import { AdDetector } from '../ad-detector.js';
import { runDetectionLoads } from '../utils/detection-task.js';
import { AppError } from '../common/AppError.js';
import { Confidence, DecisiveMethod } from '../common/types.js';
import type { AdDetectionResult } from '../common/AdDetectionResult.js';
import {
  NO_MARKERS,
  ZERO_TIMINGS,
  asBrowser,
  createFakeBrowser,
  createFakePage,
  createTestLogger,
  loggedMessages,
} from '../utils/__tests__/fakes.js';

vi.mock('../utils/detection-task.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/detection-task.js')>();
  return { ...actual, runDetectionLoads: vi.fn(actual.runDetectionLoads) };
});

function detectorWith(browser: ReturnType<typeof createFakeBrowser>, numLoads = 1) {
  const { logger, transport } = createTestLogger();
  const launcher = vi.fn().mockResolvedValue(asBrowser(browser));
  const detector = new AdDetector({
    numLoads,
    timings: ZERO_TIMINGS,
    logger,
    launcher,
    useFullBrowserChannel: true,
  });
  return { detector, launcher, transport };
}

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('AdDetector construction', () => {
  it('rejects a non-positive number of loads', () => {
    expect(() => new AdDetector({ numLoads: 0 })).toThrow(AppError);
  });

  it('builds launch attempts with the channel first and the executable second', () => {
    const { logger } = createTestLogger();
    const detector = new AdDetector({ logger, executablePath: '/opt/chrome/chrome' });

    const attempts = detector.buildLaunchAttempts();

    expect(attempts).toHaveLength(2);
    expect(attempts[0].channel).toBe('chrome');
    expect(attempts[0].executablePath).toBeUndefined();
    expect(attempts[1].executablePath).toBe('/opt/chrome/chrome');
    expect(attempts[1].channel).toBeUndefined();
    expect(attempts[0].headless).toBe(false);
    expect(attempts[0].ignoreDefaultArgs).toEqual(['--enable-automation']);
    expect(attempts[0].args).toContain('--disable-blink-features=AutomationControlled');
    expect(attempts[0].args).toContain('--incognito');
  });

  it('falls back to the executable path from the environment', () => {
    vi.stubEnv('CHROME_EXECUTABLE_PATH', '/usr/bin/chromium');
    const { logger } = createTestLogger();
    const detector = new AdDetector({ logger, useFullBrowserChannel: false });

    expect(detector.buildLaunchAttempts().map((attempt) => attempt.executablePath)).toEqual([
      '/usr/bin/chromium',
    ]);
  });
});

describe('AdDetector.setup / cleanup', () => {
  it('launches once and closes once', async () => {
    const browser = createFakeBrowser(() => createFakePage());
    const { detector, launcher } = detectorWith(browser);

    await detector.setup();
    await detector.setup();
    expect(launcher).toHaveBeenCalledTimes(1);
    expect(detector.isReady).toBe(true);

    await detector.cleanup();
    await detector.cleanup();
    expect(browser.close).toHaveBeenCalledTimes(1);
    expect(detector.isReady).toBe(false);
  });

  it('tolerates cleanup without setup', async () => {
    const { logger } = createTestLogger();
    await expect(new AdDetector({ logger }).cleanup()).resolves.toBeUndefined();
  });

  it('warns when running headless', async () => {
    const browser = createFakeBrowser(() => createFakePage());
    const { logger, transport } = createTestLogger();
    const detector = new AdDetector({
      headless: true,
      logger,
      launcher: vi.fn().mockResolvedValue(asBrowser(browser)),
    });

    await detector.setup();

    expect(loggedMessages(transport, 'warn')).toContain(
      'Running headless: ad delivery is materially less reliable than in a headed browser'
    );
  });

  it('falls back to the executable when the channel cannot be launched', async () => {
    const browser = createFakeBrowser(() => createFakePage());
    const { logger } = createTestLogger();
    const launcher = vi
      .fn()
      .mockRejectedValueOnce(new Error('Could not find Chrome (ver. stable)'))
      .mockResolvedValueOnce(asBrowser(browser));
    const detector = new AdDetector({ logger, launcher, executablePath: '/opt/chrome/chrome' });

    await detector.setup();

    expect(launcher).toHaveBeenCalledTimes(2);
    expect(launcher.mock.calls[1][0].executablePath).toBe('/opt/chrome/chrome');
  });

  it('propagates launch failure as BROWSER_LAUNCH_FAILED', async () => {
    const { logger } = createTestLogger();
    const detector = new AdDetector({
      logger,
      launcher: vi.fn().mockRejectedValue(new Error('Failed to launch the browser process!')),
    });

    const failure = await detector.setup().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(AppError);
    expect(failure instanceof AppError ? failure.code : undefined).toBe('BROWSER_LAUNCH_FAILED');
    expect(detector.isReady).toBe(false);
  });

  it('fails setup when there is nothing to launch', async () => {
    vi.stubEnv('CHROME_EXECUTABLE_PATH', '');
    const { logger } = createTestLogger();
    const launcher = vi.fn();
    const detector = new AdDetector({ logger, launcher, useFullBrowserChannel: false });

    await expect(detector.setup()).rejects.toThrow(/No browser to launch/);
    expect(launcher).not.toHaveBeenCalled();
  });
});

describe('AdDetector.detect', () => {
  it('returns an error result when called before setup', async () => {
    const { logger } = createTestLogger();
    const result = await new AdDetector({ logger }).detect('abcdefghijk');

    expect(result.error).toBe('Browser not initialized. Call setup() first.');
    expect(result.verdict).toBeNull();
    expect(result.decisiveMethod).toBe(DecisiveMethod.NONE);
    expect(result.confidence).toBe(Confidence.LOW);
  });

  it('decides from the sponsored label and closes its context', async () => {
    const page = createFakePage({ uiMarkers: [{ ...NO_MARKERS, sponsoredText: true }] });
    const browser = createFakeBrowser(() => page);
    const { detector } = detectorWith(browser);
    await detector.setup();

    const result = await detector.detect('abcdefghijk');

    expect(result.verdict).toBe(true);
    expect(result.decisiveMethod).toBe(DecisiveMethod.UI);
    expect(result.confidence).toBe(Confidence.HIGH);
    expect(result.error).toBeNull();
    expect(page.goto).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abcdefghijk', {
      waitUntil: 'networkidle2',
      timeout: 0,
    });
    expect(page.evaluateOnNewDocument).toHaveBeenCalledTimes(1);
    expect(browser.contexts).toHaveLength(1);
    expect(browser.contexts[0].close).toHaveBeenCalledTimes(1);
  });

  it('feeds observed requests into network evidence', async () => {
    const page = createFakePage({
      requests: [
        'https://www.youtube.com/api/stats/ads?ad_break=1',
        'https://www.youtube.com/pagead/id',
        'https://i.ytimg.com/vi/abcdefghijk/hqdefault.jpg',
      ],
    });
    const { detector } = detectorWith(createFakeBrowser(() => page));
    await detector.setup();

    const result = await detector.detect('abcdefghijk');

    expect(page.on).toHaveBeenCalledWith('request', expect.any(Function));
    expect(result.networkEvidence.adRequestCount).toBe(2);
    expect(result.networkEvidence.adBreakObserved).toBe(true);
    expect(result.decisiveMethod).toBe(DecisiveMethod.NETWORK);
    expect(result.confidence).toBe(Confidence.HIGH);
  });

  it('uses fresh evidence for every video', async () => {
    const pages = [
      createFakePage({ uiMarkers: [{ ...NO_MARKERS, sponsoredText: true }] }),
      createFakePage(),
    ];
    const { detector } = detectorWith(createFakeBrowser((index) => pages[index]));
    await detector.setup();

    const first = await detector.detect('aaaaaaaaaaa');
    const second = await detector.detect('bbbbbbbbbbb');

    expect(first.verdict).toBe(true);
    expect(second.verdict).toBe(false);
    expect(second.uiEvidence.sponsoredLabelSeen).toBe(false);
  });

  it('reports the failure and closes the context when no page can be opened', async () => {
    const browser = createFakeBrowser(() => new Error('Protocol error (Target.createTarget): Target closed'));
    const { detector } = detectorWith(browser);
    await detector.setup();

    const result = await detector.detect('abcdefghijk');

    expect(result.error).toBe('Protocol error (Target.createTarget): Target closed');
    expect(result.verdict).toBeNull();
    expect(result.decisiveMethod).toBe(DecisiveMethod.NONE);
    expect(browser.contexts[0].close).toHaveBeenCalledTimes(1);
  });

  it('keeps evidence gathered before a session failure', async () => {
    const page = createFakePage({
      requests: ['https://www.youtube.com/youtubei/v1/player/ad_break?prettyPrint=false'],
    });
    const browser = createFakeBrowser(() => page);
    const { detector } = detectorWith(browser);
    await detector.setup();
    vi.mocked(runDetectionLoads).mockImplementationOnce(async (activePage, videoId, evidence) => {
      await activePage.goto(`https://www.youtube.com/watch?v=${videoId}`);
      evidence.ui.adBadgeSeen = true;
      throw new Error('Session closed. Most likely the page has been closed.');
    });

    const result = await detector.detect('abcdefghijk');

    expect(result.error).toBe('Session closed. Most likely the page has been closed.');
    expect(result.networkEvidence.adBreakObserved).toBe(true);
    expect(result.networkEvidence.adRequestCount).toBe(1);
    expect(result.uiEvidence.adBadgeSeen).toBe(true);
    expect(result.verdict).toBe(true);
    expect(result.decisiveMethod).toBe(DecisiveMethod.NETWORK);
    expect(result.confidence).toBe(Confidence.HIGH);
    expect(browser.contexts[0].close).toHaveBeenCalledTimes(1);
  });

  it('reports an error when every load fails', async () => {
    const page = createFakePage({ navigation: [new Error('Navigation timeout of 0 ms exceeded')] });
    const { detector } = detectorWith(createFakeBrowser(() => page), 2);
    await detector.setup();

    const result = await detector.detect('abcdefghijk');

    expect(result.error).toBe('All 2 page load(s) failed (NAVIGATION_TIMEOUT, NAVIGATION_TIMEOUT)');
    expect(result.verdict).toBeNull();
    expect(result.domEvidence.totalLoads).toBe(0);
    expect(result.loadErrors).toHaveLength(2);
  });

  it('applies the unknown policy to a clean session without evidence', async () => {
    const { logger } = createTestLogger();
    const detector = new AdDetector({
      logger,
      timings: ZERO_TIMINGS,
      absentEvidencePolicy: 'unknown',
      launcher: vi.fn().mockResolvedValue(asBrowser(createFakeBrowser(() => createFakePage()))),
    });
    await detector.setup();

    const result = await detector.detect('abcdefghijk');

    expect(result.error).toBeNull();
    expect(result.verdict).toBeNull();
    expect(result.confidence).toBe(Confidence.LOW);
  });
});

describe('AdDetector.detectBatch', () => {
  it('returns one result per video in order even when one fails', async () => {
    const browser = createFakeBrowser((index) =>
      index === 1
        ? new Error('Protocol error (Target.createTarget): Target closed')
        : createFakePage({ markup: ['{"playerAds":[]}'] })
    );
    const { detector } = detectorWith(browser);
    await detector.setup();
    const progress: Array<[number, number, AdDetectionResult]> = [];

    const results = await detector.detectBatch(
      ['aaaaaaaaaaa', 'bbbbbbbbbbb', 'ccccccccccc'],
      0,
      (completed, total, result) => progress.push([completed, total, result])
    );

    expect(results.map((result) => result.videoId)).toEqual([
      'aaaaaaaaaaa',
      'bbbbbbbbbbb',
      'ccccccccccc',
    ]);
    expect(results[1].error).toBe('Protocol error (Target.createTarget): Target closed');
    expect(results[1].verdict).toBeNull();
    expect(results[0].verdict).toBe(true);
    expect(results[2].verdict).toBe(true);
    expect(progress.map(([completed, total]) => [completed, total])).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
    expect(progress[1][2]).toBe(results[1]);
  });
});
