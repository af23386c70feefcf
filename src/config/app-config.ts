// src/config/app-config.ts
/**
 * Base URL of a watch page. The video ID is appended as the `v` parameter.
 */
export const WATCH_URL_BASE = 'https://www.youtube.com/watch?v=';

/**
 * Default User-Agent string applied to every detection page.
 * Windows desktop Chrome, which is the profile ads are served to most reliably.
 */
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36';

/**
 * Viewport used for every detection page. The player needs a desktop-sized
 * window to render its full ad UI.
 */
export const DEFAULT_VIEWPORT = {
  width: 1280,
  height: 720,
  deviceScaleFactor: 1,
  isMobile: false,
  hasTouch: false,
  isLandscape: true,
} as const;

/**
 * Timeout for Puppeteer's underlying DevTools Protocol communication.
 * Value is in milliseconds.
 */
export const PUPPETEER_PROTOCOL_TIMEOUT = 180000; // ms

/**
 * Launch arguments that reduce the chance of the session being flagged as
 * automated.
 */
export const STEALTH_LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-infobars',
  '--no-first-run',
  '--no-default-browser-check',
  '--incognito',
  // Autoplay must not wait for a user gesture or the player never starts.
  '--autoplay-policy=no-user-gesture-required',
] as const;

/**
 * Default arguments Puppeteer passes that advertise automation.
 */
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'] as const;

/**
 * Wait budgets for each stage of the per-video state machine.
 * All values are in milliseconds except the counters.
 */
export interface DetectionTimings {
  /** Upper bound for reaching network quiescence after navigation. */
  navigationTimeoutMs: number;
  /** How long a consent dialog may take to become visible. */
  consentTimeoutMs: number;
  /** Pause after a consent click so the dialog can animate away. */
  consentSettleMs: number;
  /** Pause for client-side player initialization. */
  settleMs: number;
  /** Maximum number of pre-roll UI probes per load. */
  preRollPolls: number;
  /** Interval between pre-roll probes. */
  preRollIntervalMs: number;
  /** Pause after playback is started, before the first re-poll. */
  playbackSettleMs: number;
  /** Step size while waiting for a playing ad to finish. */
  adWaitStepMs: number;
  /** Maximum number of ad-wait steps. */
  adWaitMaxSteps: number;
  /** Pause after each seek before the UI is probed. */
  seekSettleMs: number;
  /** Pause before the closing UI probe of a load. */
  finalSettleMs: number;
  /** Pause between two loads of the same video. */
  interLoadDelayMs: number;
}

export const DEFAULT_DETECTION_TIMINGS: Readonly<DetectionTimings> =
  Object.freeze({
    navigationTimeoutMs: 30000,
    consentTimeoutMs: 1000,
    consentSettleMs: 1000,
    settleMs: 2000,
    preRollPolls: 4,
    preRollIntervalMs: 2000,
    playbackSettleMs: 3000,
    adWaitStepMs: 2000,
    adWaitMaxSteps: 10,
    seekSettleMs: 2000,
    finalSettleMs: 2000,
    interLoadDelayMs: 3000,
  });

/**
 * Fractions of the video duration the player is seeked to in order to provoke
 * mid-roll ad insertion.
 */
export const SEEK_POSITIONS: readonly number[] = Object.freeze([0.25, 0.5, 0.75]);

/**
 * Loads per video when nothing else is configured.
 */
export const DEFAULT_NUM_LOADS = 1;

/**
 * Loads per video used by the research methodology for DOM corroboration.
 */
export const METHODOLOGY_NUM_LOADS = 5;

/**
 * Default delay between two videos of a batch, in seconds.
 */
export const DEFAULT_BATCH_DELAY_SECONDS = 1;

/**
 * Environment variable that names a Chrome/Chromium binary to fall back to
 * when the installed Chrome channel cannot be used.
 */
export const EXECUTABLE_PATH_ENV = 'CHROME_EXECUTABLE_PATH';

/**
 * Selectors for the cookie-consent "accept all" control, awaited together.
 */
export const CONSENT_SELECTORS = [
  'button::-p-text(Accept all)',
  '[aria-label="Accept the use of cookies and other data for the purposes described"]',
  'form[action*="consent"] button[aria-label*="Accept"]',
] as const;

/**
 * Output file names written by the results handler.
 */
export const RESULT_FILES = {
  CSV: 'ad_detection_results.csv',
  JSON: 'ad_detection_results.json',
} as const;
