export enum ErrorCategory {
  NETWORK = 'network',
  TIMEOUT = 'timeout',
  BROWSER = 'browser',
  ACCESS = 'access',
  EXTRACTION = 'extraction',
  CONFIGURATION = 'configuration',
  UNKNOWN = 'unknown'
}

export enum DetectionPhase {
  LAUNCH = 'launch',
  CONTEXT = 'context',
  NAVIGATION = 'navigation',
  CONSENT = 'consent',
  PRE_ROLL_POLL = 'pre_roll_poll',
  DOM_CHECK = 'dom_check',
  PLAY_AND_SEEK = 'play_and_seek',
  CLEANUP = 'cleanup'
}

export interface DetailedError {
  category: ErrorCategory;
  subCategory: string;
  phase: DetectionPhase;
  code: string;
  message: string;
  videoId: string;
  timestamp: string;
  stack?: string;
  metadata?: Record<string, unknown>;
}

export interface ErrorDetectionRule {
  pattern: RegExp;
  category: ErrorCategory;
  subCategory: string;
  code: string;
  extractMetadata?: (error: Error) => Record<string, unknown>;
}

export const ERROR_DETECTION_RULES: readonly ErrorDetectionRule[] = [
  // Network
  {
    pattern: /net::ERR_NAME_NOT_RESOLVED/,
    category: ErrorCategory.NETWORK,
    subCategory: 'dns',
    code: 'DNS_RESOLUTION_FAILED'
  },
  {
    pattern: /net::ERR_CONNECTION_(REFUSED|RESET|CLOSED)/,
    category: ErrorCategory.NETWORK,
    subCategory: 'connection',
    code: 'CONNECTION_FAILED'
  },
  {
    pattern: /net::ERR_INTERNET_DISCONNECTED|net::ERR_NETWORK_CHANGED/,
    category: ErrorCategory.NETWORK,
    subCategory: 'connection',
    code: 'NO_INTERNET'
  },

  // Timeouts
  {
    pattern: /Navigation timeout of \d+ ms exceeded/,
    category: ErrorCategory.TIMEOUT,
    subCategory: 'navigation',
    code: 'NAVIGATION_TIMEOUT',
    extractMetadata: (error) => {
      const match = error.message.match(/Navigation timeout of (\d+) ms/);
      return { timeoutMs: match ? parseInt(match[1], 10) : null };
    }
  },
  {
    pattern: /Timeout \d+ms exceeded|timed out/i,
    category: ErrorCategory.TIMEOUT,
    subCategory: 'operation',
    code: 'OPERATION_TIMEOUT'
  },

  // Browser
  {
    pattern: /Failed to launch the browser process|Could not find Chrome|Browser was not found/i,
    category: ErrorCategory.BROWSER,
    subCategory: 'launch',
    code: 'BROWSER_LAUNCH_FAILED'
  },
  {
    pattern: /Session closed|Target closed|browser has disconnected/i,
    category: ErrorCategory.BROWSER,
    subCategory: 'session',
    code: 'BROWSER_SESSION_CLOSED'
  },
  {
    pattern: /Execution context was destroyed/,
    category: ErrorCategory.BROWSER,
    subCategory: 'context',
    code: 'CONTEXT_DESTROYED'
  },
  {
    pattern: /detached Frame|frame was detached/i,
    category: ErrorCategory.BROWSER,
    subCategory: 'frame',
    code: 'FRAME_DETACHED'
  },
  {
    pattern: /Target crashed/,
    category: ErrorCategory.BROWSER,
    subCategory: 'crash',
    code: 'BROWSER_CRASHED'
  },
  {
    pattern: /Protocol error/,
    category: ErrorCategory.BROWSER,
    subCategory: 'protocol',
    code: 'BROWSER_PROTOCOL_ERROR'
  },

  // Access
  {
    pattern: /captcha|unusual traffic/i,
    category: ErrorCategory.ACCESS,
    subCategory: 'bot_detection',
    code: 'CAPTCHA_REQUIRED'
  },
  {
    pattern: /sign in to confirm|confirm you.re not a bot/i,
    category: ErrorCategory.ACCESS,
    subCategory: 'bot_detection',
    code: 'BOT_CHECK'
  },

  // In-page script evaluation
  {
    pattern: /Evaluation failed/,
    category: ErrorCategory.EXTRACTION,
    subCategory: 'javascript',
    code: 'JS_EVALUATION_FAILED'
  }
];

export function detectErrorType(
  error: Error,
  phase: DetectionPhase,
  videoId: string
): DetailedError {
  const errorMessage = error.message || '';
  const fullErrorText = `${errorMessage} ${error.stack || ''}`;

  for (const rule of ERROR_DETECTION_RULES) {
    if (rule.pattern.test(fullErrorText)) {
      return {
        category: rule.category,
        subCategory: rule.subCategory,
        phase,
        code: rule.code,
        message: errorMessage,
        videoId,
        timestamp: new Date().toISOString(),
        stack: error.stack,
        metadata: rule.extractMetadata ? rule.extractMetadata(error) : {}
      };
    }
  }

  return {
    category: ErrorCategory.UNKNOWN,
    subCategory: 'unclassified',
    phase,
    code: 'UNKNOWN_ERROR',
    message: errorMessage,
    videoId,
    timestamp: new Date().toISOString(),
    stack: error.stack
  };
}

export function formatDetailedError(error: DetailedError): string {
  const parts = [
    `[${error.timestamp}]`,
    `Category: ${error.category}/${error.subCategory}`,
    `Phase: ${error.phase}`,
    `Code: ${error.code}`,
    `Video: ${error.videoId}`,
    `Message: ${error.message}`
  ];

  if (error.metadata && Object.keys(error.metadata).length > 0) {
    parts.push(`Metadata: ${JSON.stringify(error.metadata)}`);
  }

  return parts.join(' | ');
}
