/**
 * @module logger
 * @description Singleton Winston logger. It must be initialized by calling
 * `initializeLogger` before `loggerModule.instance` is read.
 * Logs go to the console and to `app.log` / `error.log` in the log directory.
 * When an OpenTelemetry span is active its ids are attached to each entry.
 */
import winston, { Logger, Logform, transports } from 'winston';
import TransportStream from 'winston-transport';
import fs from 'fs';
import path from 'path';
import { trace } from '@opentelemetry/api';

let logger: Logger | undefined;
export let isVerbose = false;

/**
 * Adds `trace_id` and `span_id` from the active span, if any.
 */
const openTelemetryFormat = winston.format((info) => {
  const activeSpan = trace.getActiveSpan();
  if (activeSpan) {
    const spanContext = activeSpan.spanContext();
    info.trace_id = spanContext.traceId;
    info.span_id = spanContext.spanId;
  }
  return info;
});

/**
 * Renders winston's splat (`...meta`) arguments for the console.
 */
function formatSplatMetadata(splat: unknown): string {
  if (Array.isArray(splat)) {
    return splat
      .map((s: unknown) =>
        s instanceof Error ? s.message : typeof s === 'object' ? JSON.stringify(s) : String(s)
      )
      .filter((s) => s && s !== '{}')
      .join(' ');
  }
  if (typeof splat === 'object' && splat !== null) {
    const metadataString = JSON.stringify(splat);
    return metadataString !== '{}' ? metadataString : '';
  }
  return splat === undefined ? '' : String(splat);
}

/**
 * Formats a log entry for console output. Outside verbose mode, error
 * entries are cut down to their first line; in verbose mode the stack is
 * appended.
 */
export function formatConsoleLogMessage(info: Logform.TransformableInfo): string {
  const rawMessage =
    typeof info.message === 'string' ? info.message : String(info.message);
  const stack = typeof info.stack === 'string' ? info.stack : undefined;
  const isErrorEntry = info.level.includes('error') || stack !== undefined;

  if (isErrorEntry && !isVerbose) {
    const atIndex = rawMessage.indexOf('\n    at ');
    const firstLine = (atIndex === -1 ? rawMessage : rawMessage.substring(0, atIndex))
      .split('\n')[0];
    return `${info.timestamp} ${info.level}: ${firstLine}`;
  }

  let message = `${info.timestamp} ${info.level}: ${rawMessage}`;
  if (isVerbose && stack) {
    message += `\n${stack}`;
  }

  const metadataString = formatSplatMetadata(info[Symbol.for('splat')]);
  if (metadataString) {
    message += ` ${metadataString}`;
  }
  return message;
}

/**
 * In-memory transport for tests. Stores every entry it receives.
 */
export class MockTransport extends TransportStream {
  public messages: Logform.TransformableInfo[] = [];

  constructor(opts?: TransportStream.TransportStreamOptions) {
    super(opts);
  }

  log(info: Logform.TransformableInfo, callback: () => void): void {
    setImmediate(() => {
      this.emit('logged', info);
    });
    this.messages.push(info);
    callback();
  }
}

/**
 * Initializes the Winston logger instance.
 *
 * @param logDir - Directory for `app.log` and `error.log`. Created if missing.
 * @param verboseFlag - Print stacks and full error messages on the console.
 * @param testTransports - Replace every transport (no files are written).
 */
export function initializeLogger(
  logDir: string,
  verboseFlag = false,
  testTransports: TransportStream[] | null = null
): Logger {
  isVerbose = verboseFlag;

  let effectiveTransports: TransportStream[];

  if (testTransports) {
    effectiveTransports = testTransports;
  } else {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
    effectiveTransports = [
      new transports.Console({
        level: process.env.LOG_LEVEL_CONSOLE || (verboseFlag ? 'debug' : 'info'),
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.printf(formatConsoleLogMessage)
        ),
      }),
      new transports.File({
        filename: path.join(logDir, 'app.log'),
        level: process.env.LOG_LEVEL_APP || 'info',
        format: winston.format.combine(
          openTelemetryFormat(),
          winston.format.json()
        ),
      }),
      new transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: winston.format.combine(
          openTelemetryFormat(),
          winston.format.json()
        ),
      }),
    ];
  }

  logger = winston.createLogger({
    levels: winston.config.npm.levels,
    level: 'debug',
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.errors({ stack: true }),
      winston.format.splat()
    ),
    transports: effectiveTransports,
    exitOnError: false,
  });

  if (!testTransports) {
    logger.info(
      `Logger initialized. Log directory: ${logDir}, Verbose: ${isVerbose}`
    );
  }
  return logger;
}

export function setTestIsVerbose(value: boolean): void {
  isVerbose = value;
}

export default {
  /**
   * The singleton logger.
   * @throws {Error} If `initializeLogger` has not been called.
   */
  get instance(): Logger {
    if (!logger) {
      throw new Error(
        'Logger has not been initialized. Call initializeLogger(logDir) first.'
      );
    }
    return logger;
  },
};
