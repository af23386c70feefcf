/**
 * Process-level handlers for uncaught exceptions and unhandled rejections.
 * Errors raised by the browser connection after a context or page is gone
 * are logged and tolerated; anything else uncaught ends the process.
 */

import type { Logger as WinstonLogger } from 'winston';

const RECOVERABLE_MESSAGES = [
  'Target closed',
  'Session closed',
  'Protocol error',
  'Execution context was destroyed',
  'Navigating frame was detached',
  'Navigation failed because browser has disconnected',
  'page has been closed',
  'socket hang up',
  'ECONNRESET',
  'EPIPE',
] as const;

let logger: WinstonLogger | null = null;
let isHandlerInstalled = false;

function messageOf(reason: unknown): string {
  if (reason instanceof Error) {
    return reason.message;
  }
  return typeof reason === 'string' ? reason : '';
}

export function isRecoverableBrowserError(reason: unknown): boolean {
  const message = messageOf(reason);
  return RECOVERABLE_MESSAGES.some((fragment) => message.includes(fragment));
}

function onUncaughtException(error: Error): void {
  if (isRecoverableBrowserError(error)) {
    logger?.warn(`Recoverable browser error (uncaught): ${error.message}`);
    return;
  }
  logger?.error('Uncaught Exception:', error);
  logger?.error('Process will exit due to uncaught exception');
  process.exit(1);
}

function onUnhandledRejection(reason: unknown): void {
  if (isRecoverableBrowserError(reason)) {
    logger?.warn(`Recoverable browser error (unhandled rejection): ${messageOf(reason)}`);
    return;
  }
  logger?.error('Unhandled Promise Rejection:', reason);
}

export function installProcessErrorHandler(winstonLogger: WinstonLogger): void {
  if (isHandlerInstalled) {
    return;
  }
  logger = winstonLogger;
  isHandlerInstalled = true;

  process.on('uncaughtException', onUncaughtException);
  process.on('unhandledRejection', onUnhandledRejection);
  logger.debug('Process error handlers installed');
}

export function uninstallProcessErrorHandler(): void {
  if (!isHandlerInstalled) {
    return;
  }
  process.off('uncaughtException', onUncaughtException);
  process.off('unhandledRejection', onUnhandledRejection);
  isHandlerInstalled = false;
  logger = null;
}
