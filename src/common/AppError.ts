/**
 * @file Defines the custom error class used for failures the detector reports
 * to its caller (as opposed to failures it absorbs into a result).
 */

/**
 * Additional details carried by an {@link AppError}.
 * @property errorCode - A stable code identifying the failure (e.g. 'BROWSER_LAUNCH_FAILED').
 * @property isOperational - True for expected runtime failures, false for programmer errors.
 * @property originalError - The underlying error when this one wraps another.
 */
export interface AppErrorDetails {
  errorCode?: string;
  isOperational?: boolean;
  originalError?: Error;
  [key: string]: unknown;
}

/**
 * Error with a code and operational flag attached.
 */
export class AppError extends Error {
  public readonly details?: AppErrorDetails;

  constructor(message: string, details?: AppErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;

    // Keeps the AppError constructor itself out of the V8 stack trace.
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** The error code, or 'UNKNOWN_ERROR' when none was given. */
  get code(): string {
    return this.details?.errorCode ?? 'UNKNOWN_ERROR';
  }
}

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }
  return new Error(typeof thrown === 'string' ? thrown : String(thrown));
}
