/**
 * Standardized error types for disksched.
 *
 * All errors extend from DiskSchedError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { SchedulerError } from './errors.js';
 *
 * throw new SchedulerError('Average seek time needs at least one request', 'EMPTY_INPUT');
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all disksched errors.
 */
export class DiskSchedError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof DiskSchedError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Scheduler Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors raised while deriving metrics from a schedule.
 *
 * Common codes:
 * - `EMPTY_INPUT`: average or throughput requested for zero requests
 */
export class SchedulerError extends DiskSchedError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in user-supplied request lists, head positions or disk sizes.
 *
 * Common codes:
 * - `INVALID_INPUT`: value is not a non-negative integer, or a list is empty
 * - `UNKNOWN_POLICY`: policy name is not one of the four supported
 */
export class InputError extends DiskSchedError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: resolved configuration failed validation
 */
export class ConfigError extends DiskSchedError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a disksched error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof DiskSchedError && error.code === code;
}

export function isSchedulerError(error: unknown): error is SchedulerError {
  return error instanceof SchedulerError;
}

export function isInputError(error: unknown): error is InputError {
  return error instanceof InputError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Wrap an unknown error in a DiskSchedError.
 *
 * If the error is already a DiskSchedError, returns it unchanged.
 * Otherwise wraps it in a new DiskSchedError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): DiskSchedError {
  if (error instanceof DiskSchedError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new DiskSchedError(errorMessage, 'UNKNOWN', error);
}
