/**
 * @fileoverview Error taxonomy for swingta.
 *
 * Structured error classes with machine-readable codes and contextual data.
 * Every error extends SwingtaError and carries:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * Insufficient input is normally signalled by an `undefined` result rather than
 * a throw; InsufficientDataError exists for callers that want a hard failure.
 *
 * @module @swingta/contracts/errors
 */

/**
 * Base error class for all swingta errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new SwingtaError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class SwingtaError extends Error {
  /**
   * Machine-readable error code (e.g., 'INVALID_PARAMETER').
   */
  public readonly code: string;

  /**
   * Structured error data for debugging.
   */
  public readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when the error was created.
   */
  public readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes the error to a JSON-safe object.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a parameter is supplied explicitly with a value outside its domain
 * (non-positive length, negative offset, mismatched series lengths, ...).
 *
 * Absent parameters never raise this; they fall back to documented defaults.
 *
 * @example
 * ```typescript
 * throw new InvalidParameterError('legs must be a positive integer', {
 *   parameter: 'legs',
 *   value: 0,
 *   constraint: '> 0',
 * });
 * ```
 */
export class InvalidParameterError extends SwingtaError {
  constructor(
    message: string,
    data: {
      parameter: string;
      value: unknown;
      constraint: string;
      [key: string]: unknown;
    }
  ) {
    super('INVALID_PARAMETER', message, data);
  }
}

/**
 * Thrown when a caller demands a result but the series is too short.
 *
 * @example
 * ```typescript
 * throw new InsufficientDataError('zigzag needs at least 11 bars', {
 *   required: 11,
 *   received: 5,
 * });
 * ```
 */
export class InsufficientDataError extends SwingtaError {
  constructor(
    message: string,
    data: {
      required: number;
      received: number;
      [key: string]: unknown;
    }
  ) {
    super('INSUFFICIENT_DATA', message, data);
  }
}

/**
 * Thrown when runtime configuration fails validation.
 */
export class ConfigurationError extends SwingtaError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIGURATION_INVALID', message, data);
  }
}

/**
 * Type guard for SwingtaError.
 */
export function isSwingtaError(error: unknown): error is SwingtaError {
  return error instanceof SwingtaError;
}

export function isInvalidParameterError(error: unknown): error is InvalidParameterError {
  return error instanceof InvalidParameterError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
