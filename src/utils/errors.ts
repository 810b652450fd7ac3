/**
 * Error types for pgvector-wire.
 *
 * All errors extend from VectorWireError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 *
 * ## Usage
 *
 * ```typescript
 * import { FormatError, RegistrationError } from './errors.js';
 *
 * throw new FormatError('expected 12 bytes; got 8', 'LENGTH_MISMATCH');
 *
 * try {
 *   await client.query(sql, params);
 * } catch (err) {
 *   throw new RegistrationError('Type lookup failed', 'TYPE_LOOKUP_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all pgvector-wire errors.
 */
export class VectorWireError extends Error {
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
      if (this.cause instanceof VectorWireError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Codec Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Bytes or buffers that do not match the layout of the requested vector kind.
 *
 * Common codes:
 * - `TRUNCATED_HEADER`: Buffer shorter than the wire header
 * - `LENGTH_MISMATCH`: Buffer length disagrees with the declared dimensions
 * - `NNZ_MISMATCH`: Sparse indices and values describe different entry counts
 * - `MISALIGNED_BUFFER`: Buffer length is not a multiple of the item width
 * - `INDEX_OUT_OF_RANGE`: Sparse index outside `[0, dimensions)`
 * - `FIELD_OUT_OF_RANGE`: Header integer does not fit its field
 * - `VALUE_OUT_OF_RANGE`: Float too large for the target width
 * - `INVALID_TEXT`: Text output of a vector type could not be parsed
 * - `INVALID_HEX`: CLI input is not a hex string
 */
export class FormatError extends VectorWireError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * A value handed to an encoder is not something it knows how to encode.
 *
 * Common codes:
 * - `UNSUPPORTED_TYPE`: Value is not a vector, a float list or absent
 * - `UNSUPPORTED_ITEM_TYPE`: A list item is not a number
 * - `KIND_MISMATCH`: Vector of another kind offered to a codec
 */
export class VectorTypeError extends VectorWireError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Integration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_INVALID`: Configuration validation failed
 * - `INVALID_VALUE`: Field value is invalid
 */
export class ConfigError extends VectorWireError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * Errors while binding codecs to a database client.
 *
 * Common codes:
 * - `TYPE_LOOKUP_FAILED`: The pg_type query failed or returned malformed rows
 * - `TYPE_NOT_FOUND`: A requested type does not exist in the schema
 */
export class RegistrationError extends VectorWireError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a pgvector-wire error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof VectorWireError && error.code === code;
}

export function isFormatError(error: unknown): error is FormatError {
  return error instanceof FormatError;
}

export function isVectorTypeError(error: unknown): error is VectorTypeError {
  return error instanceof VectorTypeError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

export function isRegistrationError(error: unknown): error is RegistrationError {
  return error instanceof RegistrationError;
}

/**
 * Wrap an unknown error in a VectorWireError.
 *
 * If the error is already a VectorWireError, returns it unchanged.
 * Otherwise wraps it in a new VectorWireError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): VectorWireError {
  if (error instanceof VectorWireError) {
    return error;
  }

  const errorMessage = message ?? (error instanceof Error ? error.message : String(error));
  return new VectorWireError(errorMessage, 'UNKNOWN', error);
}

/**
 * Name the runtime type of a value for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') {
    const name = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === 'string' && name.length > 0 ? name : 'object';
  }
  return typeof value;
}
