/**
 * @fileoverview Error taxonomy for the numerals suite.
 *
 * Defines a hierarchy of structured error classes with machine-readable codes
 * and contextual data.
 *
 * All errors extend the NumeralsError base class and include:
 * - Unique error code (string constant)
 * - Structured data payload
 * - ISO timestamp
 *
 * @module @numerals/contracts/errors
 */

import type { Notation } from './domain.js';

/**
 * Base error class for all numerals suite errors.
 *
 * Extends native Error with structured fields for machine processing.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new NumeralsError('CUSTOM_ERROR', 'Something went wrong', { context: 'value' });
 * ```
 */
export class NumeralsError extends Error {
  /**
   * Machine-readable error code (e.g., 'NUMERAL_OVERFLOW').
   */
  readonly code: string;

  /**
   * Structured error data. Format varies by error type.
   */
  readonly data?: Record<string, unknown>;

  /**
   * ISO 8601 timestamp when error was created.
   */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serializes error to JSON-safe object.
   *
   * @example
   * ```typescript
   * const err = new NumeralsError('TEST', 'Test error');
   * JSON.stringify(err.toJSON());
   * ```
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
 * Thrown when a character of the input text has no symbol mapping.
 *
 * Parsing stops at the first offending character; no partial result is produced.
 *
 * @example
 * ```typescript
 * throw new InvalidNumeralTextError(
 *   'Invalid roman numeral character "A" at position 3',
 *   { position: 3, character: 'A', notation: Notation.Roman }
 * );
 * ```
 */
export class InvalidNumeralTextError extends NumeralsError {
  declare readonly data: {
    position: number;
    character: string;
    notation: Notation;
    [key: string]: unknown;
  };

  /**
   * @param data.position - Zero-based character index of the offending character
   * @param data.character - The offending character
   * @param data.notation - Notation being parsed
   */
  constructor(
    message: string,
    data: { position: number; character: string; notation: Notation; [key: string]: unknown }
  ) {
    super('INVALID_NUMERAL_TEXT', message, data);
  }

  /** Position of the offending character. */
  get position(): number {
    return this.data.position;
  }
}

/**
 * Thrown when encoding an integer that the notation cannot represent
 * because it is zero or negative.
 */
export class NonPositiveInputError extends NumeralsError {
  declare readonly data: { value: number; [key: string]: unknown };

  constructor(message: string, data: { value: number; [key: string]: unknown }) {
    super('NON_POSITIVE_INPUT', message, data);
  }
}

/**
 * Thrown when a decoded value leaves the notation's integer domain.
 *
 * @example
 * ```typescript
 * throw new NumeralOverflowError(
 *   'Roman numeral value exceeds 16-bit range',
 *   { notation: Notation.Roman, min: -32768, max: 32767 }
 * );
 * ```
 */
export class NumeralOverflowError extends NumeralsError {
  declare readonly data: { notation: Notation; min: number; max: number; [key: string]: unknown };

  constructor(
    message: string,
    data: { notation: Notation; min: number; max: number; [key: string]: unknown }
  ) {
    super('NUMERAL_OVERFLOW', message, data);
  }
}

/**
 * Thrown when an encode input is not an integer inside the notation's domain.
 */
export class NumeralRangeError extends NumeralsError {
  declare readonly data: { value: number; min: number; max: number; [key: string]: unknown };

  constructor(message: string, data: { value: number; min: number; max: number; [key: string]: unknown }) {
    super('NUMERAL_RANGE', message, data);
  }
}

/**
 * Thrown when configuration fails validation.
 *
 * @example
 * ```typescript
 * throw new ConfigError('Configuration validation failed', {
 *   issues: ['logging.level: Invalid enum value'],
 * });
 * ```
 */
export class ConfigError extends NumeralsError {
  declare readonly data: { issues: string[]; [key: string]: unknown };

  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIG_INVALID', message, data);
  }
}

/**
 * Type guard to check if an error is a NumeralsError.
 *
 * @example
 * ```typescript
 * try {
 *   parseRoman(input);
 * } catch (err) {
 *   if (isNumeralsError(err)) {
 *     logger.warn('Conversion failed', { error_code: err.code });
 *   }
 * }
 * ```
 */
export function isNumeralsError(error: unknown): error is NumeralsError {
  return error instanceof NumeralsError;
}

export function isInvalidNumeralTextError(error: unknown): error is InvalidNumeralTextError {
  return error instanceof InvalidNumeralTextError;
}

export function isNonPositiveInputError(error: unknown): error is NonPositiveInputError {
  return error instanceof NonPositiveInputError;
}

export function isNumeralOverflowError(error: unknown): error is NumeralOverflowError {
  return error instanceof NumeralOverflowError;
}

export function isNumeralRangeError(error: unknown): error is NumeralRangeError {
  return error instanceof NumeralRangeError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
