/**
 * @fileoverview Integer domains and notation identifiers for the numerals suite.
 *
 * Roman numerals are computed in a fixed-width 16-bit signed domain so that
 * overflow is detectable. Balanced ternary uses the safe-integer range of
 * JavaScript numbers.
 *
 * @module @numerals/contracts/domain
 */

/**
 * Supported numeral notations.
 */
export enum Notation {
  /** Subtractive symbol notation (I, V, X, L, C, D, M) */
  Roman = 'roman',
  /** Base-3 positional notation with digits -1, 0, +1 */
  BalancedTernary = 'balanced-ternary',
}

/**
 * Inclusive integer bounds.
 *
 * @invariant min <= 0 <= max
 */
export interface IntegerDomain {
  readonly min: number;
  readonly max: number;
}

/** Smallest 16-bit signed integer. */
export const INT16_MIN = -32768;

/** Largest 16-bit signed integer. */
export const INT16_MAX = 32767;

/**
 * Value domain of Roman numeral computations.
 */
export const ROMAN_DOMAIN: IntegerDomain = { min: INT16_MIN, max: INT16_MAX };

/**
 * Value domain of balanced ternary computations.
 */
export const BALANCED_TERNARY_DOMAIN: IntegerDomain = {
  min: Number.MIN_SAFE_INTEGER,
  max: Number.MAX_SAFE_INTEGER,
};

/**
 * Checks whether a value is an integer inside a domain.
 *
 * @example
 * ```typescript
 * isInDomain(32767, ROMAN_DOMAIN)  // true
 * isInDomain(32768, ROMAN_DOMAIN)  // false
 * isInDomain(1.5, ROMAN_DOMAIN)    // false
 * ```
 */
export function isInDomain(value: number, domain: IntegerDomain): boolean {
  return Number.isInteger(value) && value >= domain.min && value <= domain.max;
}

/**
 * Adds two integers, returning null when the sum leaves the domain.
 *
 * Used as the single overflow check for every running total, so checked
 * and unchecked decoders agree on which inputs overflow.
 *
 * @example
 * ```typescript
 * checkedAdd(32000, 700, ROMAN_DOMAIN)   // 32700
 * checkedAdd(32000, 1000, ROMAN_DOMAIN)  // null
 * ```
 */
export function checkedAdd(a: number, b: number, domain: IntegerDomain): number | null {
  const sum = a + b;
  return isInDomain(sum, domain) ? sum : null;
}

/**
 * Multiplies two integers, returning null when the product leaves the domain.
 */
export function checkedMultiply(a: number, b: number, domain: IntegerDomain): number | null {
  const product = a * b;
  return isInDomain(product, domain) ? product : null;
}
