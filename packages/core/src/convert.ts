/**
 * @fileoverview Function-style conversion API.
 *
 * Thin named wrappers over {@link Roman} and {@link BalancedTernary} for
 * callers that prefer free functions to methods (the CLI, for one).
 *
 * @module @numerals/core/convert
 */

import { Roman } from './roman.js';
import { BalancedTernary } from './balanced-ternary.js';

/**
 * @throws {InvalidNumeralTextError} At the first non-numeral character
 *
 * @example
 * ```typescript
 * parseRoman('XIIA')  // throws InvalidNumeralTextError (position 3)
 * ```
 */
export function parseRoman(text: string): Roman {
  return Roman.parse(text);
}

/**
 * @throws {NumeralOverflowError} If the value leaves the 16-bit range
 */
export function decodeRoman(roman: Roman): number {
  return roman.value();
}

/**
 * @returns The value, or null on 16-bit overflow
 */
export function decodeRomanChecked(roman: Roman): number | null {
  return roman.valueChecked();
}

/**
 * @throws {NonPositiveInputError} If value <= 0
 * @throws {NumeralRangeError} If value is not an integer or exceeds 32767
 */
export function encodeRoman(value: number): Roman {
  return Roman.fromInteger(value);
}

export function renderRomanUpper(roman: Roman): string {
  return roman.toUpperCase();
}

export function renderRomanLower(roman: Roman): string {
  return roman.toLowerCase();
}

/**
 * @throws {InvalidNumeralTextError} At the first character other than '-', '0', '+'
 */
export function parseBalancedTernary(text: string): BalancedTernary {
  return BalancedTernary.parse(text);
}

/**
 * @throws {NumeralOverflowError} If the value leaves the safe-integer range
 */
export function decodeBalancedTernary(ternary: BalancedTernary): number {
  return ternary.value();
}

export function decodeBalancedTernaryChecked(ternary: BalancedTernary): number | null {
  return ternary.valueChecked();
}

/**
 * @throws {NumeralRangeError} If value is not a safe integer
 */
export function encodeBalancedTernary(value: number): BalancedTernary {
  return BalancedTernary.fromInteger(value);
}

export function renderBalancedTernary(ternary: BalancedTernary): string {
  return ternary.toString();
}
