/**
 * @fileoverview Balanced ternary converter.
 *
 * Fixed positional base 3 with digits -1, 0, +1, most significant first.
 * Every integer, including zero and negatives, has a representation; zero is
 * the empty sequence.
 *
 * @module @numerals/core/balanced-ternary
 */

import {
  Notation,
  BALANCED_TERNARY_DOMAIN,
  checkedAdd,
  checkedMultiply,
  isInDomain,
  InvalidNumeralTextError,
  NumeralOverflowError,
  NumeralRangeError,
} from '@numerals/contracts';
import { Trit, tritFromChar, tritToChar, tritValue } from './trit.js';

/**
 * Immutable sequence of balanced ternary digits.
 *
 * @example
 * ```typescript
 * BalancedTernary.fromInteger(8).toString();  // '+0-'
 * BalancedTernary.parse('-0+').value();       // -8
 * ```
 */
export class BalancedTernary {
  /** Digits, most significant first. */
  readonly trits: readonly Trit[];

  constructor(trits: readonly Trit[]) {
    this.trits = Object.freeze([...trits]);
  }

  /**
   * Parses text of '-', '0' and '+' characters.
   *
   * @throws {InvalidNumeralTextError} At the first character that is not a trit
   */
  static parse(text: string): BalancedTernary {
    const trits: Trit[] = [];
    let position = 0;

    for (const char of text) {
      const trit = tritFromChar(char);
      if (trit === null) {
        throw new InvalidNumeralTextError(
          `Invalid balanced ternary character "${char}" at position ${position}`,
          { position, character: char, notation: Notation.BalancedTernary }
        );
      }
      trits.push(trit);
      position++;
    }

    return new BalancedTernary(trits);
  }

  /**
   * Encodes any safe integer.
   *
   * @throws {NumeralRangeError} If value is not a safe integer
   */
  static fromInteger(value: number): BalancedTernary {
    if (!isInDomain(value, BALANCED_TERNARY_DOMAIN)) {
      throw new NumeralRangeError(`Cannot encode ${value} as balanced ternary: not a safe integer`, {
        value,
        min: BALANCED_TERNARY_DOMAIN.min,
        max: BALANCED_TERNARY_DOMAIN.max,
      });
    }

    const trits: Trit[] = [];
    let remaining = value;

    while (remaining !== 0) {
      const remainder = ((remaining % 3) + 3) % 3;
      if (remainder === 0) {
        trits.push(Trit.Zero);
      } else if (remainder === 1) {
        trits.push(Trit.Plus);
        remaining -= 1;
      } else {
        // 2 is written as 3 - 1: carry one into the next digit
        trits.push(Trit.Minus);
        remaining += 1;
      }
      remaining /= 3;
    }

    return new BalancedTernary(trits.reverse());
  }

  /** Number of digits. */
  get length(): number {
    return this.trits.length;
  }

  /**
   * Decodes the digits to an integer.
   *
   * @throws {NumeralOverflowError} If the value leaves the safe-integer range
   */
  value(): number {
    const total = this.accumulate();
    if (total === null) {
      throw new NumeralOverflowError('Balanced ternary value exceeds the safe-integer range', {
        notation: Notation.BalancedTernary,
        min: BALANCED_TERNARY_DOMAIN.min,
        max: BALANCED_TERNARY_DOMAIN.max,
        length: this.trits.length,
      });
    }
    return total;
  }

  /**
   * Decodes the digits to an integer, or null if the value leaves the
   * safe-integer range.
   */
  valueChecked(): number | null {
    return this.accumulate();
  }

  toString(): string {
    return this.trits.map(tritToChar).join('');
  }

  equals(other: BalancedTernary): boolean {
    return (
      this.trits.length === other.trits.length &&
      this.trits.every((trit, index) => trit === other.trits[index])
    );
  }

  private accumulate(): number | null {
    let total = 0;

    for (const trit of this.trits) {
      const shifted = checkedMultiply(total, 3, BALANCED_TERNARY_DOMAIN);
      if (shifted === null) {
        return null;
      }
      const next = checkedAdd(shifted, tritValue(trit), BALANCED_TERNARY_DOMAIN);
      if (next === null) {
        return null;
      }
      total = next;
    }

    return total;
  }
}
