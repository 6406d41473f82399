/**
 * @fileoverview Roman numeral value converter.
 *
 * A Roman value is an ordered sequence of numeral symbols. Any sequence can be
 * decoded, canonical or not: decoding walks the symbols right to left and
 * subtracts a symbol whenever a heavier one has already been seen. Encoding
 * produces the canonical subtractive form greedily.
 *
 * All arithmetic runs in the 16-bit signed domain ({@link ROMAN_DOMAIN}).
 *
 * @module @numerals/core/roman
 */

import {
  Notation,
  ROMAN_DOMAIN,
  checkedAdd,
  InvalidNumeralTextError,
  NonPositiveInputError,
  NumeralOverflowError,
  NumeralRangeError,
} from '@numerals/contracts';
import { Numeral, numeralFromChar, numeralToChar, numeralWeight } from './numeral.js';
import type { LetterCase } from './numeral.js';

/**
 * (secondary, primary) pairs walked by the encoder, largest first.
 * Writing secondary before primary denotes primary - secondary.
 *
 * @internal
 */
const SUBTRACTIVE_PAIRS: ReadonlyArray<readonly [Numeral, Numeral]> = [
  [Numeral.C, Numeral.M],
  [Numeral.C, Numeral.D],
  [Numeral.X, Numeral.C],
  [Numeral.X, Numeral.L],
  [Numeral.I, Numeral.X],
  [Numeral.I, Numeral.V],
];

/**
 * Immutable sequence of Roman numeral symbols.
 *
 * @invariant numerals is frozen after construction
 *
 * @example
 * ```typescript
 * const roman = Roman.parse('mcmxciv');
 * roman.value();        // 1994
 * roman.toUpperCase();  // 'MCMXCIV'
 *
 * Roman.fromInteger(134).toLowerCase();  // 'cxxxiv'
 * ```
 */
export class Roman {
  /** Symbols in written order. */
  readonly numerals: readonly Numeral[];

  constructor(numerals: readonly Numeral[]) {
    this.numerals = Object.freeze([...numerals]);
  }

  /**
   * Parses text into a symbol sequence, one symbol per character.
   *
   * Letters are matched case-insensitively. Empty text yields an empty sequence.
   *
   * @throws {InvalidNumeralTextError} At the first character that is not a numeral
   */
  static parse(text: string): Roman {
    const numerals: Numeral[] = [];
    let position = 0;

    for (const char of text) {
      const numeral = numeralFromChar(char);
      if (numeral === null) {
        throw new InvalidNumeralTextError(
          `Invalid roman numeral character "${char}" at position ${position}`,
          { position, character: char, notation: Notation.Roman }
        );
      }
      numerals.push(numeral);
      position++;
    }

    return new Roman(numerals);
  }

  /**
   * Builds the canonical sequence for a positive integer.
   *
   * Values above a few thousand are encodable; they become long runs of M.
   *
   * @throws {NonPositiveInputError} If value <= 0
   * @throws {NumeralRangeError} If value is not an integer or exceeds the 16-bit range
   *
   * @example
   * ```typescript
   * Roman.fromInteger(1994).toString()  // 'MCMXCIV'
   * Roman.fromInteger(4).toString()     // 'IV'
   * ```
   */
  static fromInteger(value: number): Roman {
    if (!Number.isInteger(value)) {
      throw new NumeralRangeError(`Cannot encode non-integer ${value} as a roman numeral`, {
        value,
        min: 1,
        max: ROMAN_DOMAIN.max,
      });
    }
    if (value <= 0) {
      throw new NonPositiveInputError(
        `Cannot encode ${value} as a roman numeral: value must be positive`,
        { value }
      );
    }
    if (value > ROMAN_DOMAIN.max) {
      throw new NumeralRangeError(
        `Cannot encode ${value} as a roman numeral: value exceeds ${ROMAN_DOMAIN.max}`,
        { value, min: 1, max: ROMAN_DOMAIN.max }
      );
    }

    const numerals: Numeral[] = [];
    let remaining = value;

    for (const [secondary, primary] of SUBTRACTIVE_PAIRS) {
      const primaryWeight = numeralWeight(primary);
      while (remaining >= primaryWeight) {
        remaining -= primaryWeight;
        numerals.push(primary);
      }

      const difference = primaryWeight - numeralWeight(secondary);
      if (remaining >= difference) {
        remaining -= difference;
        numerals.push(secondary, primary);
      }
    }

    // At most three units remain once IV has been considered
    for (; remaining > 0; remaining--) {
      numerals.push(Numeral.I);
    }

    return new Roman(numerals);
  }

  /** Number of symbols in the sequence. */
  get length(): number {
    return this.numerals.length;
  }

  /**
   * Decodes the sequence to an integer.
   *
   * @throws {NumeralOverflowError} If any running total leaves the 16-bit range
   */
  value(): number {
    const total = this.accumulate();
    if (total === null) {
      throw new NumeralOverflowError(
        `Roman numeral "${this.toUpperCase()}" overflows the range ${ROMAN_DOMAIN.min}..${ROMAN_DOMAIN.max}`,
        { notation: Notation.Roman, min: ROMAN_DOMAIN.min, max: ROMAN_DOMAIN.max }
      );
    }
    return total;
  }

  /**
   * Decodes the sequence to an integer.
   *
   * @returns The value, or null if any running total leaves the 16-bit range
   */
  valueChecked(): number | null {
    return this.accumulate();
  }

  /** Renders with uppercase letters. */
  toUpperCase(): string {
    return this.render('upper');
  }

  /** Renders with lowercase letters. */
  toLowerCase(): string {
    return this.render('lower');
  }

  toString(): string {
    return this.toUpperCase();
  }

  /**
   * Compares two sequences symbol by symbol.
   */
  equals(other: Roman): boolean {
    return (
      this.numerals.length === other.numerals.length &&
      this.numerals.every((numeral, index) => numeral === other.numerals[index])
    );
  }

  private render(letterCase: LetterCase): string {
    return this.numerals.map((numeral) => numeralToChar(numeral, letterCase)).join('');
  }

  private accumulate(): number | null {
    let total = 0;
    let maxSeen = 0;

    for (const numeral of [...this.numerals].reverse()) {
      const weight = numeralWeight(numeral);
      const next = checkedAdd(total, weight >= maxSeen ? weight : -weight, ROMAN_DOMAIN);
      if (next === null) {
        return null;
      }
      total = next;
      maxSeen = Math.max(maxSeen, weight);
    }

    return total;
  }
}
