/**
 * @fileoverview Balanced ternary digit table.
 *
 * @module @numerals/core/trit
 */

/**
 * A balanced ternary digit.
 */
export enum Trit {
  Minus = '-',
  Zero = '0',
  Plus = '+',
}

/**
 * @internal
 */
const TRIT_VALUES: Record<Trit, number> = {
  [Trit.Minus]: -1,
  [Trit.Zero]: 0,
  [Trit.Plus]: 1,
};

/**
 * Gets the digit value of a trit (-1, 0 or 1).
 */
export function tritValue(trit: Trit): number {
  return TRIT_VALUES[trit];
}

/**
 * Maps a character to its trit.
 *
 * @returns The trit, or null for anything other than '-', '0' or '+'
 */
export function tritFromChar(char: string): Trit | null {
  switch (char) {
    case '-':
      return Trit.Minus;
    case '0':
      return Trit.Zero;
    case '+':
      return Trit.Plus;
    default:
      return null;
  }
}

export function tritToChar(trit: Trit): string {
  return trit;
}
