/**
 * @fileoverview Roman numeral symbol table.
 *
 * Maps between characters, numeral symbols and their fixed integer weights.
 * Input characters are matched case-insensitively; output case is chosen
 * by the caller.
 *
 * @module @numerals/core/numeral
 */

/**
 * The seven atomic Roman numeral symbols.
 *
 * Enum order carries no meaning; use {@link numeralWeight} to compare symbols.
 */
export enum Numeral {
  I = 'I',
  V = 'V',
  X = 'X',
  L = 'L',
  C = 'C',
  D = 'D',
  M = 'M',
}

/**
 * Letter case used when rendering symbols.
 */
export type LetterCase = 'upper' | 'lower';

/**
 * @internal
 */
const NUMERAL_WEIGHTS: Record<Numeral, number> = {
  [Numeral.I]: 1,
  [Numeral.V]: 5,
  [Numeral.X]: 10,
  [Numeral.L]: 50,
  [Numeral.C]: 100,
  [Numeral.D]: 500,
  [Numeral.M]: 1000,
};

/**
 * Uppercase and lowercase character of each symbol.
 *
 * @internal
 */
const NUMERAL_CHARS: Record<Numeral, Record<LetterCase, string>> = {
  [Numeral.I]: { upper: 'I', lower: 'i' },
  [Numeral.V]: { upper: 'V', lower: 'v' },
  [Numeral.X]: { upper: 'X', lower: 'x' },
  [Numeral.L]: { upper: 'L', lower: 'l' },
  [Numeral.C]: { upper: 'C', lower: 'c' },
  [Numeral.D]: { upper: 'D', lower: 'd' },
  [Numeral.M]: { upper: 'M', lower: 'm' },
};

/**
 * Reverse lookup from accepted input characters to symbols.
 *
 * @internal
 */
const CHAR_TO_NUMERAL: ReadonlyMap<string, Numeral> = new Map(
  Object.values(Numeral).flatMap((numeral): Array<[string, Numeral]> => [
    [NUMERAL_CHARS[numeral].upper, numeral],
    [NUMERAL_CHARS[numeral].lower, numeral],
  ])
);

/**
 * Gets the integer weight of a symbol.
 *
 * @example
 * ```typescript
 * numeralWeight(Numeral.X)  // 10
 * numeralWeight(Numeral.M)  // 1000
 * ```
 */
export function numeralWeight(numeral: Numeral): number {
  return NUMERAL_WEIGHTS[numeral];
}

/**
 * Maps a single character to its symbol, ignoring case.
 *
 * @param char - One character
 * @returns The matching symbol, or null if the character is not a numeral
 *
 * @example
 * ```typescript
 * numeralFromChar('x')  // Numeral.X
 * numeralFromChar('M')  // Numeral.M
 * numeralFromChar('A')  // null
 * ```
 */
export function numeralFromChar(char: string): Numeral | null {
  return CHAR_TO_NUMERAL.get(char) ?? null;
}

/**
 * Renders a symbol as a character in the requested case.
 *
 * @example
 * ```typescript
 * numeralToChar(Numeral.C, 'upper')  // 'C'
 * numeralToChar(Numeral.C, 'lower')  // 'c'
 * ```
 */
export function numeralToChar(numeral: Numeral, letterCase: LetterCase): string {
  return NUMERAL_CHARS[numeral][letterCase];
}

/**
 * Validates whether a string is a Numeral enum value.
 */
export function isNumeral(value: string): value is Numeral {
  return Object.values(Numeral).some((numeral) => numeral === value);
}
