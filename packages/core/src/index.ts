/**
 * @fileoverview Main entry point for @numerals/core package.
 *
 * Conversion between integers, Roman numerals and balanced ternary.
 *
 * @module @numerals/core
 */

// Roman numeral symbol table
export { Numeral, numeralWeight, numeralFromChar, numeralToChar, isNumeral } from './numeral.js';
export type { LetterCase } from './numeral.js';

// Roman value converter
export { Roman } from './roman.js';

// Balanced ternary
export { Trit, tritValue, tritFromChar, tritToChar } from './trit.js';
export { BalancedTernary } from './balanced-ternary.js';

// Function-style API
export {
  parseRoman,
  decodeRoman,
  decodeRomanChecked,
  encodeRoman,
  renderRomanUpper,
  renderRomanLower,
  parseBalancedTernary,
  decodeBalancedTernary,
  decodeBalancedTernaryChecked,
  encodeBalancedTernary,
  renderBalancedTernary,
} from './convert.js';
