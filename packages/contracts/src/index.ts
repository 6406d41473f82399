/**
 * @fileoverview Main entry point for @numerals/contracts package.
 *
 * Exports the error taxonomy and the integer domains shared by every
 * numerals package.
 *
 * @module @numerals/contracts
 */

// Notations and integer domains
export {
  Notation,
  INT16_MIN,
  INT16_MAX,
  ROMAN_DOMAIN,
  BALANCED_TERNARY_DOMAIN,
  isInDomain,
  checkedAdd,
  checkedMultiply,
} from './domain.js';

export type { IntegerDomain } from './domain.js';

// Error classes and guards
export {
  NumeralsError,
  InvalidNumeralTextError,
  NonPositiveInputError,
  NumeralOverflowError,
  NumeralRangeError,
  ConfigError,
  isNumeralsError,
  isInvalidNumeralTextError,
  isNonPositiveInputError,
  isNumeralOverflowError,
  isNumeralRangeError,
  isConfigError,
} from './errors.js';
