/**
 * @fileoverview Tests for balanced ternary conversion.
 */

import { describe, it, expect } from 'vitest';
import { InvalidNumeralTextError, NumeralOverflowError, NumeralRangeError } from '@numerals/contracts';
import { BalancedTernary } from '../src/balanced-ternary.js';
import { Trit, tritFromChar, tritToChar, tritValue } from '../src/trit.js';

describe('Trit', () => {
  it('should map characters to trits', () => {
    expect(tritFromChar('-')).toBe(Trit.Minus);
    expect(tritFromChar('0')).toBe(Trit.Zero);
    expect(tritFromChar('+')).toBe(Trit.Plus);
    expect(tritFromChar('1')).toBeNull();
    expect(tritFromChar('')).toBeNull();
  });

  it('should expose digit values and characters', () => {
    expect(tritValue(Trit.Minus)).toBe(-1);
    expect(tritValue(Trit.Zero)).toBe(0);
    expect(tritValue(Trit.Plus)).toBe(1);
    expect(tritToChar(Trit.Minus)).toBe('-');
    expect(tritToChar(Trit.Plus)).toBe('+');
  });
});

describe('BalancedTernary', () => {
  describe('fromInteger', () => {
    it('should encode sample values', () => {
      expect(BalancedTernary.fromInteger(1).toString()).toBe('+');
      expect(BalancedTernary.fromInteger(2).toString()).toBe('+-');
      expect(BalancedTernary.fromInteger(3).toString()).toBe('+0');
      expect(BalancedTernary.fromInteger(8).toString()).toBe('+0-');
      expect(BalancedTernary.fromInteger(-1).toString()).toBe('-');
      expect(BalancedTernary.fromInteger(-8).toString()).toBe('-0+');
    });

    it('should encode zero as the empty sequence', () => {
      const zero = BalancedTernary.fromInteger(0);
      expect(zero.length).toBe(0);
      expect(zero.toString()).toBe('');
    });

    it('should reject values that are not safe integers', () => {
      expect(() => BalancedTernary.fromInteger(0.5)).toThrowError(NumeralRangeError);
      expect(() => BalancedTernary.fromInteger(Number.MAX_SAFE_INTEGER + 1)).toThrowError(
        NumeralRangeError
      );
    });

    it('should encode the safe-integer bounds', () => {
      const max = BalancedTernary.fromInteger(Number.MAX_SAFE_INTEGER);
      const min = BalancedTernary.fromInteger(Number.MIN_SAFE_INTEGER);
      expect(max.value()).toBe(Number.MAX_SAFE_INTEGER);
      expect(min.value()).toBe(Number.MIN_SAFE_INTEGER);
    });

    it('should round-trip a symmetric range of values', () => {
      for (let n = -4321; n <= 4321; n++) {
        expect(BalancedTernary.fromInteger(n).value()).toBe(n);
      }
    });
  });

  describe('parse', () => {
    it('should parse digits in order', () => {
      expect(BalancedTernary.parse('+0-').trits).toEqual([Trit.Plus, Trit.Zero, Trit.Minus]);
      expect(BalancedTernary.parse('+0-').value()).toBe(8);
    });

    it('should accept leading zeros', () => {
      expect(BalancedTernary.parse('00+').value()).toBe(1);
    });

    it('should parse empty text as zero', () => {
      expect(BalancedTernary.parse('').value()).toBe(0);
    });

    it('should reject invalid characters with position', () => {
      expect(() => BalancedTernary.parse('+0x-')).toThrowError(
        'Invalid balanced ternary character "x" at position 2'
      );
      expect(() => BalancedTernary.parse('1')).toThrowError(InvalidNumeralTextError);
    });
  });

  describe('value', () => {
    const tooLong = '+'.repeat(40);

    it('should throw when the value leaves the safe-integer range', () => {
      expect(() => BalancedTernary.parse(tooLong).value()).toThrowError(NumeralOverflowError);
    });

    it('should return null from the checked variant', () => {
      expect(BalancedTernary.parse(tooLong).valueChecked()).toBeNull();
      expect(BalancedTernary.parse('+-').valueChecked()).toBe(2);
    });
  });

  describe('equals', () => {
    it('should compare digit by digit', () => {
      expect(BalancedTernary.parse('+0').equals(BalancedTernary.fromInteger(3))).toBe(true);
      expect(BalancedTernary.parse('0+0').equals(BalancedTernary.fromInteger(3))).toBe(false);
    });
  });
});
