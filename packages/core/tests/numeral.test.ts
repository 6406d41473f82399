/**
 * @fileoverview Tests for the Roman numeral symbol table.
 */

import { describe, it, expect } from 'vitest';
import { Numeral, numeralWeight, numeralFromChar, numeralToChar, isNumeral } from '../src/numeral.js';

describe('Numeral', () => {
  it('should have all seven symbols', () => {
    expect(Object.values(Numeral)).toEqual(['I', 'V', 'X', 'L', 'C', 'D', 'M']);
  });

  describe('numeralWeight', () => {
    it('should return the fixed weight of each symbol', () => {
      expect(numeralWeight(Numeral.I)).toBe(1);
      expect(numeralWeight(Numeral.V)).toBe(5);
      expect(numeralWeight(Numeral.X)).toBe(10);
      expect(numeralWeight(Numeral.L)).toBe(50);
      expect(numeralWeight(Numeral.C)).toBe(100);
      expect(numeralWeight(Numeral.D)).toBe(500);
      expect(numeralWeight(Numeral.M)).toBe(1000);
    });
  });

  describe('numeralFromChar', () => {
    it('should accept uppercase letters', () => {
      expect(numeralFromChar('I')).toBe(Numeral.I);
      expect(numeralFromChar('D')).toBe(Numeral.D);
      expect(numeralFromChar('M')).toBe(Numeral.M);
    });

    it('should accept lowercase letters', () => {
      expect(numeralFromChar('v')).toBe(Numeral.V);
      expect(numeralFromChar('l')).toBe(Numeral.L);
      expect(numeralFromChar('c')).toBe(Numeral.C);
    });

    it('should return null for other characters', () => {
      expect(numeralFromChar('A')).toBeNull();
      expect(numeralFromChar('1')).toBeNull();
      expect(numeralFromChar(' ')).toBeNull();
      expect(numeralFromChar('')).toBeNull();
      expect(numeralFromChar('XI')).toBeNull();
    });
  });

  describe('numeralToChar', () => {
    it('should render in the requested case', () => {
      expect(numeralToChar(Numeral.X, 'upper')).toBe('X');
      expect(numeralToChar(Numeral.X, 'lower')).toBe('x');
      expect(numeralToChar(Numeral.M, 'lower')).toBe('m');
    });

    it('should round-trip through numeralFromChar', () => {
      for (const numeral of Object.values(Numeral)) {
        expect(numeralFromChar(numeralToChar(numeral, 'upper'))).toBe(numeral);
        expect(numeralFromChar(numeralToChar(numeral, 'lower'))).toBe(numeral);
      }
    });
  });

  describe('isNumeral', () => {
    it('should recognize enum values only', () => {
      expect(isNumeral('X')).toBe(true);
      expect(isNumeral('x')).toBe(false);
      expect(isNumeral('Q')).toBe(false);
    });
  });
});
