import { describe, expect, it } from 'vitest';

import {
  currencyDecimals,
  formatMinorUnits,
  formatMoney,
  parseMinorUnits,
  toMinorUnits,
} from '../money.js';

describe('money helpers', () => {
  describe('parseMinorUnits', () => {
    it('parses plain decimals into minor units', () => {
      expect(parseMinorUnits('333.33', 'INR')).toBe(33333);
      expect(parseMinorUnits('900', 'INR')).toBe(90000);
      expect(parseMinorUnits('12.5', 'USD')).toBe(1250);
      expect(parseMinorUnits('-12.5', 'USD')).toBe(-1250);
    });

    it('rounds extra fraction digits half-up', () => {
      expect(parseMinorUnits('12.345', 'USD')).toBe(1235);
      expect(parseMinorUnits('12.344', 'USD')).toBe(1234);
      expect(parseMinorUnits('900.6', 'JPY')).toBe(901);
    });

    it('returns null for text that is not a plain decimal', () => {
      expect(parseMinorUnits('abc', 'USD')).toBeNull();
      expect(parseMinorUnits('1.2.3', 'USD')).toBeNull();
      expect(parseMinorUnits('', 'USD')).toBeNull();
    });

    it('never returns negative zero', () => {
      expect(Object.is(parseMinorUnits('-0', 'USD'), 0)).toBe(true);
    });
  });

  describe('toMinorUnits', () => {
    it('accepts numbers', () => {
      expect(toMinorUnits(12.5, 'USD')).toBe(1250);
      expect(toMinorUnits(1000, 'INR')).toBe(100000);
    });

    it('strips symbols and thousands separators from text', () => {
      expect(toMinorUnits('₹1,250.50', 'INR')).toBe(125050);
      expect(toMinorUnits('$ 40', 'USD')).toBe(4000);
    });

    it('returns null for unreadable values', () => {
      expect(toMinorUnits(null, 'USD')).toBeNull();
      expect(toMinorUnits('lunch', 'USD')).toBeNull();
      expect(toMinorUnits(Number.NaN, 'USD')).toBeNull();
      expect(toMinorUnits(1e21, 'USD')).toBeNull();
    });
  });

  describe('formatting', () => {
    it('knows zero-decimal currencies', () => {
      expect(currencyDecimals('JPY')).toBe(0);
      expect(currencyDecimals('usd')).toBe(2);
      expect(currencyDecimals('XYZ')).toBe(2);
    });

    it('formats minor units as decimal text', () => {
      expect(formatMinorUnits(33333, 'USD')).toBe('333.33');
      expect(formatMinorUnits(5, 'USD')).toBe('0.05');
      expect(formatMinorUnits(-1250, 'EUR')).toBe('-12.50');
      expect(formatMinorUnits(900, 'JPY')).toBe('900');
    });

    it('prefixes the currency symbol', () => {
      expect(formatMoney(33333, 'INR')).toBe('₹333.33');
      expect(formatMoney(-1250, 'USD')).toBe('-$12.50');
      expect(formatMoney(100, 'XYZ')).toBe('XYZ 1.00');
    });
  });
});
