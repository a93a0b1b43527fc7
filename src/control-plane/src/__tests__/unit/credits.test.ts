/**
 * Credit amount helper tests
 */

import {
  applyDiscount,
  formatCredits,
  fromMillicredits,
  splitEvenly,
  toMillicredits,
} from '../../utils/credits.js';

describe('credits', () => {
  describe('toMillicredits', () => {
    it('should convert whole and fractional credits', () => {
      expect(toMillicredits(5)).toBe(5000);
      expect(toMillicredits(1.25)).toBe(1250);
      expect(toMillicredits(-0.5)).toBe(-500);
    });

    it('should round half away from zero at the millicredit', () => {
      expect(toMillicredits(0.0025)).toBe(3);
      expect(toMillicredits(-0.0025)).toBe(-3);
    });

    it('should not be thrown off by binary representation', () => {
      expect(toMillicredits(1.005)).toBe(1005);
    });

    it('should reject non-finite amounts', () => {
      expect(() => toMillicredits(Number.NaN)).toThrow(RangeError);
      expect(() => toMillicredits(Number.POSITIVE_INFINITY)).toThrow(RangeError);
    });
  });

  it('should convert back to credits', () => {
    expect(fromMillicredits(1250)).toBe(1.25);
  });

  describe('formatCredits', () => {
    it('should drop trailing zeros', () => {
      expect(formatCredits(5000)).toBe('5');
      expect(formatCredits(1250)).toBe('1.25');
      expect(formatCredits(-500)).toBe('-0.5');
      expect(formatCredits(7)).toBe('0.007');
      expect(formatCredits(0)).toBe('0');
    });
  });

  describe('applyDiscount', () => {
    it('should leave the amount unchanged without a discount', () => {
      expect(applyDiscount(15000, 0)).toBe(15000);
    });

    it('should round the discounted amount up', () => {
      expect(applyDiscount(15000, 10)).toBe(13500);
      expect(applyDiscount(1001, 50)).toBe(501);
      expect(applyDiscount(333, 33)).toBe(224);
    });

    it('should make a full discount free', () => {
      expect(applyDiscount(15000, 100)).toBe(0);
    });
  });

  describe('splitEvenly', () => {
    it('should hand the remainder to the first shares', () => {
      expect(splitEvenly(10000, 3)).toEqual([3334, 3333, 3333]);
      expect(splitEvenly(10, 4)).toEqual([3, 3, 2, 2]);
    });

    it('should sum to the original amount', () => {
      const shares = splitEvenly(12345, 7);
      expect(shares.reduce((sum, share) => sum + share, 0)).toBe(12345);
    });

    it('should return no shares for no parts', () => {
      expect(splitEvenly(100, 0)).toEqual([]);
    });
  });
});
