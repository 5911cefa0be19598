/**
 * Token Counting & Credit Conversion Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { computeAdjustment, countTokens, creditsToTokens, tokensToCredits } from '../../src/billing/tokens';

describe('Token Counting', () => {
  describe('countTokens', () => {
    it('estimates ~4 characters per token, rounding up', () => {
      expect(countTokens('Hello world')).toBe(3);
      expect(countTokens('abcd')).toBe(1);
      expect(countTokens('abcde')).toBe(2);
    });

    it('counts tokens for empty string', () => {
      expect(countTokens('')).toBe(0);
    });

    it('handles very long text', () => {
      expect(countTokens('word '.repeat(2_000))).toBe(2_500);
    });
  });

  describe('credit conversion', () => {
    it('converts credits to tokens', () => {
      expect(creditsToTokens(3, 500)).toBe(1_500);
    });

    it('rounds tokens up to whole credits', () => {
      expect(tokensToCredits(501, 500)).toBe(2);
      expect(tokensToCredits(1_000, 500)).toBe(2);
    });

    it('never charges less than one credit', () => {
      expect(tokensToCredits(0, 500)).toBe(1);
    });
  });

  describe('computeAdjustment', () => {
    it('makes no adjustment when usage matches the estimate', () => {
      expect(computeAdjustment(2, 1_000, 500, 0.2)).toEqual({ deltaCredits: 0, actualCredits: 2, deviation: 0 });
    });

    it('makes no adjustment within the threshold even if credits differ', () => {
      const adjustment = computeAdjustment(2, 1_100, 500, 0.2);
      expect(adjustment.deltaCredits).toBe(0);
      expect(adjustment.actualCredits).toBe(3);
      expect(adjustment.deviation).toBeCloseTo(0.1);
    });

    it('charges more when usage exceeds the estimate beyond the threshold', () => {
      const adjustment = computeAdjustment(2, 2_600, 500, 0.2);
      expect(adjustment.deltaCredits).toBe(4);
      expect(adjustment.actualCredits).toBe(6);
      expect(adjustment.deviation).toBeCloseTo(1.6);
    });

    it('refunds when usage falls well below the estimate', () => {
      const adjustment = computeAdjustment(4, 500, 500, 0.2);
      expect(adjustment.deltaCredits).toBe(-3);
      expect(adjustment.deviation).toBeCloseTo(0.75);
    });
  });
});
