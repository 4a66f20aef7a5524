/**
 * @fileoverview Unit tests for scoreConfidence
 */

import { describe, it, expect } from 'vitest';
import { scoreConfidence, CONFIDENCE_TIERS } from './confidence.js';

describe('scoreConfidence', () => {
  it('should score 0.5 when local verification is unavailable', () => {
    expect(scoreConfidence(42, null)).toEqual({
      confidence: CONFIDENCE_TIERS.UNVERIFIED,
      verified: false,
      difference: null,
    });
  });

  it('should score 1.0 within the default tolerance', () => {
    const score = scoreConfidence(10.00009, 10.0, 0.0001);

    expect(score.confidence).toBe(1.0);
    expect(score.verified).toBe(true);
  });

  it('should score 0.7 at ten times the tolerance', () => {
    const score = scoreConfidence(10.001, 10.0, 0.0001);

    expect(score.confidence).toBe(0.7);
    expect(score.verified).toBe(false);
  });

  it('should score 0.1 for a large mismatch', () => {
    expect(scoreConfidence(10.5, 10.0, 0.0001).confidence).toBe(0.1);
  });

  describe('tier boundaries', () => {
    // 0.25 and its multiples are exact in binary floating point
    const tol = 0.25;

    it('should include the tolerance itself in the top tier but not verify it', () => {
      expect(scoreConfidence(10.25, 10, tol)).toEqual({ confidence: 1.0, verified: false, difference: 0.25 });
    });

    it('should include 10 * tol in the 0.7 tier', () => {
      expect(scoreConfidence(12.5, 10, tol).confidence).toBe(0.7);
      expect(scoreConfidence(12.75, 10, tol).confidence).toBe(0.4);
    });

    it('should include 100 * tol in the 0.4 tier', () => {
      expect(scoreConfidence(35, 10, tol).confidence).toBe(0.4);
      expect(scoreConfidence(35.25, 10, tol).confidence).toBe(0.1);
    });

    it('should be symmetric in the sign of the difference', () => {
      expect(scoreConfidence(7.5, 10, tol).confidence).toBe(0.7);
    });
  });
});
