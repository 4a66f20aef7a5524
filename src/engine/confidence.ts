/**
 * @fileoverview Confidence Scorer - agreement between model and local result.
 *
 * Confidence is one of five fixed tiers, not a continuous function:
 *
 * | local result  | |model - local|   | confidence |
 * |---------------|-------------------|------------|
 * | unavailable   | -                 | 0.5        |
 * | available     | <= tol            | 1.0        |
 * | available     | <= 10 * tol       | 0.7        |
 * | available     | <= 100 * tol      | 0.4        |
 * | available     | larger            | 0.1        |
 *
 * @module math-reasoning-agent/engine/confidence
 * @version 0.1.0
 */

export const DEFAULT_TOLERANCE = 0.0001;

export const CONFIDENCE_TIERS = {
  EXACT: 1.0,
  CLOSE: 0.7,
  NEAR: 0.4,
  MISMATCH: 0.1,
  UNVERIFIED: 0.5,
} as const;

export interface ConfidenceScore {
  readonly confidence: number;

  /** True only when a local result exists and differs by less than tol */
  readonly verified: boolean;

  /** Absolute difference, or null when local verification was unavailable */
  readonly difference: number | null;
}

/**
 * Scores the model's result against the local recomputation.
 *
 * Tier boundaries are inclusive; `verified` uses a strict comparison, so a
 * difference of exactly `tolerance` scores 1.0 but is not verified.
 */
export function scoreConfidence(
  modelResult: number,
  localResult: number | null,
  tolerance: number = DEFAULT_TOLERANCE,
): ConfidenceScore {
  if (localResult === null) {
    return { confidence: CONFIDENCE_TIERS.UNVERIFIED, verified: false, difference: null };
  }

  const difference = Math.abs(modelResult - localResult);
  const verified = difference < tolerance;

  let confidence: number;
  if (difference <= tolerance) {
    confidence = CONFIDENCE_TIERS.EXACT;
  } else if (difference <= tolerance * 10) {
    confidence = CONFIDENCE_TIERS.CLOSE;
  } else if (difference <= tolerance * 100) {
    confidence = CONFIDENCE_TIERS.NEAR;
  } else {
    confidence = CONFIDENCE_TIERS.MISMATCH;
  }

  return { confidence, verified, difference };
}
