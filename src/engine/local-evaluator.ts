/**
 * @fileoverview Local Evaluator - deterministic ground truth for verification.
 *
 * @module math-reasoning-agent/engine/local-evaluator
 * @version 0.1.0
 */

import type { CanonicalExpression } from '../types/calculation.types.js';

/**
 * Evaluates a canonical expression.
 *
 * Returns null when the result cannot be computed (division by zero), which
 * callers treat as "cannot verify" rather than "verification failed".
 */
export function evaluateExpression(expression: CanonicalExpression): number | null {
  const { operator, operandA, operandB } = expression;

  switch (operator) {
    case '+':
      return operandA + operandB;
    case '-':
      return operandA - operandB;
    case '*':
      return operandA * operandB;
    case '/':
      return operandB === 0 ? null : operandA / operandB;
  }
}
