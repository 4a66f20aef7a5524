/**
 * @fileoverview Unit tests for the local evaluator
 */

import { describe, it, expect } from 'vitest';
import { evaluateExpression } from './local-evaluator.js';
import { parseExpression } from './expression-parser.js';
import type { CanonicalExpression } from '../types/index.js';

describe('evaluateExpression', () => {
  it('should evaluate all four operators', () => {
    expect(evaluateExpression({ operator: '+', operandA: 5, operandB: 3 })).toBe(8);
    expect(evaluateExpression({ operator: '-', operandA: 5, operandB: 8 })).toBe(-3);
    expect(evaluateExpression({ operator: '*', operandA: -3, operandB: 4 })).toBe(-12);
    expect(evaluateExpression({ operator: '/', operandA: 7, operandB: 2 })).toBe(3.5);
  });

  it('should evaluate a parsed decimal addition', () => {
    const { expression } = parseExpression('Add 10.5 and 15.2');

    expect(expression).not.toBeNull();
    if (expression) {
      expect(evaluateExpression(expression)).toBeCloseTo(25.7, 10);
    }
  });

  it('should report division by zero as unavailable', () => {
    expect(evaluateExpression({ operator: '/', operandA: 5, operandB: 0 })).toBeNull();
    expect(evaluateExpression({ operator: '/', operandA: 0, operandB: 5 })).toBe(0);
  });

  it('should return the same value for the same expression', () => {
    const expression: CanonicalExpression = { operator: '*', operandA: 1.1, operandB: 3 };

    expect(evaluateExpression(expression)).toBe(evaluateExpression(expression));
  });
});
