/**
 * @fileoverview Expression Parser - free text to a two-operand expression.
 *
 * Detection is keyword based, not grammatical. The operator table is
 * scanned in priority order and the first keyword found anywhere in the
 * text wins, regardless of where it appears. A sentence naming two
 * operations ("8 minus 2 plus 1") therefore resolves to whichever keyword
 * comes first in the table, not in the sentence.
 *
 * @module math-reasoning-agent/engine/expression-parser
 * @version 0.1.0
 */

import type { CanonicalExpression, Operator, ParseResult } from '../types/calculation.types.js';

/**
 * Operator keywords in priority order.
 */
export const OPERATOR_KEYWORDS: ReadonlyArray<readonly [keyword: string, operator: Operator]> = [
  ['add', '+'],
  ['plus', '+'],
  ['sum', '+'],
  ['addition', '+'],
  ['subtract', '-'],
  ['minus', '-'],
  ['difference', '-'],
  ['multiply', '*'],
  ['times', '*'],
  ['product', '*'],
  ['multiplication', '*'],
  ['divide', '/'],
  ['divided by', '/'],
  ['division', '/'],
];

const NUMBER_PATTERN = /-?\d+\.?\d*/g;

/**
 * Extracts every numeric literal (optional leading minus, integer or
 * decimal) in order of appearance.
 */
export function extractNumbers(text: string): number[] {
  const numbers: number[] = [];
  for (const match of text.matchAll(NUMBER_PATTERN)) {
    numbers.push(Number.parseFloat(match[0]));
  }
  return numbers;
}

/**
 * Finds the operator for the first table keyword contained in the text.
 */
export function detectOperator(text: string): Operator | null {
  const lower = text.toLowerCase();
  for (const [keyword, operator] of OPERATOR_KEYWORDS) {
    if (lower.includes(keyword)) {
      return operator;
    }
  }
  return null;
}

/**
 * Renders an expression as "a op b".
 */
export function formatExpression(expression: CanonicalExpression): string {
  return `${expression.operandA} ${expression.operator} ${expression.operandB}`;
}

/**
 * Parses free text into a canonical expression.
 *
 * Never throws. When no operator keyword or fewer than two numbers are
 * present, `expression` is null and the caller decides what that means.
 *
 * @example
 * ```typescript
 * parseExpression('Add 10.5 and 15.2');
 * // { expression: { operator: '+', operandA: 10.5, operandB: 15.2 },
 * //   operator: '+', numbers: [10.5, 15.2], text: '10.5 + 15.2' }
 * ```
 */
export function parseExpression(input: string): ParseResult {
  const normalized = input.toLowerCase().trim();
  const operator = detectOperator(normalized);
  const numbers = extractNumbers(normalized);
  const [operandA, operandB] = numbers;

  if (operator !== null && operandA !== undefined && operandB !== undefined) {
    const expression: CanonicalExpression = Object.freeze({ operator, operandA, operandB });
    return {
      expression,
      operator,
      numbers,
      text: formatExpression(expression),
    };
  }

  return {
    expression: null,
    operator,
    numbers,
    text: normalized,
  };
}
