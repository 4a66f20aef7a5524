/**
 * @fileoverview Text rendering for results, shared by the agent and the CLI.
 *
 * @module math-reasoning-agent/agent/formatting
 * @version 0.1.0
 */

import type { CalculationResult } from '../types/calculation.types.js';

/**
 * Renders a fraction as a percentage with one decimal, e.g. 0.7 → "70.0%".
 */
export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * The assistant message recorded in conversation memory after a calculation.
 */
export function formatAssistantMessage(result: CalculationResult): string {
  let message = `I calculated ${result.expression} = ${result.result}\n\n`;
  message += `Reasoning: ${result.reasoning}\n\n`;
  message += `Confidence: ${formatPercent(result.confidence)}`;

  if (result.localResult !== null) {
    message += result.verified
      ? '\nVerification: ✅ Passed'
      : `\nVerification: ⚠️  Local result: ${result.localResult}`;
  }

  return message;
}
