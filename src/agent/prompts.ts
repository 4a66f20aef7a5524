/**
 * @fileoverview Prompt construction for the reasoning collaborator.
 *
 * @module math-reasoning-agent/agent/prompts
 * @version 0.1.0
 */

import type { ChatMessage } from '../memory/conversation-memory.js';

export const SYSTEM_PROMPT = `You are a mathematical assistant specialized in arithmetic operations.
When given a mathematical expression, you must:
1. Show step-by-step reasoning
2. Perform the calculation accurately
3. Provide the final numerical result clearly
4. Be concise but thorough in your explanation

Format your response to include the reasoning process and end with the numerical result.`;

/**
 * The per-request instruction naming the expression and its numbers.
 */
export function buildUserPrompt(expression: string, numbers: ReadonlyArray<number>): string {
  return [
    `Please calculate this expression and show your reasoning: ${expression}`,
    '',
    `Numbers involved: [${numbers.join(', ')}]`,
    '',
    'Provide step-by-step reasoning and give the final result.',
  ].join('\n');
}

/**
 * System instruction, then prior context, then the request itself.
 */
export function buildReasoningMessages(
  expression: string,
  numbers: ReadonlyArray<number>,
  context: ReadonlyArray<ChatMessage>,
): ChatMessage[] {
  return [
    { role: 'system', content: SYSTEM_PROMPT },
    ...context,
    { role: 'user', content: buildUserPrompt(expression, numbers) },
  ];
}
