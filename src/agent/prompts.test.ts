/**
 * @fileoverview Unit tests for prompt construction
 */

import { describe, it, expect } from 'vitest';
import { SYSTEM_PROMPT, buildReasoningMessages, buildUserPrompt } from './prompts.js';
import { formatAssistantMessage, formatPercent } from './formatting.js';
import { createTimestamp, createUniqueId } from '../types/index.js';

describe('buildUserPrompt()', () => {
  it('should name the expression and its numbers', () => {
    expect(buildUserPrompt('10.5 + 15.2', [10.5, 15.2])).toBe(
      'Please calculate this expression and show your reasoning: 10.5 + 15.2\n\n' +
        'Numbers involved: [10.5, 15.2]\n\n' +
        'Provide step-by-step reasoning and give the final result.',
    );
  });
});

describe('buildReasoningMessages()', () => {
  it('should wrap prior context between the system prompt and the request', () => {
    const messages = buildReasoningMessages('2 + 3', [2, 3], [
      { role: 'user', content: 'add 1 and 1' },
      { role: 'assistant', content: 'I calculated 1 + 1 = 2' },
    ]);

    expect(messages.map(m => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
    expect(messages[0]?.content).toBe(SYSTEM_PROMPT);
    expect(messages[3]?.content).toBe(buildUserPrompt('2 + 3', [2, 3]));
  });
});

describe('formatting', () => {
  it('should render percentages with one decimal', () => {
    expect(formatPercent(1)).toBe('100.0%');
    expect(formatPercent(0.4)).toBe('40.0%');
  });

  it('should report a passed verification', () => {
    const message = formatAssistantMessage({
      id: createUniqueId('calc-1'),
      expression: '2 + 3',
      result: 5,
      reasoning: 'two plus three',
      confidence: 1,
      verified: true,
      localResult: 5,
      createdAt: createTimestamp(),
      tokensUsed: 4,
    });

    expect(message).toBe(
      'I calculated 2 + 3 = 5\n\nReasoning: two plus three\n\nConfidence: 100.0%\nVerification: ✅ Passed',
    );
  });
});
