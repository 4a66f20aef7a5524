/**
 * @fileoverview Terminal rendering for the interactive shell.
 *
 * @module math-reasoning-agent/cli/format
 * @version 0.1.0
 */

import type { CalculationResult, SessionStats } from '../types/calculation.types.js';
import { formatPercent } from '../agent/formatting.js';

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
} as const;

type AnsiStyle = Exclude<keyof typeof ANSI, 'reset'>;

export interface RenderOptions {
  /** Emit ANSI escape codes */
  readonly color: boolean;
}

function paint(style: AnsiStyle, text: string, options: RenderOptions): string {
  return options.color ? `${ANSI[style]}${text}${ANSI.reset}` : text;
}

/**
 * Green from 0.8, yellow from 0.5, red below.
 */
export function confidenceStyle(confidence: number): AnsiStyle {
  if (confidence >= 0.8) return 'green';
  if (confidence >= 0.5) return 'yellow';
  return 'red';
}

export const BANNER = [
  '🧮 Math Reasoning Agent',
  'Ask for an addition, subtraction, multiplication or division in plain words.',
  "Type 'help' for commands, 'quit' to leave.",
].join('\n');

export const HELP_TEXT = [
  'Commands:',
  '  help            Show this message',
  '  stats           Show session statistics',
  '  history         Show the last 5 calculations',
  '  export [file]   Save the history as JSON (default history_<timestamp>.json)',
  '  quit, exit, q   Leave the shell',
  '',
  'Examples:',
  '  Add 10.5 and 15.2',
  '  What is 7 times 6?',
  '  Divide 100 by 8',
].join('\n');

function verificationLine(result: CalculationResult, options: RenderOptions): string {
  if (result.localResult === null) {
    return '➖ Not verified locally';
  }
  return result.verified
    ? paint('green', '✅ Verified against local calculation', options)
    : paint('yellow', `⚠️  Local result differs: ${result.localResult}`, options);
}

export function renderResult(result: CalculationResult, options: RenderOptions): string {
  return [
    `📝 Expression: ${result.expression}`,
    `🎯 Result: ${paint('bold', String(result.result), options)}`,
    `💭 Reasoning: ${result.reasoning}`,
    `📊 Confidence: ${paint(confidenceStyle(result.confidence), formatPercent(result.confidence), options)}`,
    verificationLine(result, options),
  ].join('\n');
}

export function renderStats(stats: SessionStats, options: RenderOptions): string {
  return [
    paint('cyan', '📊 Session Statistics', options),
    `  Total calculations: ${stats.totalCalculations}`,
    `  Tokens used:        ${stats.totalTokensUsed}`,
    `  Average confidence: ${formatPercent(stats.averageConfidence)}`,
    `  Verification rate:  ${formatPercent(stats.verificationRate)}`,
    `  Current state:      ${stats.currentState}`,
  ].join('\n');
}

/**
 * Renders the most recent `limit` calculations, numbered from the start of
 * the session.
 */
export function renderHistory(
  history: ReadonlyArray<CalculationResult>,
  options: RenderOptions,
  limit: number = 5,
): string {
  if (history.length === 0) {
    return 'No calculations yet.';
  }

  const offset = Math.max(0, history.length - limit);
  const lines = history.slice(offset).map((entry, index) => {
    const mark = entry.verified ? '✅' : '⚠️';
    return `  ${offset + index + 1}. ${entry.expression} = ${entry.result} (${formatPercent(entry.confidence)} ${mark})`;
  });

  return [paint('cyan', '📜 Recent calculations', options), ...lines].join('\n');
}

export function renderError(message: string, options: RenderOptions): string {
  return paint('red', `Error: ${message}`, options);
}
