/**
 * @fileoverview Response Interpreter - numbers and reasoning out of free prose.
 *
 * The collaborator's reply has no enforced structure, so the result is
 * located by an ordered list of matcher strategies. The first matcher that
 * produces a value wins; later matchers are never consulted.
 *
 * Default priority:
 * 1. "result / answer / equals / is : N"
 * 2. "N is the result / is the answer"
 * 3. "final answer : N"
 * 4. N at the very end of the reply
 * 5. the last number anywhere in the reply
 *
 * @module math-reasoning-agent/engine/response-interpreter
 * @version 0.1.0
 */

import { extractNumbers } from './expression-parser.js';

/**
 * A single strategy for locating the numeric result in a reply.
 */
export interface ResultMatcher {
  readonly name: string;
  tryExtract(text: string): number | null;
}

/**
 * A located result and the strategy that found it.
 */
export interface ResultMatch {
  readonly value: number;
  readonly matcher: string;
}

/**
 * Matches a regular expression whose first capture group is the number.
 */
export class PatternMatcher implements ResultMatcher {
  constructor(
    readonly name: string,
    private readonly pattern: RegExp,
  ) {}

  tryExtract(text: string): number | null {
    const captured = this.pattern.exec(text)?.[1];
    if (captured === undefined) {
      return null;
    }
    const value = Number.parseFloat(captured);
    return Number.isFinite(value) ? value : null;
  }
}

/**
 * Matches a number that ends the reply, ignoring trailing whitespace.
 */
export class TrailingNumberMatcher extends PatternMatcher {
  constructor() {
    super('trailing-number', /(-?\d+\.?\d*)$/);
  }

  override tryExtract(text: string): number | null {
    return super.tryExtract(text.trimEnd());
  }
}

/**
 * Last resort: the last numeric token anywhere in the reply.
 */
export class LastNumberMatcher implements ResultMatcher {
  readonly name = 'last-number';

  tryExtract(text: string): number | null {
    const numbers = extractNumbers(text);
    return numbers[numbers.length - 1] ?? null;
  }
}

/**
 * Matchers in the order they are tried.
 */
export const DEFAULT_RESULT_MATCHERS: ReadonlyArray<ResultMatcher> = [
  new PatternMatcher('labelled-result', /\b(?:result|answer|equals?|is)\s*:?\s*(-?\d+\.?\d*)/i),
  new PatternMatcher('result-suffix', /(-?\d+\.?\d*)\s*(?:is the result|is the answer)/i),
  new PatternMatcher('final-answer', /final answer\s*:?\s*(-?\d+\.?\d*)/i),
  new TrailingNumberMatcher(),
  new LastNumberMatcher(),
];

/**
 * Lines introduced by one of these markers and a colon are taken as the
 * model's reasoning.
 */
const REASONING_PATTERNS: ReadonlyArray<RegExp> = [
  /(?:step|reasoning|explanation|because|since)[^:]*:\s*(.*?)(?:\n|$)/i,
  /(?:i think|i believe|i calculate)[^:]*:\s*(.*?)(?:\n|$)/i,
];

/**
 * Extracts the numeric result and reasoning from collaborator replies.
 *
 * @example
 * ```typescript
 * const interpreter = new ResponseInterpreter();
 * interpreter.extractResult('Step 1: add them.\nFinal answer: 8'); // 8
 * interpreter.extractReasoning('Step 1: add them.\nFinal answer: 8'); // 'add them.'
 * ```
 */
export class ResponseInterpreter {
  private readonly matchers: ReadonlyArray<ResultMatcher>;

  constructor(matchers: ReadonlyArray<ResultMatcher> = DEFAULT_RESULT_MATCHERS) {
    this.matchers = matchers;
  }

  /**
   * Runs the matchers in order and reports which one succeeded.
   */
  matchResult(text: string): ResultMatch | null {
    for (const matcher of this.matchers) {
      const value = matcher.tryExtract(text);
      if (value !== null) {
        return { value, matcher: matcher.name };
      }
    }
    return null;
  }

  /**
   * The numeric result, or null when the reply holds no number at all.
   */
  extractResult(text: string): number | null {
    return this.matchResult(text)?.value ?? null;
  }

  /**
   * The first marked reasoning line, or the whole reply when none is marked.
   */
  extractReasoning(text: string): string {
    for (const pattern of REASONING_PATTERNS) {
      const captured = pattern.exec(text)?.[1]?.trim();
      if (captured) {
        return captured;
      }
    }
    return text.trim();
  }
}
