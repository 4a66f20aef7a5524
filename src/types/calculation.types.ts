/**
 * @fileoverview Types for expressions, conversation messages and results.
 *
 * @module math-reasoning-agent/types/calculation
 * @version 0.1.0
 */

import type { AgentState, Timestamp, UniqueId } from './core.types.js';

/**
 * The four supported binary operators.
 */
export type Operator = '+' | '-' | '*' | '/';

/**
 * Normalized two-operand arithmetic triple derived from free text.
 */
export interface CanonicalExpression {
  readonly operator: Operator;
  readonly operandA: number;
  readonly operandB: number;
}

/**
 * Output of the expression parser.
 */
export interface ParseResult {
  /** Present only when an operator keyword and two numbers were found */
  readonly expression: CanonicalExpression | null;

  /** Operator detected by keyword, even if too few numbers were found */
  readonly operator: Operator | null;

  /** Every numeric literal in the text, in encounter order */
  readonly numbers: ReadonlyArray<number>;

  /**
   * Canonical rendering ("10.5 + 15.2") when an expression was built,
   * otherwise the normalized input text.
   */
  readonly text: string;
}

/**
 * Who authored a conversation message.
 */
export type MessageRole = 'user' | 'assistant';

/**
 * A single entry in conversation memory.
 */
export interface ConversationMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly createdAt: Timestamp;
  readonly metadata?: Readonly<Record<string, unknown>> | undefined;
}

/**
 * A completed, verified (or not) calculation.
 */
export interface CalculationResult {
  readonly id: UniqueId;

  /** Expression text sent to the model */
  readonly expression: string;

  /** The model's numeric answer */
  readonly result: number;

  /** Reasoning extracted from the model's reply */
  readonly reasoning: string;

  /** One of the discrete confidence tiers, in [0, 1] */
  readonly confidence: number;

  /** True when local evaluation agreed within tolerance */
  readonly verified: boolean;

  /** Local recomputation, or null when it was unavailable */
  readonly localResult: number | null;

  readonly createdAt: Timestamp;

  /** Rough token estimate for the model's reply */
  readonly tokensUsed: number;
}

/**
 * Aggregate statistics for an agent session.
 */
export interface SessionStats {
  readonly totalCalculations: number;
  readonly totalTokensUsed: number;
  readonly averageConfidence: number;
  readonly verificationRate: number;
  readonly currentState: AgentState;
}
