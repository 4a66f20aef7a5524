/**
 * @fileoverview Type exports.
 *
 * @module math-reasoning-agent/types
 * @version 0.1.0
 */

export {
  AgentState,
  Severity,
  createUniqueId,
  createTimestamp,
  DEFAULT_AGENT_CONFIG,
  type UniqueId,
  type Timestamp,
  type AgentConfig,
} from './core.types.js';

export type {
  Operator,
  CanonicalExpression,
  ParseResult,
  MessageRole,
  ConversationMessage,
  CalculationResult,
  SessionStats,
} from './calculation.types.js';
