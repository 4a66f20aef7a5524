/**
 * @fileoverview Core type definitions for the math reasoning agent.
 *
 * These types form the shared vocabulary of the pipeline. Every component,
 * from the expression parser to the orchestrator, references these
 * primitives so that data flows through one consistent shape.
 *
 * @module math-reasoning-agent/types
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string for global uniqueness.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Operational state of the reasoning agent.
 *
 * Each request walks a linear machine with a single failure branch:
 * IDLE → PROCESSING → REASONING → VERIFYING → COMPLETED, where any of
 * PROCESSING, REASONING or VERIFYING may drop into ERROR.
 *
 * @remarks
 * - IDLE: Ready for the next request
 * - PROCESSING: Parsing the user's text into an expression
 * - REASONING: Waiting on the LLM collaborator
 * - VERIFYING: Interpreting the reply and checking it locally
 * - COMPLETED: Result recorded and returned
 * - ERROR: The request failed; the message was classified for the caller
 */
export enum AgentState {
  IDLE = 'idle',
  PROCESSING = 'processing',
  REASONING = 'reasoning',
  VERIFYING = 'verifying',
  COMPLETED = 'completed',
  ERROR = 'error',
}

/**
 * Severity levels for logging and error reporting.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Configuration options for the agent runtime.
 */
export interface AgentConfig {
  /** Capacity of the conversation memory window */
  readonly maxHistory: number;

  /** How many recent memory messages accompany each collaborator call */
  readonly contextWindow: number;

  /** Timeout for a single collaborator call (ms) */
  readonly requestTimeoutMs: number;

  /** Absolute tolerance used when comparing model and local results */
  readonly tolerance: number;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Default configuration for the agent runtime.
 */
export const DEFAULT_AGENT_CONFIG: Readonly<AgentConfig> = {
  maxHistory: 10,
  contextWindow: 5,
  requestTimeoutMs: 30_000,
  tolerance: 0.0001,
} as const;
