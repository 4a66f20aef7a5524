/**
 * @fileoverview Typed failures raised inside the reasoning pipeline.
 *
 * Components throw the most specific subclass they can. The orchestrator
 * hands whatever it catches to the error classifier and rethrows a single
 * {@link AgentRequestError} to its caller.
 *
 * @module math-reasoning-agent/errors
 * @version 0.1.0
 */

/**
 * Failure categories surfaced to callers.
 */
export type ErrorCategory =
  | 'validation'
  | 'interpretation'
  | 'rate_limit'
  | 'authentication'
  | 'timeout'
  | 'api'
  | 'unknown';

/**
 * Base class for every anticipated failure.
 */
export class AgentError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The user's text did not contain enough numbers to calculate with.
 */
export class InputValidationError extends AgentError {
  constructor(message: string = 'Please provide at least two numbers for calculation') {
    super('INPUT_VALIDATION', message);
  }
}

/**
 * The collaborator replied, but no numeric result could be extracted.
 */
export class InterpretationError extends AgentError {
  constructor(message: string = 'Could not extract result from AI response') {
    super('INTERPRETATION', message);
  }
}

/**
 * Base class for failures of the LLM collaborator call.
 */
export class CollaboratorError extends AgentError {}

export class RateLimitError extends CollaboratorError {
  constructor(message: string = 'Rate limit exceeded', options?: { cause?: unknown }) {
    super('RATE_LIMIT', message, options);
  }
}

export class AuthenticationError extends CollaboratorError {
  constructor(message: string = 'Authentication failed', options?: { cause?: unknown }) {
    super('AUTHENTICATION', message, options);
  }
}

/**
 * Generic API failure: unexpected status, transport error or malformed body.
 */
export class ApiError extends CollaboratorError {
  /** HTTP status, or null when no response was received */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('API_ERROR', message, options);
    this.status = status;
  }
}

export class CollaboratorTimeoutError extends CollaboratorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('TIMEOUT', `Collaborator call exceeded ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Environment configuration failed validation.
 */
export class ConfigError extends AgentError {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super('CONFIG', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * What callers of `processRequest` receive when a request fails.
 * The message is already safe to show to a user.
 */
export class AgentRequestError extends AgentError {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, cause: unknown) {
    super('REQUEST_FAILED', message, { cause });
    this.category = category;
  }
}
