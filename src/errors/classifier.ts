/**
 * @fileoverview Error Classifier - maps failures to user-facing messages.
 *
 * @module math-reasoning-agent/errors/classifier
 * @version 0.1.0
 */

import {
  ApiError,
  AuthenticationError,
  CollaboratorTimeoutError,
  InputValidationError,
  InterpretationError,
  RateLimitError,
  type ErrorCategory,
} from './errors.js';

/**
 * A failure reduced to a category and a message safe to display.
 */
export interface ClassifiedError {
  readonly category: ErrorCategory;
  readonly message: string;
}

/**
 * Classifies any thrown value. Never throws.
 *
 * Order matters: the collaborator subclasses are checked before anything
 * more general so that a rate limit is never reported as a plain API error.
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof InputValidationError) {
    return { category: 'validation', message: error.message };
  }
  if (error instanceof InterpretationError) {
    return { category: 'interpretation', message: error.message };
  }
  if (error instanceof RateLimitError) {
    return { category: 'rate_limit', message: 'Rate limit exceeded. Please wait a moment and try again.' };
  }
  if (error instanceof AuthenticationError) {
    return { category: 'authentication', message: 'Authentication failed. Please check your API key.' };
  }
  if (error instanceof CollaboratorTimeoutError) {
    return {
      category: 'timeout',
      message: `The reasoning service did not respond within ${error.timeoutMs}ms.`,
    };
  }
  if (error instanceof ApiError) {
    return { category: 'api', message: `API error occurred: ${error.message}` };
  }
  return { category: 'unknown', message: `Unexpected error: ${describe(error)}` };
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return 'unknown failure';
  }
}
