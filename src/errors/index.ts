/**
 * @fileoverview Error module public exports.
 *
 * @module math-reasoning-agent/errors
 * @version 0.1.0
 */

export {
  AgentError,
  InputValidationError,
  InterpretationError,
  CollaboratorError,
  RateLimitError,
  AuthenticationError,
  ApiError,
  CollaboratorTimeoutError,
  ConfigError,
  AgentRequestError,
  type ErrorCategory,
} from './errors.js';

export { classifyError, type ClassifiedError } from './classifier.js';
