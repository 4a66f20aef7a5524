/**
 * @fileoverview Collaborator exports.
 *
 * @module math-reasoning-agent/providers
 */

export {
  BaseCollaborator,
  type ReasoningCollaborator,
  type CollaboratorConfig,
} from './base.js';

export {
  OpenAICollaborator,
  DEFAULT_OPENAI_ENDPOINT,
  DEFAULT_OPENAI_MODEL,
} from './openai.js';
