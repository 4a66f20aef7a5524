/**
 * @fileoverview Agent module public exports.
 *
 * @module math-reasoning-agent/agent
 * @version 0.1.0
 */

export {
  ReasoningAgent,
  type ReasoningAgentEvents,
  type ReasoningAgentOptions,
} from './reasoning-agent.js';

export {
  LifecycleController,
  type LifecycleEvents,
  type LifecycleError,
  type LifecycleSnapshot,
  type StateHistoryEntry,
  type StateMetadata,
} from './lifecycle.js';

export { SYSTEM_PROMPT, buildUserPrompt, buildReasoningMessages } from './prompts.js';
export { formatPercent, formatAssistantMessage } from './formatting.js';
