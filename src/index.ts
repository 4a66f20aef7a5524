/**
 * @fileoverview Math Reasoning Agent - public API.
 *
 * An LLM proposes the answer to a two-operand arithmetic request, the agent
 * recomputes it locally and attaches a confidence score to the result.
 *
 * @example
 * ```typescript
 * import { ReasoningAgent, OpenAICollaborator, loadConfig, createLogger } from 'math-reasoning-agent';
 *
 * const config = loadConfig();
 * const agent = new ReasoningAgent({
 *   collaborator: new OpenAICollaborator({ apiKey: config.apiKey, model: config.model }),
 *   config: config.agent,
 *   logger: createLogger('agent'),
 * });
 *
 * const result = await agent.processRequest('What is 7 times 6?');
 * ```
 *
 * @module math-reasoning-agent
 * @version 0.1.0
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './engine/index.js';
export * from './memory/index.js';
export * from './errors/index.js';
export * from './providers/index.js';
export * from './observability/index.js';
export * from './config/index.js';
export * from './history/index.js';
