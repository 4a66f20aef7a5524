/**
 * @fileoverview Memory module public exports.
 *
 * @module math-reasoning-agent/memory
 * @version 0.1.0
 */

export { ConversationMemory, type ChatMessage } from './conversation-memory.js';
