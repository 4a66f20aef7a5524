/**
 * @fileoverview Conversation Memory - bounded message window plus variables.
 *
 * Messages are appended in order and frozen on insertion. Once capacity is
 * exceeded the oldest messages are dropped, so the window always holds the
 * most recent `maxHistory` insertions. Context variables live beside the
 * window and are never evicted.
 *
 * @module math-reasoning-agent/memory/conversation-memory
 * @version 0.1.0
 */

import { createTimestamp } from '../types/core.types.js';
import type { ConversationMessage, MessageRole } from '../types/calculation.types.js';

/**
 * Message shape handed to an LLM collaborator.
 */
export interface ChatMessage {
  readonly role: 'system' | 'user' | 'assistant';
  readonly content: string;
}

/**
 * Manages the conversation window for one agent session.
 *
 * @example
 * ```typescript
 * const memory = new ConversationMemory({ maxHistory: 3 });
 * memory.addMessage('user', 'add 2 and 3');
 * memory.setContextVariable('lastResult', 5);
 * memory.toChatContext(5); // [{ role: 'user', content: 'add 2 and 3' }]
 * ```
 */
export class ConversationMemory {
  /** Maximum number of messages retained */
  readonly maxHistory: number;

  private messages: ReadonlyArray<ConversationMessage>;
  private readonly variables: Map<string, unknown>;

  constructor(options: { maxHistory?: number } = {}) {
    const maxHistory = options.maxHistory ?? 10;
    if (!Number.isInteger(maxHistory) || maxHistory < 1) {
      throw new RangeError(`maxHistory must be a positive integer, got ${maxHistory}`);
    }
    this.maxHistory = maxHistory;
    this.messages = [];
    this.variables = new Map();
  }

  /**
   * Appends a message, evicting the oldest entries beyond capacity.
   *
   * @returns The stored (frozen) message
   */
  addMessage(
    role: MessageRole,
    content: string,
    metadata?: Record<string, unknown>,
  ): ConversationMessage {
    const message: ConversationMessage = Object.freeze({
      role,
      content,
      createdAt: createTimestamp(),
      metadata: metadata ? Object.freeze({ ...metadata }) : undefined,
    });

    const combined = [...this.messages, message];
    this.messages = combined.length > this.maxHistory
      ? combined.slice(-this.maxHistory)
      : combined;

    return message;
  }

  /**
   * All retained messages, oldest first.
   */
  getMessages(): ReadonlyArray<ConversationMessage> {
    return this.messages;
  }

  /**
   * The `count` most recent messages, oldest first.
   */
  getRecent(count: number): ReadonlyArray<ConversationMessage> {
    if (count <= 0) return [];
    return this.messages.slice(-count);
  }

  /**
   * Recent messages reduced to role and content for a collaborator call.
   */
  toChatContext(count: number = this.maxHistory): ChatMessage[] {
    return this.getRecent(count).map(({ role, content }) => ({ role, content }));
  }

  get size(): number {
    return this.messages.length;
  }

  /**
   * Sets a named context variable. Last write wins.
   */
  setContextVariable(key: string, value: unknown): void {
    this.variables.set(key, value);
  }

  getContextVariable(key: string, defaultValue?: unknown): unknown {
    return this.variables.has(key) ? this.variables.get(key) : defaultValue;
  }

  /**
   * Drops all messages and variables.
   */
  clear(): void {
    this.messages = [];
    this.variables.clear();
  }
}
