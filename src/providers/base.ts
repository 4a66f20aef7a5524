/**
 * @fileoverview Base collaborator contract for LLM reasoning calls.
 *
 * The agent never talks to a vendor SDK directly. It hands an ordered list
 * of chat messages to a {@link ReasoningCollaborator} and receives free
 * text back. Implementations translate transport failures into the typed
 * collaborator errors so the agent can classify them.
 *
 * @module math-reasoning-agent/providers
 */

import type { ChatMessage } from '../memory/conversation-memory.js';

/**
 * The external LLM call the agent delegates reasoning to.
 */
export interface ReasoningCollaborator {
  readonly name: string;

  /**
   * Sends the conversation and resolves with the model's reply text.
   *
   * @param signal - Aborted by the agent when the call exceeds its timeout
   * @throws {@link CollaboratorError} subclasses on failure
   */
  complete(messages: ReadonlyArray<ChatMessage>, signal?: AbortSignal): Promise<string>;
}

/**
 * Collaborator configuration.
 */
export interface CollaboratorConfig {
  /** Bearer token for the API */
  apiKey?: string | undefined;

  /** Base URL, e.g. https://api.openai.com/v1 */
  endpoint?: string | undefined;

  model?: string | undefined;

  /** Sampling temperature; low values keep arithmetic deterministic */
  temperature?: number | undefined;
}

/**
 * Shared plumbing for collaborator implementations.
 */
export abstract class BaseCollaborator implements ReasoningCollaborator {
  protected readonly config: CollaboratorConfig;

  constructor(config: CollaboratorConfig = {}) {
    this.config = config;
  }

  abstract get name(): string;

  abstract complete(messages: ReadonlyArray<ChatMessage>, signal?: AbortSignal): Promise<string>;

  /**
   * Whether the collaborator has everything it needs to make a call.
   */
  abstract validate(): boolean;
}
