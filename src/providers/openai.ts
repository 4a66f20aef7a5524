/**
 * @fileoverview OpenAI Collaborator
 *
 * Sends the agent's conversation to a chat-completions endpoint. Works with
 * OpenAI itself and with any OpenAI-compatible gateway reachable by base URL.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import { z } from 'zod';
import { BaseCollaborator } from './base.js';
import type { ChatMessage } from '../memory/conversation-memory.js';
import { ApiError, AuthenticationError, RateLimitError } from '../errors/errors.js';

export const DEFAULT_OPENAI_ENDPOINT = 'https://api.openai.com/v1';
export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';
const DEFAULT_TEMPERATURE = 0.1;

/**
 * The part of a chat-completions response the agent relies on.
 */
const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
});

/**
 * Chat-completions collaborator.
 *
 * @example
 * ```typescript
 * const collaborator = new OpenAICollaborator({ apiKey: 'test-key', model: 'gpt-4o-mini' });
 * const reply = await collaborator.complete([{ role: 'user', content: '2 + 2?' }]);
 * ```
 */
export class OpenAICollaborator extends BaseCollaborator {
  get name(): string {
    return `openai:${this.model}`;
  }

  get model(): string {
    return this.config.model ?? DEFAULT_OPENAI_MODEL;
  }

  validate(): boolean {
    return typeof this.config.apiKey === 'string' && this.config.apiKey.length > 0;
  }

  async complete(messages: ReadonlyArray<ChatMessage>, signal?: AbortSignal): Promise<string> {
    const endpoint = (this.config.endpoint ?? DEFAULT_OPENAI_ENDPOINT).replace(/\/+$/, '');

    let response: Response;
    try {
      response = await fetch(`${endpoint}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey ?? ''}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages,
          temperature: this.config.temperature ?? DEFAULT_TEMPERATURE,
        }),
        signal,
      });
    } catch (error) {
      // Aborts propagate untouched; the agent owns the timeout and reports it
      if (signal?.aborted === true) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Request failed: ${detail}`, null, { cause: error });
    }

    if (!response.ok) {
      throw await this.toError(response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ApiError('Response body is not valid JSON', response.status, { cause: error });
    }

    const parsed = ChatCompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new ApiError(
        `Unexpected response shape: ${parsed.error.issues.map(i => i.path.join('.') || i.message).join(', ')}`,
        response.status,
        { cause: parsed.error },
      );
    }

    return parsed.data.choices[0]?.message.content ?? '';
  }

  private async toError(response: Response): Promise<Error> {
    const detail = await response.text().catch(() => '');
    const message = `HTTP ${response.status}${detail ? `: ${detail}` : ''}`;

    switch (response.status) {
      case 429:
        return new RateLimitError(message);
      case 401:
      case 403:
        return new AuthenticationError(message);
      default:
        return new ApiError(message, response.status);
    }
  }
}
