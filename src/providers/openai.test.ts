/**
 * @fileoverview Unit tests for OpenAICollaborator
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OpenAICollaborator } from './openai.js';
import { ApiError, AuthenticationError, RateLimitError } from '../errors/index.js';

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

describe('OpenAICollaborator', () => {
  const fetchMock = vi.fn(
    (..._args: Parameters<typeof fetch>): Promise<Response> => Promise.reject(new Error('fetch not primed')),
  );
  let collaborator: OpenAICollaborator;

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    collaborator = new OpenAICollaborator({
      apiKey: 'test-key',
      endpoint: 'https://gateway.test/v1/',
      model: 'test-model',
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should post the conversation to the chat-completions endpoint', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'The result is 8' } }] }));

    const reply = await collaborator.complete([
      { role: 'system', content: 'be precise' },
      { role: 'user', content: '5 + 3' },
    ]);

    expect(reply).toBe('The result is 8');
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://gateway.test/v1/chat/completions');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({ Authorization: 'Bearer test-key' });
    expect(JSON.parse(String(init?.body))).toEqual({
      model: 'test-model',
      messages: [
        { role: 'system', content: 'be precise' },
        { role: 'user', content: '5 + 3' },
      ],
      temperature: 0.1,
    });
  });

  it('should return an empty reply for null content', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: null } }] }));

    await expect(collaborator.complete([])).resolves.toBe('');
  });

  it('should map 429 to RateLimitError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('slow down', { status: 429 }));

    await expect(collaborator.complete([])).rejects.toBeInstanceOf(RateLimitError);
  });

  it('should map 401 and 403 to AuthenticationError', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad key', { status: 401 }));
    await expect(collaborator.complete([])).rejects.toBeInstanceOf(AuthenticationError);

    fetchMock.mockResolvedValueOnce(new Response('forbidden', { status: 403 }));
    await expect(collaborator.complete([])).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('should map other failures to ApiError with the status', async () => {
    fetchMock.mockResolvedValueOnce(new Response('upstream down', { status: 500 }));

    await expect(collaborator.complete([])).rejects.toMatchObject({
      name: 'ApiError',
      status: 500,
      message: 'HTTP 500: upstream down',
    });
  });

  it('should wrap transport failures in ApiError', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

    const error = await collaborator.complete([]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: 'Request failed: fetch failed', status: null });
  });

  it('should reject malformed response bodies', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ choices: [] }));

    await expect(collaborator.complete([])).rejects.toThrow(/^Unexpected response shape/);
  });

  it('should let aborts propagate unchanged', async () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = new Error('This operation was aborted');
    fetchMock.mockRejectedValueOnce(abortError);

    await expect(collaborator.complete([], controller.signal)).rejects.toBe(abortError);
  });

  describe('validate()', () => {
    it('should require an API key', () => {
      expect(collaborator.validate()).toBe(true);
      expect(new OpenAICollaborator().validate()).toBe(false);
    });
  });

  it('should default the model and name itself after it', () => {
    expect(new OpenAICollaborator().name).toBe('openai:gpt-4o-mini');
  });
});
