import { describe, it, expect, vi, afterEach } from 'vitest';
import { AnthropicBackend, type MessagesClient } from '../llm/anthropic-backend.js';
import { DEFAULT_MODEL } from '../config/env.js';
import { ConfigError, ModelCallError } from '../utils/errors.js';

function makeClient(impl: MessagesClient['createMessage']) {
  const createMessage = vi.fn(impl);
  return { createMessage } satisfies MessagesClient;
}

describe('AnthropicBackend', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('sends one user message with the request settings', async () => {
    const client = makeClient(async () => ({ content: [{ type: 'text', text: '{"ok":true}' }] }));
    const backend = new AnthropicBackend({ client, model: 'test-model' });

    const text = await backend.complete({ system: 'sys', prompt: 'hello', temperature: 0.3, maxTokens: 150 });

    expect(text).toBe('{"ok":true}');
    expect(client.createMessage).toHaveBeenCalledWith({
      model: 'test-model',
      max_tokens: 150,
      temperature: 0.3,
      system: 'sys',
      messages: [{ role: 'user', content: 'hello' }],
    });
  });

  it('joins text blocks and skips the rest', async () => {
    const client = makeClient(async () => ({
      content: [
        { type: 'text', text: '{"a":' },
        { type: 'tool_use' },
        { type: 'text', text: '1}' },
      ],
    }));
    const backend = new AnthropicBackend({ client });

    expect(await backend.complete({ system: 's', prompt: 'p', temperature: 0.7, maxTokens: 10 })).toBe('{"a":1}');
  });

  it('uses the default model', () => {
    const backend = new AnthropicBackend({ client: makeClient(async () => ({ content: [] })) });
    expect(backend.model).toBe(DEFAULT_MODEL);
  });

  it('wraps client failures as ModelCallError', async () => {
    const client = makeClient(async () => {
      throw new Error('401 invalid x-api-key');
    });
    const backend = new AnthropicBackend({ client });

    const request = { system: 's', prompt: 'p', temperature: 0.7, maxTokens: 10 };
    await expect(backend.complete(request)).rejects.toThrow(ModelCallError);
    await expect(backend.complete(request)).rejects.toThrow('Anthropic request failed: 401 invalid x-api-key');
  });

  it('requires an API key when no client is injected', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(() => new AnthropicBackend()).toThrow(ConfigError);
  });

  it('accepts an explicit API key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    expect(new AnthropicBackend({ apiKey: 'test-key' }).model).toBe(DEFAULT_MODEL);
  });
});
