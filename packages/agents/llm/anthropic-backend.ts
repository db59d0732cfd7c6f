// Anthropic Messages API backend
// The SDK is loaded on first use so the rest of the package works without it

import type { ModelBackend, ModelRequest } from '../types/data-source.js';
import { DEFAULT_MODEL } from '../config/env.js';
import { ConfigError, ModelCallError, errorMessage } from '../utils/errors.js';

interface MessageParams {
  model: string;
  max_tokens: number;
  temperature: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

interface MessageReply {
  content: Array<{ type: string; text?: string }>;
}

/** The slice of the SDK client this backend needs */
export interface MessagesClient {
  createMessage(params: MessageParams): Promise<MessageReply>;
}

export interface AnthropicBackendOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  client?: MessagesClient;
}

async function loadSdkClient(apiKey: string, timeoutMs: number): Promise<MessagesClient> {
  const { default: Anthropic } = await import('@anthropic-ai/sdk');
  const client = new Anthropic({ apiKey, timeout: timeoutMs });
  return {
    createMessage: params => client.messages.create(params),
  };
}

export class AnthropicBackend implements ModelBackend {
  readonly model: string;
  private clientPromise: Promise<MessagesClient> | null = null;
  private readonly apiKey: string;
  private readonly timeoutMs: number;

  constructor(options: AnthropicBackendOptions = {}) {
    const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey && !options.client) {
      throw new ConfigError('ANTHROPIC_API_KEY is required to call the model');
    }
    this.apiKey = apiKey ?? '';
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    if (options.client) this.clientPromise = Promise.resolve(options.client);
  }

  private getClient(): Promise<MessagesClient> {
    if (!this.clientPromise) {
      this.clientPromise = loadSdkClient(this.apiKey, this.timeoutMs);
    }
    return this.clientPromise;
  }

  async complete(request: ModelRequest): Promise<string> {
    try {
      const client = await this.getClient();
      const reply = await client.createMessage({
        model: this.model,
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });
      return reply.content
        .flatMap(block => (block.type === 'text' && typeof block.text === 'string' ? [block.text] : []))
        .join('');
    } catch (err) {
      throw new ModelCallError(`Anthropic request failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
