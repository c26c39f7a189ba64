// Language-model collaborator — consumed by the analysis and outreach stages
// Live implementation uses the Anthropic Messages API. SDK-level retries are
// disabled: the orchestrator owns the retry policy.

import Anthropic from '@anthropic-ai/sdk';
import { ProviderError, errorMessage } from '../types/errors.js';
import { isTransientStatus } from './search-client.js';

export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface LanguageModel {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export interface MessageRequest {
  model: string;
  prompt: string;
  maxTokens: number;
  temperature: number;
}

/** The slice of the Messages API this project uses; swapped for a stub in tests */
export interface MessageTransport {
  createMessage(request: MessageRequest, signal?: AbortSignal): Promise<string>;
}

export interface AnthropicModelConfig {
  apiKey?: string;
  model: string;
  /** Per-request timeout (default: 60s) */
  timeoutMs?: number;
  transport?: MessageTransport;
}

const PROVIDER = 'anthropic';

function sdkTransport(apiKey: string | undefined, timeoutMs: number): MessageTransport {
  const client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 });
  return {
    async createMessage(request, signal) {
      const message = await client.messages.create(
        {
          model: request.model,
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          messages: [{ role: 'user', content: request.prompt }],
        },
        { signal },
      );
      return message.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();
    },
  };
}

/**
 * Map an SDK failure onto the transient/terminal split.
 * Connection failures, timeouts, aborts, 408/409/429 and 5xx are transient;
 * bad requests, auth and permission errors are terminal.
 */
export function classifyModelError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (err instanceof Anthropic.APIUserAbortError) {
    return new ProviderError('Language model request aborted', PROVIDER, true, undefined, err);
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new ProviderError(`Language model unreachable: ${err.message}`, PROVIDER, true, undefined, err);
  }
  if (err instanceof Anthropic.APIError) {
    const status = typeof err.status === 'number' ? err.status : undefined;
    const transient = status === undefined || status === 409 || isTransientStatus(status);
    return new ProviderError(`Language model error: ${err.message}`, PROVIDER, transient, status, err);
  }
  return new ProviderError(`Language model error: ${errorMessage(err)}`, PROVIDER, false, undefined, err);
}

export class AnthropicLanguageModel implements LanguageModel {
  private readonly transport: MessageTransport;
  readonly model: string;

  constructor(config: AnthropicModelConfig) {
    this.model = config.model;
    this.transport = config.transport ?? sdkTransport(config.apiKey, config.timeoutMs ?? 60_000);
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    let text: string;
    try {
      text = await this.transport.createMessage(
        {
          model: this.model,
          prompt,
          maxTokens: options.maxTokens ?? 1024,
          temperature: options.temperature ?? 0.7,
        },
        options.signal,
      );
    } catch (err) {
      throw classifyModelError(err);
    }
    if (!text) {
      throw new ProviderError('Language model returned an empty response', PROVIDER, true);
    }
    return text;
  }
}
