/**
 * Cloud completion provider.
 * Talks to any vendor exposing the OpenAI chat-completions API (DeepSeek,
 * OpenAI, Qwen via DashScope) through the openai SDK pointed at the
 * vendor's base URL.
 */

import OpenAI from 'openai';
import {
  AppError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../errors.js';
import type { ProviderId } from '../types/models.js';
import { buildSystemPrompt, parseCompletionReply } from './completion-prompt.js';
import type { CompletionRequest, CompletionResult, ICompletionProvider } from './ICompletionProvider.js';

export type CloudProviderId = Exclude<ProviderId, 'ollama'>;

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

/** Sends one chat completion and returns the first choice's content. */
export type ChatCompleter = (request: ChatRequest) => Promise<string | null>;

const TEMPERATURE = 0.1;
const MAX_TOKENS = 500;

export function openAIChatCompleter(client: OpenAI): ChatCompleter {
  return async (request) => {
    const completion = await client.chat.completions.create(
      {
        model: request.model,
        messages: request.messages,
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      // Retries belong to the resolution engine, which only retries timeouts.
      { timeout: request.timeoutMs, maxRetries: 0 }
    );
    return completion.choices[0]?.message.content ?? null;
  };
}

export interface OpenAICompatibleProviderOptions {
  id: CloudProviderId;
  endpoint: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
  /** Overrides the SDK call. Used by tests. */
  completer?: ChatCompleter;
}

export class OpenAICompatibleCompletionProvider implements ICompletionProvider {
  readonly id: CloudProviderId;
  readonly model: string;
  private readonly timeoutMs: number;
  private readonly complete: ChatCompleter;

  constructor(opts: OpenAICompatibleProviderOptions) {
    this.id = opts.id;
    this.model = opts.model;
    this.timeoutMs = opts.timeoutMs;
    this.complete =
      opts.completer ??
      openAIChatCompleter(new OpenAI({ apiKey: opts.apiKey, baseURL: opts.endpoint }));
  }

  async generateCommand(request: CompletionRequest): Promise<CompletionResult> {
    let content: string | null;

    try {
      content = await this.complete({
        model: this.model,
        messages: [
          { role: 'system', content: buildSystemPrompt(request.context) },
          { role: 'user', content: request.intent },
        ],
        temperature: TEMPERATURE,
        maxTokens: MAX_TOKENS,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      throw this.toProviderError(err);
    }

    return parseCompletionReply(content);
  }

  private toProviderError(err: unknown): AppError {
    if (err instanceof AppError) return err;

    if (err instanceof OpenAI.APIConnectionTimeoutError) {
      return new ProviderTimeoutError(this.timeoutMs);
    }

    if (err instanceof OpenAI.APIError) {
      return new ProviderUnavailableError(
        `${this.id} API error (${err.status ?? 'no status'}): ${err.message}`,
        { provider: this.id, status: err.status ?? null }
      );
    }

    const message = err instanceof Error ? err.message : String(err);
    return new ProviderUnavailableError(`${this.id} request failed: ${message}`, {
      provider: this.id,
    });
  }
}
