/**
 * Local completion provider.
 * Calls a locally hosted model through Ollama's chat endpoint.
 * No SDK dependency; uses native fetch.
 */

import {
  AppError,
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../errors.js';
import { conforms } from '../validation/schema.js';
import { buildSystemPrompt, parseCompletionReply } from './completion-prompt.js';
import type { CompletionRequest, CompletionResult, ICompletionProvider } from './ICompletionProvider.js';

export const DEFAULT_OLLAMA_ENDPOINT = 'http://localhost:11434';
export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:7b';

const responseSchema = {
  model: { type: 'string', required: false },
  message: { type: 'object', required: true },
  done: { type: 'boolean', required: false },
} as const;

const messageSchema = {
  role: { type: 'string', required: false },
  content: { type: 'string', required: true },
} as const;

export class OllamaCompletionProvider implements ICompletionProvider {
  readonly id = 'ollama' as const;
  readonly model: string;
  private readonly endpoint: string;
  private readonly timeoutMs: number;

  constructor(opts: { endpoint?: string; model?: string; timeoutMs: number }) {
    this.endpoint = (opts.endpoint ?? DEFAULT_OLLAMA_ENDPOINT).replace(/\/+$/, '');
    this.model = opts.model ?? DEFAULT_OLLAMA_MODEL;
    this.timeoutMs = opts.timeoutMs;
  }

  async generateCommand(request: CompletionRequest): Promise<CompletionResult> {
    const body = await this.callApi(request);

    const errors: string[] = [];
    if (!conforms(body, responseSchema, errors) || !conforms(body.message, messageSchema, errors)) {
      throw new ProviderMalformedResponseError(`Unexpected Ollama response: ${errors.join('; ')}`, {
        errors,
      });
    }

    return parseCompletionReply(body.message.content);
  }

  private async callApi(request: CompletionRequest): Promise<unknown> {
    try {
      const res = await fetch(`${this.endpoint}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.model,
          messages: [
            { role: 'system', content: buildSystemPrompt(request.context) },
            { role: 'user', content: request.intent },
          ],
          stream: false,
          format: 'json',
          options: { temperature: 0.1 },
        }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!res.ok) {
        const err: unknown = await res.json().catch(() => ({}));
        const detail =
          typeof err === 'object' && err !== null && 'error' in err && typeof err.error === 'string'
            ? err.error
            : 'Unknown error';
        throw new ProviderUnavailableError(`Ollama API error (${res.status}): ${detail}`, {
          provider: this.id,
          status: res.status,
        });
      }

      try {
        return await res.json();
      } catch (err) {
        if (isTimeout(err)) throw err;
        throw new ProviderMalformedResponseError('Ollama response is not valid JSON');
      }
    } catch (err) {
      if (err instanceof AppError) throw err;
      if (isTimeout(err)) throw new ProviderTimeoutError(this.timeoutMs);

      const message = err instanceof Error ? err.message : String(err);
      throw new ProviderUnavailableError(`Ollama request failed: ${message}`, { provider: this.id });
    }
  }
}

// AbortSignal.timeout() rejects with a DOMException named TimeoutError.
function isTimeout(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}
