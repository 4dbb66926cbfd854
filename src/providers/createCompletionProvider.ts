/**
 * Completion provider selection.
 * The provider variant is chosen once from configuration and injected into
 * the resolution engine; nothing dispatches on provider names per request.
 */

import { ConfigurationError } from '../errors.js';
import type { ProviderConfig, ProviderId } from '../types/models.js';
import type { ICompletionProvider } from './ICompletionProvider.js';
import {
  DEFAULT_OLLAMA_ENDPOINT,
  DEFAULT_OLLAMA_MODEL,
  OllamaCompletionProvider,
} from './OllamaCompletionProvider.js';
import { OpenAICompatibleCompletionProvider } from './OpenAICompatibleCompletionProvider.js';

export const PROVIDER_DEFAULTS: Record<ProviderId, Omit<ProviderConfig, 'provider'>> = {
  deepseek: {
    endpoint: 'https://api.deepseek.com',
    model: 'deepseek-chat',
    apiKeyRef: 'DEEPSEEK_API_KEY',
  },
  openai: {
    endpoint: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    apiKeyRef: 'OPENAI_API_KEY',
  },
  qwen: {
    endpoint: 'https://dashscope.aliyuncs.com/compatible-mode/v1',
    model: 'qwen-turbo',
    apiKeyRef: 'DASHSCOPE_API_KEY',
  },
  ollama: {
    endpoint: DEFAULT_OLLAMA_ENDPOINT,
    model: DEFAULT_OLLAMA_MODEL,
    apiKeyRef: null,
  },
};

export interface CreateProviderOptions {
  timeoutMs: number;
  /** Where apiKeyRef is looked up. Default: process.env. */
  env?: Record<string, string | undefined>;
}

export function createCompletionProvider(
  config: ProviderConfig,
  options: CreateProviderOptions
): ICompletionProvider {
  const env = options.env ?? process.env;

  switch (config.provider) {
    case 'deepseek':
    case 'openai':
    case 'qwen': {
      const apiKey = config.apiKeyRef ? env[config.apiKeyRef] : undefined;
      if (!apiKey) {
        throw new ConfigurationError(
          `Provider "${config.provider}" needs a credential in ${config.apiKeyRef ?? '(no apiKeyRef set)'}`,
          { provider: config.provider, apiKeyRef: config.apiKeyRef }
        );
      }
      return new OpenAICompatibleCompletionProvider({
        id: config.provider,
        endpoint: config.endpoint,
        model: config.model,
        apiKey,
        timeoutMs: options.timeoutMs,
      });
    }
    case 'ollama':
      return new OllamaCompletionProvider({
        endpoint: config.endpoint,
        model: config.model,
        timeoutMs: options.timeoutMs,
      });
    default: {
      const unknown: never = config.provider;
      throw new ConfigurationError(`Unknown completion provider: ${String(unknown)}`);
    }
  }
}
