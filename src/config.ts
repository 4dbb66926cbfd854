/**
 * Engine configuration from environment variables.
 * Everything is validated here so a bad value fails at startup, not mid-turn.
 */

import { ConfigurationError } from './errors.js';
import { PROVIDER_DEFAULTS } from './providers/createCompletionProvider.js';
import { PROVIDER_IDS, type ProviderConfig } from './types/models.js';

export type Env = Record<string, string | undefined>;

export interface EngineConfig {
  /** Null: no AI fallback, local matches and direct commands only. */
  provider: ProviderConfig | null;
  providerTimeoutMs: number;
  executionTimeoutMs: number;
  contextTurns: number;
  maxTurnsPerHost: number;
  minKeywordMatches: number;
  outputExcerptLength: number;
}

export const DEFAULT_CONFIG: Omit<EngineConfig, 'provider'> = {
  providerTimeoutMs: 30_000,
  executionTimeoutMs: 30_000,
  contextTurns: 10,
  maxTurnsPerHost: 100,
  minKeywordMatches: 1,
  outputExcerptLength: 500,
};

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be a whole number, got "${raw}"`, { variable: name });
  }
  const value = Number(raw);
  if (value < min) {
    throw new ConfigurationError(`${name} must be at least ${min}`, { variable: name });
  }
  return value;
}

function readProvider(env: Env): ProviderConfig | null {
  const raw = env.INTENT_SHELL_PROVIDER?.trim().toLowerCase();
  if (!raw) return null;

  const provider = PROVIDER_IDS.find((id) => id === raw);
  if (!provider) {
    throw new ConfigurationError(
      `Unknown completion provider "${raw}". Must be one of: ${PROVIDER_IDS.join(', ')}`,
      { variable: 'INTENT_SHELL_PROVIDER' }
    );
  }

  const defaults = PROVIDER_DEFAULTS[provider];
  return {
    provider,
    endpoint: env.INTENT_SHELL_PROVIDER_ENDPOINT?.trim() || defaults.endpoint,
    model: env.INTENT_SHELL_PROVIDER_MODEL?.trim() || defaults.model,
    apiKeyRef: env.INTENT_SHELL_PROVIDER_API_KEY_REF?.trim() || defaults.apiKeyRef,
  };
}

export function loadConfig(env: Env = process.env): EngineConfig {
  return {
    provider: readProvider(env),
    providerTimeoutMs: readInt(env, 'INTENT_SHELL_PROVIDER_TIMEOUT_MS', DEFAULT_CONFIG.providerTimeoutMs, 1),
    executionTimeoutMs: readInt(env, 'INTENT_SHELL_EXECUTION_TIMEOUT_MS', DEFAULT_CONFIG.executionTimeoutMs, 1),
    contextTurns: readInt(env, 'INTENT_SHELL_CONTEXT_TURNS', DEFAULT_CONFIG.contextTurns, 0),
    maxTurnsPerHost: readInt(env, 'INTENT_SHELL_MAX_TURNS', DEFAULT_CONFIG.maxTurnsPerHost, 1),
    minKeywordMatches: readInt(env, 'INTENT_SHELL_MIN_KEYWORDS', DEFAULT_CONFIG.minKeywordMatches, 1),
    outputExcerptLength: readInt(env, 'INTENT_SHELL_OUTPUT_EXCERPT', DEFAULT_CONFIG.outputExcerptLength, 0),
  };
}
