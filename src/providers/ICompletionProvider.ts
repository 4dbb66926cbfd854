/**
 * Completion provider interface.
 * Wraps a language-model backend (cloud vendor or local model) that turns an
 * operator intent into one shell command.
 */

import type { HostContext, ProviderId } from '../types/models.js';

export interface CompletionRequest {
  /** Normalized intent text. */
  intent: string;
  /** Host facts and recent turns, or null when nothing is known yet. */
  context: HostContext | null;
}

export interface CompletionCommand {
  kind: 'command';
  command: string;
  /** Provider's explanation of the command, when it gave one. */
  rationale: string | null;
  /** The model's own judgement that the command is risky. */
  dangerous: boolean;
}

/** The model asked for more detail instead of answering with a command. */
export interface CompletionClarification {
  kind: 'clarification';
  explanation: string;
}

export type CompletionResult = CompletionCommand | CompletionClarification;

export interface ICompletionProvider {
  readonly id: ProviderId;
  readonly model: string;

  /**
   * Generate a command for the intent, or the model's request for more detail.
   * Rejects with ProviderUnavailableError, ProviderTimeoutError or
   * ProviderMalformedResponseError. Never retries on its own.
   */
  generateCommand(request: CompletionRequest): Promise<CompletionResult>;
}
