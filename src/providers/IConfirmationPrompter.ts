/**
 * Confirmation prompter interface.
 * The front-end asks the operator to approve a risky command; the engine
 * decides whether the reply is good enough.
 */

import type { RiskTier } from '../types/models.js';

/**
 * `acknowledge`: a plain approve is enough (Sensitive).
 * `echo`: the operator must type the command back exactly (Destructive).
 */
export type ConfirmationMode = 'acknowledge' | 'echo';

export interface ConfirmationRequest {
  turnId: string;
  /** `address:port:user` */
  hostKey: string;
  command: string;
  riskTier: Exclude<RiskTier, 'Safe'>;
  reasons: readonly string[];
  mode: ConfirmationMode;
  /** Operator-facing prompt text. */
  prompt: string;
}

export type ConfirmationReply = { decision: 'approve'; echo?: string } | { decision: 'reject' };

export interface IConfirmationPrompter {
  /**
   * Ask once. `signal` aborts when the turn is cancelled; the prompter may
   * close its dialog then, but the engine does not wait for it.
   */
  confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationReply>;
}
