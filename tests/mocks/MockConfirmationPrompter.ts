import type {
  ConfirmationReply,
  ConfirmationRequest,
  IConfirmationPrompter,
} from '../../src/providers/IConfirmationPrompter.js';

/** `hang` never answers; `fail` rejects as a broken dialog would. */
export type ScriptedReply = ConfirmationReply | 'hang' | 'fail';

export class MockConfirmationPrompter implements IConfirmationPrompter {
  readonly requests: ConfirmationRequest[] = [];
  readonly signals: AbortSignal[] = [];
  private readonly replies: ScriptedReply[] = [];

  script(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  async confirm(request: ConfirmationRequest, signal: AbortSignal): Promise<ConfirmationReply> {
    this.requests.push(request);
    this.signals.push(signal);

    const next = this.replies.shift() ?? { decision: 'reject' };
    if (next === 'hang') return new Promise<ConfirmationReply>(() => {});
    if (next === 'fail') throw new Error('terminal closed');
    return next;
  }
}
