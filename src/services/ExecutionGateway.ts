/**
 * Execution gateway.
 * Runs one command through the remote session under a deadline. Never retries.
 */

import {
  ExecutionError,
  ExecutionTimeoutError,
  ExecutionTransportError,
} from '../errors.js';
import type { IRemoteSession, SessionHandle } from '../providers/IRemoteSession.js';
import type { CommandOutput } from '../types/models.js';

export const DEFAULT_EXECUTION_TIMEOUT_MS = 30_000;

export class ExecutionGateway {
  constructor(
    private readonly session: IRemoteSession,
    private readonly timeoutMs = DEFAULT_EXECUTION_TIMEOUT_MS
  ) {}

  /**
   * Rejects with ExecutionTimeoutError past the deadline, or
   * ExecutionTransportError when the session fails.
   */
  async execute(command: string, handle: SessionHandle): Promise<CommandOutput> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ExecutionTimeoutError(this.timeoutMs)), this.timeoutMs);
    });

    try {
      return await Promise.race([this.run(command, handle), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async run(command: string, handle: SessionHandle): Promise<CommandOutput> {
    try {
      return await this.session.run(handle, command, this.timeoutMs);
    } catch (err) {
      if (err instanceof ExecutionError) throw err;
      if (isTimeout(err)) throw new ExecutionTimeoutError(this.timeoutMs);

      const message = err instanceof Error ? err.message : String(err);
      throw new ExecutionTransportError(`Remote session failed: ${message}`, stderrOf(err));
    }
  }
}

function isTimeout(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'TimeoutError';
}

// ssh2-style errors sometimes carry the remote stderr.
function stderrOf(err: unknown): string {
  return typeof err === 'object' && err !== null && 'stderr' in err && typeof err.stderr === 'string'
    ? err.stderr
    : '';
}
