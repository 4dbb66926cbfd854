/**
 * Remote session interface.
 * The transport (SSH or otherwise) is owned by the front-end; the engine only
 * ever runs commands through a handle it was given.
 */

import type { CommandOutput, HostKey } from '../types/models.js';

/** An open session to one host, passed explicitly to every run. */
export interface SessionHandle {
  readonly id: string;
  readonly hostKey: HostKey;
}

export interface IRemoteSession {
  /**
   * Run one command and collect its output.
   * Rejects when the session drops or the transport fails.
   */
  run(handle: SessionHandle, command: string, timeoutMs: number): Promise<CommandOutput>;
}
