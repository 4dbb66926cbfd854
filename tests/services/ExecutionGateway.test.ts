import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ExecutionTimeoutError,
  ExecutionTransportError,
} from '../../src/errors.js';
import type { IRemoteSession, SessionHandle } from '../../src/providers/IRemoteSession.js';
import { ExecutionGateway } from '../../src/services/ExecutionGateway.js';
import type { CommandOutput } from '../../src/types/models.js';
import { MockRemoteSession } from '../mocks/MockRemoteSession.js';

const handle: SessionHandle = {
  id: 'session-1',
  hostKey: { address: '10.0.0.5', port: 22, user: 'ops' },
};

describe('ExecutionGateway', () => {
  let session: MockRemoteSession;
  let gateway: ExecutionGateway;

  beforeEach(() => {
    session = new MockRemoteSession();
    gateway = new ExecutionGateway(session, 1_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should return the session output unchanged', async () => {
    const output: CommandOutput = { stdout: 'Filesystem  Size', stderr: '', exitCode: 0 };
    session.respond('df -h', output);

    await expect(gateway.execute('df -h', handle)).resolves.toEqual(output);
    expect(session.runs).toEqual([{ handle, command: 'df -h', timeoutMs: 1_000 }]);
  });

  it('should pass a non-zero exit through as output', async () => {
    session.respond('false', { stdout: '', stderr: '', exitCode: 1 });

    await expect(gateway.execute('false', handle)).resolves.toMatchObject({ exitCode: 1 });
  });

  it('should time out a command that never finishes', async () => {
    vi.useFakeTimers();
    const stuck: IRemoteSession = { run: () => new Promise<CommandOutput>(() => {}) };
    gateway = new ExecutionGateway(stuck, 1_000);

    const pending = gateway.execute('tail -f /var/log/syslog', handle);
    const assertion = expect(pending).rejects.toThrow('Command did not finish within 1000ms');
    await vi.advanceTimersByTimeAsync(1_000);

    await assertion;
    await expect(pending).rejects.toBeInstanceOf(ExecutionTimeoutError);
  });

  it('should clear its deadline once the command finishes', async () => {
    vi.useFakeTimers();

    await gateway.execute('uptime', handle);

    expect(vi.getTimerCount()).toBe(0);
  });

  it('should wrap session failures as transport errors', async () => {
    session.respond('uptime', new Error('socket closed'));

    const error = await gateway.execute('uptime', handle).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExecutionTransportError);
    expect(error).toMatchObject({
      code: 'EXECUTION_TRANSPORT_ERROR',
      message: 'Remote session failed: socket closed',
      stderr: '',
    });
  });

  it('should keep stderr carried by a session error', async () => {
    session.respond('cat /root/secret', Object.assign(new Error('exit 1'), { stderr: 'Permission denied' }));

    await expect(gateway.execute('cat /root/secret', handle)).rejects.toMatchObject({
      stderr: 'Permission denied',
      details: { stderr: 'Permission denied' },
    });
  });

  it('should map a session timeout to an execution timeout', async () => {
    session.respond('sleep 60', Object.assign(new Error('timed out'), { name: 'TimeoutError' }));

    await expect(gateway.execute('sleep 60', handle)).rejects.toBeInstanceOf(ExecutionTimeoutError);
  });

  it('should never retry a failed command', async () => {
    session.respond('uptime', new Error('socket closed'));

    await gateway.execute('uptime', handle).catch(() => undefined);

    expect(session.runs).toHaveLength(1);
  });
});
