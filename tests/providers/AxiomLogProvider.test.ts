import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AxiomLogProvider } from '../../src/providers/AxiomLogProvider.js';

// We mock global fetch for all tests.
const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function sentBatch(call: number): Array<Record<string, unknown>> {
  const init = mockFetch.mock.calls[call]?.[1];
  return JSON.parse(String(init?.body));
}

describe('AxiomLogProvider', () => {
  let provider: AxiomLogProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockResolvedValue(new Response(null, { status: 200 }));
    provider = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      // Low thresholds for testing
      flushIntervalMs: 60_000,
      flushThreshold: 5,
    });
  });

  afterEach(async () => {
    await provider.dispose();
    vi.unstubAllGlobals();
  });

  // --- buffering ---

  it('should buffer events without sending until flush', () => {
    provider.info('turn.received');
    provider.warn('turn.provider_retry');
    expect(mockFetch).not.toHaveBeenCalled();
    expect(provider.pending).toBe(2);
  });

  // --- flush() ---

  it('should send buffered events to Axiom on flush', async () => {
    provider.info('one');
    provider.warn('two', { hostKey: '10.0.0.5:22:ops' });
    await provider.flush();

    expect(mockFetch).toHaveBeenCalledTimes(1);
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('https://api.axiom.co/v1/datasets/test-dataset/ingest');
    expect(init?.method).toBe('POST');
    expect(init?.headers).toMatchObject({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    });

    const body = sentBatch(0);
    expect(body).toHaveLength(2);
    expect(body[0]).toMatchObject({ level: 'info', message: 'one', service: 'intent-shell' });
    expect(body[1]).toMatchObject({
      level: 'warn',
      message: 'two',
      fields: { hostKey: '10.0.0.5:22:ops' },
    });
    // Timestamps should be set
    expect(body[0]?.timestamp).toEqual(expect.any(String));
  });

  it('should tag events with a custom service name', async () => {
    const tagged = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      service: 'ops-console',
      flushIntervalMs: 0,
    });
    tagged.info('hello');
    await tagged.flush();

    expect(sentBatch(0)[0]).toMatchObject({ service: 'ops-console' });
  });

  it('should mask credential-like fields before sending', async () => {
    provider.info('provider ready', { provider: 'deepseek', apiKey: 'test-secret' });
    await provider.flush();

    expect(sentBatch(0)[0]?.fields).toEqual({ provider: 'deepseek', apiKey: '[redacted]' });
  });

  it('should not call fetch when buffer is empty', async () => {
    await provider.flush();
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should clear buffer after successful flush', async () => {
    provider.info('event');
    await provider.flush();
    expect(provider.pending).toBe(0);

    // Second flush should be a no-op
    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- auto-flush on threshold ---

  it('should auto-flush when buffer reaches threshold', async () => {
    for (let i = 1; i <= 4; i++) provider.info(`${i}`);
    expect(mockFetch).not.toHaveBeenCalled();

    provider.info('5'); // hits threshold
    await vi.waitFor(() => expect(mockFetch).toHaveBeenCalledTimes(1));

    expect(sentBatch(0)).toHaveLength(5);
  });

  // --- error resilience ---

  it('should record the status when Axiom returns an error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('Server Error', { status: 500 }));
    provider.error('bad');

    await expect(provider.flush()).resolves.toBeUndefined();
    expect(provider.lastDeliveryError).toBe('Axiom ingest returned 500');
    expect(provider.pending).toBe(1);
  });

  it('should retain events when fetch rejects so they can be retried', async () => {
    mockFetch.mockRejectedValueOnce(new Error('Network down'));
    provider.info('important');
    await provider.flush();
    expect(provider.lastDeliveryError).toBe('Network down');

    await provider.flush();
    expect(mockFetch).toHaveBeenCalledTimes(2);
    expect(sentBatch(1).map((e) => e.message)).toEqual(['important']);
    expect(provider.lastDeliveryError).toBeNull();
  });

  it('should drop the oldest events past the buffer limit', async () => {
    const small = new AxiomLogProvider({
      apiToken: 'test-token',
      dataset: 'test-dataset',
      flushThreshold: 100,
      flushIntervalMs: 0,
      maxBuffered: 3,
    });
    for (let i = 1; i <= 5; i++) small.info(`event ${i}`);

    expect(small.pending).toBe(3);
    expect(small.dropped).toBe(2);

    await small.flush();
    expect(sentBatch(0).map((e) => e.message)).toEqual(['event 3', 'event 4', 'event 5']);
  });

  // --- dispose ---

  it('dispose() should flush remaining events', async () => {
    provider.info('final');
    await provider.dispose();
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  // --- disabled mode (no token) ---

  it('should silently no-op when apiToken is empty', async () => {
    const disabled = new AxiomLogProvider({ apiToken: '', dataset: 'x' });
    disabled.info('ignored');
    await disabled.dispose();
    expect(mockFetch).not.toHaveBeenCalled();
  });
});
