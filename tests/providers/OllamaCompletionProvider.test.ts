import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProviderMalformedResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../../src/errors.js';
import { OllamaCompletionProvider } from '../../src/providers/OllamaCompletionProvider.js';

const mockFetch = vi.fn<(input: string | URL | Request, init?: RequestInit) => Promise<Response>>();

function chatResponse(content: string): Response {
  return new Response(
    JSON.stringify({
      model: 'qwen2.5:7b',
      message: { role: 'assistant', content },
      done: true,
    }),
    { status: 200 }
  );
}

describe('OllamaCompletionProvider', () => {
  let provider: OllamaCompletionProvider;

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
    provider = new OllamaCompletionProvider({ timeoutMs: 5_000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should default to the local endpoint and model', () => {
    expect(provider.id).toBe('ollama');
    expect(provider.model).toBe('qwen2.5:7b');
  });

  it('should post the chat request and parse the reply', async () => {
    mockFetch.mockResolvedValue(chatResponse('{"command": "df -h", "explanation": "Disk usage"}'));

    const result = await provider.generateCommand({ intent: '查看磁盘', context: null });

    expect(result).toEqual({ kind: 'command', command: 'df -h', rationale: 'Disk usage', dangerous: false });
    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe('http://localhost:11434/api/chat');
    expect(init?.method).toBe('POST');

    const body: unknown = JSON.parse(String(init?.body));
    expect(body).toMatchObject({
      model: 'qwen2.5:7b',
      stream: false,
      format: 'json',
      options: { temperature: 0.1 },
      messages: [{ role: 'system' }, { role: 'user', content: '查看磁盘' }],
    });
  });

  it('should strip a trailing slash from a custom endpoint', async () => {
    provider = new OllamaCompletionProvider({
      endpoint: 'http://gpu-box:11434/',
      model: 'llama3.1:8b',
      timeoutMs: 5_000,
    });
    mockFetch.mockResolvedValue(chatResponse('{"command": "uptime"}'));

    await provider.generateCommand({ intent: 'uptime', context: null });

    expect(mockFetch.mock.calls[0]?.[0]).toBe('http://gpu-box:11434/api/chat');
  });

  it('should report HTTP errors with the server message', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify({ error: 'model not found' }), { status: 404 }));

    const error = await provider.generateCommand({ intent: 'x', context: null }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderUnavailableError);
    expect(error).toMatchObject({
      message: 'Ollama API error (404): model not found',
      details: { provider: 'ollama', status: 404 },
    });
  });

  it('should fall back to a generic message for an unreadable error body', async () => {
    mockFetch.mockResolvedValue(new Response('oops', { status: 500 }));

    await expect(provider.generateCommand({ intent: 'x', context: null })).rejects.toThrow(
      'Ollama API error (500): Unknown error'
    );
  });

  it('should map an aborted request to ProviderTimeoutError', async () => {
    mockFetch.mockRejectedValue(Object.assign(new Error('The operation was aborted'), { name: 'TimeoutError' }));

    await expect(provider.generateCommand({ intent: 'x', context: null })).rejects.toBeInstanceOf(
      ProviderTimeoutError
    );
  });

  it('should map a connection failure to ProviderUnavailableError', async () => {
    mockFetch.mockRejectedValue(new TypeError('fetch failed'));

    await expect(provider.generateCommand({ intent: 'x', context: null })).rejects.toThrow(
      'Ollama request failed: fetch failed'
    );
  });

  it('should reject a body that is not JSON', async () => {
    mockFetch.mockResolvedValue(new Response('not json', { status: 200 }));

    await expect(provider.generateCommand({ intent: 'x', context: null })).rejects.toThrow(
      'Ollama response is not valid JSON'
    );
  });

  it('should reject a response without a message', async () => {
    mockFetch.mockResolvedValue(new Response(JSON.stringify({ done: true }), { status: 200 }));

    const error = await provider.generateCommand({ intent: 'x', context: null }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderMalformedResponseError);
    expect(error).toMatchObject({ message: 'Unexpected Ollama response: message is required' });
  });

  it('should reject a reply without a command', async () => {
    mockFetch.mockResolvedValue(chatResponse('{"command": "  "}'));

    await expect(provider.generateCommand({ intent: 'x', context: null })).rejects.toThrow(
      'Provider did not return a command'
    );
  });
});
