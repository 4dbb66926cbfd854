import { describe, it, expect } from 'vitest';
import { prepareEvent, redactFields, REDACTED } from '../../src/providers/redact.js';

describe('redactFields', () => {
  it('should mask keys that look like credentials', () => {
    expect(
      redactFields({
        apiKey: 'test-secret',
        'x-api-key': 'test-secret',
        accessToken: 'test-secret',
        password: 'test-secret',
        clientSecret: 'test-secret',
        command: 'df -h',
      })
    ).toEqual({
      apiKey: REDACTED,
      'x-api-key': REDACTED,
      accessToken: REDACTED,
      password: REDACTED,
      clientSecret: REDACTED,
      command: 'df -h',
    });
  });

  it('should mask nested objects but leave arrays and dates alone', () => {
    const at = new Date('2026-03-01T10:00:00.000Z');

    expect(redactFields({ provider: { token: 'test-secret', model: 'qwen-turbo' }, reasons: ['a'], at })).toEqual({
      provider: { token: REDACTED, model: 'qwen-turbo' },
      reasons: ['a'],
      at,
    });
  });

  it('should mask the whole value under a credential key', () => {
    expect(redactFields({ credentials: { user: 'ops' } })).toEqual({ credentials: REDACTED });
  });
});

describe('prepareEvent', () => {
  it('should leave an event without fields unchanged', () => {
    const event = prepareEvent({ level: 'info', message: 'hello', timestamp: '2026-03-01T10:00:00.000Z' });

    expect(event).toEqual({ level: 'info', message: 'hello', timestamp: '2026-03-01T10:00:00.000Z' });
  });

  it('should stamp a timestamp and mask fields', () => {
    const event = prepareEvent({ level: 'debug', message: 'turn.state', fields: { apiKey: 'x' } });

    expect(event.fields).toEqual({ apiKey: REDACTED });
    expect(event.timestamp).toEqual(expect.any(String));
  });
});
