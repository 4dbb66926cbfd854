/**
 * Credential masking for log fields.
 */

import type { LogEvent } from './ILogProvider.js';

export const REDACTED = '[redacted]';

const SECRET_KEY = /api[-_]?key|token|password|passwd|secret|authorization|credential/i;

/** Mask values stored under credential-like keys, at any depth. */
export function redactFields(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (SECRET_KEY.test(key)) {
      out[key] = REDACTED;
    } else if (typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)) {
      out[key] = redactFields(Object.fromEntries(Object.entries(value)));
    } else {
      out[key] = value;
    }
  }
  return out;
}

/** Stamp a timestamp if missing and redact fields. */
export function prepareEvent(event: LogEvent): LogEvent {
  return {
    ...event,
    timestamp: event.timestamp ?? new Date().toISOString(),
    ...(event.fields && { fields: redactFields(event.fields) }),
  };
}
