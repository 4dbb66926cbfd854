import type { Intent } from '../types/models.js';

export function normalizeIntent(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

export function createIntent(rawText: string, receivedAt: Date = new Date()): Intent {
  return Object.freeze({
    rawText,
    normalized: normalizeIntent(rawText),
    receivedAt,
  });
}
