/**
 * Prompt construction and reply parsing shared by every completion provider.
 */

import { ProviderMalformedResponseError } from '../errors.js';
import type { HostContext, Turn, TurnOutcome } from '../types/models.js';
import { conforms } from '../validation/schema.js';
import type { CompletionResult } from './ICompletionProvider.js';

const OUTCOME_MARKS: Record<TurnOutcome, string> = {
  succeeded: '✓',
  failed: '✗',
  rejected: '⊘',
};

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatTurn(turn: Turn, index: number): string {
  return (
    `${index}. [${formatTimestamp(turn.timestamp)}] ${OUTCOME_MARKS[turn.outcome]} ` +
    `「${turn.intentText}」 → ${turn.commandText}`
  );
}

/** Render host facts and history as prompt text. Empty string when there is nothing to say. */
export function formatHostContext(context: HostContext | null): string {
  if (!context) return '';

  const sections: string[] = [];

  if (context.facts) {
    const { os, kernel, cpuModel, memoryTotal } = context.facts;
    sections.push(
      ['Host:', `- OS: ${os}`, `- Kernel: ${kernel}`, `- CPU: ${cpuModel}`, `- Memory: ${memoryTotal}`].join('\n')
    );
  }

  if (context.turns.length > 0) {
    sections.push(
      [
        'Recent operations on this host (✓ succeeded, ✗ failed, ⊘ rejected by the operator):',
        ...context.turns.map((turn, i) => formatTurn(turn, i + 1)),
      ].join('\n')
    );
  }

  return sections.join('\n\n');
}

export function buildSystemPrompt(context: HostContext | null): string {
  const hostSection = formatHostContext(context) || 'Nothing is known about this host yet.';

  return `You are a Linux system administration assistant. Translate the operator's request into exactly one shell command for the host described below.

${hostSection}

Rules:
- Use the package manager that matches the host OS: apt on Ubuntu/Debian, dnf or yum on CentOS/RHEL/Fedora, apk on Alpine.
- Prefer read-only commands when the request is ambiguous.
- Do not suggest a command the operator rejected (⊘) again unless the request clearly asks for it, and say so in the explanation.
- Explain in the language the operator used.

Reply with JSON only:
{"command": "<shell command>", "description": "<short summary>", "dangerous": <true|false>, "explanation": "<why this command>"}
If the request cannot be answered with a single command, reply with an empty "command" and say what is missing in "explanation".`;
}

const replySchema = {
  command: { type: 'string', required: true, maxLength: 4000 },
  description: { type: 'string', required: false },
  dangerous: { type: 'boolean', required: false },
  explanation: { type: 'string', required: false },
} as const;

const FENCED = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

/**
 * Parse a model reply into a command, or a clarification when the command is
 * empty but the model explained why. Throws ProviderMalformedResponseError.
 */
export function parseCompletionReply(content: string | null | undefined): CompletionResult {
  if (!content || !content.trim()) {
    throw new ProviderMalformedResponseError('Provider returned an empty reply');
  }

  let text = content.trim();
  const fenced = FENCED.exec(text);
  if (fenced) {
    text = (fenced[1] ?? '').trim();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ProviderMalformedResponseError('Provider reply is not valid JSON', {
      reply: text.slice(0, 200),
    });
  }

  const errors: string[] = [];
  if (!conforms(parsed, replySchema, errors)) {
    throw new ProviderMalformedResponseError(`Provider reply has the wrong shape: ${errors.join('; ')}`, {
      errors,
    });
  }

  const command = parsed.command.trim();
  const rationale = parsed.explanation?.trim() || parsed.description?.trim() || null;

  if (!command) {
    if (rationale) return { kind: 'clarification', explanation: rationale };
    throw new ProviderMalformedResponseError('Provider did not return a command');
  }

  return { kind: 'command', command, rationale, dangerous: parsed.dangerous ?? false };
}
