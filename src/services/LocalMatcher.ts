/**
 * Local intent matcher.
 * Maps normalized intents onto canned commands from a static table before
 * any completion provider is consulted.
 *
 * An entry matches when every keyword of at least one of its trigger sets
 * occurs in the intent, in any order. The score is the size of the largest
 * fully matched set; the highest score wins and ties go to the entry that
 * was registered first.
 */

import { readFileSync } from 'node:fs';
import { ConfigurationError } from '../errors.js';
import type { CandidateCommand } from '../types/models.js';
import { normalizeIntent } from '../utils/intent.js';
import { conforms, isRecord } from '../validation/schema.js';

export const COMMAND_CATEGORIES = [
  'system-info',
  'process-service',
  'network',
  'files',
  'logs',
  'users',
  'containers',
  'system-operations',
] as const;
export type CommandCategory = (typeof COMMAND_CATEGORIES)[number];

export interface LocalCommandEntry {
  id: string;
  category: CommandCategory;
  description: string;
  command: string;
  /** Alternative keyword sets; any one fully present is a match. */
  triggers: string[][];
}

/** A request the table recognises but cannot turn into a command without more detail. */
export interface GuidanceEntry {
  id: string;
  /** Shown to the operator instead of running anything. */
  message: string;
  triggers: string[][];
}

export interface LocalCommandTable {
  entries: LocalCommandEntry[];
  /** First words that mark raw input as a literal shell command. */
  directCommands: string[];
  guidance: GuidanceEntry[];
  /** Keyword sets that ask for the list of built-in commands. */
  helpTriggers: string[][];
}

export interface LocalMatch extends CandidateCommand {
  entryId: string;
  category: CommandCategory;
  /** Keywords matched by the winning trigger set. */
  score: number;
}

export interface LocalGuidance {
  kind: 'help' | 'needs-detail';
  entryId: string;
  message: string;
}

export interface LocalMatcherOptions {
  /** Matches scoring below this are ignored. Default: 1. */
  minKeywords?: number;
  directCommands?: readonly string[];
  guidance?: readonly GuidanceEntry[];
  helpTriggers?: readonly string[][];
}

export const DEFAULT_TABLE_URL = new URL('../../data/local-commands.json', import.meta.url);

const entrySchema = {
  id: { type: 'string', required: true, maxLength: 64 },
  category: { type: 'string', required: true, enum: COMMAND_CATEGORIES },
  description: { type: 'string', required: true, maxLength: 200 },
  command: { type: 'string', required: true, maxLength: 500 },
  triggers: { type: 'array', required: true },
} as const;

const guidanceSchema = {
  id: { type: 'string', required: true, maxLength: 64 },
  message: { type: 'string', required: true, maxLength: 500 },
  triggers: { type: 'array', required: true },
} as const;

function isKeywordSets(value: unknown[]): value is string[][] {
  return value.every(
    (set) =>
      Array.isArray(set) &&
      set.length > 0 &&
      set.every((keyword) => typeof keyword === 'string' && keyword.trim() !== '')
  );
}

/** Validate a parsed table. Throws ConfigurationError listing every problem. */
export function parseCommandTable(raw: unknown): LocalCommandTable {
  const errors: string[] = [];

  if (!isRecord(raw) || !Array.isArray(raw.entries)) {
    throw new ConfigurationError('Command table must be an object with an entries array');
  }

  const entries: LocalCommandEntry[] = [];
  const seen = new Set<string>();

  raw.entries.forEach((candidate: unknown, index) => {
    const entryErrors: string[] = [];
    if (!conforms(candidate, entrySchema, entryErrors)) {
      errors.push(...entryErrors.map((e) => `entries[${index}].${e}`));
      return;
    }
    if (!isKeywordSets(candidate.triggers) || candidate.triggers.length === 0) {
      errors.push(`entries[${index}].triggers must be non-empty arrays of keywords`);
      return;
    }
    if (seen.has(candidate.id)) {
      errors.push(`entries[${index}].id "${candidate.id}" is duplicated`);
      return;
    }
    seen.add(candidate.id);
    entries.push({
      id: candidate.id,
      category: candidate.category,
      description: candidate.description,
      command: candidate.command,
      triggers: candidate.triggers,
    });
  });

  const guidance: GuidanceEntry[] = [];
  const rawGuidance: unknown[] = Array.isArray(raw.guidance) ? raw.guidance : [];
  if (raw.guidance !== undefined && !Array.isArray(raw.guidance)) {
    errors.push('guidance must be an array');
  }

  rawGuidance.forEach((candidate: unknown, index) => {
    const entryErrors: string[] = [];
    if (!conforms(candidate, guidanceSchema, entryErrors)) {
      errors.push(...entryErrors.map((e) => `guidance[${index}].${e}`));
      return;
    }
    if (!isKeywordSets(candidate.triggers) || candidate.triggers.length === 0) {
      errors.push(`guidance[${index}].triggers must be non-empty arrays of keywords`);
      return;
    }
    if (seen.has(candidate.id)) {
      errors.push(`guidance[${index}].id "${candidate.id}" is duplicated`);
      return;
    }
    seen.add(candidate.id);
    guidance.push({ id: candidate.id, message: candidate.message, triggers: candidate.triggers });
  });

  let helpTriggers: string[][] = [];
  if (Array.isArray(raw.helpTriggers) && isKeywordSets(raw.helpTriggers)) {
    helpTriggers = raw.helpTriggers;
  } else if (raw.helpTriggers !== undefined) {
    errors.push('helpTriggers must be arrays of keywords');
  }

  const directCommands = Array.isArray(raw.directCommands)
    ? raw.directCommands.filter((c): c is string => typeof c === 'string')
    : [];

  if (errors.length > 0) {
    throw new ConfigurationError(`Invalid command table: ${errors.join('; ')}`, { errors });
  }

  return { entries, directCommands, guidance, helpTriggers };
}

export function loadCommandTable(source: URL | string = DEFAULT_TABLE_URL): LocalCommandTable {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(source, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read command table: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return parseCommandTable(raw);
}

export class LocalMatcher {
  private readonly entries: LocalCommandEntry[];
  private readonly minKeywords: number;
  private readonly directCommands: Set<string>;
  private readonly guidance: GuidanceEntry[];
  private readonly helpTriggers: string[][];

  constructor(entries: readonly LocalCommandEntry[], options?: LocalMatcherOptions) {
    // Keywords go through the same normalization as intents so matching is case-insensitive.
    this.entries = entries.map((entry) => ({ ...entry, triggers: normalizeTriggers(entry.triggers) }));
    this.minKeywords = options?.minKeywords ?? 1;
    this.directCommands = new Set(options?.directCommands ?? []);
    this.guidance = (options?.guidance ?? []).map((entry) => ({
      ...entry,
      triggers: normalizeTriggers(entry.triggers),
    }));
    this.helpTriggers = normalizeTriggers(options?.helpTriggers ?? []);
  }

  static fromTable(
    table: LocalCommandTable,
    options?: Pick<LocalMatcherOptions, 'minKeywords'>
  ): LocalMatcher {
    return new LocalMatcher(table.entries, {
      ...options,
      directCommands: table.directCommands,
      guidance: table.guidance,
      helpTriggers: table.helpTriggers,
    });
  }

  match(normalizedIntent: string): LocalMatch | null {
    if (!normalizedIntent) return null;

    let best: { entry: LocalCommandEntry; score: number } | null = null;

    for (const entry of this.entries) {
      const score = bestScore(entry.triggers, normalizedIntent);
      // Strict comparison keeps the first-registered entry on ties.
      if (score >= this.minKeywords && (best === null || score > best.score)) {
        best = { entry, score };
      }
    }

    if (!best) return null;

    const match: LocalMatch = {
      command: best.entry.command,
      origin: 'LocalMatch',
      rationale: best.entry.description,
      entryId: best.entry.id,
      category: best.entry.category,
      score: best.score,
    };
    return Object.freeze(match);
  }

  /**
   * Treat raw input as a literal shell command when its first word is a
   * known command or it is a path to an executable.
   */
  matchDirect(rawText: string): CandidateCommand | null {
    const text = rawText.trim();
    if (!text) return null;

    const firstWord = text.split(/\s+/)[0] ?? '';
    const looksLikeCommand =
      this.directCommands.has(firstWord) || text.startsWith('./') || text.startsWith('/');

    if (!looksLikeCommand) return null;

    const candidate: CandidateCommand = { command: text, origin: 'Direct', rationale: null };
    return Object.freeze(candidate);
  }

  /**
   * Requests answered with text rather than a command: a help request, or
   * one the table knows needs more detail (which process, which file).
   * Help wins over every other entry.
   */
  guide(normalizedIntent: string): LocalGuidance | null {
    if (!normalizedIntent) return null;

    if (bestScore(this.helpTriggers, normalizedIntent) > 0) {
      const help: LocalGuidance = { kind: 'help', entryId: 'help', message: this.helpText() };
      return Object.freeze(help);
    }

    let best: { entry: GuidanceEntry; score: number } | null = null;
    for (const entry of this.guidance) {
      const score = bestScore(entry.triggers, normalizedIntent);
      if (score >= this.minKeywords && (best === null || score > best.score)) {
        best = { entry, score };
      }
    }

    if (!best) return null;

    const guidance: LocalGuidance = {
      kind: 'needs-detail',
      entryId: best.entry.id,
      message: best.entry.message,
    };
    return Object.freeze(guidance);
  }

  /** Built-in requests grouped by category, in table order. */
  helpText(): string {
    const lines = ['Describe the task in plain words, or type a Linux command directly.'];

    for (const category of COMMAND_CATEGORIES) {
      const entries = this.entries.filter((entry) => entry.category === category);
      if (entries.length === 0) continue;
      lines.push('', `[${category}]`, ...entries.map((entry) => `  - ${entry.description}: ${entry.command}`));
    }

    lines.push('', 'Risky commands ask for confirmation before they run.');
    return lines.join('\n');
  }

  get size(): number {
    return this.entries.length;
  }
}

function normalizeTriggers(triggers: readonly string[][]): string[][] {
  return triggers.map((set) => set.map(normalizeIntent));
}

/** Size of the largest keyword set fully present in the intent; 0 when none is. */
function bestScore(triggers: readonly string[][], intent: string): number {
  let score = 0;
  for (const set of triggers) {
    if (set.length > score && set.every((keyword) => intent.includes(keyword))) {
      score = set.length;
    }
  }
  return score;
}
