/**
 * Domain models: core entities as the engine understands them.
 * Decoupled from persisted row shapes (see database.ts).
 */

// ── Intent & resolution ──

export interface Intent {
  rawText: string;
  /** Trimmed, lowercased, whitespace runs collapsed to one space. */
  normalized: string;
  receivedAt: Date;
}

export const ORIGINS = ['LocalMatch', 'AIGenerated', 'Direct'] as const;
export type Origin = (typeof ORIGINS)[number];

/** Ordered from least to most dangerous. */
export const RISK_TIERS = ['Safe', 'Sensitive', 'Destructive'] as const;
export type RiskTier = (typeof RISK_TIERS)[number];

export interface ResolvedCommand {
  readonly command: string;
  readonly origin: Origin;
  readonly riskTier: RiskTier;
  /** Why this command answers the intent (provider explanation or table description). */
  readonly rationale: string | null;
  /** Labels of the risk rules the command matched. Empty when Safe. */
  readonly riskReasons: readonly string[];
}

/** A command before the risk classifier has seen it. */
export type CandidateCommand = Omit<ResolvedCommand, 'riskTier' | 'riskReasons'>;

// ── Hosts ──

export interface HostKey {
  address: string;
  port: number;
  user: string;
}

export interface HostFacts {
  os: string;
  kernel: string;
  cpuModel: string;
  memoryTotal: string;
}

export const TURN_OUTCOMES = ['succeeded', 'failed', 'rejected'] as const;
export type TurnOutcome = (typeof TURN_OUTCOMES)[number];

export interface Turn {
  readonly timestamp: Date;
  readonly intentText: string;
  readonly commandText: string;
  readonly origin: Origin;
  readonly riskTier: RiskTier;
  readonly outcome: TurnOutcome;
  /** Null when the command never ran or the session failed. */
  readonly exitCode: number | null;
  readonly outputExcerpt: string;
}

export interface HostProfile {
  hostKey: HostKey;
  facts: HostFacts | null;
  /** Oldest first. */
  turns: Turn[];
  updatedAt: Date | null;
}

/** What a completion provider may see about the target host. */
export interface HostContext {
  facts: HostFacts | null;
  /** Oldest first. */
  turns: readonly Turn[];
}

// ── Providers ──

export const PROVIDER_IDS = ['deepseek', 'openai', 'qwen', 'ollama'] as const;
export type ProviderId = (typeof PROVIDER_IDS)[number];

export interface ProviderConfig {
  provider: ProviderId;
  endpoint: string;
  model: string;
  /** Name of the environment variable holding the credential. Null for local models. */
  apiKeyRef: string | null;
}

// ── Execution ──

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}
