/**
 * Resolution engine.
 * Drives one operator turn from free text to a terminal state: local match
 * or completion provider, risk classification, confirmation gate, execution
 * and host memory. Turns for one host run one after another; turns for
 * different hosts run concurrently.
 */

import { randomUUID } from 'node:crypto';
import {
  AppError,
  ConfirmationRejectedError,
  ExecutionError,
  ExecutionTransportError,
  NoResolutionError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  RESOLUTION_FAILED_MESSAGE,
  ResolutionError,
} from '../errors.js';
import type {
  CompletionRequest,
  CompletionResult,
  ICompletionProvider,
} from '../providers/ICompletionProvider.js';
import type {
  ConfirmationMode,
  ConfirmationReply,
  ConfirmationRequest,
  IConfirmationPrompter,
} from '../providers/IConfirmationPrompter.js';
import type { ILogProvider, LogLevel, TurnLogEvent } from '../providers/ILogProvider.js';
import type { SessionHandle } from '../providers/IRemoteSession.js';
import type {
  CandidateCommand,
  CommandOutput,
  HostKey,
  Intent,
  ResolvedCommand,
  RiskTier,
  Turn,
  TurnOutcome,
} from '../types/models.js';
import { formatHostKey } from '../utils/host-key.js';
import { createIntent } from '../utils/intent.js';
import { KeyedMutex } from '../utils/KeyedMutex.js';
import type { ExecutionGateway } from './ExecutionGateway.js';
import type { HostMemoryStore } from './HostMemoryStore.js';
import type { LocalMatcher } from './LocalMatcher.js';
import { higherTier, type RiskClassifier } from './RiskClassifier.js';

export const TURN_STATES = [
  'Received',
  'LocalMatching',
  'Matched',
  'Unmatched',
  'AIResolving',
  'Resolved',
  'Failed',
  'Classifying',
  'AwaitingConfirmation',
  'Confirmed',
  'Rejected',
  'Executing',
  'Succeeded',
  'ExecutionFailed',
  'Reported',
  'Recorded',
] as const;
export type TurnState = (typeof TURN_STATES)[number];

export type FinalState = Extract<TurnState, 'Reported' | 'Recorded'>;

/**
 * `unresolved`: nothing to run. `cancelled`: aborted while awaiting confirmation.
 * `guidance`: answered with text (help, or a request for more detail).
 */
export type TurnReportOutcome = TurnOutcome | 'cancelled' | 'unresolved' | 'guidance';

/** Added to the risk reasons when the provider marked its own command dangerous. */
export const PROVIDER_FLAG_REASON = 'provider: flagged dangerous';

export const DEFAULT_CONTEXT_TURNS = 10;
export const DEFAULT_OUTPUT_EXCERPT_LENGTH = 500;

export interface TurnRequest {
  handle: SessionHandle;
  text: string;
  /** Cancels the turn while it awaits confirmation. Ignored at every other point. */
  signal?: AbortSignal;
}

export interface TurnReport {
  turnId: string;
  /** `address:port:user` */
  hostKey: string;
  intent: Intent;
  finalState: FinalState;
  /** Every state the turn passed through, in order. */
  trail: TurnState[];
  outcome: TurnReportOutcome;
  resolved: ResolvedCommand | null;
  output: CommandOutput | null;
  error: { code: string; message: string } | null;
  /** Operator-facing summary. */
  message: string;
  /** The turn written to host memory, if any. */
  recorded: Turn | null;
}

/** Permission to run exactly one command text within one turn. */
export interface ConfirmationToken {
  readonly turnId: string;
  readonly command: string;
  readonly grantedAt: Date;
}

export interface ResolutionEngineDeps {
  matcher: LocalMatcher;
  classifier: RiskClassifier;
  memory: HostMemoryStore;
  gateway: ExecutionGateway;
  /** Null disables the AI fallback. */
  provider: ICompletionProvider | null;
  prompter: IConfirmationPrompter;
  logger: ILogProvider;
}

export interface ResolutionEngineOptions {
  /** Recent turns handed to the provider. Default: 10. */
  contextTurns?: number;
  /** Characters of output kept on a recorded turn. Default: 500. */
  outputExcerptLength?: number;
  clock?: () => Date;
  idFactory?: () => string;
}

type Resolution =
  | { kind: 'command'; candidate: CandidateCommand; providerFlagged: boolean }
  | { kind: 'guidance'; source: 'help' | 'needs-detail' | 'clarification'; message: string };

type GateResult =
  | { kind: 'confirmed'; token: ConfirmationToken }
  | { kind: 'rejected'; reason: string }
  | { kind: 'cancelled' };

interface TurnResult {
  outcome: TurnReportOutcome;
  message: string;
  resolved?: ResolvedCommand;
  output?: CommandOutput | null;
  error?: AppError | null;
  recorded?: Turn;
}

/** State trail and structured logging for one turn. */
class TurnTrace {
  readonly trail: TurnState[] = [];
  private readonly startedAt = Date.now();

  constructor(
    readonly turnId: string,
    readonly hostKey: string,
    private readonly logger: ILogProvider
  ) {}

  enter(state: TurnState): void {
    this.trail.push(state);
    this.emit('debug', 'turn.state');
  }

  emit(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    const event: TurnLogEvent = {
      level,
      message,
      turnId: this.turnId,
      hostKey: this.hostKey,
      state: this.trail[this.trail.length - 1] ?? 'Received',
      fields,
    };
    this.logger.log(event);
  }

  get elapsedMs(): number {
    return Date.now() - this.startedAt;
  }
}

export class ResolutionEngine {
  private readonly hostLocks = new KeyedMutex();
  private readonly contextTurns: number;
  private readonly outputExcerptLength: number;
  private readonly clock: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly deps: ResolutionEngineDeps,
    options: ResolutionEngineOptions = {}
  ) {
    this.contextTurns = options.contextTurns ?? DEFAULT_CONTEXT_TURNS;
    this.outputExcerptLength = options.outputExcerptLength ?? DEFAULT_OUTPUT_EXCERPT_LENGTH;
    this.clock = options.clock ?? (() => new Date());
    this.newId = options.idFactory ?? randomUUID;
  }

  /**
   * Run one operator turn against the host behind `request.handle`.
   * Provider, confirmation and execution failures end up in the report;
   * only host memory failures reject.
   */
  async handleTurn(request: TurnRequest): Promise<TurnReport> {
    const hostKey = formatHostKey(request.handle.hostKey);
    return this.hostLocks.run(hostKey, () => this.runTurn(request, hostKey));
  }

  private async runTurn(request: TurnRequest, hostKey: string): Promise<TurnReport> {
    const intent = createIntent(request.text, this.clock());
    const trace = new TurnTrace(this.newId(), hostKey, this.deps.logger);
    trace.enter('Received');
    trace.emit('info', 'turn.received', { intentLength: intent.rawText.length });

    const resolution = await this.resolve(intent, request.handle.hostKey, trace);
    if (resolution instanceof ResolutionError) {
      return this.finish(trace, intent, 'Reported', {
        outcome: 'unresolved',
        message: RESOLUTION_FAILED_MESSAGE,
        error: resolution,
      });
    }
    if (resolution.kind === 'guidance') {
      trace.emit('info', 'turn.guidance', { source: resolution.source });
      return this.finish(trace, intent, 'Reported', {
        outcome: 'guidance',
        message: resolution.message,
      });
    }

    trace.enter('Classifying');
    const { candidate, providerFlagged } = resolution;
    const assessment = this.deps.classifier.assess(candidate.command);
    const resolved: ResolvedCommand = Object.freeze({
      command: candidate.command,
      origin: candidate.origin,
      rationale: candidate.rationale,
      // The provider may raise the tier, never lower it.
      riskTier: providerFlagged ? higherTier(assessment.tier, 'Sensitive') : assessment.tier,
      riskReasons: Object.freeze(
        providerFlagged ? [...assessment.reasons, PROVIDER_FLAG_REASON] : [...assessment.reasons]
      ),
    });
    trace.emit('info', 'turn.resolved', {
      origin: resolved.origin,
      riskTier: resolved.riskTier,
      reasons: resolved.riskReasons,
      providerFlagged,
    });

    let token: ConfirmationToken | null = null;

    if (resolved.riskTier !== 'Safe') {
      trace.enter('AwaitingConfirmation');
      const gate = await this.confirm(trace, resolved, resolved.riskTier, request.signal);
      trace.emit('info', 'turn.confirmation', { decision: gate.kind, riskTier: resolved.riskTier });

      if (gate.kind === 'cancelled') {
        return this.finish(trace, intent, 'Reported', {
          outcome: 'cancelled',
          message: 'Turn cancelled before the command ran',
          resolved,
        });
      }

      if (gate.kind === 'rejected') {
        trace.enter('Rejected');
        const recorded = this.toTurn(intent, resolved, 'rejected', null, '');
        await this.deps.memory.append(request.handle.hostKey, recorded);
        const error = new ConfirmationRejectedError(resolved.command, gate.reason);
        return this.finish(trace, intent, 'Reported', {
          outcome: 'rejected',
          message: error.message,
          resolved,
          error,
          recorded,
        });
      }

      trace.enter('Confirmed');
      token = gate.token;
    }

    this.assertAuthorized(trace.turnId, resolved, token);

    trace.enter('Executing');
    const executionStart = Date.now();
    let output: CommandOutput | null = null;
    let failure: ExecutionError | null = null;

    try {
      output = await this.deps.gateway.execute(resolved.command, request.handle);
    } catch (err) {
      failure =
        err instanceof ExecutionError ? err : new ExecutionTransportError(errorMessage(err));
    }

    const succeeded = output !== null && output.exitCode === 0;
    trace.enter(succeeded ? 'Succeeded' : 'ExecutionFailed');
    trace.emit(succeeded ? 'info' : 'warn', 'turn.executed', {
      exitCode: output?.exitCode ?? null,
      errorCode: failure?.code ?? null,
      durationMs: Date.now() - executionStart,
    });

    const recorded = this.toTurn(
      intent,
      resolved,
      succeeded ? 'succeeded' : 'failed',
      output?.exitCode ?? null,
      this.excerpt(output, failure)
    );
    await this.deps.memory.append(request.handle.hostKey, recorded);

    return this.finish(trace, intent, 'Recorded', {
      outcome: recorded.outcome,
      message: executionMessage(output, failure),
      resolved,
      output,
      error: failure,
      recorded,
    });
  }

  /** Local table, then direct command, then local guidance, then the completion provider. */
  private async resolve(
    intent: Intent,
    hostKey: HostKey,
    trace: TurnTrace
  ): Promise<Resolution | ResolutionError> {
    trace.enter('LocalMatching');
    const local =
      this.deps.matcher.match(intent.normalized) ?? this.deps.matcher.matchDirect(intent.rawText);

    if (local) {
      trace.enter('Matched');
      return {
        kind: 'command',
        candidate: { command: local.command, origin: local.origin, rationale: local.rationale },
        providerFlagged: false,
      };
    }

    const guidance = this.deps.matcher.guide(intent.normalized);
    if (guidance) {
      trace.enter('Matched');
      return { kind: 'guidance', source: guidance.kind, message: guidance.message };
    }

    trace.enter('Unmatched');

    const provider = this.deps.provider;
    if (!provider) {
      trace.enter('Failed');
      return new NoResolutionError();
    }
    if (!intent.normalized) {
      trace.enter('Failed');
      return new NoResolutionError('Empty request');
    }

    trace.enter('AIResolving');
    const context = await this.deps.memory.hostContext(hostKey, this.contextTurns);
    const request: CompletionRequest = {
      intent: intent.normalized,
      context: context.facts || context.turns.length > 0 ? context : null,
    };

    try {
      const result = await this.generate(provider, request, trace);
      trace.enter('Resolved');
      if (result.kind === 'clarification') {
        return { kind: 'guidance', source: 'clarification', message: result.explanation };
      }
      return {
        kind: 'command',
        candidate: { command: result.command, origin: 'AIGenerated', rationale: result.rationale },
        providerFlagged: result.dangerous,
      };
    } catch (err) {
      const error =
        err instanceof ResolutionError ? err : new ProviderUnavailableError(errorMessage(err));
      trace.enter('Failed');
      trace.emit('warn', 'turn.provider_failed', {
        provider: provider.id,
        code: error.code,
        error: error.message,
      });
      return error;
    }
  }

  /** One retry, on timeout only. */
  private async generate(
    provider: ICompletionProvider,
    request: CompletionRequest,
    trace: TurnTrace
  ): Promise<CompletionResult> {
    try {
      return await provider.generateCommand(request);
    } catch (err) {
      if (!(err instanceof ProviderTimeoutError)) throw err;
      trace.emit('warn', 'turn.provider_retry', { provider: provider.id });
      return provider.generateCommand(request);
    }
  }

  private async confirm(
    trace: TurnTrace,
    resolved: ResolvedCommand,
    riskTier: Exclude<RiskTier, 'Safe'>,
    signal?: AbortSignal
  ): Promise<GateResult> {
    if (signal?.aborted) return { kind: 'cancelled' };

    const mode: ConfirmationMode = riskTier === 'Destructive' ? 'echo' : 'acknowledge';
    const request: ConfirmationRequest = {
      turnId: trace.turnId,
      hostKey: trace.hostKey,
      command: resolved.command,
      riskTier,
      reasons: resolved.riskReasons,
      mode,
      prompt: confirmationPrompt(resolved, riskTier, mode),
    };

    const controller = new AbortController();
    const cancelled = new Promise<'cancelled'>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve('cancelled'), { once: true });
    });
    const onAbort = () => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let reply: ConfirmationReply | 'cancelled';
    try {
      reply = await Promise.race([this.deps.prompter.confirm(request, controller.signal), cancelled]);
    } catch (err) {
      return { kind: 'rejected', reason: `confirmation failed: ${errorMessage(err)}` };
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (reply === 'cancelled') return { kind: 'cancelled' };
    if (reply.decision === 'reject') return { kind: 'rejected', reason: 'operator declined' };
    if (mode === 'echo' && reply.echo?.trim() !== resolved.command.trim()) {
      return { kind: 'rejected', reason: 'typed text did not match the command' };
    }

    const token: ConfirmationToken = {
      turnId: trace.turnId,
      command: resolved.command,
      grantedAt: this.clock(),
    };
    return { kind: 'confirmed', token: Object.freeze(token) };
  }

  private assertAuthorized(
    turnId: string,
    resolved: ResolvedCommand,
    token: ConfirmationToken | null
  ): void {
    if (resolved.riskTier === 'Safe') return;
    if (!token || token.turnId !== turnId || token.command !== resolved.command) {
      throw new ConfirmationRejectedError(resolved.command, 'no confirmation for this command in this turn');
    }
  }

  private toTurn(
    intent: Intent,
    resolved: ResolvedCommand,
    outcome: TurnOutcome,
    exitCode: number | null,
    outputExcerpt: string
  ): Turn {
    return Object.freeze({
      timestamp: this.clock(),
      intentText: intent.rawText.trim(),
      commandText: resolved.command,
      origin: resolved.origin,
      riskTier: resolved.riskTier,
      outcome,
      exitCode,
      outputExcerpt,
    });
  }

  private excerpt(output: CommandOutput | null, failure: ExecutionError | null): string {
    let text = '';
    if (output) {
      text = output.exitCode === 0 ? output.stdout : output.stderr || output.stdout;
    } else if (failure) {
      text =
        failure instanceof ExecutionTransportError && failure.stderr
          ? failure.stderr
          : failure.message;
    }
    return text.slice(0, this.outputExcerptLength);
  }

  private finish(
    trace: TurnTrace,
    intent: Intent,
    finalState: FinalState,
    result: TurnResult
  ): TurnReport {
    trace.enter(finalState);
    trace.emit(result.outcome === 'succeeded' ? 'info' : 'warn', 'turn.reported', {
      finalState,
      outcome: result.outcome,
      errorCode: result.error?.code ?? null,
      durationMs: trace.elapsedMs,
    });

    return {
      turnId: trace.turnId,
      hostKey: trace.hostKey,
      intent,
      finalState,
      trail: [...trace.trail],
      outcome: result.outcome,
      resolved: result.resolved ?? null,
      output: result.output ?? null,
      error: result.error ? { code: result.error.code, message: result.error.message } : null,
      message: result.message,
      recorded: result.recorded ?? null,
    };
  }
}

function confirmationPrompt(
  resolved: ResolvedCommand,
  riskTier: Exclude<RiskTier, 'Safe'>,
  mode: ConfirmationMode
): string {
  const lines = [`${riskTier} command: ${resolved.command}`];
  if (resolved.riskReasons.length > 0) {
    lines.push(`Reasons: ${resolved.riskReasons.join(', ')}`);
  }
  lines.push(mode === 'echo' ? 'Type the command exactly to run it.' : 'Run it?');
  return lines.join('\n');
}

function executionMessage(output: CommandOutput | null, failure: ExecutionError | null): string {
  if (failure) {
    return failure instanceof ExecutionTransportError && failure.stderr
      ? `${failure.message}\n${failure.stderr}`
      : failure.message;
  }
  if (!output || output.exitCode === 0) return 'Command completed';

  const stderr = output.stderr.trim();
  return `Command exited with status ${output.exitCode}${stderr ? `: ${stderr}` : ''}`;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
