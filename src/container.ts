/**
 * Dependency wiring.
 * Constructs all services with their dependencies. Collaborators owned by
 * the front-end (remote session, confirmation prompter) are always passed in.
 */

import type { EngineConfig, Env } from './config.js';
import { createCompletionProvider } from './providers/createCompletionProvider.js';
import type { ICompletionProvider } from './providers/ICompletionProvider.js';
import type { IConfirmationPrompter } from './providers/IConfirmationPrompter.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRemoteSession } from './providers/IRemoteSession.js';
import type { IHostProfileRepository } from './repositories/IHostProfileRepository.js';
import { ExecutionGateway } from './services/ExecutionGateway.js';
import { HostMemoryStore } from './services/HostMemoryStore.js';
import { LocalMatcher, loadCommandTable, type LocalCommandTable } from './services/LocalMatcher.js';
import { ResolutionEngine } from './services/ResolutionEngine.js';
import { RiskClassifier } from './services/RiskClassifier.js';

export interface Container {
  config: EngineConfig;
  riskClassifier: RiskClassifier;
  localMatcher: LocalMatcher;
  hostMemory: HostMemoryStore;
  executionGateway: ExecutionGateway;
  completionProvider: ICompletionProvider | null;
  resolutionEngine: ResolutionEngine;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  config: EngineConfig;
  hostProfileRepo: IHostProfileRepository;
  remoteSession: IRemoteSession;
  confirmationPrompter: IConfirmationPrompter;
  logProvider: ILogProvider;
  /** Overrides the provider built from config. Pass null to disable AI. */
  completionProvider?: ICompletionProvider | null;
  /** Defaults to data/local-commands.json. */
  commandTable?: LocalCommandTable;
  /** Where provider credentials are looked up. Default: process.env. */
  env?: Env;
}): Container {
  const { config } = deps;

  const completionProvider =
    deps.completionProvider !== undefined
      ? deps.completionProvider
      : config.provider
        ? createCompletionProvider(config.provider, {
            timeoutMs: config.providerTimeoutMs,
            env: deps.env,
          })
        : null;

  const riskClassifier = new RiskClassifier();
  const localMatcher = LocalMatcher.fromTable(deps.commandTable ?? loadCommandTable(), {
    minKeywords: config.minKeywordMatches,
  });
  const hostMemory = new HostMemoryStore(deps.hostProfileRepo, {
    maxTurns: config.maxTurnsPerHost,
  });
  const executionGateway = new ExecutionGateway(deps.remoteSession, config.executionTimeoutMs);

  const resolutionEngine = new ResolutionEngine(
    {
      matcher: localMatcher,
      classifier: riskClassifier,
      memory: hostMemory,
      gateway: executionGateway,
      provider: completionProvider,
      prompter: deps.confirmationPrompter,
      logger: deps.logProvider,
    },
    {
      contextTurns: config.contextTurns,
      outputExcerptLength: config.outputExcerptLength,
    }
  );

  if (completionProvider) {
    deps.logProvider.info('completion provider ready', {
      provider: completionProvider.id,
      model: completionProvider.model,
    });
  }

  return {
    config,
    riskClassifier,
    localMatcher,
    hostMemory,
    executionGateway,
    completionProvider,
    resolutionEngine,
    logProvider: deps.logProvider,
  };
}
