/**
 * Production container, configured from the environment.
 * Supabase-backed host memory when configured, in-memory otherwise.
 * Axiom logging when configured, console otherwise.
 */

import { loadConfig, type Env } from './config.js';
import { createContainer, type Container } from './container.js';
import { getSupabaseClient, hasSupabase } from './db.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { IConfirmationPrompter } from './providers/IConfirmationPrompter.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { IRemoteSession } from './providers/IRemoteSession.js';
import { InMemoryHostProfileRepository } from './repositories/InMemoryHostProfileRepository.js';
import { SupabaseHostProfileRepository } from './repositories/SupabaseHostProfileRepository.js';

export interface ProductionOptions {
  remoteSession: IRemoteSession;
  confirmationPrompter: IConfirmationPrompter;
  env?: Env;
}

export function createLogProvider(env: Env = process.env): ILogProvider {
  const apiToken = env.AXIOM_API_KEY;
  const dataset = env.AXIOM_DATASET;

  return apiToken && dataset
    ? new AxiomLogProvider({ apiToken, dataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });
}

export function getProductionContainer(options: ProductionOptions): Container {
  const env = options.env ?? process.env;
  const config = loadConfig(env);

  const hostProfileRepo = hasSupabase(env)
    ? new SupabaseHostProfileRepository(getSupabaseClient(env))
    : new InMemoryHostProfileRepository();

  return createContainer({
    config,
    hostProfileRepo,
    remoteSession: options.remoteSession,
    confirmationPrompter: options.confirmationPrompter,
    logProvider: createLogProvider(env),
    env,
  });
}
