export * from './errors.js';
export * from './types/models.js';
export * from './providers/index.js';
export { loadConfig, DEFAULT_CONFIG, type EngineConfig, type Env } from './config.js';
export { createContainer, type Container } from './container.js';
export { getProductionContainer, createLogProvider, type ProductionOptions } from './container.production.js';
export type { IHostProfileRepository } from './repositories/IHostProfileRepository.js';
export { InMemoryHostProfileRepository } from './repositories/InMemoryHostProfileRepository.js';
export { SupabaseHostProfileRepository } from './repositories/SupabaseHostProfileRepository.js';
export { RiskClassifier, RISK_RULES, type RiskAssessment, type RiskRule } from './services/RiskClassifier.js';
export {
  LocalMatcher,
  loadCommandTable,
  parseCommandTable,
  type GuidanceEntry,
  type LocalCommandEntry,
  type LocalCommandTable,
  type LocalGuidance,
  type LocalMatch,
} from './services/LocalMatcher.js';
export { HostMemoryStore, type HostSummary } from './services/HostMemoryStore.js';
export { ExecutionGateway } from './services/ExecutionGateway.js';
export {
  PROVIDER_FLAG_REASON,
  ResolutionEngine,
  TURN_STATES,
  type ConfirmationToken,
  type TurnReport,
  type TurnReportOutcome,
  type TurnRequest,
  type TurnState,
} from './services/ResolutionEngine.js';
export { formatHostKey, parseHostKey } from './utils/host-key.js';
export { createIntent, normalizeIntent } from './utils/intent.js';
