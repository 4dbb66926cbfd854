export type {
  CompletionClarification,
  CompletionCommand,
  CompletionRequest,
  CompletionResult,
  ICompletionProvider,
} from './ICompletionProvider.js';
export {
  OpenAICompatibleCompletionProvider,
  openAIChatCompleter,
  type ChatCompleter,
  type ChatRequest,
  type CloudProviderId,
} from './OpenAICompatibleCompletionProvider.js';
export { OllamaCompletionProvider } from './OllamaCompletionProvider.js';
export { createCompletionProvider, PROVIDER_DEFAULTS } from './createCompletionProvider.js';
export { buildSystemPrompt, formatHostContext, parseCompletionReply } from './completion-prompt.js';
export type {
  ConfirmationMode,
  ConfirmationReply,
  ConfirmationRequest,
  IConfirmationPrompter,
} from './IConfirmationPrompter.js';
export type { IRemoteSession, SessionHandle } from './IRemoteSession.js';
export type { ILogProvider, LogEvent, LogLevel, TurnLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export { redactFields } from './redact.js';
