/**
 * Application error hierarchy.
 * Every failure the engine reports carries a stable `code` so front-ends can
 * branch on it without parsing messages.
 */

export class AppError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

// ── Resolution ──

/** Shown to the operator for every resolution failure. */
export const RESOLUTION_FAILED_MESSAGE =
  'AI resolution failed, please rephrase or provide the command directly';

export class ResolutionError extends AppError {}

/** Network, authentication or HTTP failure talking to the provider. */
export class ProviderUnavailableError extends ResolutionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROVIDER_UNAVAILABLE', message, details);
  }
}

export class ProviderTimeoutError extends ResolutionError {
  constructor(timeoutMs: number) {
    super('PROVIDER_TIMEOUT', `Provider did not respond within ${timeoutMs}ms`, { timeoutMs });
  }
}

/** The provider answered, but not with something we can turn into a command. */
export class ProviderMalformedResponseError extends ResolutionError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('PROVIDER_MALFORMED_RESPONSE', message, details);
  }
}

export class NoResolutionError extends ResolutionError {
  constructor(message = 'No local match and no completion provider configured') {
    super('NO_RESOLUTION', message);
  }
}

// ── Confirmation ──

export class ConfirmationRejectedError extends AppError {
  constructor(command: string, reason: string) {
    super('CONFIRMATION_REJECTED', `Command not confirmed: ${reason}`, { command });
  }
}

// ── Execution ──

export class ExecutionError extends AppError {}

export class ExecutionTimeoutError extends ExecutionError {
  constructor(timeoutMs: number) {
    super('EXECUTION_TIMEOUT', `Command did not finish within ${timeoutMs}ms`, { timeoutMs });
  }
}

/** The remote session dropped or failed mid-command. */
export class ExecutionTransportError extends ExecutionError {
  constructor(message: string, readonly stderr = '') {
    super('EXECUTION_TRANSPORT_ERROR', message, stderr ? { stderr } : undefined);
  }
}

// ── Startup ──

export class ConfigurationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, details);
  }
}
