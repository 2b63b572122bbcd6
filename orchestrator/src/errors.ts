export type ErrorCode =
  | 'InvalidRequest'
  | 'ProviderUnavailable'
  | 'AllProvidersFailed'
  | 'OperationNotFound'
  | 'DecodeError'
  | 'JobNotFound'
  | 'AlreadyTerminal'
  | 'QueueUnavailable'
  | 'GenerationFailed'
  | 'OperationTimeout'
  | 'JobCancelled';

export class OrchestratorError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = `${code}Error`;
  }
}

export class InvalidRequestError extends OrchestratorError {
  constructor(message: string, readonly issues: string[] = []) {
    super('InvalidRequest', message);
  }
}

export class ProviderUnavailableError extends OrchestratorError {
  constructor(readonly provider: string | null, message?: string) {
    super('ProviderUnavailable', message ?? `Provider ${provider} is not configured`);
  }
}

export interface ProviderAttempt {
  provider: string;
  error: string;
}

export class AllProvidersFailedError extends OrchestratorError {
  constructor(readonly attempts: ProviderAttempt[]) {
    super(
      'AllProvidersFailed',
      `All providers failed: ${attempts.map((a) => `${a.provider}: ${a.error}`).join('; ')}`
    );
  }
}

export class OperationNotFoundError extends OrchestratorError {
  constructor(readonly qualifiedName: string, readonly shortName: string) {
    super('OperationNotFound', `Operation not found as ${qualifiedName} or ${shortName}`);
  }
}

export class DecodeError extends OrchestratorError {
  constructor(message: string) {
    super('DecodeError', message);
  }
}

export class JobNotFoundError extends OrchestratorError {
  constructor(readonly jobId: string) {
    super('JobNotFound', `Job ${jobId} not found`);
  }
}

export class AlreadyTerminalError extends OrchestratorError {
  constructor(readonly jobId: string, readonly status: string) {
    super('AlreadyTerminal', `Job ${jobId} is already ${status}`);
  }
}

export class QueueUnavailableError extends OrchestratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('QueueUnavailable', message, options);
  }
}

export class GenerationFailedError extends OrchestratorError {
  constructor(message: string, readonly provider?: string) {
    super('GenerationFailed', message);
  }
}

export class OperationTimeoutError extends OrchestratorError {
  constructor(readonly operationName: string, timeoutMs: number) {
    super('OperationTimeout', `Operation ${operationName} did not finish within ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class JobCancelledError extends OrchestratorError {
  constructor(readonly jobId: string) {
    super('JobCancelled', `Job ${jobId} was cancelled`);
  }
}

export function errorMessageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toErrorCode(error: unknown): ErrorCode {
  return error instanceof OrchestratorError ? error.code : 'GenerationFailed';
}

/** Job-facing form: the taxonomy label followed by the message. */
export function formatJobError(error: unknown): string {
  return `${toErrorCode(error)}: ${errorMessageOf(error)}`;
}

const NON_RETRYABLE: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'InvalidRequest',
  'ProviderUnavailable',
  'DecodeError',
  'JobCancelled'
]);

export function isRetryable(error: unknown): boolean {
  return !NON_RETRYABLE.has(toErrorCode(error));
}
