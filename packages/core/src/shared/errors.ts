export class PromptBenchError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'PromptBenchError';
  }
}

export class ConfigError extends PromptBenchError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class InvalidPairError extends PromptBenchError {
  constructor(message: string) {
    super(message, 'INVALID_PAIR');
    this.name = 'InvalidPairError';
  }
}

export class PairNotFoundError extends PromptBenchError {
  constructor(public readonly pairKey: string) {
    super(`No stored results for ${pairKey}`, 'PAIR_NOT_FOUND');
    this.name = 'PairNotFoundError';
  }
}

export class AlreadyInProgressError extends PromptBenchError {
  constructor(
    public readonly pairKey: string,
    public readonly kind: 'generation' | 'evaluation',
  ) {
    super(`A ${kind} run is already in progress for ${pairKey}`, 'ALREADY_IN_PROGRESS');
    this.name = 'AlreadyInProgressError';
  }
}

export class NotGeneratedError extends PromptBenchError {
  constructor(public readonly pairKey: string) {
    super(`Responses for ${pairKey} have not been fully generated`, 'NOT_GENERATED');
    this.name = 'NotGeneratedError';
  }
}

export class IncompleteSelectionError extends PromptBenchError {
  constructor(message: string) {
    super(message, 'INCOMPLETE_SELECTION');
    this.name = 'IncompleteSelectionError';
  }
}

export class IntegrityError extends PromptBenchError {
  constructor(message: string) {
    super(message, 'INTEGRITY_ERROR');
    this.name = 'IntegrityError';
  }
}

/**
 * Failure of a single model or judge call. `transient` failures are retried
 * by the run; everything else is recorded for the index after one attempt.
 */
export class ProviderError extends PromptBenchError {
  constructor(
    message: string,
    code: string,
    public readonly transient: boolean,
  ) {
    super(message, code);
    this.name = 'ProviderError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  constructor(message: string) {
    super(message, 'PROVIDER_TIMEOUT', true);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderRateLimitedError extends ProviderError {
  constructor(
    message: string,
    public readonly retryAfterMs?: number,
  ) {
    super(message, 'PROVIDER_RATE_LIMITED', true);
    this.name = 'ProviderRateLimitedError';
  }
}

/** `status` 0 means the request never got an HTTP response. */
export class ProviderRequestError extends ProviderError {
  constructor(
    message: string,
    public readonly status: number,
  ) {
    super(message, 'PROVIDER_REQUEST_ERROR', status === 0 || status >= 500);
    this.name = 'ProviderRequestError';
  }
}

export class ProviderQuotaExceededError extends ProviderError {
  constructor(message: string) {
    super(message, 'PROVIDER_QUOTA_EXCEEDED', false);
    this.name = 'ProviderQuotaExceededError';
  }
}

export class ProviderAuthError extends ProviderError {
  constructor(message: string) {
    super(message, 'PROVIDER_AUTH_ERROR', false);
    this.name = 'ProviderAuthError';
  }
}

export class ProviderContextLengthError extends ProviderError {
  constructor(message: string) {
    super(message, 'PROVIDER_CONTEXT_LENGTH', false);
    this.name = 'ProviderContextLengthError';
  }
}

export class JudgeVerdictError extends ProviderError {
  constructor(message: string) {
    super(message, 'JUDGE_VERDICT_INVALID', false);
    this.name = 'JudgeVerdictError';
  }
}

export class ProviderUnavailableError extends ProviderError {
  constructor(
    public readonly attempts: number,
    public readonly lastError: ProviderError,
  ) {
    super(`Provider unavailable after ${attempts} attempts: ${lastError.message}`, 'PROVIDER_UNAVAILABLE', false);
    this.name = 'ProviderUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
