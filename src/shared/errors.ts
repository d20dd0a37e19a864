export class BriefwireError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'BriefwireError';
  }
}

export class ConfigError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

export class SourceError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_ERROR', details);
    this.name = 'SourceError';
  }
}

/**
 * Non-2xx response from an origin or provider. Only the status is kept on the
 * error itself; response bodies never travel with it.
 */
export class HttpError extends BriefwireError {
  constructor(
    message: string,
    public readonly status: number,
    details?: Record<string, unknown>,
  ) {
    super(message, 'HTTP_ERROR', { ...details, status });
    this.name = 'HttpError';
  }
}

export class TimeoutError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'TIMEOUT', details);
    this.name = 'TimeoutError';
  }
}

export class RetryExhaustedError extends BriefwireError {
  constructor(
    message: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
    details?: Record<string, unknown>,
  ) {
    super(message, 'RETRY_EXHAUSTED', { ...details, attempts });
    this.name = 'RetryExhaustedError';
  }
}

export class LlmError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

/** Provider rejected our credentials. Aborts the summarize stage. */
export class ProviderAuthError extends LlmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'ProviderAuthError';
  }
}

export class SummaryValidationError extends LlmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'SummaryValidationError';
  }
}

export class InvariantError extends BriefwireError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVARIANT_VIOLATION', details);
    this.name = 'InvariantError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
