import {
  BriefwireError,
  HttpError,
  ProviderAuthError,
  RetryExhaustedError,
  TimeoutError,
  errorMessage,
} from './errors.js';
import { logger } from './logger.js';
import { sleep as defaultSleep } from './utils.js';

export type FailureKind = 'retryable' | 'fatal';

export interface BackoffOptions {
  /** Short operation name for logs, e.g. "GET example.com". Never a payload. */
  label: string;
  maxAttempts: number;
  baseDelayMs: number;
  /** Upper bound for each individual attempt. */
  timeoutMs: number;
  classify: (err: unknown) => FailureKind;
  sleep?: (ms: number) => Promise<void>;
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  // attempt is 1-based; the first attempt has no delay
  if (attempt <= 1) return 0;
  return baseDelayMs * 2 ** (attempt - 2);
}

async function runAttempt<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, { timeoutMs }));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `operation` with bounded, exponentially spaced retries. Each attempt gets
 * its own abort signal and time bound. Fatal failures are rethrown as-is;
 * exhausting the attempts throws RetryExhaustedError.
 */
export async function withBackoff<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  options: BackoffOptions,
): Promise<T> {
  const { label, maxAttempts, baseDelayMs, timeoutMs, classify } = options;
  const sleep = options.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const delayMs = backoffDelay(baseDelayMs, attempt);
    if (delayMs > 0) {
      logger.warn(
        { label, attempt, maxAttempts, delayMs, error: errorMessage(lastError) },
        'Retrying after transient failure',
      );
      await sleep(delayMs);
    }

    try {
      return await runAttempt(operation, timeoutMs, label);
    } catch (err) {
      if (classify(err) === 'fatal') throw err;
      lastError = err;
    }
  }

  logger.warn({ label, attempts: maxAttempts, error: errorMessage(lastError) }, 'All attempts failed');
  throw new RetryExhaustedError(
    `${label} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
    maxAttempts,
    lastError,
  );
}

const FATAL_NETWORK_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED']);

function networkCode(err: unknown): string | undefined {
  // fetch() wraps socket errors: TypeError('fetch failed', { cause: { code } })
  let current: unknown = err;
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    // Our own error codes are not socket codes.
    if (!(current instanceof BriefwireError) && 'code' in current && typeof current.code === 'string') {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

export function isUnreachableHostError(err: unknown): boolean {
  const code = networkCode(err);
  return code !== undefined && FATAL_NETWORK_CODES.has(code);
}

export function classifyHttpFailure(err: unknown): FailureKind {
  if (err instanceof TimeoutError) return 'retryable';
  if (err instanceof HttpError) {
    return err.status === 429 || err.status >= 500 ? 'retryable' : 'fatal';
  }
  if (isUnreachableHostError(err)) return 'fatal';
  if (err instanceof TypeError && err.message === 'fetch failed') return 'retryable';
  if (err instanceof Error && err.name === 'AbortError') return 'retryable';
  if (networkCode(err) !== undefined) return 'retryable';
  return 'fatal';
}

export function classifyLlmFailure(err: unknown): FailureKind {
  if (err instanceof ProviderAuthError) return 'fatal';
  return classifyHttpFailure(err);
}
