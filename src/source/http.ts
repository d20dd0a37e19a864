import type { Config } from '../shared/config.js';
import type { CacheValidators } from './adapter.js';
import {
  classifyHttpFailure,
  isUnreachableHostError,
  withBackoff,
} from '../shared/backoff.js';
import { HttpError, RetryExhaustedError, errorMessage } from '../shared/errors.js';
import { hostnameOf } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export const FEED_ACCEPT =
  'application/rss+xml, application/atom+xml, application/xml, text/xml;q=0.9, */*;q=0.8';
export const HTML_ACCEPT = 'text/html, application/xhtml+xml;q=0.9, */*;q=0.8';

export type FetchOutcome =
  | {
      kind: 'ok';
      status: number;
      body: string;
      contentType: string | null;
      validators: CacheValidators;
    }
  | { kind: 'not_modified' }
  | { kind: 'failed'; error: string; retryable: boolean };

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
  maxAttempts: number;
  baseDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface GetOptions {
  validators?: CacheValidators;
  accept?: string;
}

export class HttpFetcher {
  // Hosts that failed hard during this run are not contacted again. The value
  // records whether that failure was transient (retries exhausted).
  private readonly failedHosts = new Map<string, boolean>();

  constructor(private readonly options: HttpFetcherOptions) {}

  static fromConfig(config: Config['ingest'], sleep?: (ms: number) => Promise<void>): HttpFetcher {
    return new HttpFetcher({
      timeoutMs: config.fetch_timeout_ms,
      userAgent: config.user_agent,
      maxAttempts: config.max_attempts,
      baseDelayMs: config.backoff_base_ms,
      sleep,
    });
  }

  isHostBlocked(url: string): boolean {
    const host = hostnameOf(url);
    return host !== null && this.failedHosts.has(host);
  }

  async get(url: string, opts: GetOptions = {}): Promise<FetchOutcome> {
    const host = hostnameOf(url);
    if (host === null) {
      return { kind: 'failed', error: `Invalid URL: ${url}`, retryable: false };
    }
    const earlier = this.failedHosts.get(host);
    if (earlier !== undefined) {
      logger.debug({ url }, 'Skipping request, host failed earlier in this run');
      return {
        kind: 'failed',
        error: `Host ${host} unreachable earlier in this run`,
        retryable: earlier,
      };
    }

    const headers: Record<string, string> = {
      'User-Agent': this.options.userAgent,
      Accept: opts.accept ?? FEED_ACCEPT,
    };
    if (opts.validators?.etag) {
      headers['If-None-Match'] = opts.validators.etag;
    }
    if (opts.validators?.lastModified) {
      headers['If-Modified-Since'] = opts.validators.lastModified;
    }

    try {
      return await withBackoff(
        async (signal): Promise<FetchOutcome> => {
          const response = await fetch(url, { headers, signal, redirect: 'follow' });

          if (response.status === 304) {
            return { kind: 'not_modified' };
          }
          if (!response.ok) {
            throw new HttpError(`HTTP ${response.status} from ${host}`, response.status, { url });
          }

          return {
            kind: 'ok',
            status: response.status,
            body: await response.text(),
            contentType: response.headers.get('content-type'),
            validators: {
              etag: response.headers.get('etag'),
              lastModified: response.headers.get('last-modified'),
            },
          };
        },
        {
          label: `GET ${host}`,
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.baseDelayMs,
          timeoutMs: this.options.timeoutMs,
          classify: classifyHttpFailure,
          sleep: this.options.sleep,
        },
      );
    } catch (err) {
      const retryable = err instanceof RetryExhaustedError;
      if (retryable || isUnreachableHostError(err)) {
        this.failedHosts.set(host, retryable);
      }
      logger.warn({ url, error: errorMessage(err) }, 'Request failed');
      return { kind: 'failed', error: errorMessage(err), retryable };
    }
  }
}
