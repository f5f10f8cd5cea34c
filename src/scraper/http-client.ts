/**
 * HTTP transport
 *
 * Fetches pages one at a time. Transient statuses and network errors are
 * retried with exponential backoff; the caller only ever sees a FetchResult.
 */

import type { Logger } from 'pino';
import { withRetry } from '../utils/retry.js';
import type { RetryConfig } from '../types/index.js';
import type { FetchResult, PageFetcher } from './types.js';

export const RETRY_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

const DEFAULT_RETRY: RetryConfig = {
  maxAttempts: 4,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  factor: 2,
};

export interface HttpClientOptions {
  logger: Logger;
  userAgent: string;
  timeoutMs: number;
  /** Sent as the Cookie header when a fetch asks for credentials */
  sessionCookie?: string;
  retry?: Partial<RetryConfig>;
}

class RetryableStatusError extends Error {
  constructor(
    readonly status: number,
    readonly html: string
  ) {
    super(`Retryable HTTP status ${status}`);
    this.name = 'RetryableStatusError';
  }
}

export class HttpClient implements PageFetcher {
  private readonly logger: Logger;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly sessionCookie: string | undefined;
  private readonly retry: RetryConfig;

  constructor(options: HttpClientOptions) {
    this.logger = options.logger;
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.sessionCookie = options.sessionCookie;
    this.retry = { ...DEFAULT_RETRY, ...options.retry };
  }

  async fetchPage(url: string, useCredential: boolean): Promise<FetchResult> {
    const headers = this.buildHeaders(url, useCredential);

    try {
      return await withRetry(
        async (attempt) => {
          const startedAt = Date.now();
          const response = await fetch(url, {
            headers,
            redirect: 'follow',
            signal: AbortSignal.timeout(this.timeoutMs),
          });
          const html = await response.text();

          this.logger.debug(
            { url, status: response.status, attempt, durationMs: Date.now() - startedAt, size: html.length },
            'Fetched page'
          );

          if (RETRY_STATUSES.has(response.status)) {
            throw new RetryableStatusError(response.status, html);
          }

          return { html, ok: response.ok, status: response.status };
        },
        this.retry,
        { logger: this.logger }
      );
    } catch (error) {
      if (error instanceof RetryableStatusError) {
        this.logger.warn({ url, status: error.status }, 'Request still failing after retries');
        return { html: error.html, ok: false, status: error.status };
      }

      this.logger.warn(
        { url, error: error instanceof Error ? error.message : String(error) },
        'Request failed'
      );
      return { html: '', ok: false, status: 0 };
    }
  }

  private buildHeaders(url: string, useCredential: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'id-ID,id;q=0.9,en-US;q=0.8,en;q=0.7',
    };

    if (useCredential) {
      if (this.sessionCookie) {
        headers.Cookie = this.sessionCookie;
      } else {
        this.logger.warn({ url }, 'No session cookie configured, fetching anonymously');
      }
    }

    return headers;
  }
}
