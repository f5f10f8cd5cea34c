/**
 * Exponential backoff retry utility
 */

import type { Logger } from 'pino';
import type { RetryConfig } from '../types/index.js';

const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  factor: 2,
};

export interface RetryOptions {
  logger?: Logger;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: Partial<RetryConfig> = {},
  options: RetryOptions = {}
): Promise<T> {
  const { maxAttempts, initialDelayMs, maxDelayMs, factor } = {
    ...DEFAULT_RETRY_CONFIG,
    ...config,
  };
  const { logger } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts) {
        logger?.warn({ error: lastError.message, attempt, maxAttempts }, 'All retry attempts exhausted');
        throw lastError;
      }

      logger?.debug(
        { error: lastError.message, attempt, maxAttempts, nextDelayMs: delay },
        'Retry attempt failed, waiting before next attempt'
      );

      await sleep(delay);
      delay = Math.min(delay * factor, maxDelayMs);
    }
  }

  throw lastError ?? new Error('withRetry called with maxAttempts < 1');
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export { sleep };
