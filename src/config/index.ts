/**
 * Application configuration
 */

import { env } from './env.js';

export const config = {
  app: {
    name: 'indeks-scraper',
    version: '1.0.0',
    env: env.NODE_ENV,
  },

  site: {
    url: env.SITE_URL,
    indexUrl: `${env.SITE_URL}/indeks`,
  },

  http: {
    userAgent: env.USER_AGENT,
    timeoutMs: env.REQUEST_TIMEOUT_MS,
    sessionCookie: env.SESSION_COOKIE,
  },

  // Retried statuses and backoff live with the HTTP client; these bound it
  retry: {
    maxAttempts: 4,
    initialDelayMs: 1000,
    maxDelayMs: 8000,
    factor: 2,
  },

  output: {
    dir: env.OUTPUT_DIR,
  },

  logging: {
    level: env.LOG_LEVEL,
    file: env.LOG_FILE,
    pretty: env.NODE_ENV !== 'production',
  },
} as const;

export type Config = typeof config;
export { env, validateEnv, type Env } from './env.js';
