/**
 * Environment variable validation using Zod
 */

import { z } from 'zod';
import 'dotenv/config';

// `KEY=` in a .env file yields an empty string; treat it as unset
const optionalString = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const envSchema = z.object({
  // Site
  SITE_URL: z
    .string()
    .url()
    .default('https://www.tempo.co')
    .transform((url) => url.replace(/\/+$/, '')),

  // Credential for premium articles (opaque session cookie)
  SESSION_COOKIE: optionalString,

  // HTTP
  USER_AGENT: z
    .string()
    .default(
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/125.0.0.0 Safari/537.36'
    ),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Output
  OUTPUT_DIR: z.string().default('data/output'),

  // Logging
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  LOG_FILE: optionalString,

  // Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.format();
    throw new Error(`Environment validation failed:\n${JSON.stringify(errors, null, 2)}`);
  }

  return result.data;
}

export const env = validateEnv();
