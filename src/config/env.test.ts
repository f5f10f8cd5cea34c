import { describe, expect, it } from 'vitest';
import { validateEnv } from './env.js';

describe('validateEnv', () => {
  it('fills defaults for an empty environment', () => {
    expect(validateEnv({})).toEqual({
      SITE_URL: 'https://www.tempo.co',
      SESSION_COOKIE: undefined,
      USER_AGENT: expect.stringContaining('Mozilla/5.0'),
      REQUEST_TIMEOUT_MS: 30000,
      OUTPUT_DIR: 'data/output',
      LOG_LEVEL: 'info',
      LOG_FILE: undefined,
      NODE_ENV: 'development',
    });
  });

  it('treats empty strings as unset for optional values', () => {
    const env = validateEnv({ SESSION_COOKIE: '', LOG_FILE: '' });
    expect(env.SESSION_COOKIE).toBeUndefined();
    expect(env.LOG_FILE).toBeUndefined();
  });

  it('drops trailing slashes from the site URL', () => {
    expect(validateEnv({ SITE_URL: 'https://www.tempo.co//' }).SITE_URL).toBe('https://www.tempo.co');
  });

  it('coerces numeric values', () => {
    expect(validateEnv({ REQUEST_TIMEOUT_MS: '5000' }).REQUEST_TIMEOUT_MS).toBe(5000);
  });

  it('rejects invalid values', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'loud' })).toThrow('Environment validation failed');
    expect(() => validateEnv({ SITE_URL: 'not a url' })).toThrow('Environment validation failed');
  });
});
