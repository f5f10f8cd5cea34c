import { describe, expect, it } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('builds a silent logger without a transport', () => {
    const logger = createLogger({ level: 'silent' });
    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });

  it('names the logger', () => {
    const logger = createLogger({ level: 'silent', name: 'markdown' });
    expect(logger.bindings()).toMatchObject({ name: 'markdown' });
  });
});
