import { afterEach, describe, expect, it } from 'vitest';

import { validateLoggerEnv } from '../env.schema.js';
import { formatLabel, getLogger, resetLoggers } from '../logger.js';

describe('getLogger', () => {
  afterEach(() => {
    resetLoggers();
  });

  it('returns the same instance for a category', () => {
    expect(getLogger('DocumentStore')).toBe(getLogger('DocumentStore'));
  });

  it('binds the category to the child logger', () => {
    const logger = getLogger('PublishService');

    expect(logger.bindings()).toMatchObject({
      category: 'PublishService',
      categoryLabel: `${' '.repeat(11)}PublishService`,
    });
  });

  it('creates fresh loggers after a reset', () => {
    const before = getLogger('Migrations');
    resetLoggers();

    expect(getLogger('Migrations')).not.toBe(before);
  });
});

describe('formatLabel', () => {
  it('pads short labels to the requested width', () => {
    expect(formatLabel('db', 5)).toBe('   db');
  });

  it('truncates long labels with a leading ellipsis', () => {
    expect(formatLabel('TransactionManager', 8)).toBe('…Manager');
  });
});

describe('validateLoggerEnv', () => {
  it('applies defaults', () => {
    const env = validateLoggerEnv({});

    expect(env.LOGGER_LOG_LEVEL).toBe('info');
    expect(env.LOGGER_CONSOLE_ENABLED).toBe(true);
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(false);
    expect(env.NODE_ENV).toBe('development');
  });

  it('parses boolean flags from strings', () => {
    const env = validateLoggerEnv({ LOGGER_CONSOLE_ENABLED: 'false', LOGGER_FILE_LOG_ENABLED: 'true' });

    expect(env.LOGGER_CONSOLE_ENABLED).toBe(false);
    expect(env.LOGGER_FILE_LOG_ENABLED).toBe(true);
  });

  it('rejects unknown log levels', () => {
    expect(() => validateLoggerEnv({ LOGGER_LOG_LEVEL: 'loud' })).toThrow();
  });
});
