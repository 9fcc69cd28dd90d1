import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getLoggingConfig, resetLoggingConfig } from '../../../src/logging/config.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

const KEYS = ['LOG_LEVEL', 'LOG_FORMAT', 'LOG_FILE', 'LOG_DEBUG_COMPONENTS'];

describe('logging config', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetLoggingConfig();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetLoggingConfig();
  });

  it('should use defaults when nothing is set', () => {
    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.INFO,
      debugComponents: [],
      logFormat: 'text',
      logFile: undefined,
    });
  });

  it('should read every variable', () => {
    process.env['LOG_LEVEL'] = 'debug';
    process.env['LOG_FORMAT'] = 'json';
    process.env['LOG_FILE'] = '/tmp/server.log';
    process.env['LOG_DEBUG_COMPONENTS'] = ' git , api:TRACE ,,';

    expect(getLoggingConfig()).toEqual({
      logLevel: LogLevel.DEBUG,
      debugComponents: ['git', 'api:TRACE'],
      logFormat: 'json',
      logFile: '/tmp/server.log',
    });
  });

  it('should cache until reset', () => {
    process.env['LOG_LEVEL'] = 'ERROR';
    expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);

    process.env['LOG_LEVEL'] = 'TRACE';
    expect(getLoggingConfig().logLevel).toBe(LogLevel.ERROR);

    resetLoggingConfig();
    expect(getLoggingConfig().logLevel).toBe(LogLevel.TRACE);
  });
});
