import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { getGlobalLevel, getLogger, resetLogging } from '../../../src/logging/LoggerFactory.js';
import { resetLoggingConfig } from '../../../src/logging/config.js';
import { resetDebugRegistry } from '../../../src/logging/DebugModeRegistry.js';
import { LogLevel } from '../../../src/logging/LogLevel.js';

const KEYS = ['LOG_LEVEL', 'LOG_DEBUG_COMPONENTS', 'LOG_FILE'];

describe('LoggerFactory', () => {
  const saved: Record<string, string | undefined> = {};

  function resetAll(): void {
    resetLogging();
    resetLoggingConfig();
    resetDebugRegistry();
  }

  beforeEach(() => {
    for (const key of KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    resetAll();
  });

  afterEach(() => {
    for (const key of KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    resetAll();
  });

  it('should apply LOG_LEVEL before the first message is written', () => {
    process.env['LOG_LEVEL'] = 'ERROR';

    const log = getLogger('factory');

    expect(getGlobalLevel()).toBe(LogLevel.ERROR);
    expect(log.isDebugEnabled()).toBe(false);
  });

  it('should apply LOG_DEBUG_COMPONENTS before the first message is written', () => {
    process.env['LOG_LEVEL'] = 'ERROR';
    process.env['LOG_DEBUG_COMPONENTS'] = 'factory:DEBUG';

    expect(getLogger('factory').isDebugEnabled()).toBe(true);
    expect(getLogger('other').isDebugEnabled()).toBe(false);
  });

  it('should cache one logger per component', () => {
    expect(getLogger('factory')).toBe(getLogger('factory'));
    expect(getLogger('factory.child').getComponent()).toBe('factory.child');
  });
});
