/**
 * Logger Factory
 *
 * Owns the root winston logger and caches one Logger per component.
 * Cached loggers resolve the root lazily, so re-initializing never leaves a
 * module holding a closed transport.
 *
 *   import { getLogger, registerComponent } from '../logging/index.js';
 *
 *   registerComponent('git', 'Git mirror management');
 *   const logger = getLogger('git');
 *   logger.info('Mirror synced');
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston numbers priorities the other way round: error=0 is the most severe.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. getLogger() initializes with the
 * environment defaults when this has not been called.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();
  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [new ConsoleTransport(config.logFormat).createWinstonTransport()];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger so per-component overrides can go below the global level
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  return root;
}

function ensureInitialized(): winston.Logger {
  return rootLogger ?? initializeLogging();
}

export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  ensureInitialized();
  const logger = new Logger(component, ensureInitialized);
  loggerCache.set(component, logger);
  return logger;
}

export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}
