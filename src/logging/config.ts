/**
 * Logging Configuration
 *
 * Derived from environment variables and cached; call resetLoggingConfig() in tests.
 */

import { LogLevel, parseLogLevel } from './LogLevel.js';

export interface LoggingConfiguration {
  /** Minimum log level (LOG_LEVEL, default INFO) */
  logLevel: LogLevel;
  /** Per-component overrides (LOG_DEBUG_COMPONENTS, comma-separated `name[:LEVEL]`) */
  debugComponents: string[];
  /** Output format (LOG_FORMAT, default 'text') */
  logFormat: 'text' | 'json';
  /** Optional log file (LOG_FILE) */
  logFile?: string;
}

let cachedConfig: LoggingConfiguration | null = null;

function parseFormat(value: string | undefined): 'text' | 'json' {
  return value === 'json' ? 'json' : 'text';
}

function parseDebugComponents(value: string | undefined): string[] {
  if (!value || value.trim() === '') return [];
  return value
    .split(',')
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function getLoggingConfig(): LoggingConfiguration {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    logLevel: parseLogLevel(process.env['LOG_LEVEL'] ?? 'INFO'),
    debugComponents: parseDebugComponents(process.env['LOG_DEBUG_COMPONENTS']),
    logFormat: parseFormat(process.env['LOG_FORMAT']),
    logFile: process.env['LOG_FILE'] || undefined,
  };

  return cachedConfig;
}

export function resetLoggingConfig(): void {
  cachedConfig = null;
}
