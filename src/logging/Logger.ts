/**
 * Logger
 *
 * Thin wrapper around the root winston logger, bound to a component name.
 * The root is looked up on every write, before level filtering, so loggers
 * created at module load pick up a later initializeLogging() and the
 * configured levels apply from the first message.
 * Level filtering goes through DebugModeRegistry so a single component can be
 * raised to DEBUG/TRACE.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { shouldLog } from './DebugModeRegistry.js';

/** Injected by LoggerFactory to avoid a circular import */
let globalLevelFn: () => LogLevel = () => LogLevel.INFO;

/**
 * @internal
 */
export function setGlobalLevelProvider(fn: () => LogLevel): void {
  globalLevelFn = fn;
}

export class Logger {
  constructor(
    private readonly component: string,
    private readonly root: () => winston.Logger
  ) {}

  trace(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.TRACE, 'trace', message, undefined, metadata);
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.DEBUG, 'debug', message, undefined, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.INFO, 'info', message, undefined, metadata);
  }

  warn(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.WARN, 'warn', message, error, metadata);
  }

  error(message: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.logAt(LogLevel.ERROR, 'error', message, error, metadata);
  }

  isDebugEnabled(): boolean {
    this.root();
    return shouldLog(this.component, LogLevel.DEBUG, globalLevelFn());
  }

  /**
   * logger.child('refresh') on component "git" yields "git.refresh".
   */
  child(subComponent: string): Logger {
    return new Logger(`${this.component}.${subComponent}`, this.root);
  }

  getComponent(): string {
    return this.component;
  }

  private logAt(
    level: LogLevel,
    winstonLevel: string,
    message: string,
    error?: Error,
    metadata?: Record<string, unknown>
  ): void {
    // Resolve first: a lazy initialization installs the configured levels
    const root = this.root();
    if (!shouldLog(this.component, level, globalLevelFn())) {
      return;
    }

    const meta: Record<string, unknown> = {
      component: this.component,
      ...metadata,
    };
    if (error?.stack) {
      meta['errorStack'] = error.stack;
    } else if (error) {
      meta['errorStack'] = `${error.name}: ${error.message}`;
    }
    root.log(winstonLevel, message, meta);
  }
}
