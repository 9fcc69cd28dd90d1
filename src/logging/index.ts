export { LogLevel, parseLogLevel, isLevelEnabled } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  shutdownLogging,
  resetLogging,
  setGlobalLevel,
  getGlobalLevel,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export type { ComponentInfo } from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, formatLogTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';
