export {
  loadRootConfig,
  parseRootConfig,
  normalizeBasePath,
  normalizeSubpath,
  splitBindAddr,
  DEFAULT_REFRESH_INTERVAL_SECS,
  DEFAULT_ENVIRONMENT_NAME,
} from './ServerConfig.js';
export type { GitConfig, HttpConfig, EnvDefinition, RootConfig } from './ServerConfig.js';
export { parseEnvFile, mergeEnvFileInto, processEnvVars } from './EnvFile.js';
export type { EnvVars } from './EnvFile.js';
export { authConfigFromEnv } from './AuthConfig.js';
export type { AuthConfig } from './AuthConfig.js';
