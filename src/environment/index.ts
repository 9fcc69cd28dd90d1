export { EnvironmentRegistry } from './EnvironmentRegistry.js';
export type { Environment } from './EnvironmentRegistry.js';
