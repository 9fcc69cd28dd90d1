/**
 * Environment Registry
 *
 * One entry per tenant environment: its git endpoint and the template variable
 * map. Entries are built once at startup and frozen; requests share them
 * read-only, so no locking is needed around them.
 */

import {
  DEFAULT_ENVIRONMENT_NAME,
  mergeEnvFileInto,
  processEnvVars,
} from '../config/index.js';
import type { EnvVars, GitConfig, RootConfig } from '../config/index.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('registry', 'Environment registry');
const logger = getLogger('registry');

export interface Environment {
  readonly name: string;
  readonly git: Readonly<GitConfig>;
  readonly envVars: EnvVars;
}

export class EnvironmentRegistry {
  private readonly environments: ReadonlyMap<string, Environment>;

  constructor(environments: Iterable<Environment>) {
    const map = new Map<string, Environment>();
    for (const env of environments) {
      map.set(env.name, Object.freeze({
        name: env.name,
        git: Object.freeze({ ...env.git }),
        envVars: Object.freeze({ ...env.envVars }),
      }));
    }
    this.environments = map;
  }

  /**
   * Build the registry from startup configuration. Variable sources are merged
   * in order (process env, global env file, per-environment env file); a later
   * source overrides an earlier one key by key.
   */
  static async fromConfig(
    config: RootConfig,
    processEnv: NodeJS.ProcessEnv = process.env
  ): Promise<EnvironmentRegistry> {
    const globalVars: Record<string, string> = config.envFromProcess ? processEnvVars(processEnv) : {};
    if (config.envFile) {
      await mergeEnvFileInto(config.envFile, globalVars);
    }

    const environments: Environment[] = [];
    const definitions = Object.entries(config.environments);

    if (definitions.length > 0) {
      for (const [name, definition] of definitions) {
        const envVars = { ...globalVars };
        if (definition.envFile) {
          await mergeEnvFileInto(definition.envFile, envVars);
        }
        environments.push({ name, git: definition.git, envVars });
      }
    } else if (config.git) {
      environments.push({ name: DEFAULT_ENVIRONMENT_NAME, git: config.git, envVars: globalVars });
    }

    logger.info(`Registered ${environments.length} environment(s): ${environments.map((e) => e.name).join(', ')}`);
    return new EnvironmentRegistry(environments);
  }

  get(name: string): Environment | undefined {
    return this.environments.get(name);
  }

  has(name: string): boolean {
    return this.environments.has(name);
  }

  names(): string[] {
    return [...this.environments.keys()];
  }

  all(): Environment[] {
    return [...this.environments.values()];
  }

  get size(): number {
    return this.environments.size;
  }
}
