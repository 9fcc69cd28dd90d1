/**
 * ConfigServer — process lifecycle.
 *
 * start(): build the environment registry, bring every mirror up to date
 * (any failure aborts startup), start the refresh loops, then bind HTTP.
 * stop(): close the listener, stop the refresh loops.
 */

import type { Server } from 'http';
import { createApp, startServer, stopServer } from '../api/server.js';
import { authConfigFromEnv, splitBindAddr } from '../config/index.js';
import type { AuthConfig, RootConfig } from '../config/index.js';
import { EnvironmentRegistry } from '../environment/index.js';
import { GitCliBackend, GitMirrorManager } from '../git/index.js';
import type { GitBackend } from '../git/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { ConfigService } from './ConfigService.js';

registerComponent('server', 'Server lifecycle');
const logger = getLogger('server');

export interface ConfigServerOptions {
  backend?: GitBackend;
  auth?: AuthConfig;
  processEnv?: NodeJS.ProcessEnv;
}

export class ConfigServer {
  private readonly backend: GitBackend;
  private readonly mirrors: GitMirrorManager;
  private server: Server | null = null;
  private running = false;

  constructor(
    private readonly config: RootConfig,
    private readonly options: ConfigServerOptions = {}
  ) {
    this.backend = options.backend ?? new GitCliBackend();
    this.mirrors = new GitMirrorManager(this.backend);
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Config server is already running');
    }

    const processEnv = this.options.processEnv ?? process.env;
    const registry = await EnvironmentRegistry.fromConfig(this.config, processEnv);

    await this.mirrors.syncAll(registry.all());
    this.mirrors.start(registry.all());

    const auth = this.options.auth ?? authConfigFromEnv(processEnv);
    if (auth.required) {
      logger.info('HTTP Basic authentication enabled');
    } else {
      logger.warn('AUTH_USERNAME/AUTH_PASSWORD not set; authentication disabled');
    }

    const service = new ConfigService(registry, this.backend);
    const app = createApp(service, { basePath: this.config.http.basePath, auth });
    const { host, port } = splitBindAddr(this.config.http.bindAddr);

    try {
      this.server = await startServer(app, host, port);
    } catch (error) {
      await this.mirrors.stop();
      throw error;
    }

    this.running = true;
    logger.info(`Config server started (base path ${this.config.http.basePath})`);
  }

  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }
    logger.info('Stopping config server...');

    if (this.server) {
      await stopServer(this.server);
      this.server = null;
    }
    await this.mirrors.stop();

    this.running = false;
    logger.info('Config server stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  address(): string | null {
    const address = this.server?.address();
    return address && typeof address === 'object' ? `${address.address}:${address.port}` : null;
  }
}
