/**
 * Config Server HTTP API
 *
 * Express application exposing the Spring Cloud Config compatible lookups,
 * raw file access, env dumps, the dashboard and a health probe, all under an
 * optional base path.
 */

import express, { Express, RequestHandler } from 'express';
import helmet from 'helmet';
import { createServer, Server as HttpServer } from 'http';
import type { AuthConfig } from '../config/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { ConfigService } from '../server/ConfigService.js';
import {
  basicAuthMiddleware,
  errorHandler,
  notFoundHandler,
  requestIdMiddleware,
} from './middleware/index.js';
import {
  createConfigRouter,
  createEnvRouter,
  createFileRouter,
  createHealthRouter,
  createUiRouter,
} from './servlets/index.js';

registerComponent('api', 'HTTP API');
const logger = getLogger('api');

export interface AppOptions {
  /** Normalised prefix, "/" for none */
  basePath: string;
  auth: AuthConfig;
  /** Dashboard template override, mainly for tests */
  uiTemplatePath?: string;
}

/**
 * Create and configure the Express application
 */
export function createApp(service: ConfigService, options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');

  // Security headers (CSP disabled, the dashboard uses an inline script)
  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(requestIdMiddleware());

  const guard: RequestHandler = basicAuthMiddleware(options.auth);

  // NOTE: Route order matters! /:env/env/export and /:env/file/:label/...
  // must be matched BEFORE the Spring lookup routes.
  app.use(options.basePath, createHealthRouter());
  app.use(
    options.basePath,
    createUiRouter(service, guard, {
      basePath: options.basePath,
      authEnabled: options.auth.required,
      templatePath: options.uiTemplatePath,
    })
  );
  app.use(options.basePath, createEnvRouter(service, guard));
  app.use(options.basePath, createFileRouter(service, guard));
  app.use(options.basePath, createConfigRouter(service, guard));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}

/**
 * Start listening; resolves once the socket is bound.
 */
export function startServer(app: Express, host: string, port: number): Promise<HttpServer> {
  const server = createServer(app);

  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      reject(err);
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      const bound = address && typeof address === 'object' ? `${address.address}:${address.port}` : `${host}:${port}`;
      logger.info(`Config server listening on http://${bound}`);
      resolve(server);
    });
  });
}

/**
 * Close the listener and wait for open connections to finish.
 */
export function stopServer(server: HttpServer): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err?: Error) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
