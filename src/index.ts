#!/usr/bin/env node
/**
 * Git Config Server
 *
 * Entry point: parse the command line, load the YAML configuration, then run
 * the server until SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { parseCliOptions } from './cli/program.js';
import { loadRootConfig } from './config/index.js';
import { isConfigServerError } from './errors/index.js';
import { getLogger, initializeLogging, registerComponent, shutdownLogging } from './logging/index.js';
import { ConfigServer } from './server/ConfigServer.js';

registerComponent('server', 'Server lifecycle');
const logger = getLogger('server');

let server: ConfigServer | null = null;

/**
 * Attempt graceful shutdown with a safety timeout.
 * If server.stop() hangs, force-exit after 5 seconds.
 */
async function gracefulShutdown(): Promise<void> {
  const timeout = setTimeout(() => {
    process.exit(1);
  }, 5000);
  try {
    if (server) await server.stop();
    await shutdownLogging();
  } finally {
    clearTimeout(timeout);
  }
}

function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}

async function exitAfterShutdown(code: number): Promise<void> {
  try {
    await gracefulShutdown();
  } catch (error) {
    console.error('Shutdown failed:', toError(error).message);
    code = 1;
  }
  process.exit(code);
}

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.warn('Received SIGINT, shutting down...');
  void exitAfterShutdown(0);
});

process.on('SIGTERM', () => {
  logger.warn('Received SIGTERM, shutting down...');
  void exitAfterShutdown(0);
});

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', toError(reason));
  void exitAfterShutdown(1);
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void exitAfterShutdown(1);
});

async function main(): Promise<void> {
  const options = parseCliOptions(process.argv);
  initializeLogging();

  try {
    const config = await loadRootConfig(options.config);
    if (options.check) {
      const count = Object.keys(config.environments).length || 1;
      logger.info(`Configuration ${options.config} is valid (${count} environment(s))`);
      await shutdownLogging();
      return;
    }

    server = new ConfigServer(config);
    await server.start();
  } catch (error) {
    const err = toError(error);
    if (isConfigServerError(err)) {
      logger.error(`Failed to start config server: ${err.message}`);
    } else {
      logger.error('Failed to start config server', err);
    }
    await exitAfterShutdown(1);
  }
}

void main();
