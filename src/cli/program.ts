/**
 * Command-line options for the config server.
 *
 * Usage: git-config-server [-c, --config <file>] [--check]
 */

import { Command } from 'commander';

// Kept in step with package.json
export const VERSION = '1.0.0';

export const DEFAULT_CONFIG_FILE = 'config.yaml';

export interface CliOptions {
  config: string;
  check: boolean;
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('git-config-server')
    .description('Serve Spring Cloud Config compatible configuration from git repositories')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-c, --config <file>', 'Path to the YAML configuration file', DEFAULT_CONFIG_FILE)
    .option('--check', 'Validate the configuration and exit', false);

  program.addHelpText(
    'after',
    `
Examples:
  $ git-config-server --config /etc/git-config-server/config.yaml
  $ git-config-server --check -c config.yaml
`
  );

  return program;
}

/**
 * Parse argv (including the node and script entries).
 */
export function parseCliOptions(argv: readonly string[], program: Command = createProgram()): CliOptions {
  program.parse([...argv]);
  const opts = program.opts<{ config: string; check: boolean }>();
  return { config: opts.config, check: opts.check === true };
}
