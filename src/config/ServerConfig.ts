/**
 * Startup configuration
 *
 * Loads the YAML configuration file given on the command line and validates it.
 * Two layouts are accepted:
 *   - single instance: a top-level `git` block, exposed as environment "default"
 *   - multi-tenant: an `environments` map, each entry with its own `git` block
 * When both are present, `environments` wins.
 */

import * as fs from 'fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, IoError } from '../errors/index.js';

export const DEFAULT_REFRESH_INTERVAL_SECS = 30;
export const DEFAULT_ENVIRONMENT_NAME = 'default';

const GitConfigSchema = z
  .object({
    repo_url: z.string().min(1),
    branch: z.string().min(1),
    workdir: z.string().min(1),
    subpath: z.string().optional(),
    refresh_interval_secs: z.number().int().nonnegative().default(DEFAULT_REFRESH_INTERVAL_SECS),
  })
  .transform((raw) => ({
    repoUrl: raw.repo_url,
    branch: raw.branch,
    workdir: raw.workdir,
    subpath: normalizeSubpath(raw.subpath),
    refreshIntervalSecs: raw.refresh_interval_secs,
  }));

const HttpConfigSchema = z
  .object({
    bind_addr: z.string().regex(/^.+:\d{1,5}$/, 'expected host:port'),
    base_path: z.string().default('/'),
  })
  .transform((raw) => ({
    bindAddr: raw.bind_addr,
    basePath: normalizeBasePath(raw.base_path),
  }));

const EnvDefinitionSchema = z
  .object({
    git: GitConfigSchema,
    env_file: z.string().optional(),
  })
  .transform((raw) => ({ git: raw.git, envFile: raw.env_file }));

const RootConfigSchema = z
  .object({
    http: HttpConfigSchema,
    env_from_process: z.boolean().default(false),
    env_file: z.string().optional(),
    git: GitConfigSchema.optional(),
    environments: z.record(EnvDefinitionSchema).default({}),
  })
  .transform((raw) => ({
    http: raw.http,
    envFromProcess: raw.env_from_process,
    envFile: raw.env_file,
    git: raw.git,
    environments: raw.environments,
  }));

export type GitConfig = z.output<typeof GitConfigSchema>;
export type HttpConfig = z.output<typeof HttpConfigSchema>;
export type EnvDefinition = z.output<typeof EnvDefinitionSchema>;
export type RootConfig = z.output<typeof RootConfigSchema>;

/**
 * Strip surrounding slashes and backslashes; "" and "/" mean no subpath.
 */
export function normalizeSubpath(subpath: string | undefined): string | undefined {
  if (subpath === undefined) return undefined;
  const trimmed = subpath.trim().replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
  return trimmed === '' ? undefined : trimmed;
}

/**
 * "" and "/" become "/"; anything else becomes "/segment[/segment]" without a trailing slash.
 */
export function normalizeBasePath(base: string): string {
  const trimmed = base.trim().replace(/^\/+|\/+$/g, '');
  return trimmed === '' ? '/' : `/${trimmed}`;
}

export function splitBindAddr(bindAddr: string): { host: string; port: number } {
  const colon = bindAddr.lastIndexOf(':');
  const host = bindAddr.substring(0, colon).replace(/^\[|\]$/g, '');
  return { host, port: Number(bindAddr.substring(colon + 1)) };
}

/**
 * Validate an already-parsed YAML document.
 */
export function parseRootConfig(data: unknown): RootConfig {
  const result = RootConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`);
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config = result.data;
  if (Object.keys(config.environments).length === 0 && !config.git) {
    throw new ConfigurationError('Configuration must contain either `git` or `environments`');
  }
  return config;
}

export async function loadRootConfig(filePath: string): Promise<RootConfig> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new IoError(`reading ${filePath}`, err);
  }

  let data: unknown;
  try {
    data = yaml.load(contents);
  } catch (err) {
    throw new ConfigurationError(`Invalid YAML in ${filePath}`, [err instanceof Error ? err.message : String(err)]);
  }
  return parseRootConfig(data);
}
