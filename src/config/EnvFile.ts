/**
 * KEY=VALUE environment files used as template variables.
 */

import * as fs from 'fs/promises';
import dotenv from 'dotenv';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('env', 'Environment variable files');
const logger = getLogger('env');

export type EnvVars = Readonly<Record<string, string>>;

export function parseEnvFile(contents: string): Record<string, string> {
  return dotenv.parse(contents);
}

/**
 * Merge the entries of `filePath` over `target`. A file that cannot be read is
 * logged and skipped; it never aborts startup.
 */
export async function mergeEnvFileInto(filePath: string, target: Record<string, string>): Promise<boolean> {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    logger.warn(`Failed to read env_file ${filePath}`, err instanceof Error ? err : undefined);
    return false;
  }

  const parsed = parseEnvFile(contents);
  for (const [key, value] of Object.entries(parsed)) {
    target[key] = value;
  }
  logger.debug(`Loaded ${Object.keys(parsed).length} variables from ${filePath}`);
  return true;
}

/**
 * Copy of the defined entries of a NodeJS.ProcessEnv.
 */
export function processEnvVars(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
