/**
 * Small protocol-shaped bodies: the Spring-style 404 and the shell export.
 */

import type { EnvVars } from '../config/index.js';

export interface NotFoundBody {
  timestamp: string;
  status: 404;
  error: 'Not Found';
  path: string;
}

export function notFoundBody(path: string, now: Date = new Date()): NotFoundBody {
  return {
    timestamp: now.toISOString(),
    status: 404,
    error: 'Not Found',
    path,
  };
}

/**
 * Escape `\`, `"` and `$` for a double-quoted shell string.
 */
export function shellEscape(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\$/g, '\\$');
}

/**
 * One `export KEY="VALUE"` line per variable, each ending in a newline.
 */
export function renderShellExport(vars: EnvVars): string {
  let body = '';
  for (const [key, value] of Object.entries(vars)) {
    body += `export ${key}="${shellEscape(value)}"\n`;
  }
  return body;
}
