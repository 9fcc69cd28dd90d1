/**
 * Validation of user-supplied repository-relative paths.
 *
 * The result only ever contains plain name segments joined with "/", so
 * prefixing it with an environment's subpath can never address anything
 * outside that subpath.
 */

import { BadRequestError } from '../errors/index.js';

const DRIVE_PREFIX = /^[A-Za-z]:([\\/]|$)/;

export function validateRelativePath(raw: string): string {
  if (raw.startsWith('/') || raw.startsWith('\\') || DRIVE_PREFIX.test(raw)) {
    throw new BadRequestError('Absolute or root-relative paths are not allowed');
  }

  const segments: string[] = [];
  for (const segment of raw.split(/[\\/]/)) {
    if (segment === '' || segment === '.') continue;
    if (segment === '..') {
      throw new BadRequestError("Parent '..' segments are not allowed");
    }
    if (segment.includes('\0')) {
      throw new BadRequestError('Path segments must not contain NUL bytes');
    }
    segments.push(segment);
  }

  if (segments.length === 0) {
    throw new BadRequestError('Empty path');
  }
  return segments.join('/');
}
