/**
 * Ref resolution policy.
 *
 * A requested label is tried first as a same-named local ref (branches that
 * are already checked out, tags) and then as the remote-tracking ref
 * origin/<label> (branches never created locally). Without a label the
 * environment's tracked branch goes through the same two steps.
 */

import type { GitConfig } from '../config/index.js';
import { BadRequestError } from '../errors/index.js';

// Option-looking labels, `<ref>:<path>` syntax, NUL and whitespace never name a ref
const UNSAFE_LABEL = /^-|[:\0\s]/;

/**
 * Reject a client-supplied label that git would read as something other
 * than a ref name.
 */
export function validateLabel(label: string): string {
  if (UNSAFE_LABEL.test(label)) {
    throw new BadRequestError(`Invalid label '${label}'`);
  }
  return label;
}

export function candidateRefs(git: Pick<GitConfig, 'branch'>, label?: string | null): string[] {
  const ref = label && label.length > 0 ? validateLabel(label) : git.branch;
  return [ref, `origin/${ref}`];
}
