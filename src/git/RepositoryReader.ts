/**
 * RepositoryReader — read-only access to an environment's mirror.
 *
 * Applies the ref fallback order and the environment's subpath on top of a
 * GitBackend. Callers pass paths relative to the subpath; listings come back
 * relative to it too, so one environment never sees files outside its root.
 */

import type { GitConfig } from '../config/index.js';
import { getLogger } from '../logging/index.js';
import type { GitBackend } from './GitBackend.js';

const logger = getLogger('git').child('reader');

export interface ResolvedVersion {
  /** Full commit hash, "" when no candidate resolved */
  commit: string;
  /** ISO-8601 committer date, "" when unknown */
  date: string;
  /** The candidate ref that resolved, if any */
  ref?: string;
}

/**
 * Repository-root path for a subpath-relative one, with forward slashes as
 * `<ref>:<path>` addressing requires.
 */
export function toRepoPath(subpath: string | undefined, relativePath: string): string {
  const rel = relativePath.replace(/\\/g, '/');
  if (!subpath) return rel;
  return `${subpath.replace(/\\/g, '/')}/${rel}`;
}

/**
 * Strip `<subpath>/` from each listed path and drop everything outside it.
 */
export function scopeToSubpath(paths: readonly string[], subpath: string | undefined): string[] {
  if (!subpath) return [...paths];
  const prefix = `${subpath.replace(/\\/g, '/')}/`;
  const result: string[] = [];
  for (const p of paths) {
    if (p.startsWith(prefix) && p.length > prefix.length) {
      result.push(p.substring(prefix.length));
    }
  }
  return result;
}

export class RepositoryReader {
  constructor(private readonly backend: GitBackend) {}

  /**
   * First candidate ref that has the file wins; null when none has it.
   */
  async readFile(git: GitConfig, refs: readonly string[], relativePath: string): Promise<Buffer | null> {
    const repoPath = toRepoPath(git.subpath, relativePath);
    for (const ref of refs) {
      const bytes = await this.backend.readFile(git, ref, repoPath);
      if (bytes !== null) {
        logger.trace(`Read ${repoPath} at ${ref} (${bytes.length} bytes)`);
        return bytes;
      }
    }
    return null;
  }

  async listFiles(git: GitConfig, ref: string = git.branch): Promise<string[]> {
    const all = await this.backend.listFiles(git, ref);
    return scopeToSubpath(all, git.subpath);
  }

  /**
   * Commit and committer date of the first candidate that resolves. Failure
   * is never fatal: an unresolvable ref yields empty strings and a warning.
   */
  async resolveVersion(git: GitConfig, refs: readonly string[]): Promise<ResolvedVersion> {
    for (const ref of refs) {
      try {
        const commit = await this.backend.resolveRef(git, ref);
        if (commit) {
          const date = (await this.backend.commitDate(git, ref)) ?? '';
          return { commit, date, ref };
        }
      } catch (err) {
        logger.warn(`Version lookup for ${ref} failed in ${git.workdir}`, err instanceof Error ? err : undefined);
      }
    }
    logger.warn(`No candidate ref resolved in ${git.workdir}: ${refs.join(', ')}`);
    return { commit: '', date: '' };
  }
}
