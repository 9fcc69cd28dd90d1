/**
 * GitBackend — the narrow capability surface the resolution engine needs from
 * version control. The engine never talks to git directly; swapping in a
 * library-based implementation only means implementing this interface.
 */

import type { GitConfig } from '../config/index.js';

export interface GitBackend {
  /**
   * Clone the mirror if it does not exist yet, otherwise fetch and hard-reset
   * it to origin/<branch>. Throws GitOperationError on failure.
   */
  sync(git: GitConfig): Promise<void>;

  /**
   * Full commit hash `ref` points at, or null when the ref does not resolve.
   */
  resolveRef(git: GitConfig, ref: string): Promise<string | null>;

  /**
   * Strict ISO-8601 committer date of `ref`, or null when the ref does not resolve.
   */
  commitDate(git: GitConfig, ref: string): Promise<string | null>;

  /**
   * Bytes stored at `repoPath` (repository-root relative, forward slashes) in
   * `ref`, or null when the ref or the path does not exist there.
   */
  readFile(git: GitConfig, ref: string, repoPath: string): Promise<Buffer | null>;

  /**
   * Every file path (repository-root relative) at the tip of `ref`.
   * Throws GitOperationError when the listing fails.
   */
  listFiles(git: GitConfig, ref: string): Promise<string[]>;
}
