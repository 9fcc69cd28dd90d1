/**
 * GitCliBackend — GitBackend implemented on top of the git command line.
 *
 * Every operation is one `git` child process run through execFile (no shell).
 * Reads use `git show <ref>:<path>` and `git ls-tree` against the object
 * store, so they never touch the working tree. Refs are passed after
 * `--end-of-options` so a ref can never be parsed as a flag. No timeout is
 * applied: a hung process stalls only the caller that started it.
 */

import { execFile } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { GitConfig } from '../config/index.js';
import { GitOperationError, IoError } from '../errors/index.js';
import type { GitStage } from '../errors/index.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { GitBackend } from './GitBackend.js';

registerComponent('git', 'Git command-line backend');
const logger = getLogger('git');

const MAX_BUFFER = 64 * 1024 * 1024;

export interface GitResult {
  exitCode: number;
  stdout: Buffer;
  stderr: string;
}

export class GitCliBackend implements GitBackend {
  constructor(private readonly gitBinary: string = 'git') {}

  async sync(git: GitConfig): Promise<void> {
    try {
      await fs.mkdir(git.workdir, { recursive: true });
    } catch (err) {
      throw new IoError(`creating ${git.workdir}`, err);
    }

    if (!(await this.hasGitDir(git.workdir))) {
      logger.info(`Cloning ${git.repoUrl} into ${git.workdir} (branch ${git.branch})`);
      await this.runChecked('clone', [
        'clone',
        '--branch',
        git.branch,
        '--single-branch',
        '--',
        git.repoUrl,
        git.workdir,
      ]);
      return;
    }

    logger.debug(`Fetching & resetting ${git.workdir} (branch ${git.branch})`);
    await this.runChecked('fetch', ['-C', git.workdir, 'fetch', '--all', '--prune']);
    await this.runChecked('reset', ['-C', git.workdir, 'reset', '--hard', `origin/${git.branch}`]);
  }

  async resolveRef(git: GitConfig, ref: string): Promise<string | null> {
    const result = await this.run(['-C', git.workdir, 'rev-parse', '--verify', '--quiet', '--end-of-options', `${ref}^{commit}`]);
    if (result.exitCode !== 0) return null;
    return result.stdout.toString('utf-8').trim();
  }

  async commitDate(git: GitConfig, ref: string): Promise<string | null> {
    const result = await this.run(['-C', git.workdir, 'show', '-s', '--format=%cI', '--end-of-options', ref, '--']);
    if (result.exitCode !== 0) return null;
    return result.stdout.toString('utf-8').trim();
  }

  async readFile(git: GitConfig, ref: string, repoPath: string): Promise<Buffer | null> {
    const result = await this.run(['-C', git.workdir, 'show', '--end-of-options', `${ref}:${repoPath}`]);
    if (result.exitCode !== 0) {
      logger.trace(`git show ${ref}:${repoPath} exited ${result.exitCode}: ${result.stderr.trim()}`);
      return null;
    }
    return result.stdout;
  }

  async listFiles(git: GitConfig, ref: string): Promise<string[]> {
    const result = await this.runChecked('ls-tree', ['-C', git.workdir, 'ls-tree', '-r', '--name-only', '--end-of-options', ref]);
    return result.stdout
      .toString('utf-8')
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  // ───── Internal helpers ─────

  private async hasGitDir(workdir: string): Promise<boolean> {
    try {
      await fs.access(path.join(workdir, '.git'));
      return true;
    } catch {
      return false;
    }
  }

  private async runChecked(stage: GitStage, args: string[]): Promise<GitResult> {
    const result = await this.run(args);
    if (result.exitCode !== 0) {
      throw new GitOperationError(stage, result.stderr.trim(), args);
    }
    return result;
  }

  /**
   * Run git and report its exit status. A non-zero exit is a normal result;
   * only a failure to run the process at all (missing binary, output over
   * MAX_BUFFER) rejects.
   */
  run(args: string[]): Promise<GitResult> {
    return new Promise((resolve, reject) => {
      execFile(
        this.gitBinary,
        args,
        { encoding: 'buffer', maxBuffer: MAX_BUFFER, env: { ...process.env, GIT_TERMINAL_PROMPT: '0' } },
        (error, stdout, stderr) => {
          const code: unknown = error ? error.code : 0;
          if (error && typeof code === 'string') {
            reject(new IoError(`running git ${args.join(' ')}`, error));
            return;
          }
          resolve({
            exitCode: typeof code === 'number' ? code : -1,
            stdout,
            stderr: stderr.toString('utf-8'),
          });
        }
      );
    });
  }
}
