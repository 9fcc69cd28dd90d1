/**
 * GitMirrorManager — keeps one local mirror per environment current.
 *
 * ensureSynced() is awaited once per environment at startup; a failure there
 * aborts startup. start() then runs one refresh loop per environment. A loop
 * schedules its next tick only after the previous sync settled, so syncs of
 * one mirror never overlap; a failed tick is logged and the next one retries.
 *
 * Refreshes take no lock against concurrent readers: a read may see the tree
 * from before or after a refresh (eventual consistency, lag bounded by one
 * refresh interval).
 */

import { DEFAULT_REFRESH_INTERVAL_SECS } from '../config/index.js';
import type { Environment } from '../environment/index.js';
import { getLogger } from '../logging/index.js';
import type { GitBackend } from './GitBackend.js';

const logger = getLogger('git').child('refresh');

export const MIN_REFRESH_INTERVAL_SECS = 5;

/**
 * 0 means "use the default"; anything else is clamped to the floor.
 */
export function effectiveRefreshIntervalSecs(configured: number): number {
  if (!configured || configured <= 0) return DEFAULT_REFRESH_INTERVAL_SECS;
  return Math.max(configured, MIN_REFRESH_INTERVAL_SECS);
}

interface RefreshLoop {
  environment: Environment;
  timer: NodeJS.Timeout | null;
  inFlight: Promise<void> | null;
  lastSuccess: Date | null;
  lastError: Error | null;
}

export interface MirrorStatus {
  environment: string;
  intervalSecs: number;
  lastSuccess: string | null;
  lastError: string | null;
}

export class GitMirrorManager {
  private loops = new Map<string, RefreshLoop>();
  private running = false;

  constructor(private readonly backend: GitBackend) {}

  async ensureSynced(environment: Environment): Promise<void> {
    await this.backend.sync(environment.git);
    logger.debug(`Mirror for ${environment.name} is up to date (${environment.git.workdir})`);
  }

  /**
   * Sync every environment in turn; the first failure rejects.
   */
  async syncAll(environments: readonly Environment[]): Promise<void> {
    for (const environment of environments) {
      await this.ensureSynced(environment);
    }
  }

  /**
   * Start one background refresh loop per environment.
   */
  start(environments: readonly Environment[]): void {
    if (this.running) return;
    this.running = true;

    for (const environment of environments) {
      const loop: RefreshLoop = {
        environment,
        timer: null,
        inFlight: null,
        lastSuccess: null,
        lastError: null,
      };
      this.loops.set(environment.name, loop);
      this.schedule(loop);
      logger.info(
        `Refreshing ${environment.name} every ${effectiveRefreshIntervalSecs(environment.git.refreshIntervalSecs)}s`
      );
    }
  }

  /**
   * Stop all loops and wait for in-flight syncs to settle.
   */
  async stop(): Promise<void> {
    this.running = false;
    const pending: Promise<void>[] = [];
    for (const loop of this.loops.values()) {
      if (loop.timer) {
        clearTimeout(loop.timer);
        loop.timer = null;
      }
      if (loop.inFlight) pending.push(loop.inFlight);
    }
    await Promise.all(pending);
    this.loops.clear();
  }

  isRunning(): boolean {
    return this.running;
  }

  status(): MirrorStatus[] {
    return [...this.loops.values()].map((loop) => ({
      environment: loop.environment.name,
      intervalSecs: effectiveRefreshIntervalSecs(loop.environment.git.refreshIntervalSecs),
      lastSuccess: loop.lastSuccess ? loop.lastSuccess.toISOString() : null,
      lastError: loop.lastError ? loop.lastError.message : null,
    }));
  }

  private schedule(loop: RefreshLoop): void {
    if (!this.running) return;
    const delayMs = effectiveRefreshIntervalSecs(loop.environment.git.refreshIntervalSecs) * 1000;
    loop.timer = setTimeout(() => {
      loop.timer = null;
      loop.inFlight = this.tick(loop).finally(() => {
        loop.inFlight = null;
        this.schedule(loop);
      });
    }, delayMs);
  }

  private async tick(loop: RefreshLoop): Promise<void> {
    try {
      await this.ensureSynced(loop.environment);
      loop.lastSuccess = new Date();
      loop.lastError = null;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      loop.lastError = error;
      logger.warn(`Periodic refresh failed for ${loop.environment.name} (${loop.environment.git.workdir})`, error);
    }
  }
}
