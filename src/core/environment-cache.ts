/**
 * Base-environment cache.
 *
 * Process-wide registry of the base images stages run on. A stage that
 * finds its image already present shares the cache's read lock; pulling
 * a missing image and clearing the cache take the single writer side, so
 * no stage observes a half-provisioned or half-removed environment. The
 * lock is held in this process and as a lease in the index database,
 * which other `stagecraft` processes on the same home honor too.
 *
 * Provisioned images are indexed in SQLite so `cache list` and
 * `cache clear` see what earlier invocations fetched.
 *
 * Lifecycle is explicit: {@link initializeEnvironmentCache} once per
 * process, {@link getEnvironmentCache} to reach it, `clear()` on request.
 */

import type Database from 'better-sqlite3';
import { FailureKind } from '../types/errors.js';
import type { ContainerRuntime } from './container/runtime.js';
import { createLogger, type Logger } from './logger.js';
import { PipelineError, errorMessage } from './pipeline-error.js';
import { SqliteLeaseLock, createLeaseTable } from './cache-lease.js';
import { AsyncRwLock } from './rw-lock.js';
import type { Migration } from './sqlite-manager.js';
import { withRetry } from './timing.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CachedEnvironment {
  image: string;
  provisionedAt: string;
  lastUsedAt: string;
  uses: number;
}

export interface EnvironmentCacheOptions {
  runtime: ContainerRuntime;
  /** Handle for the cache index (see {@link ENVIRONMENT_CACHE_MIGRATIONS}). */
  db: Database.Database;
  /** Pull retries after the first attempt. */
  retries: number;
  /** Delay before the first retry; doubles afterwards. */
  backoffMs: number;
  /** Poll interval while another process holds the cache lease. */
  lockPollMs?: number;
  logger?: Logger;
}

/** Outcome of `clear()`. */
export interface ClearResult {
  removed: string[];
  failed: Array<{ image: string; error: string }>;
}

interface EnvironmentRow {
  image: string;
  provisioned_at: string;
  last_used_at: string;
  uses: number;
}

// ---------------------------------------------------------------------------
// Migrations
// ---------------------------------------------------------------------------

export const ENVIRONMENT_CACHE_STORE = 'environments';

export const ENVIRONMENT_CACHE_MIGRATIONS: Migration[] = [
  {
    version: 1,
    up(db: Database.Database) {
      db.exec(`
        CREATE TABLE environments (
          image TEXT PRIMARY KEY,
          provisioned_at TEXT NOT NULL DEFAULT (datetime('now')),
          last_used_at TEXT NOT NULL DEFAULT (datetime('now')),
          uses INTEGER NOT NULL DEFAULT 0
        );
      `);
    },
  },
  createLeaseTable(2),
];

// ---------------------------------------------------------------------------
// EnvironmentCache
// ---------------------------------------------------------------------------

export class EnvironmentCache {
  private readonly runtime: ContainerRuntime;
  private readonly db: Database.Database;
  private readonly retries: number;
  private readonly backoffMs: number;
  private readonly logger: Logger;
  private readonly lock = new AsyncRwLock();
  private readonly lease: SqliteLeaseLock;

  constructor(options: EnvironmentCacheOptions) {
    this.runtime = options.runtime;
    this.db = options.db;
    this.retries = options.retries;
    this.backoffMs = options.backoffMs;
    this.logger = options.logger ?? createLogger('env-cache');
    this.lease = new SqliteLeaseLock({ db: options.db, pollMs: options.lockPollMs });
  }

  /**
   * Make sure `image` is present in the container engine, pulling it
   * (with bounded retries) when it is not.
   *
   * @throws PipelineError of kind ProvisionFailure once retries are spent.
   */
  async ensure(image: string): Promise<void> {
    const cached = await this.withRead(() => this.runtime.imageExists(image));
    if (cached) {
      this.recordUse(image);
      this.logger.debug('environment cache hit', { image });
      return;
    }

    await this.withWrite(async () => {
      // Another stage or process may have pulled it while we waited for the writer side
      if (await this.runtime.imageExists(image)) {
        return;
      }
      await this.provision(image);
    });
    this.recordUse(image);
  }

  /** Indexed environments, most recently used first. */
  list(): CachedEnvironment[] {
    const rows = this.db
      .prepare<[], EnvironmentRow>(
        `SELECT image, provisioned_at, last_used_at, uses
         FROM environments
         ORDER BY last_used_at DESC, image ASC`,
      )
      .all();

    return rows.map((r) => ({
      image: r.image,
      provisionedAt: r.provisioned_at,
      lastUsedAt: r.last_used_at,
      uses: r.uses,
    }));
  }

  /**
   * Remove every indexed image from the engine and the index. Images the
   * engine refuses to remove stay indexed and are reported in `failed`.
   */
  async clear(): Promise<ClearResult> {
    return this.withWrite(async () => {
      const result: ClearResult = { removed: [], failed: [] };

      for (const { image } of this.list()) {
        try {
          if (await this.runtime.imageExists(image)) {
            await this.runtime.removeImage(image);
          }
          this.db.prepare('DELETE FROM environments WHERE image = ?').run(image);
          result.removed.push(image);
        } catch (err) {
          const error = errorMessage(err);
          this.logger.warn('failed to remove cached environment', { image, error });
          result.failed.push({ image, error });
        }
      }

      this.logger.info('environment cache cleared', {
        removed: result.removed.length,
        failed: result.failed.length,
      });
      return result;
    });
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private withRead<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.withRead(() => this.lease.withRead(fn));
  }

  private withWrite<T>(fn: () => Promise<T>): Promise<T> {
    return this.lock.withWrite(() => this.lease.withWrite(fn));
  }

  private async provision(image: string): Promise<void> {
    const start = Date.now();
    const attempts = this.retries + 1;

    try {
      await withRetry(() => this.runtime.pull(image), {
        retries: this.retries,
        backoffMs: this.backoffMs,
        onRetry: (err, attempt, delayMs) => {
          this.logger.warn('environment pull failed, retrying', {
            image,
            attempt,
            delay_ms: delayMs,
            error: errorMessage(err),
          });
        },
      });
    } catch (err) {
      throw new PipelineError({
        kind: FailureKind.ProvisionFailure,
        message: `Failed to provision "${image}" after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(err)}`,
        cause: err,
      });
    }

    this.db
      .prepare(
        `INSERT INTO environments (image, provisioned_at, last_used_at, uses)
         VALUES (?, datetime('now'), datetime('now'), 0)
         ON CONFLICT(image) DO UPDATE SET provisioned_at = datetime('now')`,
      )
      .run(image);
    this.logger.info('environment provisioned', { image, duration_ms: Date.now() - start });
  }

  private recordUse(image: string): void {
    this.db
      .prepare(
        `INSERT INTO environments (image, provisioned_at, last_used_at, uses)
         VALUES (?, datetime('now'), datetime('now'), 1)
         ON CONFLICT(image) DO UPDATE SET
           last_used_at = datetime('now'),
           uses = uses + 1`,
      )
      .run(image);
  }
}

// ---------------------------------------------------------------------------
// Process-wide instance
// ---------------------------------------------------------------------------

let instance: EnvironmentCache | null = null;

/**
 * Create the process-wide cache.
 *
 * @throws If a cache has already been initialized.
 */
export function initializeEnvironmentCache(options: EnvironmentCacheOptions): EnvironmentCache {
  if (instance !== null) {
    throw new Error('Environment cache is already initialized');
  }
  instance = new EnvironmentCache(options);
  return instance;
}

/**
 * The process-wide cache.
 *
 * @throws If {@link initializeEnvironmentCache} has not been called.
 */
export function getEnvironmentCache(): EnvironmentCache {
  if (instance === null) {
    throw new Error('Environment cache is not initialized');
  }
  return instance;
}

/** Forget the process-wide cache. For tests and shutdown. */
export function resetEnvironmentCache(): void {
  instance = null;
}
