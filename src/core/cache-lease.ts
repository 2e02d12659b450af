/**
 * Cross-process reader/writer lease kept in SQLite.
 *
 * {@link AsyncRwLock} only orders callers inside one process. Several
 * `stagecraft` invocations share one environment cache, so the cache also
 * takes a lease row in its own index database. Each holder owns a row in
 * `cache_leases`; a write lease excludes every other row, a read lease
 * excludes write rows only.
 *
 * Inspecting and inserting rows happens inside an IMMEDIATE transaction,
 * so at most one process decides at a time. Rows whose owning process is
 * gone are purged before each attempt.
 */

import { randomUUID } from 'node:crypto';
import type Database from 'better-sqlite3';
import type { Migration } from './sqlite-manager.js';
import type { LockMode, ReleaseFn } from './rw-lock.js';
import { sleep } from './timing.js';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Creates `cache_leases`. Appended to the cache store's migrations. */
export function createLeaseTable(version: number): Migration {
  return {
    version,
    up(db: Database.Database) {
      db.exec(`
        CREATE TABLE cache_leases (
          owner TEXT PRIMARY KEY,
          mode TEXT NOT NULL CHECK (mode IN ('read', 'write')),
          pid INTEGER NOT NULL,
          acquired_at TEXT NOT NULL DEFAULT (datetime('now'))
        );
      `);
    },
  };
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LeaseLockOptions {
  db: Database.Database;
  /** Delay between attempts while another holder blocks. Defaults to 100ms. */
  pollMs?: number;
  /** Process recorded on our leases. Defaults to `process.pid`. */
  pid?: number;
  /** Whether the process owning a lease is still running. */
  isAlive?: (pid: number) => boolean;
}

interface LeaseRow {
  owner: string;
  mode: string;
  pid: number;
}

const DEFAULT_POLL_MS = 100;

/** Signal 0 probes for existence; EPERM means alive but owned by another user. */
export function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

// ---------------------------------------------------------------------------
// SqliteLeaseLock
// ---------------------------------------------------------------------------

export class SqliteLeaseLock {
  private readonly db: Database.Database;
  private readonly pollMs: number;
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;

  constructor(options: LeaseLockOptions) {
    this.db = options.db;
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? processAlive;
  }

  /**
   * Take a lease if no conflicting holder exists. Non-blocking: returns
   * null when the lease is held elsewhere.
   */
  tryAcquire(mode: LockMode): ReleaseFn | null {
    const owner = randomUUID();

    const granted = this.db
      .transaction(() => {
        this.purgeStale();
        const holders = this.db.prepare<[], LeaseRow>('SELECT owner, mode, pid FROM cache_leases').all();
        const blocked = mode === 'write' ? holders.length > 0 : holders.some((h) => h.mode === 'write');
        if (blocked) return false;

        this.db.prepare('INSERT INTO cache_leases (owner, mode, pid) VALUES (?, ?, ?)').run(owner, mode, this.pid);
        return true;
      })
      .immediate();

    if (!granted) return null;

    let released = false;
    return () => {
      if (released || !this.db.open) return;
      released = true;
      this.db.prepare('DELETE FROM cache_leases WHERE owner = ?').run(owner);
    };
  }

  /** Wait until a lease of `mode` is granted. */
  async acquire(mode: LockMode): Promise<ReleaseFn> {
    for (;;) {
      const release = this.tryAcquire(mode);
      if (release !== null) return release;
      await sleep(this.pollMs);
    }
  }

  /** Run `fn` under a read lease. */
  async withRead<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('read');
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Run `fn` under the write lease. */
  async withWrite<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire('write');
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** Current holders, oldest first. */
  holders(): Array<{ mode: string; pid: number }> {
    return this.db
      .prepare<[], LeaseRow>('SELECT owner, mode, pid FROM cache_leases ORDER BY acquired_at, rowid')
      .all()
      .map((row) => ({ mode: row.mode, pid: row.pid }));
  }

  private purgeStale(): void {
    const rows = this.db.prepare<[], LeaseRow>('SELECT owner, mode, pid FROM cache_leases').all();
    for (const row of rows) {
      if (row.pid !== this.pid && !this.isAlive(row.pid)) {
        this.db.prepare('DELETE FROM cache_leases WHERE owner = ?').run(row.owner);
      }
    }
  }
}
