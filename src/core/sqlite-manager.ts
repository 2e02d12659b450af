/**
 * SQLite connection manager for stagecraft.
 *
 * Manages one SQLite database per store at `data/{store}.sqlite`
 * (environment-cache index, run history). Supports ordered migrations
 * tracked via `PRAGMA user_version`. Connection handles are reused within
 * a session and all closed on shutdown.
 */

import Database from 'better-sqlite3';
import { join } from 'node:path';
import { mkdirSync } from 'node:fs';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface Migration {
  version: number;
  up(db: Database.Database): void;
}

export interface SqliteManagerOptions {
  /** Base directory for database files (e.g. `data/`). */
  baseDir: string;
  /** Use in-memory databases for testing. */
  useMemory?: boolean;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Store names: alphanumeric, hyphens, underscores. */
const VALID_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/;

function validateStoreName(value: string): void {
  if (!VALID_NAME_PATTERN.test(value)) {
    throw new Error(`Invalid store name: "${value}". Only [a-zA-Z0-9_-] allowed.`);
  }
}

// ---------------------------------------------------------------------------
// SqliteManager
// ---------------------------------------------------------------------------

export class SqliteManager {
  private readonly baseDir: string;
  private readonly useMemory: boolean;
  private readonly connections: Map<string, Database.Database> = new Map();
  private readonly migrations: Map<string, Migration[]> = new Map();

  constructor(opts: SqliteManagerOptions) {
    this.baseDir = opts.baseDir;
    this.useMemory = opts.useMemory ?? false;
  }

  /** Filesystem path for a store's database. */
  resolvePath(store: string): string {
    return join(this.baseDir, `${store}.sqlite`);
  }

  /**
   * Register migrations for a store. Migrations are sorted by version
   * and applied in order when the database is first opened.
   */
  registerMigrations(store: string, migrations: Migration[]): void {
    const sorted = [...migrations].sort((a, b) => a.version - b.version);
    this.migrations.set(store, sorted);
  }

  /**
   * Get (or open) the database for a store. Returns the same handle if
   * called again with the same name.
   */
  getDatabase(store: string): Database.Database {
    validateStoreName(store);

    const existing = this.connections.get(store);
    if (existing) {
      return existing;
    }

    const db = this.openDatabase(store);
    this.connections.set(store, db);
    this.applyMigrations(db, store);

    return db;
  }

  /** Close all open database connections. Safe to call multiple times. */
  shutdown(): void {
    for (const [store, db] of this.connections) {
      if (db.open) {
        db.close();
      }
      this.connections.delete(store);
    }
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private openDatabase(store: string): Database.Database {
    if (this.useMemory) {
      const db = new Database(':memory:');
      db.pragma('journal_mode = WAL');
      return db;
    }

    mkdirSync(this.baseDir, { recursive: true });
    const db = new Database(this.resolvePath(store));
    db.pragma('journal_mode = WAL');
    return db;
  }

  private applyMigrations(db: Database.Database, store: string): void {
    const storeMigrations = this.migrations.get(store);
    if (!storeMigrations || storeMigrations.length === 0) {
      return;
    }

    const version: unknown = db.pragma('user_version', { simple: true });
    const currentVersion = typeof version === 'number' ? version : 0;

    for (const migration of storeMigrations) {
      if (migration.version <= currentVersion) {
        continue;
      }

      db.transaction(() => {
        migration.up(db);
        db.pragma(`user_version = ${migration.version}`);
      })();
    }
  }
}
