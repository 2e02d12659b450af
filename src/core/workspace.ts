/**
 * Per-command wiring of the long-lived pieces: SQLite stores, the
 * process-wide environment cache and the run history.
 *
 * A workspace is opened at the start of a command that needs the
 * container engine or the stores, and closed when the command returns.
 */

import type { DirectoryStructure, StagecraftConfig } from '../types/config.js';
import type { ContainerRuntime } from './container/runtime.js';
import {
  ENVIRONMENT_CACHE_MIGRATIONS,
  ENVIRONMENT_CACHE_STORE,
  initializeEnvironmentCache,
  resetEnvironmentCache,
  type EnvironmentCache,
} from './environment-cache.js';
import { RUN_HISTORY_MIGRATIONS, RUN_HISTORY_STORE, RunStore } from './run-store.js';
import { SqliteManager } from './sqlite-manager.js';

export interface WorkspaceOptions {
  config: StagecraftConfig;
  dirs: DirectoryStructure;
  runtime: ContainerRuntime;
  /** Keep every store in memory. */
  useMemory?: boolean;
}

export interface Workspace {
  readonly config: StagecraftConfig;
  readonly dirs: DirectoryStructure;
  readonly runtime: ContainerRuntime;
  readonly environments: EnvironmentCache;
  readonly history: RunStore;
  close(): void;
}

export function openWorkspace(options: WorkspaceOptions): Workspace {
  const { config, dirs, runtime } = options;
  const sqlite = new SqliteManager({ baseDir: dirs.data, useMemory: options.useMemory });
  sqlite.registerMigrations(ENVIRONMENT_CACHE_STORE, ENVIRONMENT_CACHE_MIGRATIONS);
  sqlite.registerMigrations(RUN_HISTORY_STORE, RUN_HISTORY_MIGRATIONS);

  const environments = initializeEnvironmentCache({
    runtime,
    db: sqlite.getDatabase(ENVIRONMENT_CACHE_STORE),
    retries: config.provision.retries,
    backoffMs: config.provision.backoff_ms,
  });

  let closed = false;
  return {
    config,
    dirs,
    runtime,
    environments,
    history: new RunStore(sqlite.getDatabase(RUN_HISTORY_STORE)),
    close: () => {
      if (closed) return;
      closed = true;
      resetEnvironmentCache();
      sqlite.shutdown();
    },
  };
}
