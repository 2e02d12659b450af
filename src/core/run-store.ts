/**
 * Run history for stagecraft.
 *
 * SQLite-backed record of every `run` / `build` invocation: overall
 * outcome, exit code, failure and final artifact digest, plus one row per
 * stage with its last status and duration. Fed by pipeline status events;
 * read by `stagecraft history`.
 */

import type Database from 'better-sqlite3';
import type { FailureKindValue, StageFailure } from '../types/errors.js';
import type { PipelineStatus, StageStatus } from '../types/pipeline.js';
import type { Migration } from './sqlite-manager.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RunMode = 'run' | 'build';

export interface StageRunRecord {
  index: number;
  name: string;
  status: StageStatus;
  durationMs: number | null;
}

export interface RunFailureRecord {
  kind: FailureKindValue;
  message: string;
  stage: string | null;
}

export interface RunRecord {
  id: string;
  pipeline: string;
  mode: RunMode;
  status: PipelineStatus;
  startedAt: string;
  finishedAt: string | null;
  exitCode: number | null;
  failure: RunFailureRecord | null;
  digest: string | null;
  stages: StageRunRecord[];
}

export interface RunStart {
  id: string;
  pipeline: string;
  mode: RunMode;
  /** Stage names in execution order. */
  stages: readonly string[];
}

export interface RunFinish {
  status: PipelineStatus;
  exitCode: number;
  failure?: StageFailure;
  digest?: string;
}

interface RunRow {
  id: string;
  pipeline: string;
  mode: RunMode;
  status: PipelineStatus;
  started_at: string;
  finished_at: string | null;
  exit_code: number | null;
  failure_kind: FailureKindValue | null;
  failure_message: string | null;
  failure_stage: string | null;
  digest: string | null;
}

interface StageRow {
  stage_index: number;
  stage: string;
  status: StageStatus;
  duration_ms: number | null;
}

// ---------------------------------------------------------------------------
// Migrations
// ---------------------------------------------------------------------------

export const RUN_HISTORY_STORE = 'history';

export const RUN_HISTORY_MIGRATIONS: Migration[] = [
  {
    version: 1,
    up(db: Database.Database) {
      db.exec(`
        CREATE TABLE runs (
          id TEXT PRIMARY KEY,
          pipeline TEXT NOT NULL,
          mode TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'running',
          started_at TEXT NOT NULL DEFAULT (datetime('now')),
          finished_at TEXT,
          exit_code INTEGER,
          failure_kind TEXT,
          failure_message TEXT,
          failure_stage TEXT,
          digest TEXT
        );
        CREATE INDEX idx_runs_recent ON runs(started_at DESC);

        CREATE TABLE stage_runs (
          run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
          stage_index INTEGER NOT NULL,
          stage TEXT NOT NULL,
          status TEXT NOT NULL DEFAULT 'pending',
          duration_ms INTEGER,
          PRIMARY KEY (run_id, stage_index)
        );
      `);
    },
  },
];

// ---------------------------------------------------------------------------
// RunStore
// ---------------------------------------------------------------------------

export class RunStore {
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /** Record a new run with every stage pending. */
  start(run: RunStart): void {
    const insertRun = this.db.prepare(
      `INSERT INTO runs (id, pipeline, mode, status, started_at)
       VALUES (?, ?, ?, 'running', datetime('now'))`,
    );
    const insertStage = this.db.prepare(
      'INSERT INTO stage_runs (run_id, stage_index, stage) VALUES (?, ?, ?)',
    );

    this.db.transaction(() => {
      insertRun.run(run.id, run.pipeline, run.mode);
      run.stages.forEach((stage, index) => insertStage.run(run.id, index, stage));
    })();
  }

  /** Update one stage's status (and duration, once it has ended). */
  updateStage(runId: string, stageIndex: number, status: StageStatus, durationMs?: number): void {
    this.db
      .prepare(
        `UPDATE stage_runs SET status = ?, duration_ms = COALESCE(?, duration_ms)
         WHERE run_id = ? AND stage_index = ?`,
      )
      .run(status, durationMs ?? null, runId, stageIndex);
  }

  /** Record the final outcome of a run. */
  finish(runId: string, outcome: RunFinish): void {
    this.db
      .prepare(
        `UPDATE runs SET
           status = ?, finished_at = datetime('now'), exit_code = ?,
           failure_kind = ?, failure_message = ?, failure_stage = ?, digest = ?
         WHERE id = ?`,
      )
      .run(
        outcome.status,
        outcome.exitCode,
        outcome.failure?.kind ?? null,
        outcome.failure?.message ?? null,
        outcome.failure?.stage ?? null,
        outcome.digest ?? null,
        runId,
      );
  }

  get(runId: string): RunRecord | null {
    const row = this.db
      .prepare<[string], RunRow>(
        `SELECT id, pipeline, mode, status, started_at, finished_at, exit_code,
                failure_kind, failure_message, failure_stage, digest
         FROM runs WHERE id = ?`,
      )
      .get(runId);
    return row === undefined ? null : this.toRecord(row);
  }

  /** Most recent runs first. */
  recent(limit: number): RunRecord[] {
    return this.db
      .prepare<[number], RunRow>(
        `SELECT id, pipeline, mode, status, started_at, finished_at, exit_code,
                failure_kind, failure_message, failure_stage, digest
         FROM runs
         ORDER BY started_at DESC, rowid DESC
         LIMIT ?`,
      )
      .all(limit)
      .map((row) => this.toRecord(row));
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private toRecord(row: RunRow): RunRecord {
    const stages = this.db
      .prepare<[string], StageRow>(
        `SELECT stage_index, stage, status, duration_ms
         FROM stage_runs WHERE run_id = ? ORDER BY stage_index`,
      )
      .all(row.id)
      .map((s) => ({
        index: s.stage_index,
        name: s.stage,
        status: s.status,
        durationMs: s.duration_ms,
      }));

    return {
      id: row.id,
      pipeline: row.pipeline,
      mode: row.mode,
      status: row.status,
      startedAt: row.started_at,
      finishedAt: row.finished_at,
      exitCode: row.exit_code,
      failure:
        row.failure_kind === null
          ? null
          : { kind: row.failure_kind, message: row.failure_message ?? '', stage: row.failure_stage },
      digest: row.digest,
      stages,
    };
  }
}
