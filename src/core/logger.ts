/**
 * Structured JSON logging for stagecraft.
 *
 * Provides component-scoped loggers with level filtering, injectable
 * sinks for testing, and a stage output router that maps command
 * stdout/stderr to structured log entries.
 *
 * All log output is JSON-formatted with level, ts, component and msg
 * fields. Run correlation fields (run, pipeline, stage) are promoted to
 * top level.
 *
 * @example
 * ```ts
 * const logger = createLogger('executor');
 * logger.info('stage started', { stage: 'build' });
 * // → {"level":"info","ts":"...","component":"executor","msg":"stage started","stage":"build"}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  run?: string;
  pipeline?: string;
  stage?: string;
  duration_ms?: number;
  ok?: boolean;
  failure_kind?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  run?: string;
  pipeline?: string;
  stage?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stderr JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Default sink (stderr JSON)
// ---------------------------------------------------------------------------

// stdout carries the CLI's own report; logs go to stderr.
function defaultSink(entry: LogEntry): void {
  process.stderr.write(JSON.stringify(entry) + '\n');
}

/** Sink that writes one JSON line per entry to stderr. */
export const stderrSink: LogSink = defaultSink;

/** Combine several sinks into one. */
export function fanoutSink(...sinks: LogSink[]): LogSink {
  return (entry) => {
    for (const sink of sinks) {
      sink(entry);
    }
  };
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/**
 * Metadata keys that must never appear in log output. Stage `env` maps
 * routinely carry registry tokens and API keys.
 */
export const NEVER_LOG_FIELDS = new Set([
  'env',
  'apiKey',
  'api_key',
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_KEYS = new Set(['duration_ms', 'ok', 'failure_kind', 'run', 'pipeline', 'stage']);

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/**
 * Strip denied keys, truncate long strings, and serialize Errors in metadata.
 */
function sanitizeMeta(meta?: Record<string, unknown>): Record<string, unknown> | undefined {
  if (!meta) return undefined;

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key) || PROMOTED_KEYS.has(key)) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return Object.keys(result).length > 0 ? result : undefined;
}

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  const { duration_ms, ok, failure_kind, run, pipeline, stage } = meta;
  if (typeof duration_ms === 'number') entry.duration_ms = duration_ms;
  if (typeof ok === 'boolean') entry.ok = ok;
  if (typeof failure_kind === 'string') entry.failure_kind = failure_kind;
  if (typeof run === 'string') entry.run = run;
  if (typeof pipeline === 'string') entry.pipeline = pipeline;
  if (typeof stage === 'string') entry.stage = stage;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'pipeline'`, `'executor:build'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext) {
      if (boundContext.run) entry.run = boundContext.run;
      if (boundContext.pipeline) entry.pipeline = boundContext.pipeline;
      if (boundContext.stage) entry.stage = boundContext.stage;
    }

    if (meta) {
      promote(entry, meta);
      const remaining = sanitizeMeta(meta);
      if (remaining !== undefined) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// StageOutputRouter
// ---------------------------------------------------------------------------

/**
 * Routes stage command stdout/stderr to structured logs.
 *
 * Each non-empty line becomes a separate debug entry tagged with the
 * command index and stream, so `--debug` shows the full build transcript.
 */
export class StageOutputRouter {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child('output');
  }

  route(commandIndex: number, stdout: string, stderr: string): void {
    this.routeLines(commandIndex, stdout, 'stdout');
    this.routeLines(commandIndex, stderr, 'stderr');
  }

  private routeLines(commandIndex: number, data: string, stream: 'stdout' | 'stderr'): void {
    for (const line of splitLines(data)) {
      this.logger.debug(line, { command: commandIndex, stream });
    }
  }
}

/** Split command output into non-empty lines. */
export function splitLines(data: string): string[] {
  return data.split(/\r?\n/).filter((line) => line.length > 0);
}

// ---------------------------------------------------------------------------
// RunLogSink: per-run JSONL log files
// ---------------------------------------------------------------------------

/** A LogSink that appends JSONL to a file, with a close() method. */
export interface RunLogSink extends LogSink {
  (entry: LogEntry): void;
  close(): void;
}

/**
 * Create a LogSink that appends JSONL to a file at the given path.
 *
 * Used for per-run log files at `logs/{runId}.jsonl`.
 *
 * @param filePath - Absolute path to the JSONL log file.
 * @param fs - Optional filesystem abstraction for testing.
 */
export function createRunLogSink(
  filePath: string,
  fs?: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  },
): RunLogSink {
  const fsMkdir = fs?.mkdirSync ?? mkdirSync;
  const fsAppend = fs?.appendFileSync ?? appendFileSync;

  fsMkdir(dirname(filePath), { recursive: true });

  let closed = false;

  const write = (entry: LogEntry): void => {
    if (closed) return;
    fsAppend(filePath, JSON.stringify(entry) + '\n');
  };

  return Object.assign(write, {
    close: () => {
      closed = true;
    },
  });
}
