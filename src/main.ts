/**
 * Production entry point for stagecraft.
 *
 * Wires real dependencies (filesystem, signals, container runtimes) into
 * CliDeps and dispatches to the CLI command handler.
 *
 * Usage:
 *   node dist/main.js run pipeline.yaml
 *   node dist/main.js build pipeline.yaml --until build --out ./out
 */

import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { parseArgs, runCommand } from './cli.js';
import type { CliDeps } from './cli.js';
import { resolveHome, ensureDirectoryStructure, type StagecraftConfig } from './types/config.js';
import { loadConfig } from './core/config-loader.js';
import { detectRuntime } from './core/container/detect.js';
import { DockerRuntime } from './core/container/docker-runtime.js';
import { PodmanRuntime } from './core/container/podman-runtime.js';
import type { ContainerRuntime } from './core/container/runtime.js';
import { writeHostTree } from './core/fs-tree.js';
import { configureLogging, createLogger, createRunLogSink, stderrSink, type LogLevel } from './core/logger.js';

const logger = createLogger('main');

// ---------------------------------------------------------------------------
// Runtime selection
// ---------------------------------------------------------------------------

async function resolveRuntime(config: StagecraftConfig): Promise<ContainerRuntime | null> {
  const result = await detectRuntime({
    runtimes: [new PodmanRuntime(), new DockerRuntime()],
    preference: config.runtime.engine,
  });
  if (result === null) return null;
  logger.debug('container runtime selected', {
    runtime: result.selected.runtime.name,
    version: result.selected.version,
  });
  return result.selected.runtime;
}

// ---------------------------------------------------------------------------
// Signals
// ---------------------------------------------------------------------------

function onSignal(handler: () => void): () => void {
  process.on('SIGINT', handler);
  process.on('SIGTERM', handler);
  return () => {
    process.off('SIGINT', handler);
    process.off('SIGTERM', handler);
  };
}

// ---------------------------------------------------------------------------
// main()
// ---------------------------------------------------------------------------

/**
 * Production main(): wires real deps and dispatches commands.
 *
 * @param argv - Process arguments (defaults to process.argv).
 * @returns Exit code.
 */
export async function main(argv: string[] = process.argv): Promise<number> {
  const args = parseArgs(argv);
  const home = resolveHome();

  configureLogging({
    level: args.flags['debug'] ? 'debug' : loadLogLevel(home),
    sink: stderrSink,
  });

  const deps: CliDeps = {
    stdout: (msg: string) => process.stdout.write(`${msg}\n`),
    stderr: (msg: string) => process.stderr.write(`${msg}\n`),
    home,
    loadConfig: (h: string) => loadConfig(h),
    ensureDirs: (h: string) => ensureDirectoryStructure(h),
    readFile: (path: string) => readFileSync(path, 'utf-8'),
    writeTree: writeHostTree,
    resolveRuntime,
    onSignal,
    openRunLog: (path: string) => createRunLogSink(path),
    logSink: stderrSink,
  };

  return runCommand(args, deps);
}

/** Configured `[logging] level`, or `info` when config.toml is unreadable. */
function loadLogLevel(home: string): LogLevel {
  try {
    return loadConfig(home).logging.level;
  } catch (err) {
    process.stderr.write(`Warning: ${err instanceof Error ? err.message : String(err)}\n`);
    return 'info';
  }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

function isEntryPoint(): boolean {
  const script = process.argv[1];
  return script !== undefined && existsSync(script) && realpathSync(script) === fileURLToPath(import.meta.url);
}

/* c8 ignore next 5 */
if (isEntryPoint()) {
  main().then(
    (code) => process.exit(code),
    (err: unknown) => {
      process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
      process.exit(1);
    },
  );
}
