/**
 * stagecraft CLI.
 *
 * Provides the `stagecraft` command with subcommands:
 *   - `run`: Build every stage and serve the final one.
 *   - `build`: Build (optionally up to a stage) and export artifacts.
 *   - `validate`: Schema, structural and transfer checks only.
 *   - `cache`: List or clear the base-environment cache.
 *   - `history`: Show recent runs.
 *
 * All external dependencies are injected via {@link CliDeps} for testability.
 * The real `main()` wires production dependencies and calls `runCommand()`.
 */

import { resolve } from 'node:path';
import { VERSION } from './index.js';
import type { ContainerRuntime } from './core/container/runtime.js';
import { checkTransfers } from './core/artifact-transfer.js';
import type { PortProbe } from './core/launch/health.js';
import type { ProcessHandle } from './core/launch/process-handle.js';
import type { LogSink, RunLogSink } from './core/logger.js';
import { formatValidationErrors, loadPipeline } from './core/pipeline-loader.js';
import { errorMessage, isPipelineError } from './core/pipeline-error.js';
import { planPipeline } from './core/plan.js';
import { openWorkspace, type Workspace } from './core/workspace.js';
import { formatFailure, runPipelineCommand } from './run-command.js';
import type { DirectoryStructure, StagecraftConfig } from './types/config.js';
import { EXIT_CODES, EXIT_SUCCESS, EXIT_USAGE, FailureKind } from './types/errors.js';

// ---------------------------------------------------------------------------
// CLI dependency injection
// ---------------------------------------------------------------------------

/** Injectable dependencies for CLI commands. */
export interface CliDeps {
  /** Write to stdout. */
  stdout: (msg: string) => void;
  /** Write to stderr. */
  stderr: (msg: string) => void;
  /** Resolved STAGECRAFT_HOME path. */
  home: string;
  /** Load and validate config from STAGECRAFT_HOME. */
  loadConfig: (home: string) => StagecraftConfig;
  /** Ensure directory structure exists under STAGECRAFT_HOME. */
  ensureDirs: (home: string) => DirectoryStructure;
  /** Read file contents as string. */
  readFile: (path: string) => string;
  /** Write a relative-path file map below a directory. */
  writeTree: (root: string, files: ReadonlyMap<string, Uint8Array>) => void;
  /** Select a container engine, or null when none responds. */
  resolveRuntime: (config: StagecraftConfig) => Promise<ContainerRuntime | null>;
  /** Subscribe to SIGINT/SIGTERM. Returns an unsubscribe function. */
  onSignal: (handler: () => void) => () => void;
  /** Keep the SQLite stores in memory. */
  memoryStores?: boolean;
  /** Open a per-run JSONL log file. */
  openRunLog?: (path: string) => RunLogSink;
  /** The configured log sink. */
  logSink?: LogSink;
  /** TCP probe for launch health checks. */
  probe?: PortProbe;
  /** Replaces waiting for a signal while the final stage serves. */
  whileServing?: (handle: ProcessHandle) => Promise<void>;
}

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

/** Parsed CLI arguments. */
export interface ParsedArgs {
  command: string;
  /** Non-option arguments after the command. */
  positionals: string[];
  flags: Record<string, boolean>;
  options: Record<string, string>;
  /** Problems found while parsing (e.g. an option missing its value). */
  errors: string[];
}

/** Options that take a value (`--until build` or `--until=build`). */
const VALUE_OPTIONS: ReadonlySet<string> = new Set(['until', 'out', 'timeout', 'limit']);

/**
 * Parse process.argv into a command, positionals, flags and options.
 *
 * Expects argv in the form: [node, script, command?, ...args]
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const parsed: ParsedArgs = { command: '', positionals: [], flags: {}, options: {}, errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
      if (!VALUE_OPTIONS.has(name)) {
        parsed.flags[name] = true;
        continue;
      }
      if (eq !== -1) {
        parsed.options[name] = arg.slice(eq + 1);
      } else if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
        parsed.options[name] = args[i + 1];
        i += 1;
      } else {
        parsed.errors.push(`Option --${name} requires a value`);
      }
    } else if (!parsed.command) {
      parsed.command = arg;
    } else {
      parsed.positionals.push(arg);
    }
  }

  return parsed;
}

// ---------------------------------------------------------------------------
// Usage
// ---------------------------------------------------------------------------

const USAGE = `Usage: stagecraft <command> [options]

Commands:
  run <pipeline>           Build every stage and serve the final one
  build <pipeline>         Build stages and export the last artifact set
  validate <pipeline>      Check a pipeline without running it
  cache list               List cached base environments
  cache clear              Remove every cached base environment
  history                  Show recent runs

Options:
  --until <stage>    Stop after this stage (build)
  --out <dir>        Export directory (build)
  --timeout <s>      Overall deadline in seconds (run, build)
  --limit <n>        Number of runs to show (history, default 20)
  --debug            Verbose logging
  --version          Show version number
  --help             Show this help message`;

const COMMAND_OPTIONS: Readonly<Record<string, readonly string[]>> = {
  run: ['timeout'],
  build: ['until', 'out', 'timeout'],
  validate: [],
  cache: [],
  history: ['limit'],
};

function usageError(deps: CliDeps, message: string): number {
  deps.stderr(`${message}\n`);
  deps.stderr(USAGE);
  return EXIT_USAGE;
}

/** `--timeout` in seconds → milliseconds. */
export function parseTimeout(value: string): number | null {
  if (!/^\d+(\.\d+)?$/.test(value)) return null;
  const seconds = Number(value);
  return seconds > 0 ? Math.round(seconds * 1_000) : null;
}

// ---------------------------------------------------------------------------
// Command dispatch
// ---------------------------------------------------------------------------

/**
 * Dispatch parsed arguments to the matching command.
 *
 * @returns Process exit code.
 */
export async function runCommand(args: ParsedArgs, deps: CliDeps): Promise<number> {
  if (args.command === '' && args.flags['version']) {
    deps.stdout(VERSION);
    return EXIT_SUCCESS;
  }

  if (args.command === '' || args.flags['help']) {
    deps.stdout(USAGE);
    return EXIT_SUCCESS;
  }

  const allowed = COMMAND_OPTIONS[args.command];
  if (allowed === undefined) {
    return usageError(deps, `Unknown command: "${args.command}"`);
  }
  if (args.errors.length > 0) {
    return usageError(deps, args.errors.join('\n'));
  }
  const unexpected = Object.keys(args.options).filter((name) => !allowed.includes(name));
  if (unexpected.length > 0) {
    return usageError(deps, `Option --${unexpected[0]} is not valid for "${args.command}"`);
  }

  switch (args.command) {
    case 'run':
    case 'build':
      return pipelineCommand(args, deps, args.command);
    case 'validate':
      return validate(args, deps);
    case 'cache':
      return cache(args, deps);
    case 'history':
      return history(args, deps);
    default:
      return usageError(deps, `Unknown command: "${args.command}"`);
  }
}

// ---------------------------------------------------------------------------
// Workspace helper
// ---------------------------------------------------------------------------

/**
 * Open a workspace, run `fn`, and close it. Exits with ProvisionFailure
 * when no container engine responds.
 */
async function withWorkspace(deps: CliDeps, fn: (workspace: Workspace) => Promise<number>): Promise<number> {
  const dirs = deps.ensureDirs(deps.home);
  let config: StagecraftConfig;
  try {
    config = deps.loadConfig(deps.home);
  } catch (err) {
    deps.stderr(`Invalid configuration ${dirs.configFile}: ${errorMessage(err)}`);
    return EXIT_USAGE;
  }
  const runtime = await deps.resolveRuntime(config);
  if (runtime === null) {
    deps.stderr('No container runtime found. Install Docker or Podman.');
    return EXIT_CODES[FailureKind.ProvisionFailure];
  }

  const workspace = openWorkspace({ config, dirs, runtime, useMemory: deps.memoryStores });
  try {
    return await fn(workspace);
  } finally {
    workspace.close();
  }
}

// ---------------------------------------------------------------------------
// run / build
// ---------------------------------------------------------------------------

async function pipelineCommand(args: ParsedArgs, deps: CliDeps, mode: 'run' | 'build'): Promise<number> {
  const [file, ...extra] = args.positionals;
  if (file === undefined) {
    return usageError(deps, `Missing pipeline file for "${mode}"`);
  }
  if (extra.length > 0) {
    return usageError(deps, `Unexpected argument: "${extra[0]}"`);
  }

  let timeoutMs: number | undefined;
  if (args.options['timeout'] !== undefined) {
    const parsed = parseTimeout(args.options['timeout']);
    if (parsed === null) {
      return usageError(deps, `Invalid --timeout "${args.options['timeout']}": expected a positive number of seconds`);
    }
    timeoutMs = parsed;
  }

  return withWorkspace(deps, (workspace) =>
    runPipelineCommand(
      {
        stdout: deps.stdout,
        stderr: deps.stderr,
        workspace,
        readFile: deps.readFile,
        writeTree: deps.writeTree,
        onSignal: deps.onSignal,
        openRunLog: deps.openRunLog,
        logSink: deps.logSink,
        probe: deps.probe,
        whileServing: deps.whileServing,
      },
      {
        mode,
        file,
        until: args.options['until'],
        out: args.options['out'],
        timeoutMs,
      },
    ),
  );
}

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

/**
 * Load a pipeline and run the checks a run would do before its first
 * stage. Touches neither the container engine nor the stores.
 */
export async function validate(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const [file] = args.positionals;
  if (file === undefined) {
    return usageError(deps, 'Missing pipeline file for "validate"');
  }

  const path = resolve(file);
  const loaded = loadPipeline(path, { readFile: deps.readFile });
  if (!loaded.ok) {
    deps.stderr(`Invalid pipeline ${path}:`);
    deps.stderr(formatValidationErrors(loaded.errors));
    return EXIT_USAGE;
  }

  const pipeline = loaded.pipeline;
  try {
    checkTransfers(pipeline);
    planPipeline(pipeline);
  } catch (err) {
    if (!isPipelineError(err)) throw err;
    for (const line of formatFailure(err.toFailure())) {
      deps.stderr(line);
    }
    return EXIT_CODES[err.kind];
  }

  const final = pipeline.stages[pipeline.stages.length - 1];
  deps.stdout(
    `Pipeline "${pipeline.name}" is valid: ${pipeline.stages.length} stage(s), ${pipeline.transfers.length} transfer(s)`,
  );
  deps.stdout(`  Order: ${pipeline.stages.map((s) => s.name).join(' -> ')}`);
  if (final.launch !== undefined) {
    deps.stdout(`  Launch: ${final.launch.variant} (stage "${final.name}")`);
  }
  return EXIT_SUCCESS;
}

// ---------------------------------------------------------------------------
// cache
// ---------------------------------------------------------------------------

const CACHE_USAGE = `Usage: stagecraft cache <subcommand>

Subcommands:
  list     List cached base environments
  clear    Remove every cached base environment`;

export async function cache(args: ParsedArgs, deps: CliDeps): Promise<number> {
  const [subcommand] = args.positionals;

  switch (subcommand) {
    case 'list':
      return withWorkspace(deps, async (workspace) => {
        const entries = workspace.environments.list();
        if (entries.length === 0) {
          deps.stdout('No cached environments');
          return EXIT_SUCCESS;
        }
        for (const entry of entries) {
          deps.stdout(`${entry.image}  uses=${entry.uses}  last used ${entry.lastUsedAt}`);
        }
        return EXIT_SUCCESS;
      });
    case 'clear':
      return withWorkspace(deps, async (workspace) => {
        const result = await workspace.environments.clear();
        deps.stdout(`Removed ${result.removed.length} environment(s)`);
        for (const { image, error } of result.failed) {
          deps.stderr(`  Could not remove ${image}: ${error}`);
        }
        return result.failed.length === 0 ? EXIT_SUCCESS : 1;
      });
    default:
      if (subcommand !== undefined) {
        deps.stderr(`Unknown cache subcommand: "${subcommand}"\n`);
      }
      deps.stdout(CACHE_USAGE);
      return subcommand !== undefined ? EXIT_USAGE : EXIT_SUCCESS;
  }
}

// ---------------------------------------------------------------------------
// history
// ---------------------------------------------------------------------------

const DEFAULT_HISTORY_LIMIT = 20;

export async function history(args: ParsedArgs, deps: CliDeps): Promise<number> {
  let limit = DEFAULT_HISTORY_LIMIT;
  const raw = args.options['limit'];
  if (raw !== undefined) {
    if (!/^\d+$/.test(raw) || Number(raw) < 1) {
      return usageError(deps, `Invalid --limit "${raw}": expected a positive integer`);
    }
    limit = Number(raw);
  }

  return withWorkspace(deps, async (workspace) => {
    const runs = workspace.history.recent(limit);
    if (runs.length === 0) {
      deps.stdout('No runs recorded');
      return EXIT_SUCCESS;
    }

    for (const run of runs) {
      const exit = run.exitCode === null ? '-' : String(run.exitCode);
      const failure = run.failure === null ? '' : `  ${run.failure.kind}${run.failure.stage ? ` in "${run.failure.stage}"` : ''}`;
      deps.stdout(`${run.startedAt}  ${run.id.slice(0, 8)}  ${run.pipeline}  ${run.mode}  ${run.status}  exit=${exit}${failure}`);
    }
    return EXIT_SUCCESS;
  });
}
