/**
 * `stagecraft run` and `stagecraft build`.
 *
 *   - `run <file> [--timeout <s>]` builds every stage, launches the final
 *     one and serves until SIGINT/SIGTERM.
 *   - `build <file> [--until <stage>] [--out <dir>] [--timeout <s>]`
 *     builds without launching and exports the last ArtifactSet.
 *
 * Both record the run in the history store and write a per-run JSONL log
 * to `logs/<runId>.jsonl`. The exit code is the failure kind's code.
 */

import { randomUUID } from 'node:crypto';
import { join, resolve } from 'node:path';
import { EXIT_CODES, EXIT_SUCCESS, EXIT_USAGE, FailureKind, type StageFailure } from './types/errors.js';
import type { PipelineDefinition } from './types/pipeline.js';
import type { ArtifactSet } from './core/artifact-set.js';
import { RuntimeLauncher } from './core/launch/launcher.js';
import type { PortProbe } from './core/launch/health.js';
import { formatEndpoint, type ProcessHandle } from './core/launch/process-handle.js';
import {
  configureLogging,
  createLogger,
  fanoutSink,
  stderrSink,
  type LogSink,
  type RunLogSink,
} from './core/logger.js';
import { Pipeline, type LaunchPlan, type PipelineEvent } from './core/pipeline.js';
import { formatValidationErrors, loadPipeline } from './core/pipeline-loader.js';
import { errorMessage, toPipelineError } from './core/pipeline-error.js';
import type { RunMode } from './core/run-store.js';
import { StageExecutor } from './core/stage-executor.js';
import { TimeoutError, withTimeout } from './core/timing.js';
import type { Workspace } from './core/workspace.js';

// ---------------------------------------------------------------------------
// Dependencies
// ---------------------------------------------------------------------------

export interface RunCommandDeps {
  stdout: (msg: string) => void;
  stderr: (msg: string) => void;
  workspace: Workspace;
  /** Read a pipeline file. */
  readFile: (path: string) => string;
  /** Write an exported ArtifactSet below a host directory. */
  writeTree: (root: string, files: ReadonlyMap<string, Uint8Array>) => void;
  /** Subscribe to SIGINT/SIGTERM. Returns an unsubscribe function. */
  onSignal: (handler: () => void) => () => void;
  /** Open the per-run JSONL log. Omitted: no run log. */
  openRunLog?: (path: string) => RunLogSink;
  /** Sink the run log is added to; restored afterwards. */
  logSink?: LogSink;
  /** TCP probe for launch health checks. */
  probe?: PortProbe;
  /**
   * Called once the final stage is serving. The process is stopped when
   * this resolves. Default: wait for SIGINT/SIGTERM.
   */
  whileServing?: (handle: ProcessHandle) => Promise<void>;
}

export interface RunCommandOptions {
  mode: RunMode;
  file: string;
  until?: string;
  out?: string;
  /** Overall deadline in milliseconds. */
  timeoutMs?: number;
}

// ---------------------------------------------------------------------------
// Reporting
// ---------------------------------------------------------------------------

/** Human-readable failure report, one line per entry. */
export function formatFailure(failure: StageFailure): string[] {
  const where =
    failure.stage !== undefined
      ? `Stage "${failure.stage}"${failure.stageIndex !== undefined ? ` (#${failure.stageIndex + 1})` : ''}`
      : 'Pipeline';
  const lines = [`${where} failed: ${failure.kind}`, `  ${failure.message}`];
  if (failure.exitStatus !== undefined) {
    lines.push(`  exit status: ${failure.exitStatus}`);
  }
  if (failure.outputTail !== undefined && failure.outputTail.length > 0) {
    lines.push('  output (last lines):');
    for (const line of failure.outputTail) {
      lines.push(`    ${line}`);
    }
  }
  return lines;
}

function formatDuration(ms: number): string {
  return ms < 1_000 ? `${ms}ms` : `${(ms / 1_000).toFixed(1)}s`;
}

function progressLine(event: Extract<PipelineEvent, { type: 'stage' }>, total: number): string | null {
  const prefix = `[${event.index + 1}/${total}] ${event.stage}`;
  switch (event.status) {
    case 'running':
      return `${prefix} ...`;
    case 'succeeded':
      return `${prefix} done (${formatDuration(event.durationMs ?? 0)})`;
    case 'failed':
      return `${prefix} failed`;
    case 'pending':
      return null;
  }
}

// ---------------------------------------------------------------------------
// runPipelineCommand
// ---------------------------------------------------------------------------

/**
 * Load, build and (for `run`) launch a pipeline.
 *
 * @returns Process exit code.
 */
export async function runPipelineCommand(deps: RunCommandDeps, options: RunCommandOptions): Promise<number> {
  const file = resolve(options.file);
  const loaded = loadPipeline(file, { readFile: deps.readFile });
  if (!loaded.ok) {
    deps.stderr(`Invalid pipeline ${file}:`);
    deps.stderr(formatValidationErrors(loaded.errors));
    return EXIT_USAGE;
  }

  const definition = loaded.pipeline;
  const { workspace } = deps;
  const runId = randomUUID();
  const baseSink = deps.logSink ?? stderrSink;
  const runLog = deps.openRunLog?.(join(workspace.dirs.logs, `${runId}.jsonl`));
  if (runLog !== undefined) {
    configureLogging({ sink: fanoutSink(baseSink, runLog) });
  }

  try {
    return await new RunSession(deps, definition, runId, options).execute();
  } finally {
    if (runLog !== undefined) {
      runLog.close();
      configureLogging({ sink: baseSink });
    }
  }
}

// ---------------------------------------------------------------------------
// RunSession
// ---------------------------------------------------------------------------

class RunSession {
  private readonly deps: RunCommandDeps;
  private readonly definition: PipelineDefinition;
  private readonly runId: string;
  private readonly options: RunCommandOptions;
  private readonly cancel = new AbortController();
  private readonly logger = createLogger('cli');
  private serving: (() => void) | undefined;
  private stopRequested = false;

  constructor(deps: RunCommandDeps, definition: PipelineDefinition, runId: string, options: RunCommandOptions) {
    this.deps = deps;
    this.definition = definition;
    this.runId = runId;
    this.options = options;
  }

  async execute(): Promise<number> {
    const { workspace } = this.deps;
    const started = Date.now();
    const total = this.definition.stages.length;

    workspace.history.start({
      id: this.runId,
      pipeline: this.definition.name,
      mode: this.options.mode,
      stages: this.definition.stages.map((s) => s.name),
    });

    const pipeline = new Pipeline(this.definition, {
      runner: new StageExecutor({
        runtime: workspace.runtime,
        environments: workspace.environments,
        tailLines: workspace.config.output.tail_lines,
      }),
      launchDefaults: workspace.config.launch,
    });
    pipeline.on((event) => {
      if (event.type !== 'stage') return;
      workspace.history.updateStage(this.runId, event.index, event.status, event.durationMs);
      const line = progressLine(event, total);
      if (line !== null) this.deps.stdout(line);
    });

    const unsubscribe = this.deps.onSignal(() => this.onSignal());
    try {
      this.deps.stdout(`Run ${this.runId} of pipeline "${this.definition.name}"`);
      const outcome = await pipeline.run({
        runId: this.runId,
        until: this.options.until,
        signal: this.cancel.signal,
        deadlineMs: this.options.timeoutMs,
        launch: this.options.mode === 'run',
      });

      if (!outcome.ok) {
        return this.fail(outcome.failure);
      }

      if (this.options.mode === 'build') {
        return this.export(outcome.stage, outcome.artifacts);
      }

      if (outcome.launch === undefined) {
        this.deps.stdout(`Final stage "${outcome.stage}" declares no launch; nothing to serve`);
        return this.succeed(outcome.artifacts);
      }

      const remaining =
        this.options.timeoutMs === undefined ? undefined : this.options.timeoutMs - (Date.now() - started);
      return await this.serve(outcome.launch, outcome.artifacts, remaining);
    } finally {
      unsubscribe();
    }
  }

  // -------------------------------------------------------------------------
  // Outcomes
  // -------------------------------------------------------------------------

  private fail(failure: StageFailure): number {
    const exitCode = EXIT_CODES[failure.kind];
    for (const line of formatFailure(failure)) {
      this.deps.stderr(line);
    }
    this.deps.workspace.history.finish(this.runId, { status: 'failed', exitCode, failure });
    return exitCode;
  }

  private succeed(artifacts: ArtifactSet): number {
    this.deps.workspace.history.finish(this.runId, {
      status: 'succeeded',
      exitCode: EXIT_SUCCESS,
      digest: artifacts.digest(),
    });
    return EXIT_SUCCESS;
  }

  private export(stage: string, artifacts: ArtifactSet): number {
    const out =
      this.options.out !== undefined
        ? resolve(this.options.out)
        : join(this.deps.workspace.dirs.artifacts, this.definition.name, stage);
    this.deps.writeTree(out, new Map(artifacts.entries()));
    this.deps.stdout(`Wrote ${artifacts.size} file(s) from stage "${stage}" to ${out}`);
    this.deps.stdout(`Digest: sha256:${artifacts.digest()}`);
    return this.succeed(artifacts);
  }

  private async serve(plan: LaunchPlan, artifacts: ArtifactSet, remainingMs: number | undefined): Promise<number> {
    const finalIndex = this.definition.stages.findIndex((s) => s.name === plan.config.stage);
    const launcher = new RuntimeLauncher({ runtime: this.deps.workspace.runtime, probe: this.deps.probe });
    const launching = launcher.launch(plan, artifacts, { runId: this.runId, pipeline: this.definition.name });

    let handle: ProcessHandle;
    try {
      handle =
        remainingMs === undefined
          ? await launching
          : await withTimeout(launching, Math.max(0, remainingMs), `Pipeline "${this.definition.name}"`);
    } catch (err) {
      if (err instanceof TimeoutError) {
        // The launch keeps going; stop whatever it eventually starts
        void launching.then(
          (late) => late.stop(),
          (lateErr: unknown) => this.logger.debug('late launch failed', { error: errorMessage(lateErr) }),
        ).catch((stopErr: unknown) => this.logger.warn('late launch stop failed', { error: errorMessage(stopErr) }));
        return this.fail({
          kind: FailureKind.Timeout,
          message: err.message,
          stage: plan.config.stage,
          stageIndex: finalIndex,
        });
      }
      return this.fail(toPipelineError(err, FailureKind.LaunchFailure).withStage(plan.config.stage, finalIndex).toFailure());
    }

    for (const endpoint of handle.endpoints) {
      this.deps.stdout(`Serving "${handle.stage}" at ${formatEndpoint(endpoint)}`);
    }
    const exitCode = this.succeed(artifacts);

    if (this.deps.whileServing !== undefined) {
      await this.deps.whileServing(handle);
    } else if (!this.stopRequested) {
      this.deps.stdout('Press Ctrl+C to stop');
      await new Promise<void>((resolveStop) => {
        this.serving = resolveStop;
      });
    }

    this.deps.stdout('Stopping...');
    await handle.stop();
    this.deps.stdout('Stopped');
    return exitCode;
  }

  private onSignal(): void {
    if (this.serving !== undefined) {
      this.serving();
      return;
    }
    this.stopRequested = true;
    if (!this.cancel.signal.aborted) {
      this.deps.stderr('Cancelling after the current stage...');
      this.cancel.abort();
    }
  }
}
