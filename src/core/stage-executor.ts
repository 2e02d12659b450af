/**
 * StageExecutor: runs one stage in a fresh container.
 *
 * Phases, in order:
 *   1. provision: base image ensured through the environment cache
 *   2. create: keeper container with the stage workdir, env and labels
 *   3. seed: host inputs, then files delivered by transfers
 *   4. commands: `sh -c` each command in order; first non-zero exit aborts
 *   5. collect: every declared artifact read back into an ArtifactSet
 *   6. commit: optional snapshot of the container as an image
 *
 * The container is removed whatever the outcome. Failures are thrown as
 * PipelineError inside and returned as a {@link StageResult} at the
 * boundary; anything else thrown is wrapped with the kind of the phase it
 * came from.
 */

import { FailureKind, type FailureKindValue, type StageFailure } from '../types/errors.js';
import type { StageSpec } from '../types/pipeline.js';
import { ArtifactSet } from './artifact-set.js';
import type { ContainerHandle, ContainerRuntime } from './container/runtime.js';
import { collectHostInputs } from './host-inputs.js';
import { StageOutputRouter, createLogger, splitLines, type Logger } from './logger.js';
import { PipelineError, errorMessage, toPipelineError } from './pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Anything that can make a base image available (the environment cache). */
export interface EnvironmentProvider {
  ensure(image: string): Promise<void>;
}

export interface StageExecutorOptions {
  runtime: ContainerRuntime;
  environments: EnvironmentProvider;
  /** Output lines kept with a CommandFailure. */
  tailLines: number;
  logger?: Logger;
}

/** Per-run facts the executor needs besides the stage itself. */
export interface StageContext {
  runId: string;
  pipeline: string;
  stageIndex: number;
  /** Files delivered by transfer edges, keyed by absolute container path. */
  transferred?: ReadonlyMap<string, Uint8Array>;
  /** When set, the finished container is committed under this tag. */
  commitTag?: string;
  /**
   * Aborted when the run is abandoned (deadline expiry). Checked between
   * phases and commands; an aborted stage ends as a Timeout.
   */
  abandon?: AbortSignal;
}

export type StageResult =
  | {
      ok: true;
      stage: string;
      artifacts: ArtifactSet;
      /** Committed image tag, when a commit was requested. */
      image?: string;
      durationMs: number;
    }
  | {
      ok: false;
      stage: string;
      failure: StageFailure;
      durationMs: number;
    };

type Phase = 'provision' | 'create' | 'seed' | 'commands' | 'collect' | 'commit';

/** Failure kind for unexpected errors, by the phase they escaped from. */
const PHASE_FAILURE_KIND: Readonly<Record<Phase, FailureKindValue>> = {
  provision: FailureKind.ProvisionFailure,
  create: FailureKind.ProvisionFailure,
  seed: FailureKind.ProvisionFailure,
  commands: FailureKind.CommandFailure,
  collect: FailureKind.CommandFailure,
  commit: FailureKind.LaunchFailure,
};

export const STAGE_LABELS = {
  pipeline: 'stagecraft.pipeline',
  stage: 'stagecraft.stage',
  run: 'stagecraft.run',
} as const;

/** Container name for a stage run. */
export function stageContainerName(pipeline: string, stage: string, runId: string): string {
  return `stagecraft-${pipeline}-${stage}-${runId.slice(0, 8)}`.replace(/[^A-Za-z0-9_.-]/g, '-');
}

/** Last `count` lines of combined command output. */
export function outputTail(stdout: string, stderr: string, count: number): string[] {
  const lines = [...splitLines(stdout), ...splitLines(stderr)];
  return lines.slice(Math.max(0, lines.length - count));
}

// ---------------------------------------------------------------------------
// StageExecutor
// ---------------------------------------------------------------------------

export class StageExecutor {
  private readonly runtime: ContainerRuntime;
  private readonly environments: EnvironmentProvider;
  private readonly tailLines: number;
  private readonly logger: Logger;

  constructor(options: StageExecutorOptions) {
    this.runtime = options.runtime;
    this.environments = options.environments;
    this.tailLines = options.tailLines;
    this.logger = options.logger ?? createLogger('executor');
  }

  async execute(stage: StageSpec, ctx: StageContext): Promise<StageResult> {
    const logger = this.logger.withContext({ run: ctx.runId, pipeline: ctx.pipeline, stage: stage.name });
    const start = Date.now();
    let phase: Phase = 'provision';
    let handle: ContainerHandle | undefined;

    logger.info('stage started', { index: ctx.stageIndex, image: stage.image });

    try {
      await this.environments.ensure(stage.image);
      this.checkAbandoned(ctx);

      phase = 'create';
      handle = await this.runtime.create({
        image: stage.image,
        name: stageContainerName(ctx.pipeline, stage.name, ctx.runId),
        workdir: stage.workdir,
        env: stage.env,
        labels: {
          [STAGE_LABELS.pipeline]: ctx.pipeline,
          [STAGE_LABELS.stage]: stage.name,
          [STAGE_LABELS.run]: ctx.runId,
        },
      });

      phase = 'seed';
      await this.seed(handle, stage, ctx, logger);

      phase = 'commands';
      await this.runCommands(handle, stage, ctx, logger);

      phase = 'collect';
      const artifacts = await this.collect(handle, stage);

      let image: string | undefined;
      if (ctx.commitTag !== undefined) {
        phase = 'commit';
        await this.runtime.commit(handle, ctx.commitTag);
        image = ctx.commitTag;
      }

      const durationMs = Date.now() - start;
      logger.info('stage succeeded', {
        duration_ms: durationMs,
        ok: true,
        files: artifacts.size,
        bytes: artifacts.totalBytes(),
        digest: artifacts.digest(),
      });
      return { ok: true, stage: stage.name, artifacts, image, durationMs };
    } catch (err) {
      const failure = toPipelineError(err, PHASE_FAILURE_KIND[phase])
        .withStage(stage.name, ctx.stageIndex)
        .toFailure();
      const durationMs = Date.now() - start;

      logger.error('stage failed', {
        duration_ms: durationMs,
        ok: false,
        failure_kind: failure.kind,
        phase,
        error: failure.message,
      });
      return { ok: false, stage: stage.name, failure, durationMs };
    } finally {
      if (handle !== undefined) {
        await this.cleanup(handle, logger);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Phases
  // -------------------------------------------------------------------------

  private async seed(
    handle: ContainerHandle,
    stage: StageSpec,
    ctx: StageContext,
    logger: Logger,
  ): Promise<void> {
    const files = collectHostInputs(stage.inputs);
    for (const [path, bytes] of ctx.transferred ?? []) {
      files.set(path, bytes);
    }
    if (files.size === 0) return;

    await this.runtime.writeFiles(handle, files);
    logger.debug('stage seeded', { files: files.size, transferred: ctx.transferred?.size ?? 0 });
  }

  private async runCommands(
    handle: ContainerHandle,
    stage: StageSpec,
    ctx: StageContext,
    logger: Logger,
  ): Promise<void> {
    const router = new StageOutputRouter(logger);

    for (const [index, command] of stage.commands.entries()) {
      this.checkAbandoned(ctx);

      const commandStart = Date.now();
      logger.info('command started', { command: index, text: command });
      const result = await this.runtime.exec(handle, ['sh', '-c', command]);
      router.route(index, result.stdout, result.stderr);

      logger.debug('command finished', {
        command: index,
        exit_code: result.exitCode,
        duration_ms: Date.now() - commandStart,
      });

      if (result.exitCode !== 0) {
        throw new PipelineError({
          kind: FailureKind.CommandFailure,
          message: `Command ${index + 1} of stage "${stage.name}" exited with status ${result.exitCode}: ${command}`,
          commandIndex: index,
          exitStatus: result.exitCode,
          outputTail: outputTail(result.stdout, result.stderr, this.tailLines),
        });
      }
    }
  }

  private async collect(handle: ContainerHandle, stage: StageSpec): Promise<ArtifactSet> {
    const files = new Map<string, Uint8Array>();

    for (const artifact of stage.artifacts) {
      const tree = await this.runtime.readTree(handle, artifact);
      if (tree === null) {
        throw new PipelineError({
          kind: FailureKind.MissingArtifact,
          message: `Declared artifact "${artifact}" was not produced by stage "${stage.name}"`,
        });
      }
      for (const [path, bytes] of tree) {
        files.set(path, bytes);
      }
    }

    return ArtifactSet.fromContainerFiles(files);
  }

  private checkAbandoned(ctx: StageContext): void {
    if (ctx.abandon?.aborted) {
      throw new PipelineError({
        kind: FailureKind.Timeout,
        message: 'Run abandoned before the stage finished',
      });
    }
  }

  private async cleanup(handle: ContainerHandle, logger: Logger): Promise<void> {
    try {
      await this.runtime.remove(handle);
    } catch (err) {
      logger.warn('failed to remove stage container', {
        container: handle.name,
        error: errorMessage(err),
      });
    }
  }
}
