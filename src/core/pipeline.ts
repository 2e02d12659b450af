/**
 * Pipeline: the state machine that runs stages in plan order.
 *
 * Every stage and the pipeline as a whole move through
 * `pending → running → succeeded | failed`. The first failure fails the
 * pipeline and no later stage starts. Transfers are checked before any
 * stage runs and resolved just before their destination stage starts.
 *
 * Cancellation is honored only at stage boundaries: a running stage
 * finishes (or fails) on its own and the next one never starts. The
 * deadline is different: when it expires the pipeline fails with Timeout
 * at once, the stage in flight is marked failed and told to abandon, and
 * nothing it reports afterwards changes the recorded outcome.
 */

import { randomUUID } from 'node:crypto';
import type { LaunchSection } from '../types/config.js';
import { FailureKind, type StageFailure } from '../types/errors.js';
import type {
  PipelineDefinition,
  PipelineStatus,
  RuntimeConfig,
  StageSpec,
  StageStatus,
} from '../types/pipeline.js';
import { ArtifactSet } from './artifact-set.js';
import { checkTransfers, releaseConsumed, resolveTransfers } from './artifact-transfer.js';
import { buildRuntimeConfig } from './launch/runtime-config.js';
import { createLogger, type Logger } from './logger.js';
import { PipelineError, errorMessage, isPipelineError } from './pipeline-error.js';
import { planPipeline, planUntil, type PlannedStage } from './plan.js';
import type { StageContext, StageResult } from './stage-executor.js';
import { TimeoutError, withTimeout } from './timing.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Anything that can execute one stage (the StageExecutor). */
export interface StageRunner {
  execute(stage: StageSpec, ctx: StageContext): Promise<StageResult>;
}

export interface PipelineOptions {
  runner: StageRunner;
  /** `[launch]` defaults for the derived RuntimeConfig. */
  launchDefaults: LaunchSection;
  logger?: Logger;
}

export interface PipelineRunOptions {
  /** Run identifier; generated when omitted. */
  runId?: string;
  /** Stop after this stage. Nothing is launched. */
  until?: string;
  /** Cancellation, honored between stages. */
  signal?: AbortSignal;
  /** Overall deadline in milliseconds. */
  deadlineMs?: number;
  /**
   * Whether the outcome will be launched. When false the final
   * process-variant stage is not committed to an image. Defaults to true.
   */
  launch?: boolean;
}

export type PipelineEvent =
  | {
      type: 'stage';
      stage: string;
      index: number;
      status: StageStatus;
      durationMs?: number;
      failure?: StageFailure;
    }
  | { type: 'pipeline'; runId: string; status: PipelineStatus; failure?: StageFailure };

export type PipelineListener = (event: PipelineEvent) => void;

/** What the final stage hands to the runtime launcher. */
export interface LaunchPlan {
  config: RuntimeConfig;
  /** Committed final-stage image (process variant). */
  image?: string;
}

export type PipelineOutcome =
  | {
      ok: true;
      runId: string;
      /** Last stage that ran. */
      stage: string;
      /** ArtifactSet of the last stage that ran. */
      artifacts: ArtifactSet;
      /** Present when the last stage that ran declares `launch`. */
      launch?: LaunchPlan;
    }
  | { ok: false; runId: string; failure: StageFailure };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Image tag for a committed final stage. */
export function commitTagFor(pipeline: string, runId: string): string {
  const repo = pipeline.toLowerCase().replace(/[^a-z0-9_.-]/g, '-');
  return `stagecraft/${repo}:${runId.slice(0, 12).toLowerCase()}`;
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export class Pipeline {
  readonly definition: PipelineDefinition;
  private readonly runner: StageRunner;
  private readonly launchDefaults: LaunchSection;
  private readonly logger: Logger;
  private readonly listeners = new Set<PipelineListener>();
  private readonly stageStatuses = new Map<string, StageStatus>();
  private pipelineStatus: PipelineStatus = 'pending';
  private abandoned = false;

  constructor(definition: PipelineDefinition, options: PipelineOptions) {
    this.definition = definition;
    this.runner = options.runner;
    this.launchDefaults = options.launchDefaults;
    this.logger = options.logger ?? createLogger('pipeline');

    for (const stage of definition.stages) {
      this.stageStatuses.set(stage.name, 'pending');
    }
  }

  get status(): PipelineStatus {
    return this.pipelineStatus;
  }

  /** Status of one stage. */
  stageStatus(name: string): StageStatus | undefined {
    return this.stageStatuses.get(name);
  }

  /** Every stage's status, in declaration order. */
  statuses(): Array<{ stage: string; status: StageStatus }> {
    return this.definition.stages.map((s) => ({
      stage: s.name,
      status: this.stageStatuses.get(s.name) ?? 'pending',
    }));
  }

  /** Subscribe to transitions. Returns an unsubscribe function. */
  on(listener: PipelineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Run the pipeline once.
   *
   * @throws If this pipeline has already been run.
   */
  async run(options: PipelineRunOptions = {}): Promise<PipelineOutcome> {
    if (this.pipelineStatus !== 'pending') {
      throw new Error(`Pipeline "${this.definition.name}" has already been run`);
    }

    const runId = options.runId ?? randomUUID();
    const logger = this.logger.withContext({ run: runId, pipeline: this.definition.name });
    const start = Date.now();

    this.pipelineStatus = 'running';
    this.emit({ type: 'pipeline', runId, status: 'running' });
    logger.info('pipeline started', { stages: this.definition.stages.length, until: options.until });

    const abandon = new AbortController();
    const progress: { current?: PlannedStage } = {};
    let outcome: PipelineOutcome;

    try {
      const loop = this.runStages(runId, options, abandon.signal, (step) => {
        progress.current = step;
      });
      outcome =
        options.deadlineMs === undefined
          ? await loop
          : await withTimeout(loop, options.deadlineMs, `Pipeline "${this.definition.name}"`);
    } catch (err) {
      if (!(err instanceof TimeoutError)) {
        throw err;
      }

      this.abandoned = true;
      abandon.abort();
      const failure: StageFailure = { kind: FailureKind.Timeout, message: err.message };
      const current = progress.current;
      if (current !== undefined) {
        failure.stage = current.stage.name;
        failure.stageIndex = current.index;
        if (this.stageStatuses.get(current.stage.name) === 'running') {
          this.setStage(current, 'failed', { failure });
        }
      }
      outcome = { ok: false, runId, failure };
    }

    this.pipelineStatus = outcome.ok ? 'succeeded' : 'failed';
    const duration_ms = Date.now() - start;

    if (outcome.ok) {
      logger.info('pipeline succeeded', {
        duration_ms,
        ok: true,
        digest: outcome.artifacts.digest(),
      });
      this.emit({ type: 'pipeline', runId, status: 'succeeded' });
    } else {
      logger.error('pipeline failed', {
        duration_ms,
        ok: false,
        failure_kind: outcome.failure.kind,
        stage: outcome.failure.stage,
        error: outcome.failure.message,
      });
      this.emit({ type: 'pipeline', runId, status: 'failed', failure: outcome.failure });
    }
    return outcome;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async runStages(
    runId: string,
    options: PipelineRunOptions,
    abandon: AbortSignal,
    onStage: (step: PlannedStage) => void,
  ): Promise<PipelineOutcome> {
    let plan: PlannedStage[];
    try {
      checkTransfers(this.definition);
      const full = planPipeline(this.definition);
      plan = options.until === undefined ? full : planUntil(full, options.until);
    } catch (err) {
      return { ok: false, runId, failure: this.preflightFailure(err) };
    }

    const completed = new Map<string, ArtifactSet>();
    const finalStage = this.definition.stages[this.definition.stages.length - 1];
    let last: { step: PlannedStage; result: Extract<StageResult, { ok: true }> } | undefined;

    for (const [position, step] of plan.entries()) {
      const { stage, index } = step;

      if (options.signal?.aborted) {
        return {
          ok: false,
          runId,
          failure: {
            kind: FailureKind.Cancelled,
            message: `Cancelled before stage "${stage.name}" started`,
            stage: stage.name,
            stageIndex: index,
          },
        };
      }

      let transferred: Map<string, Uint8Array>;
      try {
        transferred = resolveTransfers(this.definition.transfers, stage.name, completed);
      } catch (err) {
        const failure = isPipelineError(err)
          ? err.withStage(stage.name, index).toFailure()
          : { kind: FailureKind.UnresolvedTransfer, message: errorMessage(err), stage: stage.name, stageIndex: index };
        return { ok: false, runId, failure };
      }

      onStage(step);
      this.setStage(step, 'running');

      const commitTag =
        options.launch !== false && stage === finalStage && stage.launch?.variant === 'process'
          ? commitTagFor(this.definition.name, runId)
          : undefined;

      const result = await this.runner.execute(stage, {
        runId,
        pipeline: this.definition.name,
        stageIndex: index,
        transferred,
        commitTag,
        abandon,
      });

      if (this.abandoned) {
        // The deadline already decided the outcome; this value is discarded
        return { ok: false, runId, failure: { kind: FailureKind.Timeout, message: 'abandoned' } };
      }

      if (!result.ok) {
        this.setStage(step, 'failed', { durationMs: result.durationMs, failure: result.failure });
        return { ok: false, runId, failure: result.failure };
      }

      this.setStage(step, 'succeeded', { durationMs: result.durationMs });
      completed.set(stage.name, result.artifacts);
      releaseConsumed(
        this.definition.transfers,
        completed,
        new Set(plan.slice(position + 1).map((later) => later.stage.name)),
      );
      last = { step, result };
    }

    if (last === undefined) {
      return { ok: true, runId, stage: '', artifacts: ArtifactSet.empty() };
    }

    const config = buildRuntimeConfig(last.step.stage, this.launchDefaults);
    return {
      ok: true,
      runId,
      stage: last.step.stage.name,
      artifacts: last.result.artifacts,
      launch: config === null ? undefined : { config, image: last.result.image },
    };
  }

  private preflightFailure(err: unknown): StageFailure {
    if (isPipelineError(err)) {
      return err.toFailure();
    }
    return new PipelineError({
      kind: FailureKind.InvalidPipeline,
      message: errorMessage(err),
    }).toFailure();
  }

  private setStage(
    step: PlannedStage,
    status: StageStatus,
    details?: { durationMs?: number; failure?: StageFailure },
  ): void {
    this.stageStatuses.set(step.stage.name, status);
    this.emit({
      type: 'stage',
      stage: step.stage.name,
      index: step.index,
      status,
      durationMs: details?.durationMs,
      failure: details?.failure,
    });
  }

  private emit(event: PipelineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.warn('pipeline listener threw', { error: errorMessage(err) });
      }
    }
  }
}
