/**
 * PipelineError: structured error class for stage and launch failures.
 *
 * Executors and launchers throw PipelineError internally and convert it
 * to a {@link StageFailure} at their boundary. Anything else that escapes
 * a stage is wrapped into a PipelineError of the kind that matches the
 * phase it was thrown from.
 */

import type { FailureKindValue, StageFailure } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Brand symbol (module-private, not exported)
// ---------------------------------------------------------------------------

const PIPELINE_ERROR_BRAND = Symbol.for('stagecraft.PipelineError');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Options for constructing a PipelineError. */
export interface PipelineErrorOptions {
  kind: FailureKindValue;
  message: string;
  stage?: string;
  stageIndex?: number;
  commandIndex?: number;
  exitStatus?: number;
  outputTail?: string[];
  cause?: unknown;
}

// ---------------------------------------------------------------------------
// PipelineError class
// ---------------------------------------------------------------------------

export class PipelineError extends Error {
  readonly kind: FailureKindValue;
  readonly stage?: string;
  readonly stageIndex?: number;
  readonly commandIndex?: number;
  readonly exitStatus?: number;
  readonly outputTail?: string[];

  /** @internal Brand for safe instanceof checks across module boundaries. */
  readonly [PIPELINE_ERROR_BRAND] = true as const;

  constructor(options: PipelineErrorOptions) {
    super(options.message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'PipelineError';
    this.kind = options.kind;

    if (options.stage !== undefined) this.stage = options.stage;
    if (options.stageIndex !== undefined) this.stageIndex = options.stageIndex;
    if (options.commandIndex !== undefined) this.commandIndex = options.commandIndex;
    if (options.exitStatus !== undefined) this.exitStatus = options.exitStatus;
    if (options.outputTail !== undefined) this.outputTail = options.outputTail;
  }

  /** Return a copy of this error attributed to a stage. */
  withStage(stage: string, stageIndex: number): PipelineError {
    return new PipelineError({
      kind: this.kind,
      message: this.message,
      stage,
      stageIndex,
      commandIndex: this.commandIndex,
      exitStatus: this.exitStatus,
      outputTail: this.outputTail,
      cause: this.cause,
    });
  }

  /** Convert to the serializable failure record. Omits the stack and cause. */
  toFailure(): StageFailure {
    const failure: StageFailure = { kind: this.kind, message: this.message };

    if (this.stage !== undefined) failure.stage = this.stage;
    if (this.stageIndex !== undefined) failure.stageIndex = this.stageIndex;
    if (this.commandIndex !== undefined) failure.commandIndex = this.commandIndex;
    if (this.exitStatus !== undefined) failure.exitStatus = this.exitStatus;
    if (this.outputTail !== undefined) failure.outputTail = [...this.outputTail];

    return failure;
  }
}

// ---------------------------------------------------------------------------
// Type guard
// ---------------------------------------------------------------------------

/**
 * Type guard for PipelineError instances, including ones created by a
 * second copy of this module.
 */
export function isPipelineError(value: unknown): value is PipelineError {
  if (value instanceof PipelineError) {
    return true;
  }

  return (
    typeof value === 'object' &&
    value !== null &&
    PIPELINE_ERROR_BRAND in value &&
    value[PIPELINE_ERROR_BRAND] === true
  );
}

/**
 * Wrap an arbitrary thrown value as a PipelineError of the given kind.
 * PipelineErrors pass through unchanged.
 */
export function toPipelineError(
  error: unknown,
  kind: FailureKindValue,
  context?: { stage?: string; stageIndex?: number },
): PipelineError {
  if (isPipelineError(error)) {
    return error;
  }
  return new PipelineError({
    kind,
    message: errorMessage(error),
    stage: context?.stage,
    stageIndex: context?.stageIndex,
    cause: error,
  });
}

/** Human-readable message for any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
