/**
 * Failure taxonomy and exit-code mapping for stagecraft.
 *
 * Every way a pipeline run can end badly is one of these kinds. The CLI
 * maps each kind to a distinct process exit code.
 */

// ---------------------------------------------------------------------------
// FailureKind
// ---------------------------------------------------------------------------

export const FailureKind = {
  /** A stage command exited non-zero. */
  CommandFailure: 'CommandFailure',
  /** A declared artifact was absent after the stage's commands finished. */
  MissingArtifact: 'MissingArtifact',
  /** A transfer edge referenced a path the source stage never produced. */
  UnresolvedTransfer: 'UnresolvedTransfer',
  /** The base environment could not be provisioned after bounded retries. */
  ProvisionFailure: 'ProvisionFailure',
  /** The runtime process failed to bind its ports or exited immediately. */
  LaunchFailure: 'LaunchFailure',
  /** The overall pipeline deadline expired. */
  Timeout: 'Timeout',
  /** A cancellation request stopped the pipeline at a stage boundary. */
  Cancelled: 'Cancelled',
  /** The pipeline definition failed schema or structural validation. */
  InvalidPipeline: 'InvalidPipeline',
} as const;

export type FailureKindValue = (typeof FailureKind)[keyof typeof FailureKind];

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const EXIT_SUCCESS = 0;

/** Process exit code for each failure kind. */
export const EXIT_CODES: Readonly<Record<FailureKindValue, number>> = {
  CommandFailure: 1,
  MissingArtifact: 2,
  UnresolvedTransfer: 3,
  Timeout: 4,
  ProvisionFailure: 5,
  LaunchFailure: 6,
  InvalidPipeline: 64,
  Cancelled: 130,
};

/** Exit code for malformed command lines (shares EX_USAGE with InvalidPipeline). */
export const EXIT_USAGE = 64;

// ---------------------------------------------------------------------------
// StageFailure
// ---------------------------------------------------------------------------

/**
 * Serializable description of a failure, as reported to the CLI and
 * persisted in run history.
 */
export interface StageFailure {
  kind: FailureKindValue;
  message: string;
  /** Stage the failure belongs to. Absent for pipeline-level failures. */
  stage?: string;
  /** Position of the stage in the pipeline sequence. */
  stageIndex?: number;
  /** Zero-based index of the failing command (CommandFailure only). */
  commandIndex?: number;
  /** Exit status of the failing command (CommandFailure only). */
  exitStatus?: number;
  /** Last captured output lines of the failing command. */
  outputTail?: string[];
}
