/**
 * stagecraft: multi-stage build-and-serve orchestrator.
 *
 * Library entry point. The CLI lives in `main.ts`.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export { ArtifactSet } from './core/artifact-set.js';
export { checkTransfers, resolveTransfers } from './core/artifact-transfer.js';
export { planPipeline, planUntil, topologicalOrder, type PlannedStage } from './core/plan.js';
export {
  loadPipeline,
  loadPipelineOrThrow,
  parsePipelineText,
  validatePipelineDocument,
  formatValidationErrors,
  type LoadResult,
  type ValidationMessage,
} from './core/pipeline-loader.js';
export { PipelineError, isPipelineError, toPipelineError } from './core/pipeline-error.js';
export {
  Pipeline,
  commitTagFor,
  type LaunchPlan,
  type PipelineEvent,
  type PipelineOutcome,
  type PipelineRunOptions,
  type StageRunner,
} from './core/pipeline.js';
export { StageExecutor, type StageContext, type StageResult } from './core/stage-executor.js';
export { EnvironmentCache, type CachedEnvironment } from './core/environment-cache.js';
export { RunStore, type RunRecord } from './core/run-store.js';
export { openWorkspace, type Workspace } from './core/workspace.js';
export { RuntimeLauncher, formatEndpoint, type Endpoint, type ProcessHandle } from './core/launch/index.js';
export { DockerRuntime, PodmanRuntime, MockContainerRuntime, type ContainerRuntime } from './core/container/index.js';
