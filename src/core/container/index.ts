export type {
  RuntimeName,
  ContainerCreateOptions,
  ContainerRunOptions,
  ContainerHandle,
  ContainerState,
  ContainerRuntime,
  ExecFn,
  ExecFailure,
  ExecOptions,
  ExecResult,
  PortMapping,
} from './runtime.js';

export { defaultExec, isExecFailure, CONTAINER_ZERO_TIME } from './runtime.js';

export { detectRuntime } from './detect.js';
export type { RuntimeInfo, DetectionResult, DetectionOptions } from './detect.js';

export { DockerRuntime, type DockerRuntimeOptions } from './docker-runtime.js';

export { PodmanRuntime, type PodmanRuntimeOptions } from './podman-runtime.js';

export {
  MockContainerRuntime,
  type MockCommandContext,
  type MockCommandHandler,
  type MockCommandOutcome,
  type MockContainerInfo,
  type MockExecRecord,
  type MockFileSystem,
} from './mock-runtime.js';
