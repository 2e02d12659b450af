/**
 * Container runtime interface and supporting types for stagecraft.
 *
 * Defines the contract for provisioning base environments, running stage
 * commands in throwaway containers and launching the final serving
 * process across container engines (Docker, Podman). The stage executor,
 * the environment cache and the process launcher consume this interface.
 */

import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFileCb);

// ---------------------------------------------------------------------------
// Runtime name
// ---------------------------------------------------------------------------

/**
 * Supported container runtime engines.
 *
 * - `'docker'`: Reference implementation, widest compatibility.
 * - `'podman'`: Rootless by default, no root daemon.
 */
export type RuntimeName = 'docker' | 'podman';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/**
 * Options for creating a stage workspace container.
 *
 * The container is started with an idle keeper process so that stage
 * commands can be executed into it one at a time.
 */
export interface ContainerCreateOptions {
  /** Base image reference (e.g. `"debian:bookworm"`). */
  image: string;
  /** Optional human-readable container name. */
  name?: string;
  /** Default working directory for exec'd commands. */
  workdir: string;
  /** Environment variables injected into the container. */
  env: Record<string, string>;
  /** OCI labels attached to the container. */
  labels?: Record<string, string>;
}

/**
 * A TCP port mapping from host to container.
 *
 * Each entry maps to a `-p hostAddress:hostPort:containerPort` flag.
 */
export interface PortMapping {
  hostPort: number;
  containerPort: number;
  /**
   * Bind address on the host. When omitted, adapters apply
   * `'127.0.0.1'` (loopback-only).
   */
  hostAddress?: string;
}

/** Options for launching a long-running serving container. */
export interface ContainerRunOptions {
  image: string;
  name?: string;
  /** Command run in place of the image's default. */
  command: string[];
  workdir?: string;
  env: Record<string, string>;
  labels?: Record<string, string>;
  portMappings: PortMapping[];
}

/** Per-call options for {@link ContainerRuntime.exec}. */
export interface ExecOptions {
  workdir?: string;
  env?: Record<string, string>;
}

/** Outcome of a command executed inside a container. */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

// ---------------------------------------------------------------------------
// Shared exec type
// ---------------------------------------------------------------------------

/**
 * Injectable exec function for shelling out to container CLI binaries.
 * Resolves with stdout/stderr; rejects when the process exits non-zero.
 * Used by all runtime adapters.
 */
export type ExecFn = (
  file: string,
  args: readonly string[],
) => Promise<{ stdout: string; stderr: string }>;

/**
 * Shape of the rejection produced by `execFile` for a non-zero exit:
 * the numeric exit code plus whatever output was captured.
 */
export interface ExecFailure {
  code: number;
  stdout: string;
  stderr: string;
}

/** Narrow a rejected exec call to a process that ran and exited non-zero. */
export function isExecFailure(error: unknown): error is ExecFailure {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'number' &&
    'stdout' in error &&
    typeof error.stdout === 'string' &&
    'stderr' in error &&
    typeof error.stderr === 'string'
  );
}

// ---------------------------------------------------------------------------
// Container handle
// ---------------------------------------------------------------------------

/**
 * Opaque handle to a container, returned by {@link ContainerRuntime.create}
 * and {@link ContainerRuntime.run}.
 *
 * Only the runtime that created it can meaningfully interpret `id`.
 */
export interface ContainerHandle {
  /** Container engine identifier (e.g. Docker container ID, hex string). */
  readonly id: string;
  /** Human-readable container name. */
  readonly name: string;
  /** Which runtime created this handle. */
  readonly runtime: RuntimeName;
}

// ---------------------------------------------------------------------------
// Container state
// ---------------------------------------------------------------------------

/**
 * Snapshot of a container's current state, returned by
 * {@link ContainerRuntime.inspect}.
 */
export interface ContainerState {
  /** Current lifecycle status. */
  status: 'created' | 'starting' | 'running' | 'stopping' | 'stopped' | 'dead';
  /** Process exit code (only meaningful when status is `'stopped'` or `'dead'`). */
  exitCode?: number;
  /** ISO 8601 timestamp when the container started. */
  startedAt?: string;
  /** ISO 8601 timestamp when the container exited. */
  finishedAt?: string;
}

// ---------------------------------------------------------------------------
// Container runtime interface
// ---------------------------------------------------------------------------

/**
 * Abstraction over a container engine.
 *
 * - **Docker**: reference implementation over the `docker` CLI.
 * - **Podman**: same CLI surface; no daemon, so the version comes from
 *   the client and inspect output differs slightly.
 */
export interface ContainerRuntime {
  /** Which engine this runtime represents. */
  readonly name: RuntimeName;

  // -- Availability ---------------------------------------------------------

  /** Check whether the engine binary is installed and responsive. */
  isAvailable(): Promise<boolean>;

  /** Return the engine's version string (e.g. `"Docker 27.5.1"`). */
  version(): Promise<string>;

  // -- Image lifecycle ------------------------------------------------------

  /** Pull an image from a registry. */
  pull(image: string): Promise<void>;

  /** Check whether an image exists locally. */
  imageExists(image: string): Promise<boolean>;

  /** Delete a local image. */
  removeImage(image: string): Promise<void>;

  // -- Stage workspaces -----------------------------------------------------

  /** Create and start an idle workspace container. */
  create(options: ContainerCreateOptions): Promise<ContainerHandle>;

  /**
   * Run one command inside a workspace container. A non-zero exit is a
   * normal result, not a rejection; rejections mean the engine failed.
   */
  exec(handle: ContainerHandle, argv: readonly string[], options?: ExecOptions): Promise<ExecResult>;

  /** Write files into the container, keyed by absolute container path. */
  writeFiles(handle: ContainerHandle, files: ReadonlyMap<string, Uint8Array>): Promise<void>;

  /**
   * Read every regular file at or below an absolute container path.
   * Keys are absolute container paths. Returns `null` when the path does
   * not exist.
   */
  readTree(handle: ContainerHandle, path: string): Promise<Map<string, Uint8Array> | null>;

  /** Snapshot a container's filesystem as a new image. Returns the image ID. */
  commit(handle: ContainerHandle, tag: string): Promise<string>;

  // -- Serving containers ---------------------------------------------------

  /** Launch a detached container running `options.command`. */
  run(options: ContainerRunOptions): Promise<ContainerHandle>;

  /**
   * Gracefully stop a container.
   * @param timeout - Seconds to wait before force-killing (default: engine-specific).
   */
  stop(handle: ContainerHandle, timeout?: number): Promise<void>;

  /** Immediately kill a container (SIGKILL). */
  kill(handle: ContainerHandle): Promise<void>;

  /** Remove a container and its resources, stopping it first if needed. */
  remove(handle: ContainerHandle): Promise<void>;

  /** Inspect a container's current state. */
  inspect(handle: ContainerHandle): Promise<ContainerState>;
}

// ---------------------------------------------------------------------------
// Default exec implementation
// ---------------------------------------------------------------------------

/** Output cap for a single engine call; build logs can be large. */
const EXEC_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Default exec implementation, wrapping child_process.execFile.
 * Shared across all runtime adapters.
 */
export const defaultExec: ExecFn = async (file, args) => {
  return execFileAsync(file, [...args], { encoding: 'utf-8', maxBuffer: EXEC_MAX_BUFFER });
};

/** Zero-value timestamp engines return for unset StartedAt / FinishedAt. */
export const CONTAINER_ZERO_TIME = '0001-01-01T00:00:00Z';
