/**
 * Podman container runtime adapter.
 *
 * Podman's CLI mirrors Docker's for everything stagecraft uses, so this
 * adapter reuses {@link DockerRuntime} and only overrides what differs:
 * - Version comes from `{{.Client.Version}}` (no server daemon).
 * - Extra `configured` and `stopping` states in inspect output.
 */

import { DockerRuntime } from './docker-runtime.js';
import type { ContainerState, ExecFn, RuntimeName } from './runtime.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface PodmanRuntimeOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Path to the podman binary. Defaults to `'podman'`. */
  podmanPath?: string;
  /** Directory for `podman cp` staging. Defaults to the OS temp dir. */
  tempDir?: string;
}

// ---------------------------------------------------------------------------
// Podman state mapping
// ---------------------------------------------------------------------------

function mapPodmanStatus(status: string): ContainerState['status'] {
  switch (status) {
    case 'created':
    case 'configured':
      return 'created';
    case 'running':
    case 'paused':
      return 'running';
    case 'restarting':
      return 'starting';
    case 'removing':
    case 'stopping':
      return 'stopping';
    case 'exited':
    case 'stopped':
      return 'stopped';
    default:
      return 'dead';
  }
}

// ---------------------------------------------------------------------------
// PodmanRuntime
// ---------------------------------------------------------------------------

export class PodmanRuntime extends DockerRuntime {
  override readonly name: RuntimeName = 'podman';

  constructor(options?: PodmanRuntimeOptions) {
    super({ exec: options?.exec, binaryPath: options?.podmanPath, tempDir: options?.tempDir }, 'podman');
  }

  override async version(): Promise<string> {
    // Podman is daemonless; version comes from the client binary
    const { stdout } = await this.cli('version', '--format', '{{.Client.Version}}');
    return `Podman ${stdout.trim()}`;
  }

  protected override mapStatus(status: string): ContainerState['status'] {
    return mapPodmanStatus(status);
  }
}
