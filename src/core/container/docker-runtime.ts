/**
 * Docker container runtime adapter.
 *
 * Reference implementation of {@link ContainerRuntime} using the Docker CLI
 * via `child_process.execFile`. No Docker SDK dependency, just shell out
 * to the `docker` binary.
 *
 * Files move in and out of containers with `docker cp` through a host
 * temp directory; stage workspaces idle on `sleep infinity` so commands
 * can be exec'd into them one at a time.
 */

import { lstatSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, posix } from 'node:path';
import { readHostTree, writeHostTree } from '../fs-tree.js';
import type {
  ContainerRuntime,
  ContainerCreateOptions,
  ContainerRunOptions,
  ContainerHandle,
  ContainerState,
  ExecFn,
  ExecOptions,
  ExecResult,
  RuntimeName,
} from './runtime.js';
import { CONTAINER_ZERO_TIME, defaultExec, isExecFailure } from './runtime.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface DockerRuntimeOptions {
  /** Injectable exec function for testing. Defaults to promisified execFile. */
  exec?: ExecFn;
  /** Path to the engine binary. Defaults to `'docker'`. */
  binaryPath?: string;
  /** Directory for `docker cp` staging. Defaults to the OS temp dir. */
  tempDir?: string;
}

// ---------------------------------------------------------------------------
// State mapping
// ---------------------------------------------------------------------------

function mapDockerStatus(status: string): ContainerState['status'] {
  switch (status) {
    case 'created':
      return 'created';
    case 'running':
    case 'paused':
      return 'running';
    case 'restarting':
      return 'starting';
    case 'removing':
      return 'stopping';
    case 'exited':
      return 'stopped';
    default:
      return 'dead';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalTime(value: unknown): string | undefined {
  return typeof value === 'string' && value !== CONTAINER_ZERO_TIME && value !== ''
    ? value
    : undefined;
}

// ---------------------------------------------------------------------------
// DockerRuntime
// ---------------------------------------------------------------------------

export class DockerRuntime implements ContainerRuntime {
  readonly name: RuntimeName = 'docker';

  protected readonly execFn: ExecFn;
  protected readonly binaryPath: string;
  private readonly tempDir: string;

  constructor(options?: DockerRuntimeOptions, defaultBinary = 'docker') {
    this.execFn = options?.exec ?? defaultExec;
    this.binaryPath = options?.binaryPath ?? defaultBinary;
    this.tempDir = options?.tempDir ?? tmpdir();
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    try {
      await this.cli('info');
      return true;
    } catch {
      return false;
    }
  }

  async version(): Promise<string> {
    const { stdout } = await this.cli('version', '--format', '{{.Server.Version}}');
    return `Docker ${stdout.trim()}`;
  }

  // -----------------------------------------------------------------------
  // Image lifecycle
  // -----------------------------------------------------------------------

  async pull(image: string): Promise<void> {
    await this.cli('pull', image);
  }

  async imageExists(image: string): Promise<boolean> {
    try {
      await this.cli('image', 'inspect', image);
      return true;
    } catch {
      return false;
    }
  }

  async removeImage(image: string): Promise<void> {
    await this.cli('image', 'rm', image);
  }

  // -----------------------------------------------------------------------
  // Stage workspaces
  // -----------------------------------------------------------------------

  async create(options: ContainerCreateOptions): Promise<ContainerHandle> {
    const name = options.name ?? `stagecraft-${Date.now()}`;
    const args: string[] = ['run', '-d', '--name', name, '-w', options.workdir];
    pushEnv(args, options.env);
    pushLabels(args, options.labels);
    args.push('--entrypoint', 'sleep', options.image, 'infinity');

    const { stdout } = await this.cli(...args);
    return { id: stdout.trim(), name, runtime: this.name };
  }

  async exec(
    handle: ContainerHandle,
    argv: readonly string[],
    options?: ExecOptions,
  ): Promise<ExecResult> {
    const args: string[] = ['exec'];
    if (options?.workdir) {
      args.push('-w', options.workdir);
    }
    pushEnv(args, options?.env);
    args.push(handle.id, ...argv);

    try {
      const { stdout, stderr } = await this.cli(...args);
      return { exitCode: 0, stdout, stderr };
    } catch (err) {
      if (isExecFailure(err)) {
        return { exitCode: err.code, stdout: err.stdout, stderr: err.stderr };
      }
      throw err;
    }
  }

  async writeFiles(handle: ContainerHandle, files: ReadonlyMap<string, Uint8Array>): Promise<void> {
    if (files.size === 0) return;

    const staging = mkdtempSync(join(this.tempDir, 'stagecraft-in-'));
    try {
      const relative = new Map<string, Uint8Array>();
      for (const [path, bytes] of files) {
        relative.set(path.replace(/^\/+/, ''), bytes);
      }
      writeHostTree(staging, relative);
      await this.cli('cp', `${staging}/.`, `${handle.id}:/`);
    } finally {
      rmSync(staging, { recursive: true, force: true });
    }
  }

  async readTree(handle: ContainerHandle, path: string): Promise<Map<string, Uint8Array> | null> {
    const probe = await this.exec(handle, ['test', '-e', path]);
    if (probe.exitCode !== 0) return null;

    const staging = mkdtempSync(join(this.tempDir, 'stagecraft-out-'));
    try {
      const payload = join(staging, 'payload');
      await this.cli('cp', `${handle.id}:${path}`, payload);

      const tree = readHostTree(payload) ?? new Map<string, Buffer>();
      const result = new Map<string, Uint8Array>();
      if (lstatSync(payload).isFile()) {
        for (const bytes of tree.values()) {
          result.set(path, bytes);
        }
        return result;
      }
      for (const [relPath, bytes] of tree) {
        result.set(posix.join(path, relPath), bytes);
      }
      return result;
    } finally {
      rmSync(staging, { recursive: true, force: true });
    }
  }

  /**
   * Commit a stage container to an image. The idle `sleep` entrypoint that
   * {@link create} installs is cleared so `run` executes the launch command.
   */
  async commit(handle: ContainerHandle, tag: string): Promise<string> {
    const { stdout } = await this.cli(
      'commit',
      '--change',
      'ENTRYPOINT []',
      '--change',
      'CMD []',
      handle.id,
      tag,
    );
    return stdout.trim();
  }

  // -----------------------------------------------------------------------
  // Serving containers
  // -----------------------------------------------------------------------

  async run(options: ContainerRunOptions): Promise<ContainerHandle> {
    const name = options.name ?? `stagecraft-${Date.now()}`;
    const args: string[] = ['run', '-d', '--name', name];

    if (options.workdir) {
      args.push('-w', options.workdir);
    }
    pushEnv(args, options.env);
    pushLabels(args, options.labels);

    for (const mapping of options.portMappings) {
      const address = mapping.hostAddress ?? '127.0.0.1';
      args.push('-p', `${address}:${mapping.hostPort}:${mapping.containerPort}`);
    }

    args.push(options.image, ...options.command);

    const { stdout } = await this.cli(...args);
    return { id: stdout.trim(), name, runtime: this.name };
  }

  async stop(handle: ContainerHandle, timeout?: number): Promise<void> {
    if (timeout !== undefined) {
      await this.cli('stop', '-t', String(timeout), handle.id);
    } else {
      await this.cli('stop', handle.id);
    }
  }

  async kill(handle: ContainerHandle): Promise<void> {
    await this.cli('kill', handle.id);
  }

  async remove(handle: ContainerHandle): Promise<void> {
    await this.cli('rm', '-f', handle.id);
  }

  async inspect(handle: ContainerHandle): Promise<ContainerState> {
    const { stdout } = await this.cli('inspect', '--format', '{{json .State}}', handle.id);

    const raw: unknown = JSON.parse(stdout);
    if (!isRecord(raw) || typeof raw['Status'] !== 'string') {
      throw new Error(`Unexpected inspect output for container "${handle.name}"`);
    }

    const status = this.mapStatus(raw['Status']);
    const isTerminal = status === 'stopped' || status === 'dead';
    const exitCode = raw['ExitCode'];

    return {
      status,
      exitCode: isTerminal && typeof exitCode === 'number' ? exitCode : undefined,
      startedAt: optionalTime(raw['StartedAt']),
      finishedAt: optionalTime(raw['FinishedAt']),
    };
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  protected mapStatus(status: string): ContainerState['status'] {
    return mapDockerStatus(status);
  }

  protected async cli(...args: string[]): Promise<{ stdout: string; stderr: string }> {
    return this.execFn(this.binaryPath, args);
  }
}

function pushEnv(args: string[], env: Record<string, string> | undefined): void {
  for (const [key, value] of Object.entries(env ?? {})) {
    args.push('-e', `${key}=${value}`);
  }
}

function pushLabels(args: string[], labels: Record<string, string> | undefined): void {
  for (const [key, value] of Object.entries(labels ?? {})) {
    args.push('--label', `${key}=${value}`);
  }
}
