/**
 * Mock container runtime for testing.
 *
 * Implements the {@link ContainerRuntime} interface with in-memory state:
 * each container has its own flat filesystem, commands are answered by
 * registered handlers, and committed images snapshot a container's files.
 * This lets the stage executor, pipeline and launchers run end to end
 * without a real container engine.
 *
 * Supports failure simulation for slow or failing pulls, run errors,
 * processes that exit on start, stop timeouts and crashes.
 */

import { posix } from 'node:path';
import type {
  ContainerRuntime,
  ContainerCreateOptions,
  ContainerRunOptions,
  ContainerHandle,
  ContainerState,
  ExecOptions,
  ExecResult,
  PortMapping,
  RuntimeName,
} from './runtime.js';

// ---------------------------------------------------------------------------
// Command handlers
// ---------------------------------------------------------------------------

/** In-memory filesystem view handed to command handlers. */
export interface MockFileSystem {
  read(path: string): Uint8Array | undefined;
  readText(path: string): string | undefined;
  write(path: string, content: Uint8Array | string): void;
  remove(path: string): void;
  exists(path: string): boolean;
  list(): string[];
}

/** What a command handler sees. */
export interface MockCommandContext {
  /** The shell command string (the `sh -c` argument) or the joined argv. */
  command: string;
  argv: readonly string[];
  workdir: string;
  env: Record<string, string>;
  /** Labels of the container the command runs in. */
  labels: Record<string, string>;
  fs: MockFileSystem;
}

/** A handler's verdict; omitted fields default to exit 0 and no output. */
export interface MockCommandOutcome {
  exitCode?: number;
  stdout?: string;
  stderr?: string;
}

export type MockCommandHandler = (
  ctx: MockCommandContext,
) => MockCommandOutcome | void | Promise<MockCommandOutcome | void>;

// ---------------------------------------------------------------------------
// Internal container record
// ---------------------------------------------------------------------------

interface ContainerRecord {
  handle: ContainerHandle;
  state: ContainerState;
  image: string;
  workdir: string;
  env: Record<string, string>;
  labels: Record<string, string>;
  files: Map<string, Uint8Array>;
  command?: string[];
  portMappings: PortMapping[];
}

/** Public snapshot of a container, for assertions. */
export interface MockContainerInfo {
  id: string;
  name: string;
  image: string;
  labels: Record<string, string>;
  command?: string[];
  portMappings: PortMapping[];
  status: ContainerState['status'];
}

/** One command executed through {@link MockContainerRuntime.exec}. */
export interface MockExecRecord {
  container: string;
  labels: Record<string, string>;
  command: string;
  exitCode: number;
}

function resolvePath(path: string, workdir: string): string {
  const normalized = posix.normalize(path.startsWith('/') ? path : posix.join(workdir, path));
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized;
}

function isOutcome(value: MockCommandOutcome | void): value is MockCommandOutcome {
  return typeof value === 'object' && value !== null;
}

function copyBytes(bytes: Uint8Array): Uint8Array {
  return Uint8Array.from(bytes);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// MockContainerRuntime
// ---------------------------------------------------------------------------

export class MockContainerRuntime implements ContainerRuntime {
  readonly name: RuntimeName;

  /** All live containers, indexed by ID. */
  private readonly containers = new Map<string, ContainerRecord>();

  /** Every container ever created, in creation order. */
  private readonly history: ContainerRecord[] = [];

  /** Images that "exist" locally, with the filesystem they start from. */
  private readonly images = new Map<string, Map<string, Uint8Array>>();

  private readonly handlers: Array<{ match: string | RegExp; handler: MockCommandHandler }> = [];
  private readonly execLog: MockExecRecord[] = [];
  private readonly pullCounts = new Map<string, number>();

  /** Auto-incrementing counter for unique IDs. */
  private idCounter = 0;

  // -- Failure simulation flags --

  private available = true;
  private pullDelayMs = 0;
  private pullFailuresRemaining = 0;
  private pullFailureMessage = 'pull failed';
  private nextRunFailure: string | null = null;
  private nextRunExits = false;
  private nextStopTimeout = false;

  constructor(name: RuntimeName = 'docker') {
    this.name = name;
  }

  // -----------------------------------------------------------------------
  // Availability
  // -----------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    return this.available;
  }

  async version(): Promise<string> {
    return `Mock ${this.name} 1.0.0`;
  }

  // -----------------------------------------------------------------------
  // Image lifecycle
  // -----------------------------------------------------------------------

  async pull(image: string): Promise<void> {
    this.pullCounts.set(image, (this.pullCounts.get(image) ?? 0) + 1);

    if (this.pullDelayMs > 0) {
      await sleep(this.pullDelayMs);
    }
    if (this.pullFailuresRemaining > 0) {
      this.pullFailuresRemaining -= 1;
      throw new Error(this.pullFailureMessage);
    }
    if (!this.images.has(image)) {
      this.images.set(image, new Map());
    }
  }

  async imageExists(image: string): Promise<boolean> {
    return this.images.has(image);
  }

  async removeImage(image: string): Promise<void> {
    if (!this.images.delete(image)) {
      throw new Error(`No such image: ${image}`);
    }
  }

  // -----------------------------------------------------------------------
  // Stage workspaces
  // -----------------------------------------------------------------------

  async create(options: ContainerCreateOptions): Promise<ContainerHandle> {
    const base = this.requireImage(options.image);
    return this.register({
      image: options.image,
      name: options.name,
      workdir: options.workdir,
      env: { ...options.env },
      labels: { ...options.labels },
      files: base,
      portMappings: [],
    }).handle;
  }

  async exec(
    handle: ContainerHandle,
    argv: readonly string[],
    options?: ExecOptions,
  ): Promise<ExecResult> {
    const record = this.requireRunning(handle);
    const command =
      argv.length === 3 && argv[0] === 'sh' && argv[1] === '-c' ? argv[2] : argv.join(' ');
    const workdir = options?.workdir ?? record.workdir;

    const entry = this.handlers.find(({ match }) =>
      typeof match === 'string' ? match === command : match.test(command),
    );
    const returned = entry
      ? await entry.handler({
          command,
          argv,
          workdir,
          env: { ...record.env, ...options?.env },
          labels: { ...record.labels },
          fs: this.fileSystem(record, workdir),
        })
      : undefined;
    const outcome: MockCommandOutcome = isOutcome(returned) ? returned : {};

    const result: ExecResult = {
      exitCode: outcome.exitCode ?? 0,
      stdout: outcome.stdout ?? '',
      stderr: outcome.stderr ?? '',
    };
    this.execLog.push({
      container: handle.name,
      labels: { ...record.labels },
      command,
      exitCode: result.exitCode,
    });
    return result;
  }

  async writeFiles(handle: ContainerHandle, files: ReadonlyMap<string, Uint8Array>): Promise<void> {
    const record = this.requireRunning(handle);
    for (const [path, bytes] of files) {
      record.files.set(resolvePath(path, '/'), copyBytes(bytes));
    }
  }

  async readTree(handle: ContainerHandle, path: string): Promise<Map<string, Uint8Array> | null> {
    const record = this.requireRunning(handle);
    const root = resolvePath(path, '/');
    const result = new Map<string, Uint8Array>();

    for (const [filePath, bytes] of record.files) {
      if (filePath === root || root === '/' || filePath.startsWith(`${root}/`)) {
        result.set(filePath, copyBytes(bytes));
      }
    }
    return result.size > 0 ? result : null;
  }

  async commit(handle: ContainerHandle, tag: string): Promise<string> {
    const record = this.requireRunning(handle);
    const snapshot = new Map<string, Uint8Array>();
    for (const [path, bytes] of record.files) {
      snapshot.set(path, copyBytes(bytes));
    }
    this.images.set(tag, snapshot);
    return `sha256:mock-${tag}`;
  }

  // -----------------------------------------------------------------------
  // Serving containers
  // -----------------------------------------------------------------------

  async run(options: ContainerRunOptions): Promise<ContainerHandle> {
    if (this.nextRunFailure !== null) {
      const message = this.nextRunFailure;
      this.nextRunFailure = null;
      throw new Error(message);
    }

    const base = this.requireImage(options.image);
    const record = this.register({
      image: options.image,
      name: options.name,
      workdir: options.workdir ?? '/',
      env: { ...options.env },
      labels: { ...options.labels },
      files: base,
      command: [...options.command],
      portMappings: options.portMappings.map((m) => ({ ...m })),
    });

    if (this.nextRunExits) {
      this.nextRunExits = false;
      record.state = {
        status: 'stopped',
        exitCode: 1,
        startedAt: record.state.startedAt,
        finishedAt: new Date().toISOString(),
      };
    }
    return record.handle;
  }

  async stop(handle: ContainerHandle, _timeout?: number): Promise<void> {
    if (this.nextStopTimeout) {
      this.nextStopTimeout = false;
      return new Promise<void>(() => {
        // Intentionally never resolves.
      });
    }
    this.finish(handle, 'stopped', 0);
  }

  async kill(handle: ContainerHandle): Promise<void> {
    this.finish(handle, 'dead', 137);
  }

  async remove(handle: ContainerHandle): Promise<void> {
    this.finish(handle, 'stopped', 0);
    this.containers.delete(handle.id);
  }

  async inspect(handle: ContainerHandle): Promise<ContainerState> {
    const record = this.containers.get(handle.id);
    if (!record) {
      throw new Error(`Container "${handle.id}" not found`);
    }
    return { ...record.state };
  }

  // -----------------------------------------------------------------------
  // Scripting
  // -----------------------------------------------------------------------

  /**
   * Register a handler for commands equal to `match` (string) or matching
   * it (RegExp). The first registered match wins; unmatched commands
   * succeed with no output.
   */
  onCommand(match: string | RegExp, handler: MockCommandHandler): void {
    this.handlers.push({ match, handler });
  }

  /** Make an image available locally without a pull. */
  addImage(image: string, files?: Record<string, string>): void {
    const fs = new Map<string, Uint8Array>();
    for (const [path, content] of Object.entries(files ?? {})) {
      fs.set(resolvePath(path, '/'), Buffer.from(content));
    }
    this.images.set(image, fs);
  }

  // -----------------------------------------------------------------------
  // Failure simulation
  // -----------------------------------------------------------------------

  /** Delay every `pull()` by `ms` milliseconds. */
  setPullDelay(ms: number): void {
    this.pullDelayMs = ms;
  }

  /** Make the next `count` pulls reject. */
  simulatePullFailures(count: number, message?: string): void {
    this.pullFailuresRemaining = count;
    this.pullFailureMessage = message ?? 'pull failed';
  }

  /**
   * Make the next `run()` call reject with an error.
   * @param error - Custom error message (defaults to `'Run failed'`).
   */
  simulateRunFailure(error?: string): void {
    this.nextRunFailure = error ?? 'Run failed';
  }

  /** Make the next `run()` container exit immediately with status 1. */
  simulateExitOnStart(): void {
    this.nextRunExits = true;
  }

  /** Make the next `stop()` call hang forever (never resolve). */
  simulateStopTimeout(): void {
    this.nextStopTimeout = true;
  }

  /** Control what `isAvailable()` returns. */
  setAvailable(value: boolean): void {
    this.available = value;
  }

  /**
   * Simulate an unexpected container crash. Marks the container as `'dead'`
   * with exit code 137 (SIGKILL).
   */
  simulateCrash(handle: ContainerHandle): void {
    this.finish(handle, 'dead', 137);
  }

  // -----------------------------------------------------------------------
  // Inspection helpers (test-only)
  // -----------------------------------------------------------------------

  /** Every container created so far, in creation order. */
  getCreatedContainers(): MockContainerInfo[] {
    return this.history.map((r) => ({
      id: r.handle.id,
      name: r.handle.name,
      image: r.image,
      labels: { ...r.labels },
      command: r.command ? [...r.command] : undefined,
      portMappings: r.portMappings.map((m) => ({ ...m })),
      status: r.state.status,
    }));
  }

  /** Handles of containers that are still running. */
  getRunningHandles(): ContainerHandle[] {
    return [...this.containers.values()]
      .filter((r) => r.state.status === 'running')
      .map((r) => r.handle);
  }

  /** Every command executed so far, in order. */
  getExecLog(): MockExecRecord[] {
    return this.execLog.map((e) => ({ ...e, labels: { ...e.labels } }));
  }

  /** How many times `pull()` was called for an image. */
  getPullCount(image: string): number {
    return this.pullCounts.get(image) ?? 0;
  }

  /** Files of a committed or pulled image, for assertions. */
  getImageFiles(image: string): Map<string, Uint8Array> | undefined {
    return this.images.get(image);
  }

  /** Clear all internal state. */
  reset(): void {
    this.containers.clear();
    this.history.length = 0;
    this.images.clear();
    this.handlers.length = 0;
    this.execLog.length = 0;
    this.pullCounts.clear();
    this.idCounter = 0;
    this.available = true;
    this.pullDelayMs = 0;
    this.pullFailuresRemaining = 0;
    this.nextRunFailure = null;
    this.nextRunExits = false;
    this.nextStopTimeout = false;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private register(init: Omit<ContainerRecord, 'handle' | 'state' | 'files'> & {
    name?: string;
    files: Map<string, Uint8Array>;
  }): ContainerRecord {
    this.idCounter += 1;
    const handle: ContainerHandle = {
      id: `mock-${this.idCounter}`,
      name: init.name ?? `mock-container-${this.idCounter}`,
      runtime: this.name,
    };

    const files = new Map<string, Uint8Array>();
    for (const [path, bytes] of init.files) {
      files.set(path, copyBytes(bytes));
    }

    const record: ContainerRecord = {
      handle,
      state: { status: 'running', startedAt: new Date().toISOString() },
      image: init.image,
      workdir: init.workdir,
      env: init.env,
      labels: init.labels,
      files,
      command: init.command,
      portMappings: init.portMappings,
    };
    this.containers.set(handle.id, record);
    this.history.push(record);
    return record;
  }

  private requireImage(image: string): Map<string, Uint8Array> {
    const files = this.images.get(image);
    if (!files) {
      throw new Error(`Unable to find image '${image}' locally`);
    }
    return files;
  }

  private requireRunning(handle: ContainerHandle): ContainerRecord {
    const record = this.containers.get(handle.id);
    if (!record || record.state.status !== 'running') {
      throw new Error(`Container "${handle.id}" is not running`);
    }
    return record;
  }

  private finish(handle: ContainerHandle, status: 'stopped' | 'dead', exitCode: number): void {
    const record = this.containers.get(handle.id);
    if (record && record.state.status === 'running') {
      record.state = {
        status,
        exitCode,
        startedAt: record.state.startedAt,
        finishedAt: new Date().toISOString(),
      };
    }
  }

  private fileSystem(record: ContainerRecord, workdir: string): MockFileSystem {
    return {
      read: (path) => record.files.get(resolvePath(path, workdir)),
      readText: (path) => {
        const bytes = record.files.get(resolvePath(path, workdir));
        return bytes === undefined ? undefined : Buffer.from(bytes).toString('utf-8');
      },
      write: (path, content) => {
        const bytes = typeof content === 'string' ? Buffer.from(content) : copyBytes(content);
        record.files.set(resolvePath(path, workdir), bytes);
      },
      remove: (path) => {
        record.files.delete(resolvePath(path, workdir));
      },
      exists: (path) => {
        const target = resolvePath(path, workdir);
        return [...record.files.keys()].some((p) => p === target || p.startsWith(`${target}/`));
      },
      list: () => [...record.files.keys()].sort(),
    };
  }
}
