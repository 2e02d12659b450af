/**
 * Integration tests: pipeline file to exit code.
 *
 * Drives `runPipelineCommand` end to end over real stores (in-memory
 * SQLite), the real Pipeline, StageExecutor and RuntimeLauncher, with a
 * mock container engine whose command handlers stand in for the build.
 *
 * Covers:
 *   - build -> run: the binary reaches the launched stage, exit 0
 *   - missing declared artifact: exit 2, the final stage never starts
 *   - transfer from an undeclared path: exit 3 before any stage
 *   - overall deadline during provisioning: exit 4, nothing succeeds
 *   - repeated builds export identical digests
 *   - SIGINT during a build stage: exit 130 before the next stage
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MockContainerRuntime } from './core/container/mock-runtime.js';
import type { ProcessHandle } from './core/launch/process-handle.js';
import { configureLogging, resetLogging, type LogEntry, type RunLogSink } from './core/logger.js';
import { commitTagFor } from './core/pipeline.js';
import { openWorkspace, type Workspace } from './core/workspace.js';
import { runPipelineCommand, type RunCommandDeps } from './run-command.js';
import { DEFAULT_CONFIG, type StagecraftConfig } from './types/config.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PIPELINE_FILE = '/work/demo.yaml';

function appPipeline(transferFrom = '/out/app.bin'): string {
  return `
name: demo
stages:
  - name: build
    image: debian:bookworm
    workdir: /src
    commands:
      - make app
    artifacts:
      - /out/app.bin
  - name: run
    image: debian:bookworm-slim
    ports: [8080]
    launch:
      variant: process
      command: [/srv/app.bin]
transfers:
  - from: build:${transferFrom}
    to: run:/srv/app.bin
`;
}

const TEST_CONFIG: StagecraftConfig = {
  ...DEFAULT_CONFIG,
  provision: { retries: 0, backoff_ms: 0 },
  launch: { grace_period_ms: 50, health_check_timeout_ms: 50, host_address: '127.0.0.1' },
};

interface Harness {
  runtime: MockContainerRuntime;
  workspace: Workspace;
  stdout: string[];
  stderr: string[];
  deps(pipeline: string, overrides?: Partial<RunCommandDeps>): RunCommandDeps;
}

function createHarness(): Harness {
  const runtime = new MockContainerRuntime();
  const workspace = openWorkspace({
    config: TEST_CONFIG,
    dirs: {
      root: '/tmp/stagecraft-it',
      data: '/tmp/stagecraft-it/data',
      logs: '/tmp/stagecraft-it/logs',
      artifacts: '/tmp/stagecraft-it/artifacts',
      configFile: '/tmp/stagecraft-it/config.toml',
    },
    runtime,
    useMemory: true,
  });
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    runtime,
    workspace,
    stdout,
    stderr,
    deps: (pipeline, overrides) => ({
      stdout: (msg) => stdout.push(msg),
      stderr: (msg) => stderr.push(msg),
      workspace,
      readFile: (path) => {
        if (path !== PIPELINE_FILE) throw new Error(`ENOENT: no such file or directory, open '${path}'`);
        return pipeline;
      },
      writeTree: vi.fn(),
      onSignal: () => () => {},
      logSink: () => {},
      probe: async () => true,
      whileServing: async () => {},
      ...overrides,
    }),
  };
}

function stagesOf(workspace: Workspace): Array<[string, string]> {
  const [run] = workspace.history.recent(1);
  return run.stages.map((s) => [s.name, s.status]);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('pipeline runs', () => {
  let h: Harness;

  beforeEach(() => {
    configureLogging({ sink: () => {} });
    h = createHarness();
  });

  afterEach(() => {
    vi.useRealTimers();
    h.workspace.close();
    resetLogging();
  });

  it('copies the built binary into the serving stage and exits 0', async () => {
    h.runtime.onCommand('make app', ({ fs }) => {
      fs.write('/out/app.bin', 'app-binary');
    });
    const served: { image?: string; command?: string[]; binary?: string } = {};
    const whileServing = async (_handle: ProcessHandle): Promise<void> => {
      const container = h.runtime.getCreatedContainers().at(-1);
      served.image = container?.image;
      served.command = container?.command;
      const bytes = container === undefined ? undefined : h.runtime.getImageFiles(container.image)?.get('/srv/app.bin');
      served.binary = bytes === undefined ? undefined : Buffer.from(bytes).toString();
    };

    const code = await runPipelineCommand(h.deps(appPipeline(), { whileServing }), {
      mode: 'run',
      file: PIPELINE_FILE,
    });

    expect(code).toBe(0);
    expect(served.image).toMatch(/^stagecraft\/demo:[0-9a-f-]{12}$/);
    expect(served.command).toEqual(['/srv/app.bin']);
    expect(served.binary).toBe('app-binary');
    expect(stagesOf(h.workspace)).toEqual([
      ['build', 'succeeded'],
      ['run', 'succeeded'],
    ]);
    expect(h.workspace.history.recent(1)[0]).toMatchObject({ status: 'succeeded', exitCode: 0, failure: null });
    // Committed image is gone once the process stops
    expect(h.runtime.getImageFiles(served.image ?? '')).toBeUndefined();
  });

  it('exits 2 when a declared artifact is missing and never starts the next stage', async () => {
    const code = await runPipelineCommand(h.deps(appPipeline()), { mode: 'run', file: PIPELINE_FILE });

    expect(code).toBe(2);
    expect(h.stderr.slice(0, 2)).toEqual([
      'Stage "build" (#1) failed: MissingArtifact',
      '  Declared artifact "/out/app.bin" was not produced by stage "build"',
    ]);
    expect(h.runtime.getCreatedContainers().map((c) => c.labels['stagecraft.stage'])).toEqual(['build']);
    expect(stagesOf(h.workspace)).toEqual([
      ['build', 'failed'],
      ['run', 'pending'],
    ]);
  });

  it('exits 3 for a transfer from an undeclared path before any stage runs', async () => {
    const code = await runPipelineCommand(h.deps(appPipeline('/out/missing.bin')), {
      mode: 'run',
      file: PIPELINE_FILE,
    });

    expect(code).toBe(3);
    expect(h.stderr[0]).toBe('Stage "run" (#2) failed: UnresolvedTransfer');
    expect(h.runtime.getCreatedContainers()).toEqual([]);
    expect(h.runtime.getPullCount('debian:bookworm')).toBe(0);
  });

  it('exits 4 when the deadline expires during provisioning', async () => {
    vi.useFakeTimers();
    h.runtime.setPullDelay(10_000);

    const pending = runPipelineCommand(h.deps(appPipeline()), {
      mode: 'run',
      file: PIPELINE_FILE,
      timeoutMs: 1_000,
    });
    await vi.advanceTimersByTimeAsync(1_000);

    expect(await pending).toBe(4);
    expect(h.stderr.slice(0, 2)).toEqual([
      'Stage "build" (#1) failed: Timeout',
      '  Pipeline "demo" timed out after 1000ms',
    ]);

    // Let the abandoned pull finish; the stage must not carry on
    await vi.advanceTimersByTimeAsync(10_000);
    expect(h.runtime.getCreatedContainers()).toEqual([]);
    expect(stagesOf(h.workspace).filter(([, status]) => status === 'succeeded')).toEqual([]);
  });

  it('exports the same digest for repeated builds', async () => {
    h.runtime.onCommand('make app', ({ fs }) => {
      fs.write('/out/app.bin', 'app-binary');
    });
    const options = { mode: 'build' as const, file: PIPELINE_FILE, until: 'build', out: '/tmp/stagecraft-it/out' };

    expect(await runPipelineCommand(h.deps(appPipeline()), options)).toBe(0);
    expect(await runPipelineCommand(h.deps(appPipeline()), options)).toBe(0);

    const digests = h.stdout.filter((line) => line.startsWith('Digest: '));
    expect(digests).toHaveLength(2);
    expect(digests[0]).toBe(digests[1]);
    const [latest, earlier] = h.workspace.history.recent(2);
    expect(latest.digest).not.toBeNull();
    expect(latest.digest).toBe(earlier.digest);
  });

  it('leaves no committed image behind after a build of a process pipeline', async () => {
    h.runtime.onCommand('make app', ({ fs }) => {
      fs.write('/out/app.bin', 'app-binary');
    });

    const code = await runPipelineCommand(h.deps(appPipeline()), {
      mode: 'build',
      file: PIPELINE_FILE,
      out: '/tmp/stagecraft-it/out',
    });

    expect(code).toBe(0);
    const [run] = h.workspace.history.recent(1);
    expect(stagesOf(h.workspace)).toEqual([
      ['build', 'succeeded'],
      ['run', 'succeeded'],
    ]);
    expect(h.runtime.getImageFiles(commitTagFor('demo', run.id))).toBeUndefined();
  });

  it('writes every entry of the run to the run log', async () => {
    h.runtime.onCommand('make app', ({ fs }) => {
      fs.write('/out/app.bin', 'app-binary');
    });
    const entries: LogEntry[] = [];
    const paths: string[] = [];
    const close = vi.fn();
    const openRunLog = (path: string): RunLogSink => {
      paths.push(path);
      return Object.assign((entry: LogEntry) => {
        entries.push(entry);
      }, { close });
    };

    const code = await runPipelineCommand(h.deps(appPipeline(), { openRunLog }), {
      mode: 'build',
      file: PIPELINE_FILE,
      until: 'build',
    });

    expect(code).toBe(0);
    const [run] = h.workspace.history.recent(1);
    expect(paths).toEqual([`/tmp/stagecraft-it/logs/${run.id}.jsonl`]);
    expect(close).toHaveBeenCalledOnce();
    expect(entries.find((e) => e.msg === 'pipeline succeeded')).toMatchObject({ run: run.id, pipeline: 'demo' });
    expect(entries.find((e) => e.msg === 'stage succeeded')).toMatchObject({ stage: 'build', ok: true });
  });

  it('exits 130 when interrupted and does not start the next stage', async () => {
    let interrupt: (() => void) | undefined;
    h.runtime.onCommand('make app', ({ fs }) => {
      fs.write('/out/app.bin', 'app-binary');
      interrupt?.();
    });

    const code = await runPipelineCommand(
      h.deps(appPipeline(), {
        onSignal: (handler) => {
          interrupt = handler;
          return () => {
            interrupt = undefined;
          };
        },
      }),
      { mode: 'run', file: PIPELINE_FILE },
    );

    expect(code).toBe(130);
    expect(h.stderr[0]).toBe('Cancelling after the current stage...');
    expect(h.stderr[1]).toBe('Stage "run" (#2) failed: Cancelled');
    expect(h.runtime.getCreatedContainers().map((c) => c.labels['stagecraft.stage'])).toEqual(['build']);
    expect(stagesOf(h.workspace)).toEqual([
      ['build', 'succeeded'],
      ['run', 'pending'],
    ]);
  });
});
