import { describe, it, expect, afterEach, vi } from 'vitest';
import { DEFAULT_CONFIG } from '../types/config.js';
import type { StageFailure } from '../types/errors.js';
import type { PipelineDefinition, StageSpec, TransferEdge } from '../types/pipeline.js';
import { ArtifactSet } from './artifact-set.js';
import { Pipeline, commitTagFor, type PipelineEvent, type StageRunner } from './pipeline.js';
import type { StageContext, StageResult } from './stage-executor.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function stage(name: string, overrides?: Partial<StageSpec>): StageSpec {
  return {
    name,
    image: 'debian:bookworm',
    workdir: '/',
    env: {},
    inputs: [],
    commands: ['true'],
    artifacts: [],
    ports: [],
    ...overrides,
  };
}

function edge(from: string, to: string): TransferEdge {
  const [sourceStage, sourcePath] = from.split(':');
  const [destStage, destPath] = to.split(':');
  return { source: { stage: sourceStage, path: sourcePath }, dest: { stage: destStage, path: destPath } };
}

function definition(stages: StageSpec[], transfers: TransferEdge[] = []): PipelineDefinition {
  return { name: 'demo', baseDir: '/work', stages, transfers };
}

type Behavior = (stage: StageSpec, ctx: StageContext) => StageResult | Promise<StageResult>;

/** Runner that records calls and answers from per-stage behaviors. */
class FakeRunner implements StageRunner {
  readonly calls: Array<{ stage: string; ctx: StageContext }> = [];
  private readonly behaviors = new Map<string, Behavior>();

  on(stageName: string, behavior: Behavior): this {
    this.behaviors.set(stageName, behavior);
    return this;
  }

  async execute(stage: StageSpec, ctx: StageContext): Promise<StageResult> {
    this.calls.push({ stage: stage.name, ctx });
    const behavior = this.behaviors.get(stage.name);
    if (behavior) return behavior(stage, ctx);
    return succeed(stage.name, {});
  }
}

function succeed(name: string, files: Record<string, string>, image?: string): StageResult {
  const set = ArtifactSet.fromEntries(
    Object.entries(files).map(([path, content]) => [path, Buffer.from(content)] as const),
  );
  return { ok: true, stage: name, artifacts: set, image, durationMs: 5 };
}

function fail(name: string, failure: Omit<StageFailure, 'stage'>): StageResult {
  return { ok: false, stage: name, failure: { ...failure, stage: name }, durationMs: 5 };
}

function pipelineWith(def: PipelineDefinition, runner: StageRunner): Pipeline {
  return new Pipeline(def, { runner, launchDefaults: DEFAULT_CONFIG.launch });
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Pipeline', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs stages in order and yields the last ArtifactSet', async () => {
    const runner = new FakeRunner()
      .on('build', (s) => succeed(s.name, { 'out/app.bin': 'BIN' }))
      .on('run', (s) => succeed(s.name, { 'srv/app.bin': 'BIN' }));
    const def = definition(
      [stage('build', { artifacts: ['/out/app.bin'] }), stage('run')],
      [edge('build:/out/app.bin', 'run:/srv/app.bin')],
    );
    const pipeline = pipelineWith(def, runner);

    const outcome = await pipeline.run({ runId: 'run-1' });

    expect(runner.calls.map((c) => c.stage)).toEqual(['build', 'run']);
    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.stage).toBe('run');
    expect(outcome.artifacts.paths()).toEqual(['srv/app.bin']);
    expect(outcome.launch).toBeUndefined();
    expect(pipeline.status).toBe('succeeded');
    expect(pipeline.statuses()).toEqual([
      { stage: 'build', status: 'succeeded' },
      { stage: 'run', status: 'succeeded' },
    ]);
  });

  it('delivers transferred files to the destination stage', async () => {
    const runner = new FakeRunner().on('build', (s) => succeed(s.name, { 'out/app.bin': 'BIN' }));
    const def = definition(
      [stage('build', { artifacts: ['/out/app.bin'] }), stage('run')],
      [edge('build:/out/app.bin', 'run:/srv/app.bin')],
    );

    await pipelineWith(def, runner).run();

    const delivered = runner.calls[1].ctx.transferred;
    expect([...(delivered?.keys() ?? [])]).toEqual(['/srv/app.bin']);
    expect(Buffer.from(delivered?.get('/srv/app.bin') ?? []).toString()).toBe('BIN');
  });

  it('keeps a source set until its last consuming stage has run', async () => {
    const runner = new FakeRunner().on('build', (s) => succeed(s.name, { 'out/app.bin': 'BIN' }));
    const def = definition(
      [stage('build', { artifacts: ['/out/app.bin'] }), stage('test'), stage('run')],
      [edge('build:/out/app.bin', 'test:/app.bin'), edge('build:/out/app.bin', 'run:/srv/app.bin')],
    );

    const outcome = await pipelineWith(def, runner).run();

    expect(outcome.ok).toBe(true);
    expect([...(runner.calls[1].ctx.transferred?.keys() ?? [])]).toEqual(['/app.bin']);
    expect([...(runner.calls[2].ctx.transferred?.keys() ?? [])]).toEqual(['/srv/app.bin']);
  });

  it('publishes transitions to listeners', async () => {
    const events: PipelineEvent[] = [];
    const pipeline = pipelineWith(definition([stage('only')]), new FakeRunner());
    pipeline.on((e) => events.push(e));

    await pipeline.run({ runId: 'run-1' });

    expect(events).toEqual([
      { type: 'pipeline', runId: 'run-1', status: 'running' },
      { type: 'stage', stage: 'only', index: 0, status: 'running', durationMs: undefined, failure: undefined },
      { type: 'stage', stage: 'only', index: 0, status: 'succeeded', durationMs: 5, failure: undefined },
      { type: 'pipeline', runId: 'run-1', status: 'succeeded' },
    ]);
  });

  it('keeps going when a listener throws', async () => {
    const pipeline = pipelineWith(definition([stage('only')]), new FakeRunner());
    pipeline.on(() => {
      throw new Error('listener bug');
    });

    expect((await pipeline.run()).ok).toBe(true);
  });

  it('refuses to run twice', async () => {
    const pipeline = pipelineWith(definition([stage('only')]), new FakeRunner());
    await pipeline.run();
    await expect(pipeline.run()).rejects.toThrow('has already been run');
  });

  // -----------------------------------------------------------------------
  // Fail-fast
  // -----------------------------------------------------------------------

  it('stops at the first failing stage', async () => {
    const runner = new FakeRunner().on('test', (s) =>
      fail(s.name, { kind: 'CommandFailure', message: 'tests failed', stageIndex: 1, exitStatus: 1 }),
    );
    const pipeline = pipelineWith(definition([stage('build'), stage('test'), stage('ship')]), runner);

    const outcome = await pipeline.run();

    expect(runner.calls.map((c) => c.stage)).toEqual(['build', 'test']);
    expect(outcome).toMatchObject({ ok: false, failure: { kind: 'CommandFailure', stage: 'test' } });
    expect(pipeline.status).toBe('failed');
    expect(pipeline.statuses().map((s) => s.status)).toEqual(['succeeded', 'failed', 'pending']);
  });

  // -----------------------------------------------------------------------
  // Transfers
  // -----------------------------------------------------------------------

  it('rejects an undeclared transfer source before any stage runs', async () => {
    const runner = new FakeRunner();
    const def = definition(
      [stage('build', { artifacts: ['/out/app.bin'] }), stage('run')],
      [edge('build:/out/missing.bin', 'run:/srv/app.bin')],
    );

    const outcome = await pipelineWith(def, runner).run();

    expect(runner.calls).toEqual([]);
    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'UnresolvedTransfer', stage: 'run', stageIndex: 1 },
    });
  });

  it('fails the destination stage when the source produced nothing there', async () => {
    const runner = new FakeRunner().on('build', (s) => succeed(s.name, { 'out/other.bin': 'x' }));
    const def = definition(
      [stage('build', { artifacts: ['/out'] }), stage('run')],
      [edge('build:/out/app.bin', 'run:/srv/app.bin')],
    );
    const pipeline = pipelineWith(def, runner);

    const outcome = await pipeline.run();

    expect(runner.calls.map((c) => c.stage)).toEqual(['build']);
    expect(outcome).toMatchObject({
      ok: false,
      failure: {
        kind: 'UnresolvedTransfer',
        message: 'Transfer "build:/out/app.bin" -> "run:/srv/app.bin": stage "build" produced nothing at "/out/app.bin"',
        stage: 'run',
        stageIndex: 1,
      },
    });
    expect(pipeline.stageStatus('run')).toBe('pending');
  });

  // -----------------------------------------------------------------------
  // until
  // -----------------------------------------------------------------------

  it('stops after the --until stage and does not launch', async () => {
    const runner = new FakeRunner();
    const def = definition([
      stage('build'),
      stage('test'),
      stage('serve', { launch: { variant: 'process', command: ['./app'] } }),
    ]);

    const outcome = await pipelineWith(def, runner).run({ until: 'test' });

    expect(runner.calls.map((c) => c.stage)).toEqual(['build', 'test']);
    expect(outcome).toMatchObject({ ok: true, stage: 'test' });
    if (outcome.ok) expect(outcome.launch).toBeUndefined();
  });

  it('rejects an unknown --until stage', async () => {
    const outcome = await pipelineWith(definition([stage('build')]), new FakeRunner()).run({
      until: 'deploy',
    });

    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'InvalidPipeline', message: 'Unknown stage "deploy"' },
    });
  });

  // -----------------------------------------------------------------------
  // Launch plan
  // -----------------------------------------------------------------------

  it('commits a process-variant final stage and returns its launch plan', async () => {
    const runner = new FakeRunner().on('serve', (s, ctx) => succeed(s.name, {}, ctx.commitTag));
    const def = definition([
      stage('build'),
      stage('serve', {
        ports: [{ hostPort: 8000, containerPort: 8000 }],
        launch: { variant: 'process', command: ['node', 'server.js'], gracePeriodMs: 500 },
      }),
    ]);

    const outcome = await pipelineWith(def, runner).run({ runId: 'ABCDEF123456789' });

    expect(runner.calls[0].ctx.commitTag).toBeUndefined();
    expect(runner.calls[1].ctx.commitTag).toBe('stagecraft/demo:abcdef123456');
    if (!outcome.ok) throw new Error(outcome.failure.message);
    expect(outcome.launch).toEqual({
      image: 'stagecraft/demo:abcdef123456',
      config: {
        stage: 'serve',
        variant: 'process',
        command: ['node', 'server.js'],
        ports: [{ hostPort: 8000, containerPort: 8000 }],
        env: {},
        workdir: '/',
        gracePeriodMs: 500,
        healthCheckTimeoutMs: 30_000,
        hostAddress: '127.0.0.1',
      },
    });
  });

  it('does not commit the final stage when the outcome will not be launched', async () => {
    const runner = new FakeRunner();
    const def = definition([
      stage('build'),
      stage('serve', { launch: { variant: 'process', command: ['node', 'server.js'] } }),
    ]);

    const outcome = await pipelineWith(def, runner).run({ runId: 'ABCDEF123456789', launch: false });

    expect(outcome).toMatchObject({ ok: true, stage: 'serve' });
    expect(runner.calls.map((c) => c.ctx.commitTag)).toEqual([undefined, undefined]);
  });

  // -----------------------------------------------------------------------
  // Cancellation
  // -----------------------------------------------------------------------

  it('lets the running stage finish and starts no further stage when cancelled', async () => {
    const controller = new AbortController();
    const runner = new FakeRunner().on('build', (s) => {
      controller.abort();
      return succeed(s.name, {});
    });
    const pipeline = pipelineWith(definition([stage('build'), stage('test')]), runner);

    const outcome = await pipeline.run({ signal: controller.signal });

    expect(runner.calls.map((c) => c.stage)).toEqual(['build']);
    expect(pipeline.stageStatus('build')).toBe('succeeded');
    expect(outcome).toMatchObject({
      ok: false,
      failure: { kind: 'Cancelled', stage: 'test', stageIndex: 1 },
    });
  });

  // -----------------------------------------------------------------------
  // Deadline
  // -----------------------------------------------------------------------

  it('fails with Timeout and never marks the stage in flight succeeded', async () => {
    vi.useFakeTimers();
    let abandon: AbortSignal | undefined;
    const runner = new FakeRunner().on('build', async (s, ctx) => {
      abandon = ctx.abandon;
      await new Promise((resolve) => setTimeout(resolve, 10_000));
      return succeed(s.name, {});
    });
    const pipeline = pipelineWith(definition([stage('build'), stage('run')]), runner);

    const running = pipeline.run({ deadlineMs: 1_000 });
    await vi.advanceTimersByTimeAsync(1_000);
    const outcome = await running;

    expect(outcome).toMatchObject({
      ok: false,
      failure: {
        kind: 'Timeout',
        message: 'Pipeline "demo" timed out after 1000ms',
        stage: 'build',
        stageIndex: 0,
      },
    });
    expect(abandon?.aborted).toBe(true);

    await vi.advanceTimersByTimeAsync(10_000);
    expect(pipeline.statuses()).toEqual([
      { stage: 'build', status: 'failed' },
      { stage: 'run', status: 'pending' },
    ]);
    expect(runner.calls.map((c) => c.stage)).toEqual(['build']);
  });
});

describe('commitTagFor', () => {
  it('builds a lowercase image reference', () => {
    expect(commitTagFor('My API', '0123456789ABCDEF')).toBe('stagecraft/my-api:0123456789ab');
  });
});
