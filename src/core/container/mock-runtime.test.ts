import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MockContainerRuntime } from './mock-runtime.js';
import type { ContainerCreateOptions, ContainerRuntime } from './runtime.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function workspace(overrides?: Partial<ContainerCreateOptions>): ContainerCreateOptions {
  return {
    image: 'debian:bookworm',
    workdir: '/app',
    env: { MODE: 'release' },
    labels: { 'stagecraft.stage': 'build' },
    ...overrides,
  };
}

function text(bytes: Uint8Array | undefined): string | undefined {
  return bytes === undefined ? undefined : Buffer.from(bytes).toString('utf-8');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('MockContainerRuntime', () => {
  let runtime: MockContainerRuntime;

  beforeEach(() => {
    runtime = new MockContainerRuntime();
    runtime.addImage('debian:bookworm');
  });

  it('implements the ContainerRuntime interface', () => {
    const _rt: ContainerRuntime = runtime;
    expect(_rt.name).toBe('docker');
  });

  it('can impersonate podman', () => {
    expect(new MockContainerRuntime('podman').name).toBe('podman');
  });

  // -----------------------------------------------------------------------
  // Images
  // -----------------------------------------------------------------------

  describe('images', () => {
    it('makes pulled images exist and counts pulls', async () => {
      expect(await runtime.imageExists('node:20')).toBe(false);
      await runtime.pull('node:20');
      await runtime.pull('node:20');
      expect(await runtime.imageExists('node:20')).toBe(true);
      expect(runtime.getPullCount('node:20')).toBe(2);
    });

    it('fails the configured number of pulls', async () => {
      runtime.simulatePullFailures(1, 'registry unavailable');
      await expect(runtime.pull('node:20')).rejects.toThrow('registry unavailable');
      await expect(runtime.pull('node:20')).resolves.toBeUndefined();
    });

    it('refuses to remove an unknown image', async () => {
      await expect(runtime.removeImage('nope:1')).rejects.toThrow('No such image: nope:1');
    });

    describe('pull delay', () => {
      beforeEach(() => {
        vi.useFakeTimers();
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it('resolves only after the delay', async () => {
        runtime.setPullDelay(5_000);
        let done = false;
        const pulling = runtime.pull('node:20').then(() => {
          done = true;
        });

        await vi.advanceTimersByTimeAsync(4_999);
        expect(done).toBe(false);
        await vi.advanceTimersByTimeAsync(1);
        await pulling;
        expect(done).toBe(true);
      });
    });
  });

  // -----------------------------------------------------------------------
  // Workspaces
  // -----------------------------------------------------------------------

  describe('workspaces', () => {
    it('refuses to create from a missing image', async () => {
      await expect(runtime.create(workspace({ image: 'ghost:1' }))).rejects.toThrow(
        "Unable to find image 'ghost:1' locally",
      );
    });

    it('starts from the image filesystem', async () => {
      runtime.addImage('base:1', { '/etc/os-release': 'ID=mock\n' });
      const handle = await runtime.create(workspace({ image: 'base:1' }));

      const tree = await runtime.readTree(handle, '/etc');
      expect(text(tree?.get('/etc/os-release'))).toBe('ID=mock\n');
    });

    it('routes commands to matching handlers with workdir and env', async () => {
      const seen: Array<{ workdir: string; mode: string | undefined }> = [];
      runtime.onCommand(/^make/, (ctx) => {
        seen.push({ workdir: ctx.workdir, mode: ctx.env['MODE'] });
        ctx.fs.write('out/app.bin', 'BIN');
        return { stdout: 'ok\n' };
      });

      const handle = await runtime.create(workspace());
      const result = await runtime.exec(handle, ['sh', '-c', 'make all']);

      expect(result).toEqual({ exitCode: 0, stdout: 'ok\n', stderr: '' });
      expect(seen).toEqual([{ workdir: '/app', mode: 'release' }]);
      expect(text((await runtime.readTree(handle, '/app/out/app.bin'))?.get('/app/out/app.bin'))).toBe(
        'BIN',
      );
    });

    it('answers unmatched commands with success', async () => {
      const handle = await runtime.create(workspace());
      expect(await runtime.exec(handle, ['true'])).toEqual({ exitCode: 0, stdout: '', stderr: '' });
    });

    it('records every executed command', async () => {
      runtime.onCommand('false', () => ({ exitCode: 1 }));
      const handle = await runtime.create(workspace({ name: 'ws' }));

      await runtime.exec(handle, ['sh', '-c', 'echo hi']);
      await runtime.exec(handle, ['sh', '-c', 'false']);

      expect(runtime.getExecLog()).toEqual([
        { container: 'ws', labels: { 'stagecraft.stage': 'build' }, command: 'echo hi', exitCode: 0 },
        { container: 'ws', labels: { 'stagecraft.stage': 'build' }, command: 'false', exitCode: 1 },
      ]);
    });

    it('writes and reads trees by absolute path', async () => {
      const handle = await runtime.create(workspace());
      await runtime.writeFiles(
        handle,
        new Map([
          ['/srv/web/index.html', Buffer.from('<html></html>')],
          ['/srv/web/app.js', Buffer.from('')],
          ['/srv/website/other.txt', Buffer.from('x')],
        ]),
      );

      const tree = await runtime.readTree(handle, '/srv/web/');
      expect([...(tree?.keys() ?? [])].sort()).toEqual(['/srv/web/app.js', '/srv/web/index.html']);
      expect(await runtime.readTree(handle, '/srv/missing')).toBeNull();
    });

    it('copies bytes on the way in', async () => {
      const handle = await runtime.create(workspace());
      const source = Buffer.from('abc');
      await runtime.writeFiles(handle, new Map([['/a', source]]));
      source[0] = 0x7a;

      expect(text((await runtime.readTree(handle, '/a'))?.get('/a'))).toBe('abc');
    });

    it('commits a snapshot that later containers start from', async () => {
      const handle = await runtime.create(workspace());
      await runtime.writeFiles(handle, new Map([['/app/main.py', Buffer.from('app = 1')]]));

      const id = await runtime.commit(handle, 'stagecraft/api:run');
      const next = await runtime.create(workspace({ image: 'stagecraft/api:run' }));

      expect(id).toBe('sha256:mock-stagecraft/api:run');
      expect(text(runtime.getImageFiles('stagecraft/api:run')?.get('/app/main.py'))).toBe('app = 1');
      expect((await runtime.readTree(next, '/app'))?.size).toBe(1);
    });

    it('rejects exec after removal', async () => {
      const handle = await runtime.create(workspace());
      await runtime.remove(handle);
      await expect(runtime.exec(handle, ['true'])).rejects.toThrow('is not running');
      expect(runtime.getRunningHandles()).toHaveLength(0);
    });
  });

  // -----------------------------------------------------------------------
  // Serving containers
  // -----------------------------------------------------------------------

  describe('serving containers', () => {
    const runOptions = {
      image: 'debian:bookworm',
      command: ['serve'],
      env: {},
      portMappings: [{ hostPort: 8000, containerPort: 8000 }],
    };

    it('runs and records command and ports', async () => {
      const handle = await runtime.run({ ...runOptions, name: 'srv' });

      expect((await runtime.inspect(handle)).status).toBe('running');
      expect(runtime.getCreatedContainers()[0]).toMatchObject({
        name: 'srv',
        command: ['serve'],
        portMappings: [{ hostPort: 8000, containerPort: 8000 }],
      });
    });

    it('simulates a run failure once', async () => {
      runtime.simulateRunFailure('port is already allocated');
      await expect(runtime.run(runOptions)).rejects.toThrow('port is already allocated');
      await expect(runtime.run(runOptions)).resolves.toBeDefined();
    });

    it('simulates a process that exits on start', async () => {
      runtime.simulateExitOnStart();
      const handle = await runtime.run(runOptions);
      expect(await runtime.inspect(handle)).toMatchObject({ status: 'stopped', exitCode: 1 });
    });

    it('stops, kills and crashes', async () => {
      const a = await runtime.run(runOptions);
      const b = await runtime.run(runOptions);
      const c = await runtime.run(runOptions);

      await runtime.stop(a, 5);
      await runtime.kill(b);
      runtime.simulateCrash(c);

      expect((await runtime.inspect(a)).status).toBe('stopped');
      expect(await runtime.inspect(b)).toMatchObject({ status: 'dead', exitCode: 137 });
      expect((await runtime.inspect(c)).status).toBe('dead');
    });

    it('can make stop hang', async () => {
      const handle = await runtime.run(runOptions);
      runtime.simulateStopTimeout();

      let settled = false;
      void runtime.stop(handle).then(() => {
        settled = true;
      });
      await new Promise((resolve) => setTimeout(resolve, 10));

      expect(settled).toBe(false);
    });
  });

  it('reset clears all state', async () => {
    await runtime.pull('node:20');
    await runtime.create(workspace());
    runtime.reset();

    expect(await runtime.imageExists('debian:bookworm')).toBe(false);
    expect(runtime.getCreatedContainers()).toEqual([]);
    expect(runtime.getPullCount('node:20')).toBe(0);
  });
});
