import { describe, it, expect } from 'vitest';
import { detectRuntime } from './detect.js';
import { MockContainerRuntime } from './mock-runtime.js';
import type { RuntimeName } from './runtime.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function available(name: RuntimeName): MockContainerRuntime {
  return new MockContainerRuntime(name);
}

function unavailable(name: RuntimeName): MockContainerRuntime {
  const rt = new MockContainerRuntime(name);
  rt.setAvailable(false);
  return rt;
}

// ---------------------------------------------------------------------------
// detectRuntime
// ---------------------------------------------------------------------------

describe('detectRuntime', () => {
  it('returns null when nothing is available', async () => {
    const result = await detectRuntime({
      runtimes: [unavailable('docker'), unavailable('podman')],
    });
    expect(result).toBeNull();
  });

  it('selects the only available runtime', async () => {
    const result = await detectRuntime({
      runtimes: [available('docker'), unavailable('podman')],
    });
    expect(result?.selected.runtime.name).toBe('docker');
    expect(result?.available).toHaveLength(1);
  });

  it('prefers Podman over Docker without a preference', async () => {
    const result = await detectRuntime({
      runtimes: [available('docker'), available('podman')],
    });
    expect(result?.selected.runtime.name).toBe('podman');
  });

  it('honors a configured preference', async () => {
    const result = await detectRuntime({
      runtimes: [available('docker'), available('podman')],
      preference: 'docker',
    });
    expect(result?.selected.runtime.name).toBe('docker');
  });

  it('falls back to priority order when the preference is unavailable', async () => {
    const result = await detectRuntime({
      runtimes: [unavailable('docker'), available('podman')],
      preference: 'docker',
    });
    expect(result?.selected.runtime.name).toBe('podman');
  });

  it('skips a runtime whose probe throws', async () => {
    const broken = new MockContainerRuntime('podman');
    broken.isAvailable = async () => {
      throw new Error('permission denied while trying to connect to the daemon socket');
    };

    const result = await detectRuntime({ runtimes: [broken, available('docker')] });
    expect(result?.selected.runtime.name).toBe('docker');
    expect(result?.available).toHaveLength(1);
  });

  it('records the probed version', async () => {
    const result = await detectRuntime({ runtimes: [available('docker')] });
    expect(result?.selected.version).toBe('Mock docker 1.0.0');
  });
});
