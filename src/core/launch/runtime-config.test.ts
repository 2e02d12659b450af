import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG } from '../../types/config.js';
import type { StageSpec } from '../../types/pipeline.js';
import { buildRuntimeConfig } from './runtime-config.js';

function stage(overrides: Partial<StageSpec>): StageSpec {
  return {
    name: 'serve',
    image: 'node:20-slim',
    workdir: '/usr/src/app',
    env: { NODE_ENV: 'production' },
    inputs: [],
    commands: [],
    artifacts: [],
    ports: [{ hostPort: 8000, containerPort: 8000 }],
    ...overrides,
  };
}

describe('buildRuntimeConfig', () => {
  it('returns null for a stage without launch', () => {
    expect(buildRuntimeConfig(stage({}), DEFAULT_CONFIG.launch)).toBeNull();
  });

  it('fills timing and bind address from the launch defaults', () => {
    const config = buildRuntimeConfig(
      stage({ launch: { variant: 'process', command: ['node', 'server.js'] } }),
      DEFAULT_CONFIG.launch,
    );

    expect(config).toEqual({
      stage: 'serve',
      variant: 'process',
      command: ['node', 'server.js'],
      ports: [{ hostPort: 8000, containerPort: 8000 }],
      env: { NODE_ENV: 'production' },
      workdir: '/usr/src/app',
      gracePeriodMs: 10_000,
      healthCheckTimeoutMs: 30_000,
      hostAddress: '127.0.0.1',
    });
  });

  it('prefers per-stage timing and keeps the document root', () => {
    const config = buildRuntimeConfig(
      stage({
        launch: { variant: 'static', command: [], documentRoot: '/srv/www', gracePeriodMs: 500, healthCheckTimeoutMs: 2_000 },
      }),
      DEFAULT_CONFIG.launch,
    );

    expect(config).toMatchObject({ variant: 'static', documentRoot: '/srv/www', gracePeriodMs: 500, healthCheckTimeoutMs: 2_000 });
  });
});
