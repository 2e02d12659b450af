/**
 * Tests for main() entry point.
 *
 * main() is a thin wiring layer that parses args, creates real CliDeps,
 * calls runCommand, and returns the exit code. Tests verify the wiring
 * works without real process.exit().
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main } from './main.js';
import { resetLogging } from './core/logger.js';

// Mock cli.ts to intercept runCommand calls
vi.mock('./cli.js', async () => {
  const actual = await vi.importActual<typeof import('./cli.js')>('./cli.js');
  return {
    ...actual,
    runCommand: vi.fn().mockResolvedValue(0),
  };
});

import { runCommand } from './cli.js';

describe('main', () => {
  beforeEach(() => {
    vi.stubEnv('STAGECRAFT_HOME', '/tmp/test-stagecraft-main');
  });

  afterEach(() => {
    vi.clearAllMocks();
    vi.unstubAllEnvs();
    resetLogging();
  });

  it('calls runCommand with the parsed command and returns its exit code', async () => {
    const code = await main(['node', 'stagecraft', 'validate', 'pipeline.yaml']);

    expect(runCommand).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'validate', positionals: ['pipeline.yaml'] }),
      expect.objectContaining({ home: '/tmp/test-stagecraft-main' }),
    );
    expect(code).toBe(0);
  });

  it('passes --version through as a flag', async () => {
    const code = await main(['node', 'stagecraft', '--version']);
    expect(runCommand).toHaveBeenCalledWith(
      expect.objectContaining({ command: '', flags: { version: true } }),
      expect.any(Object),
    );
    expect(code).toBe(0);
  });

  it('passes value options through', async () => {
    await main(['node', 'stagecraft', 'build', 'p.yaml', '--until', 'build', '--timeout=30']);
    expect(runCommand).toHaveBeenCalledWith(
      expect.objectContaining({ command: 'build', options: { until: 'build', timeout: '30' } }),
      expect.any(Object),
    );
  });

  it('returns non-zero exit code on failure', async () => {
    vi.mocked(runCommand).mockResolvedValueOnce(4);
    const code = await main(['node', 'stagecraft', 'run', 'p.yaml']);
    expect(code).toBe(4);
  });
});
