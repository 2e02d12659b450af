/**
 * Container runtime auto-detection.
 *
 * Probes the host for available container engines and returns the best
 * match based on user preference and a fixed priority order.
 *
 * Detection priority (when no preference is specified or the preferred
 * engine is unavailable):
 *  1. Podman: rootless by default, no root daemon
 *  2. Docker: widest compatibility, fallback
 *
 * A configured preference (config.toml `[runtime] engine`) wins over
 * auto-detection order.
 */

import { createLogger, type Logger } from '../logger.js';
import { errorMessage } from '../pipeline-error.js';
import type { ContainerRuntime, RuntimeName } from './runtime.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

/** Information about a single available runtime. */
export interface RuntimeInfo {
  runtime: ContainerRuntime;
  version: string;
}

/** Result of runtime detection. */
export interface DetectionResult {
  /** The runtime selected by preference or priority order. */
  selected: RuntimeInfo;
  /** All runtimes that were found to be available. */
  available: RuntimeInfo[];
}

export interface DetectionOptions {
  /** Runtimes to probe. */
  runtimes: ContainerRuntime[];
  /** User-configured preference that overrides auto-detection order. */
  preference?: RuntimeName;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Priority order
// ---------------------------------------------------------------------------

const PRIORITY: readonly RuntimeName[] = ['podman', 'docker'];

async function probeRuntime(runtime: ContainerRuntime, logger: Logger): Promise<RuntimeInfo | null> {
  try {
    const ok = await runtime.isAvailable();
    if (!ok) return null;
    return { runtime, version: await runtime.version() };
  } catch (err) {
    logger.debug('runtime probe failed', { runtime: runtime.name, error: errorMessage(err) });
    return null;
  }
}

// ---------------------------------------------------------------------------
// detectRuntime
// ---------------------------------------------------------------------------

/**
 * Detect available container runtimes and return the best one.
 *
 * Probes all provided runtimes in parallel, then selects by preference
 * and priority order. Returns `null` when no engine responds.
 */
export async function detectRuntime(options: DetectionOptions): Promise<DetectionResult | null> {
  const { runtimes, preference } = options;
  const logger = options.logger ?? createLogger('runtime');

  const probes = await Promise.all(runtimes.map((rt) => probeRuntime(rt, logger)));
  const available = probes.filter((info): info is RuntimeInfo => info !== null);

  if (available.length === 0) return null;

  if (preference) {
    const preferred = available.find((info) => info.runtime.name === preference);
    if (preferred) {
      return { selected: preferred, available };
    }
  }

  for (const name of PRIORITY) {
    const match = available.find((info) => info.runtime.name === name);
    if (match) {
      return { selected: match, available };
    }
  }

  return { selected: available[0], available };
}
