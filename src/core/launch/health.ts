/**
 * Launch health check: the served process is alive and every host port
 * accepts TCP connections.
 *
 * Polls with a growing interval (x1.5, capped at 2s) until healthy or the
 * timeout elapses. A process found dead ends the wait at once.
 */

import { Socket } from 'node:net';
import { FailureKind } from '../../types/errors.js';
import { createLogger, type Logger } from '../logger.js';
import { PipelineError, errorMessage } from '../pipeline-error.js';
import { sleep } from '../timing.js';

/** Resolves true when `host:port` accepts a TCP connection. */
export type PortProbe = (host: string, port: number) => Promise<boolean>;

const PROBE_TIMEOUT_MS = 1_000;
const MAX_INTERVAL_MS = 2_000;

/** Try one TCP connection. Never rejects. */
export const probeTcpPort: PortProbe = (host, port) =>
  new Promise<boolean>((resolve) => {
    const socket = new Socket();
    const finish = (ok: boolean): void => {
      socket.destroy();
      resolve(ok);
    };

    socket.setTimeout(PROBE_TIMEOUT_MS);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
    socket.connect(port, host);
  });

export interface HealthCheckOptions {
  timeoutMs: number;
  host: string;
  ports: readonly number[];
  /** Resolves false once the process has exited. */
  isAlive: () => Promise<boolean>;
  probe?: PortProbe;
  intervalMs?: number;
  logger?: Logger;
}

/**
 * Wait until the process is alive and all ports accept connections.
 *
 * @throws PipelineError (LaunchFailure) when the process exits or the
 *   timeout elapses first.
 */
export async function waitForHealthy(options: HealthCheckOptions): Promise<void> {
  const probe = options.probe ?? probeTcpPort;
  const logger = options.logger ?? createLogger('health');
  const deadline = Date.now() + options.timeoutMs;
  let interval = options.intervalMs ?? 100;
  let closed: number[] = [...options.ports];

  for (;;) {
    let alive = true;
    try {
      alive = await options.isAlive();
    } catch (err) {
      logger.debug('liveness check error (continuing poll)', { error: errorMessage(err) });
    }
    if (!alive) {
      throw new PipelineError({
        kind: FailureKind.LaunchFailure,
        message: 'Process exited before it became healthy',
      });
    }

    const results = await Promise.all(closed.map((port) => probe(options.host, port)));
    closed = closed.filter((_port, i) => !results[i]);
    if (closed.length === 0) {
      return;
    }

    if (Date.now() + interval > deadline) {
      break;
    }
    await sleep(interval);
    interval = Math.min(interval * 1.5, MAX_INTERVAL_MS);
  }

  const list = closed.map((p) => `${options.host}:${p}`).join(', ');
  throw new PipelineError({
    kind: FailureKind.LaunchFailure,
    message: `Not accepting connections within ${options.timeoutMs}ms: ${list}`,
  });
}
