/**
 * Process variant: run the committed final-stage image with the configured
 * command and published ports, then wait until it is healthy.
 *
 * Shutdown follows the container lifecycle: a graceful stop bounded by the
 * grace period, a kill when that does not finish, then removal of the
 * container and of the committed image.
 */

import { FailureKind } from '../../types/errors.js';
import type { RuntimeConfig } from '../../types/pipeline.js';
import type { ContainerHandle, ContainerRuntime } from '../container/runtime.js';
import { createLogger, type Logger } from '../logger.js';
import { PipelineError, errorMessage, isPipelineError } from '../pipeline-error.js';
import { withTimeout } from '../timing.js';
import { waitForHealthy, type PortProbe } from './health.js';
import type { Endpoint, ProcessHandle } from './process-handle.js';

export interface ProcessLaunchOptions {
  runtime: ContainerRuntime;
  config: RuntimeConfig;
  /** Committed image of the final stage. */
  image: string;
  /** Container name. */
  name: string;
  labels?: Record<string, string>;
  probe?: PortProbe;
  logger?: Logger;
}

class ContainerProcessHandle implements ProcessHandle {
  readonly variant = 'process' as const;
  readonly stage: string;
  readonly endpoints: readonly Endpoint[];
  private readonly runtime: ContainerRuntime;
  private readonly handle: ContainerHandle;
  private readonly image: string;
  private readonly gracePeriodMs: number;
  private readonly logger: Logger;
  private done = false;
  private stopping: Promise<void> | undefined;

  constructor(
    runtime: ContainerRuntime,
    handle: ContainerHandle,
    image: string,
    config: RuntimeConfig,
    logger: Logger,
  ) {
    this.runtime = runtime;
    this.handle = handle;
    this.image = image;
    this.gracePeriodMs = config.gracePeriodMs;
    this.logger = logger;
    this.stage = config.stage;
    this.endpoints = config.ports.map((p) => ({
      host: config.hostAddress,
      port: p.hostPort,
      containerPort: p.containerPort,
    }));
  }

  get stopped(): boolean {
    return this.done;
  }

  stop(): Promise<void> {
    if (this.stopping === undefined) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private async shutdown(): Promise<void> {
    this.logger.info('stopping process', { container: this.handle.name, grace_ms: this.gracePeriodMs });
    await shutdownContainer(this.runtime, this.handle, this.gracePeriodMs, this.logger);
    await removeImage(this.runtime, this.image, this.logger);
    this.done = true;
    this.logger.info('process stopped', { container: this.handle.name });
  }
}

/** Graceful stop within `graceMs`, else kill; the container is always removed. */
async function shutdownContainer(
  runtime: ContainerRuntime,
  handle: ContainerHandle,
  graceMs: number,
  logger: Logger,
): Promise<void> {
  try {
    await withTimeout(runtime.stop(handle, Math.ceil(graceMs / 1000)), graceMs, 'Graceful stop');
  } catch (err) {
    logger.warn('graceful stop failed, force killing', { container: handle.name, error: errorMessage(err) });
    try {
      await runtime.kill(handle);
    } catch (killErr) {
      logger.debug('kill failed', { container: handle.name, error: errorMessage(killErr) });
    }
  }

  try {
    await runtime.remove(handle);
  } catch (err) {
    logger.warn('container removal failed', { container: handle.name, error: errorMessage(err) });
  }
}

async function removeImage(runtime: ContainerRuntime, image: string, logger: Logger): Promise<void> {
  try {
    await runtime.removeImage(image);
  } catch (err) {
    logger.warn('committed image removal failed', { image, error: errorMessage(err) });
  }
}

/**
 * Start the final-stage container and wait for it to become healthy.
 *
 * On any failure the container and committed image are cleaned up before
 * the error propagates.
 *
 * @throws PipelineError (LaunchFailure)
 */
export async function launchProcess(options: ProcessLaunchOptions): Promise<ProcessHandle> {
  const { runtime, config, image } = options;
  const logger = (options.logger ?? createLogger('launcher')).withContext({ stage: config.stage });

  let handle: ContainerHandle;
  try {
    handle = await runtime.run({
      image,
      name: options.name,
      command: config.command,
      workdir: config.workdir,
      env: config.env,
      labels: options.labels,
      portMappings: config.ports.map((p) => ({
        hostPort: p.hostPort,
        containerPort: p.containerPort,
        hostAddress: config.hostAddress,
      })),
    });
  } catch (err) {
    await removeImage(runtime, image, logger);
    throw new PipelineError({
      kind: FailureKind.LaunchFailure,
      message: `Cannot start stage "${config.stage}": ${errorMessage(err)}`,
      cause: err,
    });
  }

  logger.info('process started', { container: handle.name, image, command: config.command });

  try {
    await waitForHealthy({
      timeoutMs: config.healthCheckTimeoutMs,
      host: config.hostAddress,
      ports: config.ports.map((p) => p.hostPort),
      isAlive: async () => (await runtime.inspect(handle)).status === 'running',
      probe: options.probe,
      logger,
    });
  } catch (err) {
    await shutdownContainer(runtime, handle, 0, logger);
    await removeImage(runtime, image, logger);
    if (isPipelineError(err)) throw err;
    throw new PipelineError({ kind: FailureKind.LaunchFailure, message: errorMessage(err), cause: err });
  }

  logger.info('process healthy', { ports: config.ports.map((p) => p.hostPort) });
  return new ContainerProcessHandle(runtime, handle, image, config, logger);
}
