/**
 * RuntimeLauncher: turns a successful pipeline's LaunchPlan into a running
 * ProcessHandle, either by serving the artifacts in-process (`static`) or
 * by running the committed final-stage image (`process`).
 */

import { FailureKind } from '../../types/errors.js';
import type { RuntimeConfig } from '../../types/pipeline.js';
import type { ArtifactSet } from '../artifact-set.js';
import type { ContainerRuntime } from '../container/runtime.js';
import { createLogger, type Logger } from '../logger.js';
import { PipelineError } from '../pipeline-error.js';
import type { LaunchPlan } from '../pipeline.js';
import { STAGE_LABELS, stageContainerName } from '../stage-executor.js';
import { waitForHealthy, type PortProbe } from './health.js';
import type { Endpoint, ProcessHandle } from './process-handle.js';
import { launchProcess } from './process-launcher.js';
import { StaticSiteServer } from './static-server.js';

export interface RuntimeLauncherOptions {
  runtime: ContainerRuntime;
  /** TCP probe used by the health check. */
  probe?: PortProbe;
  logger?: Logger;
}

export interface LaunchContext {
  runId: string;
  pipeline: string;
}

class StaticProcessHandle implements ProcessHandle {
  readonly variant = 'static' as const;
  readonly stage: string;
  readonly endpoints: readonly Endpoint[];
  private readonly server: StaticSiteServer;
  private readonly gracePeriodMs: number;
  private readonly logger: Logger;
  private done = false;
  private stopping: Promise<void> | undefined;

  constructor(server: StaticSiteServer, config: RuntimeConfig, endpoints: Endpoint[], logger: Logger) {
    this.server = server;
    this.stage = config.stage;
    this.gracePeriodMs = config.gracePeriodMs;
    this.endpoints = endpoints;
    this.logger = logger;
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
    await this.server.close(this.gracePeriodMs);
    this.done = true;
    this.logger.info('static site stopped');
  }
}

export class RuntimeLauncher {
  private readonly runtime: ContainerRuntime;
  private readonly probe: PortProbe | undefined;
  private readonly logger: Logger;

  constructor(options: RuntimeLauncherOptions) {
    this.runtime = options.runtime;
    this.probe = options.probe;
    this.logger = options.logger ?? createLogger('launcher');
  }

  /**
   * Start the final stage and wait for its initial health check.
   *
   * @throws PipelineError (LaunchFailure) attributed to the final stage.
   */
  async launch(plan: LaunchPlan, artifacts: ArtifactSet, ctx: LaunchContext): Promise<ProcessHandle> {
    const { config } = plan;
    const logger = this.logger.withContext({ run: ctx.runId, pipeline: ctx.pipeline, stage: config.stage });
    logger.info('launching', { variant: config.variant, ports: config.ports.map((p) => p.hostPort) });

    switch (config.variant) {
      case 'static':
        return this.launchStatic(config, artifacts, logger);
      case 'process': {
        if (plan.image === undefined) {
          throw new PipelineError({
            kind: FailureKind.LaunchFailure,
            message: `Stage "${config.stage}" has no committed image to run`,
            stage: config.stage,
          });
        }
        return launchProcess({
          runtime: this.runtime,
          config,
          image: plan.image,
          name: stageContainerName(ctx.pipeline, config.stage, ctx.runId),
          labels: {
            [STAGE_LABELS.pipeline]: ctx.pipeline,
            [STAGE_LABELS.stage]: config.stage,
            [STAGE_LABELS.run]: ctx.runId,
          },
          probe: this.probe,
          logger,
        });
      }
    }
  }

  private async launchStatic(config: RuntimeConfig, artifacts: ArtifactSet, logger: Logger): Promise<ProcessHandle> {
    const server = new StaticSiteServer({
      artifacts,
      documentRoot: config.documentRoot ?? '/',
      host: config.hostAddress,
      ports: config.ports.map((p) => p.hostPort),
      logger: logger.child('static'),
    });
    if (server.fileCount === 0) {
      logger.warn('document root is empty', { document_root: config.documentRoot });
    }

    const ports = await server.listen();
    try {
      await waitForHealthy({
        timeoutMs: config.healthCheckTimeoutMs,
        host: config.hostAddress,
        ports,
        isAlive: async () => server.listening || ports.length === 0,
        probe: this.probe,
        logger,
      });
    } catch (err) {
      await server.close(0);
      throw err;
    }

    const endpoints = ports.map((port) => ({ host: config.hostAddress, port }));
    return new StaticProcessHandle(server, config, endpoints, logger);
  }
}
