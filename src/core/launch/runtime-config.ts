import type { LaunchSection } from '../../types/config.js';
import type { RuntimeConfig, StageSpec } from '../../types/pipeline.js';

/**
 * Derive the launcher configuration from a stage's `launch` block and
 * ports, filling timing and bind address from the `[launch]` config.
 * Returns `null` for a stage without `launch`.
 */
export function buildRuntimeConfig(stage: StageSpec, defaults: LaunchSection): RuntimeConfig | null {
  if (stage.launch === undefined) return null;

  const config: RuntimeConfig = {
    stage: stage.name,
    variant: stage.launch.variant,
    command: [...stage.launch.command],
    ports: stage.ports.map((p) => ({ ...p })),
    env: { ...stage.env },
    workdir: stage.workdir,
    gracePeriodMs: stage.launch.gracePeriodMs ?? defaults.grace_period_ms,
    healthCheckTimeoutMs: stage.launch.healthCheckTimeoutMs ?? defaults.health_check_timeout_ms,
    hostAddress: defaults.host_address,
  };
  if (stage.launch.documentRoot !== undefined) {
    config.documentRoot = stage.launch.documentRoot;
  }
  return config;
}
