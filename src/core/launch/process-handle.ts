import type { LaunchVariant } from '../../types/pipeline.js';

/** A host address the launched process answers on. */
export interface Endpoint {
  host: string;
  port: number;
  /** Container-side port (process variant). */
  containerPort?: number;
}

/** The running result of a launch. */
export interface ProcessHandle {
  readonly variant: LaunchVariant;
  readonly stage: string;
  readonly endpoints: readonly Endpoint[];
  /** True once `stop()` has completed. */
  readonly stopped: boolean;
  /**
   * Orderly shutdown: stop accepting connections, drain for at most the
   * grace period, then force. Safe to call more than once.
   */
  stop(): Promise<void>;
}

export function formatEndpoint(endpoint: Endpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}
