/**
 * Pipeline data model.
 *
 * Two layers: the raw document shape accepted from a pipeline file
 * (validated by {@link PIPELINE_JSON_SCHEMA}), and the normalized model
 * the executor, transfer and launcher work with. Normalization resolves
 * defaults, canonicalizes container paths and parses port and transfer
 * notation.
 */

import { posix } from 'node:path';

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

/** Lifecycle of a single stage and of the pipeline as a whole. */
export type StageStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type PipelineStatus = StageStatus;

// ---------------------------------------------------------------------------
// Raw document (as written in YAML / JSON)
// ---------------------------------------------------------------------------

export interface RawStageInput {
  from: string;
  to: string;
  exclude?: string[];
}

export interface RawLaunch {
  variant: LaunchVariant;
  command?: string[];
  documentRoot?: string;
  gracePeriodMs?: number;
  healthCheckTimeoutMs?: number;
}

export interface RawStage {
  name: string;
  image: string;
  workdir?: string;
  env?: Record<string, string>;
  inputs?: RawStageInput[];
  commands?: string[];
  artifacts?: string[];
  ports?: Array<number | string>;
  launch?: RawLaunch;
}

export interface RawTransfer {
  from: string;
  to: string;
}

export interface RawPipelineDocument {
  name: string;
  stages: RawStage[];
  transfers?: RawTransfer[];
}

// ---------------------------------------------------------------------------
// Normalized model
// ---------------------------------------------------------------------------

/** How the final stage's output is served. */
export type LaunchVariant = 'static' | 'process';

/** A published port: host side and container side. */
export interface PortBinding {
  hostPort: number;
  containerPort: number;
}

/** Host files copied into a stage before its commands run. */
export interface StageInput {
  /** Absolute host path. */
  from: string;
  /** Absolute container path. */
  to: string;
  /** Basenames skipped while walking `from`. */
  exclude: string[];
}

export interface LaunchSpec {
  variant: LaunchVariant;
  command: string[];
  documentRoot?: string;
  gracePeriodMs?: number;
  healthCheckTimeoutMs?: number;
}

/** One build or runtime stage. */
export interface StageSpec {
  name: string;
  image: string;
  workdir: string;
  env: Record<string, string>;
  inputs: StageInput[];
  commands: string[];
  artifacts: string[];
  ports: PortBinding[];
  launch?: LaunchSpec;
}

/** `stage:/abs/path` reference used by transfer edges. */
export interface ArtifactRef {
  stage: string;
  path: string;
}

/** Declared copy of one stage's artifact into a later stage. */
export interface TransferEdge {
  source: ArtifactRef;
  dest: ArtifactRef;
}

export interface PipelineDefinition {
  name: string;
  /** Directory of the pipeline file; stage input paths are resolved against it. */
  baseDir: string;
  stages: StageSpec[];
  transfers: TransferEdge[];
}

/** Everything the runtime launcher needs to start the final process. */
export interface RuntimeConfig {
  stage: string;
  variant: LaunchVariant;
  command: string[];
  documentRoot?: string;
  ports: PortBinding[];
  env: Record<string, string>;
  workdir: string;
  gracePeriodMs: number;
  healthCheckTimeoutMs: number;
  hostAddress: string;
}

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

/** Stage name pattern shared with the JSON schema. */
export const STAGE_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

/**
 * Canonicalize an absolute container path: collapse `.`/`..` segments and
 * strip any trailing slash (except for the root itself).
 *
 * @throws If the path is not absolute.
 */
export function normalizeContainerPath(path: string): string {
  if (!path.startsWith('/')) {
    throw new Error(`Container path must be absolute: "${path}"`);
  }
  const normalized = posix.normalize(path);
  if (normalized.length > 1 && normalized.endsWith('/')) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

/**
 * Parse a port declaration: a bare container port (`80`, `"80"`) publishes
 * on the same host port; `"8080:80"` maps host 8080 to container 80.
 */
export function parsePortBinding(value: number | string): PortBinding {
  const text = String(value).trim();
  const match = /^(?:(\d{1,5}):)?(\d{1,5})$/.exec(text);
  if (!match) {
    throw new Error(`Invalid port declaration: "${text}"`);
  }

  const containerPort = parseInt(match[2], 10);
  const hostPort = match[1] !== undefined ? parseInt(match[1], 10) : containerPort;

  for (const port of [hostPort, containerPort]) {
    if (port < 1 || port > 65535) {
      throw new Error(`Port out of range in "${text}": must be between 1 and 65535`);
    }
  }

  return { hostPort, containerPort };
}

/** Parse `stage:/abs/path` transfer notation. */
export function parseArtifactRef(value: string): ArtifactRef {
  const separator = value.indexOf(':');
  if (separator <= 0) {
    throw new Error(`Invalid artifact reference "${value}": expected "stage:/absolute/path"`);
  }

  const stage = value.slice(0, separator);
  if (!STAGE_NAME_PATTERN.test(stage)) {
    throw new Error(`Invalid stage name "${stage}" in artifact reference "${value}"`);
  }

  return { stage, path: normalizeContainerPath(value.slice(separator + 1)) };
}

/** Render an artifact reference back to `stage:/path` notation. */
export function formatArtifactRef(ref: ArtifactRef): string {
  return `${ref.stage}:${ref.path}`;
}

/** True when `path` equals `root` or lies below it. Both must be normalized. */
export function isWithinPath(path: string, root: string): boolean {
  if (root === '/') return true;
  return path === root || path.startsWith(`${root}/`);
}
