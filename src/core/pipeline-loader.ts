/**
 * Pipeline definition loading for stagecraft.
 *
 * Performs, in order:
 *   1. Syntax check (YAML via `yaml`, or JSON)
 *   2. Schema validation (ajv + PIPELINE_JSON_SCHEMA)
 *   3. Structural checks: unique stage names, edges that exist and point
 *      forward, commands on every build stage, `launch` only on the
 *      final stage, launch fields the variant needs
 *   4. Normalization into a {@link PipelineDefinition}
 *
 * Transfer sources are not checked against declared artifacts here; that
 * is a run-time failure of its own kind (see `checkTransfers`).
 */

import { readFileSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import _Ajv, { type ErrorObject } from 'ajv';
// ajv ESM interop: default export is the constructor
const Ajv = _Ajv.default ?? _Ajv;

import { FailureKind } from '../types/errors.js';
import { PIPELINE_JSON_SCHEMA } from '../types/pipeline-schema.js';
import {
  normalizeContainerPath,
  parseArtifactRef,
  parsePortBinding,
  type LaunchSpec,
  type PipelineDefinition,
  type PortBinding,
  type RawLaunch,
  type RawPipelineDocument,
  type RawStage,
  type StageSpec,
  type TransferEdge,
} from '../types/pipeline.js';
import { PipelineError, errorMessage } from './pipeline-error.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A single validation problem. */
export interface ValidationMessage {
  /** Location in the document (e.g. `stages[1].launch`). */
  field: string;
  message: string;
}

export type LoadResult =
  | { ok: true; pipeline: PipelineDefinition }
  | { ok: false; errors: ValidationMessage[] };

/** Injectable file access for the loader. */
export interface PipelineLoaderDeps {
  readFile: (path: string) => string;
}

const defaultDeps: PipelineLoaderDeps = {
  readFile: (path) => readFileSync(path, 'utf-8'),
};

// ---------------------------------------------------------------------------
// Schema validator (compiled once)
// ---------------------------------------------------------------------------

const ajv = new Ajv({ allErrors: true, strict: false });
const validateDocument = ajv.compile<RawPipelineDocument>(PIPELINE_JSON_SCHEMA);

function describeSchemaError(err: ErrorObject): ValidationMessage {
  const field = err.instancePath || '/';
  const params: Record<string, unknown> = err.params;

  if (err.keyword === 'additionalProperties' && typeof params['additionalProperty'] === 'string') {
    return { field, message: `Additional property "${params['additionalProperty']}" is not allowed` };
  }
  if (err.keyword === 'required' && typeof params['missingProperty'] === 'string') {
    return { field, message: `Missing required property "${params['missingProperty']}"` };
  }
  return { field, message: err.message ?? 'Unknown schema error' };
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse pipeline file text. `.json` files are parsed as JSON; everything
 * else as YAML.
 */
export function parsePipelineText(text: string, fileName: string): unknown {
  return extname(fileName).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

function normalizeLaunch(raw: RawLaunch, field: string, errors: ValidationMessage[]): LaunchSpec {
  const launch: LaunchSpec = { variant: raw.variant, command: raw.command ?? [] };

  if (raw.variant === 'static') {
    if (raw.documentRoot === undefined) {
      errors.push({ field, message: 'Static launch requires "documentRoot"' });
    } else {
      launch.documentRoot = normalizeContainerPath(raw.documentRoot);
    }
  } else if (launch.command.length === 0) {
    errors.push({ field, message: 'Process launch requires a non-empty "command"' });
  }

  if (raw.gracePeriodMs !== undefined) launch.gracePeriodMs = raw.gracePeriodMs;
  if (raw.healthCheckTimeoutMs !== undefined) {
    launch.healthCheckTimeoutMs = raw.healthCheckTimeoutMs;
  }
  return launch;
}

function normalizePorts(
  raw: Array<number | string>,
  field: string,
  errors: ValidationMessage[],
): PortBinding[] {
  const ports: PortBinding[] = [];
  raw.forEach((value, i) => {
    try {
      ports.push(parsePortBinding(value));
    } catch (err) {
      errors.push({ field: `${field}[${i}]`, message: errorMessage(err) });
    }
  });

  const seen = new Set<number>();
  for (const port of ports) {
    if (seen.has(port.hostPort)) {
      errors.push({ field, message: `Host port ${port.hostPort} is published more than once` });
    }
    seen.add(port.hostPort);
  }
  return ports;
}

function normalizeStage(
  raw: RawStage,
  index: number,
  isFinal: boolean,
  baseDir: string,
  errors: ValidationMessage[],
): StageSpec {
  const field = `stages[${index}]`;
  const commands = raw.commands ?? [];

  if (raw.launch !== undefined && !isFinal) {
    errors.push({
      field: `${field}.launch`,
      message: `Only the final stage may declare "launch" (found on "${raw.name}")`,
    });
  }
  if (raw.launch === undefined && commands.length === 0) {
    errors.push({
      field: `${field}.commands`,
      message: `Build stage "${raw.name}" must declare at least one command`,
    });
  }

  const stage: StageSpec = {
    name: raw.name,
    image: raw.image,
    workdir: normalizeContainerPath(raw.workdir ?? '/'),
    env: { ...raw.env },
    inputs: (raw.inputs ?? []).map((input) => ({
      from: resolve(baseDir, input.from),
      to: normalizeContainerPath(input.to),
      exclude: [...(input.exclude ?? [])],
    })),
    commands: [...commands],
    artifacts: [...new Set((raw.artifacts ?? []).map(normalizeContainerPath))],
    ports: normalizePorts(raw.ports ?? [], `${field}.ports`, errors),
  };

  if (raw.launch !== undefined) {
    stage.launch = normalizeLaunch(raw.launch, `${field}.launch`, errors);
  }
  return stage;
}

function normalizeTransfers(
  doc: RawPipelineDocument,
  stageIndex: ReadonlyMap<string, number>,
  errors: ValidationMessage[],
): TransferEdge[] {
  const edges: TransferEdge[] = [];

  (doc.transfers ?? []).forEach((raw, i) => {
    const field = `transfers[${i}]`;
    let edge: TransferEdge;
    try {
      edge = { source: parseArtifactRef(raw.from), dest: parseArtifactRef(raw.to) };
    } catch (err) {
      errors.push({ field, message: errorMessage(err) });
      return;
    }

    const from = stageIndex.get(edge.source.stage);
    const to = stageIndex.get(edge.dest.stage);
    if (from === undefined) {
      errors.push({ field: `${field}.from`, message: `Unknown stage "${edge.source.stage}"` });
    }
    if (to === undefined) {
      errors.push({ field: `${field}.to`, message: `Unknown stage "${edge.dest.stage}"` });
    }
    if (from !== undefined && to !== undefined && from >= to) {
      errors.push({
        field,
        message: `Transfer must flow to a later stage ("${edge.source.stage}" -> "${edge.dest.stage}")`,
      });
    }
    edges.push(edge);
  });

  return edges;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate and normalize an already-parsed pipeline document.
 *
 * @param baseDir - Directory that relative stage input paths resolve against.
 */
export function validatePipelineDocument(raw: unknown, baseDir: string): LoadResult {
  if (!validateDocument(raw)) {
    const errors = (validateDocument.errors ?? []).map(describeSchemaError);
    return { ok: false, errors };
  }

  const errors: ValidationMessage[] = [];
  const stageIndex = new Map<string, number>();

  raw.stages.forEach((stage, i) => {
    if (stageIndex.has(stage.name)) {
      errors.push({ field: `stages[${i}].name`, message: `Duplicate stage name: "${stage.name}"` });
    } else {
      stageIndex.set(stage.name, i);
    }
  });

  const stages = raw.stages.map((stage, i) =>
    normalizeStage(stage, i, i === raw.stages.length - 1, baseDir, errors),
  );
  const transfers = normalizeTransfers(raw, stageIndex, errors);

  if (errors.length > 0) {
    return { ok: false, errors };
  }
  return { ok: true, pipeline: { name: raw.name, baseDir, stages, transfers } };
}

/** Read, parse and validate a pipeline file. */
export function loadPipeline(filePath: string, deps: PipelineLoaderDeps = defaultDeps): LoadResult {
  const absolute = resolve(filePath);

  let text: string;
  try {
    text = deps.readFile(absolute);
  } catch (err) {
    return {
      ok: false,
      errors: [{ field: filePath, message: `Cannot read pipeline file: ${errorMessage(err)}` }],
    };
  }

  let raw: unknown;
  try {
    raw = parsePipelineText(text, absolute);
  } catch (err) {
    return {
      ok: false,
      errors: [{ field: filePath, message: `Invalid syntax: ${errorMessage(err)}` }],
    };
  }

  return validatePipelineDocument(raw, dirname(absolute));
}

/** Render validation messages one per line, `[field] message`. */
export function formatValidationErrors(errors: readonly ValidationMessage[]): string {
  return errors.map((e) => `[${e.field}] ${e.message}`).join('\n');
}

/**
 * Like {@link loadPipeline}, but throws an InvalidPipeline PipelineError
 * listing every problem.
 */
export function loadPipelineOrThrow(
  filePath: string,
  deps: PipelineLoaderDeps = defaultDeps,
): PipelineDefinition {
  const result = loadPipeline(filePath, deps);
  if (!result.ok) {
    throw new PipelineError({
      kind: FailureKind.InvalidPipeline,
      message: `Invalid pipeline ${filePath}:\n${formatValidationErrors(result.errors)}`,
    });
  }
  return result.pipeline;
}
