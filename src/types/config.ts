/**
 * stagecraft configuration schema and STAGECRAFT_HOME resolution.
 *
 * Defines the TypeScript types for config.toml sections, the
 * $STAGECRAFT_HOME resolution algorithm, and the directory structure
 * contract.
 */

import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { LogLevel } from '../core/logger.js';

// ---------------------------------------------------------------------------
// Container engine union
// ---------------------------------------------------------------------------

/** Supported container runtime engines. */
export type ContainerEngine = 'docker' | 'podman';

const VALID_ENGINES: ReadonlySet<string> = new Set<ContainerEngine>(['docker', 'podman']);

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<LogLevel>(['debug', 'info', 'warn', 'error']);

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[runtime]` section of config.toml. */
export interface RuntimeSection {
  engine: ContainerEngine;
}

/** `[provision]` section: base-environment fetch retry policy. */
export interface ProvisionSection {
  retries: number;
  backoff_ms: number;
}

/** `[launch]` section: runtime launcher defaults. */
export interface LaunchSection {
  grace_period_ms: number;
  health_check_timeout_ms: number;
  host_address: string;
}

/** `[output]` section. */
export interface OutputSection {
  tail_lines: number;
}

/** `[logging]` section. */
export interface LoggingSection {
  level: LogLevel;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full stagecraft configuration.
 *
 * Known sections are strongly typed. Unknown top-level keys are
 * preserved as-is for forward compatibility.
 */
export interface StagecraftConfig {
  runtime: RuntimeSection;
  provision: ProvisionSection;
  launch: LaunchSection;
  output: OutputSection;
  logging: LoggingSection;
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: StagecraftConfig = {
  runtime: { engine: 'docker' },
  provision: { retries: 3, backoff_ms: 1_000 },
  launch: { grace_period_ms: 10_000, health_check_timeout_ms: 30_000, host_address: '127.0.0.1' },
  output: { tail_lines: 20 },
  logging: { level: 'info' },
};

const KNOWN_SECTIONS = ['runtime', 'provision', 'launch', 'output', 'logging'];

// ---------------------------------------------------------------------------
// resolveHome()
// ---------------------------------------------------------------------------

/**
 * Resolve the stagecraft home directory.
 *
 * Precedence:
 *  1. `$STAGECRAFT_HOME` environment variable (if non-empty)
 *  2. `~/.stagecraft/` default
 *
 * Trailing slashes are stripped. A leading `~` is expanded to the
 * user's home directory.
 */
export function resolveHome(env: NodeJS.ProcessEnv = process.env): string {
  const envValue = env['STAGECRAFT_HOME'];
  if (envValue && envValue.length > 0) {
    let resolved = envValue;
    if (resolved.startsWith('~/') || resolved === '~') {
      resolved = join(homedir(), resolved.slice(2));
    }
    if (resolved.length > 1 && resolved.endsWith('/')) {
      resolved = resolved.slice(0, -1);
    }
    return resolved;
  }
  return join(homedir(), '.stagecraft');
}

// ---------------------------------------------------------------------------
// Directory structure
// ---------------------------------------------------------------------------

/** All subdirectories that must exist under `$STAGECRAFT_HOME`. */
export const STAGECRAFT_SUBDIRS = ['data', 'logs', 'artifacts'] as const;

/** Result of `ensureDirectoryStructure()` with resolved paths. */
export interface DirectoryStructure {
  root: string;
  data: string;
  logs: string;
  artifacts: string;
  configFile: string;
}

/**
 * Create the `$STAGECRAFT_HOME` directory tree.
 *
 * Idempotent.
 */
export function ensureDirectoryStructure(root: string): DirectoryStructure {
  mkdirSync(root, { recursive: true });
  for (const subdir of STAGECRAFT_SUBDIRS) {
    mkdirSync(join(root, subdir), { recursive: true });
  }

  return {
    root,
    data: join(root, 'data'),
    logs: join(root, 'logs'),
    artifacts: join(root, 'artifacts'),
    configFile: join(root, 'config.toml'),
  };
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

function readInteger(
  table: Record<string, unknown>,
  key: string,
  fallback: number,
  label: string,
  min: number,
): number {
  const value = table[key] ?? fallback;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new Error(`${label} must be an integer >= ${min}`);
  }
  return value;
}

function readString(
  table: Record<string, unknown>,
  key: string,
  fallback: string,
  label: string,
): string {
  const value = table[key] ?? fallback;
  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${label} must be a non-empty string`);
  }
  return value;
}

function isContainerEngine(value: string): value is ContainerEngine {
  return VALID_ENGINES.has(value);
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LOG_LEVELS.has(value);
}

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into
 * a fully typed `StagecraftConfig`. Applies defaults for missing sections
 * and validates known fields.
 */
export function parseConfig(raw: Record<string, unknown>): StagecraftConfig {
  const unknownSections: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      unknownSections[key] = raw[key];
    }
  }

  // --- runtime ---
  const engine = readString(
    section(raw, 'runtime'),
    'engine',
    DEFAULT_CONFIG.runtime.engine,
    'runtime.engine',
  );
  if (!isContainerEngine(engine)) {
    throw new Error(
      `Invalid runtime.engine: "${engine}". Must be one of: ${[...VALID_ENGINES].join(', ')}`,
    );
  }

  // --- provision ---
  const rawProvision = section(raw, 'provision');
  const provision: ProvisionSection = {
    retries: readInteger(
      rawProvision,
      'retries',
      DEFAULT_CONFIG.provision.retries,
      'provision.retries',
      0,
    ),
    backoff_ms: readInteger(
      rawProvision,
      'backoff_ms',
      DEFAULT_CONFIG.provision.backoff_ms,
      'provision.backoff_ms',
      0,
    ),
  };

  // --- launch ---
  const rawLaunch = section(raw, 'launch');
  const launch: LaunchSection = {
    grace_period_ms: readInteger(
      rawLaunch,
      'grace_period_ms',
      DEFAULT_CONFIG.launch.grace_period_ms,
      'launch.grace_period_ms',
      0,
    ),
    health_check_timeout_ms: readInteger(
      rawLaunch,
      'health_check_timeout_ms',
      DEFAULT_CONFIG.launch.health_check_timeout_ms,
      'launch.health_check_timeout_ms',
      1,
    ),
    host_address: readString(
      rawLaunch,
      'host_address',
      DEFAULT_CONFIG.launch.host_address,
      'launch.host_address',
    ),
  };

  // --- output ---
  const output: OutputSection = {
    tail_lines: readInteger(
      section(raw, 'output'),
      'tail_lines',
      DEFAULT_CONFIG.output.tail_lines,
      'output.tail_lines',
      1,
    ),
  };

  // --- logging ---
  const level = readString(
    section(raw, 'logging'),
    'level',
    DEFAULT_CONFIG.logging.level,
    'logging.level',
  );
  if (!isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${level}". Must be one of: ${[...VALID_LOG_LEVELS].join(', ')}`,
    );
  }

  return {
    ...unknownSections,
    runtime: { engine },
    provision,
    launch,
    output,
    logging: { level },
  };
}
