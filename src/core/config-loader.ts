/**
 * TOML-based configuration loader for stagecraft.
 *
 * Reads `config.toml` from `$STAGECRAFT_HOME`, parses it with smol-toml,
 * validates it and returns a fully typed `StagecraftConfig`.
 */

import { parse as parseTOML } from 'smol-toml';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parseConfig, DEFAULT_CONFIG, type StagecraftConfig } from '../types/config.js';

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate `config.toml` from a stagecraft home directory.
 *
 * If `config.toml` does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or validation errors.
 */
export function loadConfig(home: string): StagecraftConfig {
  const configPath = join(home, 'config.toml');

  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return { ...DEFAULT_CONFIG };
  }

  return parseConfig(parseTOML(content));
}
