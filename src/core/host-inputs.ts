/**
 * Host inputs: files copied from the host into a stage before its
 * commands run.
 *
 * A directory input is copied recursively below its `to` path; a file
 * input lands at `to` itself. Later inputs overwrite paths an earlier one
 * delivered.
 */

import { lstatSync } from 'node:fs';
import { posix } from 'node:path';
import type { StageInput } from '../types/pipeline.js';
import { readHostTree } from './fs-tree.js';

export class MissingInputError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Stage input "${path}" does not exist`);
    this.name = 'MissingInputError';
    this.path = path;
  }
}

/**
 * Read every input into a map keyed by absolute container path.
 *
 * @throws MissingInputError when an input's host path does not exist.
 */
export function collectHostInputs(inputs: readonly StageInput[]): Map<string, Uint8Array> {
  const files = new Map<string, Uint8Array>();

  for (const input of inputs) {
    const tree = readHostTree(input.from, { exclude: input.exclude });
    if (tree === null) {
      throw new MissingInputError(input.from);
    }

    if (lstatSync(input.from).isFile()) {
      for (const bytes of tree.values()) {
        files.set(input.to, bytes);
      }
      continue;
    }

    for (const [relPath, bytes] of tree) {
      files.set(posix.join(input.to, relPath), bytes);
    }
  }

  return files;
}
