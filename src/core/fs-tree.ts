/**
 * Host filesystem helpers for moving file trees in and out of containers.
 *
 * Trees are flat maps keyed by POSIX relative path. Only regular files
 * are collected; symlinks, sockets and empty directories are skipped.
 */

import { existsSync, lstatSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join, posix } from 'node:path';

/** Options for {@link readHostTree}. */
export interface ReadTreeOptions {
  /** Basenames skipped at any depth (e.g. `.git`, `node_modules`). */
  exclude?: readonly string[];
}

/**
 * Read every regular file at or below `root`.
 *
 * When `root` is itself a file, the result has a single entry keyed by
 * its basename. Returns `null` when `root` does not exist.
 */
export function readHostTree(root: string, options?: ReadTreeOptions): Map<string, Buffer> | null {
  if (!existsSync(root)) return null;

  const exclude = new Set(options?.exclude ?? []);
  const files = new Map<string, Buffer>();
  const stat = lstatSync(root);

  if (stat.isFile()) {
    files.set(posix.basename(root), readFileSync(root));
    return files;
  }
  if (!stat.isDirectory()) return files;

  const walk = (dir: string, prefix: string): void => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
    );
    for (const entry of entries) {
      if (exclude.has(entry.name)) continue;
      const hostPath = join(dir, entry.name);
      const relPath = prefix === '' ? entry.name : `${prefix}/${entry.name}`;
      if (entry.isDirectory()) {
        walk(hostPath, relPath);
      } else if (entry.isFile()) {
        files.set(relPath, readFileSync(hostPath));
      }
    }
  };

  walk(root, '');
  return files;
}

/**
 * Write a flat file map below `root`, creating parent directories.
 * Keys are POSIX relative paths.
 */
export function writeHostTree(root: string, files: ReadonlyMap<string, Uint8Array>): void {
  mkdirSync(root, { recursive: true });
  for (const [relPath, bytes] of files) {
    const target = join(root, ...relPath.split('/'));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, bytes);
  }
}
