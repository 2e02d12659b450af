/**
 * Immutable, content-addressed set of files produced by one stage.
 *
 * Keys are container paths without their leading `/` (`out/app.bin`),
 * kept in sorted order so iteration, digests and on-disk exports are
 * deterministic. Bytes are copied on the way in and on the way out, so a
 * set never aliases a buffer owned by someone else.
 */

import { createHash } from 'node:crypto';
import { isWithinPath, normalizeContainerPath } from '../types/pipeline.js';

function copyBytes(bytes: Uint8Array): Uint8Array {
  return Uint8Array.from(bytes);
}

/** `/out/app.bin` → `out/app.bin`; `/` → `''`. */
export function toRelativePath(containerPath: string): string {
  return normalizeContainerPath(containerPath).slice(1);
}

/** `out/app.bin` → `/out/app.bin`. */
export function toContainerPath(relativePath: string): string {
  return `/${relativePath}`;
}

export class ArtifactSet {
  private readonly files: ReadonlyMap<string, Uint8Array>;
  private cachedDigest: string | undefined;

  private constructor(files: Map<string, Uint8Array>) {
    const sorted = [...files.keys()].sort();
    this.files = new Map(sorted.map((key) => [key, copyBytes(files.get(key) ?? new Uint8Array())]));
  }

  /** A set with no files. */
  static empty(): ArtifactSet {
    return new ArtifactSet(new Map());
  }

  /** Build a set from files keyed by absolute container path. */
  static fromContainerFiles(files: ReadonlyMap<string, Uint8Array>): ArtifactSet {
    const relative = new Map<string, Uint8Array>();
    for (const [path, bytes] of files) {
      relative.set(toRelativePath(path), bytes);
    }
    return new ArtifactSet(relative);
  }

  /** Build a set from files keyed by relative path. */
  static fromEntries(entries: Iterable<readonly [string, Uint8Array]>): ArtifactSet {
    const files = new Map<string, Uint8Array>();
    for (const [path, bytes] of entries) {
      files.set(toRelativePath(toContainerPath(path)), bytes);
    }
    return new ArtifactSet(files);
  }

  get size(): number {
    return this.files.size;
  }

  /** Sorted relative paths. */
  paths(): string[] {
    return [...this.files.keys()];
  }

  has(relativePath: string): boolean {
    return this.files.has(relativePath);
  }

  /** A copy of the file's bytes, or `undefined`. */
  get(relativePath: string): Uint8Array | undefined {
    const bytes = this.files.get(relativePath);
    return bytes === undefined ? undefined : copyBytes(bytes);
  }

  /** Sorted `[relativePath, bytes]` pairs; bytes are copies. */
  *entries(): IterableIterator<[string, Uint8Array]> {
    for (const [path, bytes] of this.files) {
      yield [path, copyBytes(bytes)];
    }
  }

  /** Entries at or below an absolute container path. */
  under(containerPath: string): Array<[string, Uint8Array]> {
    const root = normalizeContainerPath(containerPath);
    const result: Array<[string, Uint8Array]> = [];
    for (const [path, bytes] of this.entries()) {
      if (isWithinPath(toContainerPath(path), root)) {
        result.push([path, bytes]);
      }
    }
    return result;
  }

  /** Files keyed by absolute container path, ready to write into a container. */
  toContainerFiles(): Map<string, Uint8Array> {
    const result = new Map<string, Uint8Array>();
    for (const [path, bytes] of this.entries()) {
      result.set(toContainerPath(path), bytes);
    }
    return result;
  }

  /** Total payload size in bytes. */
  totalBytes(): number {
    let total = 0;
    for (const bytes of this.files.values()) total += bytes.byteLength;
    return total;
  }

  /**
   * SHA-256 over the sorted `(path, length, bytes)` sequence, hex encoded.
   * Two sets with the same paths and bytes have the same digest.
   */
  digest(): string {
    if (this.cachedDigest === undefined) {
      const hash = createHash('sha256');
      for (const [path, bytes] of this.files) {
        hash.update(`${path}\0${bytes.byteLength}\0`);
        hash.update(bytes);
      }
      this.cachedDigest = hash.digest('hex');
    }
    return this.cachedDigest;
  }

  /** True when both sets hold the same paths with the same bytes. */
  equals(other: ArtifactSet): boolean {
    return this.digest() === other.digest();
  }
}
