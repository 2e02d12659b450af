/**
 * Artifact transfer: wiring one stage's outputs into a later stage.
 *
 * Transfers are pure copies. Every entry at or below the edge's source
 * path in the source stage's ArtifactSet is re-rooted under the
 * destination path; bytes are never shared between sets.
 */

import { posix } from 'node:path';
import { FailureKind } from '../types/errors.js';
import {
  formatArtifactRef,
  isWithinPath,
  type PipelineDefinition,
  type TransferEdge,
} from '../types/pipeline.js';
import type { ArtifactSet } from './artifact-set.js';
import { toContainerPath } from './artifact-set.js';
import { PipelineError } from './pipeline-error.js';

function describeEdge(edge: TransferEdge): string {
  return `"${formatArtifactRef(edge.source)}" -> "${formatArtifactRef(edge.dest)}"`;
}

/**
 * Reject edges whose source path is neither a declared artifact of the
 * source stage nor inside one. Runs before any stage executes.
 *
 * @throws PipelineError (UnresolvedTransfer) attributed to the destination stage.
 */
export function checkTransfers(pipeline: PipelineDefinition): void {
  for (const edge of pipeline.transfers) {
    const source = pipeline.stages.find((s) => s.name === edge.source.stage);
    const declared = source?.artifacts ?? [];
    if (declared.some((artifact) => isWithinPath(edge.source.path, artifact))) {
      continue;
    }

    const stageIndex = pipeline.stages.findIndex((s) => s.name === edge.dest.stage);
    throw new PipelineError({
      kind: FailureKind.UnresolvedTransfer,
      message: `Transfer ${describeEdge(edge)}: "${edge.source.path}" is not a declared artifact of stage "${edge.source.stage}"`,
      stage: edge.dest.stage,
      stageIndex: stageIndex >= 0 ? stageIndex : undefined,
    });
  }
}

/**
 * Build the files delivered to `destStage` by every edge that targets it,
 * keyed by absolute container path. Edges apply in declaration order; a
 * later edge overwrites a path an earlier one delivered.
 *
 * @throws PipelineError (UnresolvedTransfer) when a source stage has not
 *   completed or its ArtifactSet holds nothing at the source path.
 */
export function resolveTransfers(
  edges: readonly TransferEdge[],
  destStage: string,
  completed: ReadonlyMap<string, ArtifactSet>,
): Map<string, Uint8Array> {
  const files = new Map<string, Uint8Array>();

  for (const edge of edges) {
    if (edge.dest.stage !== destStage) continue;

    const sourceSet = completed.get(edge.source.stage);
    if (!sourceSet) {
      throw new PipelineError({
        kind: FailureKind.UnresolvedTransfer,
        message: `Transfer ${describeEdge(edge)}: stage "${edge.source.stage}" has not completed`,
        stage: destStage,
      });
    }

    const entries = sourceSet.under(edge.source.path);
    if (entries.length === 0) {
      throw new PipelineError({
        kind: FailureKind.UnresolvedTransfer,
        message: `Transfer ${describeEdge(edge)}: stage "${edge.source.stage}" produced nothing at "${edge.source.path}"`,
        stage: destStage,
      });
    }

    for (const [relativePath, bytes] of entries) {
      const sourcePath = toContainerPath(relativePath);
      const suffix = edge.source.path === '/' ? sourcePath : sourcePath.slice(edge.source.path.length);
      files.set(posix.join(edge.dest.path, suffix), bytes);
    }
  }

  return files;
}

/**
 * Drop every ArtifactSet in `completed` that no edge into a stage still to
 * run reads from.
 */
export function releaseConsumed(
  edges: readonly TransferEdge[],
  completed: Map<string, ArtifactSet>,
  remaining: ReadonlySet<string>,
): void {
  for (const source of [...completed.keys()]) {
    const needed = edges.some((edge) => edge.source.stage === source && remaining.has(edge.dest.stage));
    if (!needed) completed.delete(source);
  }
}
