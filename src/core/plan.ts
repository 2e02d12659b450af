/**
 * Execution planning: the order stages run in.
 *
 * Stages form a DAG whose edges are the implicit sequence (declaration
 * order) plus the declared transfer edges. The plan is a topological
 * order computed with Kahn's algorithm; ties are broken by declaration
 * index so the order is deterministic and, for a valid pipeline, equal to
 * the declaration order.
 */

import type { PipelineDefinition, StageSpec } from '../types/pipeline.js';

/** One planned step. `index` is the stage's position in the declaration. */
export interface PlannedStage {
  index: number;
  stage: StageSpec;
}

/** Thrown when the stage graph is not acyclic. */
export class PlanCycleError extends Error {
  readonly stages: string[];

  constructor(stages: string[]) {
    super(`Stage graph has a cycle involving: ${stages.join(', ')}`);
    this.name = 'PlanCycleError';
    this.stages = stages;
  }
}

/**
 * Compute a topological order over `stages`.
 *
 * @param edges - Extra `[from, to]` dependencies by stage name, on top of
 *   the sequence edges between consecutive stages.
 * @throws PlanCycleError if the graph has a cycle.
 */
export function topologicalOrder(
  stages: readonly StageSpec[],
  edges: ReadonlyArray<readonly [string, string]>,
  options?: { sequential?: boolean },
): PlannedStage[] {
  const sequential = options?.sequential ?? true;
  const indexByName = new Map(stages.map((stage, index) => [stage.name, index]));
  const successors: number[][] = stages.map(() => []);
  const inDegree: number[] = stages.map(() => 0);

  const addEdge = (from: number, to: number): void => {
    successors[from].push(to);
    inDegree[to] += 1;
  };

  if (sequential) {
    for (let i = 1; i < stages.length; i++) addEdge(i - 1, i);
  }
  for (const [fromName, toName] of edges) {
    const from = indexByName.get(fromName);
    const to = indexByName.get(toName);
    if (from === undefined || to === undefined) {
      throw new Error(`Unknown stage in dependency "${fromName}" -> "${toName}"`);
    }
    addEdge(from, to);
  }

  // Ready queue kept sorted by declaration index.
  const ready: number[] = [];
  inDegree.forEach((degree, index) => {
    if (degree === 0) ready.push(index);
  });

  const order: PlannedStage[] = [];
  while (ready.length > 0) {
    ready.sort((a, b) => a - b);
    const next = ready.shift();
    if (next === undefined) break;
    order.push({ index: next, stage: stages[next] });
    for (const succ of successors[next]) {
      inDegree[succ] -= 1;
      if (inDegree[succ] === 0) ready.push(succ);
    }
  }

  if (order.length !== stages.length) {
    const stuck = stages.filter((_stage, index) => inDegree[index] > 0).map((s) => s.name);
    throw new PlanCycleError(stuck);
  }
  return order;
}

/** Execution plan for a loaded pipeline. */
export function planPipeline(pipeline: PipelineDefinition): PlannedStage[] {
  return topologicalOrder(
    pipeline.stages,
    pipeline.transfers.map((edge) => [edge.source.stage, edge.dest.stage] as const),
  );
}

/**
 * Truncate a plan after the named stage.
 * @throws If no stage has that name.
 */
export function planUntil(plan: readonly PlannedStage[], until: string): PlannedStage[] {
  const position = plan.findIndex((step) => step.stage.name === until);
  if (position < 0) {
    throw new Error(`Unknown stage "${until}"`);
  }
  return plan.slice(0, position + 1);
}
