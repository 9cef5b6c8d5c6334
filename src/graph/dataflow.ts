/**
 * Forward dataflow analysis over entity introduce/remove sets.
 *
 * computeMustIntroducedSets() answers "which entities are guaranteed to have
 * been introduced on every path from the start node to this node". It is a
 * classic worklist fixed-point solver:
 *
 *   meet      = intersection of predecessor sets (skipping dangling ids)
 *   transfer  = (meet ∪ introduced) − removed   (remove applied last)
 *
 * computeMayIntroducedSets() is the companion "on at least one path"
 * analysis: same worklist, union as meet.
 *
 * Only nodes scheduled from the start (directly or through a changed
 * predecessor) are ever evaluated. Nodes outside that region keep their
 * initial empty set. That is the intended scope: the result is relative to
 * `startId`, not a whole-graph fixpoint.
 */

import { debug } from '../shared/debug.js';
import { InvalidStartNodeError } from './errors.js';
import type { ReadonlyDirectedGraph } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface DataFlowNode<TEntity> {
  readonly id: string;
  readonly predecessorIds: readonly string[];
  readonly successorIds: readonly string[];
  readonly introducedEntities: ReadonlySet<TEntity>;
  readonly removedEntities: ReadonlySet<TEntity>;
}

export type DataFlowNodes<TEntity> = ReadonlyMap<string, DataFlowNode<TEntity>>;

type Meet<TEntity> = (acc: Set<TEntity>, next: ReadonlySet<TEntity>) => void;

// =============================================================================
// Set Helpers
// =============================================================================

function intersectInto<T>(acc: Set<T>, next: ReadonlySet<T>): void {
  for (const item of acc) {
    if (!next.has(item)) acc.delete(item);
  }
}

function unionInto<T>(acc: Set<T>, next: ReadonlySet<T>): void {
  for (const item of next) acc.add(item);
}

export function setEquals<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
  if (a === b) return true;
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

/**
 * Local transfer function: (incoming ∪ introduced) − removed.
 * Mutates and returns `incoming`.
 */
function transfer<T>(incoming: Set<T>, node: DataFlowNode<T>): Set<T> {
  unionInto(incoming, node.introducedEntities);
  for (const item of node.removedEntities) incoming.delete(item);
  return incoming;
}

// =============================================================================
// Solver
// =============================================================================

function solve<TEntity>(
  nodes: DataFlowNodes<TEntity>,
  startId: string,
  meet: Meet<TEntity>,
): Map<string, Set<TEntity>> {
  const startNode = nodes.get(startId);
  if (startNode === undefined) {
    throw new InvalidStartNodeError(startId);
  }

  const result = new Map<string, Set<TEntity>>();
  for (const id of nodes.keys()) {
    result.set(id, new Set());
  }
  result.set(startId, transfer(new Set(), startNode));

  const worklist: string[] = [startId];
  for (const succId of startNode.successorIds) {
    if (nodes.has(succId)) worklist.push(succId);
  }
  const inQueue = new Set(worklist);

  let head = 0;
  let evaluations = 0;

  while (head < worklist.length) {
    const id = worklist[head++];
    inQueue.delete(id);

    const node = nodes.get(id);
    if (node === undefined) continue;
    evaluations++;

    let next: Set<TEntity>;
    if (node.predecessorIds.length === 0) {
      // Start reuses its seed; any other predecessor-less node only
      // guarantees its own local introductions
      next = transfer(new Set(), id === startId ? startNode : node);
    } else {
      let acc: Set<TEntity> | null = null;
      for (const predId of node.predecessorIds) {
        const predSet = result.get(predId);
        if (predSet === undefined) continue;

        if (acc === null) {
          acc = new Set(predSet);
        } else {
          meet(acc, predSet);
        }
      }
      next = transfer(acc ?? new Set(), node);
    }

    const previous = result.get(id);
    if (previous !== undefined && setEquals(previous, next)) continue;

    result.set(id, next);
    for (const succId of node.successorIds) {
      if (!nodes.has(succId) || inQueue.has(succId)) continue;
      worklist.push(succId);
      inQueue.add(succId);
    }
  }

  debug('dataflow', 'Fixed point reached', { nodes: nodes.size, evaluations });
  return result;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Computes, for each node, the set of entities that must have been
 * introduced on all paths from `startId` to that node.
 *
 * @throws InvalidStartNodeError when `startId` is not a key of `nodes`
 */
export function computeMustIntroducedSets<TEntity>(
  nodes: DataFlowNodes<TEntity>,
  startId: string,
): Map<string, Set<TEntity>> {
  return solve(nodes, startId, intersectInto);
}

/**
 * Computes, for each node, the set of entities introduced on at least one
 * path from `startId` and not removed afterwards on that path.
 *
 * @throws InvalidStartNodeError when `startId` is not a key of `nodes`
 */
export function computeMayIntroducedSets<TEntity>(
  nodes: DataFlowNodes<TEntity>,
  startId: string,
): Map<string, Set<TEntity>> {
  return solve(nodes, startId, unionInto);
}

/**
 * Builds the dataflow node mapping for a string-keyed graph. Predecessor and
 * successor lists follow the graph's edges (one entry per edge).
 */
export function dataFlowNodesFromGraph<TLabel, TEntity>(
  graph: ReadonlyDirectedGraph<string, TLabel>,
  introduced: (nodeId: string) => Iterable<TEntity>,
  removed: (nodeId: string) => Iterable<TEntity>,
): Map<string, DataFlowNode<TEntity>> {
  const nodes = new Map<string, DataFlowNode<TEntity>>();
  for (const id of graph.nodes) {
    nodes.set(id, {
      id,
      predecessorIds: graph.getPredecessors(id),
      successorIds: graph.getSuccessors(id),
      introducedEntities: new Set(introduced(id)),
      removedEntities: new Set(removed(id)),
    });
  }
  return nodes;
}
