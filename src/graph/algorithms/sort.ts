/**
 * Topological ordering and cycle detection (Kahn's algorithm).
 */

import { GraphCycleError } from '../errors.js';
import type { ReadonlyDirectedGraph } from '../types.js';

/**
 * Returns the nodes in a topological order. Ties are broken by node-set
 * order, then by edge order.
 *
 * @throws GraphCycleError when the graph has at least one directed cycle
 */
export function topologicalSort<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
): TNode[] {
  const inDegree = new Map<unknown, number>();
  const queue: TNode[] = [];

  for (const node of graph.nodes) {
    const degree = graph.inDegree(node);
    inDegree.set(graph.keyOf(node), degree);
    if (degree === 0) queue.push(node);
  }

  const result: TNode[] = [];
  let head = 0;

  while (head < queue.length) {
    const node = queue[head++];
    result.push(node);

    for (const succ of graph.getSuccessors(node)) {
      const k = graph.keyOf(succ);
      const remaining = (inDegree.get(k) ?? 0) - 1;
      inDegree.set(k, remaining);
      if (remaining === 0) queue.push(succ);
    }
  }

  if (result.length !== graph.nodes.length) {
    throw new GraphCycleError();
  }

  return result;
}

export function hasCycle<TNode, TLabel>(graph: ReadonlyDirectedGraph<TNode, TLabel>): boolean {
  try {
    topologicalSort(graph);
    return false;
  } catch (err) {
    if (err instanceof GraphCycleError) {
      return true;
    }
    throw err;
  }
}
