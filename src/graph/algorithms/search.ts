/**
 * Graph traversals. Each node is visited at most once (by the graph's key).
 */

import type { ReadonlyDirectedGraph } from '../types.js';

export function* breadthFirst<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  startNodes: Iterable<TNode>,
): Generator<TNode> {
  const visited = new Set<unknown>();
  const queue: TNode[] = [];

  for (const start of startNodes) {
    const k = graph.keyOf(start);
    if (!visited.has(k)) {
      visited.add(k);
      queue.push(start);
    }
  }

  let head = 0;
  while (head < queue.length) {
    const node = queue[head++];
    yield node;

    for (const succ of graph.getSuccessors(node)) {
      const k = graph.keyOf(succ);
      if (!visited.has(k)) {
        visited.add(k);
        queue.push(succ);
      }
    }
  }
}

/**
 * Stack-based depth-first traversal. Nodes are marked visited when pushed,
 * so the order is "last discovered first", not recursive pre-order.
 */
export function* depthFirst<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  startNodes: Iterable<TNode>,
): Generator<TNode> {
  const visited = new Set<unknown>();
  const stack: TNode[] = [];

  for (const start of startNodes) {
    const k = graph.keyOf(start);
    if (!visited.has(k)) {
      visited.add(k);
      stack.push(start);
    }
  }

  let node = stack.pop();
  while (node !== undefined) {
    yield node;

    for (const succ of graph.getSuccessors(node)) {
      const k = graph.keyOf(succ);
      if (!visited.has(k)) {
        visited.add(k);
        stack.push(succ);
      }
    }
    node = stack.pop();
  }
}
