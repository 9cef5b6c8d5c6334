/**
 * Immediate dominators (iterative Cooper–Harvey–Kennedy).
 *
 * Node d dominates n when every path from the root to n passes through d.
 * Only nodes reachable from the root get an entry.
 */

import type { ReadonlyDirectedGraph } from '../types.js';

/**
 * Maps every node reachable from `root` to its immediate dominator.
 * The root maps to null. An unknown root yields an empty map.
 */
export function computeImmediateDominators<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  root: TNode,
): Map<TNode, TNode | null> {
  const result = new Map<TNode, TNode | null>();
  if (!graph.hasNode(root)) return result;

  const keyOf = graph.keyOf;

  // Postorder numbering via an explicit stack
  const order: TNode[] = [];
  const postIndex = new Map<unknown, number>();
  const visited = new Set<unknown>([keyOf(root)]);
  const stack: { node: TNode; successors: TNode[]; next: number }[] = [
    { node: root, successors: graph.getSuccessors(root), next: 0 },
  ];

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.next < frame.successors.length) {
      const succ = frame.successors[frame.next++];
      const k = keyOf(succ);
      if (!visited.has(k)) {
        visited.add(k);
        stack.push({ node: succ, successors: graph.getSuccessors(succ), next: 0 });
      }
      continue;
    }
    stack.pop();
    postIndex.set(keyOf(frame.node), order.length);
    order.push(frame.node);
  }

  const rootKey = keyOf(root);
  const idom = new Map<unknown, TNode>([[rootKey, root]]);

  const intersect = (a: TNode, b: TNode): TNode => {
    let fingerA = a;
    let fingerB = b;
    let indexA = postIndex.get(keyOf(fingerA)) ?? -1;
    let indexB = postIndex.get(keyOf(fingerB)) ?? -1;
    while (indexA !== indexB) {
      while (indexA < indexB) {
        fingerA = idom.get(keyOf(fingerA)) ?? root;
        indexA = postIndex.get(keyOf(fingerA)) ?? -1;
      }
      while (indexB < indexA) {
        fingerB = idom.get(keyOf(fingerB)) ?? root;
        indexB = postIndex.get(keyOf(fingerB)) ?? -1;
      }
    }
    return fingerA;
  };

  const reversePostorder = [...order].reverse();
  let changed = true;

  while (changed) {
    changed = false;
    for (const node of reversePostorder) {
      const k = keyOf(node);
      if (k === rootKey) continue;

      let newIdom: TNode | undefined;
      for (const pred of graph.getPredecessors(node)) {
        if (!idom.has(keyOf(pred))) continue;
        newIdom = newIdom === undefined ? pred : intersect(pred, newIdom);
      }

      if (newIdom === undefined) continue;
      const current = idom.get(k);
      if (current === undefined || keyOf(current) !== keyOf(newIdom)) {
        idom.set(k, newIdom);
        changed = true;
      }
    }
  }

  for (const node of reversePostorder) {
    const k = keyOf(node);
    result.set(node, k === rootKey ? null : idom.get(k) ?? null);
  }
  return result;
}

/**
 * The chain of dominators from the root down to `target` (inclusive).
 * Empty when `target` is not in the dominator map.
 */
export function dominatorChain<TNode>(
  idoms: ReadonlyMap<TNode, TNode | null>,
  target: TNode,
): TNode[] {
  if (!idoms.has(target)) return [];

  const chain: TNode[] = [];
  const seen = new Set<TNode>();
  let current: TNode | null | undefined = target;

  while (current !== null && current !== undefined && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = idoms.get(current);
  }
  return chain.reverse();
}
