/**
 * Path enumeration and compression over directed graphs.
 *
 * Paths are arrays of nodes. Enumeration is iterative (explicit stack), so
 * path length is bounded by memory, not by call-stack depth.
 */

import { debug } from '../../shared/debug.js';
import { EdgePathReconstructionError } from '../errors.js';
import type { Edge, NodeKeyFn, ReadonlyDirectedGraph } from '../types.js';

// =============================================================================
// Enumeration
// =============================================================================

export interface EnumeratePathsOptions<TNode> {
  /** Default: nodes with no outgoing edges */
  isTerminal?: (node: TNode) => boolean;
  /** A node at this depth ends the path regardless of its successors */
  maxDepth?: number;
  /** Skip successors already on the current path */
  simplePaths?: boolean;
}

interface Frame<TNode> {
  node: TNode;
  successors: TNode[];
  next: number;
  depth: number;
}

/**
 * Enumerates paths from `start` depth-first, yielding the current path each
 * time it reaches a terminal node or the depth limit. Successors are
 * followed in edge order. Cycles are only cut with `simplePaths`; otherwise
 * the caller must supply `maxDepth` and stop taking paths after a budget,
 * since the number of bounded walks grows exponentially with depth. A
 * non-terminal node whose successors are all on the path yields nothing.
 */
export function* enumeratePaths<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  start: TNode,
  options: EnumeratePathsOptions<TNode> = {},
): Generator<TNode[]> {
  const isTerminal = options.isTerminal ?? ((node: TNode) => graph.outDegree(node) === 0);
  const { maxDepth } = options;
  const simple = options.simplePaths === true;

  const path: TNode[] = [start];
  const onPath = new Set<unknown>([graph.keyOf(start)]);
  const stack: Frame<TNode>[] = [
    { node: start, successors: graph.getSuccessors(start), next: 0, depth: 0 },
  ];

  const leave = (): void => {
    const frame = stack.pop();
    path.pop();
    if (simple && frame !== undefined) onPath.delete(graph.keyOf(frame.node));
  };

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    const depthLimitReached = maxDepth !== undefined && frame.depth >= maxDepth;
    if (depthLimitReached || isTerminal(frame.node)) {
      yield [...path];
      leave();
      continue;
    }

    if (frame.next >= frame.successors.length) {
      leave();
      continue;
    }

    const child = frame.successors[frame.next++];
    if (simple) {
      const childKey = graph.keyOf(child);
      if (onPath.has(childKey)) continue;
      onPath.add(childKey);
    }
    path.push(child);
    stack.push({ node: child, successors: graph.getSuccessors(child), next: 0, depth: frame.depth + 1 });
  }
}

/**
 * Enumerates simple paths (no repeated node) from `start` to `end`,
 * stopping after `maxPaths` paths. `start === end` yields the single
 * one-node path.
 */
export function enumeratePathsBetween<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  start: TNode,
  end: TNode,
  options: { maxPaths?: number } = {},
): TNode[][] {
  const maxPaths = options.maxPaths ?? Number.POSITIVE_INFINITY;
  const endKey = graph.keyOf(end);
  const results: TNode[][] = [];
  if (maxPaths <= 0) return results;

  const path: TNode[] = [start];
  const onPath = new Set<unknown>([graph.keyOf(start)]);
  const stack: Frame<TNode>[] = [
    { node: start, successors: graph.getSuccessors(start), next: 0, depth: 0 },
  ];

  while (stack.length > 0 && results.length < maxPaths) {
    const frame = stack[stack.length - 1];

    if (graph.keyOf(frame.node) === endKey) {
      results.push([...path]);
      stack.pop();
      onPath.delete(graph.keyOf(path[path.length - 1]));
      path.pop();
      continue;
    }

    if (frame.next >= frame.successors.length) {
      stack.pop();
      onPath.delete(graph.keyOf(path[path.length - 1]));
      path.pop();
      continue;
    }

    const child = frame.successors[frame.next++];
    const childKey = graph.keyOf(child);
    if (onPath.has(childKey)) continue;

    path.push(child);
    onPath.add(childKey);
    stack.push({ node: child, successors: graph.getSuccessors(child), next: 0, depth: frame.depth + 1 });
  }

  return results;
}

// =============================================================================
// Shared-Suffix Compression
// =============================================================================

interface TrieNode {
  children: Map<unknown, TrieNode>;
  ownerPathIndex: number;
}

function trieNode(): TrieNode {
  return { children: new Map(), ownerPathIndex: -1 };
}

/**
 * Compresses paths by removing redundant repeated suffixes.
 *
 * Paths are inserted reversed into a trie, so paths sharing a suffix share a
 * trie branch. When path `p` runs into a branch first claimed by an earlier
 * path at a join node (at least two shared nodes, and not the whole of `p`)
 * and the two paths differ somewhere before the join, `p` is cut right after
 * the join node: the remaining suffix was already covered. Paths whose kept
 * prefixes coincide are emitted once, in input order.
 */
export function compressBySharedSuffixes<TNode>(
  paths: readonly (readonly TNode[])[],
  key: NodeKeyFn<TNode> = (node) => node,
): TNode[][] {
  if (paths.length === 0) return [];

  const keepLength = paths.map((p) => p.length);
  const root = trieNode();

  paths.forEach((path, p) => {
    const len = path.length;
    let node = root;
    let matchedDepth = 0;

    for (let i = len - 1; i >= 0; i--) {
      const symbol = key(path[i]);

      let child = node.children.get(symbol);
      if (child === undefined) {
        child = trieNode();
        node.children.set(symbol, child);
      }
      node = child;
      matchedDepth++;

      if (node.ownerPathIndex === -1) {
        node.ownerPathIndex = p;
        continue;
      }
      if (node.ownerPathIndex === p || matchedDepth < 2 || matchedDepth >= len) {
        continue;
      }

      const owner = paths[node.ownerPathIndex];
      let samePrefixUpToJoin = true;
      for (let k = 0; k <= i; k++) {
        if (k >= owner.length || key(path[k]) !== key(owner[k])) {
          samePrefixUpToJoin = false;
          break;
        }
      }

      if (!samePrefixUpToJoin && i + 1 < keepLength[p]) {
        keepLength[p] = i + 1;
      }
    }
  });

  const result: TNode[][] = [];
  const seen = trieNode();

  paths.forEach((path, p) => {
    const len = keepLength[p];
    if (len <= 0) return;

    const prefix = path.slice(0, len);

    // Prefix dedupe: walk a second trie; ownerPathIndex marks a complete prefix
    let node = seen;
    for (const n of prefix) {
      const k = key(n);
      let child = node.children.get(k);
      if (child === undefined) {
        child = trieNode();
        node.children.set(k, child);
      }
      node = child;
    }
    if (node.ownerPathIndex === -1) {
      node.ownerPathIndex = p;
      result.push(prefix);
    }
  });

  return result;
}

export interface CompressPathsOptions<TNode> extends EnumeratePathsOptions<TNode> {
  /** Stop enumerating after this many paths (cut-off paths included) */
  maxPaths?: number;
}

/**
 * Enumerates root-to-terminal paths, compresses them by shared suffixes and
 * maps each compressed node path back onto graph edges (first matching edge
 * between consecutive nodes). A one-node path maps to an empty edge path.
 *
 * @throws EdgePathReconstructionError if consecutive nodes have no edge
 */
export function compressGraphPathsToEdgePaths<TNode, TLabel>(
  graph: ReadonlyDirectedGraph<TNode, TLabel>,
  root: TNode,
  options: CompressPathsOptions<TNode> = {},
): Edge<TNode, TLabel>[][] {
  const maxPaths = options.maxPaths ?? Number.POSITIVE_INFINITY;
  const allPaths: TNode[][] = [];
  if (maxPaths > 0) {
    for (const path of enumeratePaths(graph, root, options)) {
      allPaths.push(path);
      if (allPaths.length >= maxPaths) break;
    }
  }
  const compressed = compressBySharedSuffixes(allPaths, graph.keyOf);

  const result = compressed.map((nodePath) => {
    const edgePath: Edge<TNode, TLabel>[] = [];
    for (let i = 0; i < nodePath.length - 1; i++) {
      const from = nodePath[i];
      const toKey = graph.keyOf(nodePath[i + 1]);
      const chosen = graph.getOutgoingEdges(from).find((e) => graph.keyOf(e.to) === toKey);
      if (chosen === undefined) {
        throw new EdgePathReconstructionError(from, nodePath[i + 1]);
      }
      edgePath.push(chosen);
    }
    return edgePath;
  });

  debug('graph', 'Compressed paths', { enumerated: allPaths.length, compressed: result.length });
  return result;
}
