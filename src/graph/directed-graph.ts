/**
 * Immutable, adjacency-indexed directed graph.
 *
 * Built once from a collection of edges (and optionally an explicit node set)
 * via DirectedGraph.fromEdges(), then treated as a read-only mathematical
 * object. Both adjacency indices are derived at construction time, so every
 * query is a lookup over precomputed lists.
 */

import { debug } from '../shared/debug.js';
import type { Edge, NodeKeyFn, ReadonlyDirectedGraph } from './types.js';

export interface FromEdgesOptions<TNode> {
  /** Extra nodes to include even when no edge references them */
  nodes?: Iterable<TNode>;
  /** Key projection used for node equality (default: the node itself) */
  key?: NodeKeyFn<TNode>;
}

const identity = <T>(value: T): unknown => value;

const EMPTY: readonly never[] = Object.freeze([]);

export class DirectedGraph<TNode, TLabel> implements ReadonlyDirectedGraph<TNode, TLabel> {
  readonly nodes: readonly TNode[];
  readonly edges: readonly Edge<TNode, TLabel>[];
  readonly keyOf: NodeKeyFn<TNode>;

  private readonly outgoing: ReadonlyMap<unknown, readonly Edge<TNode, TLabel>[]>;
  private readonly incoming: ReadonlyMap<unknown, readonly Edge<TNode, TLabel>[]>;

  private constructor(
    nodes: readonly TNode[],
    edges: readonly Edge<TNode, TLabel>[],
    outgoing: ReadonlyMap<unknown, readonly Edge<TNode, TLabel>[]>,
    incoming: ReadonlyMap<unknown, readonly Edge<TNode, TLabel>[]>,
    keyOf: NodeKeyFn<TNode>,
  ) {
    this.nodes = nodes;
    this.edges = edges;
    this.outgoing = outgoing;
    this.incoming = incoming;
    this.keyOf = keyOf;
  }

  /**
   * Constructs a directed graph from edges plus an optional explicit node set.
   *
   * Every edge endpoint is added to the node set. The first occurrence of a
   * node (by key) is the one kept in `nodes`. Edge order is preserved in the
   * edge list and in each adjacency list.
   */
  static fromEdges<TNode, TLabel>(
    edges: Iterable<Edge<TNode, TLabel>>,
    options: FromEdgesOptions<TNode> = {},
  ): DirectedGraph<TNode, TLabel> {
    const keyOf = options.key ?? identity;

    const edgeList = Object.freeze([...edges]);
    const nodeByKey = new Map<unknown, TNode>();

    const addNode = (node: TNode): void => {
      const k = keyOf(node);
      if (!nodeByKey.has(k)) {
        nodeByKey.set(k, node);
      }
    };

    if (options.nodes !== undefined) {
      for (const n of options.nodes) {
        addNode(n);
      }
    }

    for (const e of edgeList) {
      addNode(e.from);
      addNode(e.to);
    }

    const outgoing = new Map<unknown, Edge<TNode, TLabel>[]>();
    const incoming = new Map<unknown, Edge<TNode, TLabel>[]>();

    for (const k of nodeByKey.keys()) {
      outgoing.set(k, []);
      incoming.set(k, []);
    }

    for (const e of edgeList) {
      outgoing.get(keyOf(e.from))?.push(e);
      incoming.get(keyOf(e.to))?.push(e);
    }

    for (const list of outgoing.values()) Object.freeze(list);
    for (const list of incoming.values()) Object.freeze(list);

    debug('graph', 'Built directed graph', { nodes: nodeByKey.size, edges: edgeList.length });

    return new DirectedGraph(
      Object.freeze([...nodeByKey.values()]),
      edgeList,
      outgoing,
      incoming,
      keyOf,
    );
  }

  hasNode(node: TNode): boolean {
    return this.outgoing.has(this.keyOf(node));
  }

  getOutgoingEdges(node: TNode): readonly Edge<TNode, TLabel>[] {
    return this.outgoing.get(this.keyOf(node)) ?? EMPTY;
  }

  getIncomingEdges(node: TNode): readonly Edge<TNode, TLabel>[] {
    return this.incoming.get(this.keyOf(node)) ?? EMPTY;
  }

  getSuccessors(node: TNode): TNode[] {
    return this.getOutgoingEdges(node).map((e) => e.to);
  }

  getPredecessors(node: TNode): TNode[] {
    return this.getIncomingEdges(node).map((e) => e.from);
  }

  outDegree(node: TNode): number {
    return this.getOutgoingEdges(node).length;
  }

  inDegree(node: TNode): number {
    return this.getIncomingEdges(node).length;
  }

  /** All nodes with in-degree zero, in node-set order. */
  roots(): TNode[] {
    return this.nodes.filter((n) => this.inDegree(n) === 0);
  }

  /** All nodes with out-degree zero, in node-set order. */
  terminals(): TNode[] {
    return this.nodes.filter((n) => this.outDegree(n) === 0);
  }
}
