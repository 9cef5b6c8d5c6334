/**
 * Type definitions for the generic graph engine.
 *
 * Nodes are opaque, equality-comparable values. Edge labels carry domain
 * metadata and never take part in edge identity. Every graph module imports
 * from this file.
 */

// =============================================================================
// Node Keys
// =============================================================================

/**
 * Projects a node onto the key it is compared by (Map/Set SameValueZero on
 * the result). Plays the role of an equality comparer for structured nodes,
 * so it should return a primitive.
 */
export type NodeKeyFn<TNode> = (node: TNode) => unknown;

// =============================================================================
// Edge Interface
// =============================================================================

/**
 * A labelled directed edge.
 *
 * - from / to: endpoint nodes
 * - label: domain metadata (transition type, choice text, ...)
 */
export interface Edge<TNode, TLabel> {
  readonly from: TNode;
  readonly to: TNode;
  readonly label: TLabel;
}

export function edge<TNode, TLabel>(from: TNode, to: TNode, label: TLabel): Edge<TNode, TLabel> {
  return Object.freeze({ from, to, label });
}

// =============================================================================
// Read-only Graph Interface
// =============================================================================

/**
 * A read-only directed graph: node set, edge set and adjacency queries.
 * Unknown nodes are treated as zero-degree, never as errors.
 */
export interface ReadonlyDirectedGraph<TNode, TLabel> {
  readonly nodes: readonly TNode[];
  readonly edges: readonly Edge<TNode, TLabel>[];

  hasNode(node: TNode): boolean;
  getOutgoingEdges(node: TNode): readonly Edge<TNode, TLabel>[];
  getIncomingEdges(node: TNode): readonly Edge<TNode, TLabel>[];
  getSuccessors(node: TNode): TNode[];
  getPredecessors(node: TNode): TNode[];
  outDegree(node: TNode): number;
  inDegree(node: TNode): number;
  roots(): TNode[];
  terminals(): TNode[];

  /** The key function nodes are compared by (identity when none was given). */
  readonly keyOf: NodeKeyFn<TNode>;
}
