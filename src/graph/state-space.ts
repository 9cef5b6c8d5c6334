/**
 * Frontier-merged state-space graphs.
 *
 * Explores a concrete state space (scene + full narrative state) breadth-first
 * and merges any two concrete states that share the same
 * (sceneId, stateSignature) key. The first concrete state reaching a key
 * becomes its representative; later states mapping to the same key are not
 * expanded on their own. The graph is therefore bounded by the number of
 * distinct (scene, signature) pairs instead of the number of concrete paths.
 *
 * Scene ids and signatures are compared with SameValueZero, like graph
 * nodes. Structured signatures need a `signatureKey` projection onto a
 * primitive, or every fresh signature object counts as a new state.
 *
 * Termination is the caller's contract: supply `maxDepth`, `isTerminalScene`,
 * or a transition function that eventually yields nothing.
 */

import { debug } from '../shared/debug.js';
import { DirectedGraph } from './directed-graph.js';
import { edge } from './types.js';
import type { Edge, NodeKeyFn } from './types.js';

// =============================================================================
// Types
// =============================================================================

/** Equivalence class of concrete states at one scene. */
export interface StateNode<TSceneId, TSignature> {
  readonly sceneId: TSceneId;
  readonly signature: TSignature;
}

/** One step of concrete exploration, produced on demand by the caller. */
export interface StateTransition<TSceneId, TLabel, TState> {
  readonly toScene: TSceneId;
  readonly label: TLabel;
  readonly nextState: TState;
}

export interface FrontierMergeOptions<TSceneId, TState, TSignature, TLabel> {
  initialSceneId: TSceneId;
  initialState: TState;
  getTransitions: (sceneId: TSceneId, state: TState) => Iterable<StateTransition<TSceneId, TLabel, TState>>;
  stateSignature: (state: TState) => TSignature;
  isTerminalScene?: (sceneId: TSceneId) => boolean;
  /** Nodes at this depth are marked terminal and not expanded */
  maxDepth?: number;
  /** Projects a scene id onto its merge key (default: the id itself) */
  sceneKey?: NodeKeyFn<TSceneId>;
  /** Projects a signature onto its merge key (default: the signature itself) */
  signatureKey?: NodeKeyFn<TSignature>;
}

export interface FrontierMergedGraph<TSceneId, TState, TSignature, TLabel> {
  graph: DirectedGraph<StateNode<TSceneId, TSignature>, TLabel>;
  initialNode: StateNode<TSceneId, TSignature>;
  /** One arbitrarily-chosen concrete state per state node, keyed by node */
  representativeStates: ReadonlyMap<StateNode<TSceneId, TSignature>, TState>;
  terminalNodes: readonly StateNode<TSceneId, TSignature>[];
}

// =============================================================================
// Builder
// =============================================================================

const identity = <T>(value: T): unknown => value;

interface QueueEntry<TSceneId, TState, TSignature> {
  node: StateNode<TSceneId, TSignature>;
  state: TState;
  depth: number;
}

export function buildFrontierMergedGraph<TSceneId, TState, TSignature, TLabel>(
  options: FrontierMergeOptions<TSceneId, TState, TSignature, TLabel>,
): FrontierMergedGraph<TSceneId, TState, TSignature, TLabel> {
  const {
    getTransitions,
    stateSignature,
    isTerminalScene = () => false,
    maxDepth,
    sceneKey = identity,
    signatureKey = identity,
  } = options;

  // Canonical node instance per (scene key, signature key); edges and the
  // result reuse these objects
  const nodesByScene = new Map<unknown, Map<unknown, StateNode<TSceneId, TSignature>>>();
  const nodes: StateNode<TSceneId, TSignature>[] = [];

  const canonical = (node: StateNode<TSceneId, TSignature>): StateNode<TSceneId, TSignature> | undefined =>
    nodesByScene.get(sceneKey(node.sceneId))?.get(signatureKey(node.signature));

  const register = (node: StateNode<TSceneId, TSignature>): void => {
    const sk = sceneKey(node.sceneId);
    let bySignature = nodesByScene.get(sk);
    if (bySignature === undefined) {
      bySignature = new Map();
      nodesByScene.set(sk, bySignature);
    }
    bySignature.set(signatureKey(node.signature), node);
    nodes.push(node);
  };

  const representativeStates = new Map<StateNode<TSceneId, TSignature>, TState>();
  const terminalNodes: StateNode<TSceneId, TSignature>[] = [];
  const edges: Edge<StateNode<TSceneId, TSignature>, TLabel>[] = [];

  const initialNode: StateNode<TSceneId, TSignature> = Object.freeze({
    sceneId: options.initialSceneId,
    signature: stateSignature(options.initialState),
  });
  register(initialNode);
  representativeStates.set(initialNode, options.initialState);

  const queue: QueueEntry<TSceneId, TState, TSignature>[] = [
    { node: initialNode, state: options.initialState, depth: 0 },
  ];
  let head = 0;

  while (head < queue.length) {
    const { node, state, depth } = queue[head++];

    if (maxDepth !== undefined && depth >= maxDepth) {
      terminalNodes.push(node);
      continue;
    }

    if (isTerminalScene(node.sceneId)) {
      terminalNodes.push(node);
      continue;
    }

    const transitions = [...getTransitions(node.sceneId, state)];
    if (transitions.length === 0) {
      terminalNodes.push(node);
      continue;
    }

    for (const transition of transitions) {
      const candidate: StateNode<TSceneId, TSignature> = Object.freeze({
        sceneId: transition.toScene,
        signature: stateSignature(transition.nextState),
      });
      let next = canonical(candidate);
      if (next === undefined) {
        next = candidate;
        register(next);
        representativeStates.set(next, transition.nextState);
        queue.push({ node: next, state: transition.nextState, depth: depth + 1 });
      }

      edges.push(edge(node, next, transition.label));
    }
  }

  // Equivalent node objects resolve to their canonical instance
  const graph = DirectedGraph.fromEdges(edges, {
    nodes,
    key: (node) => canonical(node) ?? node,
  });

  debug('statespace', 'Frontier-merged graph built', {
    stateNodes: nodes.length,
    edges: edges.length,
    terminals: terminalNodes.length,
    expanded: head,
  });

  return { graph, initialNode, representativeStates, terminalNodes };
}
