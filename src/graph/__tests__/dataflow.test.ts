import { describe, it, expect } from 'vitest';

import {
  computeMayIntroducedSets,
  computeMustIntroducedSets,
  dataFlowNodesFromGraph,
  setEquals,
} from '../dataflow.js';
import type { DataFlowNode } from '../dataflow.js';
import { DirectedGraph } from '../directed-graph.js';
import { InvalidStartNodeError } from '../errors.js';
import { edge } from '../types.js';

// =============================================================================
// Test Helpers
// =============================================================================

function node(
  id: string,
  predecessorIds: string[],
  successorIds: string[],
  introduced: string[] = [],
  removed: string[] = [],
): DataFlowNode<string> {
  return {
    id,
    predecessorIds,
    successorIds,
    introducedEntities: new Set(introduced),
    removedEntities: new Set(removed),
  };
}

function nodeMap(...nodes: DataFlowNode<string>[]): Map<string, DataFlowNode<string>> {
  return new Map(nodes.map((n) => [n.id, n]));
}

function sorted(set: ReadonlySet<string> | undefined): string[] {
  return set === undefined ? [] : [...set].sort();
}

/** S{k} -> L{a}, S -> R{b}, L -> J, R -> J */
function diamond(): Map<string, DataFlowNode<string>> {
  return nodeMap(
    node('S', [], ['L', 'R'], ['k']),
    node('L', ['S'], ['J'], ['a']),
    node('R', ['S'], ['J'], ['b']),
    node('J', ['L', 'R'], []),
  );
}

// =============================================================================
// Must-Introduced Sets
// =============================================================================

describe('computeMustIntroducedSets', () => {
  it('propagates introductions and removals along a chain', () => {
    const nodes = nodeMap(
      node('A', [], ['B'], ['x']),
      node('B', ['A'], ['C'], ['y'], ['x']),
      node('C', ['B'], []),
    );

    const must = computeMustIntroducedSets(nodes, 'A');

    expect(sorted(must.get('A'))).toEqual(['x']);
    expect(sorted(must.get('B'))).toEqual(['y']);
    expect(sorted(must.get('C'))).toEqual(['y']);
  });

  it('keeps only entities introduced on every incoming path', () => {
    const must = computeMustIntroducedSets(diamond(), 'S');

    expect(sorted(must.get('L'))).toEqual(['a', 'k']);
    expect(sorted(must.get('R'))).toEqual(['b', 'k']);
    expect(sorted(must.get('J'))).toEqual(['k']);
  });

  it('bounds every set by the intersection of its predecessors plus local introductions', () => {
    const nodes = diamond();
    const must = computeMustIntroducedSets(nodes, 'S');

    for (const n of nodes.values()) {
      if (n.predecessorIds.length === 0) continue;
      const [first, ...rest] = n.predecessorIds.map((p) => must.get(p) ?? new Set<string>());
      const bound = new Set([...first].filter((e) => rest.every((s) => s.has(e))));
      for (const e of n.introducedEntities) bound.add(e);
      for (const e of must.get(n.id) ?? []) {
        expect(bound.has(e)).toBe(true);
      }
    }
  });

  it('drops an entity introduced and removed in the same node', () => {
    const nodes = nodeMap(node('A', [], [], ['x', 'y'], ['x']));
    expect(sorted(computeMustIntroducedSets(nodes, 'A').get('A'))).toEqual(['y']);
  });

  it('returns a result for every node, empty when unreachable', () => {
    const nodes = nodeMap(
      node('A', [], ['B'], ['x']),
      node('B', ['A'], []),
      node('U', ['ghost'], [], ['u']),
    );

    const must = computeMustIntroducedSets(nodes, 'A');

    expect([...must.keys()]).toEqual(['A', 'B', 'U']);
    expect(sorted(must.get('U'))).toEqual([]);
  });

  it('skips predecessor ids missing from the node set', () => {
    const nodes = nodeMap(
      node('A', [], ['B'], ['x']),
      node('B', ['A', 'ghost'], [], ['y']),
    );
    expect(sorted(computeMustIntroducedSets(nodes, 'A').get('B'))).toEqual(['x', 'y']);
  });

  it('gives a predecessor-less non-start node only its own introductions', () => {
    const nodes = nodeMap(
      node('S', [], ['X'], ['s']),
      node('X', [], [], ['x']),
    );
    expect(sorted(computeMustIntroducedSets(nodes, 'S').get('X'))).toEqual(['x']);
  });

  it('terminates on cycles', () => {
    const nodes = nodeMap(
      node('S', [], ['L'], ['a']),
      node('L', ['S', 'M'], ['M'], ['l']),
      node('M', ['L'], ['L'], ['m']),
    );

    const must = computeMustIntroducedSets(nodes, 'S');

    expect(sorted(must.get('L'))).toEqual(['l']);
    expect(sorted(must.get('M'))).toEqual(['l', 'm']);
  });

  it('is idempotent', () => {
    const nodes = diamond();
    const first = computeMustIntroducedSets(nodes, 'S');
    const second = computeMustIntroducedSets(nodes, 'S');
    for (const [id, set] of first) {
      expect(setEquals(set, second.get(id) ?? new Set())).toBe(true);
    }
  });

  it('throws InvalidStartNodeError for an unknown start', () => {
    expect(() => computeMustIntroducedSets(diamond(), 'nowhere')).toThrow(InvalidStartNodeError);
    expect(() => computeMustIntroducedSets(diamond(), 'nowhere'))
      .toThrow("Start node 'nowhere' not found in node set.");
  });
});

// =============================================================================
// May-Introduced Sets
// =============================================================================

describe('computeMayIntroducedSets', () => {
  it('keeps entities introduced on any incoming path', () => {
    const may = computeMayIntroducedSets(diamond(), 'S');
    expect(sorted(may.get('J'))).toEqual(['a', 'b', 'k']);
  });

  it('contains the must set at every node', () => {
    const nodes = diamond();
    const must = computeMustIntroducedSets(nodes, 'S');
    const may = computeMayIntroducedSets(nodes, 'S');
    for (const [id, set] of must) {
      for (const e of set) expect(may.get(id)?.has(e)).toBe(true);
    }
  });

  it('throws InvalidStartNodeError for an unknown start', () => {
    expect(() => computeMayIntroducedSets(new Map(), 'S')).toThrow(InvalidStartNodeError);
  });
});

// =============================================================================
// Graph Adapter
// =============================================================================

describe('dataFlowNodesFromGraph', () => {
  it('derives predecessor and successor ids from the graph edges', () => {
    const graph = DirectedGraph.fromEdges([edge('a', 'b', 1), edge('b', 'c', 2)]);
    const nodes = dataFlowNodesFromGraph(
      graph,
      (id) => (id === 'a' ? ['torch'] : []),
      (id) => (id === 'c' ? ['torch'] : []),
    );

    expect(nodes.get('b')?.predecessorIds).toEqual(['a']);
    expect(nodes.get('b')?.successorIds).toEqual(['c']);
    expect(sorted(nodes.get('a')?.introducedEntities)).toEqual(['torch']);

    const must = computeMustIntroducedSets(nodes, 'a');
    expect(sorted(must.get('b'))).toEqual(['torch']);
    expect(sorted(must.get('c'))).toEqual([]);
  });
});

describe('setEquals', () => {
  it('compares membership regardless of insertion order', () => {
    expect(setEquals(new Set([1, 2]), new Set([2, 1]))).toBe(true);
    expect(setEquals(new Set([1, 2]), new Set([1, 3]))).toBe(false);
    expect(setEquals(new Set([1]), new Set([1, 2]))).toBe(false);
  });
});
