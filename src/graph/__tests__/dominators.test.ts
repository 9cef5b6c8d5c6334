import { describe, it, expect } from 'vitest';

import { computeImmediateDominators, dominatorChain } from '../algorithms/dominators.js';
import { DirectedGraph } from '../directed-graph.js';
import { edge } from '../types.js';

describe('computeImmediateDominators', () => {
  it('finds the join point dominator and skips unreachable nodes', () => {
    const graph = DirectedGraph.fromEdges([
      edge('S', 'A', 1),
      edge('S', 'B', 2),
      edge('A', 'C', 3),
      edge('B', 'C', 4),
      edge('C', 'D', 5),
      edge('U', 'D', 6),
    ]);

    const idoms = computeImmediateDominators(graph, 'S');

    expect(Object.fromEntries(idoms)).toEqual({ S: null, A: 'S', B: 'S', C: 'S', D: 'C' });
    expect([...idoms.keys()]).toEqual(['S', 'B', 'A', 'C', 'D']);
    expect(idoms.has('U')).toBe(false);
  });

  it('handles loops', () => {
    const graph = DirectedGraph.fromEdges([
      edge('S', 'A', 1),
      edge('A', 'B', 2),
      edge('B', 'A', 3),
      edge('B', 'E', 4),
    ]);

    const idoms = computeImmediateDominators(graph, 'S');

    expect(Object.fromEntries(idoms)).toEqual({ S: null, A: 'S', B: 'A', E: 'B' });
    expect(dominatorChain(idoms, 'E')).toEqual(['S', 'A', 'B', 'E']);
  });

  it('returns an empty map for an unknown root', () => {
    const graph = DirectedGraph.fromEdges([edge('S', 'A', 1)]);
    expect(computeImmediateDominators(graph, 'Q').size).toBe(0);
  });
});

describe('dominatorChain', () => {
  it('walks from the root down to the target', () => {
    const idoms = new Map<string, string | null>([
      ['S', null],
      ['A', 'S'],
      ['B', 'A'],
    ]);
    expect(dominatorChain(idoms, 'B')).toEqual(['S', 'A', 'B']);
    expect(dominatorChain(idoms, 'S')).toEqual(['S']);
  });

  it('is empty for a target outside the map', () => {
    expect(dominatorChain(new Map<string, string | null>(), 'X')).toEqual([]);
  });
});
