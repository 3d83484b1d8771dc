/**
 * Tests for the reverse-graph breadth-first search.
 */
import { describe, it, expect } from 'vitest';
import { reverseGraph } from '../../../../src/core/graph/builder.js';
import { traceDependencyPaths } from '../../../../src/core/query/bfs.js';

// Edges are [caller, target]
function reverseOf(edges: Array<[string, string]>) {
  return reverseGraph(edges.map(([caller, target]) => ({ caller, target })));
}

describe('traceDependencyPaths', () => {
  it('returns nothing when no module imports a seed', () => {
    const reverse = reverseOf([['p.a', 'p.b']]);
    expect(traceDependencyPaths(reverse, ['p.a']).size).toBe(0);
  });

  it('records the chain from the seed for every transitive importer', () => {
    const reverse = reverseOf([
      ['p.b', 'p.a'],
      ['p.c', 'p.b'],
      ['p.d', 'p.c'],
    ]);
    const paths = traceDependencyPaths(reverse, ['p.a']);
    expect(Object.fromEntries(paths)).toEqual({
      'p.b': ['p.a', 'p.b'],
      'p.c': ['p.a', 'p.b', 'p.c'],
      'p.d': ['p.a', 'p.b', 'p.c', 'p.d'],
    });
  });

  it('gives seeds no entry even when they import each other', () => {
    const reverse = reverseOf([
      ['p.b', 'p.a'],
      ['p.a', 'p.b'],
    ]);
    expect(traceDependencyPaths(reverse, ['p.a', 'p.b']).size).toBe(0);
  });

  it('terminates on import cycles', () => {
    const reverse = reverseOf([
      ['p.b', 'p.a'],
      ['p.c', 'p.b'],
      ['p.b', 'p.c'],
    ]);
    expect(Object.fromEntries(traceDependencyPaths(reverse, ['p.a']))).toEqual({
      'p.b': ['p.a', 'p.b'],
      'p.c': ['p.a', 'p.b', 'p.c'],
    });
  });

  it('prefers the shortest chain over an earlier seed', () => {
    // p.z reaches p.a in one hop, p.m in two
    const reverse = reverseOf([
      ['p.k', 'p.m'],
      ['p.z', 'p.k'],
      ['p.z', 'p.a'],
    ]);
    const paths = traceDependencyPaths(reverse, ['p.m', 'p.a']);
    expect(paths.get('p.z')).toEqual(['p.a', 'p.z']);
  });

  it('breaks ties between equal-length chains by the smallest seed', () => {
    const reverse = reverseOf([
      ['p.top', 'p.y'],
      ['p.top', 'p.x'],
    ]);
    expect(traceDependencyPaths(reverse, ['p.y', 'p.x']).get('p.top')).toEqual(['p.x', 'p.top']);
  });

  it('does not depend on the order of the seeds', () => {
    const reverse = reverseOf([
      ['p.c', 'p.a'],
      ['p.c', 'p.b'],
      ['p.d', 'p.c'],
      ['p.e', 'p.b'],
    ]);
    const forward = traceDependencyPaths(reverse, ['p.a', 'p.b']);
    const backward = traceDependencyPaths(reverse, new Set(['p.b', 'p.a']));
    expect(Object.fromEntries(backward)).toEqual(Object.fromEntries(forward));
    expect(forward.get('p.d')).toEqual(['p.a', 'p.c', 'p.d']);
    expect(forward.get('p.e')).toEqual(['p.b', 'p.e']);
  });
});
