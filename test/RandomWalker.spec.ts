import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { RandomWalker } from '../src/RandomWalker';
import { createRng, sampleIndices } from '../src/Random';
import { VertexRegistry } from '../src/VertexRegistry';
import { chainGraph, fanOutGraph, testLog } from './testUtils';

const names = (walks: readonly (readonly { name: string }[])[]) => walks.map(w => w.map(v => v.name));

describe('RandomWalker', () => {
  it('extends a walk by a predicate and an entity hop per depth level', () => {
    const kg = chainGraph();
    const root = kg.entity('A');

    expect(names(new RandomWalker({ depth: 1, walksPerGraph: 10 }).extractRandomWalks(kg, root)))
      .toEqual([['A', 'p', 'B']]);
    expect(names(new RandomWalker({ depth: 2, walksPerGraph: 10 }).extractRandomWalks(kg, root)))
      .toEqual([['A', 'p', 'B', 'q', 'C']]);
  });

  it('stops at vertices without outgoing edges', () => {
    const kg = chainGraph();
    const walker = new RandomWalker({ depth: 5, walksPerGraph: 10 });

    expect(names(walker.extractRandomWalks(kg, kg.entity('B')))).toEqual([['B', 'q', 'C']]);
  });

  it('returns the trivial walk for a root without outgoing edges', () => {
    const kg = chainGraph();
    const walker = new RandomWalker({ depth: 2, walksPerGraph: 10 });

    expect(names(walker.extractRandomWalks(kg, kg.entity('C')))).toEqual([['C']]);
  });

  it('returns nothing for a root the graph does not contain', () => {
    const kg = chainGraph();
    const walker = new RandomWalker({ depth: 2, walksPerGraph: 10 });
    const absent = new VertexRegistry().create('Z');

    expect(walker.extractRandomWalks(kg, absent)).toEqual([]);
  });

  it('returns only the root at depth 0', () => {
    const kg = chainGraph();
    const walker = new RandomWalker({ depth: 0, walksPerGraph: 10 });

    expect(names(walker.extractRandomWalks(kg, kg.entity('A')))).toEqual([['A']]);
  });

  it('keeps every walk when the cap is not reached', () => {
    const kg = fanOutGraph(2);
    const walker = new RandomWalker({ depth: 2, walksPerGraph: Infinity });

    expect(names(walker.extractRandomWalks(kg, kg.entity('root')))).toEqual([
      ['root', 'r', 'c0', 's', 'g0.0'],
      ['root', 'r', 'c0', 's', 'g0.1'],
      ['root', 'r', 'c1', 's', 'g1.0'],
      ['root', 'r', 'c1', 's', 'g1.1'],
    ]);
  });

  it('samples down to walksPerGraph distinct walks of bounded length', () => {
    const kg = fanOutGraph(3);
    const walker = new RandomWalker({ depth: 2, walksPerGraph: 4 });

    const walks = walker.extractRandomWalks(kg, kg.entity('root'));
    testLog('sampled walks:', names(walks));

    expect(walks).toHaveLength(4);
    expect(new Set(walks.map(w => w[4].name)).size).toBe(4);
    for (const walk of walks) {
      expect(walk.length).toBeLessThanOrEqual(2 * 2 + 1);
      expect(walk[0].name).toBe('root');
    }
  });

  it('keeps sampled walks in breadth-first order', () => {
    const kg = fanOutGraph(3);
    const walker = new RandomWalker({ depth: 2, walksPerGraph: 5 });

    const leaves = walker.extractRandomWalks(kg, kg.entity('root')).map(w => w[4].name);
    expect(leaves).toEqual([...leaves].sort());
  });

  it('is deterministic for a fixed seed', () => {
    const kg = fanOutGraph(4);
    const a = new RandomWalker({ depth: 2, walksPerGraph: 3, seed: 7 });
    const b = new RandomWalker({ depth: 2, walksPerGraph: 3, seed: 7 });

    expect(names(a.extractRandomWalks(kg, kg.entity('root'))))
      .toEqual(names(b.extractRandomWalks(kg, kg.entity('root'))));
  });

  it('rejects invalid options', () => {
    expect(() => new RandomWalker({ depth: -1, walksPerGraph: 10 })).toThrow(ZodError);
    expect(() => new RandomWalker({ depth: 1, walksPerGraph: 0 })).toThrow(ZodError);
    expect(() => new RandomWalker({ depth: 1.5, walksPerGraph: 10 })).toThrow(ZodError);
  });

  it('defaults the seed', () => {
    expect(new RandomWalker({ depth: 1, walksPerGraph: 1 }).seed).toBe(42);
  });
});

describe('sampleIndices', () => {
  it('picks distinct ascending indices', () => {
    const picked = sampleIndices(10, 4, createRng(1));

    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    expect(picked).toEqual([...picked].sort((a, b) => a - b));
    expect(picked.every(i => i >= 0 && i < 10)).toBe(true);
  });

  it('returns every index when k >= n', () => {
    expect(sampleIndices(3, 5, createRng(1))).toEqual([0, 1, 2]);
  });

  it('draws the same sequence from the same seed', () => {
    const a = createRng(123);
    const b = createRng(123);
    const first = [a(), a(), a()];

    expect([b(), b(), b()]).toEqual(first);
    expect(first.every(x => x >= 0 && x < 1)).toBe(true);
  });
});
