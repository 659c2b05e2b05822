import { describe, expect, it } from 'vitest';

import { findCycleFrom, findParentCycle } from '../src/core/graph/cycles.js';

const edges = (m: Record<string, string[]>) => (id: string) => m[id] ?? [];

describe('cycle detection', () => {
  it('returns the loop reachable from the start node', () => {
    expect(findCycleFrom('a', edges({ a: ['b'], b: ['c'], c: ['a'] }))).toEqual(['a', 'b', 'c', 'a']);
    expect(findCycleFrom('x', edges({ x: ['a'], a: ['b'], b: ['a'] }))).toEqual(['a', 'b', 'a']);
  });

  it('treats diamonds as acyclic', () => {
    expect(findCycleFrom('a', edges({ a: ['b', 'c'], b: ['d'], c: ['d'] }))).toBeNull();
  });

  it('detects self loops', () => {
    expect(findCycleFrom('a', edges({ a: ['a'] }))).toEqual(['a', 'a']);
  });

  it('walks parent chains', () => {
    const parents: Record<string, string | null> = { a: 'b', b: 'c', c: 'a', d: 'e', e: null };
    const parentOf = (id: string) => parents[id] ?? null;
    expect(findParentCycle('a', parentOf)).toEqual(['a', 'b', 'c', 'a']);
    expect(findParentCycle('d', parentOf)).toBeNull();
  });
});
