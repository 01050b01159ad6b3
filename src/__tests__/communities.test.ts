import { describe, it, expect } from 'vitest';
import { assignCommunities, smallestCommunity } from '../analysis/community-assignment';
import { buildCommunitySizes } from '../analysis/community-sizes';
import { createRandom } from '../analysis/random';
import { scriptedRandom } from './helpers';

const SIZES = { tau2: 1.5, minCommunity: 10, maxCommunity: 50 };

describe('buildCommunitySizes', () => {
  it('stops exactly when the draws fill the nodes', () => {
    expect(buildCommunitySizes(20, SIZES, scriptedRandom([0]))).toEqual([10, 10]);
  });

  it('merges a small remainder into the last community', () => {
    expect(buildCommunitySizes(25, SIZES, scriptedRandom([0]))).toEqual([10, 15]);
    expect(buildCommunitySizes(35, SIZES, scriptedRandom([0]))).toEqual([10, 10, 15]);
  });

  it('keeps a remainder of at least minCommunity as its own community', () => {
    // every draw is 8; 8 + 8 overshoots 14, the remaining 6 >= 4 stands alone
    const range = { tau2: 2, minCommunity: 4, maxCommunity: 8 };
    expect(buildCommunitySizes(14, range, scriptedRandom([0.99999]))).toEqual([8, 6]);
  });

  it('emits a single short community when nothing fits', () => {
    expect(buildCommunitySizes(5, SIZES, scriptedRandom([0]))).toEqual([5]);
  });

  it('always sums to the node count', () => {
    for (const seed of [1, 2, 3, 7, 42]) {
      for (const n of [10, 57, 100, 333]) {
        const sizes = buildCommunitySizes(n, SIZES, createRandom(seed));
        expect(sizes.reduce((s, x) => s + x, 0)).toBe(n);
      }
    }
  });
});

describe('assignCommunities', () => {
  it('walks the shuffled order through the sizes', () => {
    const { communities, membership } = assignCommunities(5, [3, 2], scriptedRandom([0]));
    expect(communities).toEqual([[0, 1, 2], [3, 4]]);
    expect(Array.from(membership)).toEqual([0, 0, 0, 1, 1]);
  });

  it('hands leftovers to the smallest community, lowest id first', () => {
    const { communities, membership } = assignCommunities(5, [2, 1], scriptedRandom([0]));
    expect(communities).toEqual([[0, 1, 4], [2, 3]]);
    expect(Array.from(membership)).toEqual([0, 0, 1, 1, 0]);
  });

  it('clips sizes that overshoot the node count', () => {
    const { communities } = assignCommunities(5, [4, 4], scriptedRandom([0]));
    expect(communities).toEqual([[0, 1, 2, 3], [4]]);
  });

  it('places every node exactly once', () => {
    const sizes = buildCommunitySizes(100, SIZES, createRandom(9));
    const { communities, membership } = assignCommunities(100, sizes, createRandom(9));
    const all = communities.flat().sort((a, b) => a - b);
    expect(all).toEqual(Array.from({ length: 100 }, (_, i) => i));
    communities.forEach((members, c) => {
      expect(members.length).toBe(sizes[c]);
      for (const node of members) expect(membership[node]).toBe(c);
    });
  });
});

describe('smallestCommunity', () => {
  it('prefers the lowest id on ties', () => {
    expect(smallestCommunity([[1, 2], [3], [4]])).toBe(1);
    expect(smallestCommunity([[1], [2]])).toBe(0);
  });
});
