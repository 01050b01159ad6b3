/**
 * Partition shuffled node ids into communities in generation order.
 */
import type { Random } from './random';

export interface CommunityAssignment {
  /** Member node ids per community, in assignment order. */
  communities: number[][];
  /** membership[node] = community id. */
  membership: Int32Array;
}

export function assignCommunities(numNodes: number, sizes: readonly number[], random: Random): CommunityAssignment {
  const order = random.shuffle(Array.from({ length: numNodes }, (_, i) => i));
  const communities: number[][] = sizes.map(() => []);
  const membership = new Int32Array(numNodes).fill(-1);

  let next = 0;
  for (let c = 0; c < sizes.length; c++) {
    const intake = Math.min(sizes[c]!, numNodes - next);
    for (let k = 0; k < intake; k++) {
      const node = order[next++]!;
      communities[c]!.push(node);
      membership[node] = c;
    }
  }

  // Leftovers go one at a time to the currently smallest community
  while (next < numNodes && communities.length > 0) {
    const c = smallestCommunity(communities);
    const node = order[next++]!;
    communities[c]!.push(node);
    membership[node] = c;
  }

  return { communities, membership };
}

/** Lowest id wins ties. */
export function smallestCommunity(communities: readonly (readonly number[])[]): number {
  let best = 0;
  let bestSize = Infinity;
  for (let c = 0; c < communities.length; c++) {
    const size = communities[c]!.length;
    if (size < bestSize) {
      bestSize = size;
      best = c;
    }
  }
  return best;
}
