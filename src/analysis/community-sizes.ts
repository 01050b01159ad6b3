/**
 * Power-law community sizes that sum exactly to the node count.
 * The number of communities is whatever the draws produce.
 */
import { samplePowerLaw } from './power-law';
import type { Random } from './random';

export interface CommunitySizeRange {
  tau2: number;
  minCommunity: number;
  maxCommunity: number;
}

export function buildCommunitySizes(numNodes: number, range: CommunitySizeRange, random: Random): number[] {
  const { tau2, minCommunity, maxCommunity } = range;
  const sizes: number[] = [];
  let assigned = 0;

  while (assigned < numNodes) {
    const size = samplePowerLaw(minCommunity, maxCommunity, tau2, random);
    if (assigned + size <= numNodes) {
      sizes.push(size);
      assigned += size;
      continue;
    }

    // Final partial community
    const remaining = numNodes - assigned;
    if (remaining >= minCommunity || sizes.length === 0) {
      sizes.push(remaining);
    } else {
      sizes[sizes.length - 1]! += remaining;
    }
    assigned = numNodes;
  }

  return sizes;
}
