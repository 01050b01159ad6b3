/**
 * Shared test helpers and fixtures for the LFR generator tests.
 */
import type { Random } from '../analysis/random';
import type { LFRParamsInput } from '../config';
import { SimpleGraph } from '../graph/simple-graph';

/** 100-node benchmark used across the generator tests. */
export const SCENARIO_PARAMS: LFRParamsInput = {
  tau1: 2.5,
  tau2: 1.5,
  mu: 0.2,
  minDegree: 5,
  maxDegree: 20,
  avgDegree: 10,
  minCommunity: 10,
  maxCommunity: 50,
};

/**
 * Random whose next() replays `values` in a cycle, whose int() always
 * returns `intValue` and whose shuffle leaves the array untouched.
 */
export function scriptedRandom(values: number[], intValue = 0): Random {
  let i = 0;
  return {
    next: () => values[i++ % values.length]!,
    int: () => intValue,
    shuffle: <T>(items: T[]) => items,
  };
}

/** Undirected graph from an edge list. */
export function graphOf(numNodes: number, edges: [number, number][], directed = false): SimpleGraph {
  const graph = new SimpleGraph(numNodes, directed);
  for (const [s, t] of edges) graph.addEdge(s, t);
  return graph;
}

/** Two triangles 0-1-2 and 3-4-5 joined by the bridge 2-3. */
export const TWO_TRIANGLES: [number, number][] = [
  [0, 1], [0, 2], [1, 2],
  [3, 4], [3, 5], [4, 5],
  [2, 3],
];

/** Sorted "s-t" strings for comparing edge sets. */
export function edgeList(graph: SimpleGraph): string[] {
  const out: string[] = [];
  for (const s of graph.nodes()) {
    for (const t of graph.successors(s)) {
      if (graph.directed || s < t) out.push(`${s}-${t}`);
    }
  }
  return out.sort();
}
