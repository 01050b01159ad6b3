/**
 * Read-only quality measures of a generated network: modularity, degree and
 * community-size statistics, realized mixing, and per-community attribute
 * summaries.
 */
import * as d3 from 'd3';
import { indexNodes, type GraphHandle } from '../graph/types';

/**
 * Newman modularity over the full node-pair double sum:
 * Q = 1/2E · Σ_ij [A_ij − k_i·k_j / 2E] · δ(c_i, c_j).
 * A_ij is the hasEdge(i, j) test, k the realized degree, E the edge count.
 */
export function computeModularity<T>(
  graph: GraphHandle<T>,
  nodes: readonly T[],
  membership: ArrayLike<number>,
): number {
  const totalEdges = graph.edgeCount();
  if (totalEdges === 0) return 0;
  const m2 = 2 * totalEdges;
  const n = nodes.length;
  const k = nodes.map(node => graph.degree(node));

  let q = 0;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (membership[i] !== membership[j]) continue;
      const aij = i !== j && graph.hasEdge(nodes[i]!, nodes[j]!) ? 1 : 0;
      q += aij - (k[i]! * k[j]!) / m2;
    }
  }
  return q / m2;
}

export interface Spread {
  min: number;
  median: number;
  max: number;
}

export interface DegreeStatistics {
  expectedMean: number;
  actualMean: number;
  expected: Spread;
  actual: Spread;
  isolatedNodes: number;
}

/** Median is the mean of the two middle values for an even count. */
function spread(values: readonly number[]): Spread {
  const [min, max] = d3.extent(values);
  return { min: min ?? 0, median: d3.median(values) ?? 0, max: max ?? 0 };
}

export function degreeStatistics<T>(
  graph: GraphHandle<T>,
  nodes: readonly T[],
  degreeSequence: ArrayLike<number>,
): DegreeStatistics {
  const expected = Array.from(degreeSequence);
  const actual = nodes.map(node => graph.degree(node));
  return {
    expectedMean: d3.mean(expected) ?? 0,
    actualMean: d3.mean(actual) ?? 0,
    expected: spread(expected),
    actual: spread(actual),
    isolatedNodes: actual.filter(d => d === 0).length,
  };
}

export interface CommunityStatistics {
  count: number;
  minSize: number;
  maxSize: number;
  meanSize: number;
  /** [size, number of communities of that size], ascending by size. */
  histogram: [number, number][];
}

export function communityStatistics(communities: readonly (readonly number[])[]): CommunityStatistics {
  const sizes = communities.map(c => c.length);
  const [minSize, maxSize] = d3.extent(sizes);
  const histogram = d3
    .rollups(sizes, group => group.length, size => size)
    .sort((a, b) => a[0] - b[0]);
  return {
    count: sizes.length,
    minSize: minSize ?? 0,
    maxSize: maxSize ?? 0,
    meanSize: d3.mean(sizes) ?? 0,
    histogram,
  };
}

export interface MixingStatistics {
  intraEdges: number;
  interEdges: number;
  /** Fraction of edges whose endpoints lie in different communities. */
  realizedMu: number;
}

/** Classify every edge once (unordered pairs for undirected graphs). */
export function mixingStatistics<T>(
  graph: GraphHandle<T>,
  nodes: readonly T[],
  membership: ArrayLike<number>,
): MixingStatistics {
  const { indexOf } = indexNodes(nodes);

  let intraEdges = 0;
  let interEdges = 0;
  for (let i = 0; i < nodes.length; i++) {
    for (const neighbour of graph.successors(nodes[i]!)) {
      const j = indexOf.get(neighbour);
      if (j === undefined) continue;
      if (!graph.directed && j < i) continue;
      if (membership[i] === membership[j]) intraEdges++;
      else interEdges++;
    }
  }
  const total = intraEdges + interEdges;
  return { intraEdges, interEdges, realizedMu: total > 0 ? interEdges / total : 0 };
}

export interface CommunityAttributeSummary {
  community: number;
  size: number;
  /** Members that carried a finite value. */
  observed: number;
  mean: number | null;
  min: number | null;
  max: number | null;
}

/**
 * Per-community mean and range of a node attribute held outside the generator.
 * Members without a finite value are skipped.
 */
export function communityAttributeStatistics(
  communities: readonly (readonly number[])[],
  attribute: (node: number) => number | undefined,
): CommunityAttributeSummary[] {
  return communities.map((members, community) => {
    const values = members
      .map(node => attribute(node))
      .filter((v): v is number => v !== undefined && Number.isFinite(v));
    const [min, max] = d3.extent(values);
    return {
      community,
      size: members.length,
      observed: values.length,
      mean: d3.mean(values) ?? null,
      min: min ?? null,
      max: max ?? null,
    };
  });
}

export interface NetworkSummary {
  nodes: number;
  edges: number;
  directed: boolean;
  targetAverageDegree: number;
  actualAverageDegree: number;
  mu: number;
  mixing: MixingStatistics;
  communitySizes: number[];
  communities: CommunityStatistics;
  modularity: number;
  degrees: DegreeStatistics;
}

export interface SummaryInput<T> {
  graph: GraphHandle<T>;
  nodes: readonly T[];
  membership: ArrayLike<number>;
  communities: readonly (readonly number[])[];
  degreeSequence: ArrayLike<number>;
  targetAverageDegree: number;
  mu: number;
}

export function summarizeNetwork<T>(input: SummaryInput<T>): NetworkSummary {
  const { graph, nodes, membership, communities, degreeSequence } = input;
  const degrees = degreeStatistics(graph, nodes, degreeSequence);
  return {
    nodes: graph.size(),
    edges: graph.edgeCount(),
    directed: graph.directed,
    targetAverageDegree: input.targetAverageDegree,
    actualAverageDegree: degrees.actualMean,
    mu: input.mu,
    mixing: mixingStatistics(graph, nodes, membership),
    communitySizes: communities.map(c => c.length),
    communities: communityStatistics(communities),
    modularity: computeModularity(graph, nodes, membership),
    degrees,
  };
}

const fixed2 = d3.format('.2f');
const fixed4 = d3.format('.4f');

/** Plain-text statistics block. */
export function formatSummary(s: NetworkSummary): string[] {
  return [
    '=== LFR Network Statistics ===',
    `Nodes: ${s.nodes}`,
    `Edges: ${s.edges}`,
    `Directed: ${s.directed}`,
    `Target Average Degree: ${fixed2(s.targetAverageDegree)}`,
    `Actual Average Degree: ${fixed2(s.actualAverageDegree)}`,
    `Mixing Parameter (mu): ${s.mu}`,
    `Realized Mixing: ${fixed4(s.mixing.realizedMu)} (${s.mixing.intraEdges} intra / ${s.mixing.interEdges} inter)`,
    `Number of Communities: ${s.communities.count}`,
    `Community Sizes: [${s.communitySizes.join(', ')}]`,
    `Average Community Size: ${fixed2(s.communities.meanSize)}`,
    `Modularity: ${fixed4(s.modularity)}`,
    `Min Degree: ${s.degrees.actual.min}`,
    `Median Degree: ${s.degrees.actual.median}`,
    `Max Degree: ${s.degrees.actual.max}`,
    `Isolated Nodes: ${s.degrees.isolatedNodes}`,
    '===============================',
  ];
}
