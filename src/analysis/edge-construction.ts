/**
 * Greedy edge construction.
 *
 * Nodes are served highest remaining deficit first. Each served node splits
 * its deficit into (1 - mu) intra-community and mu inter-community stubs and
 * fills them from shuffled candidate lists, skipping saturated candidates and
 * existing edges. Shortfall is expected near the tail and only reported.
 */
import { edgeKey, type GraphHandle } from '../graph/types';
import type { CommunityAssignment } from './community-assignment';
import { sum } from './degree-sequence';
import { MaxPriorityQueue } from './priority-queue';
import type { Random } from './random';

export interface EdgeConstructionOptions {
  mu: number;
  /** Directed graphs only: mirror every accepted edge when absent. */
  symmetrical: boolean;
  /** Loop cap = iterationFactor * targetEdges. */
  iterationFactor: number;
  /** Called after every accepted edge (mirrors included) with node indices. */
  onEdge?: (source: number, target: number, currentDegree: Readonly<Int32Array>) => void;
}

export interface EdgeConstructionReport {
  targetEdges: number;
  edgesCreated: number;
  mirrorEdges: number;
  intraEdges: number;
  interEdges: number;
  iterations: number;
  maxIterations: number;
  hitIterationCap: boolean;
  /** Sum of unfilled target degree over all nodes. */
  remainingDeficit: number;
}

export interface EdgeConstructionResult {
  currentDegree: Int32Array;
  report: EdgeConstructionReport;
}

export function targetEdgeCount(degreeSequence: ArrayLike<number>, directed: boolean): number {
  const total = sum(degreeSequence);
  return directed ? total : Math.floor(total / 2);
}

export function constructEdges<T>(
  graph: GraphHandle<T>,
  nodes: readonly T[],
  degreeSequence: Readonly<Int32Array>,
  assignment: CommunityAssignment,
  options: EdgeConstructionOptions,
  random: Random,
): EdgeConstructionResult {
  const directed = graph.directed;
  const { communities, membership } = assignment;
  const n = nodes.length;
  const targetEdges = targetEdgeCount(degreeSequence, directed);
  const maxIterations = Math.floor(options.iterationFactor * targetEdges);

  const currentDegree = new Int32Array(n);
  const created = new Set<string>();
  const deficit = (node: number) => degreeSequence[node]! - currentDegree[node]!;

  const report: EdgeConstructionReport = {
    targetEdges,
    edgesCreated: 0,
    mirrorEdges: 0,
    intraEdges: 0,
    interEdges: 0,
    iterations: 0,
    maxIterations,
    hitIterationCap: false,
    remainingDeficit: 0,
  };

  const record = (source: number, target: number) => {
    if (membership[source] === membership[target]) report.intraEdges++;
    else report.interEdges++;
    options.onEdge?.(source, target, currentDegree);
  };

  /** Accept up to `count` edges from u into candidates; returns how many were added. */
  const addRandomEdges = (u: number, candidates: readonly number[], count: number): number => {
    if (count <= 0 || candidates.length === 0) return 0;
    const source = nodes[u]!;
    let added = 0;
    for (const v of candidates) {
      if (added >= count) break;
      if (currentDegree[v]! >= degreeSequence[v]!) continue;

      const key = edgeKey(u, v, directed);
      const target = nodes[v]!;
      if (created.has(key) || graph.hasEdge(source, target)) continue;

      graph.addEdge(source, target);
      created.add(key);
      currentDegree[u]!++;
      if (!directed) currentDegree[v]!++;
      record(u, v);

      if (directed && options.symmetrical) {
        const reverse = edgeKey(v, u, true);
        if (!created.has(reverse) && !graph.hasEdge(target, source)) {
          graph.addEdge(target, source);
          created.add(reverse);
          currentDegree[v]!++;
          report.mirrorEdges++;
          record(v, u);
        }
      }
      added++;
    }
    return added;
  };

  const queue = new MaxPriorityQueue();
  for (let i = 0; i < n; i++) queue.push(i, deficit(i));

  while (report.edgesCreated < targetEdges && !queue.isEmpty() && report.iterations < maxIterations) {
    const entry = queue.pop();
    if (!entry) break;
    const u = entry.node;
    const remaining = deficit(u);

    if (remaining <= 0) {
      report.iterations++;
      continue;
    }
    // Other nodes' edges may have shrunk u's deficit while it waited
    if (remaining < entry.key) {
      queue.push(u, remaining);
      continue;
    }

    const intraTarget = Math.round(remaining * (1 - options.mu));
    const interTarget = remaining - intraTarget;
    const home = membership[u]!;

    const sameCommunity = communities[home]!.filter(v => v !== u);
    random.shuffle(sameCommunity);
    const intraAdded = addRandomEdges(u, sameCommunity, intraTarget);

    const otherNodes: number[] = [];
    for (let c = 0; c < communities.length; c++) {
      if (c !== home) otherNodes.push(...communities[c]!);
    }
    random.shuffle(otherNodes);
    const interAdded = addRandomEdges(u, otherNodes, interTarget);

    report.edgesCreated += intraAdded + interAdded;
    if (currentDegree[u]! < degreeSequence[u]!) queue.push(u, deficit(u));
    report.iterations++;
  }

  report.hitIterationCap = report.iterations >= maxIterations && report.edgesCreated < targetEdges;
  for (let i = 0; i < n; i++) report.remainingDeficit += Math.max(0, deficit(i));

  return { currentDegree, report };
}
