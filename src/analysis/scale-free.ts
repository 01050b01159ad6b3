/**
 * Barabasi-Albert preferential attachment on a host graph, and
 * highest-degree node selection.
 */
import type { GraphHandle } from '../graph/types';
import { createRandom, DEFAULT_SEED } from './random';

export interface ScaleFreeParams {
  averageDegree: number;
  seed?: number;
}

export interface ScaleFreeReport {
  /** Edges per new node. */
  m: number;
  /** Size of the initial clique. */
  m0: number;
  edges: number;
  actualAverageDegree: number;
}

const MAX_PICK_ATTEMPTS = 100;

/**
 * Wire a scale-free network into `graph` (assumed empty).
 * m = round(averageDegree / 2) edges per new node, starting from a clique of max(m + 1, 3) nodes.
 */
export function barabasiAlbert<T>(graph: GraphHandle<T>, params: ScaleFreeParams): ScaleFreeReport {
  const rng = createRandom(params.seed ?? DEFAULT_SEED);
  const nodes = [...graph.nodes()];
  const n = nodes.length;
  const m = Math.max(1, Math.round(params.averageDegree / 2));
  const m0 = Math.max(m + 1, 3);

  const connect = (a: number, b: number) => {
    if (!graph.hasEdge(nodes[a]!, nodes[b]!)) graph.addEdge(nodes[a]!, nodes[b]!);
  };

  // Too few nodes for growth: complete graph
  const init = Math.min(m0, n);
  for (let i = 0; i < init; i++) {
    for (let j = i + 1; j < init; j++) connect(i, j);
  }

  for (let newNode = init; newNode < n; newNode++) {
    const degree = nodes.slice(0, newNode).map(node => graph.degree(node));
    const totalDeg = degree.reduce((s, d) => s + d, 0);
    const probs = totalDeg > 0
      ? degree.map(d => d / totalDeg)
      : degree.map(() => 1 / newNode);

    const selected = new Set<number>();
    const picks = Math.min(m, newNode);
    for (let k = 0; k < picks; k++) {
      const target = pickByProbability(probs, selected, rng.next);
      if (target < 0) break;
      selected.add(target);
      connect(newNode, target);
    }
  }

  const edges = graph.edgeCount();
  return { m, m0, edges, actualAverageDegree: n > 0 ? (2 * edges) / n : 0 };
}

/** Roulette pick skipping already-selected nodes; falls back to the first unselected node. */
function pickByProbability(probs: readonly number[], exclude: ReadonlySet<number>, next: () => number): number {
  for (let attempt = 0; attempt < MAX_PICK_ATTEMPTS; attempt++) {
    const r = next();
    let cumulative = 0;
    for (let i = 0; i < probs.length; i++) {
      cumulative += probs[i]!;
      if (r <= cumulative) {
        if (!exclude.has(i)) return i;
        break;
      }
    }
  }
  for (let i = 0; i < probs.length; i++) {
    if (!exclude.has(i)) return i;
  }
  return -1;
}

/**
 * The floor(size * ratio) highest-degree nodes, ties kept in enumeration order.
 */
export function topDegreeNodes<T>(graph: GraphHandle<T>, ratio: number): T[] {
  const ranked = [...graph.nodes()]
    .map((node, index) => ({ node, index, degree: graph.degree(node) }))
    .sort((a, b) => b.degree - a.degree || a.index - b.index);
  const count = Math.max(0, Math.floor(graph.size() * ratio));
  return ranked.slice(0, count).map(r => r.node);
}
