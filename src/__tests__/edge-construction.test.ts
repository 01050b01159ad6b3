import { describe, it, expect } from 'vitest';
import { assignCommunities } from '../analysis/community-assignment';
import { buildCommunitySizes } from '../analysis/community-sizes';
import { buildDegreeSequence } from '../analysis/degree-sequence';
import { constructEdges, targetEdgeCount } from '../analysis/edge-construction';
import { MaxPriorityQueue } from '../analysis/priority-queue';
import { createRandom } from '../analysis/random';
import { DEFAULT_TUNING, parseLFRParams } from '../config';
import { SimpleGraph } from '../graph/simple-graph';
import { edgeList, graphOf, SCENARIO_PARAMS, scriptedRandom } from './helpers';

const PAIRS = {
  communities: [[0, 1], [2, 3]],
  membership: Int32Array.from([0, 0, 1, 1]),
};
const ONES = Int32Array.from([1, 1, 1, 1]);
const NODES = [0, 1, 2, 3];

describe('MaxPriorityQueue', () => {
  it('pops highest key first, then in insertion order', () => {
    const q = new MaxPriorityQueue();
    q.push(3, 2);
    q.push(1, 5);
    q.push(0, 2);
    q.push(2, 5);
    q.push(4, 1);
    expect(q.size).toBe(5);
    expect(q.peek()).toEqual({ node: 1, key: 5, order: 1 });
    const order: number[] = [];
    while (!q.isEmpty()) order.push(q.pop()?.node ?? -1);
    expect(order).toEqual([1, 2, 3, 0, 4]);
    expect(q.pop()).toBeUndefined();
  });

  it('queues a re-inserted node behind its equal-key peers', () => {
    const q = new MaxPriorityQueue();
    q.push(0, 1);
    q.push(1, 1);
    const first = q.pop();
    expect(first?.node).toBe(0);
    q.push(0, 1);
    expect(q.pop()?.node).toBe(1);
    expect(q.pop()?.node).toBe(0);
  });
});

describe('targetEdgeCount', () => {
  it('halves the degree sum for undirected graphs', () => {
    expect(targetEdgeCount([3, 3, 2], false)).toBe(4);
    expect(targetEdgeCount([1, 2], false)).toBe(1);
  });

  it('uses the full sum for directed graphs', () => {
    expect(targetEdgeCount([3, 3, 2], true)).toBe(8);
  });
});

describe('constructEdges', () => {
  const options = { mu: 0, symmetrical: false, iterationFactor: 3 };

  it('keeps edges inside communities when mu is 0', () => {
    const graph = new SimpleGraph(4);
    const { currentDegree, report } = constructEdges(graph, NODES, ONES, PAIRS, options, scriptedRandom([0]));
    expect(edgeList(graph)).toEqual(['0-1', '2-3']);
    expect(Array.from(currentDegree)).toEqual([1, 1, 1, 1]);
    expect(report).toEqual({
      targetEdges: 2,
      edgesCreated: 2,
      mirrorEdges: 0,
      intraEdges: 2,
      interEdges: 0,
      // node 1 is popped once already saturated
      iterations: 3,
      maxIterations: 6,
      hitIterationCap: false,
      remainingDeficit: 0,
    });
  });

  it('sends every stub across communities when mu is 1', () => {
    const graph = new SimpleGraph(4);
    const { report } = constructEdges(graph, NODES, ONES, PAIRS, { ...options, mu: 1 }, scriptedRandom([0]));
    expect(edgeList(graph)).toEqual(['0-2', '1-3']);
    expect(report.interEdges).toBe(2);
    expect(report.intraEdges).toBe(0);
    expect(report.iterations).toBe(2);
  });

  it('serves a tied node whose peer is blocked by an existing edge', () => {
    const graph = graphOf(4, [[0, 1]]);
    const { report } = constructEdges(graph, NODES, ONES, PAIRS, options, scriptedRandom([0]));
    // 0 and 1 can only pair with each other; 2 still gets its turn
    expect(graph.hasEdge(2, 3)).toBe(true);
    expect(graph.edgeCount()).toBe(2);
    expect(report.edgesCreated).toBe(1);
    expect(report.iterations).toBe(6);
    expect(report.hitIterationCap).toBe(true);
    expect(report.remainingDeficit).toBe(2);
  });

  it('mirrors directed edges without counting them as created', () => {
    const graph = new SimpleGraph(3, true);
    const assignment = { communities: [[0, 1, 2]], membership: Int32Array.from([0, 0, 0]) };
    const { currentDegree, report } = constructEdges(
      graph, [0, 1, 2], Int32Array.from([1, 1, 1]), assignment,
      { ...options, symmetrical: true }, scriptedRandom([0]),
    );
    expect(graph.hasEdge(0, 1)).toBe(true);
    expect(graph.hasEdge(1, 0)).toBe(true);
    expect(graph.edgeCount()).toBe(2);
    expect(Array.from(currentDegree)).toEqual([1, 1, 0]);
    expect(report.edgesCreated).toBe(1);
    expect(report.mirrorEdges).toBe(1);
    expect(report.intraEdges).toBe(2);
    expect(report.iterations).toBe(9);
    expect(report.hitIterationCap).toBe(true);
  });

  it('never pushes a node past its target degree', () => {
    const params = parseLFRParams(SCENARIO_PARAMS);
    const random = createRandom(42);
    const { sequence } = buildDegreeSequence(100, false, params, DEFAULT_TUNING, random);
    const sizes = buildCommunitySizes(100, params, random);
    const assignment = assignCommunities(100, sizes, random);
    const graph = new SimpleGraph(100);
    const nodes = [...graph.nodes()];

    let violations = 0;
    let calls = 0;
    const { currentDegree, report } = constructEdges(graph, nodes, sequence, assignment, {
      mu: params.mu,
      symmetrical: false,
      iterationFactor: 3,
      onEdge: (source, target, degree) => {
        calls++;
        if (source === target) violations++;
        for (let i = 0; i < degree.length; i++) {
          if (degree[i]! > sequence[i]!) violations++;
        }
      },
    }, random);

    expect(violations).toBe(0);
    expect(calls).toBe(report.edgesCreated);
    expect(graph.edgeCount()).toBe(489);
    expect(report).toMatchObject({
      targetEdges: 494,
      edgesCreated: 489,
      intraEdges: 387,
      interEdges: 102,
      iterations: 1482,
      maxIterations: 1482,
      hitIterationCap: true,
      remainingDeficit: 10,
    });
    for (const node of nodes) expect(graph.degree(node)).toBe(currentDegree[node]);
  });
});
