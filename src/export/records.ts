/**
 * Flat node and edge records shared by the GML and CSV writers.
 */
import { edgeKey, indexNodes, type GraphHandle } from '../graph/types';

export type EdgeType = 'intra' | 'inter';

/** Everything the writers need from a generated network. */
export interface NetworkView<T> {
  graph: GraphHandle<T>;
  /** Nodes in generator index order; the index is the exported id. */
  nodes: readonly T[];
  membership: ArrayLike<number>;
  degreeSequence: ArrayLike<number>;
  avgDegree: number;
  mu: number;
}

export interface NodeRecord {
  id: number;
  label: string;
  community: number;
  degree: number;
  expectedDegree: number;
}

export interface EdgeRecord {
  source: number;
  target: number;
  type: EdgeType;
  sourceCommunity: number;
  targetCommunity: number;
}

export function nodeRecords<T>(view: NetworkView<T>): NodeRecord[] {
  return view.nodes.map((node, id) => ({
    id,
    label: String(node),
    community: view.membership[id]!,
    degree: view.graph.degree(node),
    expectedDegree: view.degreeSequence[id]!,
  }));
}

/** One record per unique edge, walking successors in node order. */
export function edgeRecords<T>(view: NetworkView<T>): EdgeRecord[] {
  const { graph, nodes, membership } = view;
  const { indexOf } = indexNodes(nodes);

  const seen = new Set<string>();
  const records: EdgeRecord[] = [];
  nodes.forEach((node, source) => {
    for (const neighbour of graph.successors(node)) {
      const target = indexOf.get(neighbour);
      if (target === undefined) continue;
      const key = edgeKey(source, target, graph.directed);
      if (seen.has(key)) continue;
      seen.add(key);
      const sourceCommunity = membership[source]!;
      const targetCommunity = membership[target]!;
      records.push({
        source,
        target,
        type: sourceCommunity === targetCommunity ? 'intra' : 'inter',
        sourceCommunity,
        targetCommunity,
      });
    }
  });
  return records;
}
