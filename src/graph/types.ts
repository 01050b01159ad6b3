/**
 * Capability set the generator needs from a host graph.
 * Adapters wrap a concrete graph library behind this seam.
 */
export interface GraphHandle<T> {
  readonly directed: boolean;
  size(): number;
  /** Stable enumeration order; the generator indexes nodes by it. */
  nodes(): Iterable<T>;
  addEdge(source: T, target: T): void;
  /** For undirected graphs either orientation matches. */
  hasEdge(source: T, target: T): boolean;
  /** In + out for directed graphs. */
  degree(node: T): number;
  /** Out-neighbours; all neighbours for undirected graphs. */
  successors(node: T): Iterable<T>;
  edgeCount(): number;
}

/** Node list in enumeration order plus the reverse lookup. */
export interface NodeIndex<T> {
  nodes: readonly T[];
  indexOf: ReadonlyMap<T, number>;
}

export function indexNodes<T>(source: Iterable<T>): NodeIndex<T> {
  const nodes = [...source];
  const indexOf = new Map<T, number>();
  nodes.forEach((node, i) => indexOf.set(node, i));
  return { nodes, indexOf };
}

export function edgeKey(source: number, target: number, directed: boolean): string {
  return directed
    ? `${source}->${target}`
    : `${Math.min(source, target)}-${Math.max(source, target)}`;
}
