/**
 * In-memory adjacency-set graph over integer node ids 0..n-1.
 */
import type { GraphHandle } from './types';

export class SimpleGraph implements GraphHandle<number> {
  private readonly out: Set<number>[];
  private readonly inbound: Set<number>[];
  private edges = 0;

  constructor(numNodes: number, readonly directed = false) {
    this.out = Array.from({ length: numNodes }, () => new Set<number>());
    this.inbound = directed ? Array.from({ length: numNodes }, () => new Set<number>()) : this.out;
  }

  size(): number {
    return this.out.length;
  }

  nodes(): Iterable<number> {
    return this.out.keys();
  }

  addEdge(source: number, target: number): void {
    this.check(source);
    this.check(target);
    if (source === target) throw new Error(`Self-loop on node ${source} is not allowed`);
    if (this.hasEdge(source, target)) throw new Error(`Edge ${source}-${target} already exists`);
    this.out[source]!.add(target);
    this.inbound[target]!.add(source);
    this.edges++;
  }

  hasEdge(source: number, target: number): boolean {
    return this.out[source]?.has(target) ?? false;
  }

  degree(node: number): number {
    this.check(node);
    const outDeg = this.out[node]!.size;
    return this.directed ? outDeg + this.inbound[node]!.size : outDeg;
  }

  successors(node: number): Iterable<number> {
    this.check(node);
    return this.out[node]!;
  }

  edgeCount(): number {
    return this.edges;
  }

  private check(node: number): void {
    if (!Number.isInteger(node) || node < 0 || node >= this.out.length) {
      throw new Error(`Unknown node ${node}`);
    }
  }
}
