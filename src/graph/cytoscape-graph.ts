/**
 * GraphHandle over a headless Cytoscape instance.
 * Node ids are Cytoscape element ids; edges carry no data beyond endpoints.
 */
import cytoscape from 'cytoscape';
import type { GraphHandle } from './types';

export class CytoscapeGraph implements GraphHandle<string> {
  readonly cy: cytoscape.Core;
  private nextEdge = 0;

  constructor(nodeIds: Iterable<string>, readonly directed = false, cy?: cytoscape.Core) {
    this.cy = cy ?? cytoscape({ headless: true, styleEnabled: false });
    const elements: cytoscape.ElementDefinition[] = [];
    const pending = new Set<string>();
    for (const id of nodeIds) {
      if (pending.has(id) || this.cy.getElementById(id).nonempty()) continue;
      pending.add(id);
      elements.push({ group: 'nodes', data: { id } });
    }
    if (elements.length > 0) this.cy.add(elements);
  }

  /** Nodes named "0".."n-1". */
  static withNodes(numNodes: number, directed = false): CytoscapeGraph {
    return new CytoscapeGraph(Array.from({ length: numNodes }, (_, i) => String(i)), directed);
  }

  size(): number {
    return this.cy.nodes().length;
  }

  nodes(): Iterable<string> {
    return this.cy.nodes().map(n => n.id());
  }

  addEdge(source: string, target: string): void {
    if (source === target) throw new Error(`Self-loop on node ${source} is not allowed`);
    if (this.hasEdge(source, target)) throw new Error(`Edge ${source}-${target} already exists`);
    this.cy.add({ group: 'edges', data: { id: `e${this.nextEdge++}`, source, target } });
  }

  hasEdge(source: string, target: string): boolean {
    const from = this.node(source);
    const to = this.node(target);
    if (from.edgesTo(to).nonempty()) return true;
    return !this.directed && to.edgesTo(from).nonempty();
  }

  degree(node: string): number {
    return this.node(node).degree(false);
  }

  successors(node: string): Iterable<string> {
    const n = this.node(node);
    const neighbours = this.directed ? n.outgoers('node') : n.neighborhood('node');
    return neighbours.map(m => m.id());
  }

  edgeCount(): number {
    return this.cy.edges().length;
  }

  destroy(): void {
    this.cy.destroy();
  }

  private node(id: string): cytoscape.NodeSingular {
    const n = this.cy.getElementById(id);
    if (n.empty() || !n.isNode()) throw new Error(`Unknown node ${id}`);
    return n;
  }
}
