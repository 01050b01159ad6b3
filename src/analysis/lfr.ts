/**
 * LFR (Lancichinetti-Fortunato-Radicchi) benchmark generator.
 *
 * Pipeline per generate() call, all drawing from one seeded stream:
 *   degree sequence → community sizes → community assignment → edges.
 * Parameters are validated at construction; node count and average degree
 * are validated at generation before anything is allocated or sampled.
 */
import {
  parseLFRParams,
  parseTuning,
  type GeneratorTuning,
  type GeneratorTuningInput,
  type LFRParams,
  type LFRParamsInput,
} from '../config';
import { GenerationValidationError, GeneratorStateError } from '../errors';
import { indexNodes, type GraphHandle } from '../graph/types';
import { createLogger } from '../log';
import { assignCommunities } from './community-assignment';
import { buildCommunitySizes } from './community-sizes';
import { buildDegreeSequence, type DegreeSequenceReport } from './degree-sequence';
import { constructEdges, type EdgeConstructionOptions, type EdgeConstructionReport } from './edge-construction';
import { computeModularity, summarizeNetwork, type NetworkSummary } from './quality';
import { createRandom, DEFAULT_SEED } from './random';

const log = createLogger('lfr');

export const MIN_NODES = 10;

export interface LFROptions {
  seed?: number;
  tuning?: GeneratorTuningInput;
  /** Forwarded to edge construction; observes every accepted edge. */
  onEdge?: EdgeConstructionOptions['onEdge'];
}

export interface GenerationReport {
  numNodes: number;
  directed: boolean;
  seed: number;
  degrees: DegreeSequenceReport;
  communityCount: number;
  edges: EdgeConstructionReport;
}

interface GenerationState<T> {
  nodes: readonly T[];
  degreeSequence: Int32Array;
  communitySizes: readonly number[];
  communities: readonly (readonly number[])[];
  membership: Int32Array;
  report: GenerationReport;
}

export class LFRGenerator<T = number> {
  readonly params: Readonly<LFRParams>;
  readonly tuning: Readonly<GeneratorTuning>;
  readonly seed: number;
  private readonly onEdge: LFROptions['onEdge'];
  private state: GenerationState<T> | null = null;

  constructor(params: LFRParamsInput, options: LFROptions = {}) {
    this.params = Object.freeze(parseLFRParams(params));
    this.tuning = Object.freeze(parseTuning(options.tuning));
    this.seed = options.seed ?? DEFAULT_SEED;
    this.onEdge = options.onEdge;
  }

  /**
   * Wire an LFR benchmark into the given graph and return it.
   * Each call restarts the random stream from the configured seed.
   */
  generate<G extends GraphHandle<T>>(graph: G): G {
    const numNodes = graph.size();
    this.validateGeneration(numNodes, graph.directed);

    const random = createRandom(this.seed);
    const { nodes } = indexNodes(graph.nodes());
    const p = this.params;

    const degrees = buildDegreeSequence(numNodes, graph.directed, p, this.tuning, random);
    log.debug(`degree mean sampled ${degrees.report.sampledMean.toFixed(2)}, final ${degrees.report.finalMean.toFixed(2)} (target ${p.avgDegree})`);

    const communitySizes = buildCommunitySizes(numNodes, p, random);
    log.debug(`${communitySizes.length} communities: [${communitySizes.join(', ')}]`);

    const assignment = assignCommunities(numNodes, communitySizes, random);

    const edges = constructEdges(graph, nodes, degrees.sequence, assignment, {
      mu: p.mu,
      symmetrical: p.isSymmetrical,
      iterationFactor: this.tuning.iterationFactor,
      onEdge: this.onEdge,
    }, random);
    log.debug(`created ${edges.report.edgesCreated} of ${edges.report.targetEdges} target edges in ${edges.report.iterations} iterations`);

    this.state = {
      nodes: Object.freeze([...nodes]),
      degreeSequence: degrees.sequence,
      communitySizes: Object.freeze([...communitySizes]),
      communities: Object.freeze(assignment.communities.map(c => Object.freeze([...c]))),
      membership: assignment.membership,
      report: {
        numNodes,
        directed: graph.directed,
        seed: this.seed,
        degrees: degrees.report,
        communityCount: communitySizes.length,
        edges: edges.report,
      },
    };
    return graph;
  }

  /** Target degree per node index. */
  getDegreeSequence(): number[] {
    return Array.from(this.requireState().degreeSequence);
  }

  /** Community sizes as generated, in generation order. */
  getCommunitySizes(): number[] {
    return [...this.requireState().communitySizes];
  }

  /** Node → community id. */
  getNodeCommunityMap(): Map<T, number> {
    const { nodes, membership } = this.requireState();
    return new Map(nodes.map((node, i) => [node, membership[i]!]));
  }

  /** Community member lists as node indices. */
  getCommunities(): number[][] {
    return this.requireState().communities.map(c => [...c]);
  }

  /** Community membership by node index. */
  getMembership(): number[] {
    return Array.from(this.requireState().membership);
  }

  /** Nodes in the index order the generator used. */
  getNodes(): T[] {
    return [...this.requireState().nodes];
  }

  /** Requested average degree. */
  getAverageDegree(): number {
    return this.params.avgDegree;
  }

  /** Mean realized degree of the graph. */
  getActualAverageDegree(graph: GraphHandle<T>): number {
    const n = graph.size();
    if (n === 0) return 0;
    let total = 0;
    for (const node of graph.nodes()) total += graph.degree(node);
    return total / n;
  }

  calculateModularity(graph: GraphHandle<T>): number {
    const { nodes, membership } = this.requireState();
    return computeModularity(graph, nodes, membership);
  }

  getReport(): GenerationReport {
    return structuredClone(this.requireState().report);
  }

  summarize(graph: GraphHandle<T>): NetworkSummary {
    const s = this.requireState();
    return summarizeNetwork({
      graph,
      nodes: s.nodes,
      membership: s.membership,
      communities: s.communities,
      degreeSequence: s.degreeSequence,
      targetAverageDegree: this.params.avgDegree,
      mu: this.params.mu,
    });
  }

  private validateGeneration(numNodes: number, directed: boolean): void {
    if (numNodes < MIN_NODES) {
      throw new GenerationValidationError('numNodes', `Number of nodes must be at least ${MIN_NODES}`);
    }
    if (this.params.avgDegree >= numNodes) {
      throw new GenerationValidationError('avgDegree', 'Average degree must be less than number of nodes');
    }
    const { minDegree, maxDegree } = this.params;
    if (!directed && minDegree === maxDegree && (numNodes * minDegree) % 2 !== 0) {
      throw new GenerationValidationError(
        'degreeParity',
        `No undirected degree sequence of ${numNodes} nodes with fixed degree ${minDegree} has an even sum`,
      );
    }
  }

  private requireState(): GenerationState<T> {
    if (!this.state) throw new GeneratorStateError('generate() has not been called yet');
    return this.state;
  }
}
