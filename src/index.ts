/**
 * LFR benchmark generator: power-law degree and community-size distributions
 * with a tunable mixing parameter, plus quality measures and GML/CSV export.
 */
export { LFRGenerator, MIN_NODES, type LFROptions, type GenerationReport } from './analysis/lfr';
export { createRandom, mulberry32, DEFAULT_SEED, type Random } from './analysis/random';
export { samplePowerLaw, invertPowerLaw } from './analysis/power-law';
export { buildDegreeSequence, type DegreeSequenceReport, type DegreeSequenceResult } from './analysis/degree-sequence';
export { buildCommunitySizes } from './analysis/community-sizes';
export { assignCommunities, type CommunityAssignment } from './analysis/community-assignment';
export {
  constructEdges,
  targetEdgeCount,
  type EdgeConstructionOptions,
  type EdgeConstructionReport,
} from './analysis/edge-construction';
export { MaxPriorityQueue } from './analysis/priority-queue';
export {
  computeModularity,
  degreeStatistics,
  communityStatistics,
  mixingStatistics,
  communityAttributeStatistics,
  summarizeNetwork,
  formatSummary,
  type NetworkSummary,
  type DegreeStatistics,
  type CommunityStatistics,
  type MixingStatistics,
  type CommunityAttributeSummary,
} from './analysis/quality';
export { barabasiAlbert, topDegreeNodes, type ScaleFreeParams, type ScaleFreeReport } from './analysis/scale-free';
export { type GraphHandle, indexNodes, edgeKey } from './graph/types';
export { SimpleGraph } from './graph/simple-graph';
export { CytoscapeGraph } from './graph/cytoscape-graph';
export { toGml, parseGml, type GmlDocument } from './export/gml';
export { toNodeCsv, toEdgeCsv, parseNodeCsv, parseEdgeCsv } from './export/csv';
export { nodeRecords, edgeRecords, type NetworkView, type NodeRecord, type EdgeRecord } from './export/records';
export { writeNetworkFiles } from './export/files';
export {
  LFRParamsSchema,
  GeneratorTuningSchema,
  RunConfigSchema,
  parseLFRParams,
  parseTuning,
  parseRunConfig,
  loadRunConfig,
  applyOverrides,
  DEFAULT_TUNING,
  type LFRParams,
  type LFRParamsInput,
  type GeneratorTuning,
  type RunConfig,
} from './config';
export {
  LFRError,
  ParameterValidationError,
  GenerationValidationError,
  GeneratorStateError,
} from './errors';
