/**
 * Target degree per node: independent power-law draws, one bounded
 * multiplicative correction toward the requested mean, then a parity fix
 * for undirected graphs.
 */
import type { GeneratorTuning } from '../config';
import { samplePowerLaw } from './power-law';
import type { Random } from './random';

export interface DegreeRange {
  tau1: number;
  minDegree: number;
  maxDegree: number;
  avgDegree: number;
}

export interface DegreeSequenceReport {
  sampledMean: number;
  corrected: boolean;
  /** 1 when no correction was applied. */
  correctionFactor: number;
  parityAdjusted: boolean;
  finalMean: number;
}

export interface DegreeSequenceResult {
  sequence: Int32Array;
  report: DegreeSequenceReport;
}

export function buildDegreeSequence(
  numNodes: number,
  directed: boolean,
  range: DegreeRange,
  tuning: Pick<GeneratorTuning, 'correctionThreshold' | 'correctionBounds'>,
  random: Random,
): DegreeSequenceResult {
  const { tau1, minDegree, maxDegree, avgDegree } = range;
  const sequence = new Int32Array(numNodes);
  for (let i = 0; i < numNodes; i++) {
    sequence[i] = samplePowerLaw(minDegree, maxDegree, tau1, random);
  }

  const sampledMean = mean(sequence);
  let corrected = false;
  let correctionFactor = 1;
  if (Math.abs(sampledMean - avgDegree) / avgDegree >= tuning.correctionThreshold) {
    const [low, high] = tuning.correctionBounds;
    correctionFactor = Math.min(high, Math.max(low, avgDegree / sampledMean));
    corrected = true;
    for (let i = 0; i < numNodes; i++) {
      const scaled = Math.round(sequence[i]! * correctionFactor);
      sequence[i] = Math.max(minDegree, Math.min(maxDegree, scaled));
    }
  }

  let parityAdjusted = false;
  if (!directed && sum(sequence) % 2 !== 0) {
    parityAdjusted = restoreParity(sequence, minDegree, maxDegree, random);
  }

  return {
    sequence,
    report: { sampledMean, corrected, correctionFactor, parityAdjusted, finalMean: mean(sequence) },
  };
}

/**
 * Make the total even by bumping one node: a random node if it has room,
 * else the first node below maxDegree, else lower the first node above minDegree.
 */
function restoreParity(sequence: Int32Array, minDegree: number, maxDegree: number, random: Random): boolean {
  const pick = random.int(sequence.length);
  if (sequence[pick]! < maxDegree) {
    sequence[pick]!++;
    return true;
  }
  for (let i = 0; i < sequence.length; i++) {
    if (sequence[i]! < maxDegree) {
      sequence[i]!++;
      return true;
    }
  }
  for (let i = 0; i < sequence.length; i++) {
    if (sequence[i]! > minDegree) {
      sequence[i]!--;
      return true;
    }
  }
  return false;
}

export function sum(values: ArrayLike<number>): number {
  let s = 0;
  for (let i = 0; i < values.length; i++) s += values[i]!;
  return s;
}

function mean(values: ArrayLike<number>): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}
