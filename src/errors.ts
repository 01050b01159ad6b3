/**
 * Error types raised by the generator.
 * Edge-construction shortfall is reported, never thrown.
 */

export class LFRError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ParameterConstraint =
  | 'tau1'
  | 'tau2'
  | 'mu'
  | 'minDegree'
  | 'maxDegree'
  | 'avgDegree'
  | 'minCommunity'
  | 'maxCommunity'
  | 'isSymmetrical'
  /** The input as a whole, e.g. not an object. */
  | 'input';

/** Invalid constructor parameters. The generator object is not created. */
export class ParameterValidationError extends LFRError {
  constructor(readonly constraint: ParameterConstraint, message: string) {
    super(message);
  }
}

export type GenerationConstraint = 'numNodes' | 'avgDegree' | 'degreeParity';

/** Raised by generate() before any allocation or random draw. */
export class GenerationValidationError extends LFRError {
  constructor(readonly constraint: GenerationConstraint, message: string) {
    super(message);
  }
}

/** A query was made before the first generate() call. */
export class GeneratorStateError extends LFRError {}
