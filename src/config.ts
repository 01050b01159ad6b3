/**
 * Parameter schemas, defaults and run-configuration loading.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { LFRError, ParameterValidationError, type ParameterConstraint } from './errors';

const CONSTRAINTS: readonly ParameterConstraint[] = [
  'tau1', 'tau2', 'mu', 'minDegree', 'maxDegree', 'avgDegree', 'minCommunity', 'maxCommunity', 'isSymmetrical',
];

export const DEFAULT_MIN_COMMUNITY = 10;
export const DEFAULT_MAX_COMMUNITY = 50;

export const LFRParamsSchema = z
  .object({
    tau1: z.number().gt(1, 'tau1 must be greater than 1'),
    tau2: z.number().gt(1, 'tau2 must be greater than 1'),
    mu: z.number().min(0, 'mu must be between 0 and 1').max(1, 'mu must be between 0 and 1'),
    minDegree: z.number().int('minDegree must be an integer').min(1, 'minDegree must be at least 1'),
    maxDegree: z.number().int('maxDegree must be an integer'),
    avgDegree: z.number().optional(),
    minCommunity: z
      .number()
      .int('minCommunity must be an integer')
      .min(1, 'minCommunity must be at least 1')
      .default(DEFAULT_MIN_COMMUNITY),
    maxCommunity: z.number().int('maxCommunity must be an integer').default(DEFAULT_MAX_COMMUNITY),
    isSymmetrical: z.boolean().default(false),
  })
  .superRefine((p, ctx) => {
    if (p.maxDegree < p.minDegree) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['maxDegree'], message: 'maxDegree must be >= minDegree' });
      return;
    }
    const avg = p.avgDegree ?? (p.minDegree + p.maxDegree) / 2;
    if (!Number.isFinite(avg) || avg < p.minDegree || avg > p.maxDegree) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['avgDegree'],
        message: 'avgDegree must be between minDegree and maxDegree',
      });
    }
    if (p.maxCommunity < p.minCommunity) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxCommunity'],
        message: 'maxCommunity must be >= minCommunity',
      });
    }
  })
  .transform((p) => ({ ...p, avgDegree: p.avgDegree ?? (p.minDegree + p.maxDegree) / 2 }));

export type LFRParamsInput = z.input<typeof LFRParamsSchema>;
export type LFRParams = z.output<typeof LFRParamsSchema>;

export const GeneratorTuningSchema = z
  .object({
    /** Relative deviation of the sampled mean degree that triggers rescaling. */
    correctionThreshold: z.number().min(0).default(0.15),
    /** Clamp applied to the rescaling factor. */
    correctionBounds: z.tuple([z.number().positive(), z.number().positive()]).default([0.8, 1.3]),
    /** Edge construction stops after iterationFactor * targetEdges rounds. */
    iterationFactor: z.number().positive().default(3),
  })
  .refine((t) => t.correctionBounds[0] <= t.correctionBounds[1], {
    message: 'correctionBounds must be ordered [low, high]',
    path: ['correctionBounds'],
  });

export type GeneratorTuningInput = z.input<typeof GeneratorTuningSchema>;
export type GeneratorTuning = z.output<typeof GeneratorTuningSchema>;

export const DEFAULT_TUNING: GeneratorTuning = GeneratorTuningSchema.parse({});

/**
 * Validate generator parameters, reporting the first failed constraint.
 */
export function parseLFRParams(input: unknown): LFRParams {
  const result = LFRParamsSchema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const field = issue?.path[0];
  const constraint = CONSTRAINTS.find(c => c === field) ?? 'input';
  throw new ParameterValidationError(constraint, issue ? issue.message : 'Invalid LFR parameters');
}

export function parseTuning(input: unknown): GeneratorTuning {
  const result = GeneratorTuningSchema.safeParse(input ?? {});
  if (result.success) return result.data;
  throw new LFRError(`Invalid generator tuning: ${describeIssue(result.error)}`);
}

// ─── Run configuration (CLI / JSON file) ───

export const ExportFormatSchema = z.enum(['gml', 'csv', 'both']);
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const RunConfigSchema = z.object({
  nodes: z.number().int().positive().default(100),
  directed: z.boolean().default(false),
  seed: z.number().int().default(42),
  params: z
    .object({
      tau1: z.number().default(2.5),
      tau2: z.number().default(1.5),
      mu: z.number().default(0.2),
      minDegree: z.number().default(5),
      maxDegree: z.number().default(20),
      avgDegree: z.number().optional(),
      minCommunity: z.number().optional(),
      maxCommunity: z.number().optional(),
      isSymmetrical: z.boolean().optional(),
    })
    .default({}),
  tuning: GeneratorTuningSchema.optional(),
  export: z
    .object({
      dir: z.string().optional(),
      name: z.string().min(1).default('lfr_network'),
      format: ExportFormatSchema.default('both'),
    })
    .default({}),
});

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = z.output<typeof RunConfigSchema>;

export function parseRunConfig(input: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(input ?? {});
  if (result.success) return result.data;
  throw new LFRError(`Invalid run configuration: ${describeIssue(result.error)}`);
}

export interface RunOverrides {
  nodes?: number;
  directed?: boolean;
  seed?: number;
  params?: { [K in keyof RunConfig['params']]?: RunConfig['params'][K] | undefined };
  export?: { dir?: string; name?: string; format?: ExportFormat };
}

/** Drop undefined entries so they do not shadow existing values. */
function defined(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}

/** Command-line values win over the configuration file, which wins over defaults. */
export function applyOverrides(base: RunConfig, overrides: RunOverrides): RunConfig {
  return parseRunConfig({
    ...base,
    ...defined({ nodes: overrides.nodes, directed: overrides.directed, seed: overrides.seed }),
    params: { ...base.params, ...defined({ ...overrides.params }) },
    export: { ...base.export, ...defined({ ...overrides.export }) },
  });
}

/** Read and validate a JSON run configuration file. */
export async function loadRunConfig(path: string): Promise<RunConfig> {
  const text = await readFile(path, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new LFRError(`Run configuration ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseRunConfig(raw);
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'unknown issue';
  const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return `${where}${issue.message}`;
}
