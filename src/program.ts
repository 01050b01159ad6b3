/**
 * Commands behind the `lfr` executable.
 */
import chalk from 'chalk';
import { Command, InvalidArgumentError } from 'commander';
import { LFRGenerator } from './analysis/lfr';
import { formatSummary } from './analysis/quality';
import { barabasiAlbert } from './analysis/scale-free';
import { applyOverrides, loadRunConfig, parseRunConfig, ExportFormatSchema, type ExportFormat } from './config';
import { GenerationValidationError, LFRError, ParameterValidationError } from './errors';
import { writeNetworkFiles } from './export/files';
import { SimpleGraph } from './graph/simple-graph';
import { createLogger } from './log';

const log = createLogger('lfr');

interface GenerateOptions {
  config?: string;
  nodes?: number;
  tau1?: number;
  tau2?: number;
  mu?: number;
  minDegree?: number;
  maxDegree?: number;
  avgDegree?: number;
  minCommunity?: number;
  maxCommunity?: number;
  directed?: boolean;
  symmetrical?: boolean;
  seed?: number;
  out?: string;
  name?: string;
  format?: ExportFormat;
}

interface ScaleFreeOptions {
  nodes: number;
  avgDegree: number;
  seed?: number;
}

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n)) throw new InvalidArgumentError('Not a number.');
  return n;
}

function parseInteger(value: string): number {
  const n = parseNumber(value);
  if (!Number.isInteger(n)) throw new InvalidArgumentError('Not an integer.');
  return n;
}

function parseFormat(value: string): ExportFormat {
  const result = ExportFormatSchema.safeParse(value);
  if (!result.success) throw new InvalidArgumentError('Expected gml, csv or both.');
  return result.data;
}

async function runGenerate(opts: GenerateOptions): Promise<void> {
  const base = opts.config ? await loadRunConfig(opts.config) : parseRunConfig({});
  const config = applyOverrides(base, {
    nodes: opts.nodes,
    directed: opts.directed,
    seed: opts.seed,
    params: {
      tau1: opts.tau1,
      tau2: opts.tau2,
      mu: opts.mu,
      minDegree: opts.minDegree,
      maxDegree: opts.maxDegree,
      avgDegree: opts.avgDegree,
      minCommunity: opts.minCommunity,
      maxCommunity: opts.maxCommunity,
      isSymmetrical: opts.symmetrical,
    },
    export: { dir: opts.out, name: opts.name, format: opts.format },
  });
  const generator = new LFRGenerator<number>(config.params, { seed: config.seed, tuning: config.tuning });
  const graph = generator.generate(new SimpleGraph(config.nodes, config.directed));

  const summary = generator.summarize(graph);
  for (const line of formatSummary(summary)) console.log(line);

  const { edges } = generator.getReport();
  if (edges.edgesCreated < edges.targetEdges) {
    log.warn(chalk.yellow(
      `Edge shortfall: ${edges.edgesCreated}/${edges.targetEdges} edges, ` +
      `${edges.remainingDeficit} unfilled degree${edges.hitIterationCap ? ' (iteration cap reached)' : ''}`,
    ));
  }
  if (summary.communities.count < 2) {
    log.warn(chalk.yellow('Fewer than two communities were generated.'));
  }

  if (config.export.dir) {
    const written = await writeNetworkFiles(
      {
        graph,
        nodes: generator.getNodes(),
        membership: generator.getMembership(),
        degreeSequence: generator.getDegreeSequence(),
        avgDegree: generator.getAverageDegree(),
        mu: generator.params.mu,
      },
      config.export.dir,
      config.export.name,
      config.export.format,
    );
    for (const path of Object.values(written)) console.log(chalk.green(`Wrote ${path}`));
  }
}

function runScaleFree(opts: ScaleFreeOptions): void {
  const graph = new SimpleGraph(opts.nodes);
  const report = barabasiAlbert(graph, { averageDegree: opts.avgDegree, seed: opts.seed });
  console.log(`Nodes: ${opts.nodes}`);
  console.log(`Edges: ${report.edges}`);
  console.log(`BA parameters: m0=${report.m0}, m=${report.m}`);
  console.log(`Target average degree: ${opts.avgDegree}`);
  console.log(`Actual average degree: ${report.actualAverageDegree.toFixed(2)}`);
}

export function describeError(err: unknown): string {
  if (err instanceof ParameterValidationError || err instanceof GenerationValidationError) {
    return `Invalid ${err.constraint}: ${err.message}`;
  }
  if (err instanceof LFRError || err instanceof Error) return err.message;
  return String(err);
}

/** Build the `lfr` command tree; the caller parses argv. */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('lfr')
    .description('LFR benchmark network generator')
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate an LFR benchmark network and print its statistics')
    .option('-c, --config <file>', 'JSON run configuration')
    .option('-n, --nodes <number>', 'Number of nodes', parseInteger)
    .option('--tau1 <number>', 'Degree distribution exponent', parseNumber)
    .option('--tau2 <number>', 'Community size distribution exponent', parseNumber)
    .option('--mu <number>', 'Mixing parameter', parseNumber)
    .option('--min-degree <number>', 'Minimum degree', parseInteger)
    .option('--max-degree <number>', 'Maximum degree', parseInteger)
    .option('--avg-degree <number>', 'Target average degree', parseNumber)
    .option('--min-community <number>', 'Minimum community size', parseInteger)
    .option('--max-community <number>', 'Maximum community size', parseInteger)
    .option('--directed', 'Build a directed graph')
    .option('--symmetrical', 'Mirror every directed edge')
    .option('-s, --seed <number>', 'Random seed', parseInteger)
    .option('-o, --out <dir>', 'Write GML/CSV files to this directory')
    .option('--name <basename>', 'Base name for exported files')
    .option('-f, --format <format>', 'Export format: gml, csv or both', parseFormat)
    .action(async (opts: GenerateOptions) => {
      await runGenerate(opts);
    });

  program
    .command('scale-free')
    .description('Generate a Barabasi-Albert scale-free network')
    .option('-n, --nodes <number>', 'Number of nodes', parseInteger, 100)
    .option('--avg-degree <number>', 'Target average degree', parseNumber, 4)
    .option('-s, --seed <number>', 'Random seed', parseInteger)
    .action((opts: ScaleFreeOptions) => {
      runScaleFree(opts);
    });

  return program;
}
