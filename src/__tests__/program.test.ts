import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeAll, describe, it, expect, vi } from 'vitest';
import { parseGml } from '../export/gml';
import { ParameterValidationError } from '../errors';
import { createProgram, describeError } from '../program';

function quietProgram() {
  const program = createProgram();
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => {}, writeErr: () => {} });
  }
  return program;
}

function captureLog(): string[] {
  const lines: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((line: unknown) => {
    lines.push(String(line));
  });
  return lines;
}

describe('lfr generate', () => {
  let dir = '';
  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'lfr-cli-'));
  });
  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints statistics and writes the requested files', async () => {
    const lines = captureLog();
    const warnings: string[] = [];
    vi.spyOn(console, 'warn').mockImplementation((line: unknown) => {
      warnings.push(String(line));
    });
    await quietProgram().parseAsync(
      ['generate', '--avg-degree', '10', '--out', dir, '--name', 'bench', '--format', 'gml'],
      { from: 'user' },
    );
    expect(lines).toContain('Nodes: 100');
    expect(lines).toContain('Edges: 489');
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toMatch(/^lfr: /);
    expect(warnings[0]).toContain('Edge shortfall: 489/494 edges, 10 unfilled degree (iteration cap reached)');
    expect(lines).toContainEqual(expect.stringContaining(`Wrote ${join(dir, 'bench.gml')}`));

    const doc = parseGml(await readFile(join(dir, 'bench.gml'), 'utf8'));
    expect(doc.nodes).toHaveLength(100);
    expect(doc.edges).toHaveLength(489);
    expect(doc.avgDegree).toBe(10);
  });

  it('surfaces parameter errors', async () => {
    captureLog();
    const run = quietProgram().parseAsync(['generate', '--mu', '2'], { from: 'user' });
    await expect(run).rejects.toThrow(ParameterValidationError);
  });

  it('rejects non-numeric option values', async () => {
    const run = quietProgram().parseAsync(['generate', '--nodes', 'abc'], { from: 'user' });
    await expect(run).rejects.toThrow('Not a number.');
  });
});

describe('lfr scale-free', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the growth parameters', async () => {
    const lines = captureLog();
    await quietProgram().parseAsync(['scale-free', '--nodes', '10'], { from: 'user' });
    expect(lines).toEqual([
      'Nodes: 10',
      'Edges: 17',
      'BA parameters: m0=3, m=2',
      'Target average degree: 4',
      'Actual average degree: 3.40',
    ]);
  });
});

describe('describeError', () => {
  it('names the violated constraint', () => {
    expect(describeError(new ParameterValidationError('mu', 'mu must be between 0 and 1'))).toBe(
      'Invalid mu: mu must be between 0 and 1',
    );
    expect(describeError('boom')).toBe('boom');
  });
});
