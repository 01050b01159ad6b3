/**
 * Write a generated network to disk as GML and/or CSV.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { ExportFormat } from '../config';
import { toEdgeCsv, toNodeCsv } from './csv';
import { toGml } from './gml';
import type { NetworkView } from './records';

export interface WrittenFiles {
  gml?: string;
  nodesCsv?: string;
  edgesCsv?: string;
}

/** <dir>/<name>.gml, <dir>/<name>_nodes.csv, <dir>/<name>_edges.csv */
export async function writeNetworkFiles<T>(
  view: NetworkView<T>,
  dir: string,
  name: string,
  format: ExportFormat = 'both',
): Promise<WrittenFiles> {
  await mkdir(dir, { recursive: true });
  const written: WrittenFiles = {};

  if (format === 'gml' || format === 'both') {
    written.gml = join(dir, `${name}.gml`);
    await writeFile(written.gml, toGml(view), 'utf8');
  }
  if (format === 'csv' || format === 'both') {
    written.nodesCsv = join(dir, `${name}_nodes.csv`);
    written.edgesCsv = join(dir, `${name}_edges.csv`);
    await writeFile(written.nodesCsv, toNodeCsv(view), 'utf8');
    await writeFile(written.edgesCsv, toEdgeCsv(view), 'utf8');
  }
  return written;
}
