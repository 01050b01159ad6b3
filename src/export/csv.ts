/**
 * Node and edge CSV tables (Papa Parse).
 */
import Papa from 'papaparse';
import { LFRError } from '../errors';
import {
  edgeRecords,
  nodeRecords,
  type EdgeRecord,
  type EdgeType,
  type NetworkView,
  type NodeRecord,
} from './records';

export const NODE_COLUMNS = ['id', 'label', 'community', 'degree', 'expected_degree'] as const;
export const EDGE_COLUMNS = ['source', 'target', 'type', 'source_community', 'target_community'] as const;

function table(columns: readonly string[], rows: (string | number)[][], quotes: boolean[]): string {
  // Header written by hand so per-column quoting applies to data rows only
  const body = rows.length > 0 ? Papa.unparse(rows, { quotes, newline: '\n' }) + '\n' : '';
  return `${columns.join(',')}\n${body}`;
}

export function toNodeCsv<T>(view: NetworkView<T>): string {
  const rows = nodeRecords(view).map(r => [r.id, r.label, r.community, r.degree, r.expectedDegree]);
  return table(NODE_COLUMNS, rows, [false, true, false, false, false]);
}

export function toEdgeCsv<T>(view: NetworkView<T>): string {
  const rows = edgeRecords(view).map(r => [r.source, r.target, r.type, r.sourceCommunity, r.targetCommunity]);
  return table(EDGE_COLUMNS, rows, [false, false, false, false, false]);
}

function parseTable(text: string, columns: readonly string[], what: string): Record<string, string>[] {
  const result = Papa.parse<Record<string, string>>(text, { header: true, skipEmptyLines: true });
  const firstError = result.errors[0];
  if (firstError) {
    throw new LFRError(`Malformed ${what} CSV at row ${firstError.row ?? '?'}: ${firstError.message}`);
  }
  const fields = result.meta.fields ?? [];
  const missing = columns.filter(c => !fields.includes(c));
  if (missing.length > 0) {
    throw new LFRError(`${what} CSV is missing columns: ${missing.join(', ')}`);
  }
  return result.data;
}

function toInt(value: string | undefined, column: string): number {
  const n = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isInteger(n)) {
    throw new LFRError(`Column ${column} must hold integers, got "${value ?? ''}"`);
  }
  return n;
}

function toEdgeType(value: string | undefined): EdgeType {
  if (value === 'intra' || value === 'inter') return value;
  throw new LFRError(`Column type must be intra or inter, got "${value ?? ''}"`);
}

export function parseNodeCsv(text: string): NodeRecord[] {
  return parseTable(text, NODE_COLUMNS, 'node').map(row => ({
    id: toInt(row.id, 'id'),
    label: row.label ?? '',
    community: toInt(row.community, 'community'),
    degree: toInt(row.degree, 'degree'),
    expectedDegree: toInt(row.expected_degree, 'expected_degree'),
  }));
}

export function parseEdgeCsv(text: string): EdgeRecord[] {
  return parseTable(text, EDGE_COLUMNS, 'edge').map(row => ({
    source: toInt(row.source, 'source'),
    target: toInt(row.target, 'target'),
    type: toEdgeType(row.type),
    sourceCommunity: toInt(row.source_community, 'source_community'),
    targetCommunity: toInt(row.target_community, 'target_community'),
  }));
}
