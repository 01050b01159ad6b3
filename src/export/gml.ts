/**
 * GML writer and a reader for the subset it writes.
 */
import { LFRError } from '../errors';
import { edgeRecords, nodeRecords, type EdgeType, type NetworkView } from './records';

export const GML_COMMENT = 'LFR Benchmark Network';

function quote(value: string): string {
  return `"${value.replace(/&/g, '&amp;').replace(/"/g, '&quot;')}"`;
}

function unquote(value: string): string {
  return value.replace(/&quot;/g, '"').replace(/&amp;/g, '&');
}

export function toGml<T>(view: NetworkView<T>): string {
  const lines: string[] = [
    'graph [',
    `  directed ${view.graph.directed ? 1 : 0}`,
    `  comment ${quote(GML_COMMENT)}`,
    `  avgDegree ${view.avgDegree}`,
    `  mu ${view.mu}`,
    '',
  ];
  for (const node of nodeRecords(view)) {
    lines.push(
      '  node [',
      `    id ${node.id}`,
      `    label ${quote(node.label)}`,
      `    community ${node.community}`,
      `    degree ${node.degree}`,
      '  ]',
    );
  }
  lines.push('');
  for (const edge of edgeRecords(view)) {
    lines.push(
      '  edge [',
      `    source ${edge.source}`,
      `    target ${edge.target}`,
      `    type ${quote(edge.type)}`,
      '  ]',
    );
  }
  lines.push(']');
  return lines.join('\n') + '\n';
}

// ─── Reader ───

type GmlValue = number | string | GmlList;
interface GmlList {
  entries: [string, GmlValue][];
}

const TOKEN = /\s*(?:(\[)|(\])|"([^"]*)"|([^\s[\]"]+))/y;

function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let pos = 0;
  TOKEN.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = TOKEN.exec(text)) !== null) {
    if (match[1]) tokens.push('[');
    else if (match[2]) tokens.push(']');
    else if (match[3] !== undefined) tokens.push(`"${match[3]}`);
    else if (match[4]) tokens.push(match[4]);
    pos = TOKEN.lastIndex;
  }
  if (text.slice(pos).trim() !== '') {
    throw new LFRError(`Unexpected GML input near offset ${pos}`);
  }
  return tokens;
}

function parseList(tokens: string[], pos: number, closing: boolean): [GmlList, number] {
  const list: GmlList = { entries: [] };
  while (pos < tokens.length) {
    const key = tokens[pos]!;
    if (key === ']') {
      if (!closing) throw new LFRError('Unbalanced "]" in GML');
      return [list, pos + 1];
    }
    const value = tokens[pos + 1];
    if (value === undefined) throw new LFRError(`GML key "${key}" has no value`);
    if (value === '[') {
      const [child, next] = parseList(tokens, pos + 2, true);
      list.entries.push([key, child]);
      pos = next;
    } else if (value.startsWith('"')) {
      list.entries.push([key, unquote(value.slice(1))]);
      pos += 2;
    } else {
      const n = Number(value);
      if (!Number.isFinite(n)) throw new LFRError(`GML key "${key}" has a non-numeric value "${value}"`);
      list.entries.push([key, n]);
      pos += 2;
    }
  }
  if (closing) throw new LFRError('Unterminated GML list');
  return [list, pos];
}

function field(list: GmlList, key: string): GmlValue | undefined {
  return list.entries.find(([k]) => k === key)?.[1];
}

function numberField(list: GmlList, key: string, owner: string): number {
  const value = field(list, key);
  if (typeof value !== 'number') throw new LFRError(`GML ${owner} is missing numeric "${key}"`);
  return value;
}

function stringField(list: GmlList, key: string, owner: string): string {
  const value = field(list, key);
  if (typeof value !== 'string') throw new LFRError(`GML ${owner} is missing string "${key}"`);
  return value;
}

function isList(value: GmlValue | undefined): value is GmlList {
  return typeof value === 'object';
}

function children(list: GmlList, key: string): GmlList[] {
  return list.entries.flatMap(([k, v]) => (k === key && isList(v) ? [v] : []));
}

export interface GmlNode {
  id: number;
  label: string;
  community: number;
  degree: number;
}

export interface GmlEdge {
  source: number;
  target: number;
  type: EdgeType;
}

export interface GmlDocument {
  directed: boolean;
  comment: string;
  avgDegree: number;
  mu: number;
  nodes: GmlNode[];
  edges: GmlEdge[];
}

export function parseGml(text: string): GmlDocument {
  const [root] = parseList(tokenize(text), 0, false);
  const graph = field(root, 'graph');
  if (!isList(graph)) throw new LFRError('GML has no graph block');

  return {
    directed: numberField(graph, 'directed', 'graph') === 1,
    comment: stringField(graph, 'comment', 'graph'),
    avgDegree: numberField(graph, 'avgDegree', 'graph'),
    mu: numberField(graph, 'mu', 'graph'),
    nodes: children(graph, 'node').map(n => ({
      id: numberField(n, 'id', 'node'),
      label: stringField(n, 'label', 'node'),
      community: numberField(n, 'community', 'node'),
      degree: numberField(n, 'degree', 'node'),
    })),
    edges: children(graph, 'edge').map(e => {
      const type = stringField(e, 'type', 'edge');
      if (type !== 'intra' && type !== 'inter') throw new LFRError(`GML edge has unknown type "${type}"`);
      return { source: numberField(e, 'source', 'edge'), target: numberField(e, 'target', 'edge'), type };
    }),
  };
}
