// server/src/utils/dataLoader.ts

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { DataIntegrityError } from '../errors.js';
import type { ClusterCentroid, RawPlayerRow } from '../models/index.js';
import { PlayerCatalog } from '../services/catalog.js';

/** Role attributes the clustering model was fitted on (z-scored columns). */
export const ROLE_ATTRIBUTES = [
  'Pas', 'Tec', 'Vis', 'Dec', 'Fir', 'Dri', 'Fin',
  'Tck', 'Mar', 'Pos', 'Ant', 'Cmp', 'Cnt', 'Det',
  'Wor', 'Sta', 'Pac', 'Str'
] as const;

const REQUIRED_COLUMNS = ['Name', 'CA', 'PA', 'role_cluster'];
const OPTIONAL_COLUMNS = ['UID', 'Club'];
const COORDINATE_COLUMN = /^pc(\d+)$/;
const PROBABILITY_COLUMN = /^cluster_(\d+)_prob$/;

type CsvRow = Record<string, string>;

export interface PlayersCsvOptions {
  attributes?: readonly string[];
}

export interface PlayersTable {
  rows: RawPlayerRow[];
  /** Number of `cluster_{i}_prob` columns, known even when there are no rows. */
  clusterCount: number;
}

function readCsv(content: string): { header: string[]; rows: CsvRow[] } {
  let header: string[] = [];
  const rows: CsvRow[] = parse(content, {
    bom: true,
    columns: (names: string[]) => {
      header = names.map((n) => n.trim());
      const repeated = header.filter((name, i) => header.indexOf(name) !== i);
      if (repeated.length) {
        throw new DataIntegrityError(`Duplicate columns: ${[...new Set(repeated)].join(', ')}`);
      }
      return header;
    },
    skip_empty_lines: true,
    trim: true
  });
  return { header, rows };
}

/**
 * Collect `pattern` columns whose numeric suffixes must run contiguously
 * from `start`. Returned in suffix order.
 */
function indexedColumns(header: string[], pattern: RegExp, start: number, label: string): string[] {
  const found = header
    .map((name) => ({ name, match: pattern.exec(name) }))
    .filter((c): c is { name: string; match: RegExpExecArray } => c.match !== null)
    .map((c) => ({ name: c.name, n: Number(c.match[1]) }))
    .sort((a, b) => a.n - b.n);

  if (found.length === 0) {
    throw new DataIntegrityError(`No ${label} columns found`);
  }
  found.forEach((c, i) => {
    if (c.n !== start + i) {
      throw new DataIntegrityError(`${label} columns are not contiguous: expected index ${start + i}, found ${c.name}`);
    }
  });
  return found.map((c) => c.name);
}

function parseNumber(row: CsvRow, column: string, line: number): number {
  const raw = row[column] ?? '';
  const value = raw === '' ? NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new DataIntegrityError(`Invalid number in column ${column} at row ${line}: "${raw}"`);
  }
  return value;
}

/** Parse the players export into catalog rows. */
export function parsePlayersCsv(content: string, options: PlayersCsvOptions = {}): RawPlayerRow[] {
  return parsePlayersTable(content, options).rows;
}

/**
 * Parse the players export of the offline clustering run, keeping the
 * cluster count its header declares. The column set is fixed: anything
 * missing or unexpected is rejected.
 */
export function parsePlayersTable(content: string, options: PlayersCsvOptions = {}): PlayersTable {
  const attributes = options.attributes ?? ROLE_ATTRIBUTES;
  const { header, rows } = readCsv(content);

  const missing = [...REQUIRED_COLUMNS, ...attributes].filter((c) => !header.includes(c));
  if (missing.length) {
    throw new DataIntegrityError(`Missing columns: ${missing.join(', ')}`);
  }

  const coordinateColumns = indexedColumns(header, COORDINATE_COLUMN, 1, 'Coordinate');
  const probabilityColumns = indexedColumns(header, PROBABILITY_COLUMN, 0, 'Cluster probability');

  const known = new Set([
    ...REQUIRED_COLUMNS,
    ...OPTIONAL_COLUMNS,
    ...attributes,
    ...coordinateColumns,
    ...probabilityColumns
  ]);
  const unexpected = header.filter((c) => !known.has(c));
  if (unexpected.length) {
    throw new DataIntegrityError(`Unexpected columns: ${unexpected.join(', ')}`);
  }

  const players = rows.map((row, index) => {
    const line = index + 1;
    const attributeScores: Record<string, number> = {};
    for (const attr of attributes) {
      attributeScores[attr] = parseNumber(row, attr, line);
    }

    return {
      id: row.UID || String(line),
      name: row.Name ?? '',
      club: row.Club || null,
      currentAbility: parseNumber(row, 'CA', line),
      potentialAbility: parseNumber(row, 'PA', line),
      attributes: attributeScores,
      clusterId: parseNumber(row, 'role_cluster', line),
      clusterProbabilities: probabilityColumns.map((c) => parseNumber(row, c, line)),
      coordinates: coordinateColumns.map((c) => parseNumber(row, c, line))
    };
  });

  return { rows: players, clusterCount: probabilityColumns.length };
}

/** Parse the long-format centroid table (`cluster,attr,z`). */
export function parseCentroidsCsv(content: string): ClusterCentroid[] {
  const { header, rows } = readCsv(content);

  const missing = ['cluster', 'attr', 'z'].filter((c) => !header.includes(c));
  if (missing.length) {
    throw new DataIntegrityError(`Missing centroid columns: ${missing.join(', ')}`);
  }

  const byCluster = new Map<number, Record<string, number>>();
  rows.forEach((row, index) => {
    const line = index + 1;
    const clusterId = parseNumber(row, 'cluster', line);
    const attr = row.attr ?? '';
    if (!attr) {
      throw new DataIntegrityError(`Missing attribute name in centroid row ${line}`);
    }

    const scores = byCluster.get(clusterId) ?? {};
    if (attr in scores) {
      throw new DataIntegrityError(`Duplicate centroid attribute ${attr} for cluster ${clusterId}`);
    }
    scores[attr] = parseNumber(row, 'z', line);
    byCluster.set(clusterId, scores);
  });

  return [...byCluster.entries()]
    .sort(([a], [b]) => a - b)
    .map(([clusterId, attributes]) => ({ clusterId, attributes }));
}

export interface DatasetFiles {
  players: string;
  centroids: string;
}

function readFile(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    throw new DataIntegrityError(`Data file not found: ${filePath}`);
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/** Read both exports from `dir` and build the catalog in one step. */
export function loadDataset(dir: string, files: DatasetFiles, options: PlayersCsvOptions = {}): PlayerCatalog {
  const attributes = options.attributes ?? ROLE_ATTRIBUTES;
  const { rows, clusterCount } = parsePlayersTable(readFile(path.join(dir, files.players)), { attributes });
  const centroids = parseCentroidsCsv(readFile(path.join(dir, files.centroids)));

  return PlayerCatalog.build(rows, { attributeNames: attributes, clusterCount, centroids });
}
