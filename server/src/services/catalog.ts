// server/src/services/catalog.ts

import { DataIntegrityError, NotFoundError } from '../errors.js';
import { isAbilityInRange } from '../models/index.js';
import type { ClusterCentroid, PlayerRecord, RawPlayerRow } from '../models/index.js';
import { normalize } from './normalize.js';

export const PROBABILITY_TOLERANCE = 1e-3;

/** Ids that collide with fixed path segments under `/players`. */
export const RESERVED_PLAYER_IDS: ReadonlySet<string> = new Set(['search']);

export interface CatalogOptions {
  /** Expected attribute names; defaults to the first row's keys. */
  attributeNames?: readonly string[];
  /** Expected number of clusters; defaults to the probability vector length. */
  clusterCount?: number;
  centroids?: readonly ClusterCentroid[];
}

/**
 * Immutable player set. Built once from loader rows, validated as a whole,
 * and shared read-only afterwards.
 */
export class PlayerCatalog {
  readonly clusterCount: number;
  readonly dimensions: number;
  readonly attributeNames: readonly string[];
  readonly centroids: readonly ClusterCentroid[];

  private readonly records: readonly PlayerRecord[];
  private readonly byId: ReadonlyMap<string, PlayerRecord>;

  private constructor(
    records: readonly PlayerRecord[],
    byId: ReadonlyMap<string, PlayerRecord>,
    clusterCount: number,
    dimensions: number,
    attributeNames: readonly string[],
    centroids: readonly ClusterCentroid[]
  ) {
    this.records = records;
    this.byId = byId;
    this.clusterCount = clusterCount;
    this.dimensions = dimensions;
    this.attributeNames = attributeNames;
    this.centroids = centroids;
  }

  static build(rows: readonly RawPlayerRow[], options: CatalogOptions = {}): PlayerCatalog {
    const first = rows[0];
    const clusterCount = options.clusterCount ?? first?.clusterProbabilities.length ?? 0;
    const dimensions = first?.coordinates.length ?? 0;
    const attributeNames = Object.freeze(
      [...(options.attributeNames ?? (first ? Object.keys(first.attributes) : []))].sort()
    );

    if (!Number.isInteger(clusterCount) || clusterCount < 0) {
      throw new DataIntegrityError(`Invalid cluster count: ${clusterCount}`);
    }
    if (rows.length > 0 && dimensions === 0) {
      throw new DataIntegrityError('Players must have at least one coordinate');
    }

    const byId = new Map<string, PlayerRecord>();
    const records: PlayerRecord[] = [];

    rows.forEach((row, index) => {
      const record = toRecord(row, index, { clusterCount, dimensions, attributeNames });
      if (byId.has(record.id)) {
        throw new DataIntegrityError(`Duplicate player id "${record.id}" at row ${index + 1}`);
      }
      byId.set(record.id, record);
      records.push(record);
    });

    const centroids = validateCentroids(options.centroids ?? [], clusterCount, attributeNames);

    return new PlayerCatalog(
      Object.freeze(records),
      byId,
      clusterCount,
      dimensions,
      attributeNames,
      centroids
    );
  }

  get size(): number {
    return this.records.length;
  }

  /** @throws NotFoundError */
  get(id: string): PlayerRecord {
    const record = this.byId.get(id);
    if (!record) throw new NotFoundError('player', id);
    return record;
  }

  find(id: string): PlayerRecord | undefined {
    return this.byId.get(id);
  }

  /** Records in input order; the same array on every call. */
  all(): readonly PlayerRecord[] {
    return this.records;
  }

  centroid(clusterId: number): ClusterCentroid | undefined {
    return this.centroids.find((c) => c.clusterId === clusterId);
  }
}

interface Shape {
  clusterCount: number;
  dimensions: number;
  attributeNames: readonly string[];
}

function toRecord(row: RawPlayerRow, index: number, shape: Shape): PlayerRecord {
  const where = `row ${index + 1} ("${row.id}")`;

  if (row.id.trim() === '') {
    throw new DataIntegrityError(`Missing player id at row ${index + 1}`);
  }
  if (RESERVED_PLAYER_IDS.has(row.id)) {
    throw new DataIntegrityError(`Player id "${row.id}" is reserved at row ${index + 1}`);
  }
  if (!Number.isInteger(row.currentAbility) || !Number.isInteger(row.potentialAbility)) {
    throw new DataIntegrityError(`Abilities must be integers at ${where}`);
  }

  if (row.coordinates.length !== shape.dimensions) {
    throw new DataIntegrityError(
      `Coordinate length mismatch at ${where}: expected ${shape.dimensions}, got ${row.coordinates.length}`
    );
  }
  if (!row.coordinates.every(Number.isFinite)) {
    throw new DataIntegrityError(`Non-finite coordinate at ${where}`);
  }

  if (!Number.isInteger(row.clusterId) || row.clusterId < 0 || row.clusterId >= shape.clusterCount) {
    throw new DataIntegrityError(
      `Cluster id ${row.clusterId} out of range [0, ${shape.clusterCount - 1}] at ${where}`
    );
  }
  validateProbabilities(row, shape.clusterCount, where);

  const names = Object.keys(row.attributes).sort();
  const missing = shape.attributeNames.filter((name) => !(name in row.attributes));
  const unexpected = names.filter((name) => !shape.attributeNames.includes(name));
  if (missing.length || unexpected.length) {
    const parts = [
      missing.length ? `missing ${missing.join(', ')}` : '',
      unexpected.length ? `unexpected ${unexpected.join(', ')}` : ''
    ].filter(Boolean);
    throw new DataIntegrityError(`Attribute mismatch at ${where}: ${parts.join('; ')}`);
  }
  for (const name of names) {
    if (!Number.isFinite(row.attributes[name])) {
      throw new DataIntegrityError(`Non-finite attribute ${name} at ${where}`);
    }
  }

  return Object.freeze({
    id: row.id,
    displayName: row.name,
    searchKey: normalize(row.name),
    club: row.club,
    currentAbility: row.currentAbility,
    potentialAbility: row.potentialAbility,
    abilityOutOfRange: !isAbilityInRange(row.currentAbility) || !isAbilityInRange(row.potentialAbility),
    attributes: Object.freeze({ ...row.attributes }),
    clusterId: row.clusterId,
    clusterProbabilities: Object.freeze([...row.clusterProbabilities]),
    coordinates: Object.freeze([...row.coordinates])
  });
}

function validateProbabilities(row: RawPlayerRow, clusterCount: number, where: string): void {
  const probs = row.clusterProbabilities;
  if (probs.length !== clusterCount) {
    throw new DataIntegrityError(
      `Expected ${clusterCount} cluster probabilities at ${where}, got ${probs.length}`
    );
  }
  if (!probs.every((p) => Number.isFinite(p) && p >= 0 && p <= 1)) {
    throw new DataIntegrityError(`Cluster probabilities must lie in [0, 1] at ${where}`);
  }

  const sum = probs.reduce((acc, p) => acc + p, 0);
  if (Math.abs(sum - 1) > PROBABILITY_TOLERANCE) {
    throw new DataIntegrityError(`Cluster probabilities sum to ${sum.toFixed(4)} at ${where}`);
  }

  // the assigned cluster is always the arg-max
  const assigned = probs[row.clusterId];
  if (probs.some((p) => p > assigned)) {
    throw new DataIntegrityError(
      `Cluster ${row.clusterId} is not the most probable cluster at ${where}`
    );
  }
}

function validateCentroids(
  centroids: readonly ClusterCentroid[],
  clusterCount: number,
  attributeNames: readonly string[]
): readonly ClusterCentroid[] {
  const seen = new Set<number>();
  const frozen = centroids.map((centroid) => {
    const { clusterId } = centroid;
    if (!Number.isInteger(clusterId) || clusterId < 0 || clusterId >= clusterCount) {
      throw new DataIntegrityError(
        `Centroid cluster id ${clusterId} out of range [0, ${clusterCount - 1}]`
      );
    }
    if (seen.has(clusterId)) {
      throw new DataIntegrityError(`Duplicate centroid for cluster ${clusterId}`);
    }
    seen.add(clusterId);
    const unknown = Object.keys(centroid.attributes).filter((name) => !attributeNames.includes(name));
    if (unknown.length) {
      throw new DataIntegrityError(
        `Centroid for cluster ${clusterId} has unknown attributes: ${unknown.sort().join(', ')}`
      );
    }
    return Object.freeze({ clusterId, attributes: Object.freeze({ ...centroid.attributes }) });
  });
  return Object.freeze(frozen.sort((a, b) => a.clusterId - b.clusterId));
}
