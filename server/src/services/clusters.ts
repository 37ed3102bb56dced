// server/src/services/clusters.ts

import { NotFoundError } from '../errors.js';
import type { ClusterCentroid, ClusterRole, PlayerRecord } from '../models/index.js';
import type { PlayerCatalog } from './catalog.js';
import { compareNames } from './searchIndex.js';

// Role labels for the five-cluster model. Other cluster counts fall back to
// "Cluster {id}".
export const CLUSTER_ROLES: Readonly<Record<number, ClusterRole>> = {
  0: {
    name: 'Deep Controller',
    description: 'Deep-lying playmakers who control the tempo from deeper positions. Strong passing, vision, and positioning.'
  },
  1: {
    name: 'Final-Third Creator',
    description: 'Creative players who operate in the final third. Excellent passing, vision, and technical ability.'
  },
  2: {
    name: 'Defensive Anchor',
    description: 'Defensive specialists who anchor the team. Strong physical attributes, tackling, marking, and positioning.'
  },
  3: {
    name: 'Wide Attacker',
    description: 'Wide attacking players with pace, dribbling, and finishing ability. Operate in wide areas and attack spaces.'
  },
  4: {
    name: 'Box-to-Box Engine',
    description: 'Dynamic midfielders who cover ground. Balance of defensive and attacking attributes with good stamina.'
  }
};

export function clusterName(clusterId: number): string {
  return CLUSTER_ROLES[clusterId]?.name ?? `Cluster ${clusterId}`;
}

export function clusterDescription(clusterId: number): string {
  return CLUSTER_ROLES[clusterId]?.description ?? 'No description available.';
}

export interface ClusterMembership {
  clusterId: number;
  probability: number;
}

/** Most likely cluster memberships of a player, highest first. */
export function topClusterProbabilities(player: PlayerRecord, n = 3): ClusterMembership[] {
  return player.clusterProbabilities
    .map((probability, clusterId) => ({ clusterId, probability }))
    .sort((a, b) => b.probability - a.probability || a.clusterId - b.clusterId)
    .slice(0, n);
}

export interface AttributeScore {
  attribute: string;
  z: number;
}

/**
 * Defining attributes of a cluster. Ranked by |z|: a strongly negative
 * score says as much about the role as a strongly positive one.
 */
export function topCentroidAttributes(centroid: ClusterCentroid | undefined, n = 5): AttributeScore[] {
  if (!centroid) return [];

  return Object.entries(centroid.attributes)
    .map(([attribute, z]) => ({ attribute, z }))
    .sort((a, b) => Math.abs(b.z) - Math.abs(a.z) || (a.attribute < b.attribute ? -1 : 1))
    .slice(0, n);
}

export interface ClusterListing {
  clusterId: number;
  name: string;
  description: string;
  size: number;
}

export function listClusters(catalog: PlayerCatalog): ClusterListing[] {
  const sizes = new Array<number>(catalog.clusterCount).fill(0);
  for (const player of catalog.all()) sizes[player.clusterId]++;

  return sizes.map((size, clusterId) => ({
    clusterId,
    name: clusterName(clusterId),
    description: clusterDescription(clusterId),
    size
  }));
}

export interface ClusterSummary extends ClusterListing {
  averageCurrentAbility: number | null;
  averagePotentialAbility: number | null;
  topPlayers: PlayerRecord[];
  centroid: ClusterCentroid | null;
  topAttributes: AttributeScore[];
}

/**
 * Documentation view of one cluster: size, ability averages and the
 * strongest players by current ability.
 *
 * @throws NotFoundError for ids outside the catalog's cluster range
 */
export function clusterSummary(catalog: PlayerCatalog, clusterId: number, topN = 10): ClusterSummary {
  if (!Number.isInteger(clusterId) || clusterId < 0 || clusterId >= catalog.clusterCount) {
    throw new NotFoundError('cluster', clusterId);
  }

  const members = catalog.all().filter((p) => p.clusterId === clusterId);
  const mean = (pick: (p: PlayerRecord) => number) =>
    members.length ? members.reduce((acc, p) => acc + pick(p), 0) / members.length : null;

  const topPlayers = [...members]
    .sort((a, b) => b.currentAbility - a.currentAbility || compareNames(a, b))
    .slice(0, topN);

  const centroid = catalog.centroid(clusterId) ?? null;

  return {
    clusterId,
    name: clusterName(clusterId),
    description: clusterDescription(clusterId),
    size: members.length,
    averageCurrentAbility: mean((p) => p.currentAbility),
    averagePotentialAbility: mean((p) => p.potentialAbility),
    topPlayers,
    centroid,
    topAttributes: topCentroidAttributes(centroid ?? undefined, 10)
  };
}
