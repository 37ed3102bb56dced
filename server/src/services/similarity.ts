// server/src/services/similarity.ts

import type { PlayerRecord } from '../models/index.js';
import type { PlayerCatalog } from './catalog.js';
import { compareNames } from './searchIndex.js';

export interface Neighbour {
  player: PlayerRecord;
  distance: number;
}

/**
 * Euclidean distance between two coordinate vectors.
 *
 * Throws if the vectors have different lengths.
 */
export function euclideanDistance(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
  }

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const d = a[i] - b[i];
    sum += d * d;
  }
  return Math.sqrt(sum);
}

/**
 * Nearest players to `playerId` in coordinate space, closest first.
 * Ties on distance fall back to display name.
 *
 * @param sameClusterOnly - restrict the pool to the target's cluster
 * @throws NotFoundError when the id is not in the catalog
 */
export function findSimilarPlayers(
  catalog: PlayerCatalog,
  playerId: string,
  k: number,
  sameClusterOnly = true
): Neighbour[] {
  const target = catalog.get(playerId);
  if (k < 1) return [];

  const neighbours: Neighbour[] = [];
  for (const player of catalog.all()) {
    if (player.id === target.id) continue;
    if (sameClusterOnly && player.clusterId !== target.clusterId) continue;

    neighbours.push({ player, distance: euclideanDistance(target.coordinates, player.coordinates) });
  }

  neighbours.sort((a, b) => a.distance - b.distance || compareNames(a.player, b.player));
  return neighbours.slice(0, Math.floor(k));
}
