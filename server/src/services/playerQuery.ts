// server/src/services/playerQuery.ts

import type { PlayerRecord } from '../models/index.js';
import type { PlayerCatalog } from './catalog.js';
import { clusterName, topClusterProbabilities } from './clusters.js';
import type { ClusterMembership } from './clusters.js';
import { normalize } from './normalize.js';
import { DEFAULT_SEARCH_LIMIT, SearchIndex } from './searchIndex.js';
import type { SearchHit } from './searchIndex.js';
import { findSimilarPlayers } from './similarity.js';
import type { Neighbour } from './similarity.js';

export const MAX_RESULTS = 50;
export const DEFAULT_SIMILAR_COUNT = 5;

/** Clamp a caller-supplied count to [1, MAX_RESULTS]; junk falls back to the default. */
export function clampCount(value: number | undefined, fallback: number): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  return Math.min(MAX_RESULTS, Math.max(1, Math.floor(value)));
}

/**
 * Map a z-score onto the 0–20 attribute rating scale: z ≈ ±3 spans the
 * whole scale.
 */
export function toRatingScale(z: number): number {
  return Math.max(0, Math.min(20, 10 + z * 3.33));
}

export interface SearchResult {
  query: string;
  normalizedQuery: string;
  hits: SearchHit[];
}

export interface SimilarResult {
  target: PlayerRecord;
  sameClusterOnly: boolean;
  neighbours: Neighbour[];
}

export interface AttributeComparison {
  attribute: string;
  z: number;
  rating: number;
  clusterZ: number | null;
  clusterRating: number | null;
}

export interface PlayerProfile {
  player: PlayerRecord;
  roleName: string;
  memberships: Array<ClusterMembership & { name: string }>;
  attributes: AttributeComparison[];
}

/**
 * The two lookups the application makes (name search and similar players)
 * plus the player card, with caller input sanitised on the way in.
 */
export class PlayerQueryService {
  private readonly index: SearchIndex;

  constructor(readonly catalog: PlayerCatalog) {
    this.index = new SearchIndex(catalog);
  }

  search(text: string, options: { limit?: number; clusterIds?: readonly number[] } = {}): SearchResult {
    const query = text.trim();
    const limit = clampCount(options.limit, DEFAULT_SEARCH_LIMIT);
    const clusterIds = options.clusterIds ? new Set(options.clusterIds) : undefined;

    return {
      query,
      normalizedQuery: normalize(query),
      hits: this.index.search(query, limit, { clusterIds })
    };
  }

  /** @throws NotFoundError */
  similar(playerId: string, options: { k?: number; sameClusterOnly?: boolean } = {}): SimilarResult {
    const id = playerId.trim();
    const k = clampCount(options.k, DEFAULT_SIMILAR_COUNT);
    const sameClusterOnly = options.sameClusterOnly ?? true;

    return {
      target: this.catalog.get(id),
      sameClusterOnly,
      neighbours: findSimilarPlayers(this.catalog, id, k, sameClusterOnly)
    };
  }

  /** @throws NotFoundError */
  profile(playerId: string): PlayerProfile {
    const player = this.catalog.get(playerId.trim());
    const centroid = this.catalog.centroid(player.clusterId);

    const attributes = this.catalog.attributeNames.map((attribute) => {
      const z = player.attributes[attribute];
      const clusterZ = centroid?.attributes[attribute] ?? null;
      return {
        attribute,
        z,
        rating: toRatingScale(z),
        clusterZ,
        clusterRating: clusterZ === null ? null : toRatingScale(clusterZ)
      };
    });

    return {
      player,
      roleName: clusterName(player.clusterId),
      memberships: topClusterProbabilities(player).map((m) => ({ ...m, name: clusterName(m.clusterId) })),
      attributes
    };
  }
}
