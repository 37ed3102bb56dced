// server/src/services/searchIndex.ts

import type { PlayerRecord } from '../models/index.js';
import type { PlayerCatalog } from './catalog.js';
import { normalize } from './normalize.js';

export const DEFAULT_SEARCH_LIMIT = 10;

export type MatchKind = 'exact' | 'prefix' | 'substring';

const MATCH_SCORES: Record<MatchKind, number> = {
  exact: 3,
  prefix: 2,
  substring: 1
};

export interface SearchHit {
  player: PlayerRecord;
  score: number;
  match: MatchKind;
}

export interface SearchOptions {
  /** Only players in one of these clusters are candidates. */
  clusterIds?: ReadonlySet<number>;
}

/** Plain code-unit ordering, independent of the host locale. */
export function compareNames(a: PlayerRecord, b: PlayerRecord): number {
  if (a.displayName !== b.displayName) return a.displayName < b.displayName ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

function classify(searchKey: string, query: string): MatchKind | null {
  if (searchKey === query) return 'exact';
  if (searchKey.startsWith(query)) return 'prefix';
  if (searchKey.includes(query)) return 'substring';
  return null;
}

/**
 * Name lookup over a catalog. A linear scan per query: the player set is a
 * few hundred records, so no inverted index is kept.
 */
export class SearchIndex {
  constructor(private readonly catalog: PlayerCatalog) {}

  search(queryText: string, limit = DEFAULT_SEARCH_LIMIT, options: SearchOptions = {}): SearchHit[] {
    const query = normalize(queryText);
    if (!query || limit < 1) return [];

    const { clusterIds } = options;
    const hits: SearchHit[] = [];

    for (const player of this.catalog.all()) {
      if (clusterIds && !clusterIds.has(player.clusterId)) continue;

      const match = classify(player.searchKey, query);
      if (match) hits.push({ player, score: MATCH_SCORES[match], match });
    }

    // rank everything first, then cut
    hits.sort((a, b) => b.score - a.score || compareNames(a.player, b.player));
    return hits.slice(0, Math.floor(limit));
  }
}
