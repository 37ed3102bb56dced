// server/src/__test-helpers__.ts

import type { RawPlayerRow } from './models/index.js';

/** Probability vector with `clusterId` as the clear favourite. */
export function favour(clusterId: number, clusterCount = 2): number[] {
  const rest = 0.2 / (clusterCount - 1);
  return Array.from({ length: clusterCount }, (_, i) => (i === clusterId ? 0.8 : rest));
}

export function makeRow(
  id: string,
  name: string,
  clusterId: number,
  coordinates: number[],
  overrides: Partial<RawPlayerRow> = {}
): RawPlayerRow {
  return {
    id,
    name,
    club: 'Test FC',
    currentAbility: 120,
    potentialAbility: 150,
    attributes: { Pas: 0.5, Tec: -0.5 },
    clusterId,
    clusterProbabilities: favour(clusterId),
    coordinates,
    ...overrides
  };
}
