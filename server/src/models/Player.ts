// server/src/models/Player.ts

/** Attribute name → z-score. */
export type AttributeScores = Readonly<Record<string, number>>;

/**
 * One row handed over by the data loader. Values are already typed; the
 * catalog re-checks only the structural invariants.
 */
export interface RawPlayerRow {
  id: string;
  name: string;
  club: string | null;
  currentAbility: number;
  potentialAbility: number;
  attributes: Record<string, number>;
  clusterId: number;
  clusterProbabilities: number[];
  coordinates: number[];
}

export interface PlayerRecord {
  readonly id: string;
  readonly displayName: string;
  /** Folded form of displayName, used for matching only. */
  readonly searchKey: string;
  readonly club: string | null;
  readonly currentAbility: number;
  readonly potentialAbility: number;
  /** Either ability lies outside the documented 0–200 range. */
  readonly abilityOutOfRange: boolean;
  readonly attributes: AttributeScores;
  readonly clusterId: number;
  readonly clusterProbabilities: readonly number[];
  readonly coordinates: readonly number[];
}

export const ABILITY_MIN = 0;
export const ABILITY_MAX = 200;

export function isAbilityInRange(value: number): boolean {
  return value >= ABILITY_MIN && value <= ABILITY_MAX;
}

/** JSON shape returned by the API for a player. */
export interface PlayerSummary {
  id: string;
  name: string;
  club: string | null;
  currentAbility: number;
  potentialAbility: number;
  abilityOutOfRange: boolean;
  clusterId: number;
  coordinates: number[];
}

export function toPlayerSummary(player: PlayerRecord): PlayerSummary {
  return {
    id: player.id,
    name: player.displayName,
    club: player.club,
    currentAbility: player.currentAbility,
    potentialAbility: player.potentialAbility,
    abilityOutOfRange: player.abilityOutOfRange,
    clusterId: player.clusterId,
    coordinates: [...player.coordinates]
  };
}
