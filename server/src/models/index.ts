// server/src/models/index.ts

export type { AttributeScores, RawPlayerRow, PlayerRecord, PlayerSummary } from './Player.js';
export { ABILITY_MIN, ABILITY_MAX, isAbilityInRange, toPlayerSummary } from './Player.js';
export type { ClusterCentroid, ClusterRole } from './Cluster.js';
