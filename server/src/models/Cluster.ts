// server/src/models/Cluster.ts

import type { AttributeScores } from './Player.js';

/** Representative attribute profile of one role cluster. */
export interface ClusterCentroid {
  readonly clusterId: number;
  readonly attributes: AttributeScores;
}

export interface ClusterRole {
  name: string;
  description: string;
}
