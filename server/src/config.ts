// server/src/config.ts

import path from 'path';

function numericEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new Error(`Environment variable ${name} must be a number, got: ${raw}`);
  }
  return parsed;
}

export interface ServerConfig {
  port: number;
  /** Absolute directory holding the clustering exports. */
  dataDir: string;
  playersFile: string;
  centroidsFile: string;
}

/** Read settings from the environment. Call after `dotenv/config` has run. */
export function loadConfig(): ServerConfig {
  return {
    port: numericEnv('PORT', 3001),
    dataDir: path.resolve(process.cwd(), process.env.DATA_DIR || 'data'),
    playersFile: process.env.PLAYERS_FILE || 'players_with_role_clusters.csv',
    centroidsFile: process.env.CENTROIDS_FILE || 'cluster_centroids.csv'
  };
}
