// server/src/scripts/check-data.ts

import 'dotenv/config';
import { loadConfig } from '../config.js';
import { DataIntegrityError } from '../errors.js';
import { listClusters } from '../services/clusters.js';
import { loadDataset } from '../utils/dataLoader.js';

function main() {
  const config = loadConfig();
  console.log('Checking dataset in:', config.dataDir);

  try {
    const catalog = loadDataset(config.dataDir, {
      players: config.playersFile,
      centroids: config.centroidsFile
    });

    console.log(`Players: ${catalog.size}`);
    console.log(`Coordinate dimensions: ${catalog.dimensions}`);
    for (const cluster of listClusters(catalog)) {
      const centroid = catalog.centroid(cluster.clusterId) ? 'centroid' : 'no centroid';
      console.log(`  ${cluster.clusterId} ${cluster.name}: ${cluster.size} players (${centroid})`);
    }

    const flagged = catalog.all().filter((p) => p.abilityOutOfRange);
    if (flagged.length) {
      console.warn(`${flagged.length} players have CA/PA outside 0-200:`, flagged.map((p) => p.displayName));
    }
  } catch (error) {
    if (error instanceof DataIntegrityError) {
      console.error('Dataset rejected:', error.message);
    } else {
      console.error('Check failed:', error);
    }
    process.exitCode = 1;
  }
}

main();
