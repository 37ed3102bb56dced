// server/src/index.ts

import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadDataset } from './utils/dataLoader.js';

function main() {
  const config = loadConfig();

  // The catalog is built once and shared by every request.
  const catalog = loadDataset(config.dataDir, {
    players: config.playersFile,
    centroids: config.centroidsFile
  });
  console.log(`Loaded ${catalog.size} players across ${catalog.clusterCount} clusters from ${config.dataDir}`);

  createApp(catalog).listen(config.port, () => console.log(`API on http://localhost:${config.port}`));
}

try {
  main();
} catch (error) {
  console.error('Server failed to start:', error);
  process.exit(1);
}
