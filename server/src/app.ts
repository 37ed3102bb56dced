// server/src/app.ts

import express from 'express';
import cors from 'cors';
import createApi from './routes/index.js';
import type { PlayerCatalog } from './services/catalog.js';
import { PlayerQueryService } from './services/playerQuery.js';

export function createApp(catalog: PlayerCatalog) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  app.use('/api', createApi(new PlayerQueryService(catalog)));

  return app;
}
