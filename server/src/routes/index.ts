// server/src/routes/index.ts

import { Router } from 'express';
import type { PlayerQueryService } from '../services/playerQuery.js';
import health from './health.js';
import players from './players.js';
import clusters from './clusters.js';

export default function createApi(query: PlayerQueryService) {
  const api = Router();
  api.use(health(query.catalog));
  api.use(players(query));
  api.use(clusters(query.catalog));
  return api;
}
