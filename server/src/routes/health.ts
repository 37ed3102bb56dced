// server/src/routes/health.ts

import { Router } from 'express';
import type { PlayerCatalog } from '../services/catalog.js';

export default function healthRoutes(catalog: PlayerCatalog) {
  const r = Router();

  r.get('/health', (_req, res) => {
    res.json({ status: 'ok', players: catalog.size, clusters: catalog.clusterCount });
  });

  return r;
}
