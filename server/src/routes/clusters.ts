// server/src/routes/clusters.ts

import { Router } from 'express';
import { toPlayerSummary } from '../models/index.js';
import type { PlayerCatalog } from '../services/catalog.js';
import { clusterSummary, listClusters } from '../services/clusters.js';
import { sendError } from './respond.js';

export default function clusterRoutes(catalog: PlayerCatalog) {
  const r = Router();

  r.get('/clusters', (_req, res) => {
    try {
      res.json(listClusters(catalog));
    } catch (error) {
      sendError(res, error, 'Cluster list error', 'Failed to list clusters');
    }
  });

  // Role documentation for one cluster
  r.get('/clusters/:clusterId', (req, res) => {
    try {
      const clusterId = Number(req.params.clusterId);
      if (!Number.isInteger(clusterId)) {
        return res.status(400).json({ error: 'clusterId must be an integer' });
      }

      const summary = clusterSummary(catalog, clusterId);
      res.json({
        ...summary,
        topPlayers: summary.topPlayers.map(toPlayerSummary)
      });
    } catch (error) {
      sendError(res, error, 'Cluster detail error', 'Failed to get cluster details');
    }
  });

  return r;
}
