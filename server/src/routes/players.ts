// server/src/routes/players.ts

import { Router } from 'express';
import { toPlayerSummary } from '../models/index.js';
import type { PlayerQueryService } from '../services/playerQuery.js';
import { queryInt, queryString, sendError } from './respond.js';

/** "0,2" → [0, 2]; null when any entry is not an integer. */
function parseClusterList(raw: string | undefined): number[] | null | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const ids = raw.split(',').map((s) => Number(s.trim()));
  return ids.every(Number.isInteger) ? ids : null;
}

export default function playerRoutes(query: PlayerQueryService) {
  const r = Router();

  /**
   * GET /players/search?q=odegaard&limit=10&clusters=0,1
   * Accent- and case-insensitive name search
   */
  r.get('/players/search', (req, res) => {
    try {
      const clusterIds = parseClusterList(queryString(req.query.clusters));
      if (clusterIds === null) {
        return res.status(400).json({ error: 'clusters must be a comma-separated list of integers' });
      }

      const result = query.search(queryString(req.query.q) ?? '', {
        limit: queryInt(req.query.limit),
        clusterIds
      });

      res.json({
        query: result.query,
        normalizedQuery: result.normalizedQuery,
        players: result.hits.map((hit) => ({
          ...toPlayerSummary(hit.player),
          score: hit.score,
          match: hit.match
        }))
      });
    } catch (error) {
      sendError(res, error, 'Player search error', 'Failed to search players');
    }
  });

  /**
   * GET /players/:playerId
   * Player card: role, cluster memberships and attributes against the centroid
   */
  r.get('/players/:playerId', (req, res) => {
    try {
      const profile = query.profile(req.params.playerId);

      res.json({
        ...toPlayerSummary(profile.player),
        roleName: profile.roleName,
        memberships: profile.memberships,
        attributes: profile.attributes
      });
    } catch (error) {
      sendError(res, error, 'Player detail error', 'Failed to get player details');
    }
  });

  /**
   * GET /players/:playerId/similar?k=5&sameCluster=true
   * Nearest players in the role space
   */
  r.get('/players/:playerId/similar', (req, res) => {
    try {
      const result = query.similar(req.params.playerId, {
        k: queryInt(req.query.k),
        sameClusterOnly: queryString(req.query.sameCluster) !== 'false'
      });

      res.json({
        targetPlayer: toPlayerSummary(result.target),
        sameClusterOnly: result.sameClusterOnly,
        similarPlayers: result.neighbours.map((n) => ({
          ...toPlayerSummary(n.player),
          distance: n.distance
        }))
      });
    } catch (error) {
      sendError(res, error, 'Similar players error', 'Failed to find similar players');
    }
  });

  return r;
}
