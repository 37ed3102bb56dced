// server/src/routes/respond.ts

import type { Response } from 'express';
import { NotFoundError } from '../errors.js';

/** First value of a query parameter, when it is a plain string. */
export function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryString(value[0]);
  return typeof value === 'string' ? value : undefined;
}

/** Integer query parameter; absent or unparsable yields undefined. */
export function queryInt(value: unknown): number | undefined {
  const raw = queryString(value);
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number.parseInt(raw, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

export function sendError(res: Response, error: unknown, context: string, fallback: string) {
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  console.error(`${context}:`, error);
  return res.status(500).json({ error: fallback });
}
