import { Router } from 'express';
import type { Queryable } from '../db/pg-result-set.js';

export function healthRouter(db: Queryable): Router {
  const router = Router();

  router.get('/healthz', async (_req, res) => {
    try {
      await db.query('SELECT 1');
      res.json({ status: 'ok', timestamp: new Date().toISOString() });
    } catch {
      res.status(503).json({ status: 'error' });
    }
  });

  return router;
}
