import { Router, Request, Response } from 'express';
import { ResultCache } from '../../cache/result-cache';
import { errorCounters } from '../standings-errors';

export function createHealthRoutes(cache: ResultCache): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    return res.status(200).json({
      status: 'healthy',
      cache: cache.stats(),
      errors: errorCounters.getStats(),
      timestamp: new Date().toISOString()
    });
  });

  // nothing to warm up: the cache fills on demand
  router.get('/ready', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).send('OK');
  });

  return router;
}
