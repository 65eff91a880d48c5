import { Router, Request, Response } from 'express';
import { ResultCache } from '../../cache/result-cache';
import { StandingsService } from '../../standings/standings-service';
import { createHealthRoutes } from './health';
import { createStandingsRoutes } from './standings';

export function createRoutes(service: StandingsService, cache: ResultCache): Router {
  const router = Router();

  router.use('/', createHealthRoutes(cache));
  router.use('/', createStandingsRoutes(service));

  router.get('/', (_req: Request, res: Response) => {
    return res.status(200).json({
      name: 'F1 Standings API',
      description: 'Championship standings and points progression by season and round',
      version: '1.0.0',
      endpoints: buildEndpointList()
    });
  });

  return router;
}

function buildEndpointList(): Record<string, string> {
  return {
    'GET /seasons': 'Selectable seasons, newest first',
    'GET /seasons/:season': 'Season schedule and selection lists',
    'GET /standings/:season?round=N': 'Drivers and constructors standings after round N',
    'GET /progression/:season?drivers=a,b&round=N&dense=true': 'Cumulative points by round for up to 10 drivers',
    'GET /drivers/:driverId/seasons/:season': 'One driver\'s season, race by race',
    'GET /health': 'Health check with cache statistics',
    'GET /metrics': 'Prometheus metrics',
    'GET /metrics/json': 'JSON metrics',
    'GET /': 'API information'
  };
}
