import { Router, Request, Response } from 'express';
import { listSelectableSeasons } from '../../config/seasons';
import { metrics } from '../../observability/metrics';
import { toDenseSeries, toProgressionPayload, toStandingsRows } from '../../presentation/chart-payload';
import { StandingsService } from '../../standings/standings-service';
import { SeasonCoverage } from '../../types/race-result';
import { ServiceResult, StandingsError, isStandingsError, isUpstreamErrorKind } from '../../types/errors';
import {
  parseBooleanParam,
  parseDriverIdsParam,
  parseRoundParam,
  parseSeasonParam
} from '../../validation/request-validator';
import { getRequestId, logError } from '../middleware/production-safety';
import { buildErrorResponse, buildInternalErrorResponse, getStatusCode } from '../standings-errors';

export interface SuccessResponse<T> {
  success: true;
  kind: string;
  input: Record<string, unknown>;
  result: T;
  warnings: string[];
}

function coverageWarnings(season: number, coverage: SeasonCoverage): string[] {
  if (!coverage.partial) {
    return [];
  }
  return [
    `Partial data for season ${season}: no results for round${coverage.missingRounds.length === 1 ? '' : 's'} ${coverage.missingRounds.join(', ')}`
  ];
}

function sendError(res: Response, error: StandingsError): Response {
  if (res.headersSent) {
    return res;
  }
  metrics.incrementError(error.rootCause().kind);

  if (isUpstreamErrorKind(error.rootCause().kind)) {
    logError(error, { kind: error.kind, season: error.season, round: error.round });
  }
  if (error.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(error.retryAfterSeconds));
  }

  return res.status(getStatusCode(error)).json(buildErrorResponse(error, getRequestId(res)));
}

function sendUnexpected(res: Response, route: string, err: unknown): Response {
  if (res.headersSent) {
    logError(err, { route, late: true });
    return res;
  }
  if (isStandingsError(err)) {
    return sendError(res, err);
  }
  logError(err, { route });
  metrics.incrementError('InternalError');
  return res.status(500).json(buildInternalErrorResponse(`Unexpected error: ${String(err)}`, getRequestId(res)));
}

function respond<T, R>(
  res: Response,
  kind: string,
  input: Record<string, unknown>,
  outcome: ServiceResult<T>,
  shape: (value: T) => { result: R; warnings: string[] }
): Response {
  // the timeout middleware may already have answered; the cache keeps the data
  if (res.headersSent) {
    return res;
  }
  if (!outcome.ok) {
    return sendError(res, outcome.error);
  }
  const { result, warnings } = shape(outcome.value);
  const body: SuccessResponse<R> = { success: true, kind, input, result, warnings };
  return res.status(200).json(body);
}

export function createStandingsRoutes(service: StandingsService): Router {
  const router = Router();

  router.get('/seasons', (_req: Request, res: Response) => {
    metrics.incrementRequestCount('seasons');
    return res.status(200).json({ success: true, seasons: listSelectableSeasons() });
  });

  router.get('/standings/:season', async (req: Request, res: Response) => {
    metrics.incrementRequestCount('standings');
    try {
      const season = parseSeasonParam(req.params.season);
      const round = parseRoundParam(season, req.query.round);
      const outcome = await service.getStandings(season, round);

      return respond(res, 'season_standings', { season, round: round ?? null }, outcome, value => ({
        result: {
          season: value.season,
          round_ceiling: value.roundCeiling,
          through_round: value.throughRound,
          driver_standings: value.driverStandings,
          constructor_standings: toStandingsRows(value.constructorStandings),
          coverage: value.coverage
        },
        warnings: coverageWarnings(value.season, value.coverage)
      }));
    } catch (err) {
      return sendUnexpected(res, '/standings/:season', err);
    }
  });

  router.get('/progression/:season', async (req: Request, res: Response) => {
    metrics.incrementRequestCount('progression');
    try {
      const season = parseSeasonParam(req.params.season);
      const round = parseRoundParam(season, req.query.round);
      const driverIds = parseDriverIdsParam(req.query.drivers);
      const dense = parseBooleanParam(req.query.dense);
      const outcome = await service.getProgression(season, driverIds, round);

      return respond(res, 'points_progression', { season, round: round ?? null, drivers: driverIds, dense }, outcome, value => ({
        result: {
          season: value.season,
          round_ceiling: value.roundCeiling,
          rounds: value.rounds,
          series: dense ? toDenseSeries(value.series, value.rounds) : toProgressionPayload(value.series),
          coverage: value.coverage
        },
        warnings: coverageWarnings(value.season, value.coverage)
      }));
    } catch (err) {
      return sendUnexpected(res, '/progression/:season', err);
    }
  });

  router.get('/seasons/:season', async (req: Request, res: Response) => {
    metrics.incrementRequestCount('season_overview');
    try {
      const season = parseSeasonParam(req.params.season);
      const outcome = await service.getSeasonOverview(season);

      return respond(res, 'season_overview', { season }, outcome, value => ({
        result: value,
        warnings: coverageWarnings(value.season, value.coverage)
      }));
    } catch (err) {
      return sendUnexpected(res, '/seasons/:season', err);
    }
  });

  router.get('/drivers/:driverId/seasons/:season', async (req: Request, res: Response) => {
    metrics.incrementRequestCount('driver_season');
    try {
      const season = parseSeasonParam(req.params.season);
      const driverId = req.params.driverId;
      const outcome = await service.getDriverSeason(season, driverId);

      return respond(res, 'driver_season', { season, driver_id: driverId }, outcome, value => ({
        result: value,
        warnings: []
      }));
    } catch (err) {
      return sendUnexpected(res, '/drivers/:driverId/seasons/:season', err);
    }
  });

  return router;
}
