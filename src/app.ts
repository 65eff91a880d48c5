import express, { Express } from 'express';
import { ResultCache } from './cache/result-cache';
import { EngineConfig } from './config/engine-config';
import { StandingsService } from './standings/standings-service';
import { createRoutes } from './api/routes';
import { createMetricsRouter, metricsMiddleware } from './observability/metrics';
import {
  apiRateLimiter,
  configureCORS,
  requestLogger,
  requestTimeout
} from './api/middleware/production-safety';

export interface AppDependencies {
  cache: ResultCache;
  service: StandingsService;
  config: Pick<EngineConfig, 'requestTimeoutMs' | 'corsAllowedOrigins'>;
  /** request/response log lines, on by default */
  logRequests?: boolean;
}

/**
 * Build the express app around an already constructed cache and service
 */
export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Metrics middleware (must be first to capture all requests)
  app.use(metricsMiddleware());

  if (deps.logRequests !== false) {
    app.use(requestLogger);
  }

  app.use(requestTimeout(deps.config.requestTimeoutMs));
  app.use(configureCORS(deps.config.corsAllowedOrigins));

  app.use('/standings', apiRateLimiter);
  app.use('/progression', apiRateLimiter);
  app.use('/drivers', apiRateLimiter);

  // Metrics endpoint (no rate limiting)
  app.use('/', createMetricsRouter());

  app.use('/', createRoutes(deps.service, deps.cache));

  return app;
}
