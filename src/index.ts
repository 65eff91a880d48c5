import 'dotenv/config';
import { createApp } from './app';
import { ResultCache } from './cache/result-cache';
import { getConfig } from './config/engine-config';
import { StandingsService } from './standings/standings-service';
import { JolpicaClient } from './upstream/jolpica-client';
import { logError } from './api/middleware/production-safety';

/**
 * F1 Standings API - Entry Point
 *
 * - One ResultCache for the process, shared by every request
 * - Upstream: Jolpica (Ergast-compatible) API
 * - Prometheus-compatible metrics
 * - Rate limiting and request timeout
 * - Graceful shutdown
 */
async function main() {
  const config = getConfig();

  console.log('Upstream configuration:');
  console.log(`  Base URL: ${config.upstreamBaseUrl}`);
  console.log(`  Timeout: ${config.upstreamTimeoutMs}ms, page size: ${config.upstreamPageSize}`);
  console.log('Cache configuration:');
  console.log(`  In-progress season TTL: ${config.inProgressTtlMs}ms`);
  console.log(`  Max seasons: ${config.cacheMaxSeasons > 0 ? config.cacheMaxSeasons : 'unbounded'}`);
  console.log(`  Prefetch full season: ${config.cachePrefetchFullSeason}`);

  const upstream = new JolpicaClient();
  const cache = new ResultCache(upstream);
  const service = new StandingsService(cache);
  const app = createApp({ cache, service, config });

  const server = app.listen(config.port, () => {
    console.log(`\nF1 Standings API listening on port ${config.port}`);
    console.log(`\nEndpoints:`);
    console.log(`  GET /standings/:season?round=N`);
    console.log(`  GET /progression/:season?drivers=a,b&round=N`);
    console.log(`  GET /seasons/:season`);
    console.log(`  GET /drivers/:driverId/seasons/:season`);
    console.log(`  GET /health`);
    console.log(`  GET /metrics`);
  });

  const shutdown = (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    server.close(err => {
      if (err) {
        logError(err, { context: 'server_close_failed' });
        process.exit(1);
      }
      console.log('Shutdown complete');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logError(reason, { context: 'unhandled_rejection' });
  });
}

main().catch((err) => {
  logError(err, { context: 'startup_failed' });
  process.exit(1);
});
