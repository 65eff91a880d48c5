/**
 * Jolpica Upstream Client
 *
 * Reads season schedules and race classifications from the Ergast-compatible
 * Jolpica API and normalizes them into RaceResult records.
 *
 * - Result pages are walked with limit/offset until MRData.total rows are read
 * - No retries: rate limits and outages surface to the caller as typed errors
 * - No caching: the ResultCache owns that
 * - Fetches run on their own timeout and are never aborted by a departing caller
 */

import { getConfig } from '../config/engine-config';
import { metrics } from '../observability/metrics';
import { RaceResult, SeasonSchedule } from '../types/race-result';
import { StandingsError } from '../types/errors';
import { UpstreamClient } from './upstream-client';
import {
  PayloadShapeError,
  parseEnvelope,
  parseResultsPage,
  parseSchedule,
  PageEnvelope
} from './jolpica-parser';

export type FetchFn = typeof fetch;

export interface JolpicaClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  pageSize?: number;
  fetchImpl?: FetchFn;
}

export class JolpicaClient implements UpstreamClient {
  private baseUrl: string;
  private timeoutMs: number;
  private pageSize: number;
  private fetchImpl: FetchFn;

  constructor(options: JolpicaClientOptions = {}) {
    const config = getConfig();
    this.baseUrl = (options.baseUrl || config.upstreamBaseUrl).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? config.upstreamTimeoutMs;
    this.pageSize = options.pageSize ?? config.upstreamPageSize;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchSchedule(season: number): Promise<SeasonSchedule> {
    const envelope = await this.requestPage(`/${season}.json?limit=100`, season);
    const rounds = parseSchedule(envelope.races);

    if (rounds.length === 0) {
      throw new StandingsError(
        'UpstreamDataMissing',
        `No races scheduled for season ${season}`,
        { season }
      );
    }

    return {
      season,
      rounds,
      roundCount: rounds[rounds.length - 1].round
    };
  }

  async fetchSeason(season: number, roundCeiling?: number): Promise<RaceResult[]> {
    const results: RaceResult[] = [];
    let offset = 0;
    let rejected = 0;
    let pages = 0;

    for (;;) {
      const envelope = await this.requestPage(
        `/${season}/results.json?limit=${this.pageSize}&offset=${offset}`,
        season,
        roundCeiling
      );
      const page = parseResultsPage(season, envelope.races);
      pages++;

      results.push(...page.results);
      rejected += page.rejected;
      offset += page.rowCount;

      const pastCeiling = roundCeiling !== undefined && page.lastRound > roundCeiling;
      const exhausted = page.rowCount === 0 || envelope.total < 0 || offset >= envelope.total;
      if (pastCeiling || exhausted) {
        break;
      }
    }

    if (rejected > 0) {
      metrics.incrementRejectedRows(rejected);
      console.warn(`[JolpicaClient] Dropped ${rejected} malformed result rows for season ${season}`);
    }

    const inWindow = roundCeiling === undefined
      ? results
      : results.filter(r => r.round <= roundCeiling);

    if (inWindow.length === 0) {
      throw new StandingsError(
        'UpstreamDataMissing',
        roundCeiling === undefined
          ? `No race results available for season ${season}`
          : `No race results available for season ${season} up to round ${roundCeiling}`,
        { season, round: roundCeiling }
      );
    }

    console.log(`[JolpicaClient] Season ${season}: ${inWindow.length} results from ${pages} page(s)`);

    // Array.prototype.sort is stable, so finishing order within a round is kept
    return inWindow.sort((a, b) => a.round - b.round);
  }

  private async requestPage(path: string, season: number, round?: number): Promise<PageEnvelope> {
    const url = `${this.baseUrl}${path}`;
    const started = Date.now();
    let response: Response;

    try {
      response = await this.fetchImpl(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new StandingsError(
        'UpstreamUnavailable',
        `Upstream request failed for season ${season}: ${describeFailure(err)}`,
        { season, round, details: { url } }
      );
    } finally {
      metrics.recordUpstreamLatency(Date.now() - started);
    }

    if (response.status === 429) {
      throw new StandingsError(
        'UpstreamRateLimited',
        `Upstream rate limit reached while loading season ${season}`,
        { season, round, retryAfterSeconds: parseRetryAfter(response.headers.get('retry-after')) }
      );
    }

    if (response.status === 404) {
      throw new StandingsError(
        'UpstreamDataMissing',
        `Upstream has no data for season ${season}`,
        { season, round }
      );
    }

    if (!response.ok) {
      throw new StandingsError(
        'UpstreamUnavailable',
        `Upstream returned HTTP ${response.status} for season ${season}`,
        { season, round, details: { status: response.status } }
      );
    }

    try {
      return parseEnvelope(await response.json());
    } catch (err) {
      const reason = err instanceof PayloadShapeError ? err.message : describeFailure(err);
      throw new StandingsError(
        'UpstreamUnavailable',
        `Upstream sent an unreadable payload for season ${season}: ${reason}`,
        { season, round }
      );
    }
  }
}

function describeFailure(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? 'request timed out' : err.message;
  }
  return String(err);
}

export function parseRetryAfter(header: string | null): number | undefined {
  if (!header) {
    return undefined;
  }
  const seconds = parseInt(header, 10);
  if (!isNaN(seconds) && seconds >= 0) {
    return seconds;
  }
  const date = Date.parse(header);
  if (isNaN(date)) {
    return undefined;
  }
  return Math.max(0, Math.ceil((date - Date.now()) / 1000));
}
