import { getConfig } from '../config/engine-config';
import { getCurrentSeason } from '../config/seasons';
import { metrics } from '../observability/metrics';
import { RaceResult, SeasonSchedule } from '../types/race-result';
import { StandingsError, isStandingsError } from '../types/errors';
import { UpstreamClient } from '../upstream/upstream-client';

/**
 * Rounds a cache entry or in-flight fetch holds: everything, or 1..N
 */
export type Coverage = 'full' | number;

/**
 * Cached season results
 */
export interface CacheEntry {
  season: number;
  records: readonly RaceResult[];
  coverage: Coverage;
  fetchedAt: number;
  /** concluded seasons are retained for the life of the process */
  concluded: boolean;
}

interface ScheduleEntry {
  schedule: SeasonSchedule;
  fetchedAt: number;
  concluded: boolean;
}

interface InFlightFetch<T> {
  coverage: Coverage;
  promise: Promise<T>;
  joiners: number;
}

export interface ResultCacheOptions {
  /** TTL for the in-progress season's entries */
  inProgressTtlMs?: number;
  /** LRU bound on cached seasons, 0 for unbounded */
  maxSeasons?: number;
  /** fetch whole seasons on a miss, whatever the requested ceiling */
  prefetchFullSeason?: boolean;
  now?: () => number;
  currentSeason?: () => number;
}

export interface ResultCacheStats {
  seasons: number;
  schedules: number;
  in_flight: number;
  hits: number;
  misses: number;
  joins: number;
  fetches: number;
}

/**
 * Does a holding of `have` rounds answer a request for `want`?
 */
export function coverageSatisfies(have: Coverage, want?: number): boolean {
  if (have === 'full') {
    return true;
  }
  return want !== undefined && want <= have;
}

function coverageExceeds(candidate: Coverage, current: Coverage): boolean {
  if (current === 'full') {
    return false;
  }
  return candidate === 'full' || candidate > current;
}

export function truncateToCeiling(records: readonly RaceResult[], roundCeiling?: number): readonly RaceResult[] {
  if (roundCeiling === undefined || records.every(r => r.round <= roundCeiling)) {
    return records;
  }
  return Object.freeze(records.filter(r => r.round <= roundCeiling));
}

/**
 * ResultCache - in-memory season results with single-flight loading
 *
 * - One entry per season, answering any round ceiling it covers by truncation
 * - Concurrent requests for a season share one upstream fetch; the registry
 *   is keyed by season so unrelated seasons never wait on each other
 * - Failures are not cached. Every caller of a failed fetch receives the same
 *   error: the upstream error itself when nobody joined, otherwise one
 *   CacheFetchInFlightFailed with the upstream error as cause
 * - Concluded seasons never expire, the in-progress season has a short TTL
 */
export class ResultCache {
  private upstream: UpstreamClient;
  private entries: Map<number, CacheEntry> = new Map();
  private schedules: Map<number, ScheduleEntry> = new Map();
  private resultFlights: Map<number, InFlightFetch<readonly RaceResult[]>> = new Map();
  private scheduleFlights: Map<number, InFlightFetch<SeasonSchedule>> = new Map();

  private inProgressTtlMs: number;
  private maxSeasons: number;
  private prefetchFullSeason: boolean;
  private now: () => number;
  private currentSeason: () => number;

  private hits = 0;
  private misses = 0;
  private joins = 0;
  private fetches = 0;

  constructor(upstream: UpstreamClient, options: ResultCacheOptions = {}) {
    const config = getConfig();
    this.upstream = upstream;
    this.inProgressTtlMs = options.inProgressTtlMs ?? config.inProgressTtlMs;
    this.maxSeasons = options.maxSeasons ?? config.cacheMaxSeasons;
    this.prefetchFullSeason = options.prefetchFullSeason ?? config.cachePrefetchFullSeason;
    this.now = options.now ?? Date.now;
    this.currentSeason = options.currentSeason ?? (() => getCurrentSeason());
  }

  /**
   * Season results for rounds <= roundCeiling (all rounds when omitted)
   */
  async get(season: number, roundCeiling?: number): Promise<readonly RaceResult[]> {
    const entry = this.liveEntry(season);
    if (entry && coverageSatisfies(entry.coverage, roundCeiling)) {
      this.recordHit();
      this.touch(season, entry);
      return truncateToCeiling(entry.records, roundCeiling);
    }

    const flight = this.resultFlights.get(season);
    if (flight && coverageSatisfies(flight.coverage, roundCeiling)) {
      this.recordJoin();
      flight.joiners++;
      const records = await flight.promise;
      return truncateToCeiling(records, roundCeiling);
    }

    this.recordMiss();
    const fetchCeiling = this.prefetchFullSeason ? undefined : roundCeiling;
    const records = await this.startResultFetch(season, fetchCeiling);
    return truncateToCeiling(records, roundCeiling);
  }

  /**
   * Season schedule, cached with the same retention rules
   */
  async getSchedule(season: number): Promise<SeasonSchedule> {
    const entry = this.schedules.get(season);
    if (entry && (entry.concluded || this.now() - entry.fetchedAt < this.inProgressTtlMs)) {
      return entry.schedule;
    }

    const flight = this.scheduleFlights.get(season);
    if (flight) {
      flight.joiners++;
      return flight.promise;
    }

    return this.register(this.scheduleFlights, season, 'full', this.loadSchedule(season));
  }

  /**
   * Cached entry for a season, if any, without touching the upstream
   */
  peek(season: number): CacheEntry | null {
    return this.liveEntry(season);
  }

  stats(): ResultCacheStats {
    return {
      seasons: this.entries.size,
      schedules: this.schedules.size,
      in_flight: this.resultFlights.size + this.scheduleFlights.size,
      hits: this.hits,
      misses: this.misses,
      joins: this.joins,
      fetches: this.fetches
    };
  }

  /**
   * Drop cached data (in-flight fetches still complete and store)
   */
  clear(): void {
    this.entries.clear();
    this.schedules.clear();
  }

  private startResultFetch(season: number, roundCeiling?: number): Promise<readonly RaceResult[]> {
    const coverage: Coverage = roundCeiling ?? 'full';
    return this.register(this.resultFlights, season, coverage, this.loadResults(season, roundCeiling));
  }

  /**
   * Track a fetch so later callers can join it. The rejection is built once,
   * so the initiator and every joiner observe the same error.
   */
  private register<T>(
    registry: Map<number, InFlightFetch<T>>,
    season: number,
    coverage: Coverage,
    load: Promise<T>
  ): Promise<T> {
    const flight: InFlightFetch<T> = { coverage, promise: load, joiners: 0 };
    flight.promise = load.catch((err: unknown): never => {
      throw sharedFailure(err, season, coverage, flight.joiners);
    });
    registry.set(season, flight);
    const release = () => {
      // a wider fetch may have replaced this one meanwhile
      if (registry.get(season) === flight) {
        registry.delete(season);
      }
    };
    void flight.promise.then(release, release);
    return flight.promise;
  }

  private async loadResults(season: number, roundCeiling?: number): Promise<readonly RaceResult[]> {
    this.fetches++;
    let fetched: RaceResult[];
    try {
      fetched = await this.upstream.fetchSeason(season, roundCeiling);
    } catch (err) {
      throw asUpstreamError(err, season, roundCeiling);
    }

    const records = Object.freeze([...fetched]);
    const coverage: Coverage = roundCeiling ?? 'full';
    const current = this.liveEntry(season);

    if (!current || coverageExceeds(coverage, current.coverage)) {
      const entry: CacheEntry = {
        season,
        records,
        coverage,
        fetchedAt: this.now(),
        concluded: this.isConcluded(season, records)
      };
      this.store(season, entry);
      console.log(`[ResultCache] Stored season ${season} (${records.length} results, coverage=${coverage}, concluded=${entry.concluded})`);
    }

    return records;
  }

  private async loadSchedule(season: number): Promise<SeasonSchedule> {
    this.fetches++;
    let schedule: SeasonSchedule;
    try {
      schedule = await this.upstream.fetchSchedule(season);
    } catch (err) {
      throw asUpstreamError(err, season);
    }

    this.schedules.set(season, {
      schedule,
      fetchedAt: this.now(),
      concluded: season < this.currentSeason()
    });
    return schedule;
  }

  private isConcluded(season: number, records: readonly RaceResult[]): boolean {
    if (season < this.currentSeason()) {
      return true;
    }
    const schedule = this.schedules.get(season);
    if (!schedule) {
      return false;
    }
    const finalRound = schedule.schedule.roundCount;
    return records.some(r => r.round === finalRound);
  }

  private liveEntry(season: number): CacheEntry | null {
    const entry = this.entries.get(season);
    if (!entry) {
      return null;
    }
    if (entry.concluded || this.now() - entry.fetchedAt < this.inProgressTtlMs) {
      return entry;
    }
    this.entries.delete(season);
    return null;
  }

  private store(season: number, entry: CacheEntry): void {
    this.entries.delete(season);
    this.entries.set(season, entry);

    if (this.maxSeasons > 0) {
      while (this.entries.size > this.maxSeasons) {
        const oldest = this.entries.keys().next();
        if (oldest.done) {
          break;
        }
        this.entries.delete(oldest.value);
        console.log(`[ResultCache] Evicted season ${oldest.value}`);
      }
    }
  }

  // move to most-recently-used position
  private touch(season: number, entry: CacheEntry): void {
    this.entries.delete(season);
    this.entries.set(season, entry);
  }

  private recordHit(): void {
    this.hits++;
    metrics.incrementCacheHit();
  }

  private recordMiss(): void {
    this.misses++;
    metrics.incrementCacheMiss();
  }

  private recordJoin(): void {
    this.joins++;
    metrics.incrementCacheJoin();
  }
}

function asUpstreamError(err: unknown, season: number, roundCeiling?: number): StandingsError {
  if (isStandingsError(err)) {
    return err;
  }
  return new StandingsError(
    'UpstreamUnavailable',
    `Upstream fetch failed for season ${season}: ${err instanceof Error ? err.message : String(err)}`,
    { season, round: roundCeiling }
  );
}

function sharedFailure(err: unknown, season: number, coverage: Coverage, joiners: number): StandingsError {
  const cause = asUpstreamError(err, season);
  if (joiners === 0) {
    return cause;
  }
  return new StandingsError(
    'CacheFetchInFlightFailed',
    `Shared fetch for season ${season} failed: ${cause.message}`,
    { season, round: coverage === 'full' ? undefined : coverage, retryAfterSeconds: cause.retryAfterSeconds },
    cause
  );
}
