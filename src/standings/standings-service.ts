/**
 * Standings Service
 *
 * Public entry points of the engine. Validates the request, reads season
 * results through the ResultCache and hands them to the aggregator and
 * progression builder. Failures come back as ServiceResult values, never
 * as thrown StandingsErrors.
 */

import { ResultCache } from '../cache/result-cache';
import { getCurrentSeason } from '../config/seasons';
import {
  DriverStandingsEntry,
  FinishPosition,
  ProgressionPoint,
  ProgressionSeries,
  RaceResult,
  ScheduledRound,
  SeasonCoverage,
  SeasonSchedule,
  StandingsEntry
} from '../types/race-result';
import { ServiceResult, StandingsError, fail, isStandingsError, ok } from '../types/errors';
import {
  validateDriverIds,
  validateRoundCeiling,
  validateRoundWithinSchedule,
  validateSeason
} from '../validation/request-validator';
import { aggregate } from './aggregator';
import { buildProgression } from './progression';

export interface StandingsResult {
  season: number;
  roundCeiling: number | null;
  /** Last round with results inside the window */
  throughRound: number;
  driverStandings: DriverStandingsEntry[];
  constructorStandings: StandingsEntry[];
  coverage: SeasonCoverage;
}

export interface ProgressionResult {
  season: number;
  roundCeiling: number | null;
  /** Rounds with results inside the window, ascending */
  rounds: number[];
  series: ProgressionSeries;
  coverage: SeasonCoverage;
}

export interface SeasonOverview {
  season: number;
  concluded: boolean;
  schedule: ScheduledRound[];
  drivers: Array<{ id: string; totalPoints: number; rank: number }>;
  constructors: Array<{ id: string; totalPoints: number; rank: number }>;
  coverage: SeasonCoverage;
}

export interface DriverRaceLine {
  round: number;
  raceName: string;
  constructorId: string;
  finishPosition: FinishPosition;
  pointsAwarded: number;
}

export interface DriverSeasonResult {
  season: number;
  driverId: string;
  constructorIds: string[];
  rank: number;
  totalPoints: number;
  wins: number;
  podiums: number;
  starts: number;
  results: DriverRaceLine[];
  progression: ProgressionPoint[];
}

export interface StandingsServiceOptions {
  clock?: () => Date;
}

export function computeCoverage(
  schedule: SeasonSchedule,
  records: readonly RaceResult[],
  roundCeiling?: number
): SeasonCoverage {
  const scheduled = schedule.rounds
    .map(r => r.round)
    .filter(round => roundCeiling === undefined || round <= roundCeiling);
  const available = new Set(records.map(r => r.round));
  const missingRounds = scheduled.filter(round => !available.has(round));

  return {
    roundsScheduled: scheduled.length,
    roundsAvailable: scheduled.length - missingRounds.length,
    missingRounds,
    partial: missingRounds.length > 0
  };
}

function distinctRounds(records: readonly RaceResult[]): number[] {
  return Array.from(new Set(records.map(r => r.round))).sort((a, b) => a - b);
}

export class StandingsService {
  private cache: ResultCache;
  private clock: () => Date;

  constructor(cache: ResultCache, options: StandingsServiceOptions = {}) {
    this.cache = cache;
    this.clock = options.clock ?? (() => new Date());
  }

  async getStandings(season: number, roundCeiling?: number): Promise<ServiceResult<StandingsResult>> {
    return this.run(async () => {
      const { schedule, records } = await this.loadWindow(season, roundCeiling);
      const tables = aggregate(records, roundCeiling);
      const rounds = distinctRounds(records);

      return {
        season,
        roundCeiling: roundCeiling ?? null,
        throughRound: rounds.length > 0 ? rounds[rounds.length - 1] : 0,
        driverStandings: tables.driverStandings,
        constructorStandings: tables.constructorStandings,
        coverage: computeCoverage(schedule, records, roundCeiling)
      };
    });
  }

  async getProgression(
    season: number,
    driverIds: readonly string[],
    roundCeiling?: number
  ): Promise<ServiceResult<ProgressionResult>> {
    return this.run(async () => {
      validateSeason(season, this.clock());
      const selection = validateDriverIds(season, driverIds);
      const { schedule, records } = await this.loadWindow(season, roundCeiling);

      return {
        season,
        roundCeiling: roundCeiling ?? null,
        rounds: distinctRounds(records),
        series: buildProgression(records, selection, roundCeiling),
        coverage: computeCoverage(schedule, records, roundCeiling)
      };
    });
  }

  /**
   * Schedule plus season-end totals, used to populate selection lists
   */
  async getSeasonOverview(season: number): Promise<ServiceResult<SeasonOverview>> {
    return this.run(async () => {
      const { schedule, records } = await this.loadWindow(season);
      const tables = aggregate(records);
      const entry = this.cache.peek(season);

      return {
        season,
        concluded: entry ? entry.concluded : season < getCurrentSeason(this.clock()),
        schedule: schedule.rounds,
        drivers: tables.driverStandings.map(d => ({ id: d.id, totalPoints: d.totalPoints, rank: d.rank })),
        constructors: tables.constructorStandings.map(c => ({ id: c.id, totalPoints: c.totalPoints, rank: c.rank })),
        coverage: computeCoverage(schedule, records)
      };
    });
  }

  /**
   * One driver's season, race by race
   */
  async getDriverSeason(season: number, driverId: string): Promise<ServiceResult<DriverSeasonResult>> {
    return this.run(async () => {
      validateSeason(season, this.clock());
      const [selected] = validateDriverIds(season, [driverId]);
      const { records } = await this.loadWindow(season);

      const progression = buildProgression(records, [selected])[selected];
      const standing = aggregate(records).driverStandings.find(d => d.id === selected);
      if (!standing) {
        throw new StandingsError(
          'NoMatchingDrivers',
          `Driver ${selected} did not race in season ${season}`,
          { season }
        );
      }

      const results: DriverRaceLine[] = records
        .filter(r => r.driverId === selected)
        .map(r => ({
          round: r.round,
          raceName: r.raceName,
          constructorId: r.constructorId,
          finishPosition: r.finishPosition,
          pointsAwarded: r.pointsAwarded
        }));

      return {
        season,
        driverId: selected,
        constructorIds: standing.constructorIds,
        rank: standing.rank,
        totalPoints: standing.totalPoints,
        wins: standing.wins,
        podiums: standing.podiums,
        starts: standing.starts,
        results,
        progression
      };
    });
  }

  /**
   * Validate, then read schedule and results for the window
   */
  private async loadWindow(
    season: number,
    roundCeiling?: number
  ): Promise<{ schedule: SeasonSchedule; records: readonly RaceResult[] }> {
    validateSeason(season, this.clock());
    validateRoundCeiling(season, roundCeiling);

    const schedule = await this.cache.getSchedule(season);
    validateRoundWithinSchedule(season, roundCeiling, schedule.roundCount);

    const records = await this.cache.get(season, roundCeiling);
    return { schedule, records };
  }

  private async run<T>(work: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return ok(await work());
    } catch (err) {
      if (isStandingsError(err)) {
        return fail(err);
      }
      throw err;
    }
  }
}
