/**
 * Request validation
 *
 * All checks here are synchronous and run before the cache or the upstream
 * provider is touched.
 */

import { FIRST_SEASON, MAX_PROGRESSION_DRIVERS, getCurrentSeason } from '../config/seasons';
import { StandingsError } from '../types/errors';

export function validateSeason(season: number, now: Date = new Date()): number {
  const current = getCurrentSeason(now);
  if (!Number.isInteger(season) || season < FIRST_SEASON || season > current) {
    throw new StandingsError(
      'InvalidSeason',
      `Season must be a year between ${FIRST_SEASON} and ${current}, got ${season}`,
      { details: { min: FIRST_SEASON, max: current, received: season } }
    );
  }
  return season;
}

/**
 * Shape check only; the upper bound needs the season's schedule
 */
export function validateRoundCeiling(season: number, roundCeiling?: number): number | undefined {
  if (roundCeiling === undefined) {
    return undefined;
  }
  if (!Number.isInteger(roundCeiling) || roundCeiling < 1) {
    throw new StandingsError(
      'InvalidRoundCeiling',
      `Round must be a positive integer for season ${season}, got ${roundCeiling}`,
      { season, round: roundCeiling }
    );
  }
  return roundCeiling;
}

export function validateRoundWithinSchedule(season: number, roundCeiling: number | undefined, roundCount: number): void {
  if (roundCeiling !== undefined && roundCeiling > roundCount) {
    throw new StandingsError(
      'InvalidRoundCeiling',
      `Season ${season} has ${roundCount} rounds, round ${roundCeiling} does not exist`,
      { season, round: roundCeiling, details: { roundCount } }
    );
  }
}

/**
 * 1..MAX_PROGRESSION_DRIVERS distinct driver ids. Ids are opaque; whether
 * any of them raced is decided against the season's records
 */
export function validateDriverIds(season: number, driverIds: readonly string[]): string[] {
  const unique = Array.from(new Set(driverIds.map(id => id.trim()).filter(id => id.length > 0)));

  if (unique.length > MAX_PROGRESSION_DRIVERS) {
    throw new StandingsError(
      'TooManyDrivers',
      `At most ${MAX_PROGRESSION_DRIVERS} drivers can be compared, got ${unique.length} for season ${season}`,
      { season, details: { requested: unique.length, limit: MAX_PROGRESSION_DRIVERS } }
    );
  }

  if (unique.length === 0) {
    throw new StandingsError(
      'NoMatchingDrivers',
      `Select at least one driver for season ${season}`,
      { season, details: { requested: [] } }
    );
  }

  return unique;
}

// ============================================================================
// QUERY STRING PARSING
// ============================================================================

function parseIntegerParam(raw: unknown): number | null {
  if (typeof raw !== 'string' || !/^-?\d+$/.test(raw.trim())) {
    return null;
  }
  return parseInt(raw.trim(), 10);
}

export function parseSeasonParam(raw: unknown): number {
  const season = parseIntegerParam(raw);
  if (season === null) {
    throw new StandingsError('InvalidSeason', `Season must be a year, got "${String(raw)}"`);
  }
  return season;
}

export function parseRoundParam(season: number, raw: unknown): number | undefined {
  if (raw === undefined || raw === '') {
    return undefined;
  }
  const round = parseIntegerParam(raw);
  if (round === null) {
    throw new StandingsError(
      'InvalidRoundCeiling',
      `Round must be a positive integer for season ${season}, got "${String(raw)}"`,
      { season }
    );
  }
  return round;
}

/**
 * Accepts ?drivers=a,b and ?drivers=a&drivers=b
 */
export function parseDriverIdsParam(raw: unknown): string[] {
  const values = Array.isArray(raw) ? raw : [raw];
  return values
    .filter((value): value is string => typeof value === 'string')
    .flatMap(value => value.split(','))
    .map(id => id.trim())
    .filter(id => id.length > 0);
}

export function parseBooleanParam(raw: unknown): boolean {
  return raw === 'true' || raw === '1';
}
