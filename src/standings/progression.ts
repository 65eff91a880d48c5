/**
 * Progression Series Builder
 *
 * Cumulative points per driver, one point per round actually raced.
 * Rounds a driver missed are not filled in; see toDenseSeries in
 * presentation/chart-payload for a forward-filled view.
 */

import { MAX_PROGRESSION_DRIVERS } from '../config/seasons';
import { ProgressionSeries, RaceResult } from '../types/race-result';
import { StandingsError } from '../types/errors';
import { fromCents, toCents, withinCeiling } from './aggregator';

/**
 * Reject selections that can never produce a chart
 */
export function checkDriverSelection(driverIds: readonly string[], season?: number): string[] {
  const unique = Array.from(new Set(driverIds));

  if (unique.length > MAX_PROGRESSION_DRIVERS) {
    throw new StandingsError(
      'TooManyDrivers',
      `At most ${MAX_PROGRESSION_DRIVERS} drivers can be compared, got ${unique.length}`,
      { season, details: { requested: unique.length, limit: MAX_PROGRESSION_DRIVERS } }
    );
  }

  return unique;
}

export function buildProgression(
  records: readonly RaceResult[],
  driverIds: readonly string[],
  roundCeiling?: number
): ProgressionSeries {
  const season = records.length > 0 ? records[0].season : undefined;
  const requested = checkDriverSelection(driverIds, season);
  const wanted = new Set(requested);

  // driverId -> round -> points (cents), rounds kept in ascending order below
  const perRound = new Map<string, Map<number, number>>();
  let matched = false;

  for (const record of records) {
    if (!wanted.has(record.driverId)) {
      continue;
    }
    matched = true;
    if (!withinCeiling(record, roundCeiling)) {
      continue;
    }

    let rounds = perRound.get(record.driverId);
    if (!rounds) {
      rounds = new Map<number, number>();
      perRound.set(record.driverId, rounds);
    }
    // shared drives put a driver in the same round twice
    rounds.set(record.round, (rounds.get(record.round) ?? 0) + toCents(record.pointsAwarded));
  }

  if (!matched) {
    throw new StandingsError(
      'NoMatchingDrivers',
      season !== undefined
        ? `None of the requested drivers raced in season ${season}: ${requested.join(', ')}`
        : `None of the requested drivers have results: ${requested.join(', ')}`,
      { season, round: roundCeiling, details: { requested } }
    );
  }

  const series: ProgressionSeries = {};

  for (const driverId of requested) {
    const rounds = perRound.get(driverId);
    const ordered = rounds ? Array.from(rounds.entries()).sort((a, b) => a[0] - b[0]) : [];
    let runningCents = 0;

    series[driverId] = ordered.map(([round, cents]) => {
      runningCents += cents;
      return { round, driverId, cumulativePoints: fromCents(runningCents) };
    });
  }

  return series;
}
