/**
 * Standings Aggregator
 *
 * Folds per-race results into drivers' and constructors' tables.
 *
 * Constructors are credited per record, so a driver who changed teams
 * mid-season contributes to each team only the rounds driven for it.
 *
 * Ranking order (strict, deterministic):
 *   1. totalPoints descending
 *   2. wins descending
 *   3. podiums descending
 *   4. id ascending (code-unit order)
 */

import {
  DriverStandingsEntry,
  RaceResult,
  StandingsEntry,
  StandingsTables
} from '../types/race-result';

interface Tally {
  id: string;
  /** hundredths of a point, summed as integers */
  pointsCents: number;
  wins: number;
  podiums: number;
}

interface DriverTally extends Tally {
  constructorIds: string[];
  rounds: Set<number>;
}

export function toCents(points: number): number {
  return Math.round(points * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

function tallyRecord(tally: Tally, record: RaceResult): void {
  tally.pointsCents += toCents(record.pointsAwarded);
  if (record.isWin) {
    tally.wins++;
  }
  if (record.isPodium) {
    tally.podiums++;
  }
}

/**
 * Total order over standings rows
 */
export function compareStandings(
  a: Pick<StandingsEntry, 'id' | 'totalPoints' | 'wins' | 'podiums'>,
  b: Pick<StandingsEntry, 'id' | 'totalPoints' | 'wins' | 'podiums'>
): number {
  if (a.totalPoints !== b.totalPoints) {
    return b.totalPoints - a.totalPoints;
  }
  if (a.wins !== b.wins) {
    return b.wins - a.wins;
  }
  if (a.podiums !== b.podiums) {
    return b.podiums - a.podiums;
  }
  if (a.id === b.id) {
    return 0;
  }
  return a.id < b.id ? -1 : 1;
}

/**
 * Sort by compareStandings and assign ranks 1..N
 */
export function rankEntries<T extends Omit<StandingsEntry, 'rank'>>(entries: T[]): Array<T & { rank: number }> {
  return [...entries]
    .sort(compareStandings)
    .map((entry, index) => ({ ...entry, rank: index + 1 }));
}

export function withinCeiling(record: RaceResult, roundCeiling?: number): boolean {
  return roundCeiling === undefined || record.round <= roundCeiling;
}

export function aggregate(records: readonly RaceResult[], roundCeiling?: number): StandingsTables {
  const drivers = new Map<string, DriverTally>();
  const constructors = new Map<string, Tally>();

  for (const record of records) {
    if (!withinCeiling(record, roundCeiling)) {
      continue;
    }

    let driver = drivers.get(record.driverId);
    if (!driver) {
      driver = {
        id: record.driverId,
        pointsCents: 0,
        wins: 0,
        podiums: 0,
        constructorIds: [],
        rounds: new Set<number>()
      };
      drivers.set(record.driverId, driver);
    }
    tallyRecord(driver, record);
    driver.rounds.add(record.round);
    if (!driver.constructorIds.includes(record.constructorId)) {
      driver.constructorIds.push(record.constructorId);
    }

    let constructor = constructors.get(record.constructorId);
    if (!constructor) {
      constructor = { id: record.constructorId, pointsCents: 0, wins: 0, podiums: 0 };
      constructors.set(record.constructorId, constructor);
    }
    tallyRecord(constructor, record);
  }

  const driverStandings: DriverStandingsEntry[] = rankEntries(
    Array.from(drivers.values()).map(tally => ({
      id: tally.id,
      totalPoints: fromCents(tally.pointsCents),
      wins: tally.wins,
      podiums: tally.podiums,
      constructorIds: tally.constructorIds,
      starts: tally.rounds.size
    }))
  );

  const constructorStandings: StandingsEntry[] = rankEntries(
    Array.from(constructors.values()).map(tally => ({
      id: tally.id,
      totalPoints: fromCents(tally.pointsCents),
      wins: tally.wins,
      podiums: tally.podiums
    }))
  );

  return { driverStandings, constructorStandings };
}
