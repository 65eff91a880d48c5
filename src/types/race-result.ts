/**
 * CORE DATA MODEL
 *
 * Fixed-shape records flowing from the upstream adapter through the cache
 * into the aggregator and progression builder. Everything here is read-only
 * once constructed.
 */

/**
 * Finishing position sentinel for drivers who were not classified
 * (retired, disqualified, excluded, withdrawn, failed to qualify)
 */
export const NOT_CLASSIFIED = 'NC' as const;

export type FinishPosition = number | typeof NOT_CLASSIFIED;

/**
 * One driver's classification in one race
 */
export interface RaceResult {
  readonly season: number;
  /** 1-based round within the season */
  readonly round: number;
  readonly raceName: string;
  readonly driverId: string;
  readonly constructorId: string;
  readonly finishPosition: FinishPosition;
  /** Points as awarded in the era's scale, taken as given */
  readonly pointsAwarded: number;
  readonly isWin: boolean;
  readonly isPodium: boolean;
}

/**
 * Ranked row of a drivers' or constructors' table
 */
export interface StandingsEntry {
  /** driverId or constructorId */
  id: string;
  totalPoints: number;
  wins: number;
  podiums: number;
  rank: number;
}

export interface DriverStandingsEntry extends StandingsEntry {
  /** Constructors driven for, in order of first appearance */
  constructorIds: string[];
  /** Number of races with a classification record */
  starts: number;
}

export interface StandingsTables {
  driverStandings: DriverStandingsEntry[];
  constructorStandings: StandingsEntry[];
}

/**
 * One step of a driver's cumulative points series
 */
export interface ProgressionPoint {
  round: number;
  driverId: string;
  cumulativePoints: number;
}

export type ProgressionSeries = Record<string, ProgressionPoint[]>;

/**
 * Race entry of a season schedule
 */
export interface ScheduledRound {
  round: number;
  raceName: string;
  /** ISO date (YYYY-MM-DD) */
  date: string;
  circuitName: string;
}

export interface SeasonSchedule {
  season: number;
  rounds: ScheduledRound[];
  roundCount: number;
}

/**
 * How much of the requested window the upstream actually had
 */
export interface SeasonCoverage {
  roundsScheduled: number;
  roundsAvailable: number;
  missingRounds: number[];
  partial: boolean;
}

/**
 * Build a RaceResult with derived win/podium flags
 */
export function createRaceResult(fields: {
  season: number;
  round: number;
  raceName: string;
  driverId: string;
  constructorId: string;
  finishPosition: FinishPosition;
  pointsAwarded: number;
}): RaceResult {
  const position = fields.finishPosition;
  const classified = position !== NOT_CLASSIFIED;

  return Object.freeze({
    ...fields,
    isWin: classified && position === 1,
    isPodium: classified && position >= 1 && position <= 3
  });
}
