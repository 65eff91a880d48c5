/**
 * Jolpica (Ergast-compatible) payload parsing
 *
 * Payloads arrive as untyped JSON. Every field is checked here so that only
 * fixed-shape RaceResult and ScheduledRound values leave the upstream layer.
 */

import {
  NOT_CLASSIFIED,
  FinishPosition,
  RaceResult,
  ScheduledRound,
  createRaceResult
} from '../types/race-result';

type JsonObject = Record<string, unknown>;

export interface PageEnvelope {
  total: number;
  offset: number;
  races: JsonObject[];
}

export interface ParsedPage {
  results: RaceResult[];
  rejected: number;
  /** Highest round seen on the page, 0 if the page is empty */
  lastRound: number;
  /** Result rows on the page, valid or not */
  rowCount: number;
}

export class PayloadShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PayloadShapeError';
  }
}

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function objectAt(source: JsonObject, key: string): JsonObject | null {
  const value = source[key];
  return isObject(value) ? value : null;
}

function stringAt(source: JsonObject, key: string): string | null {
  const value = source[key];
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return null;
}

function positiveIntAt(source: JsonObject, key: string): number | null {
  const raw = stringAt(source, key);
  if (raw === null || !/^\d+$/.test(raw)) {
    return null;
  }
  const parsed = parseInt(raw, 10);
  return parsed > 0 ? parsed : null;
}

function objectList(value: unknown): JsonObject[] {
  return Array.isArray(value) ? value.filter(isObject) : [];
}

/**
 * Unwrap MRData.RaceTable from a response body
 */
export function parseEnvelope(body: unknown): PageEnvelope {
  if (!isObject(body)) {
    throw new PayloadShapeError('response body is not an object');
  }
  const mrData = objectAt(body, 'MRData');
  if (!mrData) {
    throw new PayloadShapeError('missing MRData');
  }
  const raceTable = objectAt(mrData, 'RaceTable');
  if (!raceTable) {
    throw new PayloadShapeError('missing MRData.RaceTable');
  }
  if (!Array.isArray(raceTable.Races)) {
    throw new PayloadShapeError('missing MRData.RaceTable.Races');
  }

  const races = objectList(raceTable.Races);
  const total = parseInt(stringAt(mrData, 'total') ?? '', 10);
  const offset = parseInt(stringAt(mrData, 'offset') ?? '0', 10);

  return {
    total: isNaN(total) ? -1 : total,
    offset: isNaN(offset) ? 0 : offset,
    races
  };
}

/**
 * Schedule rows -> ScheduledRound, ordered by round
 */
export function parseSchedule(races: JsonObject[]): ScheduledRound[] {
  const rounds: ScheduledRound[] = [];

  for (const race of races) {
    const round = positiveIntAt(race, 'round');
    if (round === null) {
      continue;
    }
    const circuit = objectAt(race, 'Circuit');
    rounds.push({
      round,
      raceName: stringAt(race, 'raceName') ?? `Round ${round}`,
      date: stringAt(race, 'date') ?? '',
      circuitName: (circuit && stringAt(circuit, 'circuitName')) ?? ''
    });
  }

  return rounds.sort((a, b) => a.round - b.round);
}

function parseFinishPosition(row: JsonObject): FinishPosition | null {
  const positionText = stringAt(row, 'positionText');
  if (positionText !== null) {
    return /^\d+$/.test(positionText) && parseInt(positionText, 10) > 0
      ? parseInt(positionText, 10)
      : NOT_CLASSIFIED;
  }
  // older payloads only carry the numeric position
  return positiveIntAt(row, 'position');
}

function parsePoints(row: JsonObject): number | null {
  const raw = stringAt(row, 'points');
  if (raw === null) {
    return null;
  }
  const points = Number(raw);
  return Number.isFinite(points) && points >= 0 ? points : null;
}

/**
 * One result row -> RaceResult, or null when the row is malformed
 */
export function parseResultRow(season: number, round: number, raceName: string, row: JsonObject): RaceResult | null {
  const driver = objectAt(row, 'Driver');
  const constructor = objectAt(row, 'Constructor');
  const driverId = driver ? stringAt(driver, 'driverId') : null;
  const constructorId = constructor ? stringAt(constructor, 'constructorId') : null;
  const finishPosition = parseFinishPosition(row);
  const pointsAwarded = parsePoints(row);

  if (driverId === null || constructorId === null || finishPosition === null || pointsAwarded === null) {
    return null;
  }

  return createRaceResult({
    season,
    round,
    raceName,
    driverId,
    constructorId,
    finishPosition,
    pointsAwarded
  });
}

/**
 * Flatten a results page into RaceResult records
 */
export function parseResultsPage(season: number, races: JsonObject[]): ParsedPage {
  const results: RaceResult[] = [];
  let rejected = 0;
  let lastRound = 0;
  let rowCount = 0;

  for (const race of races) {
    const rows = objectList(race.Results);
    rowCount += rows.length;

    const round = positiveIntAt(race, 'round');
    if (round === null) {
      rejected += rows.length;
      continue;
    }
    lastRound = Math.max(lastRound, round);
    const raceName = stringAt(race, 'raceName') ?? `Round ${round}`;

    for (const row of rows) {
      const result = parseResultRow(season, round, raceName, row);
      if (result) {
        results.push(result);
      } else {
        rejected++;
      }
    }
  }

  return { results, rejected, lastRound, rowCount };
}
