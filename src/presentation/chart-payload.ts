/**
 * Chart and table payloads
 *
 * Shapes consumed directly by the table and line-chart renderers.
 * Round is the x-axis; cumulative points the y-axis.
 */

import { ProgressionSeries, StandingsEntry } from '../types/race-result';

export interface ChartPoint {
  round: number;
  cumulativePoints: number;
}

export type ProgressionPayload = Record<string, ChartPoint[]>;

export interface StandingsRow {
  id: string;
  totalPoints: number;
  wins: number;
  podiums: number;
  rank: number;
}

export function toProgressionPayload(series: ProgressionSeries): ProgressionPayload {
  const payload: ProgressionPayload = {};
  for (const [driverId, points] of Object.entries(series)) {
    payload[driverId] = points.map(p => ({ round: p.round, cumulativePoints: p.cumulativePoints }));
  }
  return payload;
}

/**
 * Forward-fill sparse series over a round axis.
 * Rounds before a driver's first race read 0; missed rounds carry the last total.
 */
export function toDenseSeries(series: ProgressionSeries, rounds: readonly number[]): ProgressionPayload {
  const axis = [...rounds].sort((a, b) => a - b);
  const payload: ProgressionPayload = {};

  for (const [driverId, points] of Object.entries(series)) {
    let cursor = 0;
    let carried = 0;

    payload[driverId] = axis.map(round => {
      while (cursor < points.length && points[cursor].round <= round) {
        carried = points[cursor].cumulativePoints;
        cursor++;
      }
      return { round, cumulativePoints: carried };
    });
  }

  return payload;
}

export function toStandingsRows(entries: readonly StandingsEntry[]): StandingsRow[] {
  return entries.map(entry => ({
    id: entry.id,
    totalPoints: entry.totalPoints,
    wins: entry.wins,
    podiums: entry.podiums,
    rank: entry.rank
  }));
}
