/**
 * PROGRESSION BUILDER TESTS
 */

import { describe, it, expect } from 'vitest';
import { buildProgression, checkDriverSelection } from '../../src/standings/progression';
import { toDenseSeries, toProgressionPayload } from '../../src/presentation/chart-payload';
import { captureError, raceResult, titleFightSeason } from '../fixtures/season-fixtures';

const sparseSeason = [
  raceResult(1, 'part_timer', 'x', 4, 10),
  raceResult(3, 'part_timer', 'x', 6, 5),
  raceResult(5, 'part_timer', 'x', 5, 8),
  raceResult(1, 'regular', 'y', 10, 1),
  raceResult(2, 'regular', 'y', 10, 1),
  raceResult(3, 'regular', 'y', 10, 1),
  raceResult(4, 'regular', 'y', 10, 1),
  raceResult(5, 'regular', 'y', 10, 1),
  raceResult(5, 'late_entry', 'y', 12, 0)
];

describe('buildProgression', () => {
  it('should emit one point per round raced', () => {
    const series = buildProgression(sparseSeason, ['part_timer']);

    expect(series).toEqual({
      part_timer: [
        { round: 1, driverId: 'part_timer', cumulativePoints: 10 },
        { round: 3, driverId: 'part_timer', cumulativePoints: 15 },
        { round: 5, driverId: 'part_timer', cumulativePoints: 23 }
      ]
    });
  });

  it('should end each series at the driver total', () => {
    const series = buildProgression(titleFightSeason(), ['d1', 'd2']);

    expect(series.d1).toHaveLength(22);
    expect(series.d1[21].cumulativePoints).toBe(387.5);
    expect(series.d2[21].cumulativePoints).toBe(395.5);
  });

  it('should stop at the round ceiling', () => {
    const series = buildProgression(titleFightSeason(), ['d1', 'd2'], 10);

    expect(series.d1.map(p => p.round)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(series.d1[9].cumulativePoints).toBe(150);
    expect(series.d2[9].cumulativePoints).toBe(140);
  });

  it('should sum shared drives in the same round', () => {
    const records = [
      raceResult(1, 'sharer', 'x', 4, 1.5),
      raceResult(1, 'sharer', 'x', 'NC', 1.5),
      raceResult(2, 'sharer', 'x', 3, 4)
    ];

    expect(buildProgression(records, ['sharer']).sharer).toEqual([
      { round: 1, driverId: 'sharer', cumulativePoints: 3 },
      { round: 2, driverId: 'sharer', cumulativePoints: 7 }
    ]);
  });

  it('should give an empty series to a requested driver absent from the window', () => {
    const series = buildProgression(sparseSeason, ['regular', 'late_entry', 'nobody'], 3);

    expect(series.regular.map(p => p.cumulativePoints)).toEqual([1, 2, 3]);
    expect(series.late_entry).toEqual([]);
    expect(series.nobody).toEqual([]);
  });

  it('should keep the requested order and drop duplicates', () => {
    const series = buildProgression(sparseSeason, ['regular', 'part_timer', 'regular']);

    expect(Object.keys(series)).toEqual(['regular', 'part_timer']);
  });

  it('should reject more than 10 drivers', () => {
    const ids = Array.from({ length: 11 }, (_, i) => `driver_${i}`);
    const error = captureError(() => buildProgression(sparseSeason, ids));

    expect(error.kind).toBe('TooManyDrivers');
    expect(error.season).toBe(2021);
  });

  it('should reject a selection with no driver in the season', () => {
    const error = captureError(() => buildProgression(sparseSeason, ['ghost', 'phantom']));

    expect(error.kind).toBe('NoMatchingDrivers');
    expect(error.message).toBe('None of the requested drivers raced in season 2021: ghost, phantom');
  });
});

describe('checkDriverSelection', () => {
  it('should allow exactly 10 distinct drivers', () => {
    const ids = Array.from({ length: 10 }, (_, i) => `driver_${i}`);

    expect(checkDriverSelection([...ids, 'driver_0'])).toHaveLength(10);
  });
});

describe('chart payloads', () => {
  it('should drop driver ids from chart points', () => {
    const payload = toProgressionPayload(buildProgression(sparseSeason, ['part_timer']));

    expect(payload).toEqual({
      part_timer: [
        { round: 1, cumulativePoints: 10 },
        { round: 3, cumulativePoints: 15 },
        { round: 5, cumulativePoints: 23 }
      ]
    });
  });

  it('should forward-fill missed rounds on a dense axis', () => {
    const series = buildProgression(sparseSeason, ['part_timer', 'late_entry']);
    const dense = toDenseSeries(series, [1, 2, 3, 4, 5]);

    expect(dense.part_timer.map(p => p.cumulativePoints)).toEqual([10, 10, 15, 15, 23]);
    expect(dense.late_entry.map(p => p.cumulativePoints)).toEqual([0, 0, 0, 0, 0]);
    expect(dense.late_entry.map(p => p.round)).toEqual([1, 2, 3, 4, 5]);
  });
});
