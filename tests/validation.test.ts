/**
 * REQUEST VALIDATION TESTS
 */

import { describe, it, expect } from 'vitest';
import {
  parseBooleanParam,
  parseDriverIdsParam,
  parseRoundParam,
  parseSeasonParam,
  validateDriverIds,
  validateRoundCeiling,
  validateRoundWithinSchedule,
  validateSeason
} from '../src/validation/request-validator';
import { getCurrentSeason, listSelectableSeasons } from '../src/config/seasons';
import { captureError } from './fixtures/season-fixtures';

const NOW = new Date('2026-06-01T12:00:00Z');

describe('validateSeason', () => {
  it('should accept seasons from 1950 to the current year', () => {
    expect(validateSeason(1950, NOW)).toBe(1950);
    expect(validateSeason(2026, NOW)).toBe(2026);
  });

  it('should reject seasons outside the championship', () => {
    const early = captureError(() => validateSeason(1949, NOW));
    const future = captureError(() => validateSeason(2027, NOW));

    expect(early.kind).toBe('InvalidSeason');
    expect(early.message).toBe('Season must be a year between 1950 and 2026, got 1949');
    expect(future.kind).toBe('InvalidSeason');
    expect(future.details).toEqual({ min: 1950, max: 2026, received: 2027 });
  });

  it('should reject a fractional season', () => {
    expect(captureError(() => validateSeason(2020.5, NOW)).kind).toBe('InvalidSeason');
  });
});

describe('validateRoundCeiling', () => {
  it('should pass an omitted ceiling through', () => {
    expect(validateRoundCeiling(2021)).toBeUndefined();
  });

  it('should accept positive integers', () => {
    expect(validateRoundCeiling(2021, 1)).toBe(1);
  });

  it.each([0, -1, 1.5])('should reject %s', (round) => {
    const error = captureError(() => validateRoundCeiling(2021, round));

    expect(error.kind).toBe('InvalidRoundCeiling');
    expect(error.season).toBe(2021);
    expect(error.round).toBe(round);
  });

  it('should bound the ceiling by the round count', () => {
    expect(() => validateRoundWithinSchedule(2021, 22, 22)).not.toThrow();
    expect(() => validateRoundWithinSchedule(2021, undefined, 22)).not.toThrow();
    expect(captureError(() => validateRoundWithinSchedule(2021, 23, 22)).details).toEqual({ roundCount: 22 });
  });
});

describe('validateDriverIds', () => {
  it('should trim and dedupe ids in order', () => {
    expect(validateDriverIds(2021, [' d2 ', 'd1', 'd2'])).toEqual(['d2', 'd1']);
  });

  it('should reject more than 10 distinct drivers', () => {
    const ids = Array.from({ length: 11 }, (_, i) => `driver_${i}`);
    const error = captureError(() => validateDriverIds(2021, ids));

    expect(error.kind).toBe('TooManyDrivers');
    expect(error.details).toEqual({ requested: 11, limit: 10 });
  });

  it('should count duplicates once toward the limit', () => {
    const ids = Array.from({ length: 10 }, (_, i) => `driver_${i}`);

    expect(validateDriverIds(2021, [...ids, ...ids])).toHaveLength(10);
  });

  it('should reject an empty selection', () => {
    expect(captureError(() => validateDriverIds(2021, ['', '  '])).kind).toBe('NoMatchingDrivers');
  });

  it('should pass ids through as opaque strings', () => {
    expect(validateDriverIds(2021, [' d1 ', 'd.three', 'd2; x', 'd1'])).toEqual(['d1', 'd.three', 'd2; x']);
  });
});

describe('query string parsing', () => {
  it('should parse seasons', () => {
    expect(parseSeasonParam('2021')).toBe(2021);
    expect(captureError(() => parseSeasonParam('twenty')).kind).toBe('InvalidSeason');
    expect(captureError(() => parseSeasonParam(undefined)).kind).toBe('InvalidSeason');
  });

  it('should parse rounds', () => {
    expect(parseRoundParam(2021, '7')).toBe(7);
    expect(parseRoundParam(2021, undefined)).toBeUndefined();
    expect(parseRoundParam(2021, '')).toBeUndefined();
    expect(parseRoundParam(2021, '-2')).toBe(-2);
    expect(captureError(() => parseRoundParam(2021, 'last')).kind).toBe('InvalidRoundCeiling');
    expect(captureError(() => parseRoundParam(2021, ['1', '2'])).kind).toBe('InvalidRoundCeiling');
  });

  it('should parse comma-separated and repeated driver params', () => {
    expect(parseDriverIdsParam('d1, d2,,d3')).toEqual(['d1', 'd2', 'd3']);
    expect(parseDriverIdsParam(['d1,d2', 'd3'])).toEqual(['d1', 'd2', 'd3']);
    expect(parseDriverIdsParam(undefined)).toEqual([]);
  });

  it('should parse boolean flags', () => {
    expect(parseBooleanParam('true')).toBe(true);
    expect(parseBooleanParam('1')).toBe(true);
    expect(parseBooleanParam('yes')).toBe(false);
    expect(parseBooleanParam(undefined)).toBe(false);
  });
});

describe('season bounds', () => {
  it('should list seasons newest first', () => {
    const seasons = listSelectableSeasons(NOW);

    expect(getCurrentSeason(NOW)).toBe(2026);
    expect(seasons[0]).toBe(2026);
    expect(seasons[seasons.length - 1]).toBe(1950);
    expect(seasons).toHaveLength(77);
  });
});
