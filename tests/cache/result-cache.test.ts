/**
 * Result Cache Tests
 *
 * 1. Idempotence - repeated reads return the same records without refetching
 * 2. Single flight - concurrent reads for a season share one upstream fetch
 * 3. Failure handling - failures reach every waiter and are never cached
 * 4. Retention - in-progress TTL, concluded seasons, LRU bound
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ResultCache, coverageSatisfies, truncateToCeiling } from '../../src/cache/result-cache';
import { StandingsError } from '../../src/types/errors';
import { metrics } from '../../src/observability/metrics';
import { StubUpstream, raceResult, titleFightSeason, transferSeason } from '../fixtures/season-fixtures';

function smallSeason(season: number) {
  return [
    raceResult(1, 'a', 'x', 1, 25, season),
    raceResult(2, 'a', 'x', 2, 18, season)
  ];
}

describe('ResultCache', () => {
  let upstream: StubUpstream;
  let cache: ResultCache;

  beforeEach(() => {
    metrics.reset();
    upstream = new StubUpstream()
      .withSeason(2021, titleFightSeason())
      .withSeason(2019, transferSeason(2019));
    cache = new ResultCache(upstream, {
      currentSeason: () => 2026,
      prefetchFullSeason: true,
      maxSeasons: 0
    });
  });

  describe('Idempotence', () => {
    it('should return identical records for repeated reads', async () => {
      const first = await cache.get(2021);
      const second = await cache.get(2021);

      expect(second).toBe(first);
      expect(first).toHaveLength(44);
      expect(upstream.countSeasonFetches(2021)).toBe(1);
    });

    it('should answer a round ceiling from a full season without refetching', async () => {
      await cache.get(2021);
      const window = await cache.get(2021, 10);

      expect(window).toHaveLength(20);
      expect(Math.max(...window.map(r => r.round))).toBe(10);
      expect(upstream.countSeasonFetches(2021)).toBe(1);
      expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, fetches: 1 });
    });

    it('should fetch the full season for a bounded request when prefetching', async () => {
      await cache.get(2021, 5);

      expect(upstream.seasonCalls).toEqual([{ season: 2021, roundCeiling: undefined }]);
      expect(cache.peek(2021)?.coverage).toBe('full');
    });

    it('should hand out frozen records', async () => {
      const records = await cache.get(2021, 3);

      expect(Object.isFrozen(records)).toBe(true);
      expect(Object.isFrozen(records[0])).toBe(true);
    });
  });

  describe('Single flight', () => {
    it('should issue one upstream fetch for concurrent reads', async () => {
      upstream.hold = true;
      const pending = Array.from({ length: 5 }, () => cache.get(2021));

      expect(upstream.countSeasonFetches(2021)).toBe(1);
      expect(cache.stats().in_flight).toBe(1);

      upstream.release();
      const results = await Promise.all(pending);

      for (const result of results) {
        expect(result).toBe(results[0]);
      }
      expect(cache.stats()).toMatchObject({ misses: 1, joins: 4, in_flight: 0 });
      expect(metrics.toJSON().cache.joins).toBe(4);
    });

    it('should truncate joined reads to their own ceiling', async () => {
      upstream.hold = true;
      const full = cache.get(2021);
      const bounded = cache.get(2021, 2);

      upstream.release();

      expect(await bounded).toHaveLength(4);
      expect(await full).toHaveLength(44);
      expect(upstream.countSeasonFetches(2021)).toBe(1);
    });

    it('should not make one season wait on another', async () => {
      upstream.hold = true;
      const slow = cache.get(2021);
      upstream.hold = false;

      const fast = await cache.get(2019);

      expect(fast).toHaveLength(24);
      expect(upstream.pendingCount()).toBe(1);

      upstream.release();
      expect(await slow).toHaveLength(44);
    });
  });

  describe('Bounded fetches', () => {
    beforeEach(() => {
      cache = new ResultCache(upstream, {
        currentSeason: () => 2026,
        prefetchFullSeason: false,
        maxSeasons: 0
      });
    });

    it('should pass the ceiling upstream and reuse it for lower ceilings', async () => {
      await cache.get(2021, 10);
      const lower = await cache.get(2021, 4);

      expect(lower).toHaveLength(8);
      expect(upstream.seasonCalls).toEqual([{ season: 2021, roundCeiling: 10 }]);
      expect(cache.peek(2021)?.coverage).toBe(10);
    });

    it('should refetch when a wider window is asked for', async () => {
      await cache.get(2021, 10);
      const full = await cache.get(2021);

      expect(full).toHaveLength(44);
      expect(upstream.seasonCalls).toEqual([
        { season: 2021, roundCeiling: 10 },
        { season: 2021, roundCeiling: undefined }
      ]);
      expect(cache.peek(2021)?.coverage).toBe('full');
    });

    it('should only join an in-flight fetch that covers the request', async () => {
      upstream.hold = true;
      const ten = cache.get(2021, 10);
      const five = cache.get(2021, 5);
      const full = cache.get(2021);

      expect(upstream.seasonCalls).toHaveLength(2);
      expect(cache.stats().joins).toBe(1);

      upstream.release();
      const [tenRecords, fiveRecords, fullRecords] = await Promise.all([ten, five, full]);

      expect(tenRecords).toHaveLength(20);
      expect(fiveRecords).toHaveLength(10);
      expect(fullRecords).toHaveLength(44);
    });
  });

  describe('Failure handling', () => {
    it('should give every caller of a shared fetch the same failure', async () => {
      const outage = new StandingsError('UpstreamUnavailable', 'provider down', { season: 2021 });
      upstream.failSeason(2021, outage);
      upstream.hold = true;

      const settled = Promise.allSettled([cache.get(2021), cache.get(2021), cache.get(2021, 4)]);
      upstream.release();
      const outcomes = await settled;
      const reasons = outcomes.map(outcome => (outcome.status === 'rejected' ? outcome.reason : null));

      expect(outcomes.map(outcome => outcome.status)).toEqual(['rejected', 'rejected', 'rejected']);
      expect(reasons[1]).toBe(reasons[0]);
      expect(reasons[2]).toBe(reasons[0]);
      expect(reasons[0]).toBeInstanceOf(StandingsError);
      expect(reasons[0]).toMatchObject({
        kind: 'CacheFetchInFlightFailed',
        message: 'Shared fetch for season 2021 failed: provider down',
        season: 2021
      });
      expect(reasons[0].cause).toBe(outage);
      expect(upstream.countSeasonFetches(2021)).toBe(1);
    });

    it('should give a lone caller the upstream error itself', async () => {
      const outage = new StandingsError('UpstreamUnavailable', 'provider down', { season: 2021 });
      upstream.failSeason(2021, outage);

      await expect(cache.get(2021)).rejects.toBe(outage);
    });

    it('should carry Retry-After to every caller', async () => {
      upstream.failSeason(2021, new StandingsError('UpstreamRateLimited', 'slow down', { season: 2021, retryAfterSeconds: 30 }));
      upstream.hold = true;

      const settled = Promise.allSettled([cache.get(2021), cache.get(2021)]);
      upstream.release();
      const outcomes = await settled;

      for (const outcome of outcomes) {
        expect(outcome.status).toBe('rejected');
        if (outcome.status === 'rejected') {
          expect(outcome.reason.retryAfterSeconds).toBe(30);
          expect(outcome.reason.rootCause().kind).toBe('UpstreamRateLimited');
        }
      }
    });

    it('should not cache a failure', async () => {
      upstream.failSeason(2021, new StandingsError('UpstreamUnavailable', 'provider down', { season: 2021 }));

      await expect(cache.get(2021)).rejects.toMatchObject({ kind: 'UpstreamUnavailable' });
      expect(cache.peek(2021)).toBeNull();
      expect(cache.stats().in_flight).toBe(0);

      upstream.clearFailure(2021);
      const records = await cache.get(2021);

      expect(records).toHaveLength(44);
      expect(upstream.countSeasonFetches(2021)).toBe(2);
    });

    it('should report a season without results as missing data', async () => {
      await expect(cache.get(1999)).rejects.toMatchObject({ kind: 'UpstreamDataMissing', season: 1999 });
    });
  });

  describe('Retention', () => {
    let clock: number;

    beforeEach(() => {
      clock = 0;
      upstream.withSeason(2026, smallSeason(2026), 20);
      cache = new ResultCache(upstream, {
        currentSeason: () => 2026,
        now: () => clock,
        inProgressTtlMs: 1000,
        maxSeasons: 0
      });
    });

    it('should expire the in-progress season after its TTL', async () => {
      await cache.get(2026);
      expect(cache.peek(2026)?.concluded).toBe(false);

      clock = 999;
      await cache.get(2026);
      expect(upstream.countSeasonFetches(2026)).toBe(1);

      clock = 1000;
      await cache.get(2026);
      expect(upstream.countSeasonFetches(2026)).toBe(2);
    });

    it('should keep concluded seasons indefinitely', async () => {
      await cache.get(2019);
      clock = 365 * 24 * 60 * 60 * 1000;
      await cache.get(2019);

      expect(cache.peek(2019)?.concluded).toBe(true);
      expect(upstream.countSeasonFetches(2019)).toBe(1);
    });

    it('should treat a current season with its final round as concluded', async () => {
      upstream.withSeason(2026, smallSeason(2026), 2);
      await cache.getSchedule(2026);
      await cache.get(2026);

      clock = 10_000;
      await cache.get(2026);

      expect(cache.peek(2026)?.concluded).toBe(true);
      expect(upstream.countSeasonFetches(2026)).toBe(1);
    });

    it('should cache schedules with the same rules', async () => {
      await cache.getSchedule(2019);
      await cache.getSchedule(2026);
      clock = 5000;
      await cache.getSchedule(2019);
      await cache.getSchedule(2026);

      expect(upstream.scheduleCalls).toEqual([2019, 2026, 2026]);
    });

    it('should share one schedule fetch between concurrent readers', async () => {
      const [a, b] = await Promise.all([cache.getSchedule(2021), cache.getSchedule(2021)]);

      expect(a).toBe(b);
      expect(a.roundCount).toBe(22);
      expect(upstream.scheduleCalls).toEqual([2021]);
    });
  });

  describe('LRU bound', () => {
    beforeEach(() => {
      upstream
        .withSeason(2016, smallSeason(2016))
        .withSeason(2017, smallSeason(2017))
        .withSeason(2018, smallSeason(2018));
      cache = new ResultCache(upstream, { currentSeason: () => 2026, maxSeasons: 2 });
    });

    it('should evict the least recently used season', async () => {
      await cache.get(2016);
      await cache.get(2017);
      await cache.get(2016);
      await cache.get(2018);

      expect(cache.peek(2017)).toBeNull();
      expect(cache.peek(2016)).not.toBeNull();
      expect(cache.peek(2018)).not.toBeNull();
      expect(cache.stats().seasons).toBe(2);

      await cache.get(2017);
      expect(upstream.countSeasonFetches(2017)).toBe(2);
      expect(upstream.countSeasonFetches(2016)).toBe(1);
    });
  });

  it('should drop everything on clear', async () => {
    await cache.get(2019);
    cache.clear();

    expect(cache.peek(2019)).toBeNull();
    await cache.get(2019);
    expect(upstream.countSeasonFetches(2019)).toBe(2);
  });
});

describe('coverage helpers', () => {
  it('should let a full season answer any ceiling', () => {
    expect(coverageSatisfies('full')).toBe(true);
    expect(coverageSatisfies('full', 3)).toBe(true);
  });

  it('should let a bounded holding answer only lower ceilings', () => {
    expect(coverageSatisfies(10, 10)).toBe(true);
    expect(coverageSatisfies(10, 11)).toBe(false);
    expect(coverageSatisfies(10)).toBe(false);
  });

  it('should return the same array when nothing is cut', () => {
    const records = smallSeason(2020);

    expect(truncateToCeiling(records)).toBe(records);
    expect(truncateToCeiling(records, 2)).toBe(records);
    expect(truncateToCeiling(records, 1)).toEqual([records[0]]);
  });
});
