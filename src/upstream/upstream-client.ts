import { RaceResult, SeasonSchedule } from '../types/race-result';

/**
 * Source of raw season data
 *
 * Implementations fail with a StandingsError of kind UpstreamUnavailable,
 * UpstreamRateLimited or UpstreamDataMissing. They never retry and never cache.
 */
export interface UpstreamClient {
  fetchSchedule(season: number): Promise<SeasonSchedule>;

  /**
   * Results ordered by round, then finishing order, for rounds <= roundCeiling
   * (all rounds when omitted)
   */
  fetchSeason(season: number, roundCeiling?: number): Promise<RaceResult[]>;
}
