/**
 * Season and selection bounds
 */

/** First world championship season */
export const FIRST_SEASON = 1950;

/** Progression charts take at most this many drivers */
export const MAX_PROGRESSION_DRIVERS = 10;

export function getCurrentSeason(now: Date = new Date()): number {
  return now.getFullYear();
}

/**
 * Seasons selectable in the UI, newest first
 */
export function listSelectableSeasons(now: Date = new Date()): number[] {
  const seasons: number[] = [];
  for (let year = getCurrentSeason(now); year >= FIRST_SEASON; year--) {
    seasons.push(year);
  }
  return seasons;
}
