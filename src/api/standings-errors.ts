/**
 * Structured error responses for the standings endpoints
 *
 * Every failure maps to one error category:
 * - validation_error: bad season, round or driver selection
 * - not_found: the provider has no data for the selection
 * - upstream_error: provider unavailable or rate limited
 * - internal_error: unexpected server error
 */

import { ErrorKind, StandingsError } from '../types/errors';

export type ErrorCategory =
  | 'validation_error'
  | 'not_found'
  | 'upstream_error'
  | 'internal_error';

export interface StructuredError {
  code: ErrorKind | 'InternalError';
  category: ErrorCategory;
  message: string;
  season: number | null;
  round: number | null;
  /** true when retrying later may succeed */
  recoverable: boolean;
  suggestions: string[];
  retry_after_seconds?: number;
}

export interface ErrorResponse {
  success: false;
  request_id?: string;
  error: StructuredError;
}

/**
 * Lightweight in-memory failure counters
 */
class ErrorCounters {
  private byCategory: Record<ErrorCategory, number> = {
    validation_error: 0,
    not_found: 0,
    upstream_error: 0,
    internal_error: 0,
  };

  increment(category: ErrorCategory): void {
    this.byCategory[category]++;
  }

  getStats(): Record<ErrorCategory, number> {
    return { ...this.byCategory };
  }

  reset(): void {
    this.byCategory = {
      validation_error: 0,
      not_found: 0,
      upstream_error: 0,
      internal_error: 0,
    };
  }
}

export const errorCounters = new ErrorCounters();

export function classifyError(kind: ErrorKind): ErrorCategory {
  switch (kind) {
    case 'InvalidSeason':
    case 'InvalidRoundCeiling':
    case 'TooManyDrivers':
      return 'validation_error';
    case 'NoMatchingDrivers':
    case 'UpstreamDataMissing':
      return 'not_found';
    case 'UpstreamUnavailable':
    case 'UpstreamRateLimited':
    case 'CacheFetchInFlightFailed':
      return 'upstream_error';
    default:
      return 'internal_error';
  }
}

/**
 * HTTP status for an error; in-flight failures answer like their cause
 */
export function getStatusCode(error: StandingsError): number {
  const kind = error.rootCause().kind;
  switch (kind) {
    case 'InvalidSeason':
    case 'InvalidRoundCeiling':
    case 'TooManyDrivers':
      return 400;
    case 'NoMatchingDrivers':
    case 'UpstreamDataMissing':
      return 404;
    case 'UpstreamRateLimited':
      return 429;
    case 'UpstreamUnavailable':
      return 503;
    default:
      return 500;
  }
}

function suggestionsFor(kind: ErrorKind): string[] {
  switch (kind) {
    case 'InvalidSeason':
      return ['Pick a season from 1950 to the current year'];
    case 'InvalidRoundCeiling':
      return ['Use a round between 1 and the number of rounds in the season', 'Omit the round for the full season'];
    case 'TooManyDrivers':
      return ['Select between 1 and 10 drivers'];
    case 'NoMatchingDrivers':
      return ['Check the driver ids against the season overview'];
    case 'UpstreamDataMissing':
      return ['The data source has no results for this selection yet'];
    case 'UpstreamRateLimited':
    case 'UpstreamUnavailable':
    case 'CacheFetchInFlightFailed':
      return ['Data temporarily unavailable, try again shortly'];
    default:
      return [];
  }
}

export function buildErrorResponse(error: StandingsError, requestId?: string): ErrorResponse {
  const rootKind = error.rootCause().kind;
  const category = classifyError(error.kind);
  errorCounters.increment(category);

  return {
    success: false,
    request_id: requestId,
    error: {
      code: error.kind,
      category,
      message: error.message,
      season: error.season ?? null,
      round: error.round ?? null,
      recoverable: category === 'upstream_error',
      suggestions: suggestionsFor(rootKind),
      retry_after_seconds: error.retryAfterSeconds
    }
  };
}

export function buildInternalErrorResponse(message: string, requestId?: string): ErrorResponse {
  errorCounters.increment('internal_error');
  return {
    success: false,
    request_id: requestId,
    error: {
      code: 'InternalError',
      category: 'internal_error',
      message,
      season: null,
      round: null,
      recoverable: false,
      suggestions: ['Try again later']
    }
  };
}
