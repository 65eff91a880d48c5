/**
 * Error taxonomy for the standings engine
 *
 * - Validation kinds are raised before the cache or upstream is touched
 * - Upstream kinds are surfaced as-is, never retried inside the engine
 * - CacheFetchInFlightFailed wraps the upstream error of a fetch that several
 *   callers shared; all of them receive the same instance
 */

export type ValidationErrorKind =
  | 'InvalidSeason'
  | 'InvalidRoundCeiling'
  | 'TooManyDrivers'
  | 'NoMatchingDrivers';

export type UpstreamErrorKind =
  | 'UpstreamUnavailable'
  | 'UpstreamRateLimited'
  | 'UpstreamDataMissing';

export type ErrorKind =
  | ValidationErrorKind
  | UpstreamErrorKind
  | 'CacheFetchInFlightFailed';

export interface ErrorContext {
  season?: number;
  round?: number;
  /** Seconds the upstream asked us to wait (429 only) */
  retryAfterSeconds?: number;
  details?: Record<string, unknown>;
}

export class StandingsError extends Error {
  readonly kind: ErrorKind;
  readonly season?: number;
  readonly round?: number;
  readonly retryAfterSeconds?: number;
  readonly details?: Record<string, unknown>;
  declare readonly cause?: StandingsError;

  constructor(kind: ErrorKind, message: string, context: ErrorContext = {}, cause?: StandingsError) {
    super(message);
    this.name = 'StandingsError';
    this.kind = kind;
    this.season = context.season;
    this.round = context.round;
    this.retryAfterSeconds = context.retryAfterSeconds;
    this.details = context.details;
    this.cause = cause;
  }

  /**
   * The error that actually happened upstream, looking through in-flight wrappers
   */
  rootCause(): StandingsError {
    return this.cause ? this.cause.rootCause() : this;
  }
}

export function isStandingsError(err: unknown): err is StandingsError {
  return err instanceof StandingsError;
}

export function isUpstreamErrorKind(kind: ErrorKind): kind is UpstreamErrorKind {
  return kind === 'UpstreamUnavailable'
    || kind === 'UpstreamRateLimited'
    || kind === 'UpstreamDataMissing';
}

/**
 * Explicit result returned by the service layer
 */
export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StandingsError };

export function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: StandingsError): ServiceResult<T> {
  return { ok: false, error };
}
