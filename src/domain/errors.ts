/**
 * Error taxonomy for a valuation run.
 *
 * Fatal: RateLimitedError (from the inventory fetch), FetchError, ConfigError.
 * Absorbed: RateLimitedError from price queries, CacheWriteError,
 * SnapshotSinkError.
 */

export type ErrorCode =
  | "RATE_LIMITED"
  | "FETCH_ERROR"
  | "CACHE_CORRUPT"
  | "CACHE_WRITE_FAILED"
  | "SINK_FAILURE"
  | "CONFIG_ERROR";

export abstract class ValuationError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class RateLimitedError extends ValuationError {
  readonly code = "RATE_LIMITED";

  constructor(
    message: string,
    /** HTTP status, or null when the request never got a response */
    readonly status: number | null,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class FetchError extends ValuationError {
  readonly code = "FETCH_ERROR";
}

export class CacheWriteError extends ValuationError {
  readonly code = "CACHE_WRITE_FAILED";
}

export class SnapshotSinkError extends ValuationError {
  readonly code = "SINK_FAILURE";
}

export class ConfigError extends ValuationError {
  readonly code = "CONFIG_ERROR";
}

export function errorCategory(error: unknown): ErrorCode | "UNEXPECTED" {
  return error instanceof ValuationError ? error.code : "UNEXPECTED";
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
