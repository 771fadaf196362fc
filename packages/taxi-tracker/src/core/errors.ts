/**
 * Taxi Tracker Error Types
 *
 * Every failure of a run surfaces as one of these. Each carries a stable
 * code and the process exit status the CLI uses for it. There is no
 * degraded mode: any of them aborts the run before a report is printed.
 */

export type TrackerErrorCode =
  | 'CONFIG_ERROR'
  | 'FETCH_ERROR'
  | 'LOOKUP_ERROR'
  | 'EMPTY_RESULT';

/**
 * Exit status per error code
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  FETCH_ERROR: 4,
  LOOKUP_ERROR: 5,
  EMPTY_RESULT: 6,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base class for all pipeline failures
 */
export abstract class TrackerError extends Error {
  abstract readonly code: TrackerErrorCode;

  get exitCode(): ExitCode {
    return EXIT_CODES[this.code];
  }
}

/**
 * Missing credential or invalid configuration value
 */
export class ConfigError extends TrackerError {
  readonly code = 'CONFIG_ERROR';

  /**
   * @param message - Human-readable error message
   * @param issues - One entry per offending setting
   */
  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/**
 * Network, timeout, authentication or response-shape failure while
 * talking to an upstream source
 */
export class FetchError extends TrackerError {
  readonly code = 'FETCH_ERROR';

  constructor(
    message: string,
    public readonly source: string,
    public readonly url: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'FetchError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FetchError);
    }
  }

  /** True for 401/403 responses */
  get isAuthFailure(): boolean {
    return this.statusCode === 401 || this.statusCode === 403;
  }
}

/**
 * Planning-area dataset is empty or malformed
 */
export class LookupError extends TrackerError {
  readonly code = 'LOOKUP_ERROR';

  constructor(
    message: string,
    public readonly details: readonly string[] = []
  ) {
    super(message);
    this.name = 'LookupError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LookupError);
    }
  }
}

/**
 * No taxi position fell inside any planning area
 */
export class EmptyResultError extends TrackerError {
  readonly code = 'EMPTY_RESULT';

  constructor(
    public readonly totalTaxis: number,
    public readonly planningAreaCount: number
  ) {
    super(
      totalTaxis === 0
        ? 'Taxi source returned no positions'
        : `None of ${totalTaxis} taxi positions fell inside any of ${planningAreaCount} planning areas`
    );
    this.name = 'EmptyResultError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmptyResultError);
    }
  }
}

export function isTrackerError(error: unknown): error is TrackerError {
  return error instanceof TrackerError;
}

/**
 * Map any thrown value to the exit status the CLI should use
 */
export function exitCodeFor(error: unknown): ExitCode {
  return isTrackerError(error) ? error.exitCode : EXIT_CODES.ERRORS;
}
