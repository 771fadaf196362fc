/**
 * Shared helpers for upstream data providers
 */

import { FetchError } from '../core/errors.js';
import {
  HTTPError,
  HTTPJSONParseError,
  HTTPNetworkError,
  HTTPTimeoutError,
} from '../core/http-client.js';

/**
 * Translate an HTTP client failure into a FetchError for the given source
 */
export function toFetchError(source: string, url: string, error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }

  if (error instanceof HTTPError) {
    const hint =
      error.statusCode === 401 || error.statusCode === 403
        ? ' (check credentials)'
        : '';
    return new FetchError(
      `${source} request failed with HTTP ${error.statusCode}${hint}`,
      source,
      url,
      error.statusCode,
      { cause: error }
    );
  }

  if (
    error instanceof HTTPTimeoutError ||
    error instanceof HTTPNetworkError ||
    error instanceof HTTPJSONParseError
  ) {
    return new FetchError(`${source} request failed: ${error.message}`, source, url, undefined, {
      cause: error,
    });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchError(`${source} request failed: ${message}`, source, url, undefined, {
    cause: error,
  });
}

