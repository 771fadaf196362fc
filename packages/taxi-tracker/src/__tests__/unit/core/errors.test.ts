import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  EXIT_CODES,
  EmptyResultError,
  FetchError,
  LookupError,
  exitCodeFor,
  isTrackerError,
} from '../../../core/errors.js';

describe('tracker errors', () => {
  it('maps each error to its exit status', () => {
    expect(exitCodeFor(new ConfigError('missing token'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(exitCodeFor(new FetchError('down', 'Taxi availability', 'https://example.test'))).toBe(
      EXIT_CODES.FETCH_ERROR
    );
    expect(exitCodeFor(new LookupError('empty'))).toBe(EXIT_CODES.LOOKUP_ERROR);
    expect(exitCodeFor(new EmptyResultError(3, 55))).toBe(EXIT_CODES.EMPTY_RESULT);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERRORS);
    expect(exitCodeFor('boom')).toBe(EXIT_CODES.ERRORS);
  });

  it('recognises tracker errors', () => {
    expect(isTrackerError(new LookupError('empty'))).toBe(true);
    expect(isTrackerError(new Error('boom'))).toBe(false);
  });

  it('describes empty results by cause', () => {
    expect(new EmptyResultError(0, 55).message).toBe('Taxi source returned no positions');
    expect(new EmptyResultError(3, 55).message).toBe(
      'None of 3 taxi positions fell inside any of 55 planning areas'
    );
  });

  it('flags authentication failures', () => {
    const url = 'https://example.test';
    expect(new FetchError('denied', 'Planning areas', url, 401).isAuthFailure).toBe(true);
    expect(new FetchError('denied', 'Planning areas', url, 403).isAuthFailure).toBe(true);
    expect(new FetchError('down', 'Planning areas', url, 503).isAuthFailure).toBe(false);
  });

  it('keeps the underlying cause', () => {
    const cause = new Error('socket hang up');
    const error = new FetchError('down', 'Taxi availability', 'https://example.test', undefined, {
      cause,
    });

    expect(error.cause).toBe(cause);
    expect(error.name).toBe('FetchError');
  });
});
