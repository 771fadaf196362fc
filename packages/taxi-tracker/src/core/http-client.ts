/**
 * HTTP Client for Taxi Tracker
 *
 * Wraps native fetch with:
 * - Timeouts via AbortController
 * - Exponential backoff with jitter for transient failures
 * - Typed errors that providers translate into FetchError
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ maxRetries: 2, timeoutMs: 15000 });
 * const body = await client.fetchJSON(url, {
 *   headers: { 'X-Api-Key': key },
 * });
 * ```
 */

import { createLogger } from './utils/logger.js';

const logger = createLogger('http');

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 2) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 500) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 10000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 15000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
}

export const DEFAULT_USER_AGENT = 'sg-taxi-tracker/1.0';

// ============================================================================
// Error Types
// ============================================================================

/**
 * Non-2xx response
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;

  constructor(message: string, statusCode: number, url: string) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Request exceeded its timeout
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Connection failed, DNS resolution, etc.
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * Body was not valid JSON
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 2,
      initialDelayMs: 500,
      backoffMultiplier: 2,
      maxDelayMs: 10000,
      timeoutMs: 15000,
      userAgent: DEFAULT_USER_AGENT,
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch and parse a JSON response
   *
   * @throws {HTTPError} For 4xx/5xx responses
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If the body is not JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * Fetch raw response with retry logic
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      const isLastAttempt = attempt >= maxRetries + 1;

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url
        );
      } catch (error) {
        const lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: lastError.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fetch(url, {
        method: 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...options?.headers,
        },
        signal: controller.signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(
        url,
        error instanceof Error ? error : new Error(String(error))
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * initialDelay * multiplier^(attempt-1), capped, ± jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 || // Request Timeout
      status === 429 || // Too Many Requests
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }

    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }

    // Parse errors and unknown errors fail fast
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Create HTTP client with custom config
 */
export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
