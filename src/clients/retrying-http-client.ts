/**
 * Retrying HTTP client
 *
 * Small JSON GET helper shared by the rate source clients. Each request has a
 * bounded timeout; transport failures (timeouts, connection errors, non-2xx
 * statuses) are retried with exponential backoff up to a fixed number of
 * attempts. Payload validation is left to the caller, so a malformed body is
 * never retried here.
 *
 * Backoff: delay before attempt n+1 = backoffBaseMs * 2^n (1s, 2s, ... by default).
 */

import axios, { AxiosError, type AxiosInstance } from 'axios';
import {
  RatesError,
  RatesErrorCode,
  err,
  getErrorMessage,
  ok,
  type Result,
} from '../errors/rates-errors.js';
import { LogEvents, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';

// ============================================================================
// Constants
// ============================================================================

/** Default per-request timeout */
export const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;

/** Default number of attempts (first try included) */
export const DEFAULT_MAX_ATTEMPTS = 3;

/** Base of the exponential backoff */
export const DEFAULT_BACKOFF_BASE_MS = 1_000;

const USER_AGENT = 'rates-hub/0.1';

/** Axios error codes that mean the request ran out of time */
const TIMEOUT_CODES: ReadonlySet<string> = new Set([
  AxiosError.ECONNABORTED,
  AxiosError.ETIMEDOUT,
  AxiosError.ERR_CANCELED,
]);

// ============================================================================
// Types
// ============================================================================

export interface RetryingHttpClientConfig {
  /** Source name used in log lines */
  source: string;
  timeoutMs?: number;
  maxAttempts?: number;
  backoffBaseMs?: number;
  /** Axios instance to send requests with (default: a fresh instance) */
  http?: AxiosInstance;
  logger?: IRatesLogger;
  /** Wait between attempts (injectable for tests) */
  sleep?: (ms: number) => Promise<void>;
}

export type QueryParams = Readonly<Record<string, string>>;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================================================
// RetryingHttpClient Implementation
// ============================================================================

export class RetryingHttpClient {
  private readonly source: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly backoffBaseMs: number;
  private readonly http: AxiosInstance;
  private readonly logger: IRatesLogger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: RetryingHttpClientConfig) {
    this.source = config.source;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.backoffBaseMs = config.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.http =
      config.http ??
      axios.create({
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
      });
    this.logger = config.logger ?? createSilentLogger('http');
    this.sleep = config.sleep ?? defaultSleep;
  }

  getMaxAttempts(): number {
    return this.maxAttempts;
  }

  /**
   * GET a JSON document.
   *
   * Resolves to the parsed body, or to SOURCE_UNAVAILABLE_ERROR once all
   * attempts failed (the last transport error is kept as `cause`).
   */
  async getJson(url: string, params?: QueryParams): Promise<Result<unknown>> {
    let lastError: RatesError | null = null;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const result = await this.attemptRequest(url, params);
      if (result.ok || !result.error.isRetryable) {
        return result;
      }
      lastError = result.error;

      if (attempt < this.maxAttempts - 1) {
        const delayMs = this.backoffBaseMs * Math.pow(2, attempt);
        this.logger.warn(LogEvents.SOURCE_REQUEST_RETRY, {
          source: this.source,
          attempt: attempt + 1,
          maxAttempts: this.maxAttempts,
          delayMs,
          error: lastError.message,
          errorCode: lastError.code,
        });
        await this.sleep(delayMs);
      }
    }

    return err(
      new RatesError(
        `Failed after ${this.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
        RatesErrorCode.SOURCE_UNAVAILABLE_ERROR,
        lastError
      )
    );
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async attemptRequest(url: string, params?: QueryParams): Promise<Result<unknown>> {
    try {
      const response = await this.http.get<unknown>(url, {
        params,
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        // Status handling lives here so that every non-2xx is retried the same way
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        return err(
          new RatesError(`HTTP ${response.status}`, RatesErrorCode.NETWORK_ERROR)
        );
      }

      return ok(response.data);
    } catch (error) {
      return err(this.classifyError(error));
    }
  }

  private classifyError(error: unknown): RatesError {
    if (error instanceof AxiosError) {
      if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
        return new RatesError('Request timeout', RatesErrorCode.TIMEOUT_ERROR, error);
      }
      return new RatesError(
        `Connection error: ${error.message}`,
        RatesErrorCode.NETWORK_ERROR,
        error
      );
    }
    return new RatesError(
      `Request failed: ${getErrorMessage(error)}`,
      RatesErrorCode.NETWORK_ERROR,
      error
    );
  }
}
