/**
 * Rates Error Types
 *
 * Typed errors and result values shared by every rates component.
 * Components throw internally at most; across component boundaries a
 * failure is always returned as a `Result` carrying a `RatesError`.
 */

// ============================================================================
// Error Types
// ============================================================================

/** Error codes for RatesError */
export enum RatesErrorCode {
  /** Malformed currency code or pair */
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  /** Connection failure or non-2xx HTTP status */
  NETWORK_ERROR = 'NETWORK_ERROR',
  /** Request exceeded its timeout */
  TIMEOUT_ERROR = 'TIMEOUT_ERROR',
  /** Provider answered with a payload that does not match its contract */
  MALFORMED_RESPONSE_ERROR = 'MALFORMED_RESPONSE_ERROR',
  /** Retries exhausted or provider reported an error */
  SOURCE_UNAVAILABLE_ERROR = 'SOURCE_UNAVAILABLE_ERROR',
  /** Journal or snapshot could not be written */
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  /** No direct, inverse or triangulated quote exists */
  RATE_UNAVAILABLE_ERROR = 'RATE_UNAVAILABLE_ERROR',
}

const RETRYABLE_CODES: ReadonlySet<RatesErrorCode> = new Set([
  RatesErrorCode.NETWORK_ERROR,
  RatesErrorCode.TIMEOUT_ERROR,
]);

/**
 * Typed error for rates operations.
 * Allows callers to programmatically distinguish error kinds.
 */
export class RatesError extends Error {
  constructor(
    message: string,
    public readonly code: RatesErrorCode,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'RatesError';
  }

  /** Only transport-level failures are worth another attempt */
  get isRetryable(): boolean {
    return RETRYABLE_CODES.has(this.code);
  }
}

// ============================================================================
// Result Values
// ============================================================================

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err {
  readonly ok: false;
  readonly error: RatesError;
}

export type Result<T> = Ok<T> | Err;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err(error: RatesError): Err {
  return { ok: false, error };
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Safely extract error message from unknown caught value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Wrap an unknown caught value in a RatesError, keeping RatesErrors as they are
 */
export function toRatesError(error: unknown, fallbackCode: RatesErrorCode): RatesError {
  if (error instanceof RatesError) {
    return error;
  }
  return new RatesError(getErrorMessage(error), fallbackCode, error);
}
