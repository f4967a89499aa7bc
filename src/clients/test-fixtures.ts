/**
 * Shared Source Test Fixtures
 *
 * In-process axios adapter that replays scripted replies, so client tests
 * never touch the network, plus fake source clients for service tests.
 */

import axios, {
  AxiosError,
  type AxiosInstance,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import { vi, type Mock } from 'vitest';
import { ok, type Result } from '../errors/rates-errors.js';
import type { ObservationMetadata, RateSourceClient, SourceRate, SourceRates } from '../types/rates.types.js';
import { parsePairKey } from '../utils/currency.js';
import { RetryingHttpClient } from './retrying-http-client.js';

/** A scripted reply: an HTTP response or a thrown transport error */
export type StubReply = { status?: number; data?: unknown } | { error: Error };

export interface StubHttp {
  instance: AxiosInstance;
  /** Every request the adapter received, in order */
  requests: InternalAxiosRequestConfig[];
}

/**
 * Create an axios instance answering from a list of replies.
 * Once the list is exhausted the last reply is repeated.
 */
export function createStubAxios(
  replies: StubReply[] | ((config: InternalAxiosRequestConfig) => StubReply)
): StubHttp {
  const requests: InternalAxiosRequestConfig[] = [];

  const instance = axios.create({
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      requests.push(config);
      const reply =
        typeof replies === 'function'
          ? replies(config)
          : replies[Math.min(requests.length - 1, replies.length - 1)];

      if ('error' in reply) {
        throw reply.error;
      }

      const status = reply.status ?? 200;
      return {
        data: reply.data,
        status,
        statusText: String(status),
        headers: {},
        config,
      };
    },
  });

  return { instance, requests };
}

export function timeoutError(): AxiosError {
  return new AxiosError('timeout of 10000ms exceeded', AxiosError.ECONNABORTED);
}

export function connectionError(): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');
}

/**
 * RetryingHttpClient over a stub adapter with a recorded, instant sleep
 */
export function createTestHttpClient(
  replies: StubReply[] | ((config: InternalAxiosRequestConfig) => StubReply),
  options: { source?: string; maxAttempts?: number } = {}
): { client: RetryingHttpClient; stub: StubHttp; sleep: Mock<(ms: number) => Promise<void>> } {
  const stub = createStubAxios(replies);
  const sleep = vi.fn(async (_ms: number) => {});
  const client = new RetryingHttpClient({
    source: options.source ?? 'test',
    maxAttempts: options.maxAttempts ?? 3,
    http: stub.instance,
    sleep,
  });
  return { client, stub, sleep };
}

// ============================================================================
// Provider payloads
// ============================================================================

export function createExchangeRatePayload(
  rates: Record<string, number>,
  baseCode = 'USD'
): Record<string, unknown> {
  return {
    result: 'success',
    base_code: baseCode,
    time_last_update_utc: 'Fri, 16 Oct 2026 00:00:01 +0000',
    conversion_rates: { [baseCode]: 1, ...rates },
  };
}

export function createCoinGeckoPayload(
  prices: Record<string, number>,
  vsCurrency = 'usd'
): Record<string, Record<string, number>> {
  const payload: Record<string, Record<string, number>> = {};
  for (const [id, price] of Object.entries(prices)) {
    payload[id] = { [vsCurrency]: price };
  }
  return payload;
}

// ============================================================================
// Fake sources
// ============================================================================

/**
 * Build SourceRates from `{ "EUR_USD": 1.08 }` style rates
 */
export function createSourceRates(
  rates: Record<string, number>,
  metadata?: ObservationMetadata
): SourceRates {
  const result = new Map<string, SourceRate>();
  for (const [key, rate] of Object.entries(rates)) {
    const pair = parsePairKey(key);
    if (!pair.ok) {
      throw pair.error;
    }
    result.set(key, { pair: pair.value, rate, ...(metadata ? { metadata } : {}) });
  }
  return result;
}

type FakeReply = Result<SourceRates> | (() => Promise<Result<SourceRates>>);

/**
 * RateSourceClient answering with a fixed result or a callback
 */
export class FakeRateSource implements RateSourceClient {
  calls = 0;

  constructor(
    readonly name: string,
    readonly displayName: string,
    private reply: FakeReply = ok(new Map())
  ) {}

  respondWith(reply: FakeReply): void {
    this.reply = reply;
  }

  async fetchRates(): Promise<Result<SourceRates>> {
    this.calls++;
    return typeof this.reply === 'function' ? this.reply() : this.reply;
  }
}

/**
 * Promise with its resolve function exposed
 */
export function createDeferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

/** Let pending promise callbacks run */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
