/**
 * Fiat rate source (ExchangeRate-API)
 *
 * Pulls the bulk "latest" table for the base currency and returns one
 * `CCY_BASE` pair per configured fiat currency.
 *
 * The provider quotes units of CCY per one BASE; pairs are published as
 * "1 CCY = x BASE", so each value is inverted.
 *
 * @see https://www.exchangerate-api.com/docs/standard-requests
 */

import { z } from 'zod';
import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import type { RateSourceClient, SourceRate, SourceRates } from '../types/rates.types.js';
import { pairKey } from '../utils/currency.js';
import { LogEvents, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';
import type { RetryingHttpClient } from './retrying-http-client.js';

// ============================================================================
// Constants
// ============================================================================

export const EXCHANGERATE_SOURCE_NAME = 'exchangerate';
export const EXCHANGERATE_DISPLAY_NAME = 'ExchangeRate-API';
export const DEFAULT_EXCHANGERATE_API_URL = 'https://v6.exchangerate-api.com/v6';

// ============================================================================
// Response Schema
// ============================================================================

const ExchangeRateSuccessSchema = z.object({
  result: z.literal('success'),
  base_code: z.string(),
  time_last_update_utc: z.string().optional(),
  conversion_rates: z.record(z.string(), z.number()),
});

const ExchangeRateErrorSchema = z.object({
  result: z.literal('error'),
  'error-type': z.string().optional(),
});

const ExchangeRateResponseSchema = z.discriminatedUnion('result', [
  ExchangeRateSuccessSchema,
  ExchangeRateErrorSchema,
]);

// ============================================================================
// Types
// ============================================================================

export interface FiatRateSourceConfig {
  /** Provider API key; an empty key makes the source report itself unavailable */
  apiKey: string;
  apiUrl?: string;
  /** Quote currency of every returned pair (default: USD) */
  baseCurrency?: string;
  /** Fiat codes to publish; the base itself is ignored */
  currencies: readonly string[];
  http: RetryingHttpClient;
  logger?: IRatesLogger;
}

// ============================================================================
// FiatRateSource Implementation
// ============================================================================

export class FiatRateSource implements RateSourceClient {
  readonly name = EXCHANGERATE_SOURCE_NAME;
  readonly displayName = EXCHANGERATE_DISPLAY_NAME;

  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly baseCurrency: string;
  private readonly currencies: readonly string[];
  private readonly http: RetryingHttpClient;
  private readonly logger: IRatesLogger;

  constructor(config: FiatRateSourceConfig) {
    this.apiKey = config.apiKey;
    this.apiUrl = (config.apiUrl ?? DEFAULT_EXCHANGERATE_API_URL).replace(/\/+$/, '');
    this.baseCurrency = (config.baseCurrency ?? 'USD').toUpperCase();
    this.currencies = config.currencies
      .map((code) => code.toUpperCase())
      .filter((code) => code !== this.baseCurrency);
    this.http = config.http;
    this.logger = config.logger ?? createSilentLogger('fiat-source');
  }

  async fetchRates(): Promise<Result<SourceRates>> {
    if (!this.apiKey) {
      return err(
        new RatesError('EXCHANGERATE_API_KEY is not configured', RatesErrorCode.SOURCE_UNAVAILABLE_ERROR)
      );
    }

    // The key is part of the path; it must never reach a log line.
    const url = `${this.apiUrl}/${encodeURIComponent(this.apiKey)}/latest/${this.baseCurrency}`;
    const response = await this.http.getJson(url);
    if (!response.ok) {
      return response;
    }

    const parsed = ExchangeRateResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        new RatesError(
          `Invalid ${this.displayName} response format: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
          RatesErrorCode.MALFORMED_RESPONSE_ERROR,
          parsed.error
        )
      );
    }

    const body = parsed.data;
    if (body.result === 'error') {
      return err(
        new RatesError(
          `${this.displayName} reported an error: ${body['error-type'] ?? 'unknown'}`,
          RatesErrorCode.SOURCE_UNAVAILABLE_ERROR
        )
      );
    }

    if (body.base_code.toUpperCase() !== this.baseCurrency) {
      return err(
        new RatesError(
          `Invalid ${this.displayName} response format: base ${body.base_code} does not match ${this.baseCurrency}`,
          RatesErrorCode.MALFORMED_RESPONSE_ERROR
        )
      );
    }

    return ok(this.toSourceRates(body.conversion_rates));
  }

  private toSourceRates(conversionRates: Record<string, number>): SourceRates {
    const rates = new Map<string, SourceRate>();

    for (const currency of this.currencies) {
      const unitsPerBase = conversionRates[currency];
      if (unitsPerBase === undefined || !Number.isFinite(unitsPerBase) || unitsPerBase <= 0) {
        this.logger.warn(LogEvents.SOURCE_RATE_SKIPPED, {
          source: this.name,
          pair: `${currency}_${this.baseCurrency}`,
          message: 'Currency missing or non-positive in provider response',
        });
        continue;
      }

      const pair = { base: currency, quote: this.baseCurrency };
      rates.set(pairKey(pair), {
        pair,
        rate: 1 / unitsPerBase,
        metadata: { base_currency: this.baseCurrency },
      });
    }

    return rates;
  }
}
