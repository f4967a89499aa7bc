/**
 * Crypto rate source (CoinGecko simple price)
 *
 * One request for all configured assets, priced in the base currency.
 * Provider asset ids are mapped back to internal codes (bitcoin -> BTC).
 */

import { z } from 'zod';
import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import type { RateSourceClient, SourceRate, SourceRates } from '../types/rates.types.js';
import { pairKey } from '../utils/currency.js';
import { LogEvents, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';
import type { RetryingHttpClient } from './retrying-http-client.js';

export const COINGECKO_SOURCE_NAME = 'coingecko';
export const COINGECKO_DISPLAY_NAME = 'CoinGecko';
export const DEFAULT_COINGECKO_API_URL = 'https://api.coingecko.com/api/v3/simple/price';

/** `{ "<asset id>": { "<vs currency>": price } }` */
const SimplePriceResponseSchema = z.record(z.string(), z.record(z.string(), z.number().nullable()));

export interface CryptoRateSourceConfig {
  apiUrl?: string;
  /** Quote currency of every returned pair (default: USD) */
  baseCurrency?: string;
  /** Internal code -> provider asset id */
  assets: Readonly<Record<string, string>>;
  http: RetryingHttpClient;
  logger?: IRatesLogger;
}

export class CryptoRateSource implements RateSourceClient {
  readonly name = COINGECKO_SOURCE_NAME;
  readonly displayName = COINGECKO_DISPLAY_NAME;

  private readonly apiUrl: string;
  private readonly baseCurrency: string;
  private readonly assets: ReadonlyArray<readonly [code: string, id: string]>;
  private readonly http: RetryingHttpClient;
  private readonly logger: IRatesLogger;

  constructor(config: CryptoRateSourceConfig) {
    this.apiUrl = config.apiUrl ?? DEFAULT_COINGECKO_API_URL;
    this.baseCurrency = (config.baseCurrency ?? 'USD').toUpperCase();
    this.assets = Object.entries(config.assets).map(
      ([code, id]) => [code.toUpperCase(), id.toLowerCase()] as const
    );
    this.http = config.http;
    this.logger = config.logger ?? createSilentLogger('crypto-source');
  }

  async fetchRates(): Promise<Result<SourceRates>> {
    if (this.assets.length === 0) {
      return ok(new Map());
    }

    const vsCurrency = this.baseCurrency.toLowerCase();
    const response = await this.http.getJson(this.apiUrl, {
      ids: this.assets.map(([, id]) => id).join(','),
      vs_currencies: vsCurrency,
    });
    if (!response.ok) {
      return response;
    }

    const parsed = SimplePriceResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        new RatesError(
          `Invalid ${this.displayName} response format: ${parsed.error.issues[0]?.message ?? 'unknown'}`,
          RatesErrorCode.MALFORMED_RESPONSE_ERROR,
          parsed.error
        )
      );
    }

    const prices = parsed.data;
    const rates = new Map<string, SourceRate>();

    for (const [code, id] of this.assets) {
      const price = prices[id]?.[vsCurrency];
      if (price === undefined || price === null || !Number.isFinite(price) || price <= 0) {
        this.logger.warn(LogEvents.SOURCE_RATE_SKIPPED, {
          source: this.name,
          pair: `${code}_${this.baseCurrency}`,
          message: `Asset '${id}' missing or non-positive in provider response`,
        });
        continue;
      }

      const pair = { base: code, quote: this.baseCurrency };
      rates.set(pairKey(pair), { pair, rate: price, metadata: { crypto_id: id } });
    }

    return ok(rates);
  }
}
