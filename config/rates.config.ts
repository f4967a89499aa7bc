/**
 * Rates Subsystem Configuration
 *
 * All values can be overridden via environment variables.
 *
 * Environment variables:
 * - RATES_REQUEST_TIMEOUT_SECONDS: Per-request HTTP timeout (default: 10)
 * - RATES_MAX_RETRIES: Attempts per source request, first try included (default: 3)
 * - RATES_UPDATE_INTERVAL_MINUTES: Scheduler interval (default: 30)
 * - RATES_CACHE_TTL_MINUTES: Snapshot age that triggers a refresh on query (default: 30)
 * - RATES_BASE_CURRENCY: Quote currency of fetched pairs and triangulation bridge (default: USD)
 * - RATES_JOURNAL_PATH: SQLite journal file (default: './data/rates/journal.db')
 * - RATES_SNAPSHOT_PATH: JSON snapshot file (default: './data/rates/rates.json')
 * - RATES_ENABLED_SOURCES: Comma-separated source names (default: 'exchangerate,coingecko')
 * - RATES_FIAT_CURRENCIES: Comma-separated fiat codes (default: 'EUR,GBP,JPY,CAD,AUD,CHF,CNY,RUB')
 * - RATES_CRYPTO_ASSETS: Comma-separated CODE:provider-id entries (default: 'BTC:bitcoin,...')
 * - EXCHANGERATE_API_KEY: ExchangeRate-API key (no default; the source reports unavailable without it)
 * - EXCHANGERATE_API_URL / COINGECKO_API_URL: Provider endpoints
 * - RATES_JOURNAL_RETENTION_DAYS: Prune older observations, 0 keeps everything (default: 0)
 * - RATES_SCHEDULER_COOLDOWN_SECONDS: Pause after an unexpected loop error (default: 60)
 * - RATES_LOGGING_ENABLED: Structured JSON logs (default: true)
 */

import { DEFAULT_COINGECKO_API_URL } from '../src/clients/crypto-rate-source.js';
import { DEFAULT_EXCHANGERATE_API_URL } from '../src/clients/fiat-rate-source.js';
import { DEFAULT_ALLOWED_DATA_DIRS } from '../src/persistence/rates-store.js';
import { VALID_SOURCE_NAMES, type RatesConfig } from '../src/types/rates.types.js';
import { isValidCurrencyCode } from '../src/utils/currency.js';

const SECOND_MS = 1000;
const MINUTE_MS = 60 * SECOND_MS;

export const DEFAULT_FIAT_CURRENCIES = ['EUR', 'GBP', 'JPY', 'CAD', 'AUD', 'CHF', 'CNY', 'RUB'];

export const DEFAULT_CRYPTO_ASSETS: Record<string, string> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  SOL: 'solana',
  ADA: 'cardano',
  DOT: 'polkadot',
  DOGE: 'dogecoin',
};

// ============================================================================
// Parsing Helpers
// ============================================================================

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim() === '') return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function parseList(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined || value.trim() === '') return [...defaultValue];
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse "BTC:bitcoin,ETH:ethereum". Entries without an id keep the code
 * lower-cased as id, so "BTC" alone means "BTC:btc".
 */
export function parseCryptoAssets(value: string | undefined): Record<string, string> {
  if (value === undefined || value.trim() === '') return { ...DEFAULT_CRYPTO_ASSETS };

  const assets: Record<string, string> = {};
  for (const entry of parseList(value, [])) {
    const [code, id] = entry.split(':').map((part) => part.trim());
    assets[code.toUpperCase()] = id ? id.toLowerCase() : code.toLowerCase();
  }
  return assets;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Build the configuration from an environment map
 */
export function loadRatesConfig(env: NodeJS.ProcessEnv = process.env): RatesConfig {
  return {
    requestTimeoutMs: parseNumber(env.RATES_REQUEST_TIMEOUT_SECONDS, 10) * SECOND_MS,
    maxAttempts: Math.floor(parseNumber(env.RATES_MAX_RETRIES, 3)),
    updateIntervalMs: parseNumber(env.RATES_UPDATE_INTERVAL_MINUTES, 30) * MINUTE_MS,
    cacheTtlMs: parseNumber(env.RATES_CACHE_TTL_MINUTES, 30) * MINUTE_MS,
    baseCurrency: (env.RATES_BASE_CURRENCY || 'USD').trim().toUpperCase(),

    journalPath: env.RATES_JOURNAL_PATH || './data/rates/journal.db',
    snapshotPath: env.RATES_SNAPSHOT_PATH || './data/rates/rates.json',
    allowedDataDirs: [...DEFAULT_ALLOWED_DATA_DIRS],

    enabledSources: parseList(env.RATES_ENABLED_SOURCES, [...VALID_SOURCE_NAMES]).map((name) =>
      name.toLowerCase()
    ),
    fiatCurrencies: parseList(env.RATES_FIAT_CURRENCIES, DEFAULT_FIAT_CURRENCIES).map((code) =>
      code.toUpperCase()
    ),
    cryptoAssets: parseCryptoAssets(env.RATES_CRYPTO_ASSETS),

    exchangeRateApiKey: env.EXCHANGERATE_API_KEY ?? '',
    exchangeRateApiUrl: env.EXCHANGERATE_API_URL || DEFAULT_EXCHANGERATE_API_URL,
    coinGeckoApiUrl: env.COINGECKO_API_URL || DEFAULT_COINGECKO_API_URL,

    journalRetentionDays: parseNumber(env.RATES_JOURNAL_RETENTION_DAYS, 0),
    errorCooldownMs: parseNumber(env.RATES_SCHEDULER_COOLDOWN_SECONDS, 60) * SECOND_MS,
    loggingEnabled: parseBoolean(env.RATES_LOGGING_ENABLED, true),
  };
}

/**
 * Configuration loaded from the process environment
 */
export const ratesConfig: RatesConfig = loadRatesConfig();

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate configuration and return any issues
 */
export function validateRatesConfig(config: RatesConfig): string[] {
  const issues: string[] = [];

  if (config.requestTimeoutMs <= 0) {
    issues.push('requestTimeoutMs must be positive');
  }

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    issues.push('maxAttempts must be at least 1');
  }

  if (config.updateIntervalMs <= 0) {
    issues.push('updateIntervalMs must be positive');
  }

  if (config.cacheTtlMs <= 0) {
    issues.push('cacheTtlMs must be positive');
  }

  if (config.errorCooldownMs < 0) {
    issues.push('errorCooldownMs must not be negative');
  }

  if (config.journalRetentionDays < 0) {
    issues.push('journalRetentionDays must not be negative');
  }

  if (!isValidCurrencyCode(config.baseCurrency)) {
    issues.push(`baseCurrency '${config.baseCurrency}' is not a valid currency code`);
  }

  const invalidFiat = config.fiatCurrencies.filter((code) => !isValidCurrencyCode(code));
  if (invalidFiat.length > 0) {
    issues.push(`Invalid fiat currency codes: ${invalidFiat.join(', ')}`);
  }

  const invalidCrypto = Object.keys(config.cryptoAssets).filter((code) => !isValidCurrencyCode(code));
  if (invalidCrypto.length > 0) {
    issues.push(`Invalid crypto asset codes: ${invalidCrypto.join(', ')}`);
  }

  if (config.enabledSources.length === 0) {
    issues.push('At least one rate source must be enabled');
  }

  const knownSources = new Set<string>(VALID_SOURCE_NAMES);
  const unknownSources = config.enabledSources.filter((name) => !knownSources.has(name));
  if (unknownSources.length > 0) {
    issues.push(
      `Unknown rate sources: ${unknownSources.join(', ')}. Expected one of: ${VALID_SOURCE_NAMES.join(', ')}`
    );
  }

  if (config.journalPath === config.snapshotPath) {
    issues.push('journalPath and snapshotPath must differ');
  }

  return issues;
}
