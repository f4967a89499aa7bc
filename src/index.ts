/**
 * rates-hub
 *
 * Exchange-rate acquisition, journal and snapshot persistence, rate queries
 * with inverse and triangulated derivation, and scheduled refresh.
 */

// Facade
export { RatesService, createRateSources } from './services/rates-service.js';
export type { RatesServiceOptions } from './services/rates-service.js';

// Services
export { RatesAggregator, STORAGE_FAILURE_SOURCE } from './services/rates-aggregator.js';
export type { RatesAggregatorConfig } from './services/rates-aggregator.js';
export { RateQueryService, DEFAULT_BRIDGE_CURRENCY, IDENTITY_SOURCE } from './services/rate-query-service.js';
export type { RateQueryServiceConfig } from './services/rate-query-service.js';
export {
  RatesScheduler,
  DEFAULT_UPDATE_INTERVAL_MS,
  DEFAULT_ERROR_COOLDOWN_MS,
  DEFAULT_STOP_TIMEOUT_MS,
} from './services/rates-scheduler.js';
export type { RatesSchedulerConfig, SchedulerState } from './services/rates-scheduler.js';

// Clients
export {
  FiatRateSource,
  EXCHANGERATE_SOURCE_NAME,
  EXCHANGERATE_DISPLAY_NAME,
  DEFAULT_EXCHANGERATE_API_URL,
} from './clients/fiat-rate-source.js';
export type { FiatRateSourceConfig } from './clients/fiat-rate-source.js';
export {
  CryptoRateSource,
  COINGECKO_SOURCE_NAME,
  COINGECKO_DISPLAY_NAME,
  DEFAULT_COINGECKO_API_URL,
} from './clients/crypto-rate-source.js';
export type { CryptoRateSourceConfig } from './clients/crypto-rate-source.js';
export { RetryingHttpClient } from './clients/retrying-http-client.js';
export type { RetryingHttpClientConfig, QueryParams } from './clients/retrying-http-client.js';

// Persistence
export { RatesStore, DEFAULT_ALLOWED_DATA_DIRS } from './persistence/rates-store.js';
export type { RatesStoreConfig } from './persistence/rates-store.js';

// Errors
export { RatesError, RatesErrorCode, ok, err, getErrorMessage, toRatesError } from './errors/rates-errors.js';
export type { Result, Ok, Err } from './errors/rates-errors.js';

// Utilities
export {
  normalizeCurrencyCode,
  isValidCurrencyCode,
  createPair,
  pairKey,
  parsePairKey,
} from './utils/currency.js';
export { RatesLogger, LogEvents, createRatesLogger, createSilentLogger } from './utils/rates-logger.js';
export type { IRatesLogger, LogEntry, LogLevel, RatesLoggerConfig } from './utils/rates-logger.js';

// Types
export * from './types/rates.types.js';
