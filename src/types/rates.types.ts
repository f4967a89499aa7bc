/**
 * Rates Type Definitions
 *
 * Shared data model for rate acquisition, the observation journal,
 * the snapshot cache, and rate queries.
 */

import type { RatesErrorCode, Result } from '../errors/rates-errors.js';

// ============================================================================
// Validation Constants (for runtime type checking)
// ============================================================================

/** Source names understood by the aggregator */
export const VALID_SOURCE_NAMES = ['exchangerate', 'coingecko'] as const;

// ============================================================================
// Core Types
// ============================================================================

/**
 * Ordered currency pair, both codes upper-case 2-5 letters
 */
export interface CurrencyPair {
  readonly base: string;
  readonly quote: string;
}

/** Free-form provider details attached to an observation */
export type ObservationMetadata = Readonly<Record<string, string>>;

/**
 * One rate as returned by a source client
 */
export interface SourceRate {
  readonly pair: CurrencyPair;
  /** Units of `quote` per one unit of `base` */
  readonly rate: number;
  readonly metadata?: ObservationMetadata;
}

/** Rates returned by a single fetch, keyed by "BASE_QUOTE" */
export type SourceRates = ReadonlyMap<string, SourceRate>;

/**
 * Immutable journal record of a fetched rate
 */
export interface RateObservation {
  readonly pair: CurrencyPair;
  readonly rate: number;
  /** ISO 8601 timestamp of the refresh run that produced it */
  readonly observedAt: string;
  /** Display name of the provider (e.g. 'CoinGecko') */
  readonly source: string;
  readonly metadata?: ObservationMetadata;
}

/**
 * One pair of the snapshot cache
 */
export interface CacheEntry {
  readonly pair: CurrencyPair;
  readonly rate: number;
  /** Always equal to the owning snapshot's lastRefresh */
  readonly updatedAt: string;
  readonly source: string;
}

/**
 * Current best-known rates, replaced as a whole on each successful run
 */
export interface CacheSnapshot {
  readonly entries: Readonly<Record<string, CacheEntry>>;
  /** ISO 8601 timestamp */
  readonly lastRefresh: string;
}

/**
 * Failure of one source (or of the storage step) within a run
 */
export interface SourceFailure {
  readonly source: string;
  readonly code: RatesErrorCode;
  readonly error: string;
}

/** Outcome classification of a refresh run */
export type UpdateStatus = 'success' | 'partial' | 'failed';

/**
 * Outcome of one aggregator run. Returned and logged, never persisted.
 */
export interface UpdateResult {
  readonly successfulSources: readonly string[];
  readonly failedSources: readonly SourceFailure[];
  readonly totalRates: number;
  readonly lastRefresh: string;
  readonly status: UpdateStatus;
}

/** How a quote was obtained */
export type RateDerivation = 'direct' | 'inverse' | 'triangulated' | 'identity';

/**
 * Answer to a rate query
 */
export interface RateQuote {
  readonly from: string;
  readonly to: string;
  readonly rate: number;
  /** ISO 8601; `now` for computed (triangulated/identity) quotes */
  readonly updatedAt: string;
  readonly source: string;
  readonly derivation: RateDerivation;
}

/**
 * Operator-facing status of the subsystem
 */
export interface RatesStatus {
  readonly running: boolean;
  readonly lastRefresh: string | null;
  readonly cachedPairCount: number;
  readonly journalSize: number;
  readonly isStale: boolean;
}

// ============================================================================
// Component Interfaces
// ============================================================================

/**
 * Fetches current rates from one external provider
 */
export interface RateSourceClient {
  /** Config key, e.g. 'coingecko' */
  readonly name: string;
  /** Name recorded on observations, e.g. 'CoinGecko' */
  readonly displayName: string;
  fetchRates(): Promise<Result<SourceRates>>;
}

/**
 * Interface for the rates store
 *
 * Enables dependency injection and testability.
 */
export interface IRatesStore {
  appendObservation(observation: RateObservation): Promise<Result<void>>;
  appendObservations(observations: readonly RateObservation[]): Promise<Result<void>>;
  replaceSnapshot(snapshot: CacheSnapshot): Promise<Result<void>>;
  loadSnapshot(): Promise<CacheSnapshot | null>;
  loadJournal(): Promise<RateObservation[]>;
  getJournalSize(): Promise<number>;
  isStale(ttlMs: number, now?: Date): Promise<boolean>;
}

/**
 * Anything able to run a refresh cycle
 */
export interface IRatesUpdater {
  runUpdate(sources?: readonly string[]): Promise<UpdateResult>;
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Rates subsystem configuration. Built once at startup and passed explicitly.
 */
export interface RatesConfig {
  /** Per-request HTTP timeout */
  requestTimeoutMs: number;
  /** Total attempts per source request (first try included) */
  maxAttempts: number;
  /** Interval between scheduled refreshes */
  updateIntervalMs: number;
  /** Snapshot time-to-live */
  cacheTtlMs: number;
  /** Quote currency of all fetched pairs and bridge for triangulation */
  baseCurrency: string;
  journalPath: string;
  snapshotPath: string;
  /** Base directories persistence paths must live under */
  allowedDataDirs: string[];
  enabledSources: string[];
  fiatCurrencies: string[];
  /** Internal code -> provider asset id (e.g. BTC -> bitcoin) */
  cryptoAssets: Record<string, string>;
  exchangeRateApiKey: string;
  exchangeRateApiUrl: string;
  coinGeckoApiUrl: string;
  /** 0 keeps the journal forever */
  journalRetentionDays: number;
  /** Pause after an unexpected scheduler error */
  errorCooldownMs: number;
  loggingEnabled: boolean;
}
