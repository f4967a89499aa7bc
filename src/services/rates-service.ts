/**
 * RatesService - entry point of the rates subsystem
 *
 * Wires the source clients, store, aggregator, query service and scheduler
 * from one RatesConfig. Callers outside the subsystem (wallets, trading,
 * CLI) only talk to this class.
 *
 * @example
 * const rates = new RatesService(ratesConfig);
 * await rates.initialize();
 * rates.startScheduler();
 * const quote = await rates.getRate('EUR', 'JPY');
 * await rates.close();
 */

import type { AxiosInstance } from 'axios';
import type { Result } from '../errors/rates-errors.js';
import { CryptoRateSource, COINGECKO_SOURCE_NAME } from '../clients/crypto-rate-source.js';
import { FiatRateSource, EXCHANGERATE_SOURCE_NAME } from '../clients/fiat-rate-source.js';
import { RetryingHttpClient } from '../clients/retrying-http-client.js';
import { RatesStore } from '../persistence/rates-store.js';
import type {
  IRatesUpdater,
  RateQuote,
  RateSourceClient,
  RatesConfig,
  RatesStatus,
  UpdateResult,
} from '../types/rates.types.js';
import { LogEvents, RatesLogger, createRatesLogger, type IRatesLogger } from '../utils/rates-logger.js';
import { RateQueryService } from './rate-query-service.js';
import { RatesAggregator } from './rates-aggregator.js';
import { RatesScheduler } from './rates-scheduler.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RatesServiceOptions {
  logger?: IRatesLogger;
  /** Axios instance shared by the source clients */
  http?: AxiosInstance;
  /** Replaces the clients built from config */
  sources?: readonly RateSourceClient[];
  /** Wait between HTTP retries */
  sleep?: (ms: number) => Promise<void>;
  /** Stop wait bound for the scheduler */
  stopTimeoutMs?: number;
  clock?: () => Date;
}

// ============================================================================
// Source Factory
// ============================================================================

/**
 * Build the enabled source clients in configured order
 */
export function createRateSources(
  config: RatesConfig,
  options: Pick<RatesServiceOptions, 'logger' | 'http' | 'sleep'> = {}
): RateSourceClient[] {
  const logger = options.logger ?? createRatesLogger('sources', { enabled: config.loggingEnabled });
  const sources: RateSourceClient[] = [];

  const httpFor = (source: string): RetryingHttpClient =>
    new RetryingHttpClient({
      source,
      timeoutMs: config.requestTimeoutMs,
      maxAttempts: config.maxAttempts,
      http: options.http,
      logger: logger.child('http'),
      sleep: options.sleep,
    });

  for (const name of config.enabledSources) {
    switch (name) {
      case EXCHANGERATE_SOURCE_NAME:
        sources.push(
          new FiatRateSource({
            apiKey: config.exchangeRateApiKey,
            apiUrl: config.exchangeRateApiUrl,
            baseCurrency: config.baseCurrency,
            currencies: config.fiatCurrencies,
            http: httpFor(name),
            logger: logger.child('fiat-source'),
          })
        );
        break;
      case COINGECKO_SOURCE_NAME:
        sources.push(
          new CryptoRateSource({
            apiUrl: config.coinGeckoApiUrl,
            baseCurrency: config.baseCurrency,
            assets: config.cryptoAssets,
            http: httpFor(name),
            logger: logger.child('crypto-source'),
          })
        );
        break;
      default:
        logger.warn(LogEvents.UNKNOWN_SOURCE, { source: name, message: 'Ignoring unknown enabled source' });
    }
  }

  return sources;
}

// ============================================================================
// RatesService Implementation
// ============================================================================

export class RatesService implements IRatesUpdater {
  private readonly config: RatesConfig;
  private readonly logger: IRatesLogger;
  private readonly clock: () => Date;
  private readonly store: RatesStore;
  private readonly aggregator: RatesAggregator;
  private readonly queryService: RateQueryService;
  private readonly scheduler: RatesScheduler;

  constructor(config: RatesConfig, options: RatesServiceOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createRatesLogger('service', { enabled: config.loggingEnabled });
    this.clock = options.clock ?? (() => new Date());

    this.store = new RatesStore({
      journalPath: config.journalPath,
      snapshotPath: config.snapshotPath,
      allowedDataDirs: config.allowedDataDirs,
      logger: this.logger.child('store'),
    });

    this.aggregator = new RatesAggregator({
      sources:
        options.sources ??
        createRateSources(config, {
          logger: this.logger.child('sources'),
          http: options.http,
          sleep: options.sleep,
        }),
      store: this.store,
      logger: this.logger.child('aggregator'),
      clock: this.clock,
    });

    this.queryService = new RateQueryService({
      store: this.store,
      updater: this,
      cacheTtlMs: config.cacheTtlMs,
      bridgeCurrency: config.baseCurrency,
      logger: this.logger.child('query'),
      clock: this.clock,
    });

    this.scheduler = new RatesScheduler({
      updater: this,
      intervalMs: config.updateIntervalMs,
      errorCooldownMs: config.errorCooldownMs,
      stopTimeoutMs: options.stopTimeoutMs,
      logger: this.logger.child('scheduler'),
    });
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Open the store and apply journal retention
   */
  async initialize(): Promise<void> {
    await this.store.initialize();
    await this.applyRetention();
  }

  /**
   * Stop the scheduler and close the store
   */
  async close(): Promise<void> {
    await this.scheduler.stop();
    await this.store.close();
  }

  startScheduler(): boolean {
    return this.scheduler.start();
  }

  stopScheduler(): Promise<boolean> {
    return this.scheduler.stop();
  }

  // ============================================================================
  // Operations
  // ============================================================================

  getRate(from: string, to: string): Promise<Result<RateQuote>> {
    return this.queryService.getRate(from, to);
  }

  /**
   * Refresh now (all enabled sources, or the named subset)
   */
  async runUpdate(sources?: readonly string[]): Promise<UpdateResult> {
    const result = await this.aggregator.runUpdate(sources);
    await this.applyRetention();
    return result;
  }

  async getStatus(): Promise<RatesStatus> {
    const snapshot = await this.store.loadSnapshot();
    return {
      running: this.scheduler.isRunning(),
      lastRefresh: snapshot?.lastRefresh ?? null,
      cachedPairCount: snapshot ? Object.keys(snapshot.entries).length : 0,
      journalSize: await this.store.getJournalSize(),
      isStale: await this.store.isStale(this.config.cacheTtlMs, this.clock()),
    };
  }

  /**
   * Remove journal observations older than the given number of days
   */
  pruneJournal(olderThanDays: number): Promise<Result<number>> {
    const cutoff = new Date(this.clock().getTime() - olderThanDays * DAY_MS);
    return this.store.pruneJournal(cutoff);
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async applyRetention(): Promise<void> {
    if (this.config.journalRetentionDays <= 0) {
      return;
    }
    const pruned = await this.pruneJournal(this.config.journalRetentionDays);
    if (!pruned.ok) {
      this.logger.warn(LogEvents.PERSISTENCE_ERROR, {
        error: RatesLogger.sanitizeErrorMessage(pruned.error),
        errorCode: pruned.error.code,
        message: 'Journal retention skipped',
      });
    }
  }
}
