/**
 * RatesAggregator - one refresh cycle across the configured sources
 *
 * Sources are fetched concurrently and their results handled in configured
 * order, so a later source overwrites an earlier one for the same pair.
 * A source failure never stops the others. Each successful source is written
 * to the journal right away; the snapshot is replaced once at the end of the
 * run, only when at least one rate was collected.
 *
 * At most one run executes at a time. A call selecting the same sources as a
 * run that is executing or waiting shares that run's result; any other
 * selection is queued behind it.
 */

import { RatesErrorCode, err, toRatesError, type Result } from '../errors/rates-errors.js';
import type {
  CacheEntry,
  CacheSnapshot,
  IRatesStore,
  IRatesUpdater,
  RateObservation,
  RateSourceClient,
  SourceFailure,
  SourceRate,
  SourceRates,
  UpdateResult,
  UpdateStatus,
} from '../types/rates.types.js';
import { pairKey } from '../utils/currency.js';
import { LogEvents, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';

/** Pseudo-source name for journal and snapshot write failures */
export const STORAGE_FAILURE_SOURCE = 'storage';

const ALL_SOURCES_KEY = '*';

export interface RatesAggregatorConfig {
  /** Enabled sources in configured order */
  sources: readonly RateSourceClient[];
  store: IRatesStore;
  logger?: IRatesLogger;
  /** Run timestamp provider (default: current time) */
  clock?: () => Date;
}

interface MergedRate {
  readonly rate: SourceRate;
  readonly source: string;
}

interface FetchOutcome {
  readonly client: RateSourceClient;
  readonly result: Result<SourceRates>;
  readonly durationMs: number;
}

export class RatesAggregator implements IRatesUpdater {
  private readonly sources: readonly RateSourceClient[];
  private readonly store: IRatesStore;
  private readonly logger: IRatesLogger;
  private readonly clock: () => Date;

  /** Runs executing or queued, by source selection */
  private readonly pending = new Map<string, Promise<UpdateResult>>();
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RatesAggregatorConfig) {
    this.sources = config.sources;
    this.store = config.store;
    this.logger = config.logger ?? createSilentLogger('aggregator');
    this.clock = config.clock ?? (() => new Date());
  }

  /** Config keys of the enabled sources, in order */
  getSourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }

  /**
   * Run one refresh cycle.
   * @param sources - optional subset of source names; unknown names are skipped
   */
  runUpdate(sources?: readonly string[]): Promise<UpdateResult> {
    const selected = this.selectSources(sources);
    const key =
      selected.length === this.sources.length
        ? ALL_SOURCES_KEY
        : selected.map((source) => source.name).join(',');

    const existing = this.pending.get(key);
    if (existing) {
      return existing;
    }

    const run = this.tail.then(async () => {
      try {
        return await this.execute(selected);
      } finally {
        this.pending.delete(key);
      }
    });

    this.pending.set(key, run);
    // Keep the queue moving whatever this run's outcome; the caller still sees it
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private selectSources(names?: readonly string[]): RateSourceClient[] {
    if (names === undefined) {
      return [...this.sources];
    }

    const requested = new Set<string>();
    for (const name of names) {
      const normalized = name.trim().toLowerCase();
      if (!this.sources.some((source) => source.name === normalized)) {
        this.logger.warn(LogEvents.UNKNOWN_SOURCE, {
          source: name,
          message: `Unknown rate source; expected one of: ${this.getSourceNames().join(', ')}`,
        });
        continue;
      }
      requested.add(normalized);
    }

    return this.sources.filter((source) => requested.has(source.name));
  }

  private async execute(clients: readonly RateSourceClient[]): Promise<UpdateResult> {
    const lastRefresh = this.clock().toISOString();
    this.logger.info(LogEvents.RATES_UPDATE_STARTED, {
      message: `Refreshing ${clients.map((client) => client.name).join(', ') || 'no sources'}`,
      lastRefresh,
    });

    const outcomes = await Promise.all(clients.map((client) => this.fetchFrom(client)));

    const merged = new Map<string, MergedRate>();
    const successfulSources: string[] = [];
    const failedSources: SourceFailure[] = [];

    for (const { client, result, durationMs } of outcomes) {
      if (!result.ok) {
        failedSources.push({ source: client.name, code: result.error.code, error: result.error.message });
        this.logger.warn(LogEvents.SOURCE_FETCH_FAILED, {
          source: client.name,
          error: result.error.message,
          errorCode: result.error.code,
          durationMs,
        });
        continue;
      }

      const rates = result.value;
      successfulSources.push(client.name);
      if (rates.size === 0) {
        this.logger.warn(LogEvents.SOURCE_FETCH_SUCCEEDED, {
          source: client.name,
          rateCount: 0,
          durationMs,
          message: 'Source returned no rates',
        });
      } else {
        this.logger.info(LogEvents.SOURCE_FETCH_SUCCEEDED, {
          source: client.name,
          rateCount: rates.size,
          durationMs,
        });
      }

      const observations: RateObservation[] = [];
      for (const rate of rates.values()) {
        merged.set(pairKey(rate.pair), { rate, source: client.displayName });
        observations.push({
          pair: rate.pair,
          rate: rate.rate,
          observedAt: lastRefresh,
          source: client.displayName,
          ...(rate.metadata ? { metadata: rate.metadata } : {}),
        });
      }

      const appended = await this.store.appendObservations(observations);
      if (!appended.ok) {
        failedSources.push({
          source: STORAGE_FAILURE_SOURCE,
          code: appended.error.code,
          error: appended.error.message,
        });
      }
    }

    if (merged.size > 0) {
      const replaced = await this.store.replaceSnapshot(buildSnapshot(merged, lastRefresh));
      if (!replaced.ok) {
        failedSources.push({
          source: STORAGE_FAILURE_SOURCE,
          code: replaced.error.code,
          error: replaced.error.message,
        });
      }
    }

    const status = classify(successfulSources.length, failedSources.length);
    const result: UpdateResult = {
      successfulSources,
      failedSources,
      totalRates: merged.size,
      lastRefresh,
      status,
    };

    const context = {
      successfulSources,
      failedSourceCount: failedSources.length,
      rateCount: merged.size,
      status,
      lastRefresh,
    };
    if (status === 'failed') {
      this.logger.error(LogEvents.RATES_UPDATE_COMPLETED, context);
    } else {
      this.logger.info(LogEvents.RATES_UPDATE_COMPLETED, context);
    }

    return result;
  }

  /** Fetch from one source; a thrown error becomes that source's failure */
  private async fetchFrom(client: RateSourceClient): Promise<FetchOutcome> {
    const startedAt = Date.now();
    let result: Result<SourceRates>;
    try {
      result = await client.fetchRates();
    } catch (error) {
      result = err(toRatesError(error, RatesErrorCode.SOURCE_UNAVAILABLE_ERROR));
    }
    return { client, result, durationMs: Date.now() - startedAt };
  }
}

function buildSnapshot(merged: ReadonlyMap<string, MergedRate>, lastRefresh: string): CacheSnapshot {
  const entries: Record<string, CacheEntry> = {};
  for (const [key, { rate, source }] of merged) {
    entries[key] = { pair: rate.pair, rate: rate.rate, updatedAt: lastRefresh, source };
  }
  return { entries, lastRefresh };
}

function classify(successCount: number, failureCount: number): UpdateStatus {
  if (successCount === 0) {
    return 'failed';
  }
  return failureCount > 0 ? 'partial' : 'success';
}
