/**
 * Shared Test Fixtures for Rates Persistence Tests
 *
 * Provides reusable factory functions for creating test data, a real store in
 * a throwaway directory under ./test-data, and an in-memory store whose
 * writes can be made to fail.
 * Used by both unit tests and integration tests.
 */

import { randomUUID } from 'crypto';
import { rmSync } from 'fs';
import { join } from 'path';
import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import type {
  CacheEntry,
  CacheSnapshot,
  IRatesStore,
  RateObservation,
} from '../types/rates.types.js';
import { parsePairKey } from '../utils/currency.js';
import type { IRatesLogger } from '../utils/rates-logger.js';
import { RatesStore } from './rates-store.js';

/** Fixed run timestamp used across tests (2026-10-16 12:00:00 UTC) */
export const TEST_REFRESH_TIME = '2026-10-16T12:00:00.000Z';

/**
 * Create a test RateObservation with sensible defaults
 */
export function createTestObservation(overrides: Partial<RateObservation> = {}): RateObservation {
  return {
    pair: { base: 'BTC', quote: 'USD' },
    rate: 67250.5,
    observedAt: TEST_REFRESH_TIME,
    source: 'CoinGecko',
    metadata: { crypto_id: 'bitcoin' },
    ...overrides,
  };
}

/**
 * Create a snapshot from `{ "EUR_USD": 1.08 }` style rates
 */
export function createTestSnapshot(
  rates: Record<string, number>,
  lastRefresh: string = TEST_REFRESH_TIME,
  source = 'ExchangeRate-API'
): CacheSnapshot {
  const entries: Record<string, CacheEntry> = {};
  for (const [key, rate] of Object.entries(rates)) {
    const pair = parsePairKey(key);
    if (!pair.ok) {
      throw pair.error;
    }
    entries[key] = { pair: pair.value, rate, updatedAt: lastRefresh, source };
  }
  return { entries, lastRefresh };
}

// ============================================================================
// Store Setup
// ============================================================================

export interface TestStoreContext {
  store: RatesStore;
  dir: string;
  journalPath: string;
  snapshotPath: string;
  cleanup(): Promise<void>;
}

/**
 * Initialize a RatesStore in a unique directory under ./test-data
 */
export async function setupTestStore(options: { logger?: IRatesLogger } = {}): Promise<TestStoreContext> {
  const dir = join('./test-data', randomUUID());
  const journalPath = join(dir, 'journal.db');
  const snapshotPath = join(dir, 'rates.json');

  const store = new RatesStore({ journalPath, snapshotPath, logger: options.logger });
  await store.initialize();

  return {
    store,
    dir,
    journalPath,
    snapshotPath,
    async cleanup() {
      await store.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}

// ============================================================================
// In-Memory Store
// ============================================================================

/**
 * IRatesStore kept in memory. Set `appendFailure` or `replaceFailure` to make
 * the matching writes fail with a PERSISTENCE_ERROR.
 */
export class InMemoryRatesStore implements IRatesStore {
  journal: RateObservation[] = [];
  snapshot: CacheSnapshot | null;
  appendFailure: string | null = null;
  replaceFailure: string | null = null;

  constructor(snapshot: CacheSnapshot | null = null) {
    this.snapshot = snapshot;
  }

  async appendObservation(observation: RateObservation): Promise<Result<void>> {
    return this.appendObservations([observation]);
  }

  async appendObservations(observations: readonly RateObservation[]): Promise<Result<void>> {
    if (this.appendFailure !== null) {
      return err(new RatesError(this.appendFailure, RatesErrorCode.PERSISTENCE_ERROR));
    }
    this.journal.push(...observations);
    return ok(undefined);
  }

  async replaceSnapshot(snapshot: CacheSnapshot): Promise<Result<void>> {
    if (this.replaceFailure !== null) {
      return err(new RatesError(this.replaceFailure, RatesErrorCode.PERSISTENCE_ERROR));
    }
    this.snapshot = snapshot;
    return ok(undefined);
  }

  async loadSnapshot(): Promise<CacheSnapshot | null> {
    return this.snapshot;
  }

  async loadJournal(): Promise<RateObservation[]> {
    return [...this.journal];
  }

  async getJournalSize(): Promise<number> {
    return this.journal.length;
  }

  async isStale(ttlMs: number, now: Date = new Date()): Promise<boolean> {
    if (!this.snapshot) {
      return true;
    }
    return now.getTime() - Date.parse(this.snapshot.lastRefresh) >= ttlMs;
  }
}
