/**
 * RatesAggregator Unit Tests
 *
 * - Merging and snapshot shape
 * - Per-source isolation and total failure
 * - Storage failures
 * - Source selection
 * - Single-flight runs
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFileSync } from 'fs';
import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import {
  FakeRateSource,
  createDeferred,
  createSourceRates,
  flushPromises,
} from '../clients/test-fixtures.js';
import {
  InMemoryRatesStore,
  TEST_REFRESH_TIME,
  createTestSnapshot,
  setupTestStore,
  type TestStoreContext,
} from '../persistence/test-fixtures.js';
import type { IRatesStore, SourceRates } from '../types/rates.types.js';
import { RatesAggregator } from './rates-aggregator.js';

const FIAT_RATES = createSourceRates({ EUR_USD: 1.0787, GBP_USD: 1.25 }, { base_currency: 'USD' });
const CRYPTO_RATES = createSourceRates({ BTC_USD: 67250.5 }, { crypto_id: 'bitcoin' });

function unavailable(message: string): Result<SourceRates> {
  return err(new RatesError(message, RatesErrorCode.SOURCE_UNAVAILABLE_ERROR));
}

function createAggregator(fiat: FakeRateSource, crypto: FakeRateSource, store: IRatesStore) {
  return new RatesAggregator({
    sources: [fiat, crypto],
    store,
    clock: () => new Date(TEST_REFRESH_TIME),
  });
}

describe('RatesAggregator', () => {
  let fiat: FakeRateSource;
  let crypto: FakeRateSource;

  beforeEach(() => {
    fiat = new FakeRateSource('exchangerate', 'ExchangeRate-API', ok(FIAT_RATES));
    crypto = new FakeRateSource('coingecko', 'CoinGecko', ok(CRYPTO_RATES));
  });

  // ============================================================================
  // Merging
  // ============================================================================

  describe('successful run', () => {
    it('should merge every source into one snapshot', async () => {
      const store = new InMemoryRatesStore();
      const aggregator = createAggregator(fiat, crypto, store);

      const result = await aggregator.runUpdate();

      expect(result).toEqual({
        successfulSources: ['exchangerate', 'coingecko'],
        failedSources: [],
        totalRates: 3,
        lastRefresh: TEST_REFRESH_TIME,
        status: 'success',
      });
      expect(Object.keys(store.snapshot?.entries ?? {})).toEqual(['EUR_USD', 'GBP_USD', 'BTC_USD']);
      expect(store.snapshot?.entries.BTC_USD).toEqual({
        pair: { base: 'BTC', quote: 'USD' },
        rate: 67250.5,
        updatedAt: TEST_REFRESH_TIME,
        source: 'CoinGecko',
      });
    });

    it('should stamp every snapshot entry with the run timestamp', async () => {
      const store = new InMemoryRatesStore();
      const result = await createAggregator(fiat, crypto, store).runUpdate();

      const entries = Object.values(store.snapshot?.entries ?? {});
      expect(entries).toHaveLength(3);
      for (const entry of entries) {
        expect(entry.updatedAt).toBe(result.lastRefresh);
      }
      expect(store.snapshot?.lastRefresh).toBe(result.lastRefresh);
    });

    it('should journal one observation per pair', async () => {
      const store = new InMemoryRatesStore();
      await createAggregator(fiat, crypto, store).runUpdate();

      expect(store.journal).toHaveLength(3);
      expect(store.journal[0]).toEqual({
        pair: { base: 'EUR', quote: 'USD' },
        rate: 1.0787,
        observedAt: TEST_REFRESH_TIME,
        source: 'ExchangeRate-API',
        metadata: { base_currency: 'USD' },
      });
      expect(store.journal[2].source).toBe('CoinGecko');
    });

    it('should let the later source win for a shared pair', async () => {
      crypto.respondWith(ok(createSourceRates({ EUR_USD: 1.08, BTC_USD: 67250.5 })));
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.totalRates).toBe(3);
      expect(store.snapshot?.entries.EUR_USD.rate).toBe(1.08);
      expect(store.snapshot?.entries.EUR_USD.source).toBe('CoinGecko');
      expect(store.journal).toHaveLength(4);
    });

    it('should count a source with no rates as successful', async () => {
      fiat.respondWith(ok(new Map()));
      crypto.respondWith(ok(new Map()));
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.status).toBe('success');
      expect(result.successfulSources).toEqual(['exchangerate', 'coingecko']);
      expect(result.totalRates).toBe(0);
      expect(store.snapshot).toBeNull();
    });
  });

  // ============================================================================
  // Isolation
  // ============================================================================

  describe('source failures', () => {
    it('should keep other sources running when one fails', async () => {
      fiat.respondWith(unavailable('Failed after 3 attempts: HTTP 503'));
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.status).toBe('partial');
      expect(result.successfulSources).toEqual(['coingecko']);
      expect(result.failedSources).toEqual([
        {
          source: 'exchangerate',
          code: RatesErrorCode.SOURCE_UNAVAILABLE_ERROR,
          error: 'Failed after 3 attempts: HTTP 503',
        },
      ]);
      expect(result.totalRates).toBe(1);
      expect(Object.keys(store.snapshot?.entries ?? {})).toEqual(['BTC_USD']);
      expect(store.journal).toHaveLength(1);
    });

    it('should record a source that throws as failed', async () => {
      crypto.respondWith(async () => {
        throw new Error('unexpected payload shape');
      });
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.successfulSources).toEqual(['exchangerate']);
      expect(result.failedSources).toEqual([
        {
          source: 'coingecko',
          code: RatesErrorCode.SOURCE_UNAVAILABLE_ERROR,
          error: 'unexpected payload shape',
        },
      ]);
    });

    describe('when every source fails', () => {
      let ctx: TestStoreContext;

      beforeEach(async () => {
        ctx = await setupTestStore();
      });

      afterEach(async () => {
        await ctx.cleanup();
      });

      it('should leave the existing snapshot untouched', async () => {
        await ctx.store.replaceSnapshot(createTestSnapshot({ EUR_USD: 1.0787 }, '2026-10-16T11:00:00.000Z'));
        const before = readFileSync(ctx.snapshotPath);
        fiat.respondWith(unavailable('Failed after 3 attempts: Request timeout'));
        crypto.respondWith(unavailable('Failed after 3 attempts: HTTP 429'));

        const result = await createAggregator(fiat, crypto, ctx.store).runUpdate();

        expect(result.status).toBe('failed');
        expect(result.successfulSources).toEqual([]);
        expect(result.failedSources.map((failure) => failure.source)).toEqual([
          'exchangerate',
          'coingecko',
        ]);
        expect(result.totalRates).toBe(0);
        expect(readFileSync(ctx.snapshotPath).equals(before)).toBe(true);
        expect(await ctx.store.getJournalSize()).toBe(0);
      });
    });
  });

  // ============================================================================
  // Storage failures
  // ============================================================================

  describe('storage failures', () => {
    it('should report a failed snapshot write as a storage failure', async () => {
      const store = new InMemoryRatesStore();
      store.replaceFailure = 'Failed to replace snapshot: EACCES';

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.status).toBe('partial');
      expect(result.successfulSources).toEqual(['exchangerate', 'coingecko']);
      expect(result.failedSources).toEqual([
        {
          source: 'storage',
          code: RatesErrorCode.PERSISTENCE_ERROR,
          error: 'Failed to replace snapshot: EACCES',
        },
      ]);
      expect(result.totalRates).toBe(3);
      expect(store.journal).toHaveLength(3);
    });

    it('should still replace the snapshot when journal appends fail', async () => {
      const store = new InMemoryRatesStore();
      store.appendFailure = 'Failed to append observations: SQLITE_FULL';

      const result = await createAggregator(fiat, crypto, store).runUpdate();

      expect(result.failedSources.map((failure) => failure.source)).toEqual(['storage', 'storage']);
      expect(result.totalRates).toBe(3);
      expect(Object.keys(store.snapshot?.entries ?? {})).toHaveLength(3);
    });
  });

  // ============================================================================
  // Source selection
  // ============================================================================

  describe('source selection', () => {
    it('should run only the requested sources', async () => {
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate(['coingecko']);

      expect(fiat.calls).toBe(0);
      expect(crypto.calls).toBe(1);
      expect(result.successfulSources).toEqual(['coingecko']);
    });

    it('should skip unknown source names', async () => {
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate(['bogus', 'CoinGecko']);

      expect(fiat.calls).toBe(0);
      expect(result.successfulSources).toEqual(['coingecko']);
      expect(result.failedSources).toEqual([]);
    });

    it('should report a run with no known source as failed', async () => {
      const store = new InMemoryRatesStore();

      const result = await createAggregator(fiat, crypto, store).runUpdate(['bogus']);

      expect(result.status).toBe('failed');
      expect(result.totalRates).toBe(0);
      expect(fiat.calls + crypto.calls).toBe(0);
    });
  });

  // ============================================================================
  // Single-flight
  // ============================================================================

  describe('single-flight', () => {
    it('should share one run between concurrent callers', async () => {
      const gate = createDeferred<void>();
      fiat.respondWith(async () => {
        await gate.promise;
        return ok(FIAT_RATES);
      });
      const aggregator = createAggregator(fiat, crypto, new InMemoryRatesStore());

      const first = aggregator.runUpdate();
      const second = aggregator.runUpdate(['exchangerate', 'coingecko']);
      expect(second).toBe(first);

      gate.resolve();
      await Promise.all([first, second]);
      expect(fiat.calls).toBe(1);
      expect(crypto.calls).toBe(1);
    });

    it('should queue a different selection behind the running one', async () => {
      const gate = createDeferred<void>();
      fiat.respondWith(async () => {
        await gate.promise;
        return ok(FIAT_RATES);
      });
      const store = new InMemoryRatesStore();
      const aggregator = createAggregator(fiat, crypto, store);

      const full = aggregator.runUpdate();
      const cryptoOnly = aggregator.runUpdate(['coingecko']);
      await flushPromises();

      // The queued run has not started while the first is blocked
      expect(crypto.calls).toBe(1);

      gate.resolve();
      const fullResult = await full;
      const cryptoResult = await cryptoOnly;

      expect(crypto.calls).toBe(2);
      expect(fullResult.totalRates).toBe(3);
      expect(cryptoResult.successfulSources).toEqual(['coingecko']);
      // Last run wins the snapshot
      expect(Object.keys(store.snapshot?.entries ?? {})).toEqual(['BTC_USD']);
    });

    it('should start a new run once the previous one finished', async () => {
      const aggregator = createAggregator(fiat, crypto, new InMemoryRatesStore());

      const first = await aggregator.runUpdate();
      const second = await aggregator.runUpdate();

      expect(first).not.toBe(second);
      expect(fiat.calls).toBe(2);
    });
  });
});
