/**
 * RateQueryService Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RatesErrorCode } from '../errors/rates-errors.js';
import {
  InMemoryRatesStore,
  TEST_REFRESH_TIME,
  createTestSnapshot,
} from '../persistence/test-fixtures.js';
import type { CacheSnapshot, IRatesUpdater, UpdateResult } from '../types/rates.types.js';
import { RateQueryService } from './rate-query-service.js';

const SECOND_MS = 1000;
const TTL_MS = 300 * SECOND_MS;
const REFRESHED_AT = new Date(TEST_REFRESH_TIME).getTime();

function updateResult(status: UpdateResult['status']): UpdateResult {
  return {
    successfulSources: status === 'failed' ? [] : ['exchangerate'],
    failedSources: [],
    totalRates: status === 'failed' ? 0 : 1,
    lastRefresh: TEST_REFRESH_TIME,
    status,
  };
}

/**
 * Updater that installs `next` as the store snapshot when run
 */
function createUpdater(store: InMemoryRatesStore, next: CacheSnapshot | null = null) {
  const runUpdate = vi.fn(async (): Promise<UpdateResult> => {
    if (next) {
      store.snapshot = next;
      return updateResult('success');
    }
    return updateResult('failed');
  });
  const updater: IRatesUpdater = { runUpdate };
  return { updater, runUpdate };
}

function createService(store: InMemoryRatesStore, updater: IRatesUpdater, nowMs: number = REFRESHED_AT) {
  return new RateQueryService({
    store,
    updater,
    cacheTtlMs: TTL_MS,
    clock: () => new Date(nowMs),
  });
}

describe('RateQueryService', () => {
  let store: InMemoryRatesStore;

  beforeEach(() => {
    store = new InMemoryRatesStore(
      createTestSnapshot({ EUR_USD: 1.0787, RUB_USD: 0.01016, USD_EUR: 0.927, BTC_USD: 67250.5 })
    );
  });

  // ============================================================================
  // Validation
  // ============================================================================

  describe('validation', () => {
    it('should reject malformed currency codes', async () => {
      const { updater, runUpdate } = createUpdater(store);
      const service = createService(store, updater);

      const result = await service.getRate('EURO1', 'USD');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(RatesErrorCode.VALIDATION_ERROR);
        expect(result.error.message).toBe("Invalid currency code 'EURO1': expected 2-5 letters");
      }
      expect(runUpdate).not.toHaveBeenCalled();
    });

    it('should reject an empty target code', async () => {
      const { updater } = createUpdater(store);

      const result = await createService(store, updater).getRate('USD', '');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(RatesErrorCode.VALIDATION_ERROR);
      }
    });
  });

  // ============================================================================
  // Lookup
  // ============================================================================

  describe('lookup', () => {
    it('should return 1 for the same currency without refreshing', async () => {
      const emptyStore = new InMemoryRatesStore();
      const { updater, runUpdate } = createUpdater(emptyStore);

      const result = await createService(emptyStore, updater).getRate('eur', 'EUR');

      expect(result).toEqual({
        ok: true,
        value: {
          from: 'EUR',
          to: 'EUR',
          rate: 1,
          updatedAt: TEST_REFRESH_TIME,
          source: 'identity',
          derivation: 'identity',
        },
      });
      expect(runUpdate).not.toHaveBeenCalled();
    });

    it('should answer a direct pair from a fresh snapshot', async () => {
      const { updater, runUpdate } = createUpdater(store);

      const result = await createService(store, updater).getRate('btc', 'usd');

      expect(result).toEqual({
        ok: true,
        value: {
          from: 'BTC',
          to: 'USD',
          rate: 67250.5,
          updatedAt: TEST_REFRESH_TIME,
          source: 'ExchangeRate-API',
          derivation: 'direct',
        },
      });
      expect(runUpdate).not.toHaveBeenCalled();
    });

    it('should invert the opposite pair when only that one is cached', async () => {
      const { updater } = createUpdater(store);

      const result = await createService(store, updater).getRate('USD', 'BTC');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.rate).toBeCloseTo(1 / 67250.5, 15);
        expect(result.value.derivation).toBe('inverse');
        expect(result.value.updatedAt).toBe(TEST_REFRESH_TIME);
      }
    });

    it('should triangulate through the bridge currency', async () => {
      const { updater } = createUpdater(store);
      const now = REFRESHED_AT + 60 * SECOND_MS;

      const result = await createService(store, updater, now).getRate('RUB', 'EUR');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.rate).toBeCloseTo(0.01016 * 0.927, 12);
        expect(result.value.derivation).toBe('triangulated');
        expect(result.value.updatedAt).toBe(new Date(now).toISOString());
      }
      // Computed quotes are not written back
      expect(store.snapshot?.entries.RUB_EUR).toBeUndefined();
    });

    it('should triangulate with inverted legs', async () => {
      const fiatOnly = new InMemoryRatesStore(createTestSnapshot({ EUR_USD: 1.0787, GBP_USD: 1.25 }));
      const { updater } = createUpdater(fiatOnly);

      const result = await createService(fiatOnly, updater).getRate('EUR', 'GBP');

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.rate).toBeCloseTo(1.0787 / 1.25, 12);
        expect(result.value.derivation).toBe('triangulated');
      }
    });

    it('should report a pair that cannot be derived', async () => {
      const { updater } = createUpdater(store);

      const result = await createService(store, updater).getRate('XAU', 'EUR');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(RatesErrorCode.RATE_UNAVAILABLE_ERROR);
        expect(result.error.message).toBe('Rate unavailable for pair XAU→EUR');
      }
    });

    it('should not triangulate when one side is the bridge itself', async () => {
      const { updater } = createUpdater(store);

      const result = await createService(store, updater).getRate('USD', 'GBP');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe('Rate unavailable for pair USD→GBP');
      }
    });
  });

  // ============================================================================
  // Staleness
  // ============================================================================

  describe('staleness', () => {
    it('should refresh a stale snapshot before answering', async () => {
      const refreshed = createTestSnapshot({ EUR_USD: 1.09 }, '2026-10-16T12:10:00.000Z');
      const { updater, runUpdate } = createUpdater(store, refreshed);
      const snapshotAge = 600 * SECOND_MS;

      const result = await createService(store, updater, REFRESHED_AT + snapshotAge).getRate('EUR', 'USD');

      expect(runUpdate).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.rate).toBe(1.09);
        expect(result.value.updatedAt).toBe('2026-10-16T12:10:00.000Z');
      }
    });

    it('should refresh when no snapshot exists yet', async () => {
      const emptyStore = new InMemoryRatesStore();
      const { updater, runUpdate } = createUpdater(emptyStore, createTestSnapshot({ EUR_USD: 1.08 }));

      const result = await createService(emptyStore, updater).getRate('EUR', 'USD');

      expect(runUpdate).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(true);
    });

    it('should answer from the old snapshot when the refresh fails', async () => {
      const { updater, runUpdate } = createUpdater(store);

      const result = await createService(store, updater, REFRESHED_AT + 600 * SECOND_MS).getRate('EUR', 'USD');

      expect(runUpdate).toHaveBeenCalledTimes(1);
      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.value.rate).toBe(1.0787);
      }
    });

    it('should answer from the old snapshot when the refresh throws', async () => {
      const updater: IRatesUpdater = {
        runUpdate: vi.fn(async (): Promise<UpdateResult> => {
          throw new Error('database is locked');
        }),
      };

      const result = await createService(store, updater, REFRESHED_AT + 600 * SECOND_MS).getRate('EUR', 'USD');

      expect(result.ok).toBe(true);
    });

    it('should report unavailable when there is still no snapshot after a failed refresh', async () => {
      const emptyStore = new InMemoryRatesStore();
      const { updater } = createUpdater(emptyStore);

      const result = await createService(emptyStore, updater).getRate('EUR', 'USD');

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe(RatesErrorCode.RATE_UNAVAILABLE_ERROR);
      }
    });
  });
});
