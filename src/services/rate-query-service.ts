/**
 * RateQueryService - answers rate(from -> to) from the snapshot
 *
 * Lookup order: identity, direct pair, inverse pair, then a single hop
 * through the bridge currency (each leg direct or inverse). A stale or
 * missing snapshot is refreshed first; when that refresh fails the query
 * still answers from whatever snapshot exists.
 */

import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import type {
  CacheSnapshot,
  IRatesStore,
  IRatesUpdater,
  RateDerivation,
  RateQuote,
} from '../types/rates.types.js';
import { normalizeCurrencyCode, pairKey } from '../utils/currency.js';
import { LogEvents, RatesLogger, createSilentLogger, type IRatesLogger } from '../utils/rates-logger.js';

export const DEFAULT_BRIDGE_CURRENCY = 'USD';

/** Source reported on identity quotes */
export const IDENTITY_SOURCE = 'identity';

export interface RateQueryServiceConfig {
  store: IRatesStore;
  updater: IRatesUpdater;
  /** Snapshot age at which a refresh is triggered */
  cacheTtlMs: number;
  /** Currency used for triangulation (default: USD) */
  bridgeCurrency?: string;
  logger?: IRatesLogger;
  clock?: () => Date;
}

interface Leg {
  rate: number;
  updatedAt: string;
  source: string;
  derivation: Extract<RateDerivation, 'direct' | 'inverse'>;
}

export class RateQueryService {
  private readonly store: IRatesStore;
  private readonly updater: IRatesUpdater;
  private readonly cacheTtlMs: number;
  private readonly bridgeCurrency: string;
  private readonly logger: IRatesLogger;
  private readonly clock: () => Date;

  constructor(config: RateQueryServiceConfig) {
    this.store = config.store;
    this.updater = config.updater;
    this.cacheTtlMs = config.cacheTtlMs;
    this.bridgeCurrency = (config.bridgeCurrency ?? DEFAULT_BRIDGE_CURRENCY).toUpperCase();
    this.logger = config.logger ?? createSilentLogger('query');
    this.clock = config.clock ?? (() => new Date());
  }

  /**
   * Rate to convert one unit of `from` into `to`
   */
  async getRate(from: string, to: string): Promise<Result<RateQuote>> {
    const fromCode = normalizeCurrencyCode(from);
    if (!fromCode.ok) return fromCode;
    const toCode = normalizeCurrencyCode(to);
    if (!toCode.ok) return toCode;

    const source = fromCode.value;
    const target = toCode.value;

    if (source === target) {
      return ok({
        from: source,
        to: target,
        rate: 1,
        updatedAt: this.clock().toISOString(),
        source: IDENTITY_SOURCE,
        derivation: 'identity',
      });
    }

    await this.refreshIfStale(source, target);

    const snapshot = await this.store.loadSnapshot();
    const quote = snapshot ? this.resolve(snapshot, source, target) : null;
    if (quote) {
      return ok(quote);
    }

    this.logger.warn(LogEvents.RATE_UNAVAILABLE, {
      from: source,
      to: target,
      lastRefresh: snapshot?.lastRefresh,
    });
    return err(
      new RatesError(
        `Rate unavailable for pair ${source}→${target}`,
        RatesErrorCode.RATE_UNAVAILABLE_ERROR
      )
    );
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async refreshIfStale(from: string, to: string): Promise<void> {
    if (!(await this.store.isStale(this.cacheTtlMs, this.clock()))) {
      return;
    }

    this.logger.info(LogEvents.RATE_REFRESH_TRIGGERED, { from, to });
    try {
      const result = await this.updater.runUpdate();
      if (result.status === 'failed') {
        this.logger.warn(LogEvents.RATE_REFRESH_TRIGGERED, {
          from,
          to,
          status: result.status,
          failedSourceCount: result.failedSources.length,
          message: 'Refresh failed; answering from the existing snapshot',
        });
      }
    } catch (error) {
      this.logger.error(LogEvents.ERROR, {
        from,
        to,
        error: RatesLogger.sanitizeErrorMessage(error),
        message: 'Refresh threw; answering from the existing snapshot',
      });
    }
  }

  private resolve(snapshot: CacheSnapshot, from: string, to: string): RateQuote | null {
    const leg = findLeg(snapshot, from, to);
    if (leg) {
      return { from, to, rate: leg.rate, updatedAt: leg.updatedAt, source: leg.source, derivation: leg.derivation };
    }

    if (from === this.bridgeCurrency || to === this.bridgeCurrency) {
      return null;
    }

    const first = findLeg(snapshot, from, this.bridgeCurrency);
    const second = findLeg(snapshot, this.bridgeCurrency, to);
    if (!first || !second) {
      return null;
    }

    return {
      from,
      to,
      rate: first.rate * second.rate,
      updatedAt: this.clock().toISOString(),
      source: first.source === second.source ? first.source : `${first.source}, ${second.source}`,
      derivation: 'triangulated',
    };
  }
}

/**
 * Direct entry for from_to, else the inverted to_from entry
 */
function findLeg(snapshot: CacheSnapshot, from: string, to: string): Leg | null {
  const direct = snapshot.entries[pairKey({ base: from, quote: to })];
  if (direct) {
    return { rate: direct.rate, updatedAt: direct.updatedAt, source: direct.source, derivation: 'direct' };
  }

  const inverse = snapshot.entries[pairKey({ base: to, quote: from })];
  if (inverse && inverse.rate > 0) {
    return { rate: 1 / inverse.rate, updatedAt: inverse.updatedAt, source: inverse.source, derivation: 'inverse' };
  }

  return null;
}
