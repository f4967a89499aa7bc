/**
 * Currency code and pair helpers
 */

import { RatesError, RatesErrorCode, err, ok, type Result } from '../errors/rates-errors.js';
import type { CurrencyPair } from '../types/rates.types.js';

/** 2-5 ASCII letters */
const CURRENCY_CODE_PATTERN = /^[A-Za-z]{2,5}$/;

/** Separator used in "BASE_QUOTE" keys */
export const PAIR_SEPARATOR = '_';

/**
 * Validate and upper-case a currency code
 */
export function normalizeCurrencyCode(code: string): Result<string> {
  const trimmed = code.trim();
  if (!CURRENCY_CODE_PATTERN.test(trimmed)) {
    return err(
      new RatesError(
        `Invalid currency code '${code}': expected 2-5 letters`,
        RatesErrorCode.VALIDATION_ERROR
      )
    );
  }
  return ok(trimmed.toUpperCase());
}

export function isValidCurrencyCode(code: string): boolean {
  return normalizeCurrencyCode(code).ok;
}

/**
 * Build a validated pair from two codes
 */
export function createPair(base: string, quote: string): Result<CurrencyPair> {
  const b = normalizeCurrencyCode(base);
  if (!b.ok) return b;
  const q = normalizeCurrencyCode(quote);
  if (!q.ok) return q;
  return ok({ base: b.value, quote: q.value });
}

export function pairKey(pair: CurrencyPair): string {
  return `${pair.base}${PAIR_SEPARATOR}${pair.quote}`;
}

/**
 * Parse a "BASE_QUOTE" key back into a pair
 */
export function parsePairKey(key: string): Result<CurrencyPair> {
  const parts = key.split(PAIR_SEPARATOR);
  if (parts.length !== 2) {
    return err(
      new RatesError(`Invalid pair key '${key}': expected BASE_QUOTE`, RatesErrorCode.VALIDATION_ERROR)
    );
  }
  return createPair(parts[0], parts[1]);
}
