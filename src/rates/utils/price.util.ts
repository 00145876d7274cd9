// src/rates/utils/price.util.ts
import Big from 'big.js';
import { RATES_API_CONFIG } from '../config/api.config';

/**
 * Parses a decimal price and renders it with the storage scale.
 * Returns null for non-numeric or non-positive input.
 */
export function normalizePrice(raw: string): string | null {
  let value: Big;
  try {
    value = new Big(raw);
  } catch {
    return null;
  }
  if (value.lte(0)) {
    return null;
  }
  return value.toFixed(RATES_API_CONFIG.PRICE_PRECISION);
}
