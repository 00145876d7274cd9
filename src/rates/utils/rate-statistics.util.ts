// src/rates/utils/rate-statistics.util.ts
import Big from 'big.js';
import { RATES_API_CONFIG } from '../config/api.config';
import { CryptoPair } from '../config/crypto-pairs.config';
import {
  RateItem,
  RateResponse,
  RateStatistics,
} from '../interfaces/rate-response.interface';

export interface PricedPoint {
  price: string;
  recordedAt: Date;
}

const { PRICE_PRECISION, PERCENTAGE_PRECISION } = RATES_API_CONFIG;

/**
 * Oldest first. Points sharing a timestamp keep their input order.
 */
export function sortByRecordedAt<T extends PricedPoint>(points: readonly T[]): T[] {
  return [...points].sort(
    (a, b) => a.recordedAt.getTime() - b.recordedAt.getTime(),
  );
}

/**
 * Aggregate statistics over a set of points, or null for an empty set.
 *
 * First and last are taken by `recordedAt`, whatever order the points
 * arrive in. The percentage change is 0 when the first price is 0.
 */
export function computeStatistics(
  points: readonly PricedPoint[],
): RateStatistics | null {
  if (points.length === 0) {
    return null;
  }

  const prices = sortByRecordedAt(points).map((point) => new Big(point.price));
  const first = prices[0];
  const last = prices[prices.length - 1];

  let min = first;
  let max = first;
  let sum = new Big(0);
  for (const price of prices) {
    if (price.lt(min)) min = price;
    if (price.gt(max)) max = price;
    sum = sum.plus(price);
  }

  const change = last.minus(first);
  const changePercent = first.eq(0)
    ? new Big(0)
    : change.div(first).times(100);

  return {
    min_price: min.toFixed(PRICE_PRECISION),
    max_price: max.toFixed(PRICE_PRECISION),
    avg_price: sum.div(prices.length).toFixed(PRICE_PRECISION),
    price_change: change.toFixed(PRICE_PRECISION),
    price_change_percent: changePercent.toFixed(PERCENTAGE_PRECISION),
    total_records: prices.length,
  };
}

export function toRateItem(point: PricedPoint): RateItem {
  return {
    price: new Big(point.price).toFixed(PRICE_PRECISION),
    recorded_at: point.recordedAt.toISOString(),
    timestamp: Math.floor(point.recordedAt.getTime() / 1000),
  };
}

/**
 * Full response body for a period, or null when the period is empty.
 */
export function buildRateResponse(
  pair: CryptoPair,
  points: readonly PricedPoint[],
  requestedPeriod: string,
  generatedAt: Date,
): RateResponse | null {
  const statistics = computeStatistics(points);
  if (!statistics) {
    return null;
  }

  const rates = sortByRecordedAt(points).map(toRateItem);
  return {
    pair,
    requested_period: requestedPeriod,
    statistics,
    rates,
    generated_at: generatedAt.toISOString(),
    count: rates.length,
  };
}
