// src/rates/interfaces/rate-response.interface.ts
import { CryptoPair } from '../config/crypto-pairs.config';

export interface RateStatistics {
  min_price: string;
  max_price: string;
  avg_price: string;
  price_change: string;
  price_change_percent: string;
  total_records: number;
}

export interface RateItem {
  price: string;
  recorded_at: string;
  // Unix seconds
  timestamp: number;
}

export interface RateResponse {
  pair: CryptoPair;
  requested_period: string;
  statistics: RateStatistics;
  rates: RateItem[];
  generated_at: string;
  count: number;
}

/**
 * An empty range is an ordinary outcome, not an error.
 */
export type RateQueryResult =
  | { status: 'ok'; data: RateResponse }
  | { status: 'no_data'; pair: CryptoPair; requestedPeriod: string };

/**
 * ISO-8601 `recordedAt` of the newest point per pair. Pairs without data
 * are absent.
 */
export type LatestRatesSnapshot = Partial<Record<CryptoPair, string>>;

export interface PeriodStatistics {
  pair: CryptoPair;
  min_price: string;
  max_price: string;
  avg_price: string;
  total_records: number;
  period_start: string;
  period_end: string;
}
