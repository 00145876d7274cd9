// src/rates/interfaces/health-status.interface.ts
import { CryptoPair } from '../config/crypto-pairs.config';
import { LatestRatesSnapshot } from './rate-response.interface';

export interface DataFreshness {
  all_fresh: boolean;
  pairs: Partial<Record<CryptoPair, boolean>>;
  check_time: string;
}

interface ReportedHealth {
  latest_rates: LatestRatesSnapshot;
  data_freshness: DataFreshness;
  price_source_available: boolean;
  cache_available: boolean;
  timestamp: string;
}

export type HealthStatus =
  | ({ status: 'healthy' } & ReportedHealth)
  | ({ status: 'degraded' } & ReportedHealth)
  | { status: 'unhealthy'; error: string; timestamp: string };
