// src/rates/interfaces/ingestion.interface.ts
import { CryptoPair } from '../config/crypto-pairs.config';

export interface IngestionRequest {
  // Defaults to every supported pair
  pairs?: readonly CryptoPair[];
  // Defaults to true
  invalidateCache?: boolean;
  // Defaults to now; truncated to whole seconds
  requestedAt?: Date;
}

export interface RunSummary {
  recordedAt: string;
  succeeded: CryptoPair[];
  // Already stored for this timestamp
  skipped: CryptoPair[];
  failed: Partial<Record<CryptoPair, string>>;
  durationMs: number;
}

/**
 * Wire shape of an asynchronous ingestion message.
 */
export interface FetchRatesMessage {
  pairs: string[];
  invalidateCache: boolean;
  requestedAt: string;
}
