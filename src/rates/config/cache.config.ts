// src/rates/config/cache.config.ts
import { CryptoPair, SUPPORTED_PAIRS } from './crypto-pairs.config';

export enum CacheTier {
  // Rolling 24h window and today's calendar day
  RECENT = 'recent',
  // A calendar day fully in the past
  HISTORICAL = 'historical',
  // Latest-per-pair health view
  SNAPSHOT = 'snapshot',
}

// Defaults in seconds, overridable through CACHE_TTL_* variables
export const DEFAULT_CACHE_TTL: Readonly<Record<CacheTier, number>> = {
  [CacheTier.RECENT]: 300, // 5 minutes
  [CacheTier.HISTORICAL]: 3600, // 1 hour
  [CacheTier.SNAPSHOT]: 60, // 1 minute
};

export const CACHE_TTL_ENV: Readonly<Record<CacheTier, string>> = {
  [CacheTier.RECENT]: 'CACHE_TTL_RECENT',
  [CacheTier.HISTORICAL]: 'CACHE_TTL_HISTORICAL',
  [CacheTier.SNAPSHOT]: 'CACHE_TTL_SNAPSHOT',
};

export const RATES_CACHE_CONFIG = {
  PREFIXES: {
    RECENT: 'rates:recent',
    DAY: 'rates:day',
    SNAPSHOT: 'rates:snapshot',
  },
} as const;

const SEPARATOR = ':';

// Escaping each segment keeps ':' and '/' out of the variable parts, so
// different pairs or dates can never produce the same key.
const segment = (value: string): string => encodeURIComponent(value);

export function recentRatesKey(pair: CryptoPair): string {
  return [RATES_CACHE_CONFIG.PREFIXES.RECENT, segment(pair)].join(SEPARATOR);
}

export function dailyRatesKey(pair: CryptoPair, date: string): string {
  return [RATES_CACHE_CONFIG.PREFIXES.DAY, segment(pair), segment(date)].join(
    SEPARATOR,
  );
}

export function snapshotKey(pairs: readonly CryptoPair[]): string {
  const members = [...new Set(pairs)].sort().map(segment).join(',');
  return [RATES_CACHE_CONFIG.PREFIXES.SNAPSHOT, members].join(SEPARATOR);
}

/**
 * Every snapshot key whose pair set contains `pair`: one per subset of the
 * supported pairs that includes it.
 */
export function snapshotKeysTouching(pair: CryptoPair): string[] {
  const others = SUPPORTED_PAIRS.filter((p) => p !== pair);
  const keys: string[] = [];
  for (let mask = 0; mask < 1 << others.length; mask++) {
    const subset = others.filter((_, i) => (mask & (1 << i)) !== 0);
    keys.push(snapshotKey([pair, ...subset]));
  }
  return keys;
}
