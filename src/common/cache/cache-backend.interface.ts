// src/common/cache/cache-backend.interface.ts

/**
 * Minimal key-value contract the rate cache needs from its backend.
 * Implementations are expected to throw on backend failure; the caller
 * decides how failures are absorbed.
 */
export interface CacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(keys: string[]): Promise<number>;
}

export const CACHE_BACKEND = Symbol('CACHE_BACKEND');
