// src/rates/services/rate-cache.service.ts
import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CACHE_BACKEND,
  CacheBackend,
} from '../../common/cache/cache-backend.interface';
import { LoggerService } from '../../common/logger/logger.service';
import {
  CACHE_TTL_ENV,
  CacheTier,
  DEFAULT_CACHE_TTL,
  dailyRatesKey,
  recentRatesKey,
  snapshotKeysTouching,
} from '../config/cache.config';
import { CryptoPair } from '../config/crypto-pairs.config';
import { formatCalendarDate, startOfDay } from '../config/time.config';

export type CacheLookup<T> = { found: true; value: T } | { found: false };

const MISS: CacheLookup<never> = { found: false };

/**
 * Advisory cache for rate queries.
 *
 * Callers implement cache-aside themselves: `lookup`, and on a miss compute
 * the value and `store` it. There is no single-flight: concurrent misses on
 * one key each compute and each write their own value.
 *
 * Backend failures never propagate. A failed lookup is a miss, a failed
 * write or delete is logged and dropped.
 */
@Injectable()
export class RateCacheService {
  private readonly ttl: Record<CacheTier, number>;

  constructor(
    @Inject(CACHE_BACKEND) private readonly backend: CacheBackend,
    private readonly logger: LoggerService,
    configService: ConfigService,
  ) {
    const ttlFor = (tier: CacheTier): number => {
      const configured = Number(configService.get<string>(CACHE_TTL_ENV[tier]));
      return Number.isFinite(configured) && configured > 0
        ? configured
        : DEFAULT_CACHE_TTL[tier];
    };
    this.ttl = {
      [CacheTier.RECENT]: ttlFor(CacheTier.RECENT),
      [CacheTier.HISTORICAL]: ttlFor(CacheTier.HISTORICAL),
      [CacheTier.SNAPSHOT]: ttlFor(CacheTier.SNAPSHOT),
    };
  }

  ttlFor(tier: CacheTier): number {
    return this.ttl[tier];
  }

  /**
   * TTL for a calendar-day query: a day fully in the past is immutable and
   * gets the historical tier, today (or later) the recent tier.
   */
  ttlForDay(date: Date, now: Date = new Date()): number {
    return startOfDay(date).getTime() < startOfDay(now).getTime()
      ? this.ttl[CacheTier.HISTORICAL]
      : this.ttl[CacheTier.RECENT];
  }

  async lookup<T>(key: string): Promise<CacheLookup<T>> {
    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (error) {
      this.logger.error(this.asError(error), 'RateCacheService.lookup', {
        cacheKey: key,
      });
      return MISS;
    }

    if (raw === null) {
      return MISS;
    }

    try {
      const value: T = JSON.parse(raw);
      return { found: true, value };
    } catch (error) {
      this.logger.warn(
        `Discarding unreadable cache entry ${key}: ${this.asError(error).message}`,
        'RateCacheService',
      );
      return MISS;
    }
  }

  async store<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), ttlSeconds);
    } catch (error) {
      this.logger.error(this.asError(error), 'RateCacheService.store', {
        cacheKey: key,
        ttl: ttlSeconds,
      });
    }
  }

  /**
   * Drops every entry that new data for `pair` can make stale: the rolling
   * window, today's day and each snapshot containing the pair. Past days
   * are left alone.
   */
  async invalidatePair(pair: CryptoPair, now: Date = new Date()): Promise<string[]> {
    const keys = [
      recentRatesKey(pair),
      dailyRatesKey(pair, formatCalendarDate(now)),
      ...snapshotKeysTouching(pair),
    ];

    try {
      await this.backend.del(keys);
      this.logger.log(`Cache invalidated for ${pair}`, 'RateCacheService', {
        pair,
        invalidatedKeys: keys,
      });
    } catch (error) {
      this.logger.warn(
        `Cache invalidation failed for ${pair}: ${this.asError(error).message}`,
        'RateCacheService',
      );
    }

    return keys;
  }

  private asError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
