// src/common/redis/redis.service.ts

import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { LoggerService } from '../logger/logger.service';
import { CacheBackend } from '../cache/cache-backend.interface';

/**
 * RedisService owns the ioredis connection and exposes the small key-value
 * surface the rate cache is built on.
 *
 * Every command rejects on failure; the cache layer decides whether an
 * error is a miss or is ignored.
 */
@Injectable()
export class RedisService implements CacheBackend, OnModuleDestroy {
  private client: Redis;

  /**
   * @param configService - Provides REDIS_HOST / REDIS_PORT / REDIS_PASSWORD.
   * @param logger - Receives connection-level errors.
   */
  constructor(
    private configService: ConfigService,
    private readonly logger: LoggerService,
  ) {
    this.client = new Redis({
      host: this.configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(this.configService.get<string>('REDIS_PORT', '6379')),
      password: this.configService.get<string>('REDIS_PASSWORD') || undefined,
      // Fail commands fast while disconnected instead of queueing them.
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
    });

    this.client.on('error', (err: Error) => {
      this.logger.error(err, 'RedisService');
    });
  }

  async onModuleDestroy(): Promise<void> {
    try {
      await this.client.quit();
      this.logger.log('Redis client disconnected successfully.', 'RedisService');
    } catch (error) {
      this.logger.error(
        error instanceof Error ? error : new Error(String(error)),
        'RedisService',
      );
    }
  }

  /**
   * Retrieves the value stored under a key, or null when absent.
   */
  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  /**
   * Stores a value with an expiry in seconds.
   *
   * Example Usage:
   * ```typescript
   * await this.redisService.set('rates:recent:EUR%2FBTC', payload, 300);
   * ```
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, 'EX', ttlSeconds);
  }

  /**
   * Deletes keys and returns how many existed.
   */
  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }
    return this.client.del(...keys);
  }

  /**
   * Liveness probe used by the health check.
   */
  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(
        `Redis ping failed: ${error instanceof Error ? error.message : String(error)}`,
        'RedisService',
      );
      return false;
    }
  }
}
