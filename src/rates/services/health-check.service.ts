// src/rates/services/health-check.service.ts
import { Injectable } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { RedisService } from '../../common/redis/redis.service';
import { RateService } from './rate.service';
import { BinanceApiService } from './binance-api.service';
import { CryptoPair, SUPPORTED_PAIRS } from '../config/crypto-pairs.config';
import { HealthStatus } from '../interfaces/health-status.interface';

/**
 * Reports whether every pair has recent data. A failing store makes the
 * service unhealthy; stale pairs only degrade it.
 */
@Injectable()
export class HealthCheckService {
  constructor(
    private readonly rateService: RateService,
    private readonly binanceApiService: BinanceApiService,
    private readonly redisService: RedisService,
    private readonly logger: LoggerService,
  ) {}

  async getHealthStatus(now: Date = new Date()): Promise<HealthStatus> {
    const timestamp = now.toISOString();

    try {
      const latestRates = await this.rateService.getLatestRatesSnapshot();

      const entries = await Promise.all(
        SUPPORTED_PAIRS.map(
          async (pair) =>
            [pair, await this.rateService.hasRecentData(pair, now)] as const,
        ),
      );
      const pairs: Partial<Record<CryptoPair, boolean>> = {};
      for (const [pair, fresh] of entries) {
        pairs[pair] = fresh;
      }
      const allFresh = entries.every(([, fresh]) => fresh);

      const [priceSourceAvailable, cacheAvailable] = await Promise.all([
        this.binanceApiService.isApiAvailable(),
        this.redisService.ping(),
      ]);

      return {
        status: allFresh ? 'healthy' : 'degraded',
        latest_rates: latestRates,
        data_freshness: {
          all_fresh: allFresh,
          pairs,
          check_time: timestamp,
        },
        price_source_available: priceSourceAvailable,
        cache_available: cacheAvailable,
        timestamp,
      };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(err, 'HealthCheckService');
      return { status: 'unhealthy', error: err.message, timestamp };
    }
  }
}
