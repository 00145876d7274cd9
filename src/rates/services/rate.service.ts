// src/rates/services/rate.service.ts
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Big from 'big.js';
import { LoggerService } from '../../common/logger/logger.service';
import { RateServiceException } from '../../common/exceptions/rate-service.exception';
import { RateRepository } from '../repositories/rate.repository';
import { RateCacheService } from './rate-cache.service';
import { Rate } from '../entities/rate.entity';
import {
  CacheTier,
  dailyRatesKey,
  recentRatesKey,
  snapshotKey,
} from '../config/cache.config';
import { CryptoPair, SUPPORTED_PAIRS } from '../config/crypto-pairs.config';
import { TIME_CONFIG } from '../config/time.config';
import { RATES_API_CONFIG, dayPeriod } from '../config/api.config';
import {
  LatestRatesSnapshot,
  PeriodStatistics,
  RateQueryResult,
} from '../interfaces/rate-response.interface';
import { buildRateResponse } from '../utils/rate-statistics.util';
import { parseRequestedDate } from '../utils/requested-date.util';

/**
 * Read side: recent window, calendar day and latest-snapshot queries, each
 * served cache-aside, plus push-down statistics and freshness checks.
 */
@Injectable()
export class RateService {
  private readonly freshnessThresholdMs: number;

  constructor(
    private readonly rateRepository: RateRepository,
    private readonly cacheService: RateCacheService,
    private readonly logger: LoggerService,
    configService: ConfigService,
  ) {
    const seconds = Number(
      configService.get<string>(
        'RATES_FRESHNESS_THRESHOLD_SECONDS',
        String(TIME_CONFIG.FRESHNESS_THRESHOLD_SECONDS),
      ),
    );
    this.freshnessThresholdMs =
      (Number.isFinite(seconds) && seconds > 0
        ? seconds
        : TIME_CONFIG.FRESHNESS_THRESHOLD_SECONDS) * 1000;
  }

  /**
   * Rates for the rolling window ending now. Only the default 24h window is
   * cached; other window lengths always hit the store.
   */
  async getLast24HoursRates(
    pair: CryptoPair,
    windowMs: number = TIME_CONFIG.RECENT_WINDOW_MS,
    now: Date = new Date(),
  ): Promise<RateQueryResult> {
    this.logger.log(`Fetching last 24h rates for ${pair}`, 'RateService');

    const period = RATES_API_CONFIG.PERIODS.LAST_24H;
    const load = async (): Promise<RateQueryResult> => {
      const start = new Date(now.getTime() - windowMs);
      const rates = await this.rateRepository.findRange(pair, start, now);
      return this.toResult(pair, rates, period, now);
    };

    try {
      const result =
        windowMs === TIME_CONFIG.RECENT_WINDOW_MS
          ? await this.readThrough(
              recentRatesKey(pair),
              this.cacheService.ttlFor(CacheTier.RECENT),
              load,
            )
          : await load();

      this.logResult(result);
      return result;
    } catch (error) {
      this.logger.error(this.asError(error), 'RateService', { pair, period });
      throw new RateServiceException(
        `Failed to fetch last 24h rates for ${pair}`,
        { cause: error },
      );
    }
  }

  /**
   * Rates recorded on one calendar day (UTC).
   *
   * @throws InvalidDateException for malformed or future dates
   */
  async getDailyRates(
    pair: CryptoPair,
    date: string,
    now: Date = new Date(),
  ): Promise<RateQueryResult> {
    const day = parseRequestedDate(date, now);
    const period = dayPeriod(date);

    this.logger.log(`Fetching daily rates for ${pair} on ${date}`, 'RateService');

    try {
      const result = await this.readThrough(
        dailyRatesKey(pair, date),
        this.cacheService.ttlForDay(day, now),
        async () => {
          const rates = await this.rateRepository.findByDay(pair, day);
          return this.toResult(pair, rates, period, now);
        },
      );

      this.logResult(result);
      return result;
    } catch (error) {
      this.logger.error(this.asError(error), 'RateService', { pair, date });
      throw new RateServiceException(
        `Failed to fetch daily rates for ${pair} on ${date}`,
        { cause: error },
      );
    }
  }

  /**
   * Newest `recordedAt` per pair. Pairs with no data are omitted.
   */
  async getLatestRatesSnapshot(
    pairs: readonly CryptoPair[] = SUPPORTED_PAIRS,
  ): Promise<LatestRatesSnapshot> {
    try {
      return await this.readThrough(
        snapshotKey(pairs),
        this.cacheService.ttlFor(CacheTier.SNAPSHOT),
        async () => {
          const latest = await Promise.all(
            pairs.map(async (pair) => ({
              pair,
              rate: await this.rateRepository.findLatestByPair(pair),
            })),
          );

          const snapshot: LatestRatesSnapshot = {};
          for (const { pair, rate } of latest) {
            if (rate) {
              snapshot[pair] = rate.recordedAt.toISOString();
            }
          }
          return snapshot;
        },
      );
    } catch (error) {
      this.logger.error(this.asError(error), 'RateService', { pairs });
      throw new RateServiceException('Failed to fetch latest rates snapshot', {
        cause: error,
      });
    }
  }

  /**
   * Min / max / avg / count computed by the database, or null when the
   * range holds no rows.
   */
  async getRateStatistics(
    pair: CryptoPair,
    start: Date,
    end: Date,
  ): Promise<PeriodStatistics | null> {
    try {
      const aggregate = await this.rateRepository.getRateStatistics(
        pair,
        start,
        end,
      );

      if (
        aggregate.totalRecords === 0 ||
        aggregate.minPrice === null ||
        aggregate.maxPrice === null ||
        aggregate.avgPrice === null
      ) {
        return null;
      }

      const scale = RATES_API_CONFIG.PRICE_PRECISION;
      return {
        pair,
        min_price: new Big(aggregate.minPrice).toFixed(scale),
        max_price: new Big(aggregate.maxPrice).toFixed(scale),
        avg_price: new Big(aggregate.avgPrice).toFixed(scale),
        total_records: aggregate.totalRecords,
        period_start: start.toISOString(),
        period_end: end.toISOString(),
      };
    } catch (error) {
      this.logger.error(this.asError(error), 'RateService', { pair });
      throw new RateServiceException(`Failed to fetch statistics for ${pair}`, {
        cause: error,
      });
    }
  }

  /**
   * True when the newest point for `pair` is within the freshness
   * threshold of `now`. Store errors count as "not fresh".
   */
  async hasRecentData(pair: CryptoPair, now: Date = new Date()): Promise<boolean> {
    try {
      const latest = await this.rateRepository.findLatestByPair(pair);
      if (!latest) {
        return false;
      }
      return now.getTime() - latest.recordedAt.getTime() <= this.freshnessThresholdMs;
    } catch (error) {
      this.logger.error(this.asError(error), 'RateService.hasRecentData', {
        pair,
      });
      return false;
    }
  }

  getSupportedPairs(): CryptoPair[] {
    return [...SUPPORTED_PAIRS];
  }

  // Cache-aside: serve a hit, otherwise compute and populate.
  private async readThrough<T>(
    key: string,
    ttlSeconds: number,
    compute: () => Promise<T>,
  ): Promise<T> {
    const cached = await this.cacheService.lookup<T>(key);
    if (cached.found) {
      this.logger.debug(`Cache hit for ${key}`, 'RateService');
      return cached.value;
    }

    const startedAt = Date.now();
    const value = await compute();
    this.logger.log(`Cache miss, generated ${key}`, 'RateService', {
      cacheKey: key,
      ttl: ttlSeconds,
      generationTimeMs: Date.now() - startedAt,
    });

    await this.cacheService.store(key, value, ttlSeconds);
    return value;
  }

  private toResult(
    pair: CryptoPair,
    rates: Rate[],
    period: string,
    now: Date,
  ): RateQueryResult {
    const data = buildRateResponse(pair, rates, period, now);
    return data
      ? { status: 'ok', data }
      : { status: 'no_data', pair, requestedPeriod: period };
  }

  private logResult(result: RateQueryResult): void {
    if (result.status === 'no_data') {
      this.logger.warn(
        `No rates found for ${result.pair} (${result.requestedPeriod})`,
        'RateService',
      );
    } else {
      this.logger.log(
        `Returning ${result.data.count} rates for ${result.data.pair} (${result.data.requested_period})`,
        'RateService',
      );
    }
  }

  private asError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
  }
}
