// src/rates/services/rate-ingestion.service.ts
import { Injectable } from '@nestjs/common';
import { LoggerService } from '../../common/logger/logger.service';
import { InvalidDateException } from '../../common/exceptions/invalid-date.exception';
import { RateRepository } from '../repositories/rate.repository';
import { BinanceApiService } from './binance-api.service';
import { RateCacheService } from './rate-cache.service';
import { CryptoPair, SUPPORTED_PAIRS } from '../config/crypto-pairs.config';
import { truncateToSeconds } from '../config/time.config';
import {
  IngestionRequest,
  RunSummary,
} from '../interfaces/ingestion.interface';

type PairOutcome =
  | { pair: CryptoPair; status: 'saved' }
  | { pair: CryptoPair; status: 'skipped' }
  | { pair: CryptoPair; status: 'failed'; reason: string };

/**
 * One ingestion run: fetch current prices and store one point per pair at
 * a shared, second-precision timestamp.
 *
 * Pairs are independent. A failure for one pair is recorded in the summary
 * and never stops the others. Prices come from a single batch request made
 * on the first pair that needs one; pairs already stored for the timestamp
 * never trigger it.
 */
@Injectable()
export class RateIngestionService {
  constructor(
    private readonly binanceApiService: BinanceApiService,
    private readonly rateRepository: RateRepository,
    private readonly cacheService: RateCacheService,
    private readonly logger: LoggerService,
  ) {}

  /**
   * @throws InvalidDateException when `requestedAt` is an Invalid Date
   */
  async run(request: IngestionRequest = {}): Promise<RunSummary> {
    if (request.requestedAt && Number.isNaN(request.requestedAt.getTime())) {
      throw new InvalidDateException(
        String(request.requestedAt),
        'INVALID_INSTANT',
      );
    }

    const startedAt = Date.now();
    const recordedAt = truncateToSeconds(request.requestedAt ?? new Date());
    const pairs = [...new Set(request.pairs ?? SUPPORTED_PAIRS)];
    const invalidateCache = request.invalidateCache ?? true;

    this.logger.log(
      `Starting rate ingestion for ${pairs.join(', ')}`,
      'RateIngestionService',
      { recordedAt: recordedAt.toISOString(), invalidateCache },
    );

    let batch: Promise<Map<CryptoPair, string>> | undefined;
    const prices = (): Promise<Map<CryptoPair, string>> => {
      batch ??= this.binanceApiService.getAllCurrentPrices();
      return batch;
    };

    const summary: RunSummary = {
      recordedAt: recordedAt.toISOString(),
      succeeded: [],
      skipped: [],
      failed: {},
      durationMs: 0,
    };

    for (const pair of pairs) {
      const outcome = await this.ingestPair(pair, recordedAt, prices);

      switch (outcome.status) {
        case 'saved':
          summary.succeeded.push(pair);
          if (invalidateCache) {
            await this.cacheService.invalidatePair(pair, recordedAt);
          }
          break;
        case 'skipped':
          summary.skipped.push(pair);
          break;
        case 'failed':
          summary.failed[pair] = outcome.reason;
          break;
      }
    }

    summary.durationMs = Date.now() - startedAt;

    const failedCount = Object.keys(summary.failed).length;
    const message = `Rate ingestion finished: ${summary.succeeded.length} saved, ${summary.skipped.length} skipped, ${failedCount} failed`;
    const meta = {
      recordedAt: summary.recordedAt,
      failed: summary.failed,
      durationMs: summary.durationMs,
    };
    if (failedCount > 0) {
      this.logger.warn(message, 'RateIngestionService', meta);
    } else {
      this.logger.log(message, 'RateIngestionService', meta);
    }

    return summary;
  }

  private async ingestPair(
    pair: CryptoPair,
    recordedAt: Date,
    prices: () => Promise<Map<CryptoPair, string>>,
  ): Promise<PairOutcome> {
    try {
      if (await this.rateRepository.existsForPairAndTime(pair, recordedAt)) {
        this.logger.debug(
          `Rate for ${pair} at ${recordedAt.toISOString()} already stored`,
          'RateIngestionService',
        );
        return { pair, status: 'skipped' };
      }

      const price = (await prices()).get(pair);
      if (price === undefined) {
        return { pair, status: 'failed', reason: 'Price not available' };
      }

      const inserted = await this.rateRepository.save({ pair, price, recordedAt });
      if (!inserted) {
        // Lost a race with a concurrent run for the same timestamp.
        return { pair, status: 'skipped' };
      }

      this.logger.log(`Saved ${pair} rate ${price}`, 'RateIngestionService', {
        pair,
        price,
        recordedAt: recordedAt.toISOString(),
      });
      return { pair, status: 'saved' };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.error(err, 'RateIngestionService', { pair });
      return { pair, status: 'failed', reason: err.message };
    }
  }
}
