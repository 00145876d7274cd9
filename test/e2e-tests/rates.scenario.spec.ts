// test/e2e-tests/rates.scenario.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RateIngestionService } from '../../src/rates/services/rate-ingestion.service';
import { RateService } from '../../src/rates/services/rate.service';
import { RateCacheService } from '../../src/rates/services/rate-cache.service';
import { BinanceApiService } from '../../src/rates/services/binance-api.service';
import { RateRepository } from '../../src/rates/repositories/rate.repository';
import { CACHE_BACKEND } from '../../src/common/cache/cache-backend.interface';
import { LoggerService } from '../../src/common/logger/logger.service';
import { CryptoPair } from '../../src/rates/config/crypto-pairs.config';
import { RateQueryResult } from '../../src/rates/interfaces/rate-response.interface';
import { InMemoryRateRepository } from '../mocks/in-memory-rate.repository';
import { InMemoryCacheBackend } from '../mocks/in-memory-cache.backend';
import { createLoggerMock } from '../mocks/logger.mock';
import { createConfigMock } from '../mocks/config.mock';

/**
 * Ingestion and queries wired together over in-memory storage and cache;
 * only the price source is stubbed.
 */
describe('Rates ingestion and queries', () => {
  let ingestion: RateIngestionService;
  let rates: RateService;
  let repository: InMemoryRateRepository;
  let backend: InMemoryCacheBackend;
  let binanceApiService: { getAllCurrentPrices: jest.Mock };

  const T = new Date('2024-01-15T12:00:00Z');
  const minutesAfter = (minutes: number) =>
    new Date(T.getTime() + minutes * 60_000);

  const quote = (btc: string) =>
    binanceApiService.getAllCurrentPrices.mockResolvedValueOnce(
      new Map([[CryptoPair.EUR_BTC, btc]]),
    );

  const statisticsOf = (result: RateQueryResult) =>
    result.status === 'ok' ? result.data.statistics : null;

  beforeEach(async () => {
    repository = new InMemoryRateRepository();
    backend = new InMemoryCacheBackend();
    binanceApiService = { getAllCurrentPrices: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RateIngestionService,
        RateService,
        RateCacheService,
        { provide: BinanceApiService, useValue: binanceApiService },
        { provide: RateRepository, useValue: repository },
        { provide: CACHE_BACKEND, useValue: backend },
        { provide: LoggerService, useValue: createLoggerMock() },
        { provide: ConfigService, useValue: createConfigMock() },
      ],
    }).compile();

    ingestion = module.get<RateIngestionService>(RateIngestionService);
    rates = module.get<RateService>(RateService);
  });

  it('should report a single ingested point with a flat change', async () => {
    quote('45000.00000000');
    await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });

    const result = await rates.getLast24HoursRates(
      CryptoPair.EUR_BTC,
      undefined,
      minutesAfter(1),
    );

    expect(result.status === 'ok' && result.data.count).toBe(1);
    expect(statisticsOf(result)).toEqual({
      min_price: '45000.00000000',
      max_price: '45000.00000000',
      avg_price: '45000.00000000',
      price_change: '0.00000000',
      price_change_percent: '0.00',
      total_records: 1,
    });
  });

  it('should report the change across two points in the window', async () => {
    quote('45000.00000000');
    await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });
    quote('46000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: minutesAfter(5),
    });

    const result = await rates.getLast24HoursRates(
      CryptoPair.EUR_BTC,
      undefined,
      minutesAfter(6),
    );

    expect(statisticsOf(result)).toMatchObject({
      price_change: '1000.00000000',
      price_change_percent: '2.22',
    });
  });

  it('should store one point when the same timestamp is ingested twice', async () => {
    quote('45000.00000000');
    quote('45100.00000000');

    const first = await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });
    const second = await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });

    expect(first.succeeded).toEqual(['EUR/BTC']);
    expect(second.skipped).toEqual(['EUR/BTC']);
    expect(repository.count()).toBe(1);
  });

  it('should recompute the recent window after an invalidating ingestion', async () => {
    quote('45000.00000000');
    await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });

    const before = await rates.getLast24HoursRates(
      CryptoPair.EUR_BTC,
      undefined,
      minutesAfter(1),
    );
    expect(before.status === 'ok' && before.data.count).toBe(1);

    quote('46000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: minutesAfter(5),
      invalidateCache: true,
    });

    const after = await rates.getLast24HoursRates(
      CryptoPair.EUR_BTC,
      undefined,
      minutesAfter(6),
    );
    expect(after.status === 'ok' && after.data.count).toBe(2);
  });

  it('should serve the cached window until it is invalidated', async () => {
    quote('45000.00000000');
    await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });
    await rates.getLast24HoursRates(CryptoPair.EUR_BTC, undefined, minutesAfter(1));

    quote('46000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: minutesAfter(5),
      invalidateCache: false,
    });

    const cached = await rates.getLast24HoursRates(
      CryptoPair.EUR_BTC,
      undefined,
      minutesAfter(6),
    );
    expect(cached.status === 'ok' && cached.data.count).toBe(1);
  });

  it('should return only the points of the requested day, oldest first', async () => {
    quote('44000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: new Date('2024-01-14T23:59:59Z'),
    });
    quote('45500.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: new Date('2024-01-15T08:00:00Z'),
    });
    quote('45000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: new Date('2024-01-15T00:00:00Z'),
    });

    const result = await rates.getDailyRates(
      CryptoPair.EUR_BTC,
      '2024-01-15',
      T,
    );

    expect(result.status === 'ok' && result.data.rates).toEqual([
      {
        price: '45000.00000000',
        recorded_at: '2024-01-15T00:00:00.000Z',
        timestamp: 1705276800,
      },
      {
        price: '45500.00000000',
        recorded_at: '2024-01-15T08:00:00.000Z',
        timestamp: 1705305600,
      },
    ]);
  });

  it('should return the no-data result for an empty day', async () => {
    await expect(
      rates.getDailyRates(CryptoPair.EUR_ETH, '2024-01-10', T),
    ).resolves.toEqual({
      status: 'no_data',
      pair: 'EUR/ETH',
      requestedPeriod: 'day:2024-01-10',
    });
  });

  it('should compute statistics in the store', async () => {
    quote('45000.00000000');
    await ingestion.run({ pairs: [CryptoPair.EUR_BTC], requestedAt: T });
    quote('46000.00000000');
    await ingestion.run({
      pairs: [CryptoPair.EUR_BTC],
      requestedAt: minutesAfter(5),
    });

    await expect(
      rates.getRateStatistics(
        CryptoPair.EUR_BTC,
        new Date('2024-01-15T00:00:00Z'),
        new Date('2024-01-15T23:59:59.999Z'),
      ),
    ).resolves.toMatchObject({
      min_price: '45000.00000000',
      max_price: '46000.00000000',
      avg_price: '45500.00000000',
      total_records: 2,
    });
  });
});
