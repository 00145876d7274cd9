// test/unit-tests/rate-fetch.scheduler.spec.ts

import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { RateFetchScheduler } from '../../src/rates/services/rate-fetch.scheduler';
import { RateIngestionService } from '../../src/rates/services/rate-ingestion.service';
import { RunSummary } from '../../src/rates/interfaces/ingestion.interface';
import { CryptoPair } from '../../src/rates/config/crypto-pairs.config';
import { createConfigMock } from '../mocks/config.mock';

describe('RateFetchScheduler', () => {
  let ingestionService: { run: jest.Mock };

  const summary: RunSummary = {
    recordedAt: '2024-01-15T12:00:00.000Z',
    succeeded: [CryptoPair.EUR_BTC],
    skipped: [],
    failed: {},
    durationMs: 12,
  };

  const createScheduler = async (
    values: Record<string, string> = {},
  ): Promise<RateFetchScheduler> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RateFetchScheduler,
        { provide: RateIngestionService, useValue: ingestionService },
        { provide: ConfigService, useValue: createConfigMock(values) },
      ],
    }).compile();

    return module.get<RateFetchScheduler>(RateFetchScheduler);
  };

  beforeEach(() => {
    ingestionService = { run: jest.fn() };
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should run an ingestion with cache invalidation', async () => {
    ingestionService.run.mockResolvedValue(summary);
    const scheduler = await createScheduler();

    await expect(scheduler.fetchRates()).resolves.toEqual(summary);
    expect(ingestionService.run).toHaveBeenCalledWith({ invalidateCache: true });
  });

  it('should do nothing when disabled', async () => {
    const scheduler = await createScheduler({ RATES_SCHEDULER_ENABLED: 'false' });

    await expect(scheduler.fetchRates()).resolves.toBeNull();
    expect(ingestionService.run).not.toHaveBeenCalled();
  });

  it('should log and return null when the run throws', async () => {
    ingestionService.run.mockRejectedValue(new Error('database down'));
    const scheduler = await createScheduler();

    await expect(scheduler.fetchRates()).resolves.toBeNull();
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Scheduled rate fetch failed: database down',
    );
  });
});
