// src/rates/rates.module.ts
import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Rate } from './entities/rate.entity';
import { RateRepository } from './repositories/rate.repository';
import {
  BINANCE_HTTP_CLIENT,
  BinanceApiService,
  createBinanceHttpClient,
} from './services/binance-api.service';
import { RateCacheService } from './services/rate-cache.service';
import { RateService } from './services/rate.service';
import { RateIngestionService } from './services/rate-ingestion.service';
import { RateFetchScheduler } from './services/rate-fetch.scheduler';
import { HealthCheckService } from './services/health-check.service';
import { FetchRatesQueue } from './queues/fetch-rates.queue';
import { RatesController } from './controllers/rates.controller';
import { CACHE_BACKEND } from '../common/cache/cache-backend.interface';
import { RedisService } from '../common/redis/redis.service';

@Module({
  imports: [TypeOrmModule.forFeature([Rate])],
  controllers: [RatesController],
  providers: [
    RateRepository,
    {
      provide: BINANCE_HTTP_CLIENT,
      useFactory: createBinanceHttpClient,
      inject: [ConfigService],
    },
    { provide: CACHE_BACKEND, useExisting: RedisService },
    BinanceApiService,
    RateCacheService,
    RateService,
    RateIngestionService,
    RateFetchScheduler,
    FetchRatesQueue,
    HealthCheckService,
  ],
  exports: [RateRepository, RateService, RateIngestionService],
})
export class RatesModule {}
