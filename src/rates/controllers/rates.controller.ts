// src/rates/controllers/rates.controller.ts
import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  NotFoundException,
  Post,
  Query,
  Res,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { RateService } from '../services/rate.service';
import { RateIngestionService } from '../services/rate-ingestion.service';
import { HealthCheckService } from '../services/health-check.service';
import { FetchRatesQueue } from '../queues/fetch-rates.queue';
import { DailyRateQueryDto, RateQueryDto } from '../dtos/rate-query.dto';
import { FetchRatesDto } from '../dtos/fetch-rates.dto';
import {
  CryptoPair,
  SUPPORTED_PAIRS,
  isSupportedPair,
} from '../config/crypto-pairs.config';
import { UnsupportedPairException } from '../../common/exceptions/price-source.exception';
import { RateResponse } from '../interfaces/rate-response.interface';
import { RunSummary } from '../interfaces/ingestion.interface';
import { HealthStatus } from '../interfaces/health-status.interface';

// The part of the platform response the health endpoint touches.
interface StatusResponse {
  status(code: number): unknown;
}

export interface QueuedFetch {
  queued: true;
  jobId: string;
}

@Controller('api/rates')
@ApiTags('Rates')
export class RatesController {
  constructor(
    private readonly rateService: RateService,
    private readonly ingestionService: RateIngestionService,
    private readonly healthCheckService: HealthCheckService,
    private readonly fetchRatesQueue: FetchRatesQueue,
  ) {}

  @Get('last-24h')
  @ApiOperation({ summary: 'Rates and statistics for the last 24 hours' })
  @ApiResponse({ status: 200, description: 'Rates found' })
  @ApiResponse({ status: 400, description: 'Unsupported pair' })
  @ApiResponse({ status: 404, description: 'No rates in the window' })
  async getLast24Hours(@Query() query: RateQueryDto): Promise<RateResponse> {
    const pair = this.resolvePair(query.pair);
    const result = await this.rateService.getLast24HoursRates(pair);

    if (result.status === 'no_data') {
      throw new NotFoundException(
        `No rates found for ${pair} in the last 24 hours`,
      );
    }
    return result.data;
  }

  @Get('day')
  @ApiOperation({ summary: 'Rates and statistics for one calendar day (UTC)' })
  @ApiResponse({ status: 200, description: 'Rates found' })
  @ApiResponse({ status: 400, description: 'Unsupported pair or invalid date' })
  @ApiResponse({ status: 404, description: 'No rates on that day' })
  async getDay(@Query() query: DailyRateQueryDto): Promise<RateResponse> {
    const pair = this.resolvePair(query.pair);
    const result = await this.rateService.getDailyRates(pair, query.date);

    if (result.status === 'no_data') {
      throw new NotFoundException(`No rates found for ${pair} on ${query.date}`);
    }
    return result.data;
  }

  @Get('health')
  @ApiOperation({ summary: 'Data freshness and dependency status' })
  @ApiResponse({ status: 200, description: 'Healthy or degraded' })
  @ApiResponse({ status: 503, description: 'Unhealthy' })
  async health(
    @Res({ passthrough: true }) res: StatusResponse,
  ): Promise<HealthStatus> {
    const health = await this.healthCheckService.getHealthStatus();
    res.status(
      health.status === 'unhealthy'
        ? HttpStatus.SERVICE_UNAVAILABLE
        : HttpStatus.OK,
    );
    return health;
  }

  @Post('fetch')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Fetch and store current rates' })
  @ApiResponse({ status: 200, description: 'Run summary, or the queued job' })
  async fetch(@Body() dto: FetchRatesDto): Promise<RunSummary | QueuedFetch> {
    const invalidateCache = dto.invalidateCache ?? true;

    if (dto.async) {
      if (!this.fetchRatesQueue.isEnabled()) {
        throw new ServiceUnavailableException(
          'Asynchronous rate fetching is disabled',
        );
      }
      const jobId = await this.fetchRatesQueue.enqueue({
        pairs: dto.pairs ?? [...SUPPORTED_PAIRS],
        invalidateCache,
        requestedAt: dto.requestedAt ?? new Date().toISOString(),
      });
      return { queued: true, jobId };
    }

    return this.ingestionService.run({
      pairs: dto.pairs,
      invalidateCache,
      requestedAt: dto.requestedAt ? new Date(dto.requestedAt) : undefined,
    });
  }

  private resolvePair(pair: string): CryptoPair {
    if (!isSupportedPair(pair)) {
      throw new UnsupportedPairException(pair, SUPPORTED_PAIRS);
    }
    return pair;
  }
}
