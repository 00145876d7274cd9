// src/rates/services/rate-fetch.scheduler.ts
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { RateIngestionService } from './rate-ingestion.service';
import { RunSummary } from '../interfaces/ingestion.interface';

@Injectable()
export class RateFetchScheduler {
  private readonly logger = new Logger(RateFetchScheduler.name);
  private readonly enabled: boolean;

  constructor(
    private readonly ingestionService: RateIngestionService,
    configService: ConfigService,
  ) {
    this.enabled =
      configService.get<string>('RATES_SCHEDULER_ENABLED', 'true') !== 'false';
  }

  // Runs every 5 minutes
  @Cron(CronExpression.EVERY_5_MINUTES, { name: 'rates-fetch' })
  async fetchRates(): Promise<RunSummary | null> {
    if (!this.enabled) {
      return null;
    }

    this.logger.log('🔄 Scheduled rate fetch started');
    try {
      const summary = await this.ingestionService.run({ invalidateCache: true });
      this.logger.log(
        `✅ Scheduled rate fetch done in ${summary.durationMs}ms (${summary.succeeded.length} saved)`,
      );
      return summary;
    } catch (error) {
      this.logger.error(
        `Scheduled rate fetch failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
