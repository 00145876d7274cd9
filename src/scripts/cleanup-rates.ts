// src/scripts/cleanup-rates.ts
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from '../app.module';
import { RateRepository } from '../rates/repositories/rate.repository';
import { TIME_CONFIG } from '../rates/config/time.config';
import { parseRetentionDays } from './script-args';

const DEFAULT_RETENTION_DAYS = 365;

async function cleanupRates() {
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const configured = Number(
      app.get(ConfigService).get<string>('RATES_RETENTION_DAYS'),
    );
    const days = parseRetentionDays(
      process.argv.slice(2),
      Number.isInteger(configured) && configured > 0
        ? configured
        : DEFAULT_RETENTION_DAYS,
    );
    const cutoff = new Date(Date.now() - days * TIME_CONFIG.DAY_MS);

    console.log(`🧹 Deleting rates recorded before ${cutoff.toISOString()}...`);

    const deleted = await app.get(RateRepository).deleteOlderThan(cutoff);

    console.log(`✅ Deleted ${deleted} rates older than ${days} days`);
  } finally {
    await app.close();
  }
}

cleanupRates().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
