// src/scripts/fetch-rates.ts
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../app.module';
import { RateIngestionService } from '../rates/services/rate-ingestion.service';
import { parseFetchArgs } from './script-args';

async function fetchRates() {
  const options = parseFetchArgs(process.argv.slice(2));

  console.log('📈 Fetching current cryptocurrency rates...\n');

  const app = await NestFactory.createApplicationContext(AppModule);
  const ingestionService = app.get(RateIngestionService);

  try {
    const summary = await ingestionService.run(options);

    console.log(`Recorded at: ${summary.recordedAt}`);
    console.log(`✅ Saved: ${summary.succeeded.join(', ') || 'none'}`);
    console.log(`⏭️  Skipped: ${summary.skipped.join(', ') || 'none'}`);
    for (const [pair, reason] of Object.entries(summary.failed)) {
      console.error(`❌ ${pair}: ${reason}`);
    }
    console.log(`\nCompleted in ${summary.durationMs}ms`);

    if (Object.keys(summary.failed).length > 0) {
      process.exitCode = 1;
    }
  } finally {
    await app.close();
  }
}

fetchRates().catch((error) => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
