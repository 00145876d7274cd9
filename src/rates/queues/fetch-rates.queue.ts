// src/rates/queues/fetch-rates.queue.ts
import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConnectionOptions, Job, Queue, Worker } from 'bullmq';
import { RateIngestionService } from '../services/rate-ingestion.service';
import { isSupportedPair } from '../config/crypto-pairs.config';
import {
  FetchRatesMessage,
  IngestionRequest,
  RunSummary,
} from '../interfaces/ingestion.interface';

export const FETCH_RATES_QUEUE = 'rates.fetch';

/**
 * Turns a queued message into an ingestion request. Unknown pairs are
 * dropped; an unparseable timestamp falls back to the time of processing.
 */
export function toIngestionRequest(message: FetchRatesMessage): IngestionRequest {
  const pairs = message.pairs.filter(isSupportedPair);
  const requestedAt = new Date(message.requestedAt);

  return {
    pairs: pairs.length > 0 ? pairs : undefined,
    invalidateCache: message.invalidateCache === true,
    requestedAt: Number.isNaN(requestedAt.getTime()) ? undefined : requestedAt,
  };
}

/**
 * Asynchronous ingestion trigger backed by BullMQ. Disabled unless
 * RATES_QUEUE_ENABLED is "true".
 */
@Injectable()
export class FetchRatesQueue implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(FetchRatesQueue.name);
  private readonly enabled: boolean;
  private queue?: Queue<FetchRatesMessage, RunSummary>;
  private worker?: Worker<FetchRatesMessage, RunSummary>;

  constructor(
    private readonly ingestionService: RateIngestionService,
    private readonly configService: ConfigService,
  ) {
    this.enabled =
      this.configService.get<string>('RATES_QUEUE_ENABLED', 'false') === 'true';
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  onModuleInit(): void {
    if (!this.enabled) {
      this.logger.log('Rate fetch queue disabled');
      return;
    }

    const connection: ConnectionOptions = {
      host: this.configService.get<string>('REDIS_HOST', 'localhost'),
      port: Number(this.configService.get<string>('REDIS_PORT', '6379')),
      password: this.configService.get<string>('REDIS_PASSWORD') || undefined,
      maxRetriesPerRequest: null,
    };

    this.queue = new Queue<FetchRatesMessage, RunSummary>(FETCH_RATES_QUEUE, {
      connection,
    });
    this.worker = new Worker<FetchRatesMessage, RunSummary>(
      FETCH_RATES_QUEUE,
      (job: Job<FetchRatesMessage, RunSummary>) => this.handle(job.data),
      { connection },
    );

    this.worker.on('completed', (job) => {
      this.logger.log(`Job ${job.id} completed`);
    });
    this.worker.on('failed', (job, err) => {
      this.logger.error(`Job ${job?.id} failed: ${err.message}`);
    });
    // Broker connection errors
    this.worker.on('error', (err) => {
      this.logger.error(`Rate fetch worker error: ${err.message}`);
    });
    this.queue.on('error', (err) => {
      this.logger.error(`Rate fetch queue error: ${err.message}`);
    });

    this.logger.log(`Rate fetch worker listening on ${FETCH_RATES_QUEUE}`);
  }

  async onModuleDestroy(): Promise<void> {
    await this.worker?.close();
    await this.queue?.close();
  }

  /**
   * @returns the BullMQ job id
   * @throws Error when the queue is disabled
   */
  async enqueue(message: FetchRatesMessage): Promise<string> {
    if (!this.queue) {
      throw new Error('Rate fetch queue is disabled');
    }
    const job = await this.queue.add('fetch', message, {
      removeOnComplete: 100,
      removeOnFail: 100,
    });
    return job.id ?? '';
  }

  async handle(message: FetchRatesMessage): Promise<RunSummary> {
    return this.ingestionService.run(toIngestionRequest(message));
  }
}
