// src/rates/repositories/rate.repository.ts
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Between, LessThan, Repository } from 'typeorm';
import { Rate } from '../entities/rate.entity';
import { CryptoPair } from '../config/crypto-pairs.config';
import { TIME_CONFIG, endOfDay, startOfDay } from '../config/time.config';

export interface NewRate {
  pair: CryptoPair;
  price: string;
  recordedAt: Date;
}

/**
 * Aggregates computed by the database. Prices are decimal strings, or null
 * when the range holds no rows.
 */
export interface RateAggregate {
  minPrice: string | null;
  maxPrice: string | null;
  avgPrice: string | null;
  totalRecords: number;
}

interface RawAggregateRow {
  min_price: string | null;
  max_price: string | null;
  avg_price: string | null;
  total_records: string | number | null;
}

/**
 * Append-only store of price points. The (pair, recorded_at) unique
 * constraint is the only duplicate guard; `save` relies on it rather than
 * on a prior existence check.
 */
@Injectable()
export class RateRepository {
  constructor(
    @InjectRepository(Rate)
    private readonly rateRepository: Repository<Rate>,
  ) {}

  /**
   * Inserts a point unless one already exists for (pair, recordedAt).
   *
   * @returns true when a row was inserted, false when it was a duplicate.
   */
  async save(rate: NewRate): Promise<boolean> {
    const result = await this.rateRepository
      .createQueryBuilder()
      .insert()
      .into(Rate)
      .values({
        pair: rate.pair,
        price: rate.price,
        recordedAt: rate.recordedAt,
      })
      .orIgnore()
      .returning(['id'])
      .execute();

    const rows: unknown = result.raw;
    return Array.isArray(rows) && rows.length > 0;
  }

  async existsForPairAndTime(
    pair: CryptoPair,
    recordedAt: Date,
  ): Promise<boolean> {
    const count = await this.rateRepository.count({
      where: { pair, recordedAt },
    });
    return count > 0;
  }

  /**
   * Points for a pair with start <= recordedAt <= end, oldest first.
   */
  async findRange(pair: CryptoPair, start: Date, end: Date): Promise<Rate[]> {
    return this.rateRepository.find({
      where: { pair, recordedAt: Between(start, end) },
      order: { recordedAt: 'ASC', id: 'ASC' },
    });
  }

  async findLast24Hours(pair: CryptoPair, now: Date = new Date()): Promise<Rate[]> {
    const since = new Date(now.getTime() - TIME_CONFIG.RECENT_WINDOW_MS);
    return this.findRange(pair, since, now);
  }

  async findByDay(pair: CryptoPair, date: Date): Promise<Rate[]> {
    return this.findRange(pair, startOfDay(date), endOfDay(date));
  }

  async findLatestByPair(pair: CryptoPair): Promise<Rate | null> {
    return this.rateRepository.findOne({
      where: { pair },
      order: { recordedAt: 'DESC' },
    });
  }

  async getRateStatistics(
    pair: CryptoPair,
    start: Date,
    end: Date,
  ): Promise<RateAggregate> {
    const row = await this.rateRepository
      .createQueryBuilder('r')
      .select('MIN(r.price)', 'min_price')
      .addSelect('MAX(r.price)', 'max_price')
      .addSelect('AVG(r.price)', 'avg_price')
      .addSelect('COUNT(r.id)', 'total_records')
      .where('r.pair = :pair', { pair })
      .andWhere('r.recordedAt >= :start', { start })
      .andWhere('r.recordedAt <= :end', { end })
      .getRawOne<RawAggregateRow>();

    return {
      minPrice: row?.min_price ?? null,
      maxPrice: row?.max_price ?? null,
      avgPrice: row?.avg_price ?? null,
      totalRecords: Number(row?.total_records ?? 0),
    };
  }

  /**
   * Retention sweep: removes every point recorded before `cutoff`.
   */
  async deleteOlderThan(cutoff: Date): Promise<number> {
    const result = await this.rateRepository.delete({
      recordedAt: LessThan(cutoff),
    });
    return result.affected ?? 0;
  }
}
