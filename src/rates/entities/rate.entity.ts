// src/rates/entities/rate.entity.ts
import {
  Entity,
  Column,
  PrimaryGeneratedColumn,
  CreateDateColumn,
  Index,
  Unique,
} from 'typeorm';
import { CryptoPair } from '../config/crypto-pairs.config';

/**
 * One immutable price observation. `price` stays a decimal string end to
 * end; Postgres `numeric` values are returned as strings by the pg driver.
 */
@Entity('rates')
@Unique('uq_rates_pair_recorded_at', ['pair', 'recordedAt'])
@Index('idx_pair_recorded_at', ['pair', 'recordedAt'])
export class Rate {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 10 })
  pair!: CryptoPair;

  @Column('decimal', { precision: 20, scale: 8 })
  price!: string;

  @Column({ name: 'recorded_at', type: 'timestamptz' })
  @Index('idx_recorded_at')
  recordedAt!: Date;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;
}
