// src/rates/dtos/rate-query.dto.ts
import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import { CryptoPair } from '../config/crypto-pairs.config';

// Pair support is checked by the controller so that it maps to INVALID_PAIR.
export class RateQueryDto {
  @ApiProperty({
    description: 'Trading pair',
    example: 'EUR/BTC',
    enum: CryptoPair,
  })
  @IsString()
  @IsNotEmpty()
  pair!: string;
}

export class DailyRateQueryDto extends RateQueryDto {
  @ApiProperty({
    description: 'Calendar day in UTC (YYYY-MM-DD), not in the future',
    example: '2024-01-15',
  })
  @IsString()
  @IsNotEmpty()
  date!: string;
}
