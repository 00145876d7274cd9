// src/rates/dtos/fetch-rates.dto.ts
import { ApiPropertyOptional } from '@nestjs/swagger';
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsEnum,
  IsISO8601,
  IsOptional,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import { CryptoPair } from '../config/crypto-pairs.config';

// ISO week (2024-W03-1) and ordinal (2024-015) dates pass IsISO8601 but do
// not parse to an instant.
@ValidatorConstraint({ name: 'IsParsableInstant', async: false })
export class IsParsableInstantConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === 'string' && !Number.isNaN(Date.parse(value));
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a date-time such as 2024-01-15T12:00:00Z`;
  }
}

export class FetchRatesDto {
  @ApiPropertyOptional({
    description: 'Pairs to fetch, all supported pairs when omitted',
    enum: CryptoPair,
    isArray: true,
    example: ['EUR/BTC'],
  })
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(CryptoPair, { each: true })
  pairs?: CryptoPair[];

  @ApiPropertyOptional({
    description: 'Drop cached query results for saved pairs',
    default: true,
  })
  @IsOptional()
  @IsBoolean()
  invalidateCache?: boolean;

  @ApiPropertyOptional({
    description: 'Timestamp to record the points at, defaults to now',
    example: '2024-01-15T12:00:00Z',
  })
  @IsOptional()
  @IsISO8601()
  @Validate(IsParsableInstantConstraint)
  requestedAt?: string;

  @ApiPropertyOptional({
    description: 'Queue the fetch instead of running it in the request',
    default: false,
  })
  @IsOptional()
  @IsBoolean()
  async?: boolean;
}
