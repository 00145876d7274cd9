// src/rates/dtos/ticker-price.dto.ts
import { Transform } from 'class-transformer';
import { IsNotEmpty, IsNumberString, IsString } from 'class-validator';

/**
 * One entry of the price source's ticker payload:
 * `{ "symbol": "BTCEUR", "price": "45000.12000000" }`.
 */
export class TickerPriceDto {
  @IsString()
  @IsNotEmpty()
  symbol!: string;

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'number' ? String(value) : value,
  )
  @IsNumberString()
  price!: string;
}
