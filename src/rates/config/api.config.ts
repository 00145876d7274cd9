// src/rates/config/api.config.ts

export const RATES_API_CONFIG = {
  PERIODS: {
    LAST_24H: 'last-24h',
    DAY: 'day',
  },

  // Decimal places in API output
  PRICE_PRECISION: 8,
  PERCENTAGE_PRECISION: 2,
} as const;

export function dayPeriod(date: string): string {
  return `${RATES_API_CONFIG.PERIODS.DAY}:${date}`;
}
