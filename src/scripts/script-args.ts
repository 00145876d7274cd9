// src/scripts/script-args.ts
import { CryptoPair, isSupportedPair } from '../rates/config/crypto-pairs.config';

export interface FetchScriptOptions {
  pairs?: CryptoPair[];
  invalidateCache: boolean;
}

/**
 * Reads `--pairs=EUR/BTC,EUR/ETH` and `--no-invalidate` from argv.
 *
 * @throws Error on an unsupported pair
 */
export function parseFetchArgs(argv: readonly string[]): FetchScriptOptions {
  const options: FetchScriptOptions = { invalidateCache: true };

  for (const arg of argv) {
    if (arg === '--no-invalidate') {
      options.invalidateCache = false;
    } else if (arg.startsWith('--pairs=')) {
      const pairs: CryptoPair[] = [];
      for (const value of arg.slice('--pairs='.length).split(',')) {
        const pair = value.trim();
        if (!isSupportedPair(pair)) {
          throw new Error(`Unsupported trading pair: ${pair}`);
        }
        pairs.push(pair);
      }
      options.pairs = pairs;
    }
  }

  return options;
}

/**
 * Reads `--days=N` (a positive integer), falling back to `defaultDays`.
 */
export function parseRetentionDays(
  argv: readonly string[],
  defaultDays: number,
): number {
  const arg = argv.find((value) => value.startsWith('--days='));
  if (!arg) {
    return defaultDays;
  }
  const days = Number(arg.slice('--days='.length));
  if (!Number.isInteger(days) || days <= 0) {
    throw new Error(`Invalid --days value: ${arg}`);
  }
  return days;
}
