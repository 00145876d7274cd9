// src/rates/config/crypto-pairs.config.ts

export enum CryptoPair {
  EUR_BTC = 'EUR/BTC',
  EUR_ETH = 'EUR/ETH',
  EUR_LTC = 'EUR/LTC',
}

export const SUPPORTED_PAIRS: readonly CryptoPair[] = [
  CryptoPair.EUR_BTC,
  CryptoPair.EUR_ETH,
  CryptoPair.EUR_LTC,
];

// Binance ticker symbols
export const BINANCE_SYMBOLS: Record<CryptoPair, string> = {
  [CryptoPair.EUR_BTC]: 'BTCEUR',
  [CryptoPair.EUR_ETH]: 'ETHEUR',
  [CryptoPair.EUR_LTC]: 'LTCEUR',
};

const PAIRS_BY_SYMBOL: ReadonlyMap<string, CryptoPair> = new Map(
  SUPPORTED_PAIRS.map((pair) => [BINANCE_SYMBOLS[pair], pair]),
);

export function isSupportedPair(value: string): value is CryptoPair {
  return SUPPORTED_PAIRS.some((pair) => pair === value);
}

export function pairForSymbol(symbol: string): CryptoPair | undefined {
  return PAIRS_BY_SYMBOL.get(symbol);
}
