// test/unit-tests/cache.config.spec.ts

import {
  dailyRatesKey,
  recentRatesKey,
  snapshotKey,
  snapshotKeysTouching,
} from '../../src/rates/config/cache.config';
import { CryptoPair } from '../../src/rates/config/crypto-pairs.config';

describe('rates cache keys', () => {
  it('should escape the pair separator', () => {
    expect(recentRatesKey(CryptoPair.EUR_BTC)).toBe('rates:recent:EUR%2FBTC');
    expect(dailyRatesKey(CryptoPair.EUR_LTC, '2024-01-15')).toBe(
      'rates:day:EUR%2FLTC:2024-01-15',
    );
  });

  it('should build one snapshot key per pair set, whatever the order', () => {
    expect(
      snapshotKey([CryptoPair.EUR_LTC, CryptoPair.EUR_BTC, CryptoPair.EUR_LTC]),
    ).toBe('rates:snapshot:EUR%2FBTC,EUR%2FLTC');
    expect(snapshotKey([CryptoPair.EUR_BTC, CryptoPair.EUR_LTC])).toBe(
      snapshotKey([CryptoPair.EUR_LTC, CryptoPair.EUR_BTC]),
    );
  });

  it('should enumerate every snapshot set containing a pair', () => {
    expect(snapshotKeysTouching(CryptoPair.EUR_LTC)).toEqual([
      'rates:snapshot:EUR%2FLTC',
      'rates:snapshot:EUR%2FBTC,EUR%2FLTC',
      'rates:snapshot:EUR%2FETH,EUR%2FLTC',
      'rates:snapshot:EUR%2FBTC,EUR%2FETH,EUR%2FLTC',
    ]);
  });
});
