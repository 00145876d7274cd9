// test/unit-tests/binance-api.service.spec.ts

import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosHeaders, AxiosResponse } from 'axios';
import {
  BINANCE_HTTP_CLIENT,
  BinanceApiService,
  retryDelay,
} from '../../src/rates/services/binance-api.service';
import { CryptoPair } from '../../src/rates/config/crypto-pairs.config';
import {
  DecodingException,
  InvalidResponseException,
  ProtocolException,
  RetryExhaustedException,
  UnsupportedPairException,
} from '../../src/common/exceptions/price-source.exception';
import { createConfigMock } from '../mocks/config.mock';

const response = (data: string, status = 200): AxiosResponse<string> => ({
  data,
  status,
  statusText: String(status),
  headers: {},
  config: { headers: new AxiosHeaders() },
});

const connectionRefused = () =>
  new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');

describe('BinanceApiService', () => {
  let service: BinanceApiService;
  let http: { get: jest.Mock };

  beforeEach(async () => {
    http = { get: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        BinanceApiService,
        { provide: BINANCE_HTTP_CLIENT, useValue: http },
        {
          provide: ConfigService,
          useValue: createConfigMock({
            BINANCE_MAX_RETRIES: '3',
            BINANCE_RETRY_DELAY_MS: '0',
          }),
        },
      ],
    }).compile();

    service = module.get<BinanceApiService>(BinanceApiService);
  });

  describe('getCurrentPrice', () => {
    it('should request the mapped symbol and return the price at 8 decimals', async () => {
      http.get.mockResolvedValue(
        response('{"symbol":"BTCEUR","price":"45000.12"}'),
      );

      const price = await service.getCurrentPrice('EUR/BTC');

      expect(price).toBe('45000.12000000');
      expect(http.get).toHaveBeenCalledWith('/ticker/price', {
        params: { symbol: 'BTCEUR' },
      });
    });

    it('should accept a numeric price', async () => {
      http.get.mockResolvedValue(
        response('{"symbol":"ETHEUR","price":2500.5}'),
      );

      await expect(service.getCurrentPrice('EUR/ETH')).resolves.toBe(
        '2500.50000000',
      );
    });

    it('should succeed on the third attempt after two transport errors', async () => {
      http.get
        .mockRejectedValueOnce(connectionRefused())
        .mockRejectedValueOnce(connectionRefused())
        .mockResolvedValueOnce(
          response('{"symbol":"BTCEUR","price":"45000.00"}'),
        );

      await expect(service.getCurrentPrice('EUR/BTC')).resolves.toBe(
        '45000.00000000',
      );
      expect(http.get).toHaveBeenCalledTimes(3);
    });

    it('should raise RetryExhaustedException when all attempts fail', async () => {
      http.get.mockRejectedValue(connectionRefused());

      const call = service.getCurrentPrice('EUR/BTC');

      await expect(call).rejects.toBeInstanceOf(RetryExhaustedException);
      await expect(call).rejects.toMatchObject({
        attempts: 3,
        message:
          'Transport error after 3 attempts: connect ECONNREFUSED 127.0.0.1:443',
      });
      expect(http.get).toHaveBeenCalledTimes(3);
    });

    it('should not retry a non-2xx status', async () => {
      http.get.mockResolvedValue(response('{"code":-1121}', 400));

      const call = service.getCurrentPrice('EUR/BTC');

      await expect(call).rejects.toBeInstanceOf(ProtocolException);
      await expect(call).rejects.toMatchObject({ status: 400 });
      expect(http.get).toHaveBeenCalledTimes(1);
    });

    it('should not retry an undecodable body', async () => {
      http.get.mockResolvedValue(response('<html>maintenance</html>'));

      await expect(service.getCurrentPrice('EUR/BTC')).rejects.toBeInstanceOf(
        DecodingException,
      );
      expect(http.get).toHaveBeenCalledTimes(1);
    });

    it('should reject an unsupported pair without any request', async () => {
      await expect(service.getCurrentPrice('EUR/DOGE')).rejects.toBeInstanceOf(
        UnsupportedPairException,
      );
      expect(http.get).not.toHaveBeenCalled();
    });

    it('should reject a payload without a price', async () => {
      http.get.mockResolvedValue(response('{"symbol":"BTCEUR"}'));

      await expect(service.getCurrentPrice('EUR/BTC')).rejects.toThrow(
        new InvalidResponseException(
          "Invalid response format: missing 'price' field",
          'EUR/BTC',
        ),
      );
    });

    it('should reject a non-positive price', async () => {
      http.get.mockResolvedValue(response('{"symbol":"BTCEUR","price":"0"}'));

      await expect(service.getCurrentPrice('EUR/BTC')).rejects.toThrow(
        'Invalid price received: 0',
      );
    });
  });

  describe('getAllCurrentPrices', () => {
    it('should fetch every symbol in one request', async () => {
      http.get.mockResolvedValue(
        response(
          JSON.stringify([
            { symbol: 'BTCEUR', price: '45000.00' },
            { symbol: 'ETHEUR', price: '2500.00' },
            { symbol: 'LTCEUR', price: '70.00' },
          ]),
        ),
      );

      const prices = await service.getAllCurrentPrices();

      expect(http.get).toHaveBeenCalledTimes(1);
      expect(http.get).toHaveBeenCalledWith('/ticker/price', {
        params: { symbols: '["BTCEUR","ETHEUR","LTCEUR"]' },
      });
      expect([...prices.entries()]).toEqual([
        [CryptoPair.EUR_BTC, '45000.00000000'],
        [CryptoPair.EUR_ETH, '2500.00000000'],
        [CryptoPair.EUR_LTC, '70.00000000'],
      ]);
    });

    it('should drop invalid, untracked and non-positive entries', async () => {
      http.get.mockResolvedValue(
        response(
          JSON.stringify([
            { symbol: 'BTCEUR', price: '45000.00' },
            { symbol: 'ETHEUR', price: '-1' },
            { symbol: 'XRPEUR', price: '0.50' },
            { symbol: 'LTCEUR' },
            'garbage',
          ]),
        ),
      );

      const prices = await service.getAllCurrentPrices();

      expect([...prices.entries()]).toEqual([
        [CryptoPair.EUR_BTC, '45000.00000000'],
      ]);
    });

    it('should reject a payload that is not an array', async () => {
      http.get.mockResolvedValue(response('{"symbol":"BTCEUR","price":"1"}'));

      await expect(service.getAllCurrentPrices()).rejects.toThrow(
        'Invalid response format: expected array',
      );
    });

    it('should reject when no usable price remains', async () => {
      http.get.mockResolvedValue(response('[]'));

      await expect(service.getAllCurrentPrices()).rejects.toThrow(
        'No valid prices received from API',
      );
    });
  });

  describe('isApiAvailable', () => {
    it('should return true when ping answers', async () => {
      http.get.mockResolvedValue(response('{}'));

      await expect(service.isApiAvailable()).resolves.toBe(true);
      expect(http.get).toHaveBeenCalledWith('/ping', { params: undefined });
    });

    it('should return false instead of throwing', async () => {
      http.get.mockResolvedValue(response('', 503));

      await expect(service.isApiAvailable()).resolves.toBe(false);
    });
  });

  it('should list the supported pairs', () => {
    expect(service.getSupportedPairs()).toEqual(['EUR/BTC', 'EUR/ETH', 'EUR/LTC']);
  });

  describe('retryDelay', () => {
    it('should grow linearly with the attempt number', () => {
      expect(retryDelay(1000, 1)).toBe(1000);
      expect(retryDelay(1000, 2)).toBe(2000);
      expect(retryDelay(1000, 3)).toBe(3000);
    });
  });

  describe('with a non-numeric retry setting', () => {
    it('should fall back to the default attempt count', async () => {
      const module: TestingModule = await Test.createTestingModule({
        providers: [
          BinanceApiService,
          { provide: BINANCE_HTTP_CLIENT, useValue: http },
          {
            provide: ConfigService,
            useValue: createConfigMock({
              BINANCE_MAX_RETRIES: 'three',
              BINANCE_RETRY_DELAY_MS: '0',
            }),
          },
        ],
      }).compile();
      const fallbackService = module.get<BinanceApiService>(BinanceApiService);
      http.get.mockRejectedValue(connectionRefused());

      const call = fallbackService.getCurrentPrice('EUR/BTC');

      await expect(call).rejects.toMatchObject({ attempts: 3 });
      expect(http.get).toHaveBeenCalledTimes(3);
    });
  });
});
