// src/rates/services/binance-api.service.ts
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import {
  BINANCE_SYMBOLS,
  CryptoPair,
  SUPPORTED_PAIRS,
  isSupportedPair,
  pairForSymbol,
} from '../config/crypto-pairs.config';
import { TickerPriceDto } from '../dtos/ticker-price.dto';
import { normalizePrice } from '../utils/price.util';
import {
  DecodingException,
  InvalidResponseException,
  ProtocolException,
  RetryExhaustedException,
  TransportException,
  UnsupportedPairException,
} from '../../common/exceptions/price-source.exception';

export const BINANCE_HTTP_CLIENT = Symbol('BINANCE_HTTP_CLIENT');

export const BINANCE_DEFAULTS = {
  BASE_URL: 'https://api.binance.com/api/v3',
  TIMEOUT_MS: 10000,
  MAX_RETRIES: 3,
  RETRY_DELAY_MS: 1000,
} as const;

// Numeric env setting; anything non-numeric or below `min` gives the default.
function numericSetting(
  configService: ConfigService,
  key: string,
  fallback: number,
  min: number,
): number {
  const value = Number(configService.get<string>(key));
  return Number.isFinite(value) && value >= min ? value : fallback;
}

/**
 * Builds the axios instance used by {@link BinanceApiService}. Response
 * bodies are kept as raw text so status and JSON decoding are classified
 * by the service, not by axios.
 */
export function createBinanceHttpClient(
  configService: ConfigService,
): AxiosInstance {
  return axios.create({
    baseURL: configService.get<string>(
      'BINANCE_BASE_URL',
      BINANCE_DEFAULTS.BASE_URL,
    ),
    timeout: numericSetting(
      configService,
      'BINANCE_TIMEOUT_MS',
      BINANCE_DEFAULTS.TIMEOUT_MS,
      1,
    ),
    headers: {
      Accept: 'application/json',
      'User-Agent': 'CryptoRatesService/1.0',
    },
    responseType: 'text',
    transformResponse: [(data: string) => data],
    validateStatus: () => true,
  });
}

/**
 * Backoff before the next attempt grows linearly with the attempt number.
 */
export function retryDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * attempt;
}

@Injectable()
export class BinanceApiService {
  private readonly logger = new Logger(BinanceApiService.name);
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(
    @Inject(BINANCE_HTTP_CLIENT) private readonly http: AxiosInstance,
    private readonly configService: ConfigService,
  ) {
    this.maxRetries = Math.floor(
      numericSetting(
        this.configService,
        'BINANCE_MAX_RETRIES',
        BINANCE_DEFAULTS.MAX_RETRIES,
        1,
      ),
    );
    this.retryDelayMs = numericSetting(
      this.configService,
      'BINANCE_RETRY_DELAY_MS',
      BINANCE_DEFAULTS.RETRY_DELAY_MS,
      0,
    );
  }

  /**
   * Fetch the current price for one pair.
   *
   * @returns the price as a decimal string with 8 places
   * @throws UnsupportedPairException before any network call for unknown pairs
   * @throws InvalidResponseException when the price is missing or not positive
   */
  async getCurrentPrice(pair: string): Promise<string> {
    const symbol = this.mapPairToSymbol(pair);

    this.logger.log(`Fetching current price for ${pair} (${symbol})`);

    const payload = await this.request('/ticker/price', { symbol });
    const ticker = this.parseTicker(payload);

    if (!ticker) {
      throw new InvalidResponseException(
        "Invalid response format: missing 'price' field",
        pair,
        { payload },
      );
    }

    const price = normalizePrice(ticker.price);
    if (price === null) {
      throw new InvalidResponseException(
        `Invalid price received: ${ticker.price}`,
        pair,
        { payload },
      );
    }

    this.logger.log(`Fetched price for ${pair}: ${price}`);
    return price;
  }

  /**
   * Fetch prices for every supported pair in a single request. Entries with
   * a missing, untracked or non-positive price are dropped.
   *
   * @throws InvalidResponseException when no usable price remains
   */
  async getAllCurrentPrices(): Promise<Map<CryptoPair, string>> {
    const symbols = SUPPORTED_PAIRS.map((pair) => BINANCE_SYMBOLS[pair]);

    this.logger.log(`Fetching current prices for ${symbols.join(', ')}`);

    const payload = await this.request('/ticker/price', {
      symbols: JSON.stringify(symbols),
    });

    if (!Array.isArray(payload)) {
      throw new InvalidResponseException(
        'Invalid response format: expected array',
        'ALL_PAIRS',
        { payload },
      );
    }

    const prices = new Map<CryptoPair, string>();

    for (const item of payload) {
      const ticker = this.parseTicker(item);
      if (!ticker) {
        this.logger.warn(`Invalid item in response: ${JSON.stringify(item)}`);
        continue;
      }

      const pair = pairForSymbol(ticker.symbol);
      if (!pair) {
        continue;
      }

      const price = normalizePrice(ticker.price);
      if (price === null) {
        this.logger.warn(
          `Invalid price for symbol ${ticker.symbol}: ${ticker.price}`,
        );
        continue;
      }

      prices.set(pair, price);
    }

    if (prices.size === 0) {
      throw new InvalidResponseException(
        'No valid prices received from API',
        'ALL_PAIRS',
        { payload },
      );
    }

    this.logger.log(
      `Fetched ${prices.size} prices: ${[...prices.keys()].join(', ')}`,
    );
    return prices;
  }

  /**
   * Liveness probe. Never throws.
   */
  async isApiAvailable(): Promise<boolean> {
    try {
      await this.request('/ping');
      return true;
    } catch (error) {
      this.logger.warn(
        `Price source health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  getSupportedPairs(): CryptoPair[] {
    return [...SUPPORTED_PAIRS];
  }

  private mapPairToSymbol(pair: string): string {
    if (!isSupportedPair(pair)) {
      throw new UnsupportedPairException(pair, SUPPORTED_PAIRS);
    }
    return BINANCE_SYMBOLS[pair];
  }

  private parseTicker(item: unknown): TickerPriceDto | null {
    if (typeof item !== 'object' || item === null || Array.isArray(item)) {
      return null;
    }
    const ticker = plainToInstance(TickerPriceDto, item);
    return validateSync(ticker).length === 0 ? ticker : null;
  }

  /**
   * GET with retry on transport failures only. Non-2xx statuses and
   * undecodable bodies fail on the first occurrence.
   */
  private async request(
    endpoint: string,
    params?: Record<string, string>,
  ): Promise<unknown> {
    let lastError: TransportException | undefined;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      let response: AxiosResponse<string>;

      try {
        response = await this.http.get<string>(endpoint, { params });
      } catch (error) {
        if (!axios.isAxiosError(error)) {
          throw error;
        }

        lastError = new TransportException(error.message, endpoint, {
          attempt,
          code: error.code,
        });
        this.logger.warn(
          `Transport error on ${endpoint} (attempt ${attempt}/${this.maxRetries}): ${error.message}`,
        );

        if (attempt < this.maxRetries) {
          await this.wait(retryDelay(this.retryDelayMs, attempt));
        }
        continue;
      }

      if (response.status < 200 || response.status >= 300) {
        throw new ProtocolException(endpoint, response.status, {
          attempt,
          params,
        });
      }

      const body = this.decode(endpoint, response.data);
      this.logger.debug(`Request to ${endpoint} succeeded on attempt ${attempt}`);
      return body;
    }

    throw new RetryExhaustedException(endpoint, this.maxRetries, lastError);
  }

  private decode(endpoint: string, body: unknown): unknown {
    if (typeof body !== 'string') {
      return body;
    }
    try {
      const decoded: unknown = JSON.parse(body);
      return decoded;
    } catch (error) {
      throw new DecodingException(
        `JSON decoding error: ${error instanceof Error ? error.message : String(error)}`,
        endpoint,
        { body: body.slice(0, 200) },
        { cause: error },
      );
    }
  }

  private wait(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
