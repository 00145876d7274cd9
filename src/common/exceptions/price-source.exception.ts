// src/common/exceptions/price-source.exception.ts

/**
 * Error kinds raised by the external price source client.
 *
 * Only `TransportException` is retryable; every other kind fails the call
 * immediately. `RetryExhaustedException` is the terminal error once the
 * allowed attempts for transport failures are used up.
 */
export type PriceSourceErrorKind =
  | 'UNSUPPORTED_PAIR'
  | 'TRANSPORT'
  | 'PROTOCOL'
  | 'DECODING'
  | 'INVALID_RESPONSE'
  | 'RETRY_EXHAUSTED';

export abstract class PriceSourceException extends Error {
  abstract readonly kind: PriceSourceErrorKind;

  /**
   * @param message - Human readable description (never sent to API clients).
   * @param subject - Pair or endpoint the failure relates to.
   * @param context - Extra diagnostic data for logs / debug responses.
   */
  constructor(
    message: string,
    readonly subject: string,
    readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toLogContext(): Record<string, unknown> {
    return {
      kind: this.kind,
      subject: this.subject,
      message: this.message,
      ...this.context,
    };
  }
}

export class UnsupportedPairException extends PriceSourceException {
  readonly kind = 'UNSUPPORTED_PAIR';

  constructor(pair: string, supported: readonly string[]) {
    super(
      `Unsupported trading pair: ${pair}. Supported pairs: ${supported.join(', ')}`,
      pair,
    );
  }
}

export class TransportException extends PriceSourceException {
  readonly kind = 'TRANSPORT';
}

export class ProtocolException extends PriceSourceException {
  readonly kind = 'PROTOCOL';

  constructor(
    endpoint: string,
    readonly status: number,
    context: Record<string, unknown> = {},
  ) {
    super(`HTTP ${status} response from price source`, endpoint, {
      status,
      ...context,
    });
  }
}

export class DecodingException extends PriceSourceException {
  readonly kind = 'DECODING';
}

export class InvalidResponseException extends PriceSourceException {
  readonly kind = 'INVALID_RESPONSE';
}

export class RetryExhaustedException extends PriceSourceException {
  readonly kind = 'RETRY_EXHAUSTED';

  constructor(
    endpoint: string,
    readonly attempts: number,
    lastError?: TransportException,
  ) {
    super(
      `Transport error after ${attempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      endpoint,
      { endpoint, attempts },
      { cause: lastError },
    );
  }
}
