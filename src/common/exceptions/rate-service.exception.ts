// src/common/exceptions/rate-service.exception.ts

/**
 * Catch-all for unexpected failures at the query / ingestion boundary.
 * The original error is kept as `cause` for logs; it is never exposed to
 * API clients outside debug mode.
 */
export class RateServiceException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RateServiceException';
  }
}
