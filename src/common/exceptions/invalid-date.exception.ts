// src/common/exceptions/invalid-date.exception.ts

export type InvalidDateReason = 'MALFORMED' | 'FUTURE' | 'INVALID_INSTANT';

const MESSAGES: Record<InvalidDateReason, (date: string) => string> = {
  MALFORMED: (date) => `Invalid date format: ${date}. Use YYYY-MM-DD format.`,
  FUTURE: (date) => `Date cannot be in the future: ${date}`,
  INVALID_INSTANT: (date) => `Invalid timestamp: ${date}`,
};

/**
 * Raised when a requested calendar date is malformed or lies in the future,
 * or when an ingestion timestamp is not a valid instant.
 * Mapped to a 400 by the API exception filter.
 */
export class InvalidDateException extends Error {
  constructor(
    readonly date: string,
    readonly reason: InvalidDateReason,
  ) {
    super(MESSAGES[reason](date));
    this.name = 'InvalidDateException';
  }
}
