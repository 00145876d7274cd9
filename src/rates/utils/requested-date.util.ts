// src/rates/utils/requested-date.util.ts
import { InvalidDateException } from '../../common/exceptions/invalid-date.exception';
import { parseCalendarDate, startOfDay } from '../config/time.config';

/**
 * Validates a client supplied YYYY-MM-DD date: it must be a real calendar
 * date and not later than today in the reference zone.
 */
export function parseRequestedDate(value: string, now: Date = new Date()): Date {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new InvalidDateException(value, 'MALFORMED');
  }
  if (date.getTime() > startOfDay(now).getTime()) {
    throw new InvalidDateException(value, 'FUTURE');
  }
  return date;
}
