// src/rates/config/time.config.ts

export const TIME_CONFIG = {
  DAY_MS: 86_400_000,

  // Rolling window used by the recent-rates query
  RECENT_WINDOW_MS: 86_400_000,
  // A pair is fresh when its latest point is at most this old
  FRESHNESS_THRESHOLD_SECONDS: 600,
} as const;

// Calendar-day boundaries are always UTC.
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parses a strict YYYY-MM-DD calendar date to midnight UTC.
 * Returns null for malformed strings and impossible dates (2024-02-30).
 */
export function parseCalendarDate(value: string): Date | null {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return null;
  }
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return formatCalendarDate(date) === value ? date : null;
}

export function formatCalendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function startOfDay(date: Date): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()),
  );
}

export function endOfDay(date: Date): Date {
  return new Date(startOfDay(date).getTime() + TIME_CONFIG.DAY_MS - 1);
}

export function truncateToSeconds(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}
