/** Placeholder emitted when an expiry cannot be turned into a local date. */
export const NOT_AVAILABLE = 'N/A';

const UTC_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

export type LocalDateResult =
  | { ok: true; date: string }
  | { ok: false; reason: 'malformed' | 'unknown-timezone' };

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat | null {
  const cached = formatters.get(timeZone);
  if (cached) return cached;

  try {
    const formatter = new Intl.DateTimeFormat('en-US', {
      timeZone,
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
    });
    formatters.set(timeZone, formatter);
    return formatter;
  } catch {
    return null;
  }
}

export function isKnownTimeZone(timeZone: string): boolean {
  return formatterFor(timeZone) !== null;
}

/**
 * Parse `YYYY-MM-DDTHH:MM:SSZ` strictly. Out-of-range fields (Feb 30, hour 24,
 * second 60) are rejected rather than rolled over.
 */
export function parseUtcTimestamp(value: string): Date | null {
  const match = UTC_TIMESTAMP.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hour = Number(match[4]);
  const minute = Number(match[5]);
  const second = Number(match[6]);

  if (year < 1 || month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }

  // setUTCFullYear keeps years below 100 literal, unlike Date.UTC.
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }

  return date;
}

/**
 * Civil date (`YYYY-MM-DD`) of a UTC timestamp in the given IANA time zone.
 */
export function resolveLocalDate(utc: string, timeZone: string): LocalDateResult {
  const instant = parseUtcTimestamp(utc);
  if (!instant) {
    return { ok: false, reason: 'malformed' };
  }

  const formatter = formatterFor(timeZone);
  if (!formatter) {
    return { ok: false, reason: 'unknown-timezone' };
  }

  const parts = formatter.formatToParts(instant);
  const year = parts.find((part) => part.type === 'year')?.value;
  const month = parts.find((part) => part.type === 'month')?.value;
  const day = parts.find((part) => part.type === 'day')?.value;
  if (!year || !month || !day) {
    return { ok: false, reason: 'malformed' };
  }

  return { ok: true, date: `${year.padStart(4, '0')}-${month}-${day}` };
}

export function convertTime(utc: string, timeZone: string): string {
  const result = resolveLocalDate(utc, timeZone);
  return result.ok ? result.date : NOT_AVAILABLE;
}
