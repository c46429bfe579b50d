// Time Helpers
// Purpose: Unix-second clock and time-zone aware calendar dates

import { TZDate } from '@date-fns/tz';
import config, { isValidTimeZone } from '../config/env';
import { ValidationError } from './errors';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Current time in whole Unix seconds
 */
export function nowUnix(): number {
  return Math.floor(Date.now() / 1000);
}

export function toUnix(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Interpret a Unix-second timestamp in a time zone
 */
export function fromUnix(unixSeconds: number, timeZone: string): TZDate {
  return new TZDate(unixSeconds * 1000, timeZone);
}

/**
 * Resolve an optional time-zone parameter, falling back to the configured zone
 */
export function resolveTimeZone(timeZone?: string): string {
  if (timeZone === undefined || timeZone === '') {
    return config.TIMEZONE;
  }
  if (!isValidTimeZone(timeZone)) {
    throw new ValidationError(`Unknown time zone: ${timeZone}`);
  }
  return timeZone;
}

/**
 * Parse a YYYY-MM-DD calendar date in a time zone.
 * Without a date string, returns the current instant in that zone.
 */
export function parseCalendarDate(value: string | undefined, timeZone: string): TZDate {
  if (value === undefined || value === '') {
    return new TZDate(Date.now(), timeZone);
  }

  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError('Date must be formatted as YYYY-MM-DD');
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new TZDate(year, month - 1, day, timeZone);

  // Rejects overflowing dates such as 2024-02-30
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new ValidationError(`Invalid calendar date: ${value}`);
  }

  return date;
}
