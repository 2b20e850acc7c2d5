/**
 * Listing Date Validator
 *
 * Decides whether a date fragment scraped from an index page denotes today.
 * Missing or unreadable dates pass: dropping a valid paper is worse than
 * attaching a slightly stale one.
 */

import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

const FULL_DATE = /(\d{1,2})\s*\/\s*(\d{1,2})\s*\/\s*(\d{4})/;
const SHORT_DATE = /(\d{1,2})\s*\/\s*(\d{1,2})/;

function toCalendarDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

function isRealDate({ year, month, day }: CalendarDate): boolean {
  const probe = new Date(year, month - 1, day);
  return probe.getFullYear() === year && probe.getMonth() === month - 1 && probe.getDate() === day;
}

export function formatCalendarDate({ year, month, day }: CalendarDate): string {
  return `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Parse a "D/M/YYYY" or "D/M" fragment found anywhere in the text.
 *
 * Yearless dates take the current year, except a December date seen in
 * January, which belongs to the previous year.
 *
 * @returns the parsed date, or null when no pattern is present
 * @throws Error when the pattern names a day that does not exist
 */
export function parseListingDate(dateText: string, now: Date = new Date()): CalendarDate | null {
  const today = toCalendarDate(now);
  let parsed: CalendarDate | null = null;

  const full = FULL_DATE.exec(dateText);
  if (full) {
    parsed = { day: Number(full[1]), month: Number(full[2]), year: Number(full[3]) };
  } else {
    const short = SHORT_DATE.exec(dateText);
    if (short) {
      const day = Number(short[1]);
      const month = Number(short[2]);
      const year = month === 12 && today.month === 1 ? today.year - 1 : today.year;
      parsed = { day, month, year };
    }
  }

  if (parsed && !isRealDate(parsed)) {
    throw new Error(`Not a calendar date: ${dateText.trim()}`);
  }

  return parsed;
}

/**
 * Check whether a listing's date text denotes the current local day
 */
export function isToday(dateText: string | null | undefined, now: Date = new Date()): boolean {
  if (!dateText || !dateText.trim()) {
    return true;
  }

  try {
    const parsed = parseListingDate(dateText, now);
    if (!parsed) {
      logger.debug({ dateText }, 'No date pattern found, assuming current');
      return true;
    }

    const paperDate = formatCalendarDate(parsed);
    const currentDate = formatCalendarDate(toCalendarDate(now));

    if (paperDate === currentDate) {
      logger.debug({ paperDate }, 'Date match');
      return true;
    }

    logger.info({ paperDate, currentDate }, 'Listing date is old, skipping');
    return false;
  } catch (error) {
    logger.warn({ error: errorMessage(error), dateText }, 'Date parsing failed, proceeding by default');
    return true;
  }
}
