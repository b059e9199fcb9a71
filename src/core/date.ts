/**
 * Metadata date normalization.
 *
 * Both normalizers are pure: they log a warning and return `null` on
 * malformed input, and never look at other metadata.
 *
 * @module core/date
 */
import { logger } from '../logger.js';

/** Length of the RCS keyword prefix (`$Date: `) skipped by {@link normalizeRcsDate}. */
export const RCS_PREFIX_LENGTH = 7;

// Each integer may be preceded by whitespace; separators must match exactly.
// Only the leading part of the string has to match.
const SLASH_DATE_RE = /^\s*(\d+)\/\s*(\d+)\/\s*(\d+)/;
const DASH_DATE_RE = /^\s*(\d+)-\s*(\d+)-\s*(\d+)/;
// Every number is read whole: a day that runs into the hour is one number.
const RCS_DATE_RE = /^\s*(\d+)\/\s*(\d+)\/\s*(\d+)(?!\d)\s*(\d+):\s*(\d+):\s*(\d+)/;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format a date as `year-MM-DD`: year unpadded, month and day
 * zero-padded to two digits.
 */
export function formatCanonicalDate(year: number, month: number, day: number): string {
  return `${String(year)}-${pad2(month)}-${pad2(day)}`;
}

function fromMatch(match: RegExpExecArray): string {
  return formatCanonicalDate(
    parseInt(match[1], 10),
    parseInt(match[2], 10),
    parseInt(match[3], 10),
  );
}

/**
 * Normalize a `YYYY/M/D` or `YYYY-M-D` date.
 *
 * @example
 * ```ts
 * normalizeDate('2021/3/5'); // => '2021-03-05'
 * normalizeDate('2021-3-5'); // => '2021-03-05'
 * normalizeDate('soon');     // => null
 * ```
 */
export function normalizeDate(value: string): string | null {
  const match = SLASH_DATE_RE.exec(value) ?? DASH_DATE_RE.exec(value);
  if (!match) {
    logger.warn({ value }, 'malformed ISO-8601 date');
    return null;
  }
  return fromMatch(match);
}

/**
 * Normalize an RCS keyword date such as `$Date: 2021/03/05 10:11:12 $`.
 *
 * The first {@link RCS_PREFIX_LENGTH} characters are skipped whatever they
 * are. The time must be present but is dropped from the result.
 */
export function normalizeRcsDate(value: string): string | null {
  if (value.length < RCS_PREFIX_LENGTH) {
    logger.warn({ value }, 'malformed RCS date');
    return null;
  }

  const match = RCS_DATE_RE.exec(value.slice(RCS_PREFIX_LENGTH));
  if (!match) {
    logger.warn({ value }, 'malformed RCS date');
    return null;
  }
  return fromMatch(match);
}

/**
 * Today's local calendar date as `YYYY-MM-DD`.
 */
export function currentLocalDate(now: Date = new Date()): string {
  const year = String(now.getFullYear()).padStart(4, '0');
  return `${year}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
}
