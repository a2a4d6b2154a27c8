/**
 * Date normalization
 *
 * Turns heterogeneous date strings (OCR output or caller-supplied reference
 * values) into a calendar-validated CanonicalDate. Month names are resolved
 * from a fixed English table so the result never depends on the host locale.
 */

import { format, isExists, isValid, parseISO } from 'date-fns';
import { DateParseError } from './errors.js';

export interface CanonicalDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

export interface DateNormalizeOptions {
  /** Latest accepted year. Defaults to the current calendar year. */
  referenceYear?: number;
}

export const MIN_YEAR = 1900;

const MONTH_NAMES = [
  'january', 'february', 'march', 'april', 'may', 'june',
  'july', 'august', 'september', 'october', 'november', 'december',
];

type DateParts = { year: number; month: number; day: number };

interface DateForm {
  id: string;
  regex: RegExp;
  toParts: (match: RegExpMatchArray) => DateParts | null;
}

/**
 * Resolves an English month name or abbreviation (at least three letters) to 1-12.
 */
export function resolveMonthName(token: string): number | null {
  const lower = token.toLowerCase();
  if (lower.length < 3) return null;
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(lower));
  return index === -1 ? null : index + 1;
}

// Order matters: day-first numeric, year-first numeric, then textual months.
const DATE_FORMS: DateForm[] = [
  {
    id: 'day_first_numeric',
    regex: /^(\d{1,2})([/\-. ])(\d{1,2})\2(\d{4})$/,
    toParts: (m) => ({ day: Number(m[1]), month: Number(m[3]), year: Number(m[4]) }),
  },
  {
    id: 'year_first_numeric',
    regex: /^(\d{4})([/\-.])(\d{1,2})\2(\d{1,2})$/,
    toParts: (m) => ({ year: Number(m[1]), month: Number(m[3]), day: Number(m[4]) }),
  },
  {
    id: 'day_month_name',
    regex: /^(\d{1,2})(?:st|nd|rd|th)?[\s\-/]*([A-Za-z]{3,9})\.?[\s\-/,]*(\d{4})$/,
    toParts: (m) => {
      const month = resolveMonthName(m[2]);
      return month === null ? null : { day: Number(m[1]), month, year: Number(m[3]) };
    },
  },
  {
    id: 'month_name_day',
    regex: /^([A-Za-z]{3,9})\.?\s*(\d{1,2})(?:st|nd|rd|th)?,?\s*(\d{4})$/,
    toParts: (m) => {
      const month = resolveMonthName(m[1]);
      return month === null ? null : { day: Number(m[2]), month, year: Number(m[3]) };
    },
  },
];

function describeRangeError(year: number, referenceYear: number): string | null {
  if (year < MIN_YEAR || year > referenceYear) {
    return `year ${year} outside ${MIN_YEAR}-${referenceYear}`;
  }
  return null;
}

/**
 * Builds a frozen CanonicalDate, throwing DateParseError when the triple is not
 * a real calendar date or the year is out of range.
 */
export function createCanonicalDate(
  year: number,
  month: number,
  day: number,
  options: DateNormalizeOptions = {}
): CanonicalDate {
  const referenceYear = options.referenceYear ?? new Date().getFullYear();
  const label = `${year}-${month}-${day}`;

  const rangeError = describeRangeError(year, referenceYear);
  if (rangeError) {
    throw new DateParseError(label, rangeError);
  }
  if (!isExists(year, month - 1, day)) {
    throw new DateParseError(label, 'not a valid calendar date');
  }
  return Object.freeze({ year, month, day });
}

/**
 * Parses a raw date string into a CanonicalDate.
 *
 * Forms tried in order: dd/mm/yyyy (or -, ., space), yyyy-mm-dd (or /, .),
 * "15 Aug 1995", "Aug 15, 1995". The first form that yields a valid calendar
 * date wins.
 */
export function normalizeDate(raw: string, options: DateNormalizeOptions = {}): CanonicalDate {
  const cleaned = raw
    .replace(/\s+/g, ' ')
    .replace(/^[^A-Za-z0-9]+|[^A-Za-z0-9]+$/g, '');

  if (!cleaned) {
    throw new DateParseError(raw, 'empty input');
  }

  let lastReason = 'unrecognised format';
  for (const form of DATE_FORMS) {
    const match = cleaned.match(form.regex);
    if (!match) continue;

    const parts = form.toParts(match);
    if (!parts) {
      lastReason = 'unknown month name';
      continue;
    }
    try {
      return createCanonicalDate(parts.year, parts.month, parts.day, options);
    } catch (error) {
      if (!(error instanceof DateParseError)) throw error;
      lastReason = error.reason;
    }
  }

  throw new DateParseError(raw, lastReason);
}

/**
 * Like normalizeDate, but returns null instead of throwing.
 */
export function tryNormalizeDate(raw: string, options: DateNormalizeOptions = {}): CanonicalDate | null {
  try {
    return normalizeDate(raw, options);
  } catch (error) {
    if (error instanceof DateParseError) return null;
    throw error;
  }
}

/**
 * Converts a JS Date (local calendar fields) into a CanonicalDate without a
 * year-range check; used for as-of dates.
 */
export function canonicalDateFromJsDate(date: Date): CanonicalDate | null {
  if (!isValid(date)) return null;
  return Object.freeze({ year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() });
}

export function compareCanonicalDates(a: CanonicalDate, b: CanonicalDate): number {
  if (a.year !== b.year) return a.year < b.year ? -1 : 1;
  if (a.month !== b.month) return a.month < b.month ? -1 : 1;
  if (a.day !== b.day) return a.day < b.day ? -1 : 1;
  return 0;
}

export function isSameCanonicalDate(a: CanonicalDate, b: CanonicalDate): boolean {
  return compareCanonicalDates(a, b) === 0;
}

/** YYYY-MM-DD */
export function formatCanonicalDate(date: CanonicalDate): string {
  return format(new Date(date.year, date.month - 1, date.day), 'yyyy-MM-dd');
}

/**
 * Parses a strict YYYY-MM-DD as-of date into a local-midnight Date; null when
 * malformed or not a real day.
 */
export function parseAsOfDate(value: string): Date | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = parseISO(value);
  return isValid(date) ? date : null;
}
