/**
 * Publication Date/Time Resolution
 *
 * The sheet header carries lines like "Date: 03-04-2025" and
 * "Time: 09:15 AM". Numeric dates are read both day-first and month-first.
 * When both readings are valid and differ, a reference date (the PDF's
 * creation date) may break the tie; otherwise resolution fails.
 */

import { format, isSameDay, isValid, parse, set } from 'date-fns';
import {
  AmbiguousDateError,
  DateParseError,
  MissingFieldError,
  TimeParseError,
} from '../../errors';

/**
 * Format of a resolved timestamp in series files
 */
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm';

interface DateCandidate {
  text: string;
  dayFirstFormats: string[];
  monthFirstFormats: string[];
}

const YEAR_FIRST_PATTERN = /(\d{4})\s*[-/.]\s*(\d{1,2})\s*[-/.]\s*(\d{1,2})(?!\d)/;
const NUMERIC_PATTERN = /(\d{1,2})\s*[-/.\s]\s*(\d{1,2})\s*[-/.\s]\s*(\d{4}|\d{2})(?!\d)/;
const DAY_MONTH_NAME_PATTERN = /(\d{1,2})[\s-]*([A-Za-z]{3,9})\.?[\s-]*(\d{4})/;
const MONTH_NAME_DAY_PATTERN = /([A-Za-z]{3,9})\.?\s+(\d{1,2})\s+(\d{4})/;

const TWELVE_HOUR_PATTERN = /(\d{1,2})(?:\s*[:.]\s*(\d{2}))?(?:\s*[:.]\s*\d{2})?\s*([ap])\.?\s*m\b\.?/i;
const TWENTY_FOUR_HOUR_PATTERN = /(\d{1,2})\s*[:.]\s*(\d{2})/;

/**
 * First line whose trimmed, lower-cased text starts with the label
 */
function findLabeledLine(text: string, label: 'date' | 'time'): string | null {
  return text.split('\n').find((line) => line.trim().toLowerCase().startsWith(label)) ?? null;
}

function stripLabel(line: string): string {
  return line.trim().replace(/^(date|time)[a-z]*\s*[:\-–.]*\s*/i, '');
}

function toDateCandidate(value: string): DateCandidate | null {
  const cleaned = value.replace(/(\d)(st|nd|rd|th)\b/gi, '$1').replace(/,/g, ' ');

  const yearFirst = cleaned.match(YEAR_FIRST_PATTERN);
  if (yearFirst) {
    const [, year, month, day] = yearFirst;
    const formats = ['yyyy-M-d'];
    return { text: `${year}-${month}-${day}`, dayFirstFormats: formats, monthFirstFormats: formats };
  }

  const numeric = cleaned.match(NUMERIC_PATTERN);
  if (numeric) {
    const [, first, second, year] = numeric;
    const yearToken = year.length === 4 ? 'yyyy' : 'yy';
    return {
      text: `${first}-${second}-${year}`,
      dayFirstFormats: [`d-M-${yearToken}`],
      monthFirstFormats: [`M-d-${yearToken}`],
    };
  }

  const dayMonthName = cleaned.match(DAY_MONTH_NAME_PATTERN);
  if (dayMonthName) {
    const [, day, month, year] = dayMonthName;
    const formats = ['d MMM yyyy', 'd MMMM yyyy'];
    return { text: `${day} ${month} ${year}`, dayFirstFormats: formats, monthFirstFormats: formats };
  }

  const monthNameDay = cleaned.match(MONTH_NAME_DAY_PATTERN);
  if (monthNameDay) {
    const [, month, day, year] = monthNameDay;
    const formats = ['MMM d yyyy', 'MMMM d yyyy'];
    return { text: `${month} ${day} ${year}`, dayFirstFormats: formats, monthFirstFormats: formats };
  }

  return null;
}

function parseWithFormats(text: string, formats: string[], referenceDate: Date): Date | null {
  for (const pattern of formats) {
    const parsed = parse(text, pattern, referenceDate);
    if (isValid(parsed)) {
      return parsed;
    }
  }
  return null;
}

/**
 * Parse a date line under day-first and month-first rules.
 * Uses `reference` only to break a genuine ambiguity.
 */
export function parseDateLine(line: string, reference?: Date): Date {
  const candidate = toDateCandidate(stripLabel(line));
  if (!candidate) {
    throw new DateParseError(line);
  }

  // Two-digit years resolve to the century nearest the reference
  const yearReference = reference ?? new Date();
  const dayFirst = parseWithFormats(candidate.text, candidate.dayFirstFormats, yearReference);
  const monthFirst = parseWithFormats(candidate.text, candidate.monthFirstFormats, yearReference);

  if (dayFirst && monthFirst) {
    if (isSameDay(dayFirst, monthFirst)) {
      return dayFirst;
    }

    if (reference) {
      if (isSameDay(reference, dayFirst)) return dayFirst;
      if (isSameDay(reference, monthFirst)) return monthFirst;
    }

    throw new AmbiguousDateError(
      line,
      [format(dayFirst, 'yyyy-MM-dd'), format(monthFirst, 'yyyy-MM-dd')],
      reference ? format(reference, 'yyyy-MM-dd') : undefined
    );
  }

  const resolved = dayFirst ?? monthFirst;
  if (!resolved) {
    throw new DateParseError(line);
  }
  return resolved;
}

/**
 * Parse a time line, 12-hour (AM/PM) or 24-hour. Seconds are dropped.
 */
export function parseTimeLine(line: string): { hours: number; minutes: number } {
  const value = stripLabel(line);
  const midnight = new Date(2000, 0, 1);

  const twelveHour = value.match(TWELVE_HOUR_PATTERN);
  if (twelveHour) {
    const [, hour, minute = '00', meridiem] = twelveHour;
    const parsed = parse(`${hour}:${minute} ${meridiem.toUpperCase()}M`, 'h:mm a', midnight);
    if (isValid(parsed)) {
      return { hours: parsed.getHours(), minutes: parsed.getMinutes() };
    }
    throw new TimeParseError(line);
  }

  const twentyFourHour = value.match(TWENTY_FOUR_HOUR_PATTERN);
  if (twentyFourHour) {
    const [, hour, minute] = twentyFourHour;
    const parsed = parse(`${hour}:${minute}`, 'H:mm', midnight);
    if (isValid(parsed)) {
      return { hours: parsed.getHours(), minutes: parsed.getMinutes() };
    }
  }

  throw new TimeParseError(line);
}

/**
 * Resolve the publication timestamp from a text block holding a "date" line
 * and a "time" line.
 *
 * @param reference - independent timestamp (e.g. PDF creation date) used as tie-break
 */
export function resolveDateTime(text: string, reference?: Date): Date {
  const dateLine = findLabeledLine(text, 'date');
  if (!dateLine) {
    throw new MissingFieldError('date');
  }

  const timeLine = findLabeledLine(text, 'time');
  if (!timeLine) {
    throw new MissingFieldError('time');
  }

  const date = parseDateLine(dateLine, reference);
  const time = parseTimeLine(timeLine);

  return set(date, { hours: time.hours, minutes: time.minutes, seconds: 0, milliseconds: 0 });
}

/**
 * Format a resolved timestamp for series files
 */
export function formatTimestamp(timestamp: Date): string {
  return format(timestamp, TIMESTAMP_FORMAT);
}

/**
 * Parse a series timestamp; null when malformed
 */
export function parseTimestamp(value: string): Date | null {
  const parsed = parse(value, TIMESTAMP_FORMAT, new Date(2000, 0, 1));
  return isValid(parsed) ? parsed : null;
}
