/**
 * Date Parsing
 *
 * Multi-format date parsing for servicer statements, a free-text date
 * scanner, and the validity window every extracted date must fall in.
 */

import {
  addYears,
  differenceInCalendarDays,
  getYear,
  isValid,
  parse,
  subYears,
} from 'date-fns';
import { allMatches } from './regex';
import { config } from '../../config';

/**
 * Formats tried in order; the first that parses the whole string wins.
 */
export const COMMON_DATE_FORMATS: readonly string[] = [
  'MM/dd/yyyy',
  'M/d/yyyy',
  'MM/dd/yy',
  'M/d/yy',
  'MMMM dd, yyyy',
  'MMMM dd yyyy',
  'MMM dd, yyyy',
  'MMM dd yyyy',
  'MMMM yyyy',
  'MMM yyyy',
  'yyyy-MM-dd',
];

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December';
// "May" is left to the full-name patterns so it is not matched twice
const MONTH_ABBREVIATIONS = 'Jan|Feb|Mar|Apr|Jun|Jul|Aug|Sep|Oct|Nov|Dec';

/**
 * Date-shaped fragments found in free text.
 */
export const DATE_PATTERNS: readonly RegExp[] = [
  /\b\d{1,2}\/\d{1,2}\/\d{2,4}\b/g,
  new RegExp(`\\b(?:${MONTHS})\\s+\\d{1,2},?\\s+\\d{4}\\b`, 'g'),
  new RegExp(`\\b(?:${MONTH_ABBREVIATIONS})\\s+\\d{1,2},?\\s+\\d{4}\\b`, 'g'),
  new RegExp(`\\b(?:${MONTHS})\\s+\\d{4}\\b`, 'g'),
  new RegExp(`\\b(?:${MONTH_ABBREVIATIONS})\\s+\\d{4}\\b`, 'g'),
  /\b\d{4}-\d{2}-\d{2}\b/g,
];

/** Numeric slash date, used inside larger statement patterns */
export const SLASH_DATE = String.raw`\d{1,2}/\d{1,2}/\d{2,4}`;

/**
 * Parses date strings against COMMON_DATE_FORMATS.
 *
 * One parser is created per pipeline run. Its memo of parsed strings is
 * owned by the instance and only grows; concurrent readers see either a
 * miss or a finished entry.
 */
export class DateParser {
  readonly referenceDate: Date;
  private readonly formats: readonly string[];
  private readonly cache = new Map<string, number | null>();

  constructor(referenceDate: Date = new Date(), formats: readonly string[] = COMMON_DATE_FORMATS) {
    this.referenceDate = new Date(referenceDate.getTime());
    this.formats = formats;
  }

  /**
   * Parse a single date string. Returns null when no format matches.
   */
  parseDate(dateString: string): Date | null {
    const trimmed = dateString.trim();
    if (!trimmed) return null;

    let time = this.cache.get(trimmed);
    if (time === undefined) {
      time = this.parseUncached(trimmed);
      this.cache.set(trimmed, time);
    }
    return time === null ? null : new Date(time);
  }

  /**
   * Scan arbitrary text for date-shaped fragments and parse each one.
   * Results follow pattern order, then position; duplicates are kept.
   */
  extractDates(text: string): Date[] {
    const dates: Date[] = [];

    for (const pattern of DATE_PATTERNS) {
      for (const match of allMatches(pattern, text)) {
        const date = this.parseDate(match[0]);
        if (date) dates.push(date);
      }
    }

    return dates;
  }

  private parseUncached(text: string): number | null {
    for (const format of this.formats) {
      const date = parse(text, format, this.referenceDate);
      if (!isValid(date)) continue;
      // date-fns reads "20" as year 20 under yyyy; leave two-digit years to yy
      if (format.includes('yyyy') && getYear(date) < 1000) continue;
      return date.getTime();
    }
    return null;
  }
}

/**
 * Closed interval of acceptable dates around a reference date.
 */
export class DateWindow {
  readonly earliest: Date;
  readonly latest: Date;

  constructor(
    referenceDate: Date = new Date(),
    pastYears: number = config.dateWindowPastYears,
    futureYears: number = config.dateWindowFutureYears
  ) {
    this.earliest = subYears(referenceDate, pastYears);
    this.latest = addYears(referenceDate, futureYears);
  }

  contains(date: Date): boolean {
    const time = date.getTime();
    return time >= this.earliest.getTime() && time <= this.latest.getTime();
  }

  filter(dates: readonly Date[]): Date[] {
    return dates.filter((date) => this.contains(date));
  }
}

/**
 * True when two dates are fewer than `days` calendar days apart.
 */
export function withinDays(a: Date, b: Date, days: number): boolean {
  return Math.abs(differenceInCalendarDays(a, b)) < days;
}

export function compareDates(a: Date, b: Date): number {
  return a.getTime() - b.getTime();
}
