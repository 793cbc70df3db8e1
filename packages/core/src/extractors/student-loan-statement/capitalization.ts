/**
 * Interest Capitalization Extraction
 */

import { compareDates, withinDays } from '../text/dates';
import { allMatches } from '../text/regex';
import {
  CAPITALIZATION_AMOUNT_LOOKBEHIND,
  CAPITALIZATION_AMOUNT_PATTERN,
  CAPITALIZATION_CONTEXT_CHARS,
  CAPITALIZATION_DATE_PATTERNS,
  CAPITALIZATION_MARKERS,
} from './patterns';
import type { StatementScan } from './scan';

function markerDates(scan: StatementScan): Date[] {
  const { text } = scan;
  const lower = text.toLowerCase();
  const dates: Date[] = [];

  for (const marker of CAPITALIZATION_MARKERS) {
    let index = lower.indexOf(marker);
    while (index !== -1) {
      const from = Math.max(0, index - CAPITALIZATION_CONTEXT_CHARS);
      const to = index + marker.length + CAPITALIZATION_CONTEXT_CHARS;
      dates.push(...scan.datesIn(text.slice(from, to)));
      index = lower.indexOf(marker, index + marker.length);
    }
  }

  return dates;
}

function patternDates(scan: StatementScan): Date[] {
  const dates: Date[] = [];

  for (const pattern of CAPITALIZATION_DATE_PATTERNS) {
    for (const match of allMatches(pattern, scan.text)) {
      const date = match[1] ? scan.parseDateInWindow(match[1]) : null;
      if (date) dates.push(date);
    }
  }

  return dates;
}

function amountDates(scan: StatementScan): Date[] {
  const dates: Date[] = [];

  for (const match of allMatches(CAPITALIZATION_AMOUNT_PATTERN, scan.text)) {
    const from = Math.max(0, match.index - CAPITALIZATION_AMOUNT_LOOKBEHIND);
    dates.push(...scan.datesIn(scan.text.slice(from, match.index + match[0].length)));
  }

  return dates;
}

/**
 * Merge dates within a day of each other, keeping the first seen.
 */
export function dedupeDates(dates: readonly Date[]): Date[] {
  const unique: Date[] = [];
  for (const date of dates) {
    if (!unique.some((kept) => withinDays(kept, date, 1))) unique.push(date);
  }
  return unique;
}

export function extractCapitalizationEvents(scan: StatementScan): Date[] {
  const dates = [...markerDates(scan), ...patternDates(scan), ...amountDates(scan)];
  return dedupeDates(dates).sort(compareDates);
}
