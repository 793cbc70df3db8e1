/**
 * Forbearance and Deferment Extraction
 *
 * Two passes over the statement, merged: explicit "forbearance from A to B"
 * ranges in the joined text, then loose dates paired up inside sections
 * that open on a forbearance or deferment line.
 */

import { differenceInCalendarDays } from 'date-fns';
import type { NonPaymentKind, NonPaymentPeriod } from '../../types';
import { compareDates, withinDays } from '../text/dates';
import { allMatches, escapePattern, firstCapture } from '../text/regex';
import { isSectionHeading } from '../text/sections';
import {
  NON_PAYMENT_KEYWORDS,
  NON_PAYMENT_RANGE_PATTERNS,
  NON_PAYMENT_SECTION_MIN_LINES,
  REASON_CONTEXT_CHARS,
  SECTION_PERIOD_MAX_DAYS,
  reasonPatterns,
} from './patterns';
import type { StatementScan } from './scan';

const DUPLICATE_TOLERANCE_DAYS = 3;

interface OpenSection {
  kind: NonPaymentKind;
  lines: string[];
}

function kindOf(text: string): NonPaymentKind | null {
  const lower = text.toLowerCase();
  return NON_PAYMENT_KEYWORDS.find((kind) => lower.includes(kind)) ?? null;
}

function titleCase(text: string): string {
  return text.toLowerCase().replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}

/**
 * Reason text near a non-payment mention, title-cased.
 */
export function extractReason(kind: NonPaymentKind, text: string): string | undefined {
  const lower = text.toLowerCase();

  for (const source of reasonPatterns(escapePattern(kind))) {
    const reason = firstCapture(source, lower)?.trim();
    if (reason && reason.length >= 3) {
      return titleCase(reason);
    }
  }

  return undefined;
}

function buildPeriod(kind: NonPaymentKind, startDate: Date, endDate: Date, reason?: string): NonPaymentPeriod {
  return reason === undefined ? { kind, startDate, endDate } : { kind, startDate, endDate, reason };
}

function extractRangePeriods(scan: StatementScan): NonPaymentPeriod[] {
  const periods: NonPaymentPeriod[] = [];

  for (const pattern of NON_PAYMENT_RANGE_PATTERNS) {
    for (const match of allMatches(pattern, scan.text)) {
      const groups = match.groups;
      const kind = groups ? kindOf(groups.kind ?? '') : null;
      const startDate = groups?.start ? scan.parseDateInWindow(groups.start) : null;
      const endDate = groups?.end ? scan.parseDateInWindow(groups.end) : null;
      if (!kind || !startDate || !endDate || endDate < startDate) continue;

      const context = scan.text.slice(match.index, match.index + match[0].length + REASON_CONTEXT_CHARS);
      periods.push(buildPeriod(kind, startDate, endDate, extractReason(kind, context)));
    }
  }

  return periods;
}

function pairSectionDates(scan: StatementScan, section: OpenSection): NonPaymentPeriod[] {
  const dates = section.lines.flatMap((line) => scan.datesIn(line)).sort(compareDates);
  const reason = extractReason(section.kind, section.lines.join(' '));
  const periods: NonPaymentPeriod[] = [];

  for (let i = 0; i + 1 < dates.length; i += 2) {
    const startDate = dates[i];
    const endDate = dates[i + 1];
    if (endDate > startDate && differenceInCalendarDays(endDate, startDate) <= SECTION_PERIOD_MAX_DAYS) {
      periods.push(buildPeriod(section.kind, startDate, endDate, reason));
    }
  }

  return periods;
}

function extractSectionPeriods(scan: StatementScan): NonPaymentPeriod[] {
  const periods: NonPaymentPeriod[] = [];
  let open: OpenSection | null = null;

  for (const line of scan.lines) {
    if (!open) {
      const kind = kindOf(line);
      if (kind) open = { kind, lines: [line] };
      continue;
    }

    if (isSectionHeading(line) && open.lines.length > NON_PAYMENT_SECTION_MIN_LINES) {
      periods.push(...pairSectionDates(scan, open));
      open = null;
      continue;
    }

    open.lines.push(line);
    if (open.lines.length >= scan.sectionMaxLines) {
      periods.push(...pairSectionDates(scan, open));
      open = null;
    }
  }

  if (open) {
    periods.push(...pairSectionDates(scan, open));
  }

  return periods;
}

/**
 * Keep the first of any periods of the same kind whose start and end each
 * fall within three days of one already kept.
 */
export function dedupePeriods(periods: readonly NonPaymentPeriod[]): NonPaymentPeriod[] {
  const unique: NonPaymentPeriod[] = [];

  for (const period of periods) {
    const duplicate = unique.some(
      (kept) =>
        kept.kind === period.kind &&
        withinDays(kept.startDate, period.startDate, DUPLICATE_TOLERANCE_DAYS) &&
        withinDays(kept.endDate, period.endDate, DUPLICATE_TOLERANCE_DAYS)
    );
    if (!duplicate) unique.push(period);
  }

  return unique;
}

export function extractNonPaymentPeriods(scan: StatementScan): NonPaymentPeriod[] {
  const periods = [...extractRangePeriods(scan), ...extractSectionPeriods(scan)];
  return dedupePeriods(periods).sort((a, b) => compareDates(a.startDate, b.startDate));
}
