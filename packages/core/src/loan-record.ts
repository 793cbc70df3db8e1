/**
 * Loan Record Helpers
 *
 * Derived quantities the audit rules read from an assembled LoanRecord.
 */

import { differenceInMonths } from 'date-fns';
import type { LoanRecord, NonPaymentKind, NonPaymentPeriod } from './types';

export interface DateRange {
  start: Date;
  end: Date;
}

/**
 * Whole calendar months between a period's start and end.
 */
export function nonPaymentDurationMonths(period: NonPaymentPeriod): number {
  return Math.max(0, differenceInMonths(period.endDate, period.startDate));
}

function totalMonths(record: LoanRecord, kind: NonPaymentKind): number {
  return record.nonPaymentPeriods
    .filter((period) => period.kind === kind)
    .reduce((sum, period) => sum + nonPaymentDurationMonths(period), 0);
}

export function totalForbearanceMonths(record: LoanRecord): number {
  return totalMonths(record, 'forbearance');
}

export function totalDefermentMonths(record: LoanRecord): number {
  return totalMonths(record, 'deferment');
}

function rangesIntersect(a: DateRange, b: DateRange): boolean {
  return a.start.getTime() <= b.end.getTime() && b.start.getTime() <= a.end.getTime();
}

/**
 * Gaps of at least `minimumMonths` between consecutive payments (sorted by
 * date) that overlap no recorded forbearance or deferment period.
 * Ranges sharing only an endpoint count as overlapping.
 */
export function findUnexplainedNonPaymentPeriods(
  record: LoanRecord,
  minimumMonths = 2
): DateRange[] {
  if (record.payments.length < 2) return [];

  const sorted = [...record.payments].sort((a, b) => a.date.getTime() - b.date.getTime());
  const periods: DateRange[] = record.nonPaymentPeriods.map((period) => ({
    start: period.startDate,
    end: period.endDate,
  }));

  const unexplained: DateRange[] = [];
  for (let i = 0; i < sorted.length - 1; i++) {
    const gap: DateRange = { start: sorted[i].date, end: sorted[i + 1].date };
    if (differenceInMonths(gap.end, gap.start) < minimumMonths) continue;
    if (periods.some((period) => rangesIntersect(gap, period))) continue;
    unexplained.push(gap);
  }

  return unexplained;
}
