/**
 * Extended Non-Payment Rule
 *
 * Flags gaps between consecutive payments that no forbearance or deferment
 * period accounts for. Severity scales on the total gap days.
 */

import { differenceInCalendarDays } from 'date-fns';
import type { AuditFinding, LoanRecord } from '../../types';
import { DEFAULT_AUDIT_POLICY, type AuditPolicy } from '../../config';
import { findUnexplainedNonPaymentPeriods } from '../../loan-record';
import { formatDate, formatInteger } from '../formatters';
import { durationSeverity } from '../severity';
import type { AuditRule } from './types';

export type NonPaymentPolicy = Pick<
  AuditPolicy,
  'minNonPaymentMonths' | 'moderateNonPaymentDays' | 'highNonPaymentDays'
>;

export class ExtendedNonPaymentRule implements AuditRule {
  readonly ruleCode = 'NONPAY_001';
  readonly title = 'Extended Non-Payment Period';
  readonly issueType = 'extended_non_payment' as const;
  readonly docsUrl = 'https://studentaid.gov/manage-loans/default/getting-out';

  private readonly policy: NonPaymentPolicy;

  constructor(policy: Partial<NonPaymentPolicy> = {}) {
    this.policy = {
      minNonPaymentMonths: policy.minNonPaymentMonths ?? DEFAULT_AUDIT_POLICY.minNonPaymentMonths,
      moderateNonPaymentDays:
        policy.moderateNonPaymentDays ?? DEFAULT_AUDIT_POLICY.moderateNonPaymentDays,
      highNonPaymentDays: policy.highNonPaymentDays ?? DEFAULT_AUDIT_POLICY.highNonPaymentDays,
    };
  }

  evaluate(record: LoanRecord): AuditFinding | null {
    const { minNonPaymentMonths, moderateNonPaymentDays, highNonPaymentDays } = this.policy;

    const gaps = findUnexplainedNonPaymentPeriods(record, minNonPaymentMonths);
    if (gaps.length === 0) return null;

    const totalDays = gaps.reduce(
      (sum, gap) => sum + differenceInCalendarDays(gap.end, gap.start),
      0
    );
    const ranges = gaps
      .map((gap) => `From ${formatDate(gap.start)} to ${formatDate(gap.end)}`)
      .join('; ');

    return {
      issueType: this.issueType,
      ruleCode: this.ruleCode,
      title: this.title,
      description:
        `Found ${formatInteger(gaps.length)} periods of non-payment without corresponding ` +
        `forbearance or deferment status: ${ranges}`,
      severity: durationSeverity(totalDays, moderateNonPaymentDays, highNonPaymentDays),
      suggestedAction:
        'Request detailed documentation for these periods to confirm your loan status. ' +
        'If payments were made during these periods, request verification that they were ' +
        'properly applied to your account.',
      affectedDates: gaps.flatMap((gap) => [gap.start, gap.end]),
      docsUrl: this.docsUrl,
    };
  }
}
