/**
 * Unexplained Capitalization Rule
 *
 * A capitalization event is explained when it falls within the configured
 * window of the end of any forbearance or deferment period.
 */

import { differenceInCalendarDays } from 'date-fns';
import type { AuditFinding, LoanRecord } from '../../types';
import { DEFAULT_AUDIT_POLICY, type AuditPolicy } from '../../config';
import { formatDate, formatInteger } from '../formatters';
import { triggeredSeverity } from '../severity';
import type { AuditRule } from './types';

export type CapitalizationPolicy = Pick<
  AuditPolicy,
  'capitalizationWindowDays' | 'highCapitalizationEventCount'
>;

export class UnexplainedCapitalizationRule implements AuditRule {
  readonly ruleCode = 'CAP_UNEXP_001';
  readonly title = 'Unexplained Interest Capitalization';
  readonly issueType = 'unexplained_capitalization' as const;
  readonly docsUrl = 'https://studentaid.gov/understand-aid/types/loans/interest-rates#capitalization';

  private readonly policy: CapitalizationPolicy;

  constructor(policy: Partial<CapitalizationPolicy> = {}) {
    this.policy = {
      capitalizationWindowDays:
        policy.capitalizationWindowDays ?? DEFAULT_AUDIT_POLICY.capitalizationWindowDays,
      highCapitalizationEventCount:
        policy.highCapitalizationEventCount ?? DEFAULT_AUDIT_POLICY.highCapitalizationEventCount,
    };
  }

  evaluate(record: LoanRecord): AuditFinding | null {
    const { capitalizationWindowDays, highCapitalizationEventCount } = this.policy;

    const unexplained = record.capitalizationEvents.filter(
      (event) =>
        !record.nonPaymentPeriods.some(
          (period) =>
            Math.abs(differenceInCalendarDays(period.endDate, event)) <= capitalizationWindowDays
        )
    );
    if (unexplained.length === 0) return null;

    return {
      issueType: this.issueType,
      ruleCode: this.ruleCode,
      title: this.title,
      description:
        `Found ${formatInteger(unexplained.length)} unexplained interest capitalization ` +
        `events on: ${unexplained.map(formatDate).join(', ')}`,
      severity: triggeredSeverity(unexplained.length, {
        moderate: 1,
        high: highCapitalizationEventCount,
      }),
      suggestedAction:
        'Request detailed explanation from your loan servicer for each capitalization event. ' +
        'Review your loan terms to verify if these events were permitted under your loan agreement.',
      affectedDates: unexplained,
      docsUrl: this.docsUrl,
    };
  }
}
