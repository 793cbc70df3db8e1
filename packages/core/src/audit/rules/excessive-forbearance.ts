/**
 * Excessive Forbearance Rule
 *
 * Flags loans whose forbearance periods add up to more than the recommended
 * maximum number of months.
 */

import type { AuditFinding, LoanRecord } from '../../types';
import { DEFAULT_AUDIT_POLICY, type AuditPolicy } from '../../config';
import { totalForbearanceMonths } from '../../loan-record';
import { formatInteger } from '../formatters';
import { durationSeverity } from '../severity';
import type { AuditRule } from './types';

export type ForbearancePolicy = Pick<AuditPolicy, 'maxForbearanceMonths' | 'severeForbearanceMonths'>;

export class ExcessiveForbearanceRule implements AuditRule {
  readonly ruleCode = 'FORBEAR_EXCESS_001';
  readonly title = 'Excessive Forbearance Duration';
  readonly issueType = 'excessive_forbearance' as const;
  readonly docsUrl =
    'https://studentaid.gov/manage-loans/lower-payments/get-temporary-relief/forbearance';

  private readonly policy: ForbearancePolicy;

  constructor(policy: Partial<ForbearancePolicy> = {}) {
    this.policy = {
      maxForbearanceMonths: policy.maxForbearanceMonths ?? DEFAULT_AUDIT_POLICY.maxForbearanceMonths,
      severeForbearanceMonths:
        policy.severeForbearanceMonths ?? DEFAULT_AUDIT_POLICY.severeForbearanceMonths,
    };
  }

  evaluate(record: LoanRecord): AuditFinding | null {
    const { maxForbearanceMonths, severeForbearanceMonths } = this.policy;
    const months = totalForbearanceMonths(record);
    if (months <= maxForbearanceMonths) return null;

    const affectedDates = record.nonPaymentPeriods
      .filter((period) => period.kind === 'forbearance')
      .flatMap((period) => [period.startDate, period.endDate]);

    return {
      issueType: this.issueType,
      ruleCode: this.ruleCode,
      title: this.title,
      description:
        `Loan has ${formatInteger(months)} months of forbearance, which exceeds ` +
        `the recommended maximum of ${formatInteger(maxForbearanceMonths)} months`,
      severity: durationSeverity(months, maxForbearanceMonths, severeForbearanceMonths),
      suggestedAction:
        'Review the full forbearance history with your loan servicer. ' +
        'Extended forbearance can dramatically increase interest capitalization.',
      affectedDates,
      docsUrl: this.docsUrl,
    };
  }
}
