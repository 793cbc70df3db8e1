/**
 * High Interest Rate Rule
 */

import type { AuditFinding, LoanRecord } from '../../types';
import { DEFAULT_AUDIT_POLICY, type AuditPolicy } from '../../config';
import { formatInterestRate } from '../formatters';
import { triggeredSeverity } from '../severity';
import type { AuditRule } from './types';

export type InterestRatePolicy = Pick<
  AuditPolicy,
  'standardMaxInterestRate' | 'moderateExcessInterestRate' | 'highExcessInterestRate'
>;

export class HighInterestRateRule implements AuditRule {
  readonly ruleCode = 'INTEREST_HIGH_001';
  readonly title = 'Unusually High Interest Rate';
  readonly issueType = 'high_interest_rate' as const;
  readonly docsUrl = 'https://studentaid.gov/understand-aid/types/loans/interest-rates';

  private readonly policy: InterestRatePolicy;

  constructor(policy: Partial<InterestRatePolicy> = {}) {
    this.policy = {
      standardMaxInterestRate:
        policy.standardMaxInterestRate ?? DEFAULT_AUDIT_POLICY.standardMaxInterestRate,
      moderateExcessInterestRate:
        policy.moderateExcessInterestRate ?? DEFAULT_AUDIT_POLICY.moderateExcessInterestRate,
      highExcessInterestRate:
        policy.highExcessInterestRate ?? DEFAULT_AUDIT_POLICY.highExcessInterestRate,
    };
  }

  evaluate(record: LoanRecord): AuditFinding | null {
    const { standardMaxInterestRate, moderateExcessInterestRate, highExcessInterestRate } =
      this.policy;
    if (record.interestRate <= standardMaxInterestRate) return null;

    // Excess in percentage points over the threshold
    const excess = record.interestRate - standardMaxInterestRate;

    return {
      issueType: this.issueType,
      ruleCode: this.ruleCode,
      title: this.title,
      description:
        `Loan interest rate of ${formatInterestRate(record.interestRate)} exceeds ` +
        `typical federal loan rate of ${formatInterestRate(standardMaxInterestRate)}`,
      severity: triggeredSeverity(excess, {
        moderate: moderateExcessInterestRate,
        high: highExcessInterestRate,
      }),
      suggestedAction:
        'Verify that the interest rate is correctly applied to your loan. If the rate is ' +
        'accurate, consider researching refinancing options to potentially lower your ' +
        'interest rate and overall repayment costs.',
      docsUrl: this.docsUrl,
    };
  }
}
