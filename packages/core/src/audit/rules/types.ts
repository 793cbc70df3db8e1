/**
 * Audit Rule Types
 */

import type { AuditFinding, AuditIssue, LoanRecord } from '../../types';

/**
 * A single compliance check. `evaluate` is pure and never throws: it either
 * returns a finding or null.
 */
export interface AuditRule {
  /** Stable identifier, e.g. FORBEAR_EXCESS_001 */
  readonly ruleCode: string;
  readonly title: string;
  readonly issueType: AuditIssue;
  readonly docsUrl?: string;

  evaluate(record: LoanRecord): AuditFinding | null;
}
