/**
 * Audit finding helpers
 */

import type { AuditFinding, AuditIssue } from '../types';
import { compareSeverity } from './severity';

const ISSUE_DESCRIPTIONS: Record<AuditIssue, string> = {
  excessive_forbearance: 'Excessive Forbearance',
  unexplained_capitalization: 'Unexplained Interest Capitalization',
  extended_non_payment: 'Extended Non-payment Period',
  high_interest_rate: 'High Interest Rate',
  inaccurate_balance: 'Inaccurate Balance',
  misapplied_payment: 'Misapplied Payment',
};

export function describeIssue(issue: AuditIssue): string {
  return ISSUE_DESCRIPTIONS[issue];
}

/**
 * Findings are equal when issue, rule code, description, severity, action and
 * title match. Affected dates and the docs URL are not compared.
 */
export function findingsEqual(a: AuditFinding, b: AuditFinding): boolean {
  return (
    a.issueType === b.issueType &&
    a.ruleCode === b.ruleCode &&
    a.description === b.description &&
    a.severity === b.severity &&
    a.suggestedAction === b.suggestedAction &&
    a.title === b.title
  );
}

export function groupFindingsByIssue(
  findings: readonly AuditFinding[]
): Map<AuditIssue, AuditFinding[]> {
  const grouped = new Map<AuditIssue, AuditFinding[]>();
  for (const finding of findings) {
    const group = grouped.get(finding.issueType);
    if (group) {
      group.push(finding);
    } else {
      grouped.set(finding.issueType, [finding]);
    }
  }
  return grouped;
}

/**
 * Deterministic order for findings from a concurrent audit:
 * rule code ascending, then severity descending.
 */
export function sortFindings(findings: readonly AuditFinding[]): AuditFinding[] {
  return [...findings].sort((a, b) => {
    if (a.ruleCode !== b.ruleCode) return a.ruleCode < b.ruleCode ? -1 : 1;
    return compareSeverity(b.severity, a.severity);
  });
}
