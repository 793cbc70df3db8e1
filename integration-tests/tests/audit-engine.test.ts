/**
 * Audit Engine Tests
 */

import {
  AuditEngine,
  audit,
  compareSeverity,
  describeIssue,
  describeSeverity,
  durationSeverity,
  findingsEqual,
  groupFindingsByIssue,
  maxSeverity,
  scaleSeverity,
  sortFindings,
} from '@loan-audit/core';
import type { AuditFinding, AuditRule, LoanRecord } from '@loan-audit/core';
import { forbearance, makeRecord, monthlyPayments } from './helpers';

/**
 * Triggers all four default rules: 40 months of forbearance, one
 * capitalization far from its end, a four month payment gap before it,
 * and an 8.5% rate.
 */
function troubledRecord(): LoanRecord {
  return makeRecord({
    interestRate: 8.5,
    nonPaymentPeriods: [forbearance(new Date(2020, 0, 1), new Date(2023, 4, 1))],
    payments: [...monthlyPayments(new Date(2019, 1, 15), 6), ...monthlyPayments(new Date(2019, 10, 15), 2)],
    capitalizationEvents: [new Date(2019, 5, 1)],
  });
}

const balanceRule: AuditRule = {
  ruleCode: 'BALANCE_HIGH_001',
  title: 'Balance Above Principal',
  issueType: 'inaccurate_balance',
  evaluate(record: LoanRecord): AuditFinding | null {
    if (record.currentBalance <= record.originalPrincipal) return null;
    return {
      issueType: 'inaccurate_balance',
      ruleCode: 'BALANCE_HIGH_001',
      title: 'Balance Above Principal',
      description: 'Current balance exceeds the original principal',
      severity: 'moderate',
      suggestedAction: 'Request a payoff statement from your servicer.',
    };
  },
};

describe('AuditEngine', () => {
  it('should register the default rules in order', () => {
    const engine = new AuditEngine();
    expect(engine.getRules().map((rule) => rule.ruleCode)).toEqual([
      'FORBEAR_EXCESS_001',
      'CAP_UNEXP_001',
      'NONPAY_001',
      'INTEREST_HIGH_001',
    ]);
  });

  it('should return no findings for a clean record', () => {
    expect(new AuditEngine().performAudit(makeRecord())).toEqual([]);
  });

  it('should return exactly one finding for excessive forbearance alone', () => {
    const record = makeRecord({
      nonPaymentPeriods: [forbearance(new Date(2020, 0, 1), new Date(2023, 4, 1))],
    });
    const findings = audit(record);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ issueType: 'excessive_forbearance', severity: 'moderate' });
  });

  it('should report findings in rule registration order', () => {
    const findings = new AuditEngine().performAudit(troubledRecord());

    expect(findings.map((finding) => [finding.ruleCode, finding.severity])).toEqual([
      ['FORBEAR_EXCESS_001', 'moderate'],
      ['CAP_UNEXP_001', 'moderate'],
      ['NONPAY_001', 'moderate'],
      ['INTEREST_HIGH_001', 'moderate'],
    ]);
  });

  it('should produce the same findings concurrently', async () => {
    const engine = new AuditEngine();
    const record = troubledRecord();

    const sequential = engine.performAudit(record);
    const concurrent = await engine.performAuditConcurrent(record);

    expect(sortFindings(concurrent)).toEqual(sortFindings(sequential));
  });

  it('should filter findings by issue', () => {
    const findings = new AuditEngine().performAuditForIssue(troubledRecord(), 'high_interest_rate');
    expect(findings.map((finding) => finding.ruleCode)).toEqual(['INTEREST_HIGH_001']);
  });

  it('should run added rules after the defaults', () => {
    const engine = new AuditEngine();
    engine.addRule(balanceRule);

    const findings = engine.performAudit(makeRecord({ currentBalance: 26000 }));
    expect(findings.map((finding) => finding.ruleCode)).toEqual(['BALANCE_HIGH_001']);
  });

  it('should build default rules from policy overrides', () => {
    const engine = new AuditEngine({ policy: { standardMaxInterestRate: 9 } });
    expect(engine.performAuditForIssue(makeRecord({ interestRate: 8.5 }), 'high_interest_rate')).toEqual([]);
  });

  it('should accept a custom rule set', () => {
    const engine = new AuditEngine({ rules: [] });
    expect(engine.performAudit(troubledRecord())).toEqual([]);
  });
});

describe('Severity', () => {
  it('should order tiers', () => {
    expect(compareSeverity('low', 'high')).toBeLessThan(0);
    expect(compareSeverity('critical', 'moderate')).toBeGreaterThan(0);
    expect(compareSeverity('high', 'high')).toBe(0);
  });

  it('should pick the highest tier', () => {
    expect(maxSeverity(['moderate', 'critical', 'low'])).toBe('critical');
    expect(maxSeverity([])).toBeNull();
  });

  it('should scale by thresholds', () => {
    expect(scaleSeverity(5, { moderate: 10, high: 20 })).toBeNull();
    expect(scaleSeverity(5, { low: 1, moderate: 10, high: 20 })).toBe('low');
    expect(scaleSeverity(10, { moderate: 10, high: 20 })).toBe('moderate');
    expect(scaleSeverity(20, { moderate: 10, high: 20 })).toBe('high');
    expect(scaleSeverity(25, { moderate: 10, high: 20, critical: 25 })).toBe('critical');
  });

  it('should floor triggered durations at low', () => {
    expect(durationSeverity(1, 90, 180)).toBe('low');
    expect(durationSeverity(200, 90, 180)).toBe('high');
  });

  it('should describe tiers', () => {
    expect(describeSeverity('high')).toBe('High - Significant impact on loan repayment');
  });
});

describe('Findings', () => {
  const base: AuditFinding = {
    issueType: 'unexplained_capitalization',
    ruleCode: 'CAP_UNEXP_001',
    title: 'Unexplained Interest Capitalization',
    description: 'Found 1 unexplained interest capitalization events on: Aug 5, 2021',
    severity: 'moderate',
    suggestedAction: 'Ask your servicer.',
    affectedDates: [new Date(2021, 7, 5)],
  };

  it('should ignore affected dates when comparing', () => {
    const other: AuditFinding = { ...base, affectedDates: [new Date(2019, 0, 1), new Date(2018, 0, 1)] };
    expect(findingsEqual(base, other)).toBe(true);
  });

  it('should compare every other field', () => {
    expect(findingsEqual(base, { ...base, severity: 'high' })).toBe(false);
    expect(findingsEqual(base, { ...base, title: 'Other' })).toBe(false);
  });

  it('should group findings by issue', () => {
    const forbearanceFinding: AuditFinding = { ...base, issueType: 'excessive_forbearance', ruleCode: 'FORBEAR_EXCESS_001' };
    const grouped = groupFindingsByIssue([base, forbearanceFinding, base]);

    expect(grouped.get('unexplained_capitalization')).toHaveLength(2);
    expect(grouped.get('excessive_forbearance')).toEqual([forbearanceFinding]);
    expect(grouped.has('high_interest_rate')).toBe(false);
  });

  it('should sort by rule code then severity', () => {
    const high: AuditFinding = { ...base, severity: 'high' };
    const interest: AuditFinding = { ...base, ruleCode: 'INTEREST_HIGH_001' };
    const forbearanceFinding: AuditFinding = { ...base, ruleCode: 'FORBEAR_EXCESS_001' };

    expect(sortFindings([interest, base, forbearanceFinding, high])).toEqual([
      high,
      base,
      forbearanceFinding,
      interest,
    ]);
  });

  it('should describe issues', () => {
    expect(describeIssue('extended_non_payment')).toBe('Extended Non-payment Period');
  });
});
