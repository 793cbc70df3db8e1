/**
 * Audit Engine
 *
 * Runs an ordered set of rules against a loan record. Rules are pure, so
 * the concurrent mode evaluates them as independent tasks and joins once
 * all have settled.
 */

import type { AuditFinding, AuditIssue, LoanRecord } from '../types';
import { config, type AuditMode, type AuditPolicy } from '../config';
import { logger } from '../logger';
import { auditDurationHistogram, auditFindingsCounter } from '../metrics';
import { createDefaultRules, type AuditRule } from './rules';

export interface AuditEngineOptions {
  /** Replaces the default rule set entirely */
  rules?: AuditRule[];
  /** Overrides for the default rules' thresholds; ignored when `rules` is given */
  policy?: Partial<AuditPolicy>;
}

export class AuditEngine {
  private readonly rules: AuditRule[];

  constructor(options: AuditEngineOptions = {}) {
    this.rules = options.rules
      ? [...options.rules]
      : createDefaultRules({ ...config.auditPolicy, ...options.policy });
  }

  addRule(rule: AuditRule): void {
    this.rules.push(rule);
  }

  getRules(): readonly AuditRule[] {
    return this.rules;
  }

  /**
   * Evaluate every rule in registration order and collect the findings.
   */
  performAudit(record: LoanRecord): AuditFinding[] {
    const endTimer = auditDurationHistogram.startTimer({ mode: 'sequential' });

    const findings: AuditFinding[] = [];
    for (const rule of this.rules) {
      const finding = rule.evaluate(record);
      if (finding) findings.push(finding);
    }

    endTimer();
    this.recordFindings(findings, 'sequential');
    return findings;
  }

  performAuditForIssue(record: LoanRecord, issue: AuditIssue): AuditFinding[] {
    return this.performAudit(record).filter((finding) => finding.issueType === issue);
  }

  /**
   * Evaluate every rule as its own task. Finding order follows completion,
   * not registration; sort with sortFindings() where order matters.
   */
  async performAuditConcurrent(record: LoanRecord): Promise<AuditFinding[]> {
    const endTimer = auditDurationHistogram.startTimer({ mode: 'concurrent' });

    const findings: AuditFinding[] = [];
    await Promise.all(
      this.rules.map((rule) =>
        Promise.resolve().then(() => {
          const finding = rule.evaluate(record);
          if (finding) findings.push(finding);
        })
      )
    );

    endTimer();
    this.recordFindings(findings, 'concurrent');
    return findings;
  }

  private recordFindings(findings: readonly AuditFinding[], mode: AuditMode): void {
    for (const finding of findings) {
      auditFindingsCounter.inc({ rule_code: finding.ruleCode, severity: finding.severity });
    }

    logger.info('Audit complete', {
      mode,
      rule_count: this.rules.length,
      finding_count: findings.length,
      rule_codes: findings.map((finding) => finding.ruleCode),
    });
  }
}
