/**
 * Severity tiers and threshold scaling shared by every audit rule.
 */

import type { AuditSeverity } from '../types';

export const SEVERITY_ORDER: readonly AuditSeverity[] = ['low', 'moderate', 'high', 'critical'];

const SEVERITY_DESCRIPTIONS: Record<AuditSeverity, string> = {
  low: 'Low - Minor potential issue',
  moderate: 'Moderate - Issue may affect loan terms',
  high: 'High - Significant impact on loan repayment',
  critical: 'Critical - May violate regulations or severely impact finances',
};

/**
 * Negative when `a` ranks below `b`, positive when above, zero when equal.
 */
export function compareSeverity(a: AuditSeverity, b: AuditSeverity): number {
  return SEVERITY_ORDER.indexOf(a) - SEVERITY_ORDER.indexOf(b);
}

export function maxSeverity(severities: readonly AuditSeverity[]): AuditSeverity | null {
  let highest: AuditSeverity | null = null;
  for (const severity of severities) {
    if (highest === null || compareSeverity(severity, highest) > 0) {
      highest = severity;
    }
  }
  return highest;
}

export function describeSeverity(severity: AuditSeverity): string {
  return SEVERITY_DESCRIPTIONS[severity];
}

export interface SeverityThresholds {
  low?: number;
  moderate: number;
  high: number;
  critical?: number;
}

/**
 * Highest tier whose threshold the value meets or exceeds. Below the
 * moderate threshold this is `low` only when a low threshold is set and met;
 * otherwise null.
 */
export function scaleSeverity(value: number, thresholds: SeverityThresholds): AuditSeverity | null {
  const { low, moderate, high, critical } = thresholds;
  if (critical !== undefined && value >= critical) return 'critical';
  if (value >= high) return 'high';
  if (value >= moderate) return 'moderate';
  if (low !== undefined && value >= low) return 'low';
  return null;
}

/**
 * Severity for a rule whose trigger already fired: scaled tier, floored at low.
 */
export function triggeredSeverity(value: number, thresholds: SeverityThresholds): AuditSeverity {
  return scaleSeverity(value, thresholds) ?? 'low';
}

/**
 * Severity of a duration (months or days) that has exceeded its trigger.
 * Shared by the forbearance and non-payment rules.
 */
export function durationSeverity(duration: number, moderate: number, high: number): AuditSeverity {
  return triggeredSeverity(duration, { moderate, high });
}
