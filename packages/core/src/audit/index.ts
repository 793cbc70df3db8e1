/**
 * Audit Module
 */

export { AuditEngine, type AuditEngineOptions } from './engine';
export * from './rules';
export {
  SEVERITY_ORDER,
  compareSeverity,
  maxSeverity,
  describeSeverity,
  scaleSeverity,
  triggeredSeverity,
  durationSeverity,
  type SeverityThresholds,
} from './severity';
export { formatDate, formatInterestRate, formatInteger } from './formatters';
export { describeIssue, findingsEqual, groupFindingsByIssue, sortFindings } from './findings';
