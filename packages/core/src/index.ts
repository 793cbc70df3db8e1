/**
 * Loan Audit Core - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runElapsedMs,
  runStage,
  stageContext,
  type RunContext,
  type RunFields,
  type RunStage,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export {
  config,
  DEFAULT_AUDIT_POLICY,
  type Config,
  type AuditPolicy,
  type AuditMode,
  type LogLevel,
} from './config';

// Types
export * from './types';

// Errors
export { ParsingError, isParsingError, toParsingError, type ParsingErrorCode } from './errors';

// Metrics
export {
  register,
  documentsProcessedCounter,
  extractionDurationHistogram,
  fieldStrategyCounter,
  auditFindingsCounter,
  auditDurationHistogram,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  validateLoanRecord,
  validateAuditFinding,
  toLoanRecordJson,
  toAuditFindingJson,
  schemas,
  type ValidationResult,
} from './schemas';

// Loan record helpers
export {
  nonPaymentDurationMonths,
  totalForbearanceMonths,
  totalDefermentMonths,
  findUnexplainedNonPaymentPeriods,
  type DateRange,
} from './loan-record';

// Document extractors
export * from './extractors';

// Audit
export * from './audit';

// Pipeline
export {
  extract,
  tryExtract,
  audit,
  auditConcurrent,
  extractAndAudit,
  type ExtractOptions,
  type ExtractionOutcome,
  type ExtractResult,
  type AuditOptions,
  type AuditedDocument,
} from './pipeline';
