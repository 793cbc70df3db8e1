/**
 * Shared TypeScript Types
 *
 * Types for the loan statement extraction pipeline and the audit engine.
 * Serialized (snake_case) forms match the JSON schemas in docs/contracts/
 */

// ============================================================================
// Document Input
// ============================================================================

export type DocumentType = 'student_loan_statement';

/**
 * Raw text of one page as yielded by the page-text collaborator.
 * A page with no text layer is null or undefined.
 */
export type RawPage = string | null | undefined;

/**
 * Ordered, trimmed and length-filtered lines of one document.
 */
export type NormalizedDocument = readonly string[];

// ============================================================================
// Loan Record
// ============================================================================

export type NonPaymentKind = 'forbearance' | 'deferment';

export interface NonPaymentPeriod {
  readonly kind: NonPaymentKind;
  readonly startDate: Date;
  readonly endDate: Date;
  readonly reason?: string;
}

export type PaymentType = 'regular' | 'extra_principal' | 'interest_only' | 'fee';

export interface PaymentRecord {
  readonly date: Date;
  /** Negative amounts are refunds */
  readonly amount: number;
  readonly type: PaymentType;
}

export interface LoanRecord {
  readonly servicerName: string;
  readonly loanId: string;
  /** Percentage points, e.g. 6.8 */
  readonly interestRate: number;
  readonly currentBalance: number;
  readonly originalPrincipal: number;
  /** True when the principal was estimated rather than read from the document */
  readonly originalPrincipalEstimated: boolean;
  readonly startDate: Date;
  readonly endDate?: Date;
  readonly nonPaymentPeriods: readonly NonPaymentPeriod[];
  readonly payments: readonly PaymentRecord[];
  readonly capitalizationEvents: readonly Date[];
}

// ============================================================================
// Audit Findings
// ============================================================================

export type AuditIssue =
  | 'excessive_forbearance'
  | 'unexplained_capitalization'
  | 'extended_non_payment'
  | 'high_interest_rate'
  | 'inaccurate_balance'
  | 'misapplied_payment';

export const AUDIT_ISSUES: readonly AuditIssue[] = [
  'excessive_forbearance',
  'unexplained_capitalization',
  'extended_non_payment',
  'high_interest_rate',
  'inaccurate_balance',
  'misapplied_payment',
];

export type AuditSeverity = 'low' | 'moderate' | 'high' | 'critical';

export interface AuditFinding {
  readonly issueType: AuditIssue;
  readonly ruleCode: string;
  readonly title: string;
  readonly description: string;
  readonly severity: AuditSeverity;
  readonly suggestedAction: string;
  readonly affectedDates?: readonly Date[];
  readonly docsUrl?: string;
}

// ============================================================================
// Serialized Contracts (docs/contracts/)
// ============================================================================

export interface NonPaymentPeriodJson {
  kind: NonPaymentKind;
  start_date: string;
  end_date: string;
  reason?: string;
}

export interface PaymentRecordJson {
  date: string;
  amount: number;
  type: PaymentType;
}

export interface LoanRecordJson {
  schema_version: '1.0';
  servicer_name: string;
  loan_id: string;
  interest_rate: number;
  current_balance: number;
  original_principal: number;
  original_principal_estimated: boolean;
  start_date: string;
  end_date?: string;
  non_payment_periods: NonPaymentPeriodJson[];
  payments: PaymentRecordJson[];
  capitalization_events: string[];
}

export interface AuditFindingJson {
  issue_type: AuditIssue;
  rule_code: string;
  title: string;
  description: string;
  severity: AuditSeverity;
  suggested_action: string;
  affected_dates?: string[];
  docs_url?: string;
}
