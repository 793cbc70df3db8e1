/**
 * JSON Schema Validation
 *
 * Serialization of loan records and findings to their snake_case contracts,
 * and Ajv validation against docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import { format } from 'date-fns';
import { logger } from './logger';
import type {
  AuditFinding,
  AuditFindingJson,
  LoanRecord,
  LoanRecordJson,
} from './types';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

// Schema loading - lazy loaded on first use
let loanRecordSchema: object | null = null;
let auditFindingSchema: object | null = null;

function loadSchema(schemaName: string): object {
  const possiblePaths = [
    // packages/core/src
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // packages/core/dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root
    path.join(process.cwd(), 'docs/contracts', schemaName),
  ];

  for (const schemaPath of possiblePaths) {
    if (fs.existsSync(schemaPath)) {
      const content = fs.readFileSync(schemaPath, 'utf-8');
      return JSON.parse(content);
    }
  }

  logger.warn(`Schema file not found: ${schemaName}, using permissive validation`);
  return { type: 'object' };
}

function getLoanRecordSchema(): object {
  if (!loanRecordSchema) {
    loanRecordSchema = loadSchema('loan_record.schema.json');
  }
  return loanRecordSchema;
}

function getAuditFindingSchema(): object {
  if (!auditFindingSchema) {
    auditFindingSchema = loadSchema('audit_finding.schema.json');
  }
  return auditFindingSchema;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function validateAgainst(schema: object, data: unknown, label: string): ValidationResult {
  const validate = ajv.compile(schema);
  const valid = validate(data);

  if (!valid) {
    const errors = validate.errors?.map((e) => `${e.instancePath || '/'}: ${e.message}`);
    logger.warn(`${label} validation failed`, { errors });
    return { valid: false, errors };
  }

  return { valid: true };
}

/**
 * Validate a serialized LoanRecord against loan_record.schema.json
 */
export function validateLoanRecord(data: unknown): ValidationResult {
  return validateAgainst(getLoanRecordSchema(), data, 'LoanRecord');
}

/**
 * Validate a serialized AuditFinding against audit_finding.schema.json
 */
export function validateAuditFinding(data: unknown): ValidationResult {
  return validateAgainst(getAuditFindingSchema(), data, 'AuditFinding');
}

// ============================================================================
// Serialization
// ============================================================================

const ISO_DATE = 'yyyy-MM-dd';

function isoDate(date: Date): string {
  return format(date, ISO_DATE);
}

export function toLoanRecordJson(record: LoanRecord): LoanRecordJson {
  const json: LoanRecordJson = {
    schema_version: '1.0',
    servicer_name: record.servicerName,
    loan_id: record.loanId,
    interest_rate: record.interestRate,
    current_balance: record.currentBalance,
    original_principal: record.originalPrincipal,
    original_principal_estimated: record.originalPrincipalEstimated,
    start_date: isoDate(record.startDate),
    non_payment_periods: record.nonPaymentPeriods.map((period) => ({
      kind: period.kind,
      start_date: isoDate(period.startDate),
      end_date: isoDate(period.endDate),
      ...(period.reason !== undefined && { reason: period.reason }),
    })),
    payments: record.payments.map((payment) => ({
      date: isoDate(payment.date),
      amount: payment.amount,
      type: payment.type,
    })),
    capitalization_events: record.capitalizationEvents.map(isoDate),
  };

  if (record.endDate) {
    json.end_date = isoDate(record.endDate);
  }

  return json;
}

export function toAuditFindingJson(finding: AuditFinding): AuditFindingJson {
  const json: AuditFindingJson = {
    issue_type: finding.issueType,
    rule_code: finding.ruleCode,
    title: finding.title,
    description: finding.description,
    severity: finding.severity,
    suggested_action: finding.suggestedAction,
  };

  if (finding.affectedDates) {
    json.affected_dates = finding.affectedDates.map(isoDate);
  }
  if (finding.docsUrl) {
    json.docs_url = finding.docsUrl;
  }

  return json;
}

// Re-export schemas for documentation and tooling
export const schemas = {
  get loanRecord() {
    return getLoanRecordSchema();
  },
  get auditFinding() {
    return getAuditFindingSchema();
  },
};
