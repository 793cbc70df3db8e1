/**
 * Student Loan Statement Parser
 *
 * Runs every field and sequence extractor over one normalized document and
 * assembles the loan record. A failure in a required field aborts the whole
 * record; the loan ID, original principal and end date fall back instead.
 */

import type { LoanRecord, NormalizedDocument, PaymentRecord } from '../../types';
import {
  extractCurrentBalance,
  extractInterestRate,
  extractLoanDates,
  extractLoanId,
  extractOriginalPrincipal,
  identifyServicer,
} from './fields';
import { extractPayments } from './payments';
import { extractNonPaymentPeriods } from './non-payment';
import { extractCapitalizationEvents } from './capitalization';
import { StatementScan, type ScanOptions } from './scan';

/**
 * Algorithm version for tracking
 */
export const ALGORITHM_VERSION = '1.0.0';

/** Share of historical payments assumed to have reduced principal */
const PRINCIPAL_SHARE_OF_PAYMENTS = 0.8;
const PRINCIPAL_ROUNDING = 500;

/**
 * Estimate the original principal as the current balance plus the
 * principal share of all payments, rounded to the nearest $500.
 * No sanity bound is applied to the result.
 */
export function estimateOriginalPrincipal(
  currentBalance: number,
  payments: readonly PaymentRecord[]
): number {
  const totalPayments = payments.reduce((sum, payment) => sum + payment.amount, 0);
  const estimate = currentBalance + totalPayments * PRINCIPAL_SHARE_OF_PAYMENTS;
  return Math.round(estimate / PRINCIPAL_ROUNDING) * PRINCIPAL_ROUNDING;
}

export interface ParsedStatement {
  record: LoanRecord;
  warnings: string[];
  fieldStrategies: Record<string, string>;
}

export function parseLoanStatement(
  lines: NormalizedDocument,
  options: ScanOptions = {}
): ParsedStatement {
  const scan = new StatementScan(lines, options);

  const servicerName = identifyServicer(scan);
  const loanId = extractLoanId(scan);
  const interestRate = extractInterestRate(scan);
  const currentBalance = extractCurrentBalance(scan);
  const { startDate, endDate, endDateEstimated } = extractLoanDates(scan);
  const payments = extractPayments(scan);
  const nonPaymentPeriods = extractNonPaymentPeriods(scan);
  const capitalizationEvents = extractCapitalizationEvents(scan);

  if (endDateEstimated) {
    scan.warn('Loan end date not found; estimated from start date');
  } else if (!endDate) {
    scan.warn('Loan end date not found; estimate falls outside the date window');
  }

  let originalPrincipal = extractOriginalPrincipal(scan);
  const originalPrincipalEstimated = originalPrincipal === null;
  if (originalPrincipal === null) {
    originalPrincipal = estimateOriginalPrincipal(currentBalance, payments);
    scan.recordStrategy('originalPrincipal', 'estimated');
    scan.warn('Original principal not found; estimated from balance and payments');
  }

  const record: LoanRecord = Object.freeze({
    servicerName,
    loanId,
    interestRate,
    currentBalance,
    originalPrincipal,
    originalPrincipalEstimated,
    startDate,
    endDate,
    nonPaymentPeriods: Object.freeze(nonPaymentPeriods.map((period) => Object.freeze(period))),
    payments: Object.freeze(payments.map((payment) => Object.freeze(payment))),
    capitalizationEvents: Object.freeze(capitalizationEvents),
  });

  return {
    record,
    warnings: scan.warnings,
    fieldStrategies: scan.fieldStrategies,
  };
}
