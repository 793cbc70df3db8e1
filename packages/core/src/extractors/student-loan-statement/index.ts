/**
 * Student Loan Statement Extractor
 *
 * Pattern-based extraction of a loan record from servicer statement text.
 */

import type { DocumentType, NormalizedDocument } from '../../types';
import { BaseExtractor } from '../base-extractor';
import type { ExtractionContext, ExtractorResult } from '../types';
import { ALGORITHM_VERSION, parseLoanStatement } from './parser';

export class StudentLoanStatementExtractor extends BaseExtractor {
  readonly documentType: DocumentType = 'student_loan_statement';
  readonly description = 'Servicer statement for a federal or private student loan';

  protected extractFromLines(lines: NormalizedDocument, ctx: ExtractionContext): ExtractorResult {
    const { record, warnings, fieldStrategies } = parseLoanStatement(lines, {
      referenceDate: ctx.referenceDate,
      headerWindowLines: ctx.headerWindowLines,
      sectionMaxLines: ctx.sectionMaxLines,
    });

    return {
      record,
      warnings,
      metadata: {
        algorithmVersion: ALGORITHM_VERSION,
        lineCount: lines.length,
        fieldStrategies,
      },
    };
  }
}

export const studentLoanStatementExtractor = new StudentLoanStatementExtractor();

export { ALGORITHM_VERSION, estimateOriginalPrincipal, parseLoanStatement } from './parser';
export type { ParsedStatement } from './parser';
export {
  identifyServicer,
  extractLoanId,
  extractInterestRate,
  extractCurrentBalance,
  extractOriginalPrincipal,
  extractLoanDates,
  type LoanDates,
} from './fields';
export { extractPayments, findPaymentSection, classifyPaymentType, dedupePayments } from './payments';
export { extractNonPaymentPeriods, extractReason, dedupePeriods } from './non-payment';
export { extractCapitalizationEvents, dedupeDates } from './capitalization';
export { StatementScan, type ScanOptions } from './scan';
