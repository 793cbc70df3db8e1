/**
 * Extraction Pipeline Tests
 *
 * Whole statements through extract(), tryExtract() and extractAndAudit().
 */

import {
  ParsingError,
  estimateOriginalPrincipal,
  extract,
  extractAndAudit,
  getMetrics,
  getRegisteredTypes,
  isParsingError,
  tryExtract,
} from '@loan-audit/core';
import { REFERENCE_DATE, SAMPLE_STATEMENT_PAGES } from './helpers';

function extractionError(pages: Parameters<typeof extract>[0], documentType?: string): ParsingError {
  const result = tryExtract(pages, { referenceDate: REFERENCE_DATE, documentType });
  if (result.ok) {
    throw new Error('Expected extraction to fail');
  }
  return result.error;
}

describe('extract', () => {
  it('should assemble a full loan record from a statement', () => {
    const { record, warnings, metadata } = extract(SAMPLE_STATEMENT_PAGES, {
      referenceDate: REFERENCE_DATE,
    });

    expect(record.servicerName).toBe('Nelnet');
    expect(record.loanId).toBe('NL-48213977');
    expect(record.interestRate).toBe(5.5);
    expect(record.currentBalance).toBe(24350.75);
    expect(record.originalPrincipal).toBe(30000);
    expect(record.originalPrincipalEstimated).toBe(false);
    expect(record.startDate).toEqual(new Date(2016, 8, 15));
    expect(record.endDate).toEqual(new Date(2026, 8, 15));
    expect(warnings).toEqual([]);
    expect(metadata.algorithmVersion).toBe('1.0.0');
    expect(metadata.fieldStrategies).toMatchObject({
      servicerName: 'known_servicer',
      loanId: 'keyword',
      payments: 'payment_section',
    });
  });

  it('should extract the payment history without duplicates', () => {
    const { record } = extract(SAMPLE_STATEMENT_PAGES, { referenceDate: REFERENCE_DATE });

    expect(record.payments).toEqual([
      { date: new Date(2023, 8, 15), amount: 25, type: 'fee' },
      { date: new Date(2023, 9, 16), amount: 500, type: 'extra_principal' },
      { date: new Date(2023, 10, 15), amount: 350, type: 'regular' },
      { date: new Date(2023, 11, 15), amount: 350, type: 'regular' },
      { date: new Date(2024, 0, 15), amount: 350, type: 'regular' },
    ]);
  });

  it('should extract forbearance and capitalization history', () => {
    const { record } = extract(SAMPLE_STATEMENT_PAGES, { referenceDate: REFERENCE_DATE });

    expect(record.nonPaymentPeriods).toEqual([
      {
        kind: 'forbearance',
        startDate: new Date(2020, 2, 1),
        endDate: new Date(2021, 8, 30),
        reason: 'Economic Hardship',
      },
    ]);
    expect(record.capitalizationEvents).toEqual([new Date(2021, 9, 1)]);
  });

  it('should return an immutable record', () => {
    const { record } = extract(SAMPLE_STATEMENT_PAGES, { referenceDate: REFERENCE_DATE });
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.payments)).toBe(true);
  });

  it('should estimate the end date and principal, and drop out-of-window dates', () => {
    const { record, warnings } = extract(
      [
        'Navient Statement',
        'Loan ID: NV-20001',
        'Interest Rate: 4.25%\nCurrent Balance: $8,500.00',
        'Disbursement Date: 06/01/1995\nRepayment Start: 07/01/2012',
      ],
      { referenceDate: REFERENCE_DATE }
    );

    expect(record.loanId).toBe('NV-20001');
    expect(record.startDate).toEqual(new Date(2012, 6, 1));
    expect(record.endDate).toEqual(new Date(2022, 6, 1));
    expect(record.originalPrincipal).toBe(8500);
    expect(record.originalPrincipalEstimated).toBe(true);
    expect(record.payments).toEqual([]);
    expect(warnings).toEqual([
      'Loan end date not found; estimated from start date',
      'Original principal not found; estimated from balance and payments',
    ]);
  });

  it('should not return an estimated end date outside the date window', () => {
    const { record, warnings } = extract(
      [
        'Navient Statement',
        'Loan ID: NV-20002',
        'Interest Rate: 4.25%\nCurrent Balance: $8,500.00',
        'Disbursement Date: 06/01/2050',
      ],
      { referenceDate: REFERENCE_DATE }
    );

    expect(record.startDate).toEqual(new Date(2050, 5, 1));
    expect(record.endDate).toBeUndefined();
    expect(warnings).toEqual([
      'Loan end date not found; estimate falls outside the date window',
      'Original principal not found; estimated from balance and payments',
    ]);
  });

  it('should use a placeholder loan ID when none is printed', () => {
    const { record } = extract(
      [
        'Great Lakes Educational Loan Services\nInterest Rate: 3.75%\nCurrent Balance: $5,200.00\nStart Date: 08/20/2015',
      ],
      { referenceDate: REFERENCE_DATE }
    );

    expect(record.servicerName).toBe('Great Lakes');
    expect(record.loanId).toMatch(/^UNKNOWN-/);
    expect(record.startDate).toEqual(new Date(2015, 7, 20));
  });
});

describe('extraction failures', () => {
  it('should fail with DOCUMENT_EMPTY for no pages', () => {
    const error = extractionError([]);
    expect(isParsingError(error)).toBe(true);
    expect(error.code).toBe('DOCUMENT_EMPTY');
  });

  it('should fail with UNREADABLE_DOCUMENT when every line is too short', () => {
    expect(extractionError([null, '   ', 'abc']).code).toBe('UNREADABLE_DOCUMENT');
  });

  it('should fail with INVALID_FIELD_FORMAT for an out-of-range rate', () => {
    const error = extractionError([
      'Navient Loan Statement\nLoan ID: AB-1234\nInterest Rate: 25.00%\nCurrent Balance: $10,000.00',
    ]);
    expect(error.code).toBe('INVALID_FIELD_FORMAT');
    expect(error.field).toBe('interestRate');
  });

  it('should fail with MISSING_REQUIRED_FIELD when the servicer is unknown', () => {
    const error = extractionError(['account statement for borrower\nInterest Rate: 5.00%']);
    expect(error.code).toBe('MISSING_REQUIRED_FIELD');
    expect(error.message).toBe('Missing required field: Loan Servicer');
  });

  it('should fail with UNSUPPORTED_DOCUMENT_TYPE for unknown types', () => {
    const error = extractionError(SAMPLE_STATEMENT_PAGES, 'mortgage_statement');
    expect(error.code).toBe('UNSUPPORTED_DOCUMENT_TYPE');
    expect(getRegisteredTypes()).toEqual(['student_loan_statement']);
  });

  it('should throw ParsingError from extract()', () => {
    expect(() => extract([])).toThrow(ParsingError);
    expect(() => extract([])).toThrow('Document has no pages');
  });
});

describe('estimateOriginalPrincipal', () => {
  it('should add 80 percent of payments and round to the nearest 500', () => {
    const payments = [
      { date: new Date(2023, 0, 1), amount: 1000, type: 'regular' as const },
      { date: new Date(2023, 1, 1), amount: 1000, type: 'regular' as const },
    ];
    // 20,100 + 1,600 = 21,700 -> 21,500
    expect(estimateOriginalPrincipal(20100, payments)).toBe(21500);
  });
});

describe('extractAndAudit', () => {
  it('should return the record, findings and correlation ID of one run', async () => {
    const result = await extractAndAudit(SAMPLE_STATEMENT_PAGES, {
      referenceDate: REFERENCE_DATE,
      correlationId: 'test-correlation-id',
      mode: 'concurrent',
    });

    expect(result.correlationId).toBe('test-correlation-id');
    expect(result.record.loanId).toBe('NL-48213977');
    expect(result.findings).toEqual([]);
  });

  it('should generate a correlation ID when none is given', async () => {
    const result = await extractAndAudit(SAMPLE_STATEMENT_PAGES, { referenceDate: REFERENCE_DATE });
    expect(result.correlationId).toHaveLength(26);
  });

  it('should count processed documents', async () => {
    extractionError([]);
    const metrics = await getMetrics();
    expect(metrics).toContain('loan_audit_documents_processed_total{document_type="student_loan_statement",status="DOCUMENT_EMPTY"}');
  });
});
