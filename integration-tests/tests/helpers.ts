/**
 * Test Helpers
 *
 * Builders for loan records and statement fixtures.
 */

import type { LoanRecord, NonPaymentPeriod, PaymentRecord } from '@loan-audit/core';

/** Anchor for every date window in the suite: window is 2000-01-01 .. 2055-01-01 */
export const REFERENCE_DATE = new Date(2025, 0, 1);

/**
 * One regular payment per month, starting at `start`.
 */
export function monthlyPayments(start: Date, count: number, amount = 350): PaymentRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    date: new Date(start.getFullYear(), start.getMonth() + i, start.getDate()),
    amount,
    type: 'regular' as const,
  }));
}

export function forbearance(startDate: Date, endDate: Date, reason?: string): NonPaymentPeriod {
  return reason === undefined
    ? { kind: 'forbearance', startDate, endDate }
    : { kind: 'forbearance', startDate, endDate, reason };
}

/**
 * A clean record: rate under the federal threshold, two years of contiguous
 * monthly payments, no forbearance and no capitalization.
 */
export function makeRecord(overrides: Partial<LoanRecord> = {}): LoanRecord {
  return {
    servicerName: 'Test Servicer',
    loanId: 'TEST-12345',
    interestRate: 5.0,
    currentBalance: 22000,
    originalPrincipal: 25000,
    originalPrincipalEstimated: false,
    startDate: new Date(2019, 0, 15),
    endDate: new Date(2029, 0, 15),
    nonPaymentPeriods: [],
    payments: monthlyPayments(new Date(2019, 1, 15), 24),
    capitalizationEvents: [],
    ...overrides,
  };
}

/**
 * A three-page servicer statement with a payment history, one forbearance
 * period and one capitalization event.
 */
export const SAMPLE_STATEMENT_PAGES: string[] = [
  `Nelnet Student Loan Statement
Account Number: NL-48213977
Statement Date: 03/01/2024
Loan Details
Interest Rate: 5.50%
Current Balance: $24,350.75
Original Principal: $30,000.00
Disbursement Date: 09/15/2016
Maturity Date: 09/15/2026`,
  `PAYMENT HISTORY
01/15/2024 Payment Received $350.00
12/15/2023 Payment Received $350.00
11/15/2023 Payment Received $350.00
11/15/2023 Payment Received $350.00
10/16/2023 Principal Payment $500.00
09/15/2023 Late Fee Charged $25.00`,
  `FORBEARANCE HISTORY
Forbearance from 03/01/2020 to 09/30/2021 due to economic hardship.
Repayment resumed with the next billing cycle.
Interest capitalized on 10/01/2021 in the amount of $1,204.18`,
];
