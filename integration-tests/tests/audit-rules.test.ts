/**
 * Audit Rule Tests
 */

import {
  ExcessiveForbearanceRule,
  ExtendedNonPaymentRule,
  HighInterestRateRule,
  SEVERITY_ORDER,
  UnexplainedCapitalizationRule,
} from '@loan-audit/core';
import { forbearance, makeRecord, monthlyPayments } from './helpers';

describe('ExcessiveForbearanceRule', () => {
  const rule = new ExcessiveForbearanceRule();

  it('should flag 40 months of forbearance as moderate', () => {
    const period = forbearance(new Date(2020, 0, 1), new Date(2023, 4, 1));
    const finding = rule.evaluate(makeRecord({ nonPaymentPeriods: [period] }));

    expect(finding).toMatchObject({
      issueType: 'excessive_forbearance',
      ruleCode: 'FORBEAR_EXCESS_001',
      title: 'Excessive Forbearance Duration',
      severity: 'moderate',
      description:
        'Loan has 40 months of forbearance, which exceeds the recommended maximum of 36 months',
    });
    expect(finding?.affectedDates).toEqual([new Date(2020, 0, 1), new Date(2023, 4, 1)]);
  });

  it('should not flag exactly the maximum', () => {
    const period = forbearance(new Date(2020, 0, 1), new Date(2023, 0, 1));
    expect(rule.evaluate(makeRecord({ nonPaymentPeriods: [period] }))).toBeNull();
  });

  it('should escalate to high past the severe threshold', () => {
    const period = forbearance(new Date(2015, 0, 1), new Date(2020, 2, 1));
    expect(rule.evaluate(makeRecord({ nonPaymentPeriods: [period] }))?.severity).toBe('high');
  });

  it('should ignore deferment periods', () => {
    const deferment = { kind: 'deferment' as const, startDate: new Date(2015, 0, 1), endDate: new Date(2020, 2, 1) };
    expect(rule.evaluate(makeRecord({ nonPaymentPeriods: [deferment] }))).toBeNull();
  });

  it('should honour a custom maximum', () => {
    const custom = new ExcessiveForbearanceRule({ maxForbearanceMonths: 12 });
    const period = forbearance(new Date(2020, 0, 1), new Date(2021, 6, 1));
    expect(custom.evaluate(makeRecord({ nonPaymentPeriods: [period] }))).toMatchObject({
      severity: 'moderate',
      description: 'Loan has 18 months of forbearance, which exceeds the recommended maximum of 12 months',
    });
  });
});

describe('UnexplainedCapitalizationRule', () => {
  const rule = new UnexplainedCapitalizationRule();

  it('should flag four unexplained events as high', () => {
    const events = [new Date(2020, 2, 10), new Date(2020, 5, 10), new Date(2020, 8, 10), new Date(2020, 11, 10)];
    const finding = rule.evaluate(makeRecord({ capitalizationEvents: events }));

    expect(finding).toMatchObject({
      issueType: 'unexplained_capitalization',
      ruleCode: 'CAP_UNEXP_001',
      severity: 'high',
      description:
        'Found 4 unexplained interest capitalization events on: Mar 10, 2020, Jun 10, 2020, Sep 10, 2020, Dec 10, 2020',
    });
    expect(finding?.affectedDates).toEqual(events);
  });

  it('should treat events near the end of a non-payment period as explained', () => {
    const period = forbearance(new Date(2021, 0, 1), new Date(2021, 5, 30));
    const finding = rule.evaluate(
      makeRecord({
        nonPaymentPeriods: [period],
        capitalizationEvents: [new Date(2021, 6, 20), new Date(2021, 7, 5)],
      })
    );

    expect(finding).toMatchObject({
      severity: 'moderate',
      description: 'Found 1 unexplained interest capitalization events on: Aug 5, 2021',
    });
  });

  it('should return null without capitalization events', () => {
    expect(rule.evaluate(makeRecord())).toBeNull();
  });
});

describe('ExtendedNonPaymentRule', () => {
  const rule = new ExtendedNonPaymentRule();

  const gappedPayments = [
    ...monthlyPayments(new Date(2019, 1, 15), 12),
    ...monthlyPayments(new Date(2020, 5, 15), 6),
  ];

  it('should flag an unexplained five month gap as moderate', () => {
    const finding = rule.evaluate(makeRecord({ payments: gappedPayments }));

    expect(finding).toMatchObject({
      issueType: 'extended_non_payment',
      ruleCode: 'NONPAY_001',
      title: 'Extended Non-Payment Period',
      severity: 'moderate',
      description:
        'Found 1 periods of non-payment without corresponding forbearance or deferment status: ' +
        'From Jan 15, 2020 to Jun 15, 2020',
    });
    expect(finding?.affectedDates).toEqual([new Date(2020, 0, 15), new Date(2020, 5, 15)]);
  });

  it('should not flag a gap covered by forbearance', () => {
    const period = forbearance(new Date(2020, 1, 1), new Date(2020, 4, 31));
    expect(rule.evaluate(makeRecord({ payments: gappedPayments, nonPaymentPeriods: [period] }))).toBeNull();
  });

  it('should floor short gaps at low severity', () => {
    const payments = [...monthlyPayments(new Date(2019, 1, 15), 12), ...monthlyPayments(new Date(2020, 2, 15), 3)];
    expect(rule.evaluate(makeRecord({ payments }))?.severity).toBe('low');
  });

  it('should return null for contiguous monthly payments', () => {
    expect(rule.evaluate(makeRecord())).toBeNull();
  });
});

describe('HighInterestRateRule', () => {
  const rule = new HighInterestRateRule();

  it('should flag 8.5 percent as moderate', () => {
    expect(rule.evaluate(makeRecord({ interestRate: 8.5 }))).toMatchObject({
      issueType: 'high_interest_rate',
      ruleCode: 'INTEREST_HIGH_001',
      title: 'Unusually High Interest Rate',
      severity: 'moderate',
      description: 'Loan interest rate of 8.50% exceeds typical federal loan rate of 6.80%',
      docsUrl: 'https://studentaid.gov/understand-aid/types/loans/interest-rates',
    });
  });

  it.each([
    [7.0, 'low'],
    [10.0, 'high'],
  ])('should rate %p as %s', (interestRate, severity) => {
    expect(rule.evaluate(makeRecord({ interestRate }))?.severity).toBe(severity);
  });

  it('should not flag the threshold itself', () => {
    expect(rule.evaluate(makeRecord({ interestRate: 6.8 }))).toBeNull();
  });

  it('should never lower severity as the excess grows', () => {
    const rates = [6.9, 7.5, 8.3, 8.4, 9.0, 9.9, 12, 20];
    const ranks = rates.map((interestRate) => {
      const severity = rule.evaluate(makeRecord({ interestRate }))?.severity;
      return severity ? SEVERITY_ORDER.indexOf(severity) : -1;
    });

    for (let i = 1; i < ranks.length; i++) {
      expect(ranks[i]).toBeGreaterThanOrEqual(ranks[i - 1]);
    }
  });
});
