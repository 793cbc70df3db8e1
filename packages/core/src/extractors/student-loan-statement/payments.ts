/**
 * Payment History Extraction
 */

import type { PaymentRecord, PaymentType } from '../../types';
import { compareDates, withinDays } from '../text/dates';
import { parseCurrencyAmount } from '../text/numbers';
import { firstMatch } from '../text/regex';
import { isSectionHeading } from '../text/sections';
import {
  PAYMENT_HISTORY_MARKERS,
  PAYMENT_AMOUNT_PATTERN,
  PAYMENT_SECTION_MIN_LINES,
} from './patterns';
import { StatementScan, containsKeyword } from './scan';

const AMOUNT_TOLERANCE = 0.01;

/**
 * Lines under the first payment history heading, up to the next heading.
 * Empty when the statement has no such section.
 */
export function findPaymentSection(lines: readonly string[]): string[] {
  const section: string[] = [];
  let inSection = false;

  for (const line of lines) {
    if (!inSection) {
      inSection = containsKeyword(line, PAYMENT_HISTORY_MARKERS);
      continue;
    }

    if (isSectionHeading(line) && section.length > PAYMENT_SECTION_MIN_LINES) {
      break;
    }
    section.push(line);
  }

  return section;
}

export function classifyPaymentType(line: string): PaymentType {
  const lower = line.toLowerCase();
  const principal = lower.includes('principal');
  const interest = lower.includes('interest');

  if (principal && !interest) return 'extra_principal';
  if (lower.includes('interest only') || (interest && !principal)) return 'interest_only';
  if (lower.includes('fee') || lower.includes('charge') || lower.includes('penalty')) return 'fee';
  return 'regular';
}

/**
 * Drop payments within a day and a cent of one already kept.
 */
export function dedupePayments(payments: readonly PaymentRecord[]): PaymentRecord[] {
  const unique: PaymentRecord[] = [];

  for (const payment of payments) {
    const duplicate = unique.some(
      (kept) =>
        Math.abs(kept.amount - payment.amount) < AMOUNT_TOLERANCE && withinDays(kept.date, payment.date, 1)
    );
    if (!duplicate) unique.push(payment);
  }

  return unique;
}

export function extractPayments(scan: StatementScan): PaymentRecord[] {
  const section = findPaymentSection(scan.lines);
  const source = section.length > 0 ? section : scan.lines;
  scan.recordStrategy('payments', section.length > 0 ? 'payment_section' : 'whole_document');

  const payments: PaymentRecord[] = [];

  for (const line of source) {
    if (firstMatch(PAYMENT_AMOUNT_PATTERN, line) === null) continue;

    const date = scan.datesIn(line)[0];
    const amount = parseCurrencyAmount(line);
    if (!date || amount === null) continue;

    payments.push({ date, amount, type: classifyPaymentType(line) });
  }

  return dedupePayments(payments).sort((a, b) => compareDates(a.date, b.date));
}
