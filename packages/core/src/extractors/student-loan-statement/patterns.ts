/**
 * Student Loan Statement Patterns
 *
 * Keyword tables and regular expressions used to locate fields and
 * sections in servicer statements. Keywords are matched as lower-case
 * substrings of a line; regexes run against single lines or the joined
 * document text.
 */

import { SLASH_DATE } from '../text/dates';

export interface KnownServicer {
  name: string;
  identifiers: readonly string[];
}

/**
 * Checked in order against the lower-cased header window.
 */
export const KNOWN_SERVICERS: readonly KnownServicer[] = [
  { name: 'Navient', identifiers: ['navient', 'navient.com'] },
  { name: 'Nelnet', identifiers: ['nelnet', 'nelnet.com'] },
  { name: 'Great Lakes', identifiers: ['great lakes', 'mygreatlakes'] },
  { name: 'FedLoan Servicing', identifiers: ['fedloan', 'myfedloan'] },
  { name: 'MOHELA', identifiers: ['mohela'] },
];

export const COMPANY_NAME_PATTERNS: readonly RegExp[] = [
  /(?:[A-Z][a-z]+ ){1,3}(?:Servicing|Financial|Services|Corporation|Corp\.|Inc\.)/,
  /(?:[A-Z][A-Za-z]+ ){1,2}Student Loan/,
];

export const LOAN_DETAILS_MARKERS = ['loan details', 'loan information', 'loan summary', 'account summary'];

export const INTEREST_RATE_KEYWORDS = ['interest rate', 'rate', 'apr', 'annual percentage rate'];

export const INTEREST_RATE_FALLBACK = /interest\s+rate.*?(\d+\.\d+)%/i;

export const BALANCE_KEYWORDS = [
  'current balance',
  'outstanding balance',
  'principal balance',
  'current principal',
  'total balance',
  'balance',
];

export const BALANCE_FALLBACK =
  /(?:current|outstanding|total|principal)\s+balance.{0,20}?\$(\d{1,3}(?:,\d{3})*(?:\.\d{2})?)/i;

export const MIN_BALANCE = 100;
export const MAX_BALANCE = 500_000;

export const LOAN_ID_KEYWORDS = ['loan #', 'loan number', 'account number', 'id:', 'loan id'];

export const LOAN_ID_TOKEN = /[a-zA-Z0-9-]{4,}/;

export const LOAN_ID_FALLBACKS: readonly RegExp[] = [
  /Loan ID:?\s*([A-Z0-9-]{4,})/i,
  /Account #:?\s*([A-Z0-9-]{4,})/i,
  /Loan\s*#:?\s*([A-Z0-9-]{4,})/i,
  /\bID\b:?\s*([A-Z0-9-]{4,})/i,
  /Loan Number:?\s*([A-Z0-9-]{4,})/i,
];

export const START_DATE_KEYWORDS = ['loan date', 'disbursement date', 'start date', 'originated', 'issue date'];

export const END_DATE_KEYWORDS = ['maturity date', 'payoff date', 'term end', 'end date', 'final payment date'];

export const DEFAULT_LOAN_TERM_YEARS = 10;

export const ORIGINAL_PRINCIPAL_KEYWORDS = [
  'original principal',
  'initial principal',
  'original loan amount',
  'principal balance at disbursal',
  'loan amount',
];

// ============================================================================
// Payments
// ============================================================================

export const PAYMENT_HISTORY_MARKERS = [
  'payment history',
  'transaction history',
  'payment activity',
  'transaction details',
  'payment record',
];

/** Lines a payment section must hold before a heading may close it */
export const PAYMENT_SECTION_MIN_LINES = 5;

const DOLLAR_VALUE = String.raw`\$\s*\d{1,3}(?:,\d{3})*(?:\.\d{2})?`;

/** A payment row is any line holding a date and a dollar amount */
export const PAYMENT_AMOUNT_PATTERN = new RegExp(String.raw`-?${DOLLAR_VALUE}`);

// ============================================================================
// Non-payment periods
// ============================================================================

export const NON_PAYMENT_KEYWORDS = ['forbearance', 'deferment'] as const;

/** Lines a non-payment section must hold before a heading may close it */
export const NON_PAYMENT_SECTION_MIN_LINES = 2;

/** Longest span accepted when pairing loose dates inside a section */
export const SECTION_PERIOD_MAX_DAYS = 60;

const KIND = `(?<kind>${NON_PAYMENT_KEYWORDS.join('|')})`;
const RANGE_WORD = String.raw`\b(?:to|through|until)\b`;

export const NON_PAYMENT_RANGE_PATTERNS: readonly RegExp[] = [
  new RegExp(
    String.raw`${KIND}.{0,50}?(?<start>${SLASH_DATE}).{0,20}?${RANGE_WORD}.{0,20}?(?<end>${SLASH_DATE})`,
    'gi'
  ),
  new RegExp(
    String.raw`${KIND}.{0,50}?\bfrom\b.{0,20}?(?<start>${SLASH_DATE}).{0,20}?${RANGE_WORD}.{0,20}?(?<end>${SLASH_DATE})`,
    'gi'
  ),
  new RegExp(
    String.raw`(?<start>${SLASH_DATE}).{0,20}?${RANGE_WORD}.{0,20}?(?<end>${SLASH_DATE}).{0,50}?${KIND}`,
    'gi'
  ),
];

/**
 * Reason patterns for a given non-payment kind, run against lower-cased text.
 */
export function reasonPatterns(kind: string): string[] {
  return [
    String.raw`reason:\s*([^\n.]{3,50})`,
    String.raw`due to\s*([^\n.]{3,50})`,
    String.raw`reason for\s*${kind}\s*:?\s*([^\n.]{3,50})`,
    String.raw`${kind}\s*for\s*([^\n.]{3,50})`,
    String.raw`${kind}\s*-\s*([^\n.]{3,50})`,
  ];
}

/** Characters after a matched range searched for a reason */
export const REASON_CONTEXT_CHARS = 120;

// ============================================================================
// Capitalization
// ============================================================================

export const CAPITALIZATION_MARKERS = [
  'capitalized interest',
  'interest capitalization',
  'capitalization event',
];

/** Characters on each side of a marker searched for dates */
export const CAPITALIZATION_CONTEXT_CHARS = 100;

export const CAPITALIZATION_DATE_PATTERNS: readonly RegExp[] = [
  new RegExp(String.raw`interest.{0,10}capitalized.{0,30}?(${SLASH_DATE})`, 'gi'),
  new RegExp(String.raw`(${SLASH_DATE}).{0,30}interest.{0,10}capitalized`, 'gi'),
  new RegExp(String.raw`capitalization.{0,10}date.{0,10}?(${SLASH_DATE})`, 'gi'),
];

export const CAPITALIZATION_AMOUNT_PATTERN =
  /(?:capitalized|capitalization).{0,30}?\$(\d{1,3}(?:,\d{3})*(?:\.\d{2})?)/gi;

/** Characters before an amount mention searched for dates */
export const CAPITALIZATION_AMOUNT_LOOKBEHIND = 50;
