/**
 * Field Extractors
 *
 * Each field is a layered search over the normalized lines: keyword lines
 * first, then wider context, then a regex over the joined text. The first
 * plausible hit in scan order wins.
 */

import { addYears } from 'date-fns';
import { ulid } from 'ulid';
import { ParsingError } from '../../errors';
import { firstCapture, firstMatch } from '../text/regex';
import {
  isPlausibleInterestRate,
  parseCurrencyAmount,
  parseInterestRate,
  parsePercentage,
} from '../text/numbers';
import {
  BALANCE_FALLBACK,
  BALANCE_KEYWORDS,
  COMPANY_NAME_PATTERNS,
  DEFAULT_LOAN_TERM_YEARS,
  END_DATE_KEYWORDS,
  INTEREST_RATE_FALLBACK,
  INTEREST_RATE_KEYWORDS,
  KNOWN_SERVICERS,
  LOAN_DETAILS_MARKERS,
  LOAN_ID_FALLBACKS,
  LOAN_ID_KEYWORDS,
  LOAN_ID_TOKEN,
  MAX_BALANCE,
  MIN_BALANCE,
  ORIGINAL_PRINCIPAL_KEYWORDS,
  START_DATE_KEYWORDS,
} from './patterns';
import { StatementScan, containsKeyword } from './scan';

/** Lines read after a loan details heading when looking for the balance */
const DETAILS_WINDOW_LINES = 10;

// ============================================================================
// Servicer
// ============================================================================

export function identifyServicer(scan: StatementScan): string {
  const header = scan.headerLines;
  const headerText = header.join(' ').toLowerCase();

  for (const servicer of KNOWN_SERVICERS) {
    if (servicer.identifiers.some((identifier) => headerText.includes(identifier))) {
      scan.recordStrategy('servicerName', 'known_servicer');
      return servicer.name;
    }
  }

  for (const line of header) {
    for (const pattern of COMPANY_NAME_PATTERNS) {
      const match = firstMatch(pattern, line);
      const company = match?.[0].trim();
      if (company && company.length > 4) {
        scan.recordStrategy('servicerName', 'company_name');
        return company;
      }
    }
  }

  for (const line of header) {
    if (!line.includes(' Loan ') && !line.includes('Servic')) continue;

    const candidate = line
      .split(/\s+/)
      .find((word) => /^[A-Z]/.test(word) && word.length > 2);
    if (candidate && candidate.length > 3) {
      scan.recordStrategy('servicerName', 'capitalized_token');
      return candidate;
    }
  }

  throw ParsingError.missingRequiredField('Loan Servicer');
}

// ============================================================================
// Loan ID
// ============================================================================

/**
 * Index of a keyword that starts at a word boundary, so "id:" does not
 * match inside "paid:".
 */
function keywordIndex(lowerLine: string, keyword: string): number {
  let index = lowerLine.indexOf(keyword);
  while (index !== -1) {
    if (index === 0 || !/[a-z]/.test(lowerLine[index - 1])) return index;
    index = lowerLine.indexOf(keyword, index + 1);
  }
  return -1;
}

/**
 * Never fails: a document without a recognizable ID gets a placeholder.
 */
export function extractLoanId(scan: StatementScan): string {
  for (const line of scan.lines) {
    const lower = line.toLowerCase();

    for (const keyword of LOAN_ID_KEYWORDS) {
      const index = keywordIndex(lower, keyword);
      if (index === -1) continue;

      const remainder = line.slice(index + keyword.length).trim();
      const token = LOAN_ID_TOKEN.exec(remainder);
      if (token) {
        scan.recordStrategy('loanId', 'keyword');
        return token[0];
      }
    }
  }

  for (const pattern of LOAN_ID_FALLBACKS) {
    const id = firstCapture(pattern, scan.text);
    if (id) {
      scan.recordStrategy('loanId', 'pattern');
      return id;
    }
  }

  const placeholder = `UNKNOWN-${ulid()}`;
  scan.recordStrategy('loanId', 'placeholder');
  scan.warn(`Loan ID not found; using placeholder ${placeholder}`);
  return placeholder;
}

// ============================================================================
// Interest rate
// ============================================================================

/**
 * @throws ParsingError INVALID_FIELD_FORMAT when the rate found is outside [0, 20]
 * @throws ParsingError MISSING_REQUIRED_FIELD when no rate is found
 */
export function extractInterestRate(scan: StatementScan): number {
  const { lines } = scan;

  for (const line of lines) {
    if (!containsKeyword(line, INTEREST_RATE_KEYWORDS)) continue;
    const rate = parseInterestRate(line);
    if (rate !== null) {
      scan.recordStrategy('interestRate', 'keyword_line');
      return rate;
    }
  }

  // Label and value may sit on adjacent lines; accept any percentage here
  for (let i = 0; i < lines.length; i++) {
    if (!containsKeyword(lines[i], INTEREST_RATE_KEYWORDS)) continue;
    const rate = parsePercentage(lines[i]) ?? (i + 1 < lines.length ? parsePercentage(lines[i + 1]) : null);
    if (rate !== null) {
      scan.recordStrategy('interestRate', 'keyword_context');
      return validatedRate(rate);
    }
  }

  const fallback = firstCapture(INTEREST_RATE_FALLBACK, scan.text);
  if (fallback !== null) {
    scan.recordStrategy('interestRate', 'pattern');
    return validatedRate(Number(fallback));
  }

  throw ParsingError.missingRequiredField('Interest Rate');
}

function validatedRate(rate: number): number {
  if (!Number.isFinite(rate) || !isPlausibleInterestRate(rate)) {
    throw ParsingError.invalidFieldFormat('interestRate');
  }
  return rate;
}

// ============================================================================
// Balances
// ============================================================================

function isPlausibleBalance(amount: number | null): amount is number {
  return amount !== null && amount > MIN_BALANCE && amount < MAX_BALANCE;
}

export function extractCurrentBalance(scan: StatementScan): number {
  const { lines } = scan;

  for (const line of lines) {
    if (!containsKeyword(line, BALANCE_KEYWORDS)) continue;
    const amount = parseCurrencyAmount(line);
    if (isPlausibleBalance(amount)) {
      scan.recordStrategy('currentBalance', 'keyword_line');
      return amount;
    }
  }

  for (let i = 0; i < lines.length; i++) {
    if (!containsKeyword(lines[i], LOAN_DETAILS_MARKERS)) continue;

    for (const line of lines.slice(i, i + DETAILS_WINDOW_LINES)) {
      const amount = parseCurrencyAmount(line);
      if (isPlausibleBalance(amount)) {
        scan.recordStrategy('currentBalance', 'details_section');
        return amount;
      }
    }
  }

  const fallback = firstCapture(BALANCE_FALLBACK, scan.text);
  const amount = fallback === null ? null : Number(fallback.replace(/,/g, ''));
  if (isPlausibleBalance(amount)) {
    scan.recordStrategy('currentBalance', 'pattern');
    return amount;
  }

  throw ParsingError.missingRequiredField('Current Balance');
}

/**
 * Returns null when the statement does not state the original principal.
 */
export function extractOriginalPrincipal(scan: StatementScan): number | null {
  for (const line of scan.lines) {
    if (!containsKeyword(line, ORIGINAL_PRINCIPAL_KEYWORDS)) continue;
    const amount = parseCurrencyAmount(line);
    if (isPlausibleBalance(amount)) {
      scan.recordStrategy('originalPrincipal', 'keyword_line');
      return amount;
    }
  }
  return null;
}

// ============================================================================
// Loan dates
// ============================================================================

export interface LoanDates {
  startDate: Date;
  /** Absent when the ten-year estimate would fall outside the date window */
  endDate?: Date;
  endDateEstimated: boolean;
}

export function extractLoanDates(scan: StatementScan): LoanDates {
  let startDate: Date | null = null;
  let endDate: Date | null = null;

  for (const line of scan.lines) {
    if (!startDate && containsKeyword(line, START_DATE_KEYWORDS)) {
      startDate = scan.datesIn(line)[0] ?? null;
    }
    if (!endDate && containsKeyword(line, END_DATE_KEYWORDS)) {
      endDate = scan.datesIn(line)[0] ?? null;
    }
    if (startDate && endDate) break;
  }

  if (startDate) {
    scan.recordStrategy('startDate', 'keyword_line');
  } else {
    startDate = scan.earliestDate();
    if (!startDate) {
      throw ParsingError.missingRequiredField('Loan Start Date');
    }
    scan.recordStrategy('startDate', 'earliest_date');
  }

  if (endDate) {
    scan.recordStrategy('endDate', 'keyword_line');
    return { startDate, endDate, endDateEstimated: false };
  }

  const estimated = addYears(startDate, DEFAULT_LOAN_TERM_YEARS);
  if (!scan.dateWindow.contains(estimated)) {
    scan.recordStrategy('endDate', 'out_of_window');
    return { startDate, endDateEstimated: false };
  }

  scan.recordStrategy('endDate', 'estimated');
  return { startDate, endDate: estimated, endDateEstimated: true };
}
