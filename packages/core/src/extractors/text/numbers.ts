/**
 * Currency and percentage parsing
 */

/**
 * Dollar-marked amount: $1,234.56, -$50.00, $-50.00, ($75.00)
 */
const DOLLAR_AMOUNT = /(\()?\s*(-)?\s*\$\s*(-)?\s*(\d[\d,]*(?:\.\d{1,2})?)\s*(\))?/;

/**
 * Bare amount: 1,234.56, -50, (75.00)
 */
const BARE_AMOUNT = /(\()?\s*(-)?(\d[\d,]*(?:\.\d{1,2})?)(\))?/;

const PERCENTAGE = /(\d+(?:\.\d+)?)%/;

export const MIN_INTEREST_RATE = 0;
export const MAX_INTEREST_RATE = 20;

/**
 * Extract a currency amount from text.
 *
 * A dollar-marked amount is preferred; otherwise the first bare number is
 * used. Thousands separators are stripped. Parenthesized or minus-signed
 * amounts are negative.
 */
export function parseCurrencyAmount(text: string): number | null {
  const dollar = DOLLAR_AMOUNT.exec(text);
  if (dollar) {
    return toSignedAmount(dollar[4], Boolean(dollar[1] && dollar[5]), Boolean(dollar[2] || dollar[3]));
  }

  const bare = BARE_AMOUNT.exec(text);
  if (bare) {
    return toSignedAmount(bare[3], Boolean(bare[1] && bare[4]), Boolean(bare[2]));
  }

  return null;
}

function toSignedAmount(digits: string, parenthesized: boolean, minus: boolean): number | null {
  const value = Number(digits.replace(/,/g, ''));
  if (!Number.isFinite(value)) return null;
  return parenthesized || minus ? -value : value;
}

/**
 * First percentage in text, without any range check.
 */
export function parsePercentage(text: string): number | null {
  const match = PERCENTAGE.exec(text);
  if (!match) return null;
  const value = Number(match[1]);
  return Number.isFinite(value) ? value : null;
}

/**
 * First percentage in text, accepted only when it is a plausible loan rate.
 */
export function parseInterestRate(text: string): number | null {
  const rate = parsePercentage(text);
  if (rate === null || !isPlausibleInterestRate(rate)) return null;
  return rate;
}

export function isPlausibleInterestRate(rate: number): boolean {
  return rate >= MIN_INTEREST_RATE && rate <= MAX_INTEREST_RATE;
}
