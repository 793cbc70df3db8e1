/**
 * Text formatting for finding descriptions (en-US).
 */

import { format } from 'date-fns';

const DATE_FORMAT = 'MMM d, yyyy';

const rateFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** e.g. "Mar 15, 2021" */
export function formatDate(date: Date): string {
  return format(date, DATE_FORMAT);
}

/** e.g. "8.50%" */
export function formatInterestRate(rate: number): string {
  return `${rateFormat.format(rate)}%`;
}

/** e.g. "1,234" */
export function formatInteger(value: number): string {
  return integerFormat.format(value);
}
