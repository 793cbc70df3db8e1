/**
 * Document Extractors Module
 *
 * One extractor per document type, looked up through the registry.
 * Text primitives (normalization, dates, amounts, sections) are shared.
 */

// Core types and interfaces
export type {
  DocumentExtractor,
  ExtractionContext,
  ExtractorResult,
  ExtractorMetadata,
} from './types';

// Base class
export { BaseExtractor } from './base-extractor';

// Registry
export {
  registerExtractor,
  getExtractor,
  getExtractorOrThrow,
  hasExtractor,
  getRegisteredTypes,
  clearRegistry,
} from './registry';

// Text primitives
export { normalizeDocument, joinLines, type NormalizeOptions } from './text/normalize';
export {
  DateParser,
  DateWindow,
  COMMON_DATE_FORMATS,
  DATE_PATTERNS,
  withinDays,
  compareDates,
} from './text/dates';
export {
  parseCurrencyAmount,
  parsePercentage,
  parseInterestRate,
  isPlausibleInterestRate,
  MIN_INTEREST_RATE,
  MAX_INTEREST_RATE,
} from './text/numbers';
export { isSectionHeading } from './text/sections';
export { compilePattern, firstMatch, firstCapture, allMatches } from './text/regex';

// Student loan statements
export * from './student-loan-statement';

import { registerExtractor } from './registry';
import { studentLoanStatementExtractor } from './student-loan-statement';

/**
 * Register all built-in extractors.
 */
export function registerAllExtractors(): void {
  registerExtractor(studentLoanStatementExtractor);
}

// Auto-register all extractors on module load
registerAllExtractors();
