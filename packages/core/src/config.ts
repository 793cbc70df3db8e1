/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type AuditMode = 'sequential' | 'concurrent';

export interface AuditPolicy {
  // Forbearance
  maxForbearanceMonths: number;
  severeForbearanceMonths: number;

  // Payment gaps
  minNonPaymentMonths: number;
  moderateNonPaymentDays: number;
  highNonPaymentDays: number;

  // Interest rate
  standardMaxInterestRate: number;
  moderateExcessInterestRate: number;
  highExcessInterestRate: number;

  // Capitalization
  highCapitalizationEventCount: number;
  capitalizationWindowDays: number;
}

export interface Config {
  // Logging
  logLevel: LogLevel;

  // Text normalization
  minLineLength: number;
  headerWindowLines: number;
  sectionMaxLines: number;

  // Date validity window, relative to the run date
  dateWindowPastYears: number;
  dateWindowFutureYears: number;

  // Audit
  auditMode: AuditMode;
  auditPolicy: AuditPolicy;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === value);
  return level ?? 'info';
}

function parseAuditMode(value: string | undefined): AuditMode {
  return value === 'concurrent' ? 'concurrent' : 'sequential';
}

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export const DEFAULT_AUDIT_POLICY: Readonly<AuditPolicy> = Object.freeze({
  maxForbearanceMonths: 36,
  severeForbearanceMonths: 60,
  minNonPaymentMonths: 2,
  moderateNonPaymentDays: 90,
  highNonPaymentDays: 180,
  standardMaxInterestRate: 6.8,
  moderateExcessInterestRate: 1.5,
  highExcessInterestRate: 3.0,
  highCapitalizationEventCount: 3,
  capitalizationWindowDays: 30,
});

export const config: Config = {
  // Logging
  logLevel: parseLogLevel(process.env.LOG_LEVEL),

  // Text normalization
  minLineLength: parseInt(process.env.MIN_LINE_LENGTH || '5', 10),
  headerWindowLines: parseInt(process.env.HEADER_WINDOW_LINES || '30', 10),
  sectionMaxLines: parseInt(process.env.SECTION_MAX_LINES || '12', 10),

  // Date validity window
  dateWindowPastYears: parseInt(process.env.DATE_WINDOW_PAST_YEARS || '25', 10),
  dateWindowFutureYears: parseInt(process.env.DATE_WINDOW_FUTURE_YEARS || '30', 10),

  // Audit
  auditMode: parseAuditMode(process.env.AUDIT_MODE),
  auditPolicy: {
    maxForbearanceMonths: parseNumber(
      process.env.FORBEARANCE_MAX_MONTHS,
      DEFAULT_AUDIT_POLICY.maxForbearanceMonths
    ),
    severeForbearanceMonths: parseNumber(
      process.env.FORBEARANCE_SEVERE_MONTHS,
      DEFAULT_AUDIT_POLICY.severeForbearanceMonths
    ),
    minNonPaymentMonths: parseNumber(
      process.env.NON_PAYMENT_MIN_MONTHS,
      DEFAULT_AUDIT_POLICY.minNonPaymentMonths
    ),
    moderateNonPaymentDays: parseNumber(
      process.env.NON_PAYMENT_MODERATE_DAYS,
      DEFAULT_AUDIT_POLICY.moderateNonPaymentDays
    ),
    highNonPaymentDays: parseNumber(
      process.env.NON_PAYMENT_HIGH_DAYS,
      DEFAULT_AUDIT_POLICY.highNonPaymentDays
    ),
    standardMaxInterestRate: parseNumber(
      process.env.INTEREST_RATE_THRESHOLD,
      DEFAULT_AUDIT_POLICY.standardMaxInterestRate
    ),
    moderateExcessInterestRate: parseNumber(
      process.env.INTEREST_EXCESS_MODERATE,
      DEFAULT_AUDIT_POLICY.moderateExcessInterestRate
    ),
    highExcessInterestRate: parseNumber(
      process.env.INTEREST_EXCESS_HIGH,
      DEFAULT_AUDIT_POLICY.highExcessInterestRate
    ),
    highCapitalizationEventCount: parseNumber(
      process.env.CAPITALIZATION_HIGH_COUNT,
      DEFAULT_AUDIT_POLICY.highCapitalizationEventCount
    ),
    capitalizationWindowDays: parseNumber(
      process.env.CAPITALIZATION_WINDOW_DAYS,
      DEFAULT_AUDIT_POLICY.capitalizationWindowDays
    ),
  },
};
