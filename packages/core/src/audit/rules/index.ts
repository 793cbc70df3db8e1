import type { AuditPolicy } from '../../config';
import { ExcessiveForbearanceRule } from './excessive-forbearance';
import { ExtendedNonPaymentRule } from './extended-non-payment';
import { HighInterestRateRule } from './high-interest-rate';
import { UnexplainedCapitalizationRule } from './unexplained-capitalization';
import type { AuditRule } from './types';

export type { AuditRule } from './types';
export { ExcessiveForbearanceRule, type ForbearancePolicy } from './excessive-forbearance';
export {
  UnexplainedCapitalizationRule,
  type CapitalizationPolicy,
} from './unexplained-capitalization';
export { ExtendedNonPaymentRule, type NonPaymentPolicy } from './extended-non-payment';
export { HighInterestRateRule, type InterestRatePolicy } from './high-interest-rate';

/**
 * Built-in rules in their default evaluation order.
 */
export function createDefaultRules(policy: Partial<AuditPolicy> = {}): AuditRule[] {
  return [
    new ExcessiveForbearanceRule(policy),
    new UnexplainedCapitalizationRule(policy),
    new ExtendedNonPaymentRule(policy),
    new HighInterestRateRule(policy),
  ];
}
