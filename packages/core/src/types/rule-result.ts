/**
 * Why a rule did not pass. `business_rule` is the deliberate domain veto that
 * ends a batch early; the other reasons are reported but do not stop it.
 */
export type FailureReason = 'none' | 'business_rule' | 'validation' | 'dependency';

export interface RuleResult {
  readonly success: boolean;
  readonly message: string;
  readonly errorCode: number;
  readonly failureReason: FailureReason;
}

/** Error code carried by passing results */
export const NO_ERROR_CODE = 0;

export function passed(message = ''): RuleResult {
  return Object.freeze({
    success: true,
    message,
    errorCode: NO_ERROR_CODE,
    failureReason: 'none' as const,
  });
}

/**
 * A deliberate business-rule rejection
 */
export function rejected(message: string, errorCode: number): RuleResult {
  return failedWith('business_rule', message, errorCode);
}

export function failedWith(reason: Exclude<FailureReason, 'none'>, message: string, errorCode: number): RuleResult {
  return Object.freeze({
    success: false,
    message,
    errorCode,
    failureReason: reason,
  });
}

export function isBusinessRejection(result: RuleResult): boolean {
  return !result.success && result.failureReason === 'business_rule';
}
