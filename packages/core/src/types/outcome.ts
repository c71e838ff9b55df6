import type { DispatchFailure } from '../errors/index.js';

import type { RuleResult } from './rule-result.js';

export interface ProducedOutcome {
  readonly status: 'produced';
  readonly result: RuleResult;
}

/** The rule ran and had nothing to report; counts as a pass */
export interface EmptyOutcome {
  readonly status: 'empty';
}

/** Infrastructure failure, distinct from a business-rule rejection */
export interface FailedOutcome {
  readonly status: 'failed';
  readonly error: DispatchFailure;
}

export type Outcome = ProducedOutcome | EmptyOutcome | FailedOutcome;

export type OutcomeStatus = Outcome['status'];

const EMPTY: EmptyOutcome = Object.freeze({ status: 'empty' });

export function produced(result: RuleResult): ProducedOutcome {
  return Object.freeze({ status: 'produced', result });
}

export function empty(): EmptyOutcome {
  return EMPTY;
}

export function failed(error: DispatchFailure): FailedOutcome {
  return Object.freeze({ status: 'failed', error });
}

export interface OutcomeCases<T> {
  produced: (result: RuleResult) => T;
  empty: () => T;
  failed: (error: DispatchFailure) => T;
}

/**
 * Exhaustive handling of the three outcome shapes
 */
export function matchOutcome<T>(outcome: Outcome, cases: OutcomeCases<T>): T {
  switch (outcome.status) {
    case 'produced':
      return cases.produced(outcome.result);
    case 'empty':
      return cases.empty();
    case 'failed':
      return cases.failed(outcome.error);
  }
}
