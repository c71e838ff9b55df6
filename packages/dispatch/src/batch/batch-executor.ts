/**
 * Sequential batch executor
 *
 * A fold over the input with two distinct early exits: a `failed` Outcome
 * (operator problem) always aborts, and a business-rule rejection (user
 * problem) aborts under the `stop` policy. Elements after an early exit are
 * never dispatched, so evaluation is strictly one at a time in input order.
 */

import { isBusinessRejection, toError, type Outcome, type RuleParameters, type RuleResult } from '@rulegate/core';
import { getRejectionPolicy } from '@rulegate/env';
import { getLogger, type Logger } from '@rulegate/logger';

import type { Dispatch } from '../dispatcher/types.js';

import type { BatchExecutorOptions, BatchRunResult, RejectionPolicy, RunAllOptions } from './types.js';

export class BatchExecutor<P extends RuleParameters> {
  private readonly logger: Logger;
  private readonly onOutcome: BatchExecutorOptions<P>['onOutcome'];
  readonly rejectionPolicy: RejectionPolicy;

  constructor(
    private readonly dispatcher: Dispatch<P>,
    options?: BatchExecutorOptions<P>
  ) {
    this.logger = options?.logger ?? getLogger('batch-executor');
    this.onOutcome = options?.onOutcome;
    this.rejectionPolicy = options?.rejectionPolicy ?? getRejectionPolicy();
  }

  async runAll(sequence: Iterable<P>, options?: RunAllOptions): Promise<BatchRunResult> {
    const results: RuleResult[] = [];
    const rejections: RuleResult[] = [];
    let index = 0;

    for (const params of sequence) {
      const outcome = await this.dispatcher.dispatch(params, { signal: options?.signal });
      this.notify(params, outcome, index);
      const evaluated = index + 1;

      if (outcome.status === 'failed') {
        this.logger.warn(
          { tag: params.kind, index, code: outcome.error.code, evaluated },
          `Batch aborted at element ${index}: ${outcome.error.message}`
        );
        return {
          status: 'failed',
          results: Object.freeze(results),
          rejections: Object.freeze(rejections),
          evaluated,
          error: outcome.error,
          failedIndex: index,
        };
      }

      if (outcome.status === 'produced') {
        results.push(outcome.result);

        if (isBusinessRejection(outcome.result)) {
          rejections.push(outcome.result);

          if (this.rejectionPolicy === 'stop') {
            this.logger.debug(
              { tag: params.kind, index, errorCode: outcome.result.errorCode },
              `Batch stopped by business rule at element ${index}`
            );
            return {
              status: 'rejected',
              results: Object.freeze(results),
              rejections: Object.freeze(rejections),
              evaluated,
            };
          }
        }
      }

      index = evaluated;
    }

    this.logger.debug({ evaluated: index, rejections: rejections.length }, `Batch finished after ${index} rule(s)`);

    return {
      status: rejections.length > 0 ? 'rejected' : 'completed',
      results: Object.freeze(results),
      rejections: Object.freeze(rejections),
      evaluated: index,
    };
  }

  /** Observer failures are logged and never change the run */
  private notify(params: P, outcome: Outcome, index: number): void {
    if (!this.onOutcome) return;
    try {
      this.onOutcome(params, outcome, index);
    } catch (error) {
      this.logger.warn(
        { tag: params.kind, index, error: toError(error) },
        `onOutcome observer threw at element ${index}`
      );
    }
  }
}
