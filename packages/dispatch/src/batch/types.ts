import type { DispatchFailure, Outcome, RuleParameters, RuleResult } from '@rulegate/core';
import type { Logger } from '@rulegate/logger';

/**
 * What a business-rule rejection does to the rest of a batch.
 * `stop`: the first rejection ends the run.
 * `collect`: keep evaluating and report every rejection.
 */
export type RejectionPolicy = 'stop' | 'collect';

export interface BatchExecutorOptions<P extends RuleParameters> {
  /** Default: RULEGATE_REJECTION_POLICY, which defaults to `stop` */
  rejectionPolicy?: RejectionPolicy | undefined;

  /** Called after every dispatch, before the executor decides whether to continue */
  onOutcome?: ((params: P, outcome: Outcome, index: number) => void) | undefined;

  /** Logger instance. Default: the `batch-executor` category logger */
  logger?: Logger | undefined;
}

export interface RunAllOptions {
  /** Caller-driven cancellation, forwarded to every dispatch */
  signal?: AbortSignal | undefined;
}

interface BatchRunBase {
  /** Produced results in input order, up to and including the point of early exit */
  readonly results: readonly RuleResult[];
  /** The business-rule rejections among `results` */
  readonly rejections: readonly RuleResult[];
  /** How many parameter objects were dispatched */
  readonly evaluated: number;
}

/** Every element was evaluated and none was a business-rule rejection */
export interface BatchCompleted extends BatchRunBase {
  readonly status: 'completed';
}

export interface BatchRejected extends BatchRunBase {
  readonly status: 'rejected';
}

/** A dispatch failed; nothing after `failedIndex` was evaluated */
export interface BatchFailed extends BatchRunBase {
  readonly status: 'failed';
  readonly error: DispatchFailure;
  readonly failedIndex: number;
}

export type BatchRunResult = BatchCompleted | BatchRejected | BatchFailed;
