import type { HandlerNotFoundError, Outcome, ParametersOfKind, RuleParameters, TagOf } from '@rulegate/core';
import type { Logger } from '@rulegate/logger';
import type { Result } from 'neverthrow';

/** What a handler gets besides its parameters */
export interface HandlerContext {
  /** Tag the handler was resolved for */
  readonly tag: string;
  /** Aborted when the caller cancels or the handler deadline passes */
  readonly signal: AbortSignal;
  /** Dispatcher logger bound to this rule's tag */
  readonly logger: Logger;
}

export type RuleHandler<P extends RuleParameters> = (params: P, context: HandlerContext) => Outcome | Promise<Outcome>;

export interface HandlerRegistration<P extends RuleParameters> {
  readonly tag: TagOf<P>;
  readonly handler: RuleHandler<P>;
}

/**
 * One handler per variant of `P`. Leaving a variant out is a compile error.
 */
export type HandlerTable<P extends RuleParameters> = {
  readonly [K in TagOf<P>]: RuleHandler<ParametersOfKind<P, K>>;
};

export interface SealOptions<P extends RuleParameters> {
  /** Tags that must have a handler before the registry may seal */
  expectedTags?: readonly TagOf<P>[] | undefined;
}

/**
 * Read-only view of a registry whose registration phase has ended.
 * Safe to share between concurrent dispatches.
 */
export interface SealedHandlerRegistry<P extends RuleParameters> {
  readonly sealed: true;
  readonly size: number;
  resolve(tag: string): Result<RuleHandler<P>, HandlerNotFoundError>;
  has(tag: string): boolean;
  tags(): TagOf<P>[];
}
