import type { Outcome, RuleParameters } from '@rulegate/core';
import type { Logger } from '@rulegate/logger';

export interface DispatcherOptions {
  /**
   * Per-handler deadline in milliseconds. Defaults to
   * RULEGATE_HANDLER_TIMEOUT_MS; `false` disables the deadline.
   */
  handlerTimeoutMs?: number | false | undefined;

  /** Logger instance. Default: the `dispatcher` category logger */
  logger?: Logger | undefined;
}

export interface DispatchOptions {
  /** Caller-driven cancellation signal */
  signal?: AbortSignal | undefined;
}

/** Anything that turns parameters into an Outcome */
export interface Dispatch<P extends RuleParameters> {
  dispatch(params: P, options?: DispatchOptions): Promise<Outcome>;
}
