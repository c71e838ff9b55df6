/**
 * Single-rule dispatcher
 *
 * Resolves the handler for a parameter object's tag and returns the handler's
 * Outcome verbatim. Every infrastructure problem (missing handler, thrown
 * handler, deadline, cancellation) comes back as a `failed` Outcome; nothing
 * here throws once the dispatcher is constructed. No retries.
 */

import {
  DispatchAbortedError,
  failed,
  HandlerFailedError,
  HandlerTimeoutError,
  tagOf,
  toError,
  type FailedOutcome,
  type Outcome,
  type RuleParameters,
} from '@rulegate/core';
import { getHandlerTimeoutMs } from '@rulegate/env';
import { getLogger, type Logger } from '@rulegate/logger';

import type { HandlerContext, SealedHandlerRegistry } from '../registry/types.js';

import type { Dispatch, DispatcherOptions, DispatchOptions } from './types.js';

/** Race a promise against an AbortSignal; rejects with the signal reason on abort */
function raceAgainstSignal<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(toError(signal.reason));
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(toError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function resolveTimeout(configured: number | false | undefined): number | undefined {
  if (configured === false) return undefined;

  const timeoutMs = configured ?? getHandlerTimeoutMs();
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new RangeError(`handlerTimeoutMs must be a positive number, got ${timeoutMs}`);
  }
  return timeoutMs;
}

export class RuleDispatcher<P extends RuleParameters> implements Dispatch<P> {
  private readonly logger: Logger;
  readonly handlerTimeoutMs: number | undefined;

  constructor(
    private readonly registry: SealedHandlerRegistry<P>,
    options?: DispatcherOptions
  ) {
    this.logger = options?.logger ?? getLogger('dispatcher');
    this.handlerTimeoutMs = resolveTimeout(options?.handlerTimeoutMs);
  }

  async dispatch(params: P, options?: DispatchOptions): Promise<Outcome> {
    const tag = tagOf(params);
    const resolved = this.registry.resolve(tag);

    if (resolved.isErr()) {
      this.logger.error(
        { tag, code: resolved.error.code, registeredTags: this.registry.tags() },
        `No handler registered for '${tag}'`
      );
      return failed(resolved.error);
    }

    const signal = options?.signal;
    if (signal?.aborted) {
      return this.aborted(tag, signal.reason);
    }

    const timeoutSignal = this.handlerTimeoutMs !== undefined ? AbortSignal.timeout(this.handlerTimeoutMs) : undefined;
    const signals = [signal, timeoutSignal].filter((s): s is AbortSignal => s !== undefined);
    const handlerSignal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

    const context: HandlerContext = {
      tag,
      signal: handlerSignal,
      logger: this.logger.child({ tag }),
    };

    try {
      const pending = Promise.resolve(resolved.value(params, context));
      return signals.length > 0 ? await raceAgainstSignal(pending, handlerSignal) : await pending;
    } catch (exception) {
      // Caller abort takes precedence over the deadline
      if (signal?.aborted) {
        return this.aborted(tag, signal.reason);
      }

      if (timeoutSignal?.aborted && this.handlerTimeoutMs !== undefined) {
        this.logger.warn({ tag, timeoutMs: this.handlerTimeoutMs }, `Handler for '${tag}' timed out`);
        return failed(new HandlerTimeoutError(tag, this.handlerTimeoutMs));
      }

      const error = new HandlerFailedError(tag, exception);
      this.logger.error({ tag, error: toError(exception) }, error.message);
      return failed(error);
    }
  }

  private aborted(tag: string, reason: unknown): FailedOutcome {
    this.logger.debug({ tag }, `Dispatch of '${tag}' aborted by caller`);
    return failed(new DispatchAbortedError(tag, reason));
  }
}
