/**
 * Error hierarchy for rule dispatch
 *
 * Setup errors are thrown while the handler registry is being built and must
 * abort initialization. Dispatch errors are never thrown: they travel inside
 * a `failed` Outcome so callers can tell an operator problem (fix the
 * deployment) from a business-rule rejection (fix the request).
 */

import { getErrorMessage } from '../utils/type-guard-utils.js';

export type ErrorKind = 'setup' | 'dispatch' | 'config';

interface ErrorContext {
  additionalContext?: Record<string, unknown> | undefined;
  cause?: unknown;
  tag?: string | undefined;
}

/**
 * Base error for everything raised by the dispatch core
 */
export abstract class RuleGateError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  readonly timestamp: string;
  readonly tag?: string | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(message: string, context?: ErrorContext) {
    super(message, context?.cause !== undefined ? { cause: context.cause } : undefined);
    this.timestamp = new Date().toISOString();
    this.tag = context?.tag;
    this.context = context?.additionalContext;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      kind: this.kind,
      message: this.message,
      name: this.name,
      tag: this.tag,
      timestamp: this.timestamp,
    };
  }
}

/**
 * Registration-time errors
 */
export class DuplicateRegistrationError extends RuleGateError {
  readonly code = 'DUPLICATE_REGISTRATION';
  readonly kind = 'setup' as const;

  constructor(tag: string) {
    super(`A handler is already registered for '${tag}'`, { tag });
  }
}

export class RegistryAlreadySealedError extends RuleGateError {
  readonly code = 'REGISTRY_ALREADY_SEALED';
  readonly kind = 'setup' as const;

  constructor(tag: string) {
    super(`Cannot register '${tag}': the handler registry is sealed`, { tag });
  }
}

export class MissingHandlersError extends RuleGateError {
  readonly code = 'MISSING_HANDLERS';
  readonly kind = 'setup' as const;

  constructor(public readonly missingTags: readonly string[]) {
    super(`No handler registered for: ${missingTags.join(', ')}`, {
      additionalContext: { missingTags },
    });
  }
}

export class InvalidTagError extends RuleGateError {
  readonly code = 'INVALID_TAG';
  readonly kind = 'setup' as const;

  constructor(public readonly received: unknown) {
    super(`Parameter type tag must be a non-empty string, got ${JSON.stringify(received) ?? String(received)}`);
  }
}

/**
 * Dispatch-time errors
 */
export class HandlerNotFoundError extends RuleGateError {
  readonly code = 'HANDLER_NOT_FOUND';
  readonly kind = 'dispatch' as const;

  constructor(tag: string, availableTags?: readonly string[]) {
    super(
      `No handler registered for '${tag}'`,
      availableTags ? { tag, additionalContext: { availableTags } } : { tag }
    );
  }
}

/** A resolved handler was called with a parameter variant it was not registered for */
export class HandlerTagMismatchError extends RuleGateError {
  readonly code = 'HANDLER_TAG_MISMATCH';
  readonly kind = 'dispatch' as const;

  constructor(
    tag: string,
    public readonly boundTag: string
  ) {
    super(`Handler registered for '${boundTag}' cannot evaluate '${tag}'`, {
      tag,
      additionalContext: { boundTag },
    });
  }
}

export class HandlerFailedError extends RuleGateError {
  readonly code = 'HANDLER_FAILED';
  readonly kind = 'dispatch' as const;

  constructor(tag: string, cause: unknown) {
    super(`Handler for '${tag}' threw: ${getErrorMessage(cause)}`, { tag, cause });
  }
}

export class HandlerTimeoutError extends RuleGateError {
  readonly code = 'HANDLER_TIMEOUT';
  readonly kind = 'dispatch' as const;

  constructor(
    tag: string,
    public readonly timeoutMs: number
  ) {
    super(`Handler for '${tag}' did not finish within ${timeoutMs}ms`, {
      tag,
      additionalContext: { timeoutMs },
    });
  }
}

export class DispatchAbortedError extends RuleGateError {
  readonly code = 'DISPATCH_ABORTED';
  readonly kind = 'dispatch' as const;

  constructor(tag: string, reason?: unknown) {
    super(`Dispatch of '${tag}' was aborted${reason === undefined ? '' : `: ${getErrorMessage(reason)}`}`, {
      tag,
      cause: reason,
    });
  }
}

/**
 * Rule configuration errors
 */
export class RuleConfigError extends RuleGateError {
  readonly code = 'RULE_CONFIG_INVALID';
  readonly kind = 'config' as const;

  constructor(
    public readonly issues: readonly string[],
    cause?: unknown
  ) {
    super(`Invalid rule configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`, {
      cause,
      additionalContext: { issues },
    });
  }
}

/** Errors that can appear inside a `failed` Outcome */
export type DispatchFailure =
  | HandlerNotFoundError
  | HandlerTagMismatchError
  | HandlerFailedError
  | HandlerTimeoutError
  | DispatchAbortedError;

/** Errors thrown while the registry is being built */
export type SetupError = DuplicateRegistrationError | RegistryAlreadySealedError | MissingHandlersError | InvalidTagError;

export function isDispatchFailure(error: unknown): error is DispatchFailure {
  return (
    error instanceof HandlerNotFoundError ||
    error instanceof HandlerTagMismatchError ||
    error instanceof HandlerFailedError ||
    error instanceof HandlerTimeoutError ||
    error instanceof DispatchAbortedError
  );
}
