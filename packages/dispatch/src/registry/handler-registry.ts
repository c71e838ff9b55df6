import {
  DuplicateRegistrationError,
  failed,
  HandlerNotFoundError,
  HandlerTagMismatchError,
  InvalidTagError,
  isKind,
  isNonEmptyString,
  MissingHandlersError,
  RegistryAlreadySealedError,
  type ParametersOfKind,
  type RuleParameters,
  type SetupError,
  type TagOf,
} from '@rulegate/core';
import { getLogger } from '@rulegate/logger';
import { err, ok, type Result } from 'neverthrow';

import type {
  HandlerRegistration,
  HandlerTable,
  RuleHandler,
  SealedHandlerRegistry,
  SealOptions,
} from './types.js';

const logger = getLogger('handler-registry');

/**
 * Widen a variant handler to the whole parameter union. The tag check is the
 * narrowing the compiler needs; dispatch only ever routes matching tags here.
 */
function bindToTag<P extends RuleParameters, K extends TagOf<P>>(
  tag: K,
  handler: RuleHandler<ParametersOfKind<P, K>>
): RuleHandler<P> {
  return (params, context) =>
    isKind(params, tag) ? handler(params, context) : failed(new HandlerTagMismatchError(params.kind, tag));
}

/**
 * Report a setup error to the log sink, then throw it
 */
function rejectSetup(error: SetupError): never {
  logger.error({ tag: error.tag, code: error.code, ...error.context }, error.message);
  throw error;
}

function lookup<P extends RuleParameters>(
  registrations: ReadonlyMap<string, HandlerRegistration<P>>,
  tag: string
): Result<RuleHandler<P>, HandlerNotFoundError> {
  const registration = registrations.get(tag);
  return registration ? ok(registration.handler) : err(new HandlerNotFoundError(tag));
}

class SealedRegistry<P extends RuleParameters> implements SealedHandlerRegistry<P> {
  readonly sealed = true as const;

  constructor(private readonly registrations: ReadonlyMap<string, HandlerRegistration<P>>) {
    Object.freeze(this);
  }

  get size(): number {
    return this.registrations.size;
  }

  resolve(tag: string): Result<RuleHandler<P>, HandlerNotFoundError> {
    return lookup(this.registrations, tag);
  }

  has(tag: string): boolean {
    return this.registrations.has(tag);
  }

  tags(): TagOf<P>[] {
    return Array.from(this.registrations.values(), (registration) => registration.tag);
  }
}

/**
 * Tag-indexed handler registry with a two-phase lifecycle.
 *
 * While building, `register` adds exactly one handler per tag. `seal()` ends
 * the registration phase and returns an immutable snapshot; any later
 * `register` call throws `RegistryAlreadySealedError`. Lookups are a single
 * map read in either phase.
 */
export class HandlerRegistry<P extends RuleParameters> {
  private readonly registrations = new Map<string, HandlerRegistration<P>>();
  private snapshot: SealedRegistry<P> | undefined;

  get sealed(): boolean {
    return this.snapshot !== undefined;
  }

  get size(): number {
    return this.registrations.size;
  }

  /**
   * Register the handler for one parameter variant
   */
  register<K extends TagOf<P>>(tag: K, handler: RuleHandler<ParametersOfKind<P, K>>): this {
    if (!isNonEmptyString(tag)) {
      rejectSetup(new InvalidTagError(tag));
    }

    if (this.snapshot) {
      rejectSetup(new RegistryAlreadySealedError(tag));
    }

    if (this.registrations.has(tag)) {
      rejectSetup(new DuplicateRegistrationError(tag));
    }

    this.registrations.set(tag, Object.freeze({ tag, handler: bindToTag<P, K>(tag, handler) }));
    logger.trace({ tag }, 'Handler registered');
    return this;
  }

  resolve(tag: string): Result<RuleHandler<P>, HandlerNotFoundError> {
    return lookup(this.registrations, tag);
  }

  has(tag: string): boolean {
    return this.registrations.has(tag);
  }

  tags(): TagOf<P>[] {
    return Array.from(this.registrations.values(), (registration) => registration.tag);
  }

  /**
   * End the registration phase.
   * Throws `MissingHandlersError` (and stays open) when any expected tag has
   * no handler. Sealing twice returns the same snapshot.
   */
  seal(options?: SealOptions<P>): SealedHandlerRegistry<P> {
    const missing = (options?.expectedTags ?? []).filter((tag) => !this.registrations.has(tag));
    if (missing.length > 0) {
      rejectSetup(new MissingHandlersError(missing));
    }

    if (!this.snapshot) {
      this.snapshot = new SealedRegistry(new Map(this.registrations));
      logger.debug({ tags: this.tags() }, `Handler registry sealed with ${this.registrations.size} handler(s)`);
    }

    return this.snapshot;
  }
}

function isTableTag<P extends RuleParameters>(table: HandlerTable<P>, key: string): key is TagOf<P> {
  return Object.prototype.hasOwnProperty.call(table, key);
}

function registerFromTable<P extends RuleParameters, K extends TagOf<P>>(
  registry: HandlerRegistry<P>,
  table: HandlerTable<P>,
  tag: K
): void {
  registry.register(tag, table[tag]);
}

/**
 * Build and seal a registry from a static handler table.
 *
 * ```ts
 * const registry = createHandlerRegistry<ShiftRuleParams>({
 *   'max-hours': checkMaxHours,
 *   'rest-period': checkRestPeriod,
 * });
 * ```
 */
export function createHandlerRegistry<P extends RuleParameters>(table: HandlerTable<P>): SealedHandlerRegistry<P> {
  const registry = new HandlerRegistry<P>();

  for (const key of Object.keys(table)) {
    if (isTableTag(table, key)) {
      registerFromTable(registry, table, key);
    }
  }

  return registry.seal();
}
