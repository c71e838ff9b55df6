/**
 * Tests for HandlerRegistry: registration, sealing, and lookup
 */

import {
  DuplicateRegistrationError,
  HandlerNotFoundError,
  HandlerTagMismatchError,
  InvalidTagError,
  MissingHandlersError,
  passed,
  produced,
  RegistryAlreadySealedError,
  type RuleParameters,
} from '@rulegate/core';
import { initLogger, MemorySink } from '@rulegate/logger';
import { beforeEach, describe, expect, expectTypeOf, it } from 'vitest';

import { createContext, maxHours, restPeriod, stubHandler, type ShiftRuleParams } from '../../__tests__/test-utils.js';
import { createHandlerRegistry, HandlerRegistry } from '../handler-registry.js';
import type { SealOptions } from '../types.js';

describe('HandlerRegistry', () => {
  it('should resolve a registered tag to the same handler on every call', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

    const first = registry.resolve('max-hours')._unsafeUnwrap();
    const second = registry.resolve('max-hours')._unsafeUnwrap();

    expect(first).toBe(second);
  });

  it('should invoke the registered handler through the resolved function', async () => {
    const outcome = produced(passed('within limit'));
    const handler = stubHandler<Extract<ShiftRuleParams, { kind: 'max-hours' }>>(outcome);
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', handler);
    const params = maxHours(38);

    const resolved = registry.resolve('max-hours')._unsafeUnwrap();
    const result = await resolved(params, createContext('max-hours'));

    expect(result).toBe(outcome);
    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0]?.[0]).toBe(params);
  });

  it('should report a tag mismatch when a resolved handler receives another variant', async () => {
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());
    const resolved = registry.resolve('max-hours')._unsafeUnwrap();

    const outcome = await resolved(restPeriod(11), createContext('max-hours'));

    expect(outcome.status).toBe('failed');
    if (outcome.status !== 'failed') return;
    expect(outcome.error).toBeInstanceOf(HandlerTagMismatchError);
    expect(outcome.error.message).toBe("Handler registered for 'max-hours' cannot evaluate 'rest-period'");
    expect(outcome.error.context).toEqual({ boundTag: 'max-hours' });
  });

  it('should fail to resolve an unregistered tag', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>();

    const error = registry.resolve('rest-period')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(HandlerNotFoundError);
    expect(error.tag).toBe('rest-period');
  });

  it('should reject a second handler for the same tag', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

    expect(() => registry.register('max-hours', stubHandler())).toThrow(DuplicateRegistrationError);
    expect(registry.size).toBe(1);
  });

  it('should reject empty tags', () => {
    const registry = new HandlerRegistry<RuleParameters>();

    expect(() => registry.register('', () => produced(passed()))).toThrow(InvalidTagError);
  });

  it('should report tags, size and membership', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>()
      .register('max-hours', stubHandler())
      .register('rest-period', stubHandler());

    expect(registry.tags()).toEqual(['max-hours', 'rest-period']);
    expect(registry.size).toBe(2);
    expect(registry.has('rest-period')).toBe(true);
    expect(registry.has('certification')).toBe(false);
  });

  describe('seal', () => {
    it('should reject registration after sealing', () => {
      const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());
      registry.seal();

      expect(registry.sealed).toBe(true);
      expect(() => registry.register('rest-period', stubHandler())).toThrow(RegistryAlreadySealedError);
    });

    it('should return the same frozen snapshot when sealed twice', () => {
      const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

      const snapshot = registry.seal();

      expect(registry.seal()).toBe(snapshot);
      expect(snapshot.sealed).toBe(true);
      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot.tags()).toEqual(['max-hours']);
      expect(snapshot.size).toBe(1);
    });

    it('should resolve through the snapshot like the builder', () => {
      const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());
      const snapshot = registry.seal();

      expect(snapshot.resolve('max-hours')._unsafeUnwrap()).toBe(registry.resolve('max-hours')._unsafeUnwrap());
      expect(snapshot.resolve('certification')._unsafeUnwrapErr()).toBeInstanceOf(HandlerNotFoundError);
    });

    it('should refuse to seal while expected tags are missing and stay open', () => {
      const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

      let thrown: unknown;
      try {
        registry.seal({ expectedTags: ['max-hours', 'rest-period', 'certification'] });
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(MissingHandlersError);
      expect(thrown instanceof MissingHandlersError ? thrown.missingTags : []).toEqual(['rest-period', 'certification']);
      expect(registry.sealed).toBe(false);

      registry.register('rest-period', stubHandler()).register('certification', stubHandler());
      expect(registry.seal({ expectedTags: ['max-hours', 'rest-period', 'certification'] }).size).toBe(3);
    });

    it('should type expected tags as the registry tag union', () => {
      expectTypeOf<SealOptions<ShiftRuleParams>['expectedTags']>().toEqualTypeOf<
        readonly ('max-hours' | 'rest-period' | 'certification')[] | undefined
      >();
    });

    it('should serve concurrent lookups consistently once sealed', async () => {
      const snapshot = new HandlerRegistry<ShiftRuleParams>()
        .register('max-hours', stubHandler())
        .register('rest-period', stubHandler())
        .seal();
      const expected = snapshot.resolve('rest-period')._unsafeUnwrap();

      const lookups = await Promise.all(
        Array.from({ length: 100 }, (_, i) =>
          Promise.resolve().then(() => snapshot.resolve(i % 2 === 0 ? 'rest-period' : 'max-hours'))
        )
      );

      const restHandlers = lookups.filter((_, i) => i % 2 === 0).map((result) => result._unsafeUnwrap());
      expect(restHandlers.every((handler) => handler === expected)).toBe(true);
      expect(lookups.every((result) => result.isOk())).toBe(true);
      expect(snapshot.size).toBe(2);
    });
  });
});

describe('setup error logging', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = new MemorySink();
    initLogger({ level: 'trace', sinks: [sink] });
  });

  it('should log a duplicate registration before throwing', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

    expect(() => registry.register('max-hours', stubHandler())).toThrow(DuplicateRegistrationError);

    const [entry] = sink.atLevel('error');
    expect(entry?.category).toBe('handler-registry');
    expect(entry?.msg).toBe("A handler is already registered for 'max-hours'");
    expect(entry?.context).toEqual({ tag: 'max-hours', code: 'DUPLICATE_REGISTRATION' });
  });

  it('should log registration after sealing', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>();
    registry.seal();

    expect(() => registry.register('rest-period', stubHandler())).toThrow(RegistryAlreadySealedError);
    expect(sink.atLevel('error')[0]?.context).toEqual({ tag: 'rest-period', code: 'REGISTRY_ALREADY_SEALED' });
  });

  it('should log an empty tag', () => {
    expect(() => new HandlerRegistry<RuleParameters>().register('', () => produced(passed()))).toThrow(InvalidTagError);
    expect(sink.atLevel('error')[0]?.context).toEqual({ code: 'INVALID_TAG' });
  });

  it('should log the missing tags when sealing fails', () => {
    const registry = new HandlerRegistry<ShiftRuleParams>().register('max-hours', stubHandler());

    expect(() => registry.seal({ expectedTags: ['max-hours', 'certification'] })).toThrow(MissingHandlersError);

    const [entry] = sink.atLevel('error');
    expect(entry?.msg).toBe('No handler registered for: certification');
    expect(entry?.context).toEqual({ code: 'MISSING_HANDLERS', missingTags: ['certification'] });
  });
});

describe('createHandlerRegistry', () => {
  it('should register every table entry and seal', () => {
    const registry = createHandlerRegistry<ShiftRuleParams>({
      'max-hours': stubHandler(),
      'rest-period': stubHandler(),
      certification: stubHandler(),
    });

    expect(registry.sealed).toBe(true);
    expect(registry.tags()).toEqual(['max-hours', 'rest-period', 'certification']);
  });
});
