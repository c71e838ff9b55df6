import { describe, expect, it } from 'vitest';

import { getErrorMessage, isErrorWithMessage, isNonEmptyString, isObject, toError, wrapError } from '../type-guard-utils.js';

describe('Type Guard Utilities', () => {
  describe('isErrorWithMessage', () => {
    it('should return true for Error instances and subclasses', () => {
      expect(isErrorWithMessage(new Error('Test error'))).toBe(true);
      expect(isErrorWithMessage(new TypeError('Type error'))).toBe(true);
      expect(isErrorWithMessage(new Error(''))).toBe(true);
    });

    it('should return false for objects that only look like errors', () => {
      expect(isErrorWithMessage({ message: 'not an error', name: 'FakeError' })).toBe(false);
      expect(isErrorWithMessage('error string')).toBe(false);
      expect(isErrorWithMessage(null)).toBe(false);
    });
  });

  describe('getErrorMessage', () => {
    it('should extract the message from errors', () => {
      expect(getErrorMessage(new Error('Test error'))).toBe('Test error');
    });

    it('should stringify non-error values', () => {
      expect(getErrorMessage('plain string')).toBe('plain string');
      expect(getErrorMessage(42)).toBe('42');
    });

    it('should prefer the default message for non-error values', () => {
      expect(getErrorMessage({ code: 1 }, 'Unknown failure')).toBe('Unknown failure');
    });
  });

  describe('toError', () => {
    it('should return errors unchanged', () => {
      const error = new RangeError('out of range');
      expect(toError(error)).toBe(error);
    });

    it('should wrap strings', () => {
      expect(toError('aborted').message).toBe('aborted');
    });

    it('should fall back for other values', () => {
      expect(toError({}).message).toBe('Unknown error');
    });
  });

  describe('wrapError', () => {
    it('should prefix the message with context and keep the cause', () => {
      const cause = new Error('file missing');
      const result = wrapError(cause, 'Failed to load rule config');

      expect(result.isErr()).toBe(true);
      const error = result._unsafeUnwrapErr();
      expect(error.message).toBe('Failed to load rule config: file missing');
      expect(error.cause).toBe(cause);
    });
  });

  describe('isNonEmptyString', () => {
    it('should accept only non-empty strings', () => {
      expect(isNonEmptyString('max-hours')).toBe(true);
      expect(isNonEmptyString('')).toBe(false);
      expect(isNonEmptyString(7)).toBe(false);
    });
  });

  describe('isObject', () => {
    it('should accept plain objects only', () => {
      expect(isObject({})).toBe(true);
      expect(isObject([])).toBe(false);
      expect(isObject(null)).toBe(false);
    });
  });
});
