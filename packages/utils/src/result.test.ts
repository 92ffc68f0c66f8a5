import { describe, it, expect } from 'vitest';
import {
  ok,
  err,
  isOk,
  isErr,
  toError,
  type Result,
} from './result.js';

describe('Result type', () => {
  describe('constructors and guards', () => {
    it('ok() creates an Ok result', () => {
      const result = ok('Ada Lovelace');
      expect(result.ok).toBe(true);
      expect(result.value).toBe('Ada Lovelace');
      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });

    it('err() creates an Err result', () => {
      const result = err({ code: 'NOT_FOUND' });
      expect(result.ok).toBe(false);
      expect(result.error).toEqual({ code: 'NOT_FOUND' });
      expect(isErr(result)).toBe(true);
    });
  });

  describe('toError', () => {
    it('keeps Error instances', () => {
      const original = new TypeError('bad');
      expect(toError(original)).toBe(original);
    });

    it('wraps other thrown values', () => {
      const wrapped = toError('plain string');
      expect(wrapped).toBeInstanceOf(Error);
      expect(wrapped.message).toBe('plain string');
    });
  });
});
