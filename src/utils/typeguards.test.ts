import { describe, it, expect } from 'vitest';
import { isErrnoException, isValidObject } from './typeguards.js';

describe('Type Guards', () => {
  describe('isValidObject', () => {
    it('should identify plain objects', () => {
      expect(isValidObject({})).toBe(true);
      expect(isValidObject({ a: 1 })).toBe(true);
    });

    it('should reject non-objects and arrays', () => {
      expect(isValidObject(null)).toBe(false);
      expect(isValidObject(undefined)).toBe(false);
      expect(isValidObject([])).toBe(false);
      expect(isValidObject('record')).toBe(false);
    });
  });

  describe('isErrnoException', () => {
    it('should identify errors with a string code', () => {
      const error = Object.assign(new Error('missing'), { code: 'ENOENT' });
      expect(isErrnoException(error)).toBe(true);
    });

    it('should reject errors without a code', () => {
      expect(isErrnoException(new Error('plain'))).toBe(false);
      expect(isErrnoException({ code: 'ENOENT' })).toBe(false);
    });
  });
});
