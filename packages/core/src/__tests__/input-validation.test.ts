import { describe, it, expect } from 'vitest';
import { DocketError } from '../errors/docket-error.js';
import {
  validateCollectionName,
  assertCollectionName,
  validateFieldPath,
  assertFieldPath,
} from '../validation/input-validation.js';

describe('Input Validation', () => {
  describe('validateCollectionName', () => {
    it('should accept valid names', () => {
      expect(validateCollectionName('todos').valid).toBe(true);
      expect(validateCollectionName('user_profiles').valid).toBe(true);
      expect(validateCollectionName('my-data').valid).toBe(true);
      expect(validateCollectionName('_private').valid).toBe(true);
      expect(validateCollectionName('app.users').valid).toBe(true);
    });

    it('should reject non-string inputs', () => {
      expect(validateCollectionName(123)).toEqual({ valid: false, errors: ['Collection name must be a string'] });
      expect(validateCollectionName(null).valid).toBe(false);
      expect(validateCollectionName(undefined).valid).toBe(false);
    });

    it('should reject empty string', () => {
      expect(validateCollectionName('').errors).toEqual(['Collection name cannot be empty']);
    });

    it('should reject names starting with numbers or holding spaces', () => {
      expect(validateCollectionName('123abc').valid).toBe(false);
      expect(validateCollectionName('my collection').valid).toBe(false);
    });

    it('should reject reserved names', () => {
      expect(validateCollectionName('system.indexes').errors).toEqual([
        '"system.indexes" is a reserved collection name',
      ]);
    });

    it('should cap the length at 120 chars', () => {
      expect(validateCollectionName('a'.repeat(120)).valid).toBe(true);
      expect(validateCollectionName('a'.repeat(121)).errors).toEqual([
        'Collection name too long (121 chars, max 120)',
      ]);
    });
  });

  describe('assertCollectionName', () => {
    it('should not throw for valid names', () => {
      expect(() => assertCollectionName('todos')).not.toThrow();
    });

    it('should throw an invalid-argument error for invalid names', () => {
      expect(() => assertCollectionName('')).toThrow(DocketError);
      expect(() => assertCollectionName(null)).toThrow('Collection name must be a string');

      try {
        assertCollectionName('9lives');
      } catch (error) {
        expect(error).toMatchObject({ code: 'DOCKET_X902', context: { collection: '9lives' } });
      }
    });
  });

  describe('validateFieldPath', () => {
    it('should accept plain and nested paths', () => {
      expect(validateFieldPath('name').valid).toBe(true);
      expect(validateFieldPath('address.city').valid).toBe(true);
      expect(validateFieldPath('tags.0').valid).toBe(true);
    });

    it('should reject non-strings and empty paths', () => {
      expect(validateFieldPath(1).errors).toEqual(['Field path must be a string']);
      expect(validateFieldPath('').errors).toEqual(['Field path cannot be empty']);
    });

    it('should reject empty segments', () => {
      expect(validateFieldPath('a..b').errors).toEqual(['Field path "a..b" has an empty segment']);
      expect(validateFieldPath('.a').valid).toBe(false);
    });

    it('should reject operator segments', () => {
      expect(validateFieldPath('profile.$set').errors).toEqual([
        'Field path segment "$set" cannot start with "$"',
      ]);
    });

    it('should reject prototype segments', () => {
      expect(validateFieldPath('__proto__.polluted').valid).toBe(false);
      expect(validateFieldPath('a.constructor').valid).toBe(false);
      expect(validateFieldPath('a.prototype.b').errors).toEqual(['Field path segment "prototype" is not allowed']);
    });

    it('should report every bad segment', () => {
      expect(validateFieldPath('$a.__proto__').errors).toHaveLength(2);
    });
  });

  describe('assertFieldPath', () => {
    it('should pass valid paths and throw for invalid ones', () => {
      expect(() => assertFieldPath('a.b')).not.toThrow();
      expect(() => assertFieldPath('a..b')).toThrow(DocketError);
    });
  });
});
