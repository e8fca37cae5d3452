import { describe, it, expect } from 'vitest';
import {
  ConstraintViolationError,
  DocketError,
  DocumentNotFoundError,
  PreconditionError,
  QueryError,
  StorageError,
  ValidationError,
  ensureDocketError,
} from '../errors/docket-error.js';
import { ERROR_CODES, getErrorCategory } from '../errors/error-codes.js';

describe('Error Paths', () => {
  describe('DocketError', () => {
    it('should fill message and suggestion from the code', () => {
      const error = DocketError.fromCode('DOCKET_S305', { database: 'app' });

      expect(error.message).toBe('Database is closed');
      expect(error.suggestion).toBe('Create a new Database instance; a closed one cannot be reopened.');
      expect(error.category).toBe('storage');
      expect(error.context).toEqual({ database: 'app' });
      expect(error).toBeInstanceOf(Error);
    });

    it('should wrap a foreign error and keep it as the cause', () => {
      const cause = new Error('socket hang up');
      const error = DocketError.wrap(cause, 'DOCKET_S300', { driver: 'mongodb' });

      expect(error.message).toBe('socket hang up');
      expect(error.cause).toBe(cause);
      expect(error.toJSON().cause).toMatchObject({ name: 'Error', message: 'socket hang up' });
    });

    it('should check codes and categories', () => {
      const error = new QueryError('DOCKET_Q204', 'Cannot call sort() after the cursor has started');

      expect(DocketError.isCode(error, 'DOCKET_Q204')).toBe(true);
      expect(DocketError.isCode(error, 'DOCKET_Q205')).toBe(false);
      expect(DocketError.isCategory(error, 'query')).toBe(true);
      expect(DocketError.isDocketError(new Error('plain'))).toBe(false);
    });

    it('should format code, context and suggestion', () => {
      const error = new StorageError('DOCKET_S301', 'Storage driver "memory" is not available', {
        driver: 'memory',
      });

      expect(error.format()).toBe(
        [
          '[DOCKET_S301] Storage driver "memory" is not available',
          'Context: {"driver":"memory"}',
          'Suggestion: The store driver is not supported in this environment.',
        ].join('\n')
      );
      expect(String(error)).toBe(error.format());
    });
  });

  describe('error categories', () => {
    it('should derive the category from the code letter', () => {
      expect(getErrorCategory('DOCKET_V100')).toBe('validation');
      expect(getErrorCategory('DOCKET_D402')).toBe('document');
      expect(getErrorCategory('DOCKET_I603')).toBe('index');
      expect(getErrorCategory('DOCKET_X902')).toBe('internal');
    });
  });

  describe('PreconditionError', () => {
    it('should describe the refused operation', () => {
      const error = new PreconditionError('DOCKET_D402', 'remove', { collection: 'users', id: 'u1' });

      expect(error.name).toBe('PreconditionError');
      expect(error.message).toBe('Cannot remove: document has been removed');
      expect(error.operation).toBe('remove');
      expect(error.context).toEqual({ collection: 'users', id: 'u1', operation: 'remove' });
      expect(error.category).toBe('document');
    });

    it('should accept a custom message', () => {
      const error = new PreconditionError('DOCKET_D405', 'set', {}, 'Cannot change _id');
      expect(error.message).toBe('Cannot change _id');
    });

    it('should describe a write refused while another is in flight', () => {
      const error = new PreconditionError('DOCKET_D406', 'insert', { pending: 'insert' });

      expect(error.message).toBe('Cannot insert: document has an insert or remove in progress');
      expect(error.category).toBe('document');
    });
  });

  describe('error table', () => {
    it('should list only the document codes the library raises', () => {
      const documentCodes = Object.keys(ERROR_CODES).filter((code) => code.startsWith('DOCKET_D'));

      expect(documentCodes).toEqual([
        'DOCKET_D401',
        'DOCKET_D402',
        'DOCKET_D403',
        'DOCKET_D404',
        'DOCKET_D405',
        'DOCKET_D406',
      ]);
    });
  });

  describe('ValidationError', () => {
    it('should join field errors into the message', () => {
      const error = new ValidationError([
        { path: 'name', message: "can't be empty" },
        { path: '', message: 'Account is locked' },
      ]);

      expect(error.message).toBe("Validation failed: name: can't be empty; Account is locked");
      expect(error.errors).toHaveLength(2);
      expect(error.code).toBe('DOCKET_V100');
    });
  });

  describe('ConstraintViolationError', () => {
    it('should use the unique code when an index is named', () => {
      const error = new ConstraintViolationError('Duplicate key', { index: 'idx_email' });

      expect(error.code).toBe('DOCKET_I603');
      expect(error.index).toBe('idx_email');
      expect(error.context).toEqual({ index: 'idx_email' });
    });

    it('should use the generic code otherwise', () => {
      const error = new ConstraintViolationError('Rejected by the store');

      expect(error.code).toBe('DOCKET_I600');
      expect(error.index).toBeUndefined();
    });
  });

  describe('DocumentNotFoundError', () => {
    it('should name the collection and identity', () => {
      const error = new DocumentNotFoundError('users', 'u1');

      expect(error.message).toBe('Document with id "u1" not found in collection "users"');
      expect(error.code).toBe('DOCKET_D401');
    });
  });

  describe('ensureDocketError', () => {
    it('should pass Docket errors through', () => {
      const error = new StorageError('DOCKET_S300', 'failed');
      expect(ensureDocketError(error)).toBe(error);
    });

    it('should wrap plain errors and other values', () => {
      expect(ensureDocketError(new Error('boom'))).toMatchObject({ code: 'DOCKET_X900', message: 'boom' });
      expect(ensureDocketError('text', 'DOCKET_S300')).toMatchObject({ code: 'DOCKET_S300', message: 'text' });
    });
  });
});
