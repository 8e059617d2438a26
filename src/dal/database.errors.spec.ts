import { HttpStatus } from '@nestjs/common';
import {
  BaseError,
  ConnectionAcquireTimeoutError,
  ConnectionRefusedError,
} from 'sequelize';
import {
  DatabaseConnectionError,
  DatabaseError,
  NotFoundError,
  PoolExhaustedError,
  translateDatabaseError,
  ValidationError,
} from './database.errors';

describe('database errors', () => {
  it('should describe missing rows by resource and identifier', () => {
    const error = new NotFoundError('Project', 7);

    expect(error.message).toBe("Project with identifier '7' not found");
    expect(error.getStatus()).toBe(HttpStatus.NOT_FOUND);
    expect(error.resource).toBe('Project');
    expect(error.identifier).toBe(7);
  });

  it('should carry the offending fields on validation errors', () => {
    const error = new ValidationError('Invalid Link', ['url', 'title']);

    expect(error.fields).toEqual(['url', 'title']);
    expect(error.getStatus()).toBe(HttpStatus.BAD_REQUEST);
  });

  describe('translateDatabaseError', () => {
    it('should map acquisition timeouts to PoolExhaustedError', () => {
      const cause = new ConnectionAcquireTimeoutError(new Error('timed out'));
      const error = translateDatabaseError(cause, 'Project create');

      expect(error).toBeInstanceOf(PoolExhaustedError);
      expect(error).toBeInstanceOf(DatabaseConnectionError);
      expect(error.message).toBe(
        'Project create failed: no pooled connection became available in time',
      );
    });

    it('should map refused connections to DatabaseConnectionError', () => {
      const cause = new ConnectionRefusedError(new Error('ECONNREFUSED'));
      const error = translateDatabaseError(cause, 'Health check');

      expect(error).toBeInstanceOf(DatabaseConnectionError);
      expect(error).not.toBeInstanceOf(PoolExhaustedError);
      expect(error instanceof DatabaseError && error.getStatus()).toBe(
        HttpStatus.SERVICE_UNAVAILABLE,
      );
    });

    it('should wrap other store errors in DatabaseError', () => {
      const error = translateDatabaseError(
        new BaseError('syntax error'),
        'Summary list',
      );

      expect(error).toBeInstanceOf(DatabaseError);
      expect(error.message).toBe('Summary list failed: syntax error');
    });

    it('should pass through errors that are already translated', () => {
      const original = new NotFoundError('Video', 3);

      expect(translateDatabaseError(original, 'Video read')).toBe(original);
    });

    it('should pass through errors that did not come from the store', () => {
      const original = new TypeError('bad input');

      expect(translateDatabaseError(original, 'Link create')).toBe(original);
    });
  });
});
