import { HttpException, HttpStatus } from '@nestjs/common';
import {
  BaseError,
  ConnectionAcquireTimeoutError,
  ConnectionError,
  ForeignKeyConstraintError,
  TimeoutError,
  UniqueConstraintError,
  ValidationError as SequelizeValidationError,
} from 'sequelize';

/**
 * Base class for every error raised by the storage layer.
 *
 * @remarks
 * Errors extend `HttpException` so that a controller can let them propagate
 * and Nest renders the matching status code. The underlying store error, when
 * there is one, is kept in `cause`.
 */
export class DatabaseError extends HttpException {
  constructor(
    message: string,
    status: HttpStatus = HttpStatus.INTERNAL_SERVER_ERROR,
    cause?: unknown,
  ) {
    super({ statusCode: status, message }, status, { cause });
  }
}

/**
 * Raised when required fields are missing or malformed. `fields` lists every
 * offending property.
 */
export class ValidationError extends DatabaseError {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message, HttpStatus.BAD_REQUEST);
    this.fields = fields;
  }
}

export class NotFoundError extends DatabaseError {
  readonly resource: string;
  readonly identifier: number | string;

  constructor(resource: string, identifier: number | string, message?: string) {
    super(
      message ?? `${resource} with identifier '${identifier}' not found`,
      HttpStatus.NOT_FOUND,
    );
    this.resource = resource;
    this.identifier = identifier;
  }
}

/**
 * Foreign-key or uniqueness violation reported by the store itself.
 */
export class ConstraintError extends DatabaseError {
  constructor(message: string, cause?: unknown) {
    super(message, HttpStatus.CONFLICT, cause);
  }
}

/**
 * The store is unreachable or stopped answering. Callers may retry with
 * backoff.
 */
export class DatabaseConnectionError extends DatabaseError {
  constructor(message: string, cause?: unknown) {
    super(message, HttpStatus.SERVICE_UNAVAILABLE, cause);
  }
}

/**
 * No pooled connection became free within the acquisition timeout.
 */
export class PoolExhaustedError extends DatabaseConnectionError {}

/**
 * A unit of work was started from a context that already carries an open
 * transaction.
 */
export class NestedTransactionError extends DatabaseError {
  constructor() {
    super(
      'A unit of work is already open on this context; nested scopes are not supported',
    );
  }
}

/**
 * Maps errors coming out of Sequelize onto the storage error taxonomy.
 * Errors that are already part of the taxonomy, or that did not come from the
 * store, are returned unchanged.
 *
 * @param error - Whatever was thrown.
 * @param operation - Short description used in the resulting message.
 */
export function translateDatabaseError(
  error: unknown,
  operation: string,
): Error {
  if (error instanceof DatabaseError) {
    return error;
  }

  if (error instanceof ConnectionAcquireTimeoutError) {
    return new PoolExhaustedError(
      `${operation} failed: no pooled connection became available in time`,
      error,
    );
  }

  if (error instanceof ConnectionError || error instanceof TimeoutError) {
    return new DatabaseConnectionError(
      `${operation} failed: ${error.message}`,
      error,
    );
  }

  if (
    error instanceof ForeignKeyConstraintError ||
    error instanceof UniqueConstraintError
  ) {
    return new ConstraintError(`${operation} failed: ${error.message}`, error);
  }

  if (error instanceof SequelizeValidationError) {
    const fields = error.errors
      .map((item) => item.path)
      .filter((path): path is string => typeof path === 'string');
    return new ValidationError(`${operation} failed: ${error.message}`, fields);
  }

  if (error instanceof BaseError) {
    return new DatabaseError(
      `${operation} failed: ${error.message}`,
      HttpStatus.INTERNAL_SERVER_ERROR,
      error,
    );
  }

  return error instanceof Error ? error : new DatabaseError(String(error));
}
