import { Transaction } from 'sequelize';

/**
 * Passed to repository calls that should run inside a unit of work.
 * Calls made without a context use their own pooled connection.
 */
export interface QueryContext {
  transaction?: Transaction;
}
