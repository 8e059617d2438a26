import { Injectable } from '@nestjs/common';
import { Transaction } from 'sequelize';
import { Logger } from '../../decorators/logger.decorator';
import { JSONLogger } from '../../utils/logger';
import { ConnectionService } from '../connection/connection.service';
import {
  NestedTransactionError,
  translateDatabaseError,
} from '../database.errors';
import { QueryContext } from '../query-context';

/**
 * Runs a block of repository calls as one transaction.
 *
 * @remarks
 * The callback receives a {@link QueryContext}; every repository call that is
 * handed that context joins the transaction. The transaction commits when the
 * callback resolves and rolls back when it throws, after which the original
 * error is re-thrown untouched. Scopes do not nest: passing a context that
 * already carries a transaction fails before anything is opened.
 *
 * @example
 * ```typescript
 * const summary = await unitOfWork.run(async (context) => {
 *   const source = await textSources.create(payload, context);
 *   return summaries.create({ text_source_id: source.id, content }, context);
 * });
 * ```
 */
@Injectable()
export class UnitOfWorkService {
  @Logger(UnitOfWorkService.name)
  private readonly logger!: JSONLogger;

  constructor(private readonly connectionService: ConnectionService) {}

  async run<T>(
    work: (context: QueryContext) => Promise<T>,
    outer?: QueryContext,
  ): Promise<T> {
    if (outer?.transaction) {
      throw new NestedTransactionError();
    }

    const transaction = await this.connectionService.beginTransaction();

    let result: T;
    try {
      result = await work({ transaction });
    } catch (error) {
      await this.rollback(transaction, error);
      throw error;
    }

    try {
      await transaction.commit();
    } catch (error) {
      throw translateDatabaseError(error, 'Commit transaction');
    }

    return result;
  }

  private async rollback(transaction: Transaction, cause: unknown) {
    try {
      await transaction.rollback();
      this.logger.warn('Unit of work rolled back', {
        reason: cause instanceof Error ? cause.message : String(cause),
      });
    } catch (rollbackError) {
      // The caller still sees the failure raised by work
      const translated = translateDatabaseError(rollbackError, 'Rollback');
      this.logger.error('Rollback failed', translated.stack, {
        error: translated.message,
      });
    }
  }
}
