import { Inject, Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/sequelize';
import { Transaction } from 'sequelize';
import { Sequelize } from 'sequelize-typescript';
import { Logger } from '../../decorators/logger.decorator';
import { JSONLogger } from '../../utils/logger';
import {
  DatabaseConnectionError,
  translateDatabaseError,
} from '../database.errors';

/**
 * A raw connection checked out of the Sequelize pool.
 */
export type PooledConnection = Awaited<
  ReturnType<Sequelize['connectionManager']['getConnection']>
>;

/**
 * How many times, and how far apart, `reconnect` retries the store.
 */
export interface ReconnectPolicy {
  attempts: number;
  delayMs: number;
}

export const RECONNECT_POLICY = Symbol('RECONNECT_POLICY');

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  attempts: 3,
  delayMs: 1000,
};

/**
 * Outcome of a health check.
 *
 * @property latency_ms - Time spent on the check, reconnection included.
 * @property reconnected - True when the first check failed and a retry
 * brought the store back.
 */
export interface HealthReport {
  healthy: boolean;
  latency_ms: number;
  reconnected: boolean;
  error?: string;
}

/**
 * Owns access to the Sequelize connection pool.
 *
 * Repositories normally let Sequelize check connections in and out on every
 * query; this service covers the cases where a caller needs more control:
 * - Checking out a raw connection for a block of work (`withConnection`)
 * - Opening an unmanaged transaction (`beginTransaction`)
 * - Probing the store and re-establishing access (`healthCheck`)
 * - Draining the pool on shutdown (`close`)
 *
 * Every failure leaves this service as a `DatabaseConnectionError`, or a
 * `PoolExhaustedError` when no connection became free within the pool's
 * acquisition timeout.
 */
@Injectable()
export class ConnectionService {
  /**
   * Logger instance for logging messages.
   */
  @Logger(ConnectionService.name)
  private readonly logger!: JSONLogger;

  constructor(
    @InjectConnection()
    private readonly sequelize: Sequelize,
    @Inject(RECONNECT_POLICY)
    private readonly policy: ReconnectPolicy,
  ) {}

  /**
   * Checks a connection out of the pool. Waits at most the configured
   * acquisition timeout. Every connection acquired here must be handed back
   * with `release`.
   */
  async acquire(): Promise<PooledConnection> {
    try {
      return await this.sequelize.connectionManager.getConnection({
        type: 'write',
      });
    } catch (error) {
      const translated = translateDatabaseError(error, 'Acquire connection');
      this.logger.error(
        'Failed to acquire a pooled connection',
        translated.stack,
        { error: translated.message },
      );
      throw translated instanceof DatabaseConnectionError
        ? translated
        : new DatabaseConnectionError(translated.message, error);
    }
  }

  /**
   * Returns a connection to the pool.
   */
  async release(connection: PooledConnection): Promise<void> {
    await this.sequelize.connectionManager.releaseConnection(connection);
  }

  /**
   * Runs `work` with a dedicated connection and always releases it,
   * whether `work` resolves or throws.
   */
  async withConnection<T>(
    work: (connection: PooledConnection) => Promise<T>,
  ): Promise<T> {
    const connection = await this.acquire();
    try {
      return await work(connection);
    } finally {
      await this.release(connection);
    }
  }

  /**
   * Opens an unmanaged transaction. The caller commits or rolls it back.
   */
  async beginTransaction(): Promise<Transaction> {
    try {
      return await this.sequelize.transaction();
    } catch (error) {
      throw translateDatabaseError(error, 'Begin transaction');
    }
  }

  /**
   * Checks the store. When the check fails the service tries to reconnect
   * before reporting.
   */
  async healthCheck(): Promise<HealthReport> {
    const startedAt = Date.now();

    try {
      await this.sequelize.authenticate();
      return {
        healthy: true,
        latency_ms: Date.now() - startedAt,
        reconnected: false,
      };
    } catch (error) {
      const translated = translateDatabaseError(error, 'Health check');
      this.logger.error('Database health check failed', translated.stack, {
        error: translated.message,
      });

      try {
        await this.reconnect();
        return {
          healthy: true,
          latency_ms: Date.now() - startedAt,
          reconnected: true,
        };
      } catch (reconnectError) {
        const message =
          reconnectError instanceof Error
            ? reconnectError.message
            : String(reconnectError);
        return {
          healthy: false,
          latency_ms: Date.now() - startedAt,
          reconnected: false,
          error: message,
        };
      }
    }
  }

  /**
   * Retries the store until it answers, up to the configured number of
   * attempts with a fixed delay between them.
   *
   * @throws DatabaseConnectionError once every attempt has failed.
   */
  async reconnect(): Promise<void> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.policy.attempts; attempt++) {
      try {
        await this.sequelize.authenticate();
        this.logger.log('Database connection re-established', { attempt });
        return;
      } catch (error) {
        lastError = error;
        this.logger.warn('Reconnection attempt failed', {
          attempt,
          maxAttempts: this.policy.attempts,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (attempt < this.policy.attempts) {
        await new Promise((resolve) =>
          setTimeout(resolve, this.policy.delayMs),
        );
      }
    }

    throw new DatabaseConnectionError(
      `Could not reconnect to the database after ${this.policy.attempts} attempts`,
      lastError,
    );
  }

  /**
   * Drains the pool. The service cannot be used afterwards.
   */
  async close(): Promise<void> {
    await this.sequelize.close();
    this.logger.log('Database connection pool closed');
  }
}
