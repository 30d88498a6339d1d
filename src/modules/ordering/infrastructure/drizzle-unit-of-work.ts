import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { TransactionRollbackError, sql } from 'drizzle-orm';
import { orderingConfig } from '../../../config/ordering.config';
import { outboxConfig } from '../../../config/outbox.config';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import type { Result } from '../../../shared/domain/result';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import { isConcurrencyFailure } from '../../../shared/infrastructure/database/pg-errors';
import { DrizzleOutboxWriter } from '../../../shared/outbox/drizzle-outbox.writer';
import type {
  OrderingTransaction,
  UnitOfWork,
} from '../application/unit-of-work';
import { DrizzleOrderRepository } from './drizzle-order.repository';
import { DrizzleRequestLog } from './drizzle-request-log';

/**
 * One PostgreSQL transaction per command. Row locks taken inside it wait
 * at most `ORDER_LOCK_TIMEOUT_MS` before giving up.
 */
@Injectable()
export class DrizzleUnitOfWork implements UnitOfWork {
  constructor(
    @Inject(DRIZZLE) private readonly db: DrizzleClient,
    @Inject(orderingConfig.KEY)
    private readonly ordering: ConfigType<typeof orderingConfig>,
    @Inject(outboxConfig.KEY)
    private readonly outbox: ConfigType<typeof outboxConfig>,
  ) {}

  async execute<T, E>(
    work: (tx: OrderingTransaction) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>> {
    const rolledBack: { result?: Result<T, E> } = {};

    try {
      return await this.db.transaction(async (tx) => {
        await tx.execute(
          sql`SELECT set_config('lock_timeout', ${`${this.ordering.lockTimeoutMs}ms`}, true)`,
        );

        const result = await work({
          orders: new DrizzleOrderRepository(tx),
          outbox: new DrizzleOutboxWriter(tx, this.outbox.maxRetries),
          requests: new DrizzleRequestLog(tx),
        });

        if (!result.success) {
          rolledBack.result = result;
          tx.rollback();
        }
        return result;
      });
    } catch (error) {
      if (error instanceof TransactionRollbackError && rolledBack.result) {
        return rolledBack.result;
      }
      if (isConcurrencyFailure(error)) {
        throw new ConcurrencyConflictError(
          `Transaction aborted by a concurrent update: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
      throw error;
    }
  }
}
