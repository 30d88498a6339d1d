import type { Result } from '../../../shared/domain/result';
import type { OutboxWriter } from '../../../shared/outbox/outbox.store';
import type { OrderRepository } from '../domain/order.repository';
import type { RequestLog } from './request-log';

/**
 * Everything a command may touch, all bound to one transaction.
 */
export interface OrderingTransaction {
  readonly orders: OrderRepository;
  readonly outbox: OutboxWriter;
  readonly requests: RequestLog;
}

/**
 * Unit of Work (Port)
 *
 * Runs `work` in one transaction. A successful result commits the order,
 * outbox rows and request record together; a failed result rolls all of
 * them back and is returned as is. Thrown errors roll back and propagate,
 * with lost races surfacing as ConcurrencyConflictError.
 */
export interface UnitOfWork {
  execute<T, E>(
    work: (tx: OrderingTransaction) => Promise<Result<T, E>>,
  ): Promise<Result<T, E>>;
}

export const UNIT_OF_WORK = Symbol('UNIT_OF_WORK');
