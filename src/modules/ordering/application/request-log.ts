import type { OrderCommandName, OrderCommandOutcome } from './order-command.result';

/**
 * A client request that has already been applied, keyed by its
 * idempotency token.
 */
export interface RecordedRequest {
  token: string;
  commandName: OrderCommandName;
  orderId: string;
  result: OrderCommandOutcome;
}

/**
 * Request log (Port). Bound to the unit of work's transaction, so a token
 * is recorded only together with the change it produced.
 */
export interface RequestLog {
  find(token: string): Promise<RecordedRequest | null>;

  /**
   * @throws ConcurrencyConflictError when a racing request recorded the
   * same token first
   */
  record(request: RecordedRequest): Promise<void>;
}
