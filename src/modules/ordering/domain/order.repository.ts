import type { Order } from './order.aggregate';

/**
 * Order Repository Interface (Port)
 *
 * The domain defines WHAT it needs, infrastructure defines HOW.
 */
export interface OrderRepository {
  /**
   * @returns null if not found
   */
  findById(id: string): Promise<Order | null>;

  /**
   * Load an order and hold a row lock on it until the surrounding
   * transaction ends. Only meaningful inside a unit of work.
   * @returns null if not found
   */
  findByIdForUpdate(id: string): Promise<Order | null>;

  /**
   * Insert a new order (version 0) or update an existing one, conditional
   * on the version it was loaded with.
   * @throws ConcurrencyConflictError when another transaction won
   */
  save(order: Order): Promise<void>;

  /**
   * Ids of SUBMITTED orders placed at or before `cutoff`, oldest first.
   */
  findSubmittedBefore(cutoff: Date, limit: number): Promise<string[]>;
}

export const ORDER_REPOSITORY = Symbol('ORDER_REPOSITORY');
