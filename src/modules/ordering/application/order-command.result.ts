import type { OrderAction, OrderStatus } from '../domain/order.rules';
import {
  InvalidOrderTransitionError,
  OrderValidationError,
} from '../domain/order.errors';

export const ORDER_COMMAND_NAMES = [
  'CreateOrder',
  'SetAwaitingValidation',
  'ConfirmStock',
  'MarkPaid',
  'MarkShipped',
  'CancelOrder',
] as const;

export type OrderCommandName = (typeof ORDER_COMMAND_NAMES)[number];

/** What a command reports back, and what the request log stores. */
export interface OrderCommandOutcome {
  orderId: string;
  status: OrderStatus;
}

export type OrderCommandError =
  | { code: 'VALIDATION_FAILED'; message: string; field: string }
  | {
      code: 'INVALID_STATUS_TRANSITION';
      message: string;
      transition: OrderAction;
      currentStatus: OrderStatus;
    }
  | { code: 'ORDER_NOT_FOUND'; message: string; orderId: string }
  | { code: 'CONCURRENCY_CONFLICT'; message: string; attempts: number }
  | {
      code: 'IDEMPOTENCY_TOKEN_REUSED';
      message: string;
      token: string;
      usedBy: OrderCommandName;
    };

export type OrderNotFoundError = Extract<
  OrderCommandError,
  { code: 'ORDER_NOT_FOUND' }
>;

/**
 * Result type using discriminated union for explicit error handling.
 * `replayed` is true when the idempotency token had already been applied
 * and the stored outcome is returned unchanged.
 */
export type OrderCommandResult =
  | ({ success: true; replayed: boolean } & OrderCommandOutcome)
  | { success: false; error: OrderCommandError };

export function toOrderCommandError(
  error: InvalidOrderTransitionError | OrderValidationError,
): OrderCommandError {
  if (error instanceof InvalidOrderTransitionError) {
    return {
      code: error.code,
      message: error.message,
      transition: error.transition,
      currentStatus: error.currentStatus,
    };
  }
  return { code: error.code, message: error.message, field: error.field };
}

export function orderNotFound(orderId: string): OrderNotFoundError {
  return {
    code: 'ORDER_NOT_FOUND',
    message: `Order with id ${orderId} not found`,
    orderId,
  };
}
