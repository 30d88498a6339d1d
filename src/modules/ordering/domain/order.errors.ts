import { DomainError } from '../../../shared/domain/errors';
import type { OrderAction, OrderStatus } from './order.rules';
import { getInvalidTransitionReason } from './order.rules';

// ============ ORDER ERRORS ============

export class InvalidOrderTransitionError extends DomainError {
  readonly code = 'INVALID_STATUS_TRANSITION';

  constructor(
    public readonly transition: OrderAction,
    public readonly currentStatus: OrderStatus,
  ) {
    super(
      getInvalidTransitionReason(currentStatus, transition) ??
        `Cannot ${transition} order with status ${currentStatus}`,
    );
  }
}

export class OrderValidationError extends DomainError {
  readonly code = 'VALIDATION_FAILED';

  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
  }
}
