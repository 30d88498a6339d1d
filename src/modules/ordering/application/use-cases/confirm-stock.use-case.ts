import { Injectable } from '@nestjs/common';
import { OrderCommandRunner } from '../order-command.runner';
import type { OrderCommandResult } from '../order-command.result';
import type { OrderCommandInput } from './order-command.input';

export interface ConfirmStockInput extends OrderCommandInput {
  /** Products the stock service could not reserve; empty or absent means all were */
  rejectedProductIds?: number[];
}

/**
 * ConfirmStock Use Case
 *
 * Applies the stock service's verdict: every product reserved confirms the
 * order, any rejected product cancels it with reason "stock rejected".
 */
@Injectable()
export class ConfirmStockUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: ConfirmStockInput): Promise<OrderCommandResult> {
    const rejected = input.rejectedProductIds ?? [];

    return this.runner.runOnOrder(
      {
        name: 'ConfirmStock',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      input.orderId,
      (order) =>
        rejected.length > 0
          ? order.setStockRejectedStatus(rejected)
          : order.setStockConfirmedStatus(),
    );
  }
}
