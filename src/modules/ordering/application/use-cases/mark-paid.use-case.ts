import { Injectable } from '@nestjs/common';
import { OrderCommandRunner } from '../order-command.runner';
import type { OrderCommandResult } from '../order-command.result';
import type { OrderCommandInput } from './order-command.input';

/**
 * MarkPaid Use Case
 *
 * Records a successful payment. Only a STOCK_CONFIRMED order can be paid.
 */
@Injectable()
export class MarkPaidUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: OrderCommandInput): Promise<OrderCommandResult> {
    return this.runner.runOnOrder(
      {
        name: 'MarkPaid',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      input.orderId,
      (order) => order.setPaidStatus(),
    );
  }
}
