import { Injectable } from '@nestjs/common';
import { OrderCommandRunner } from '../order-command.runner';
import type { OrderCommandResult } from '../order-command.result';
import type { OrderCommandInput } from './order-command.input';

export interface CancelOrderInput extends OrderCommandInput {
  reason?: string;
}

/**
 * CancelOrder Use Case
 *
 * Cancels an order that has not been paid yet. The payment service reports
 * a failed payment through here, with its reason.
 */
@Injectable()
export class CancelOrderUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: CancelOrderInput): Promise<OrderCommandResult> {
    return this.runner.runOnOrder(
      {
        name: 'CancelOrder',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      input.orderId,
      (order) => order.setCancelledStatus(input.reason),
    );
  }
}
