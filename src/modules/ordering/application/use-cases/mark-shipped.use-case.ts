import { Injectable } from '@nestjs/common';
import { OrderCommandRunner } from '../order-command.runner';
import type { OrderCommandResult } from '../order-command.result';
import type { OrderCommandInput } from './order-command.input';

@Injectable()
export class MarkShippedUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: OrderCommandInput): Promise<OrderCommandResult> {
    return this.runner.runOnOrder(
      {
        name: 'MarkShipped',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      input.orderId,
      (order) => order.setShippedStatus(),
    );
  }
}
