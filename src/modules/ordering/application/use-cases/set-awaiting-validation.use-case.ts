import { Injectable } from '@nestjs/common';
import { OrderCommandRunner } from '../order-command.runner';
import type { OrderCommandResult } from '../order-command.result';
import type { OrderCommandInput } from './order-command.input';

/**
 * SetAwaitingValidation Use Case
 *
 * Moves a SUBMITTED order to AWAITING_STOCK_VALIDATION. Called by the grace
 * period scheduler as well as over HTTP.
 */
@Injectable()
export class SetAwaitingValidationUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: OrderCommandInput): Promise<OrderCommandResult> {
    return this.runner.runOnOrder(
      {
        name: 'SetAwaitingValidation',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      input.orderId,
      (order) => order.setAwaitingValidationStatus(),
    );
  }
}
