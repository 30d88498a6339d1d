import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { fail, ok } from '../../../../shared/domain/result';
import { Order } from '../../domain/order.aggregate';
import type { AddressData } from '../../domain/address.value-object';
import type { PaymentCardInput } from '../../domain/payment-card.value-object';
import type { NewOrderItem } from '../../domain/order-item.entity';
import { OrderCommandRunner } from '../order-command.runner';
import { toOrderCommandError } from '../order-command.result';
import type { OrderCommandResult } from '../order-command.result';

export interface CreateOrderInput {
  buyerId: string;
  buyerName: string;
  address: AddressData;
  card: PaymentCardInput;
  items: NewOrderItem[];
  idempotencyToken: string;
  correlationId?: string;
}

/**
 * CreateOrder Use Case
 *
 * Places a new order in SUBMITTED and stages OrderStarted. The token is
 * mandatory here: a client retrying a timed-out create gets the first
 * order back instead of a second one.
 */
@Injectable()
export class CreateOrderUseCase {
  constructor(private readonly runner: OrderCommandRunner) {}

  execute(input: CreateOrderInput): Promise<OrderCommandResult> {
    return this.runner.run(
      {
        name: 'CreateOrder',
        idempotencyToken: input.idempotencyToken,
        correlationId: input.correlationId,
      },
      async ({ now }) => {
        const created = Order.create(
          {
            id: randomUUID(),
            buyerId: input.buyerId,
            buyerName: input.buyerName,
            address: input.address,
            card: input.card,
            items: input.items,
          },
          now,
        );
        if (!created.success) {
          return fail(toOrderCommandError(created.error));
        }
        return ok(created.value);
      },
    );
  }
}
