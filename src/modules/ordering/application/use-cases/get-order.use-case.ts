import { Inject, Injectable } from '@nestjs/common';
import { ORDER_REPOSITORY } from '../../domain/order.repository';
import type { OrderRepository } from '../../domain/order.repository';
import type { Order } from '../../domain/order.aggregate';
import type { AddressData } from '../../domain/address.value-object';
import type { PaymentCardData } from '../../domain/payment-card.value-object';
import type { OrderItemData } from '../../domain/order-item.entity';
import type { OrderStatus } from '../../domain/order.rules';
import { calculateLineTotal } from '../../domain/order.rules';
import { orderNotFound } from '../order-command.result';
import type { OrderNotFoundError } from '../order-command.result';

export interface OrderItemView extends OrderItemData {
  total: number;
}

export interface OrderView {
  id: string;
  buyerId: string;
  buyerName: string;
  address: AddressData;
  orderDate: string;
  status: OrderStatus;
  card: PaymentCardData;
  items: OrderItemView[];
  total: number;
  cancellationReason: string | null;
}

export type GetOrderResult =
  | { success: true; order: OrderView }
  | { success: false; error: OrderNotFoundError };

export function toOrderView(order: Order): OrderView {
  return {
    id: order.id,
    buyerId: order.buyerId,
    buyerName: order.buyerName,
    address: order.address.toData(),
    orderDate: order.orderDate.toISOString(),
    status: order.status,
    card: order.card.toData(),
    items: order.items.map((item) => ({ ...item, total: calculateLineTotal(item) })),
    total: order.total,
    cancellationReason: order.cancellationReason,
  };
}

@Injectable()
export class GetOrderUseCase {
  constructor(
    @Inject(ORDER_REPOSITORY)
    private readonly repository: OrderRepository,
  ) {}

  async execute(orderId: string): Promise<GetOrderResult> {
    const order = await this.repository.findById(orderId);
    if (!order) {
      return { success: false, error: orderNotFound(orderId) };
    }
    return { success: true, order: toOrderView(order) };
  }
}
