import type { OrderStatus } from './order.rules';

/**
 * Domain events raised by the Order aggregate. They live only until the
 * unit of work that raised them commits; the application layer maps each
 * one to an integration event for the outbox.
 */

export interface OrderEventBase {
  orderId: string;
  buyerId: string;
  buyerName: string;
  status: OrderStatus;
}

export interface OrderStockItem {
  productId: number;
  units: number;
}

export type OrderDomainEvent =
  | (OrderEventBase & {
      type: 'order.started';
      total: number;
      items: OrderStockItem[];
    })
  | (OrderEventBase & { type: 'order.awaiting-validation'; items: OrderStockItem[] })
  | (OrderEventBase & { type: 'order.stock-confirmed' })
  | (OrderEventBase & {
      type: 'order.stock-rejected';
      rejectedProductIds: number[];
    })
  | (OrderEventBase & { type: 'order.paid'; items: OrderStockItem[] })
  | (OrderEventBase & { type: 'order.shipped' })
  | (OrderEventBase & { type: 'order.cancelled'; reason: string });
