import { randomUUID } from 'crypto';
import type { IntegrationEvent } from '../../../shared/events';
import type { OrderDomainEvent, OrderStockItem } from '../domain/order.events';
import { ORDER_STATUSES } from '../domain/order.rules';
import type { OrderStatus } from '../domain/order.rules';

export const ORDER_AGGREGATE_TYPE = 'Order';

export const ORDER_INTEGRATION_EVENT_TYPES = [
  'OrderStarted',
  'OrderStatusChangedToAwaitingValidation',
  'OrderStockConfirmed',
  'OrderStockRejected',
  'OrderPaid',
  'OrderShipped',
  'OrderCancelled',
] as const;

export type OrderIntegrationEventType =
  (typeof ORDER_INTEGRATION_EVENT_TYPES)[number];

/** Fields every ordering integration event carries. */
export interface OrderEventPayload {
  orderId: string;
  buyerId: string;
  buyerName: string;
  status: OrderStatus;
}

export type OrderIntegrationEvent =
  | IntegrationEvent<
      'OrderStarted',
      OrderEventPayload & { total: number; orderStockItems: OrderStockItem[] }
    >
  | IntegrationEvent<
      'OrderStatusChangedToAwaitingValidation',
      OrderEventPayload & { orderStockItems: OrderStockItem[] }
    >
  | IntegrationEvent<'OrderStockConfirmed', OrderEventPayload>
  | IntegrationEvent<
      'OrderStockRejected',
      OrderEventPayload & { rejectedProductIds: number[] }
    >
  | IntegrationEvent<
      'OrderPaid',
      OrderEventPayload & { orderStockItems: OrderStockItem[] }
    >
  | IntegrationEvent<'OrderShipped', OrderEventPayload>
  | IntegrationEvent<'OrderCancelled', OrderEventPayload & { reason: string }>;

export interface IntegrationEventMetadata {
  id: string;
  occurredAt: Date;
  correlationId?: string;
}

/**
 * Static mapping from domain events to the integration events other
 * services consume. Adding a domain event without a case here fails to
 * compile.
 */
export function toIntegrationEvent(
  event: OrderDomainEvent,
  metadata: IntegrationEventMetadata,
): OrderIntegrationEvent {
  const base = {
    ...metadata,
    aggregateType: ORDER_AGGREGATE_TYPE,
    aggregateId: event.orderId,
  };
  const payload: OrderEventPayload = {
    orderId: event.orderId,
    buyerId: event.buyerId,
    buyerName: event.buyerName,
    status: event.status,
  };

  switch (event.type) {
    case 'order.started':
      return {
        ...base,
        eventType: 'OrderStarted',
        payload: { ...payload, total: event.total, orderStockItems: event.items },
      };
    case 'order.awaiting-validation':
      return {
        ...base,
        eventType: 'OrderStatusChangedToAwaitingValidation',
        payload: { ...payload, orderStockItems: event.items },
      };
    case 'order.stock-confirmed':
      return { ...base, eventType: 'OrderStockConfirmed', payload };
    case 'order.stock-rejected':
      return {
        ...base,
        eventType: 'OrderStockRejected',
        payload: { ...payload, rejectedProductIds: event.rejectedProductIds },
      };
    case 'order.paid':
      return {
        ...base,
        eventType: 'OrderPaid',
        payload: { ...payload, orderStockItems: event.items },
      };
    case 'order.shipped':
      return { ...base, eventType: 'OrderShipped', payload };
    case 'order.cancelled':
      return {
        ...base,
        eventType: 'OrderCancelled',
        payload: { ...payload, reason: event.reason },
      };
  }
}

/**
 * Map a drained batch of domain events, keeping their order.
 */
export function toIntegrationEvents(
  events: readonly OrderDomainEvent[],
  occurredAt: Date,
  correlationId?: string,
  newId: () => string = randomUUID,
): OrderIntegrationEvent[] {
  return events.map((event) =>
    toIntegrationEvent(event, { id: newId(), occurredAt, correlationId }),
  );
}

export function isOrderIntegrationEventType(
  eventType: string,
): eventType is OrderIntegrationEventType {
  return ORDER_INTEGRATION_EVENT_TYPES.some((type) => type === eventType);
}

function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

/**
 * Read the common fields from a consumed event, whose payload arrives
 * untyped. Returns null for anything that is not an ordering event.
 */
export function readOrderEventPayload(
  event: IntegrationEvent,
): OrderEventPayload | null {
  if (
    event.aggregateType !== ORDER_AGGREGATE_TYPE ||
    !isOrderIntegrationEventType(event.eventType)
  ) {
    return null;
  }

  const payload = event.payload;
  if (typeof payload !== 'object' || payload === null) {
    return null;
  }
  if (
    !('orderId' in payload) ||
    !('buyerId' in payload) ||
    !('buyerName' in payload) ||
    !('status' in payload)
  ) {
    return null;
  }
  const { orderId, buyerId, buyerName, status } = payload;
  if (
    typeof orderId !== 'string' ||
    typeof buyerId !== 'string' ||
    typeof buyerName !== 'string' ||
    !isOrderStatus(status)
  ) {
    return null;
  }

  return { orderId, buyerId, buyerName, status };
}
