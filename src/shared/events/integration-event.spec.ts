import { describe, it, expect } from 'vitest';
import {
  deserializeIntegrationEvent,
  serializeEventPayload,
} from './integration-event';
import type { IntegrationEvent } from './integration-event';

describe('Integration event serialization', () => {
  const event: IntegrationEvent = {
    id: 'evt-1',
    eventType: 'OrderPaid',
    aggregateType: 'Order',
    aggregateId: 'order-1',
    payload: { orderId: 'order-1', orderStockItems: [{ productId: 1, units: 2 }] },
    occurredAt: new Date('2026-03-02T10:00:00.000Z'),
    correlationId: 'req-42',
  };

  it('should store payload, occurrence time and correlation id', () => {
    expect(JSON.parse(serializeEventPayload(event))).toEqual({
      payload: { orderId: 'order-1', orderStockItems: [{ productId: 1, units: 2 }] },
      occurredAt: '2026-03-02T10:00:00.000Z',
      correlationId: 'req-42',
    });
  });

  it('should rebuild the event from its outbox columns', () => {
    const restored = deserializeIntegrationEvent({
      id: 'evt-1',
      eventType: 'OrderPaid',
      aggregateType: 'Order',
      aggregateId: 'order-1',
      payload: serializeEventPayload(event),
      createdAt: new Date('2026-03-02T10:00:05.000Z'),
    });

    expect(restored).toEqual(event);
  });

  it('should fall back to the row creation time for bare payloads', () => {
    const createdAt = new Date('2026-03-02T10:00:05.000Z');

    const restored = deserializeIntegrationEvent({
      id: 'evt-2',
      eventType: 'OrderShipped',
      aggregateType: 'Order',
      aggregateId: 'order-2',
      payload: JSON.stringify({ orderId: 'order-2' }),
      createdAt,
    });

    expect(restored.payload).toEqual({ orderId: 'order-2' });
    expect(restored.occurredAt).toEqual(createdAt);
    expect(restored.correlationId).toBeUndefined();
  });
});
