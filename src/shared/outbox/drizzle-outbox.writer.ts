import type { IntegrationEvent } from '../events';
import { serializeEventPayload } from '../events';
import type { DrizzleExecutor } from '../infrastructure/database/drizzle.client';
import { outboxEvents } from '../infrastructure/database/schema';
import type { OutboxWriter } from './outbox.store';

/**
 * Appends integration events to `outbox_events` through the caller's
 * transaction.
 */
export class DrizzleOutboxWriter implements OutboxWriter {
  constructor(
    private readonly tx: DrizzleExecutor,
    private readonly maxRetries: number,
  ) {}

  async append(events: readonly IntegrationEvent[]): Promise<void> {
    if (events.length === 0) return;

    // One statement keeps the sequence-assigned positions in staging order
    await this.tx.insert(outboxEvents).values(
      events.map((event) => ({
        id: event.id,
        eventType: event.eventType,
        aggregateType: event.aggregateType,
        aggregateId: event.aggregateId,
        payload: serializeEventPayload(event),
        status: 'CREATED' as const,
        retryCount: 0,
        maxRetries: this.maxRetries,
        createdAt: event.occurredAt,
        nextAttemptAt: event.occurredAt,
      })),
    );
  }
}
