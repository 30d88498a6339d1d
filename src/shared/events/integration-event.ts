/**
 * A message announcing a committed state change to other services.
 * Stored in the outbox, published by the relay, consumed at-least-once.
 */
export interface IntegrationEvent<
  TType extends string = string,
  TPayload = unknown,
> {
  /** Unique event id; consumers de-duplicate on it */
  readonly id: string;

  /** Event type discriminator, also used as the transport topic */
  readonly eventType: TType;

  readonly aggregateType: string;
  readonly aggregateId: string;
  readonly payload: TPayload;
  readonly occurredAt: Date;

  /** Optional correlation ID for tracing across services */
  readonly correlationId?: string;
}

interface StoredEnvelope {
  payload: unknown;
  occurredAt?: string;
  correlationId?: string;
}

function isStoredEnvelope(value: unknown): value is StoredEnvelope {
  return typeof value === 'object' && value !== null && 'payload' in value;
}

/**
 * Serialize the parts of an event that live in the outbox `payload` column.
 * Identity and routing fields have their own columns.
 */
export function serializeEventPayload(event: IntegrationEvent): string {
  return JSON.stringify({
    payload: event.payload,
    occurredAt: event.occurredAt.toISOString(),
    correlationId: event.correlationId,
  });
}

export interface StoredEventFields {
  id: string;
  eventType: string;
  aggregateType: string;
  aggregateId: string;
  payload: string;
  createdAt: Date;
}

/**
 * Rebuild an integration event from its outbox columns.
 */
export function deserializeIntegrationEvent(
  stored: StoredEventFields,
): IntegrationEvent {
  const parsed: unknown = JSON.parse(stored.payload);
  const envelope: StoredEnvelope = isStoredEnvelope(parsed)
    ? parsed
    : { payload: parsed };

  return {
    id: stored.id,
    eventType: stored.eventType,
    aggregateType: stored.aggregateType,
    aggregateId: stored.aggregateId,
    payload: envelope.payload,
    occurredAt: envelope.occurredAt
      ? new Date(envelope.occurredAt)
      : stored.createdAt,
    correlationId: envelope.correlationId,
  };
}
