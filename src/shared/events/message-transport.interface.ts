import type { IntegrationEvent } from './integration-event';

/**
 * Handler function type for consuming integration events.
 */
export type MessageHandler = (event: IntegrationEvent) => Promise<void>;

/**
 * Message transport - the publish/confirm contract the outbox relay relies on.
 * Swap the in-memory implementation for a broker client (RabbitMQ, Kafka, ...)
 * without touching the relay.
 */
export interface MessageTransport {
  /**
   * Resolves once the transport acknowledged the message, rejects otherwise.
   * Only the outbox relay calls this.
   */
  publish(topic: string, event: IntegrationEvent): Promise<void>;

  subscribe(topic: string, handler: MessageHandler): void;

  unsubscribe(topic: string, handler: MessageHandler): void;

  hasSubscribers(topic: string): boolean;
}

export const MESSAGE_TRANSPORT = Symbol('MESSAGE_TRANSPORT');
