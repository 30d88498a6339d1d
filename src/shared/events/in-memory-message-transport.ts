import { Injectable, Logger } from '@nestjs/common';
import type {
  MessageHandler,
  MessageTransport,
} from './message-transport.interface';
import type { IntegrationEvent } from './integration-event';

/**
 * In-process transport. A publish is acknowledged once every subscriber of
 * the topic has handled the event; a failing subscriber rejects the publish
 * so the relay retries it.
 */
@Injectable()
export class InMemoryMessageTransport implements MessageTransport {
  private readonly logger = new Logger(InMemoryMessageTransport.name);
  private readonly subscriptions = new Map<string, Set<MessageHandler>>();

  async publish(topic: string, event: IntegrationEvent): Promise<void> {
    const handlers = this.subscriptions.get(topic);

    if (!handlers || handlers.size === 0) {
      this.logger.debug(`No subscribers for topic: ${topic}`);
      return;
    }

    this.logger.log(
      `Publishing ${event.eventType}#${event.id} for ${event.aggregateType}#${event.aggregateId}`,
    );

    await Promise.all(
      Array.from(handlers).map(async (handler) => {
        try {
          await handler(event);
        } catch (error) {
          this.logger.error(
            `Subscriber failed for ${topic}: ${error instanceof Error ? error.message : error}`,
          );
          throw error;
        }
      }),
    );
  }

  subscribe(topic: string, handler: MessageHandler): void {
    const handlers = this.subscriptions.get(topic) ?? new Set<MessageHandler>();
    handlers.add(handler);
    this.subscriptions.set(topic, handlers);
    this.logger.log(`Handler subscribed to: ${topic}`);
  }

  unsubscribe(topic: string, handler: MessageHandler): void {
    const handlers = this.subscriptions.get(topic);
    if (!handlers) {
      return;
    }
    handlers.delete(handler);
    if (handlers.size === 0) {
      this.subscriptions.delete(topic);
    }
  }

  hasSubscribers(topic: string): boolean {
    return (this.subscriptions.get(topic)?.size ?? 0) > 0;
  }

  getSubscribedTopics(): string[] {
    return Array.from(this.subscriptions.keys());
  }
}
