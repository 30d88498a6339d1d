import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { IdempotencyService, MESSAGE_TRANSPORT } from '../../../../shared/events';
import type {
  IntegrationEvent,
  MessageHandler,
  MessageTransport,
} from '../../../../shared/events';
import { NOTIFICATION_PORT } from '../../../../shared/ports';
import type { NotificationPort } from '../../../../shared/ports';
import {
  ORDER_INTEGRATION_EVENT_TYPES,
  readOrderEventPayload,
} from '../order-integration-events';

export const ORDER_STATUS_TEMPLATE = 'order-status-changed';

/**
 * Tells the buyer whenever their order changes status.
 *
 * Delivery is at-least-once, so sends go through IdempotencyService keyed
 * on the event id. A failed send throws back into the transport and the
 * relay retries the event.
 */
@Injectable()
export class OrderStatusNotificationHandler implements OnModuleInit, OnModuleDestroy {
  static readonly handlerName = 'OrderStatusNotificationHandler';

  private readonly logger = new Logger(OrderStatusNotificationHandler.name);
  private readonly handler: MessageHandler = (event) => this.handle(event);

  constructor(
    @Inject(MESSAGE_TRANSPORT) private readonly transport: MessageTransport,
    private readonly idempotency: IdempotencyService,
    @Optional()
    @Inject(NOTIFICATION_PORT)
    private readonly notifications?: NotificationPort,
  ) {}

  onModuleInit() {
    for (const eventType of ORDER_INTEGRATION_EVENT_TYPES) {
      this.transport.subscribe(eventType, this.handler);
    }
    this.logger.log('Order status notifications registered');
  }

  onModuleDestroy() {
    for (const eventType of ORDER_INTEGRATION_EVENT_TYPES) {
      this.transport.unsubscribe(eventType, this.handler);
    }
  }

  async handle(event: IntegrationEvent): Promise<void> {
    const payload = readOrderEventPayload(event);
    if (!payload) {
      this.logger.warn(`Ignoring malformed ${event.eventType} event ${event.id}`);
      return;
    }

    await this.idempotency.processOnce(
      event.id,
      OrderStatusNotificationHandler.handlerName,
      async () => {
        if (!this.notifications) {
          this.logger.log(
            `Order ${payload.orderId} is now ${payload.status} (no notification channel bound)`,
          );
          return;
        }

        const result = await this.notifications.send({
          channel: 'email',
          to: payload.buyerId,
          template: ORDER_STATUS_TEMPLATE,
          data: {
            orderId: payload.orderId,
            buyerName: payload.buyerName,
            status: payload.status,
            eventType: event.eventType,
          },
          idempotencyKey: event.id,
        });

        if (!result.success) {
          throw new Error(
            `Notification for event ${event.id} failed: ${result.error ?? 'unknown error'}`,
          );
        }
        this.logger.debug(
          `Notified buyer ${payload.buyerId} about order ${payload.orderId} (${payload.status})`,
        );
      },
      { eventType: event.eventType, orderId: payload.orderId },
    );
  }
}
