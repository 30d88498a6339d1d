import { Injectable, Inject, Logger } from '@nestjs/common';
import { eq, and } from 'drizzle-orm';
import { DRIZZLE } from '../infrastructure/database/database.module';
import type {
  DrizzleClient,
  DrizzleExecutor,
} from '../infrastructure/database/drizzle.client';
import { processedEvents } from '../infrastructure/database/schema';
import { isUniqueViolation } from '../infrastructure/database/pg-errors';

/**
 * IdempotencyService - Ensures consumers don't process the same integration
 * event twice. Delivery from the outbox is at-least-once, so every consumer
 * with side effects goes through here.
 *
 * Usage in handlers:
 * ```typescript
 * await this.idempotency.processOnce(event.id, 'MyHandler', async () => {
 *   await this.notifications.send(...);
 * });
 * ```
 */
@Injectable()
export class IdempotencyService {
  private readonly logger = new Logger(IdempotencyService.name);

  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async isProcessed(eventId: string, handlerName: string): Promise<boolean> {
    const result = await this.db
      .select({ id: processedEvents.id })
      .from(processedEvents)
      .where(
        and(
          eq(processedEvents.eventId, eventId),
          eq(processedEvents.handlerName, handlerName),
        ),
      )
      .limit(1);

    return result.length > 0;
  }

  /**
   * Mark an event as processed by a handler.
   * Use this AFTER successfully completing the handler's work.
   */
  async markProcessed(
    eventId: string,
    handlerName: string,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.markProcessedIn(this.db, eventId, handlerName, metadata);
    } catch (error: unknown) {
      // Another delivery of the same event won the race
      if (isUniqueViolation(error)) {
        this.logger.debug(
          `Event ${eventId} already marked as processed by ${handlerName}`,
        );
        return;
      }
      throw error;
    }
  }

  /**
   * Mark as processed within an existing transaction, for handlers whose
   * own work is a database write.
   */
  async markProcessedIn(
    executor: DrizzleExecutor,
    eventId: string,
    handlerName: string,
    metadata?: Record<string, unknown>,
  ): Promise<void> {
    await executor.insert(processedEvents).values({
      eventId,
      handlerName,
      metadata: metadata ? JSON.stringify(metadata) : null,
    });
  }

  /**
   * Process an event idempotently with a single call.
   *
   * @returns executed=true if the handler ran, false if it was skipped
   */
  async processOnce<T>(
    eventId: string,
    handlerName: string,
    handler: () => Promise<T>,
    metadata?: Record<string, unknown>,
  ): Promise<{ executed: boolean; result?: T }> {
    if (await this.isProcessed(eventId, handlerName)) {
      this.logger.debug(
        `Skipping ${handlerName} for event ${eventId} (already processed)`,
      );
      return { executed: false };
    }

    const result = await handler();
    await this.markProcessed(eventId, handlerName, metadata);

    return { executed: true, result };
  }
}
