import { Injectable, Inject, Logger, OnModuleDestroy } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import type { ConfigType } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { outboxConfig } from '../../config/outbox.config';
import { CLOCK } from '../domain/clock.port';
import type { Clock } from '../domain/clock.port';
import { MESSAGE_TRANSPORT, deserializeIntegrationEvent } from '../events';
import type { IntegrationEvent, MessageTransport } from '../events';
import type { OutboxEvent } from '../infrastructure/database/schema';
import { OUTBOX_STORE } from './outbox.store';
import type { OutboxNotifier, OutboxStats, OutboxStore } from './outbox.store';
import {
  aggregateKey,
  calculateNextAttempt,
  isRetryExhausted,
} from './outbox.rules';

export class PublishTimeoutError extends Error {
  constructor(
    public readonly eventId: string,
    public readonly timeoutMs: number,
  ) {
    super(`Publish of event ${eventId} not acknowledged within ${timeoutMs}ms`);
    this.name = 'PublishTimeoutError';
  }
}

type PublishOutcome = 'published' | 'failed' | 'exhausted' | 'timed-out';

export interface RelayRunSummary {
  reclaimed: number;
  claimed: number;
  published: number;
  failed: number;
  exhausted: number;
  timedOut: number;
  released: number;
}

const SUMMARY_FIELDS = [
  'reclaimed',
  'claimed',
  'published',
  'failed',
  'exhausted',
  'timedOut',
  'released',
] as const satisfies readonly (keyof RelayRunSummary)[];

const emptySummary = (): RelayRunSummary => ({
  reclaimed: 0,
  claimed: 0,
  published: 0,
  failed: 0,
  exhausted: 0,
  timedOut: 0,
  released: 0,
});

/**
 * OutboxRelay - drains the outbox into the message transport.
 *
 * 1. Lease recovery: rows held longer than the lease timeout are reclaimed
 * 2. SKIP LOCKED claiming: replicas never lease the same row
 * 3. Per-aggregate ordering: after a failure the rest of that aggregate's
 *    rows in the batch are released, not published out of order
 * 4. Exponential backoff, then rows are held in FAILED for operators
 * 5. Bounded publish: a timed-out publish keeps its lease and is retried
 *    once the lease expires
 */
@Injectable()
export class OutboxRelay implements OutboxNotifier, OnModuleDestroy {
  private readonly logger = new Logger(OutboxRelay.name);
  private readonly relayId = randomUUID();
  private running: Promise<RelayRunSummary> | null = null;
  private rerunRequested = false;
  private isShuttingDown = false;

  constructor(
    @Inject(OUTBOX_STORE) private readonly store: OutboxStore,
    @Inject(MESSAGE_TRANSPORT) private readonly transport: MessageTransport,
    @Inject(outboxConfig.KEY)
    private readonly config: ConfigType<typeof outboxConfig>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.logger.log(`OutboxRelay initialized with ID: ${this.relayId}`);
  }

  async onModuleDestroy(): Promise<void> {
    this.isShuttingDown = true;
    this.logger.log('OutboxRelay shutting down...');

    if (this.running) {
      try {
        await this.running;
      } catch (error) {
        this.logger.warn(
          `In-flight outbox run failed during shutdown: ${error instanceof Error ? error.message : error}`,
        );
      }
    }
  }

  /**
   * Scheduled drain - runs every 5 seconds.
   */
  @Cron(CronExpression.EVERY_5_SECONDS, { name: 'outbox-relay' })
  async processOutbox(): Promise<void> {
    try {
      await this.runOnce();
    } catch (error) {
      this.logger.error(
        `Outbox processing failed: ${error instanceof Error ? error.message : error}`,
      );
    }
  }

  /**
   * Called after a command commits. Starts a run now, or asks the current
   * run to go around once more.
   */
  notifyPending(): void {
    if (this.isShuttingDown) return;

    if (this.running) {
      this.rerunRequested = true;
      return;
    }

    void this.processOutbox();
  }

  /**
   * Run one drain cycle. Returns null when a run is already in progress or
   * the relay is shutting down.
   */
  async runOnce(): Promise<RelayRunSummary | null> {
    if (this.isShuttingDown || this.running) {
      return null;
    }

    this.running = this.drain();
    try {
      return await this.running;
    } finally {
      this.running = null;
    }
  }

  async getStats(): Promise<OutboxStats> {
    return this.store.getStats();
  }

  async getExhaustedEvents(limit = 100): Promise<OutboxEvent[]> {
    return this.store.findExhausted(limit);
  }

  /**
   * Give exhausted events a fresh retry budget (ops intervention).
   */
  async requeueExhausted(ids?: readonly string[]): Promise<number> {
    const requeued = await this.store.requeueExhausted(ids, this.clock.now());
    this.logger.log(`Requeued ${requeued} exhausted events for retry`);

    if (requeued > 0) {
      this.notifyPending();
    }
    return requeued;
  }

  private async drain(): Promise<RelayRunSummary> {
    const total = emptySummary();

    do {
      this.rerunRequested = false;
      const batch = await this.processBatch();
      for (const key of SUMMARY_FIELDS) {
        total[key] += batch[key];
      }
    } while (this.rerunRequested && !this.isShuttingDown);

    return total;
  }

  private async processBatch(): Promise<RelayRunSummary> {
    const summary = emptySummary();
    const now = this.clock.now();

    summary.reclaimed = await this.store.reclaimExpired(
      new Date(now.getTime() - this.config.leaseTimeoutMs),
    );
    if (summary.reclaimed > 0) {
      this.logger.warn(`Reclaimed ${summary.reclaimed} events with expired leases`);
    }

    const claimed = await this.store.claimPending(
      this.config.batchSize,
      this.relayId,
      now,
    );
    summary.claimed = claimed.length;
    if (claimed.length === 0) {
      return summary;
    }

    this.logger.debug(`Claimed ${claimed.length} events for publishing`);

    const blockedAggregates = new Set<string>();
    const toRelease: string[] = [];

    for (const row of claimed) {
      const key = aggregateKey(row);

      if (this.isShuttingDown || blockedAggregates.has(key)) {
        toRelease.push(row.id);
        continue;
      }

      const outcome = await this.publishRow(row);
      switch (outcome) {
        case 'published':
          summary.published++;
          break;
        case 'failed':
          summary.failed++;
          blockedAggregates.add(key);
          break;
        case 'exhausted':
          summary.exhausted++;
          blockedAggregates.add(key);
          break;
        case 'timed-out':
          summary.timedOut++;
          blockedAggregates.add(key);
          break;
      }
    }

    if (toRelease.length > 0) {
      summary.released = await this.store.release(toRelease);
    }

    this.logger.log(
      `Relayed ${summary.published}/${summary.claimed} events (failed: ${summary.failed}, exhausted: ${summary.exhausted}, timed out: ${summary.timedOut}, released: ${summary.released})`,
    );

    return summary;
  }

  private async publishRow(row: OutboxEvent): Promise<PublishOutcome> {
    try {
      const event = deserializeIntegrationEvent(row);
      await this.publishWithTimeout(row.eventType, event);
    } catch (error) {
      if (error instanceof PublishTimeoutError) {
        // Lease stays; the row is reclaimed once it expires
        this.logger.warn(error.message);
        return 'timed-out';
      }
      return this.recordFailure(row, error);
    }

    const marked = await this.store.markPublished(
      row.id,
      this.relayId,
      this.clock.now(),
    );
    if (!marked) {
      this.logger.debug(
        `Event ${row.eventType}#${row.id} was published after its lease was lost`,
      );
    }
    return 'published';
  }

  private async publishWithTimeout(
    topic: string,
    event: IntegrationEvent,
  ): Promise<void> {
    const timeoutMs = this.config.publishTimeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new PublishTimeoutError(event.id, timeoutMs)),
        timeoutMs,
      );
    });

    try {
      await Promise.race([this.transport.publish(topic, event), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async recordFailure(
    row: OutboxEvent,
    error: unknown,
  ): Promise<PublishOutcome> {
    const reason = error instanceof Error ? error.message : String(error);
    const retryCount = row.retryCount + 1;
    const exhausted = isRetryExhausted(retryCount, row.maxRetries);
    const now = this.clock.now();
    const nextAttemptAt = exhausted
      ? now
      : calculateNextAttempt(retryCount, now, this.config.baseBackoffMs);

    const marked = await this.store.markFailed(row.id, this.relayId, {
      reason,
      retryCount,
      nextAttemptAt,
    });
    if (!marked) {
      this.logger.warn(
        `Event ${row.eventType}#${row.id} failed after its lease was lost: ${reason}`,
      );
      return 'failed';
    }

    if (exhausted) {
      this.logger.error(
        `Event ${row.eventType}#${row.id} for ${aggregateKey(row)} exhausted ${row.maxRetries} retries and is held in FAILED. Last error: ${reason}`,
      );
      return 'exhausted';
    }

    const nextAttemptIn = Math.round(
      (nextAttemptAt.getTime() - now.getTime()) / 1000,
    );
    this.logger.warn(
      `Event ${row.eventType}#${row.id} failed (retry ${retryCount}/${row.maxRetries}). Next attempt in ${nextAttemptIn}s. Error: ${reason}`,
    );
    return 'failed';
  }
}
