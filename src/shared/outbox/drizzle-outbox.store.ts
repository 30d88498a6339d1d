import { Injectable, Inject } from '@nestjs/common';
import {
  and,
  asc,
  eq,
  gt,
  gte,
  inArray,
  lt,
  lte,
  notExists,
  or,
  sql,
} from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import { DRIZZLE } from '../infrastructure/database/database.module';
import type { DrizzleClient } from '../infrastructure/database/drizzle.client';
import { outboxEvents, OutboxEvent } from '../infrastructure/database/schema';
import type { OutboxFailure, OutboxStats, OutboxStore } from './outbox.store';

const isRetryable = and(
  eq(outboxEvents.status, 'FAILED'),
  lt(outboxEvents.retryCount, outboxEvents.maxRetries),
);

const isExhausted = and(
  eq(outboxEvents.status, 'FAILED'),
  gte(outboxEvents.retryCount, outboxEvents.maxRetries),
);

/**
 * PostgreSQL outbox store.
 *
 * Claiming is a single `UPDATE ... WHERE id IN (SELECT ... FOR UPDATE SKIP
 * LOCKED)`, so concurrent relay instances never lease the same row.
 */
@Injectable()
export class DrizzleOutboxStore implements OutboxStore {
  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async claimPending(
    batchSize: number,
    claimant: string,
    now: Date,
  ): Promise<OutboxEvent[]> {
    const older = alias(outboxEvents, 'older');

    // An older row of the same aggregate that is in flight or waiting out
    // its backoff. Due retries are claimable themselves and sort first.
    const blockedByOlder = this.db
      .select({ id: older.id })
      .from(older)
      .where(
        and(
          eq(older.aggregateType, outboxEvents.aggregateType),
          eq(older.aggregateId, outboxEvents.aggregateId),
          lt(older.position, outboxEvents.position),
          or(
            eq(older.status, 'IN_PROGRESS'),
            and(
              eq(older.status, 'FAILED'),
              lt(older.retryCount, older.maxRetries),
              gt(older.nextAttemptAt, now),
            ),
          ),
        ),
      );

    const claimable = this.db
      .select({ id: outboxEvents.id })
      .from(outboxEvents)
      .where(
        and(
          or(
            eq(outboxEvents.status, 'CREATED'),
            and(isRetryable, lte(outboxEvents.nextAttemptAt, now)),
          ),
          notExists(blockedByOlder),
        ),
      )
      .orderBy(asc(outboxEvents.position))
      .limit(batchSize)
      .for('update', { skipLocked: true });

    const claimed = await this.db
      .update(outboxEvents)
      .set({ status: 'IN_PROGRESS', lockedAt: now, lockedBy: claimant })
      .where(inArray(outboxEvents.id, claimable))
      .returning();

    // RETURNING order is unspecified
    return claimed.sort((a, b) => a.position - b.position);
  }

  async markPublished(
    id: string,
    claimant: string,
    publishedAt: Date,
  ): Promise<boolean> {
    const updated = await this.db
      .update(outboxEvents)
      .set({
        status: 'PUBLISHED',
        publishedAt,
        lockedAt: null,
        lockedBy: null,
      })
      .where(this.heldBy(id, claimant))
      .returning({ id: outboxEvents.id });

    return updated.length > 0;
  }

  async markFailed(
    id: string,
    claimant: string,
    failure: OutboxFailure,
  ): Promise<boolean> {
    const updated = await this.db
      .update(outboxEvents)
      .set({
        status: 'FAILED',
        retryCount: failure.retryCount,
        lastError: failure.reason,
        nextAttemptAt: failure.nextAttemptAt,
        lockedAt: null,
        lockedBy: null,
      })
      .where(this.heldBy(id, claimant))
      .returning({ id: outboxEvents.id });

    return updated.length > 0;
  }

  private heldBy(id: string, claimant: string) {
    return and(
      eq(outboxEvents.id, id),
      eq(outboxEvents.status, 'IN_PROGRESS'),
      eq(outboxEvents.lockedBy, claimant),
    );
  }

  async release(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;

    const released = await this.db
      .update(outboxEvents)
      .set({ status: 'CREATED', lockedAt: null, lockedBy: null })
      .where(
        and(
          inArray(outboxEvents.id, [...ids]),
          eq(outboxEvents.status, 'IN_PROGRESS'),
        ),
      )
      .returning({ id: outboxEvents.id });

    return released.length;
  }

  async reclaimExpired(lockedBefore: Date): Promise<number> {
    const reclaimed = await this.db
      .update(outboxEvents)
      .set({ status: 'CREATED', lockedAt: null, lockedBy: null })
      .where(
        and(
          eq(outboxEvents.status, 'IN_PROGRESS'),
          lte(outboxEvents.lockedAt, lockedBefore),
        ),
      )
      .returning({ id: outboxEvents.id });

    return reclaimed.length;
  }

  async getStats(): Promise<OutboxStats> {
    const rows = await this.db
      .select({
        status: outboxEvents.status,
        count: sql<number>`count(*)::int`,
        exhausted: sql<number>`(count(*) filter (where ${outboxEvents.retryCount} >= ${outboxEvents.maxRetries}))::int`,
      })
      .from(outboxEvents)
      .groupBy(outboxEvents.status);

    const stats: OutboxStats = {
      created: 0,
      inProgress: 0,
      published: 0,
      failed: 0,
      exhausted: 0,
    };

    for (const row of rows) {
      switch (row.status) {
        case 'CREATED':
          stats.created = row.count;
          break;
        case 'IN_PROGRESS':
          stats.inProgress = row.count;
          break;
        case 'PUBLISHED':
          stats.published = row.count;
          break;
        case 'FAILED':
          stats.failed = row.count;
          stats.exhausted = row.exhausted;
          break;
      }
    }

    return stats;
  }

  async findExhausted(limit: number): Promise<OutboxEvent[]> {
    return this.db
      .select()
      .from(outboxEvents)
      .where(isExhausted)
      .orderBy(asc(outboxEvents.position))
      .limit(limit);
  }

  async requeueExhausted(
    ids: readonly string[] | undefined,
    now: Date,
  ): Promise<number> {
    if (ids !== undefined && ids.length === 0) return 0;

    const requeued = await this.db
      .update(outboxEvents)
      .set({
        status: 'CREATED',
        retryCount: 0,
        lastError: null,
        nextAttemptAt: now,
      })
      .where(
        ids === undefined
          ? isExhausted
          : and(isExhausted, inArray(outboxEvents.id, [...ids])),
      )
      .returning({ id: outboxEvents.id });

    return requeued.length;
  }
}
