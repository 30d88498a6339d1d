import type { IntegrationEvent } from '../events';
import { serializeEventPayload } from '../events';
import type { OutboxEvent } from '../infrastructure/database/schema';
import type {
  OutboxFailure,
  OutboxStats,
  OutboxStore,
  OutboxWriter,
} from '../outbox/outbox.store';
import { isRetryExhausted } from '../outbox/outbox.rules';

/**
 * In-process outbox with the same claim and lease rules as the PostgreSQL
 * store. Used by unit tests and the in-memory unit of work.
 */
export class InMemoryOutboxStore implements OutboxStore, OutboxWriter {
  private readonly rows = new Map<string, OutboxEvent>();
  private nextPosition = 1;

  constructor(private readonly maxRetries = 5) {}

  /**
   * Build rows for a pending transaction without storing them.
   * Throws on a duplicate event id, like the primary key would.
   */
  prepare(events: readonly IntegrationEvent[]): OutboxEvent[] {
    return events.map((event) => {
      if (this.rows.has(event.id)) {
        throw new Error(`Outbox row ${event.id} already exists`);
      }
      return {
        id: event.id,
        position: 0,
        eventType: event.eventType,
        aggregateType: event.aggregateType,
        aggregateId: event.aggregateId,
        payload: serializeEventPayload(event),
        status: 'CREATED',
        retryCount: 0,
        maxRetries: this.maxRetries,
        lastError: null,
        createdAt: event.occurredAt,
        nextAttemptAt: event.occurredAt,
        publishedAt: null,
        lockedAt: null,
        lockedBy: null,
      };
    });
  }

  /** Store prepared rows, assigning positions in order. */
  insert(rows: readonly OutboxEvent[]): void {
    for (const row of rows) {
      this.rows.set(row.id, { ...row, position: this.nextPosition++ });
    }
  }

  async append(events: readonly IntegrationEvent[]): Promise<void> {
    this.insert(this.prepare(events));
  }

  /** Snapshot of every row, oldest first. */
  all(): OutboxEvent[] {
    return Array.from(this.rows.values())
      .sort((a, b) => a.position - b.position)
      .map((row) => ({ ...row }));
  }

  find(id: string): OutboxEvent | undefined {
    const row = this.rows.get(id);
    return row ? { ...row } : undefined;
  }

  /** Overwrite fields of a stored row, for arranging test scenarios. */
  patch(id: string, changes: Partial<Omit<OutboxEvent, 'id'>>): void {
    const row = this.rows.get(id);
    if (!row) {
      throw new Error(`Outbox row ${id} not found`);
    }
    this.rows.set(id, { ...row, ...changes });
  }

  async claimPending(
    batchSize: number,
    claimant: string,
    now: Date,
  ): Promise<OutboxEvent[]> {
    const ordered = this.all();
    const claimed: OutboxEvent[] = [];

    for (const row of ordered) {
      if (claimed.length >= batchSize) break;
      if (!this.isClaimable(row, now)) continue;
      if (this.isBlockedByOlder(row, ordered, now)) continue;

      const leased: OutboxEvent = {
        ...row,
        status: 'IN_PROGRESS',
        lockedAt: now,
        lockedBy: claimant,
      };
      this.rows.set(row.id, leased);
      claimed.push({ ...leased });
    }

    return claimed;
  }

  async markPublished(
    id: string,
    claimant: string,
    publishedAt: Date,
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || !this.isHeldBy(row, claimant)) return false;

    this.rows.set(id, {
      ...row,
      status: 'PUBLISHED',
      publishedAt,
      lockedAt: null,
      lockedBy: null,
    });
    return true;
  }

  async markFailed(
    id: string,
    claimant: string,
    failure: OutboxFailure,
  ): Promise<boolean> {
    const row = this.rows.get(id);
    if (!row || !this.isHeldBy(row, claimant)) return false;

    this.rows.set(id, {
      ...row,
      status: 'FAILED',
      retryCount: failure.retryCount,
      lastError: failure.reason,
      nextAttemptAt: failure.nextAttemptAt,
      lockedAt: null,
      lockedBy: null,
    });
    return true;
  }

  async release(ids: readonly string[]): Promise<number> {
    let released = 0;
    for (const id of ids) {
      const row = this.rows.get(id);
      if (row?.status !== 'IN_PROGRESS') continue;
      this.rows.set(id, { ...row, status: 'CREATED', lockedAt: null, lockedBy: null });
      released++;
    }
    return released;
  }

  async reclaimExpired(lockedBefore: Date): Promise<number> {
    let reclaimed = 0;
    for (const row of this.rows.values()) {
      if (
        row.status === 'IN_PROGRESS' &&
        row.lockedAt !== null &&
        row.lockedAt.getTime() <= lockedBefore.getTime()
      ) {
        this.rows.set(row.id, {
          ...row,
          status: 'CREATED',
          lockedAt: null,
          lockedBy: null,
        });
        reclaimed++;
      }
    }
    return reclaimed;
  }

  async getStats(): Promise<OutboxStats> {
    const stats: OutboxStats = {
      created: 0,
      inProgress: 0,
      published: 0,
      failed: 0,
      exhausted: 0,
    };
    for (const row of this.rows.values()) {
      switch (row.status) {
        case 'CREATED':
          stats.created++;
          break;
        case 'IN_PROGRESS':
          stats.inProgress++;
          break;
        case 'PUBLISHED':
          stats.published++;
          break;
        case 'FAILED':
          stats.failed++;
          if (isRetryExhausted(row.retryCount, row.maxRetries)) {
            stats.exhausted++;
          }
          break;
      }
    }
    return stats;
  }

  async findExhausted(limit: number): Promise<OutboxEvent[]> {
    return this.all()
      .filter((row) => this.isExhausted(row))
      .slice(0, limit);
  }

  async requeueExhausted(
    ids: readonly string[] | undefined,
    now: Date,
  ): Promise<number> {
    let requeued = 0;
    for (const row of this.all()) {
      if (!this.isExhausted(row)) continue;
      if (ids !== undefined && !ids.includes(row.id)) continue;
      this.rows.set(row.id, {
        ...row,
        status: 'CREATED',
        retryCount: 0,
        lastError: null,
        nextAttemptAt: now,
      });
      requeued++;
    }
    return requeued;
  }

  private isClaimable(row: OutboxEvent, now: Date): boolean {
    if (row.status === 'CREATED') return true;
    return (
      this.isRetryable(row) && row.nextAttemptAt.getTime() <= now.getTime()
    );
  }

  private isBlockedByOlder(
    row: OutboxEvent,
    ordered: OutboxEvent[],
    now: Date,
  ): boolean {
    return ordered.some(
      (other) =>
        other.position < row.position &&
        other.aggregateType === row.aggregateType &&
        other.aggregateId === row.aggregateId &&
        (other.status === 'IN_PROGRESS' ||
          (this.isRetryable(other) &&
            other.nextAttemptAt.getTime() > now.getTime())),
    );
  }

  private isHeldBy(row: OutboxEvent, claimant: string): boolean {
    return row.status === 'IN_PROGRESS' && row.lockedBy === claimant;
  }

  private isRetryable(row: OutboxEvent): boolean {
    return (
      row.status === 'FAILED' && !isRetryExhausted(row.retryCount, row.maxRetries)
    );
  }

  private isExhausted(row: OutboxEvent): boolean {
    return (
      row.status === 'FAILED' && isRetryExhausted(row.retryCount, row.maxRetries)
    );
  }
}
