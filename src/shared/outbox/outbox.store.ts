import type { IntegrationEvent } from '../events';
import type { OutboxEvent } from '../infrastructure/database/schema';

/**
 * Write side of the outbox. Bound to one open transaction, so the rows it
 * appends commit or roll back with the state change that produced them.
 */
export interface OutboxWriter {
  /** Insert one row per event, in the given order. */
  append(events: readonly IntegrationEvent[]): Promise<void>;
}

export interface OutboxFailure {
  reason: string;
  /** Retry count after this failure */
  retryCount: number;
  nextAttemptAt: Date;
}

export interface OutboxStats {
  created: number;
  inProgress: number;
  published: number;
  /** All FAILED rows, exhausted ones included */
  failed: number;
  /** FAILED rows whose retry budget is spent */
  exhausted: number;
}

/**
 * Read and lease side of the outbox, used by the relay and operators.
 */
export interface OutboxStore {
  /**
   * Atomically lease up to `batchSize` claimable rows for `claimant`,
   * oldest first. A row is skipped while an older row of the same
   * aggregate is still in flight or waiting out its backoff.
   */
  claimPending(
    batchSize: number,
    claimant: string,
    now: Date,
  ): Promise<OutboxEvent[]>;

  /**
   * @returns false when `claimant` no longer holds the row's lease: it was
   * published, failed, reclaimed or leased by another relay (no-op)
   */
  markPublished(id: string, claimant: string, publishedAt: Date): Promise<boolean>;

  /** @returns false when `claimant` no longer holds the row's lease (no-op) */
  markFailed(id: string, claimant: string, failure: OutboxFailure): Promise<boolean>;

  /** Hand leased rows back without spending an attempt. */
  release(ids: readonly string[]): Promise<number>;

  /** Return rows whose lease started before `lockedBefore` to CREATED. */
  reclaimExpired(lockedBefore: Date): Promise<number>;

  getStats(): Promise<OutboxStats>;

  findExhausted(limit: number): Promise<OutboxEvent[]>;

  /**
   * Reset exhausted rows to CREATED with a fresh retry budget.
   * Without ids, every exhausted row is requeued.
   */
  requeueExhausted(ids: readonly string[] | undefined, now: Date): Promise<number>;
}

export const OUTBOX_STORE = Symbol('OUTBOX_STORE');

/**
 * Lets writers nudge the relay after a commit instead of waiting for the
 * next scheduled run.
 */
export interface OutboxNotifier {
  notifyPending(): void;
}

export const OUTBOX_NOTIFIER = Symbol('OUTBOX_NOTIFIER');
