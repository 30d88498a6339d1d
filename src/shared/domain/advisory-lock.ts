import { sql } from 'drizzle-orm';
import type { DrizzleClient } from '../infrastructure/database/drizzle.client';

/**
 * PostgreSQL advisory locks for scheduler jobs that must run on one instance.
 *
 * The lock is transaction-scoped (`pg_try_advisory_xact_lock`): it is taken on
 * the connection of a dedicated transaction and released when that transaction
 * ends, so a pooled client never leaks it to another session.
 *
 * Range: 100000+ reserved for scheduler jobs.
 */
export const LOCK_IDS = {
  ORDER_GRACE_PERIOD: 100101,
} as const;

export type LockId = (typeof LOCK_IDS)[keyof typeof LOCK_IDS];

export type AdvisoryLockOutcome<T> =
  | { acquired: true; result: T }
  | { acquired: false; result: null };

/**
 * Execute a function while holding an advisory lock.
 *
 * @returns Result of fn, or `acquired: false` if another instance holds the lock
 */
export async function withAdvisoryLock<T>(
  db: DrizzleClient,
  lockId: LockId,
  fn: () => Promise<T>,
): Promise<AdvisoryLockOutcome<T>> {
  return db.transaction(async (tx): Promise<AdvisoryLockOutcome<T>> => {
    const rows = await tx.execute(
      sql`SELECT pg_try_advisory_xact_lock(${lockId}) AS acquired`,
    );

    if (rows[0]?.acquired !== true) {
      return { acquired: false, result: null };
    }

    const result = await fn();
    return { acquired: true, result };
  });
}
