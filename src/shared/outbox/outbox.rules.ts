/**
 * Pure retry rules for the outbox relay.
 */

export const MAX_JITTER_MS = 1000;

/**
 * Exponential backoff with jitter: base * 2^retryCount + [0, 1000) ms.
 *
 * With a 1s base: retry 1 ~2s, retry 2 ~4s, retry 3 ~8s, retry 4 ~16s.
 */
export function calculateNextAttempt(
  retryCount: number,
  now: Date,
  baseBackoffMs: number,
  random: () => number = Math.random,
): Date {
  const backoffMs = baseBackoffMs * Math.pow(2, retryCount);
  const jitterMs = Math.floor(random() * MAX_JITTER_MS);
  return new Date(now.getTime() + backoffMs + jitterMs);
}

export function isRetryExhausted(retryCount: number, maxRetries: number): boolean {
  return retryCount >= maxRetries;
}

/**
 * Key under which per-aggregate ordering is enforced.
 */
export function aggregateKey(row: {
  aggregateType: string;
  aggregateId: string;
}): string {
  return `${row.aggregateType}#${row.aggregateId}`;
}
