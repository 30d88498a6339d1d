import { registerAs } from '@nestjs/config';
import { readIntFromEnv } from './env.utils';

export const outboxConfig = registerAs('outbox', () => ({
  batchSize: readIntFromEnv('OUTBOX_BATCH_SIZE', 100),
  leaseTimeoutMs: readIntFromEnv('OUTBOX_LEASE_TIMEOUT_MS', 60_000),
  maxRetries: readIntFromEnv('OUTBOX_MAX_RETRIES', 5),
  baseBackoffMs: readIntFromEnv('OUTBOX_BASE_BACKOFF_MS', 1000),
  publishTimeoutMs: readIntFromEnv('OUTBOX_PUBLISH_TIMEOUT_MS', 10_000),
}));
