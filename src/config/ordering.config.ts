import { registerAs } from '@nestjs/config';
import { readIntFromEnv } from './env.utils';

export const orderingConfig = registerAs('ordering', () => ({
  commandMaxAttempts: readIntFromEnv('ORDER_COMMAND_MAX_ATTEMPTS', 3),
  lockTimeoutMs: readIntFromEnv('ORDER_LOCK_TIMEOUT_MS', 5000),
  gracePeriodMinutes: readIntFromEnv('ORDER_GRACE_PERIOD_MINUTES', 1),
}));
