import { Inject, Injectable, Logger } from '@nestjs/common';
import { sql } from 'drizzle-orm';
import { DRIZZLE } from '../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../shared/infrastructure/database/database.module';
import { CLOCK } from '../../shared/domain/clock.port';
import type { Clock } from '../../shared/domain/clock.port';
import { OUTBOX_STORE } from '../../shared/outbox/outbox.store';
import type { OutboxStore } from '../../shared/outbox/outbox.store';

export type HealthStatus = 'ok' | 'degraded' | 'error';

export interface HealthReport {
  status: HealthStatus;
  timestamp: string;
  database: 'connected' | 'disconnected';
  /** Outbox rows that ran out of retries and wait for an operator */
  exhaustedOutboxEvents?: number;
  error?: string;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @Inject(DRIZZLE) private readonly db: DrizzleClient,
    @Inject(OUTBOX_STORE) private readonly outbox: OutboxStore,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async check(): Promise<HealthReport> {
    const timestamp = this.clock.now().toISOString();

    try {
      await this.db.execute(sql`SELECT 1`);
      const { exhausted } = await this.outbox.getStats();

      return {
        status: exhausted > 0 ? 'degraded' : 'ok',
        timestamp,
        database: 'connected',
        exhaustedOutboxEvents: exhausted,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      this.logger.warn(`Health check failed: ${message}`);
      return {
        status: 'error',
        timestamp,
        database: 'disconnected',
        error: message,
      };
    }
  }
}
