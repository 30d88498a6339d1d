import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import type { ConfigType } from '@nestjs/config';
import { orderingConfig } from '../../../config/ordering.config';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import {
  LOCK_IDS,
  withAdvisoryLock,
} from '../../../shared/domain/advisory-lock';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../../shared/infrastructure/database/drizzle.client';
import { ORDER_REPOSITORY } from '../domain/order.repository';
import type { OrderRepository } from '../domain/order.repository';
import { SetAwaitingValidationUseCase } from './use-cases/set-awaiting-validation.use-case';

export const GRACE_PERIOD_BATCH_SIZE = 100;

/**
 * Metrics emitted by the grace period job, picked up by log aggregators.
 */
export interface GracePeriodMetrics {
  job: 'order_grace_period';
  candidates: number;
  moved: number;
  skipped: number;
  errorCount: number;
  durationMs: number;
  lockAcquired: boolean;
}

interface BatchOutcome {
  candidates: number;
  moved: number;
  skipped: number;
  errors: { orderId: string; error: string }[];
}

/**
 * Gives buyers a short window to cancel a fresh order, then hands it to
 * stock validation. Each order goes through the regular command path, so
 * it gets the same locking, outbox rows and retries as an HTTP command.
 */
@Injectable()
export class GracePeriodScheduler {
  private readonly logger = new Logger(GracePeriodScheduler.name);

  constructor(
    @Inject(DRIZZLE) private readonly db: DrizzleClient,
    @Inject(ORDER_REPOSITORY) private readonly orders: OrderRepository,
    private readonly setAwaitingValidation: SetAwaitingValidationUseCase,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(orderingConfig.KEY)
    private readonly config: ConfigType<typeof orderingConfig>,
  ) {}

  /**
   * Runs every minute. Uses an advisory lock so one instance does the work.
   */
  @Cron(CronExpression.EVERY_MINUTE, { name: 'order-grace-period' })
  async moveExpiredSubmissions(): Promise<GracePeriodMetrics> {
    const startTime = Date.now();

    const lockResult = await withAdvisoryLock(
      this.db,
      LOCK_IDS.ORDER_GRACE_PERIOD,
      () => this.processBatch(),
    );

    const metrics: GracePeriodMetrics = {
      job: 'order_grace_period',
      candidates: lockResult.acquired ? lockResult.result.candidates : 0,
      moved: lockResult.acquired ? lockResult.result.moved : 0,
      skipped: lockResult.acquired ? lockResult.result.skipped : 0,
      errorCount: lockResult.acquired ? lockResult.result.errors.length : 0,
      durationMs: Date.now() - startTime,
      lockAcquired: lockResult.acquired,
    };

    if (!lockResult.acquired) {
      this.logger.debug({
        message: 'Grace period job skipped - another instance is running',
        ...metrics,
      });
      return metrics;
    }

    if (metrics.moved > 0) {
      this.logger.log({
        message: `Grace period job moved ${metrics.moved} orders to stock validation`,
        ...metrics,
      });
    }
    if (lockResult.result.errors.length > 0) {
      this.logger.warn({
        message: `Grace period job had ${lockResult.result.errors.length} errors`,
        ...metrics,
        errors: lockResult.result.errors,
      });
    }

    return metrics;
  }

  private async processBatch(): Promise<BatchOutcome> {
    const cutoff = new Date(
      this.clock.now().getTime() - this.config.gracePeriodMinutes * 60_000,
    );
    const orderIds = await this.orders.findSubmittedBefore(
      cutoff,
      GRACE_PERIOD_BATCH_SIZE,
    );

    const outcome: BatchOutcome = {
      candidates: orderIds.length,
      moved: 0,
      skipped: 0,
      errors: [],
    };

    for (const orderId of orderIds) {
      try {
        const result = await this.setAwaitingValidation.execute({ orderId });
        if (result.success) {
          outcome.moved++;
        } else {
          // Cancelled or moved by someone else since the query
          outcome.skipped++;
          this.logger.debug(
            `Order ${orderId} skipped by grace period job: ${result.error.message}`,
          );
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        outcome.errors.push({ orderId, error: message });
        this.logger.error(
          `Grace period transition failed for order ${orderId}`,
          error instanceof Error ? error.stack : error,
        );
      }
    }

    return outcome;
  }
}
