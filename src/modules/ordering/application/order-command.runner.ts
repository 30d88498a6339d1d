import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { orderingConfig } from '../../../config/ordering.config';
import { CLOCK } from '../../../shared/domain/clock.port';
import type { Clock } from '../../../shared/domain/clock.port';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import { fail, ok } from '../../../shared/domain/result';
import type { Result } from '../../../shared/domain/result';
import { OUTBOX_NOTIFIER } from '../../../shared/outbox/outbox.store';
import type { OutboxNotifier } from '../../../shared/outbox/outbox.store';
import type { Order } from '../domain/order.aggregate';
import type {
  InvalidOrderTransitionError,
  OrderValidationError,
} from '../domain/order.errors';
import { toIntegrationEvents } from './order-integration-events';
import {
  orderNotFound,
  toOrderCommandError,
} from './order-command.result';
import type {
  OrderCommandError,
  OrderCommandName,
  OrderCommandOutcome,
  OrderCommandResult,
} from './order-command.result';
import { UNIT_OF_WORK } from './unit-of-work';
import type { OrderingTransaction, UnitOfWork } from './unit-of-work';

export interface OrderCommandContext {
  name: OrderCommandName;
  idempotencyToken?: string;
  correlationId?: string;
}

export interface CommandWorkContext {
  tx: OrderingTransaction;
  now: Date;
}

/** Produces the mutated order, or the reason the command was refused. */
export type CommandWork = (
  context: CommandWorkContext,
) => Promise<Result<Order, OrderCommandError>>;

/** Applies one aggregate method to a loaded order. */
export type OrderMutation = (
  order: Order,
  now: Date,
) => Result<void, InvalidOrderTransitionError | OrderValidationError>;

type CommandTarget =
  | { kind: 'new'; work: CommandWork }
  | { kind: 'existing'; orderId: string; mutate: OrderMutation };

interface CommittedCommand extends OrderCommandOutcome {
  replayed: boolean;
  eventCount: number;
}

/**
 * Runs an order command inside a unit of work:
 *
 * 1. The order is loaded under a row lock (or built, for creation)
 * 2. A recorded idempotency token short-circuits to the stored outcome
 * 3. One aggregate method is applied; a refusal rolls everything back
 * 4. Order, outbox rows and token record commit together
 *
 * Lost races are retried up to `commandMaxAttempts` times. The relay is
 * nudged after each commit that staged events.
 */
@Injectable()
export class OrderCommandRunner {
  private readonly logger = new Logger(OrderCommandRunner.name);

  constructor(
    @Inject(UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork,
    @Inject(CLOCK) private readonly clock: Clock,
    @Inject(orderingConfig.KEY)
    private readonly config: ConfigType<typeof orderingConfig>,
    @Optional()
    @Inject(OUTBOX_NOTIFIER)
    private readonly outboxNotifier?: OutboxNotifier,
  ) {}

  /**
   * Load an existing order under its row lock, apply `mutate` and commit.
   */
  runOnOrder(
    context: OrderCommandContext,
    orderId: string,
    mutate: OrderMutation,
  ): Promise<OrderCommandResult> {
    return this.execute(context, { kind: 'existing', orderId, mutate });
  }

  /**
   * Build a new order with `work` and commit it.
   */
  run(context: OrderCommandContext, work: CommandWork): Promise<OrderCommandResult> {
    return this.execute(context, { kind: 'new', work });
  }

  private async execute(
    context: OrderCommandContext,
    target: CommandTarget,
  ): Promise<OrderCommandResult> {
    const maxAttempts = Math.max(1, this.config.commandMaxAttempts);

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await this.unitOfWork.execute((tx) =>
          this.attempt(context, target, tx),
        );
        if (!result.success) {
          return result;
        }

        const { eventCount, ...outcome } = result.value;
        if (eventCount > 0) {
          this.outboxNotifier?.notifyPending();
        }
        return { success: true, ...outcome };
      } catch (error) {
        if (!(error instanceof ConcurrencyConflictError)) {
          throw error;
        }
        if (attempt >= maxAttempts) {
          this.logger.warn(
            `${context.name} gave up after ${attempt} conflicting attempts: ${error.message}`,
          );
          return {
            success: false,
            error: {
              code: 'CONCURRENCY_CONFLICT',
              message: `${context.name} conflicted with concurrent updates ${attempt} times`,
              attempts: attempt,
            },
          };
        }
        this.logger.debug(
          `${context.name} attempt ${attempt} lost a race, retrying: ${error.message}`,
        );
      }
    }
  }

  private async attempt(
    context: OrderCommandContext,
    target: CommandTarget,
    tx: OrderingTransaction,
  ): Promise<Result<CommittedCommand, OrderCommandError>> {
    const now = this.clock.now();
    let order: Order;

    if (target.kind === 'existing') {
      // Lock first: a retry waiting here sees the token its twin committed
      const loaded = await tx.orders.findByIdForUpdate(target.orderId);

      const replay = await this.replayRecorded(context, tx, target.orderId);
      if (replay) {
        return replay;
      }
      if (!loaded) {
        return fail(orderNotFound(target.orderId));
      }

      const applied = target.mutate(loaded, now);
      if (!applied.success) {
        return fail(toOrderCommandError(applied.error));
      }
      order = loaded;
    } else {
      // A racing create with the same token fails on the token's unique key and retries
      const replay = await this.replayRecorded(context, tx);
      if (replay) {
        return replay;
      }

      const produced = await target.work({ tx, now });
      if (!produced.success) {
        return produced;
      }
      order = produced.value;
    }

    const events = toIntegrationEvents(
      order.pullDomainEvents(),
      now,
      context.correlationId,
    );

    await tx.orders.save(order);
    await tx.outbox.append(events);

    const outcome: OrderCommandOutcome = { orderId: order.id, status: order.status };
    const token = context.idempotencyToken;
    if (token !== undefined) {
      await tx.requests.record({
        token,
        commandName: context.name,
        orderId: order.id,
        result: outcome,
      });
    }

    return ok({ ...outcome, replayed: false, eventCount: events.length });
  }

  /**
   * Stored outcome for a token already applied by this command to this
   * order, or IDEMPOTENCY_TOKEN_REUSED when it was applied elsewhere.
   * Null when the token is absent or unused.
   */
  private async replayRecorded(
    context: OrderCommandContext,
    tx: OrderingTransaction,
    orderId?: string,
  ): Promise<Result<CommittedCommand, OrderCommandError> | null> {
    const token = context.idempotencyToken;
    if (token === undefined) {
      return null;
    }

    const recorded = await tx.requests.find(token);
    if (!recorded) {
      return null;
    }

    if (recorded.commandName !== context.name) {
      return {
        success: false,
        error: {
          code: 'IDEMPOTENCY_TOKEN_REUSED',
          message: `Idempotency token ${token} was already used for ${recorded.commandName}`,
          token,
          usedBy: recorded.commandName,
        },
      };
    }
    if (orderId !== undefined && recorded.orderId !== orderId) {
      return {
        success: false,
        error: {
          code: 'IDEMPOTENCY_TOKEN_REUSED',
          message: `Idempotency token ${token} was already used for ${recorded.commandName} on order ${recorded.orderId}`,
          token,
          usedBy: recorded.commandName,
        },
      };
    }

    return ok({ ...recorded.result, replayed: true, eventCount: 0 });
  }
}
