import { eq } from 'drizzle-orm';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import type { DrizzleExecutor } from '../../../shared/infrastructure/database/drizzle.client';
import { isUniqueViolation } from '../../../shared/infrastructure/database/pg-errors';
import { clientRequests } from '../../../shared/infrastructure/database/schema';
import type { ClientRequest } from '../../../shared/infrastructure/database/schema';
import { ORDER_STATUSES } from '../domain/order.rules';
import type { OrderStatus } from '../domain/order.rules';
import { ORDER_COMMAND_NAMES } from '../application/order-command.result';
import type {
  OrderCommandName,
  OrderCommandOutcome,
} from '../application/order-command.result';
import type { RecordedRequest, RequestLog } from '../application/request-log';

function isCommandName(value: string): value is OrderCommandName {
  return ORDER_COMMAND_NAMES.some((name) => name === value);
}

function isOrderStatus(value: unknown): value is OrderStatus {
  return ORDER_STATUSES.some((status) => status === value);
}

function parseOutcome(raw: string): OrderCommandOutcome | null {
  const parsed: unknown = JSON.parse(raw);
  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('orderId' in parsed) ||
    !('status' in parsed)
  ) {
    return null;
  }
  const { orderId, status } = parsed;
  if (typeof orderId !== 'string' || !isOrderStatus(status)) {
    return null;
  }
  return { orderId, status };
}

/**
 * `client_requests` table, accessed through the unit of work's transaction.
 */
export class DrizzleRequestLog implements RequestLog {
  constructor(private readonly db: DrizzleExecutor) {}

  async find(token: string): Promise<RecordedRequest | null> {
    const [row] = await this.db
      .select()
      .from(clientRequests)
      .where(eq(clientRequests.token, token))
      .limit(1);

    return row ? this.toRecordedRequest(row) : null;
  }

  async record(request: RecordedRequest): Promise<void> {
    try {
      await this.db.insert(clientRequests).values({
        token: request.token,
        commandName: request.commandName,
        orderId: request.orderId,
        result: JSON.stringify(request.result),
      });
    } catch (error) {
      // A concurrent request with the same token committed first
      if (isUniqueViolation(error)) {
        throw new ConcurrencyConflictError(
          `Idempotency token ${request.token} was recorded concurrently`,
          request.orderId,
        );
      }
      throw error;
    }
  }

  private toRecordedRequest(row: ClientRequest): RecordedRequest {
    const result = parseOutcome(row.result);
    if (!isCommandName(row.commandName) || !result) {
      throw new Error(`Unreadable client request record for token ${row.token}`);
    }
    return {
      token: row.token,
      commandName: row.commandName,
      orderId: row.orderId,
      result,
    };
  }
}
