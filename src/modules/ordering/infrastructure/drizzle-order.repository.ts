import { and, asc, eq, lte, sql } from 'drizzle-orm';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import type { DrizzleExecutor } from '../../../shared/infrastructure/database/drizzle.client';
import {
  orderItems,
  orders,
} from '../../../shared/infrastructure/database/schema';
import type {
  OrderItemRow,
  OrderRow,
} from '../../../shared/infrastructure/database/schema';
import { Order } from '../domain/order.aggregate';
import type { OrderData } from '../domain/order.aggregate';
import type { OrderRepository } from '../domain/order.repository';

/**
 * Orders and their lines in PostgreSQL. Constructed per executor: the
 * shared client for reads, or the unit of work's transaction for writes.
 */
export class DrizzleOrderRepository implements OrderRepository {
  constructor(private readonly db: DrizzleExecutor) {}

  async findById(id: string): Promise<Order | null> {
    const [row] = await this.db
      .select()
      .from(orders)
      .where(eq(orders.id, id))
      .limit(1);

    return row ? this.hydrate(row) : null;
  }

  async findByIdForUpdate(id: string): Promise<Order | null> {
    const [row] = await this.db
      .select()
      .from(orders)
      .where(eq(orders.id, id))
      .limit(1)
      .for('update');

    return row ? this.hydrate(row) : null;
  }

  async save(order: Order): Promise<void> {
    const data = order.toData();
    const columns = {
      buyerId: data.buyerId,
      buyerName: data.buyerName,
      street: data.address.street,
      city: data.address.city,
      state: data.address.state,
      country: data.address.country,
      zipCode: data.address.zipCode,
      orderDate: data.orderDate,
      status: data.status,
      cardType: data.card.cardType,
      cardNumberMasked: data.card.maskedNumber,
      cardHolderName: data.card.cardHolderName,
      cardExpiration: data.card.expiration,
      cancellationReason: data.cancellationReason,
    };

    if (data.version === 0) {
      await this.db.insert(orders).values({ id: data.id, ...columns, version: 1 });
      await this.insertItems(data);
      return;
    }

    const updated = await this.db
      .update(orders)
      .set({
        ...columns,
        version: sql`${orders.version} + 1`,
        updatedAt: sql`now()`,
      })
      .where(and(eq(orders.id, data.id), eq(orders.version, data.version)))
      .returning({ id: orders.id });

    if (updated.length === 0) {
      throw new ConcurrencyConflictError(
        `Order ${data.id} changed since it was loaded at version ${data.version}`,
        data.id,
      );
    }

    // Lines are owned by the order: replace them wholesale
    await this.db.delete(orderItems).where(eq(orderItems.orderId, data.id));
    await this.insertItems(data);
  }

  async findSubmittedBefore(cutoff: Date, limit: number): Promise<string[]> {
    const rows = await this.db
      .select({ id: orders.id })
      .from(orders)
      .where(and(eq(orders.status, 'SUBMITTED'), lte(orders.orderDate, cutoff)))
      .orderBy(asc(orders.orderDate))
      .limit(limit);

    return rows.map((row) => row.id);
  }

  private async insertItems(data: OrderData): Promise<void> {
    if (data.items.length === 0) return;

    await this.db.insert(orderItems).values(
      data.items.map((item, position) => ({
        orderId: data.id,
        position,
        productId: item.productId,
        productName: item.productName,
        unitPrice: item.unitPrice.toFixed(2),
        discount: item.discount.toFixed(2),
        pictureUrl: item.pictureUrl,
        units: item.units,
      })),
    );
  }

  private async hydrate(row: OrderRow): Promise<Order> {
    const items = await this.db
      .select()
      .from(orderItems)
      .where(eq(orderItems.orderId, row.id))
      .orderBy(asc(orderItems.position));

    return Order.fromData(this.toOrderData(row, items));
  }

  private toOrderData(row: OrderRow, items: OrderItemRow[]): OrderData {
    return {
      id: row.id,
      buyerId: row.buyerId,
      buyerName: row.buyerName,
      address: {
        street: row.street,
        city: row.city,
        state: row.state,
        country: row.country,
        zipCode: row.zipCode,
      },
      orderDate: row.orderDate,
      status: row.status,
      card: {
        cardType: row.cardType,
        maskedNumber: row.cardNumberMasked,
        cardHolderName: row.cardHolderName,
        expiration: row.cardExpiration,
      },
      // numeric columns come back as strings
      items: items.map((item) => ({
        productId: item.productId,
        productName: item.productName,
        unitPrice: Number(item.unitPrice),
        discount: Number(item.discount),
        pictureUrl: item.pictureUrl,
        units: item.units,
      })),
      cancellationReason: row.cancellationReason,
      version: row.version,
    };
  }
}
