import { fail, ok } from '../../../shared/domain/result';
import type { Result } from '../../../shared/domain/result';
import { Address } from './address.value-object';
import type { AddressData } from './address.value-object';
import { PaymentCard } from './payment-card.value-object';
import type {
  PaymentCardData,
  PaymentCardInput,
} from './payment-card.value-object';
import { OrderItem } from './order-item.entity';
import type { NewOrderItem, OrderItemData } from './order-item.entity';
import type {
  OrderDomainEvent,
  OrderEventBase,
  OrderStockItem,
} from './order.events';
import { InvalidOrderTransitionError, OrderValidationError } from './order.errors';
import {
  MAX_ORDER_LINES,
  calculateOrderTotal,
  canTransition,
  getNextStatus,
} from './order.rules';
import type { OrderAction, OrderStatus } from './order.rules';

export const DEFAULT_CANCELLATION_REASON = 'Cancelled on request';
export const STOCK_REJECTED_REASON = 'stock rejected';

export interface CreateOrderProps {
  id: string;
  buyerId: string;
  buyerName: string;
  address: AddressData;
  card: PaymentCardInput;
  items: NewOrderItem[];
}

export interface OrderData {
  id: string;
  buyerId: string;
  buyerName: string;
  address: AddressData;
  orderDate: Date;
  status: OrderStatus;
  card: PaymentCardData;
  items: OrderItemData[];
  cancellationReason: string | null;
  /** 0 for an order that has never been persisted */
  version: number;
}

type TransitionResult = Result<void, InvalidOrderTransitionError>;

/**
 * Order aggregate root.
 *
 * All changes go through the methods below. Each returns a Result instead
 * of throwing; a failed call leaves status, lines and pending events as
 * they were. Every successful status change stages exactly one domain
 * event, drained by the unit of work with pullDomainEvents().
 */
export class Order {
  private domainEvents: OrderDomainEvent[] = [];

  private constructor(
    readonly id: string,
    readonly buyerId: string,
    readonly buyerName: string,
    readonly address: Address,
    readonly orderDate: Date,
    private currentStatus: OrderStatus,
    readonly card: PaymentCard,
    private readonly lines: OrderItem[],
    private reason: string | null,
    readonly version: number,
  ) {}

  static create(
    props: CreateOrderProps,
    now: Date,
  ): Result<Order, OrderValidationError> {
    const buyerId = props.buyerId.trim();
    const buyerName = props.buyerName.trim();
    if (buyerId.length === 0) {
      return fail(new OrderValidationError('buyerId', 'Buyer id must not be empty'));
    }
    if (buyerName.length === 0) {
      return fail(
        new OrderValidationError('buyerName', 'Buyer name must not be empty'),
      );
    }
    if (props.items.length === 0) {
      return fail(
        new OrderValidationError('items', 'An order needs at least one item'),
      );
    }

    const address = Address.create(props.address);
    if (!address.success) {
      return address;
    }
    const card = PaymentCard.create(props.card, now);
    if (!card.success) {
      return card;
    }

    const order = new Order(
      props.id,
      buyerId,
      buyerName,
      address.value,
      now,
      'SUBMITTED',
      card.value,
      [],
      null,
      0,
    );

    for (const item of props.items) {
      const added = order.addOrderItem(item);
      if (!added.success) {
        return added;
      }
    }

    order.domainEvents.push({
      ...order.eventBase(),
      type: 'order.started',
      total: order.total,
      items: order.stockItems(),
    });

    return ok(order);
  }

  /**
   * Rehydrate from persisted data. Raises no events.
   */
  static fromData(data: OrderData): Order {
    return new Order(
      data.id,
      data.buyerId,
      data.buyerName,
      Address.fromData(data.address),
      data.orderDate,
      data.status,
      PaymentCard.fromData(data.card),
      data.items.map((item) => OrderItem.fromData(item)),
      data.cancellationReason,
      data.version,
    );
  }

  get status(): OrderStatus {
    return this.currentStatus;
  }

  get cancellationReason(): string | null {
    return this.reason;
  }

  /** Frozen snapshots of the lines, in insertion order. */
  get items(): readonly Readonly<OrderItemData>[] {
    return Object.freeze(this.lines.map((line) => line.toData()));
  }

  get total(): number {
    return calculateOrderTotal(this.lines.map((line) => line.toData()));
  }

  /** Events staged since the last pull, without clearing them. */
  get pendingEvents(): readonly OrderDomainEvent[] {
    return [...this.domainEvents];
  }

  /**
   * Add units of a product. Lines are merged by product id.
   * Lines are fixed once the order leaves SUBMITTED.
   */
  addOrderItem(item: NewOrderItem): Result<void, OrderValidationError> {
    if (this.currentStatus !== 'SUBMITTED') {
      return fail(
        new OrderValidationError(
          'items',
          `Items cannot be added to an order that is ${this.currentStatus}`,
        ),
      );
    }

    const existing = this.lines.find((line) => line.productId === item.productId);
    if (existing) {
      return existing.merge(item.units, item.discount ?? 0);
    }

    if (this.lines.length >= MAX_ORDER_LINES) {
      return fail(
        new OrderValidationError(
          'items',
          `An order holds at most ${MAX_ORDER_LINES} lines`,
        ),
      );
    }

    const created = OrderItem.create(item);
    if (!created.success) {
      return created;
    }
    this.lines.push(created.value);
    return ok();
  }

  setAwaitingValidationStatus(): TransitionResult {
    return this.transition('awaitValidation', (base) => ({
      ...base,
      type: 'order.awaiting-validation',
      items: this.stockItems(),
    }));
  }

  setStockConfirmedStatus(): TransitionResult {
    return this.transition('confirmStock', (base) => ({
      ...base,
      type: 'order.stock-confirmed',
    }));
  }

  /**
   * Stock service could not reserve some products: the order is cancelled.
   */
  setStockRejectedStatus(
    rejectedProductIds: readonly number[],
  ): Result<void, InvalidOrderTransitionError | OrderValidationError> {
    if (!canTransition(this.currentStatus, 'rejectStock')) {
      return fail(new InvalidOrderTransitionError('rejectStock', this.currentStatus));
    }

    const rejected = Array.from(new Set(rejectedProductIds));
    if (rejected.length === 0) {
      return fail(
        new OrderValidationError(
          'rejectedProductIds',
          'At least one rejected product is required',
        ),
      );
    }
    const unknown = rejected.filter(
      (productId) => !this.lines.some((line) => line.productId === productId),
    );
    if (unknown.length > 0) {
      return fail(
        new OrderValidationError(
          'rejectedProductIds',
          `Products not in this order: ${unknown.join(', ')}`,
        ),
      );
    }

    return this.transition('rejectStock', (base) => {
      this.reason = STOCK_REJECTED_REASON;
      return { ...base, type: 'order.stock-rejected', rejectedProductIds: rejected };
    });
  }

  /**
   * Payment can only be taken once stock is confirmed.
   */
  setPaidStatus(): TransitionResult {
    return this.transition('pay', (base) => ({
      ...base,
      type: 'order.paid',
      items: this.stockItems(),
    }));
  }

  setShippedStatus(): TransitionResult {
    return this.transition('ship', (base) => ({ ...base, type: 'order.shipped' }));
  }

  setCancelledStatus(reason?: string): TransitionResult {
    const cancellationReason = reason?.trim() || DEFAULT_CANCELLATION_REASON;

    return this.transition('cancel', (base) => {
      this.reason = cancellationReason;
      return { ...base, type: 'order.cancelled', reason: cancellationReason };
    });
  }

  /**
   * Hand staged events to the caller and forget them.
   */
  pullDomainEvents(): OrderDomainEvent[] {
    const events = this.domainEvents;
    this.domainEvents = [];
    return events;
  }

  toData(): OrderData {
    return {
      id: this.id,
      buyerId: this.buyerId,
      buyerName: this.buyerName,
      address: this.address.toData(),
      orderDate: this.orderDate,
      status: this.currentStatus,
      card: this.card.toData(),
      items: this.lines.map((line) => ({ ...line.toData() })),
      cancellationReason: this.reason,
      version: this.version,
    };
  }

  private transition(
    action: OrderAction,
    apply: (base: OrderEventBase) => OrderDomainEvent,
  ): TransitionResult {
    const next = getNextStatus(this.currentStatus, action);
    if (next === null) {
      return fail(new InvalidOrderTransitionError(action, this.currentStatus));
    }

    this.currentStatus = next;
    this.domainEvents.push(apply(this.eventBase()));
    return ok();
  }

  private eventBase(): OrderEventBase {
    return {
      orderId: this.id,
      buyerId: this.buyerId,
      buyerName: this.buyerName,
      status: this.currentStatus,
    };
  }

  private stockItems(): OrderStockItem[] {
    return this.lines.map((line) => ({
      productId: line.productId,
      units: line.units,
    }));
  }
}
