import {
  pgTable,
  uuid,
  text,
  timestamp,
  integer,
  numeric,
  bigserial,
  index,
  uniqueIndex,
  pgEnum,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

// ============ ENUMS ============

export const orderStatusEnum = pgEnum('order_status', [
  'SUBMITTED',
  'AWAITING_STOCK_VALIDATION',
  'STOCK_CONFIRMED',
  'PAID',
  'SHIPPED',
  'CANCELLED',
]);

export const cardTypeEnum = pgEnum('card_type', ['AMEX', 'VISA', 'MASTERCARD']);

// ============ ORDERS ============

export const orders = pgTable(
  'orders',
  {
    id: uuid('id').primaryKey(),
    buyerId: text('buyer_id').notNull(),
    buyerName: text('buyer_name').notNull(),
    street: text('street').notNull(),
    city: text('city').notNull(),
    state: text('state').notNull(),
    country: text('country').notNull(),
    zipCode: text('zip_code').notNull(),
    orderDate: timestamp('order_date', { withTimezone: true }).notNull(),
    status: orderStatusEnum('status').notNull().default('SUBMITTED'),
    cardType: cardTypeEnum('card_type').notNull(),
    cardNumberMasked: text('card_number_masked').notNull(),
    cardHolderName: text('card_holder_name').notNull(),
    cardExpiration: text('card_expiration').notNull(), // MM/YY
    cancellationReason: text('cancellation_reason'),
    version: integer('version').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    index('ix_orders_buyer').on(table.buyerId),
    // Grace period scan: submitted orders by age
    index('ix_orders_status_date').on(table.status, table.orderDate),
  ],
);

export const orderItems = pgTable(
  'order_items',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    orderId: uuid('order_id')
      .notNull()
      .references(() => orders.id, { onDelete: 'cascade' }),
    position: integer('position').notNull(),
    productId: integer('product_id').notNull(),
    productName: text('product_name').notNull(),
    unitPrice: numeric('unit_price', { precision: 12, scale: 2 }).notNull(),
    discount: numeric('discount', { precision: 12, scale: 2 })
      .notNull()
      .default('0'),
    pictureUrl: text('picture_url'),
    units: integer('units').notNull(),
  },
  (table) => [
    uniqueIndex('ux_order_items_product').on(table.orderId, table.productId),
    check('ck_order_items_units_positive', sql`${table.units} > 0`),
  ],
);

// ============ CLIENT REQUESTS (command idempotency) ============

export const clientRequests = pgTable(
  'client_requests',
  {
    token: text('token').primaryKey(),
    commandName: text('command_name').notNull(),
    orderId: uuid('order_id').notNull(),
    result: text('result').notNull(), // JSON stringified command result
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [index('ix_client_requests_created').on(table.createdAt)],
);

// ============ OUTBOX (Transactional Outbox Pattern) ============

export const outboxEventStatusEnum = pgEnum('outbox_event_status', [
  'CREATED',
  'IN_PROGRESS', // Leased by a relay instance
  'PUBLISHED',
  'FAILED', // Retried with backoff until max_retries, then held for operators
]);

export const outboxEvents = pgTable(
  'outbox_events',
  {
    id: uuid('id').primaryKey(),
    // Insertion order; relay claims oldest first
    position: bigserial('position', { mode: 'number' }).notNull(),
    eventType: text('event_type').notNull(),
    aggregateType: text('aggregate_type').notNull(),
    aggregateId: text('aggregate_id').notNull(),
    payload: text('payload').notNull(), // JSON stringified event data
    status: outboxEventStatusEnum('status').notNull().default('CREATED'),
    retryCount: integer('retry_count').notNull().default(0),
    maxRetries: integer('max_retries').notNull().default(5),
    lastError: text('last_error'),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    nextAttemptAt: timestamp('next_attempt_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    publishedAt: timestamp('published_at', { withTimezone: true }),
    lockedAt: timestamp('locked_at', { withTimezone: true }),
    lockedBy: text('locked_by'),
  },
  (table) => [
    uniqueIndex('ux_outbox_position').on(table.position),
    index('ix_outbox_claimable').on(
      table.status,
      table.nextAttemptAt,
      table.position,
    ),
    index('ix_outbox_aggregate').on(
      table.aggregateType,
      table.aggregateId,
      table.position,
    ),
    index('ix_outbox_published_at').on(table.publishedAt),
  ],
);

// ============ PROCESSED EVENTS (consumer idempotency) ============

export const processedEvents = pgTable(
  'processed_events',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    eventId: text('event_id').notNull(),
    handlerName: text('handler_name').notNull(),
    processedAt: timestamp('processed_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    metadata: text('metadata'),
  },
  (table) => [
    uniqueIndex('ux_processed_event_handler').on(
      table.eventId,
      table.handlerName,
    ),
    index('ix_processed_events_date').on(table.processedAt),
  ],
);

// ============ TYPE EXPORTS ============

export type OrderRow = typeof orders.$inferSelect;

export type OrderItemRow = typeof orderItems.$inferSelect;

export type ClientRequest = typeof clientRequests.$inferSelect;

export type OutboxEvent = typeof outboxEvents.$inferSelect;
