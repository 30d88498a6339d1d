import { describe, it, expect, beforeEach } from 'vitest';
import { Test } from '@nestjs/testing';
import { orderingConfig } from '../../../config/ordering.config';
import { outboxConfig } from '../../../config/outbox.config';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import { fail, ok } from '../../../shared/domain/result';
import { DRIZZLE } from '../../../shared/infrastructure/database/database.module';
import { DrizzleMock } from '../../../shared/testing/drizzle-mock';
import { Order } from '../domain/order.aggregate';
import { FIXED_NOW, orderProps } from '../testing/order.fixtures';
import { DrizzleUnitOfWork } from './drizzle-unit-of-work';

const orderRow = {
  id: 'order-1',
  buyerId: 'buyer-1',
  buyerName: 'Ada Buyer',
  street: '1 Main St',
  city: 'Springfield',
  state: 'IL',
  country: 'US',
  zipCode: '62701',
  orderDate: FIXED_NOW,
  status: 'STOCK_CONFIRMED',
  cardType: 'VISA',
  cardNumberMasked: '************1111',
  cardHolderName: 'Ada Buyer',
  cardExpiration: '12/29',
  cancellationReason: null,
  version: 3,
  createdAt: FIXED_NOW,
  updatedAt: FIXED_NOW,
};

const itemRows = [
  {
    id: 'item-1',
    orderId: 'order-1',
    position: 0,
    productId: 1,
    productName: 'Mug',
    unitPrice: '10.00',
    discount: '0.00',
    pictureUrl: null,
    units: 2,
  },
  {
    id: 'item-2',
    orderId: 'order-1',
    position: 1,
    productId: 2,
    productName: 'Tee',
    unitPrice: '15.00',
    discount: '0.00',
    pictureUrl: null,
    units: 1,
  },
];

describe('DrizzleUnitOfWork', () => {
  let db: DrizzleMock;
  let uow: DrizzleUnitOfWork;

  beforeEach(async () => {
    db = new DrizzleMock();

    const module = await Test.createTestingModule({
      providers: [
        DrizzleUnitOfWork,
        { provide: DRIZZLE, useValue: db },
        {
          provide: orderingConfig.KEY,
          useValue: { commandMaxAttempts: 3, lockTimeoutMs: 2500, gracePeriodMinutes: 1 },
        },
        {
          provide: outboxConfig.KEY,
          useValue: {
            batchSize: 100,
            leaseTimeoutMs: 60_000,
            maxRetries: 5,
            baseBackoffMs: 1000,
            publishTimeoutMs: 10_000,
          },
        },
      ],
    }).compile();

    uow = module.get(DrizzleUnitOfWork);
  });

  it('should load under a row lock and update conditionally on the version', async () => {
    // set_config, order row, item rows, update, delete items, insert items
    db.queueResults([], [orderRow], itemRows, [{ id: 'order-1' }], [], []);

    const result = await uow.execute<number, string>(async (tx) => {
      const order = await tx.orders.findByIdForUpdate('order-1');
      if (!order) return fail('missing');
      order.setPaidStatus();
      await tx.orders.save(order);
      return ok(order.total);
    });

    expect(result).toEqual({ success: true, value: 35 });
    expect(db.execute).toHaveBeenCalledTimes(1);
    expect(db.for).toHaveBeenCalledWith('update');
    expect(db.set).toHaveBeenCalledWith(
      expect.objectContaining({ status: 'PAID', cancellationReason: null }),
    );
    expect(db.values).toHaveBeenLastCalledWith([
      {
        orderId: 'order-1',
        position: 0,
        productId: 1,
        productName: 'Mug',
        unitPrice: '10.00',
        discount: '0.00',
        pictureUrl: null,
        units: 2,
      },
      {
        orderId: 'order-1',
        position: 1,
        productId: 2,
        productName: 'Tee',
        unitPrice: '15.00',
        discount: '0.00',
        pictureUrl: null,
        units: 1,
      },
    ]);
  });

  it('should insert a new order at version 1', async () => {
    const created = Order.create(orderProps(), FIXED_NOW);
    if (!created.success) throw new Error(created.error.message);

    await uow.execute(async (tx) => {
      await tx.orders.save(created.value);
      return ok(undefined);
    });

    expect(db.insert).toHaveBeenCalledTimes(2);
    expect(db.values).toHaveBeenNthCalledWith(
      1,
      expect.objectContaining({ id: 'order-1', status: 'SUBMITTED', version: 1 }),
    );
    expect(db.update).not.toHaveBeenCalled();
  });

  it('should raise a conflict when the version moved on', async () => {
    db.queueResults([], [orderRow], itemRows, []);

    await expect(
      uow.execute<undefined, string>(async (tx) => {
        const order = await tx.orders.findByIdForUpdate('order-1');
        if (!order) return fail('missing');
        order.setPaidStatus();
        await tx.orders.save(order);
        return ok(undefined);
      }),
    ).rejects.toBeInstanceOf(ConcurrencyConflictError);
  });

  it('should roll back and return a refused result', async () => {
    const result = await uow.execute(async () => fail({ code: 'REFUSED' }));

    expect(result).toEqual({ success: false, error: { code: 'REFUSED' } });
    expect(db.rollback).toHaveBeenCalledTimes(1);
  });

  it('should turn serialization failures into conflicts', async () => {
    const serialization = Object.assign(new Error('could not serialize access'), {
      code: '40001',
    });

    await expect(
      uow.execute(async () => {
        throw serialization;
      }),
    ).rejects.toThrow(
      new ConcurrencyConflictError(
        'Transaction aborted by a concurrent update: could not serialize access',
      ),
    );
  });

  it('should let other database errors through', async () => {
    await expect(
      uow.execute(async () => {
        throw new Error('connection terminated');
      }),
    ).rejects.toThrow('connection terminated');
  });

  describe('request log', () => {
    it('should read a recorded request', async () => {
      db.queueResults(
        [],
        [
          {
            token: 'token-pay-1',
            commandName: 'MarkPaid',
            orderId: 'order-1',
            result: '{"orderId":"order-1","status":"PAID"}',
            createdAt: FIXED_NOW,
          },
        ],
      );

      const result = await uow.execute(async (tx) => ok(await tx.requests.find('token-pay-1')));

      expect(result).toEqual({
        success: true,
        value: {
          token: 'token-pay-1',
          commandName: 'MarkPaid',
          orderId: 'order-1',
          result: { orderId: 'order-1', status: 'PAID' },
        },
      });
    });

    it('should report a token recorded by a racing request as a conflict', async () => {
      db.failNext(Object.assign(new Error('duplicate key'), { code: '23505' }));

      await expect(
        uow.execute(async (tx) => {
          await tx.requests.record({
            token: 'token-pay-1',
            commandName: 'MarkPaid',
            orderId: 'order-1',
            result: { orderId: 'order-1', status: 'PAID' },
          });
          return ok(undefined);
        }),
      ).rejects.toThrow('Idempotency token token-pay-1 was recorded concurrently');
    });
  });

  describe('outbox', () => {
    it('should append rows through the same transaction', async () => {
      await uow.execute(async (tx) => {
        await tx.outbox.append([
          {
            id: 'evt-1',
            eventType: 'OrderPaid',
            aggregateType: 'Order',
            aggregateId: 'order-1',
            payload: { orderId: 'order-1' },
            occurredAt: FIXED_NOW,
          },
        ]);
        return ok(undefined);
      });

      expect(db.values).toHaveBeenCalledWith([
        expect.objectContaining({ id: 'evt-1', status: 'CREATED', maxRetries: 5 }),
      ]);
    });
  });
});
