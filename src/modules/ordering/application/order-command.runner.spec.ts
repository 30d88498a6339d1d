import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { orderingConfig } from '../../../config/ordering.config';
import { CLOCK } from '../../../shared/domain/clock.port';
import { ConcurrencyConflictError } from '../../../shared/domain/errors';
import { OUTBOX_NOTIFIER } from '../../../shared/outbox/outbox.store';
import { InMemoryUnitOfWork } from '../testing/in-memory-unit-of-work';
import { LockingUnitOfWork } from '../testing/locking-unit-of-work';
import {
  FIXED_NOW,
  createOrderInput,
  orderInStatus,
} from '../testing/order.fixtures';
import { OrderCommandRunner } from './order-command.runner';
import { UNIT_OF_WORK } from './unit-of-work';
import type { UnitOfWork } from './unit-of-work';
import {
  CancelOrderUseCase,
  CreateOrderUseCase,
  MarkPaidUseCase,
} from './use-cases';

describe('OrderCommandRunner', () => {
  let uow: InMemoryUnitOfWork;
  let notifyPending: Mock;

  async function compile(unitOfWork: UnitOfWork): Promise<TestingModule> {
    return Test.createTestingModule({
      providers: [
        OrderCommandRunner,
        CreateOrderUseCase,
        MarkPaidUseCase,
        CancelOrderUseCase,
        { provide: UNIT_OF_WORK, useValue: unitOfWork },
        { provide: CLOCK, useValue: { now: () => FIXED_NOW } },
        { provide: OUTBOX_NOTIFIER, useValue: { notifyPending } },
        {
          provide: orderingConfig.KEY,
          useValue: { commandMaxAttempts: 3, lockTimeoutMs: 5000, gracePeriodMinutes: 1 },
        },
      ],
    }).compile();
  }

  beforeEach(() => {
    uow = new InMemoryUnitOfWork();
    notifyPending = vi.fn();
    vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    vi.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('idempotency tokens', () => {
    it('should create one order when CreateOrder is sent twice with the same token', async () => {
      const createOrder = (await compile(uow)).get(CreateOrderUseCase);

      const first = await createOrder.execute(createOrderInput());
      const second = await createOrder.execute(createOrderInput());

      expect(first.success).toBe(true);
      expect(second.success).toBe(true);
      if (!first.success || !second.success) return;

      expect(first.replayed).toBe(false);
      expect(second).toEqual({
        success: true,
        orderId: first.orderId,
        status: 'SUBMITTED',
        replayed: true,
      });
      expect(uow.outbox.all().map((row) => row.eventType)).toEqual(['OrderStarted']);
      expect(notifyPending).toHaveBeenCalledTimes(1);
    });

    it('should record the token together with the outcome', async () => {
      const createOrder = (await compile(uow)).get(CreateOrderUseCase);

      const result = await createOrder.execute(createOrderInput());

      if (!result.success) throw new Error(result.error.message);
      expect(uow.recordedRequest('token-create-1')).toEqual({
        token: 'token-create-1',
        commandName: 'CreateOrder',
        orderId: result.orderId,
        result: { orderId: result.orderId, status: 'SUBMITTED' },
      });
    });

    it('should refuse a token that was used by another command', async () => {
      const module = await compile(uow);
      const created = await module.get(CreateOrderUseCase).execute(createOrderInput());
      if (!created.success) throw new Error(created.error.message);

      const result = await module.get(CancelOrderUseCase).execute({
        orderId: created.orderId,
        idempotencyToken: 'token-create-1',
      });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'IDEMPOTENCY_TOKEN_REUSED',
          message: 'Idempotency token token-create-1 was already used for CreateOrder',
          token: 'token-create-1',
          usedBy: 'CreateOrder',
        },
      });
      expect(uow.snapshot(created.orderId)?.status).toBe('SUBMITTED');
    });

    it('should refuse a token that was used on another order', async () => {
      uow.seed(orderInStatus('STOCK_CONFIRMED'));
      uow.seed(orderInStatus('STOCK_CONFIRMED', { id: 'order-2' }));
      const markPaid = (await compile(uow)).get(MarkPaidUseCase);
      await markPaid.execute({ orderId: 'order-1', idempotencyToken: 'pay-1' });

      const result = await markPaid.execute({ orderId: 'order-2', idempotencyToken: 'pay-1' });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'IDEMPOTENCY_TOKEN_REUSED',
          message: 'Idempotency token pay-1 was already used for MarkPaid on order order-1',
          token: 'pay-1',
          usedBy: 'MarkPaid',
        },
      });
      expect(uow.snapshot('order-2')?.status).toBe('STOCK_CONFIRMED');
      expect(uow.outbox.all().map((row) => row.aggregateId)).toEqual(['order-1']);
    });

    it('should replay a duplicate that waited on the order lock', async () => {
      uow.seed(orderInStatus('STOCK_CONFIRMED'));
      const markPaid = (await compile(new LockingUnitOfWork(uow))).get(MarkPaidUseCase);

      const results = await Promise.all([
        markPaid.execute({ orderId: 'order-1', idempotencyToken: 'pay-1' }),
        markPaid.execute({ orderId: 'order-1', idempotencyToken: 'pay-1' }),
      ]);

      expect(results).toEqual([
        { success: true, orderId: 'order-1', status: 'PAID', replayed: false },
        { success: true, orderId: 'order-1', status: 'PAID', replayed: true },
      ]);
      expect(uow.outbox.all().map((row) => row.eventType)).toEqual(['OrderPaid']);
      expect(uow.commits).toBe(2);
    });
  });

  describe('rollback', () => {
    it('should persist nothing when the aggregate refuses the command', async () => {
      uow.seed(orderInStatus('SUBMITTED'));
      const markPaid = (await compile(uow)).get(MarkPaidUseCase);

      const result = await markPaid.execute({
        orderId: 'order-1',
        idempotencyToken: 'token-pay-1',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('INVALID_STATUS_TRANSITION');
      }
      expect(uow.snapshot('order-1')?.status).toBe('SUBMITTED');
      expect(uow.outbox.all()).toEqual([]);
      expect(uow.recordedRequest('token-pay-1')).toBeUndefined();
      expect(notifyPending).not.toHaveBeenCalled();
    });

    it('should roll back the order change when the outbox insert fails', async () => {
      uow.seed(orderInStatus('STOCK_CONFIRMED'));
      const markPaid = (await compile(uow)).get(MarkPaidUseCase);
      uow.failNextAppend(new Error('outbox insert failed'));

      await expect(markPaid.execute({ orderId: 'order-1' })).rejects.toThrow(
        'outbox insert failed',
      );

      expect(uow.snapshot('order-1')).toMatchObject({
        status: 'STOCK_CONFIRMED',
        version: 1,
      });
      expect(uow.outbox.all()).toEqual([]);
    });

    it('should report a missing order', async () => {
      const markPaid = (await compile(uow)).get(MarkPaidUseCase);

      const result = await markPaid.execute({ orderId: 'missing' });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'ORDER_NOT_FOUND',
          message: 'Order with id missing not found',
          orderId: 'missing',
        },
      });
    });
  });

  describe('concurrency', () => {
    it('should serialize concurrent payments so exactly one succeeds', async () => {
      uow.seed(orderInStatus('STOCK_CONFIRMED'));
      const markPaid = (await compile(uow)).get(MarkPaidUseCase);

      const results = await Promise.all([
        markPaid.execute({ orderId: 'order-1' }),
        markPaid.execute({ orderId: 'order-1' }),
      ]);

      expect(results.filter((result) => result.success)).toHaveLength(1);
      const refused = results.find((result) => !result.success);
      expect(refused).toEqual({
        success: false,
        error: {
          code: 'INVALID_STATUS_TRANSITION',
          message: 'Order is already PAID',
          transition: 'pay',
          currentStatus: 'PAID',
        },
      });
      expect(uow.outbox.all().map((row) => row.eventType)).toEqual(['OrderPaid']);
      expect(uow.snapshot('order-1')?.version).toBe(2);
    });

    it('should give up with CONCURRENCY_CONFLICT after the configured attempts', async () => {
      const execute = vi
        .fn()
        .mockRejectedValue(new ConcurrencyConflictError('stale version', 'order-1'));
      const markPaid = (await compile({ execute })).get(MarkPaidUseCase);

      const result = await markPaid.execute({ orderId: 'order-1' });

      expect(result).toEqual({
        success: false,
        error: {
          code: 'CONCURRENCY_CONFLICT',
          message: 'MarkPaid conflicted with concurrent updates 3 times',
          attempts: 3,
        },
      });
      expect(execute).toHaveBeenCalledTimes(3);
    });

    it('should let infrastructure failures propagate without retrying', async () => {
      const execute = vi.fn().mockRejectedValue(new Error('connection refused'));
      const markPaid = (await compile({ execute })).get(MarkPaidUseCase);

      await expect(markPaid.execute({ orderId: 'order-1' })).rejects.toThrow(
        'connection refused',
      );
      expect(execute).toHaveBeenCalledTimes(1);
    });
  });

  describe('outbox rows', () => {
    it('should stamp rows with the command time and correlation id', async () => {
      const createOrder = (await compile(uow)).get(CreateOrderUseCase);

      await createOrder.execute(createOrderInput({ correlationId: 'corr-1' }));

      const [row] = uow.outbox.all();
      expect(row.createdAt).toEqual(FIXED_NOW);
      expect(row.status).toBe('CREATED');
      expect(JSON.parse(row.payload)).toMatchObject({
        occurredAt: FIXED_NOW.toISOString(),
        correlationId: 'corr-1',
      });
    });
  });
});
