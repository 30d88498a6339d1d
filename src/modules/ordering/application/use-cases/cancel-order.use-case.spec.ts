import { describe, it, expect } from 'vitest';
import { orderInStatus } from '../../testing/order.fixtures';
import { CancelOrderUseCase } from './cancel-order.use-case';
import { createUseCaseModule } from '../../testing/use-case-module';

describe('CancelOrderUseCase', () => {
  it('should cancel with the default reason', async () => {
    const { module, uow } = await createUseCaseModule();
    uow.seed(orderInStatus('STOCK_CONFIRMED'));

    const result = await module.get(CancelOrderUseCase).execute({ orderId: 'order-1' });

    expect(result).toMatchObject({ success: true, status: 'CANCELLED' });
    expect(uow.snapshot('order-1')?.cancellationReason).toBe('Cancelled on request');
    const [row] = uow.outbox.all();
    expect(JSON.parse(row.payload).payload.reason).toBe('Cancelled on request');
  });

  it('should keep the caller reason, such as a declined payment', async () => {
    const { module, uow } = await createUseCaseModule();
    uow.seed(orderInStatus('STOCK_CONFIRMED'));

    await module
      .get(CancelOrderUseCase)
      .execute({ orderId: 'order-1', reason: 'payment declined' });

    expect(uow.snapshot('order-1')?.cancellationReason).toBe('payment declined');
  });

  it('should refuse to cancel a shipped order, naming SHIPPED', async () => {
    const { module, uow } = await createUseCaseModule();
    uow.seed(orderInStatus('SHIPPED'));

    const result = await module.get(CancelOrderUseCase).execute({ orderId: 'order-1' });

    expect(result).toEqual({
      success: false,
      error: {
        code: 'INVALID_STATUS_TRANSITION',
        message: 'Cannot cancel an order that is SHIPPED',
        transition: 'cancel',
        currentStatus: 'SHIPPED',
      },
    });
    expect(uow.outbox.all()).toEqual([]);
  });

  it('should replay a repeated cancellation', async () => {
    const { module, uow } = await createUseCaseModule();
    uow.seed(orderInStatus('SUBMITTED'));
    const cancel = module.get(CancelOrderUseCase);

    await cancel.execute({ orderId: 'order-1', idempotencyToken: 'token-cancel-1' });
    const again = await cancel.execute({
      orderId: 'order-1',
      idempotencyToken: 'token-cancel-1',
    });

    expect(again).toEqual({
      success: true,
      orderId: 'order-1',
      status: 'CANCELLED',
      replayed: true,
    });
    expect(uow.outbox.all()).toHaveLength(1);
  });
});
