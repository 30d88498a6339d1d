import { Module } from '@nestjs/common';
import { DRIZZLE } from '../../shared/infrastructure/database/database.module';
import type { DrizzleClient } from '../../shared/infrastructure/database/database.module';
import { ORDER_REPOSITORY } from './domain/order.repository';
import { UNIT_OF_WORK } from './application/unit-of-work';
import { OrderCommandRunner } from './application/order-command.runner';
import { GracePeriodScheduler } from './application/grace-period.scheduler';
import { OrderStatusNotificationHandler } from './application/event-handlers/order-status-notification.handler';
import {
  CancelOrderUseCase,
  ConfirmStockUseCase,
  CreateOrderUseCase,
  GetOrderUseCase,
  MarkPaidUseCase,
  MarkShippedUseCase,
  SetAwaitingValidationUseCase,
} from './application/use-cases';
import { DrizzleUnitOfWork } from './infrastructure/drizzle-unit-of-work';
import { DrizzleOrderRepository } from './infrastructure/drizzle-order.repository';
import { OrderController } from './infrastructure/order.controller';

@Module({
  controllers: [OrderController],
  providers: [
    { provide: UNIT_OF_WORK, useClass: DrizzleUnitOfWork },
    {
      provide: ORDER_REPOSITORY,
      inject: [DRIZZLE],
      useFactory: (db: DrizzleClient) => new DrizzleOrderRepository(db),
    },
    OrderCommandRunner,
    CreateOrderUseCase,
    GetOrderUseCase,
    SetAwaitingValidationUseCase,
    ConfirmStockUseCase,
    MarkPaidUseCase,
    MarkShippedUseCase,
    CancelOrderUseCase,
    GracePeriodScheduler,
    OrderStatusNotificationHandler,
  ],
  exports: [ORDER_REPOSITORY],
})
export class OrderingModule {}
