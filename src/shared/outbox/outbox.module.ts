import { Module, Global } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import {
  IdempotencyService,
  InMemoryMessageTransport,
  MESSAGE_TRANSPORT,
} from '../events';
import { CLOCK } from '../domain/clock.port';
import { SystemClock } from '../infrastructure/system-clock';
import { OUTBOX_NOTIFIER, OUTBOX_STORE } from './outbox.store';
import { DrizzleOutboxStore } from './drizzle-outbox.store';
import { OutboxRelay } from './outbox.relay';
import { OutboxController } from './outbox.controller';

/**
 * OutboxModule - Transactional Outbox infrastructure.
 *
 * @Global so that feature modules can:
 * 1. subscribe consumers on MESSAGE_TRANSPORT
 * 2. nudge the relay through OUTBOX_NOTIFIER after a commit
 * 3. de-duplicate deliveries with IdempotencyService
 *
 * Rows are written with DrizzleOutboxWriter inside the caller's transaction.
 */
@Global()
@Module({
  imports: [ScheduleModule.forRoot()],
  controllers: [OutboxController],
  providers: [
    { provide: CLOCK, useClass: SystemClock },
    { provide: MESSAGE_TRANSPORT, useClass: InMemoryMessageTransport },
    { provide: OUTBOX_STORE, useClass: DrizzleOutboxStore },
    OutboxRelay,
    { provide: OUTBOX_NOTIFIER, useExisting: OutboxRelay },
    IdempotencyService,
  ],
  exports: [
    CLOCK,
    MESSAGE_TRANSPORT,
    OUTBOX_STORE,
    OUTBOX_NOTIFIER,
    OutboxRelay,
    IdempotencyService,
  ],
})
export class OutboxModule {}
