import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { OrderingModule } from './modules/ordering/ordering.module';
import { HealthModule } from './modules/health/health.module';
import { DatabaseModule } from './shared/infrastructure/database/database.module';
import { OutboxModule } from './shared/outbox';
import { orderingConfig } from './config/ordering.config';
import { outboxConfig } from './config/outbox.config';
import { validateEnvironment } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [orderingConfig, outboxConfig],
      validate: validateEnvironment,
    }),
    DatabaseModule,
    OutboxModule, // Relay, message transport and consumer de-duplication (includes ScheduleModule)
    OrderingModule,
    HealthModule,
  ],
})
export class AppModule {}
