import {
  Module,
  Global,
  Inject,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createDrizzleClient } from './drizzle.client';
import type { DrizzleClient } from './drizzle.client';

export const DRIZZLE = Symbol('DRIZZLE');

export type { DrizzleClient, DrizzleExecutor } from './drizzle.client';

@Global()
@Module({
  providers: [
    {
      provide: DRIZZLE,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const connectionString =
          configService.getOrThrow<string>('DATABASE_URL');
        return createDrizzleClient(connectionString);
      },
    },
  ],
  exports: [DRIZZLE],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(DRIZZLE) private readonly db: DrizzleClient) {}

  async onApplicationShutdown(): Promise<void> {
    await this.db.$client.end({ timeout: 5 });
    this.logger.log('Database connections closed');
  }
}
