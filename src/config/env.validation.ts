import { plainToInstance } from 'class-transformer';
import {
  IsInt,
  IsOptional,
  IsString,
  Max,
  Min,
  Matches,
  validateSync,
} from 'class-validator';

/**
 * Environment variables the service reads at boot.
 * Numeric values arrive as strings and are converted before validation.
 */
export class EnvironmentVariables {
  @IsString()
  @Matches(/^postgres(ql)?:\/\//, {
    message: 'DATABASE_URL must be a postgres:// connection string',
  })
  DATABASE_URL!: string;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(10)
  ORDER_COMMAND_MAX_ATTEMPTS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  ORDER_LOCK_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  ORDER_GRACE_PERIOD_MINUTES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(1000)
  OUTBOX_BATCH_SIZE?: number;

  @IsOptional()
  @IsInt()
  @Min(1000)
  OUTBOX_LEASE_TIMEOUT_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  OUTBOX_MAX_RETRIES?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  OUTBOX_BASE_BACKOFF_MS?: number;

  @IsOptional()
  @IsInt()
  @Min(1)
  OUTBOX_PUBLISH_TIMEOUT_MS?: number;
}

/**
 * `validate` hook for ConfigModule. Throws with every violated variable
 * listed so startup fails fast.
 */
export function validateEnvironment(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors
      .map((error) =>
        Object.values(error.constraints ?? {})
          .map((message) => `  - ${message}`)
          .join('\n'),
      )
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return validated;
}
