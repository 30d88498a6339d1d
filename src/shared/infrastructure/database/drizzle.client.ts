import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';

export const createDrizzleClient = (connectionString: string) => {
  const client = postgres(connectionString);
  return drizzle(client, { schema });
};

export type DrizzleClient = ReturnType<typeof createDrizzleClient>;

/**
 * Anything queries can run against: the client itself or an open transaction.
 */
export type DrizzleExecutor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;
