import { drizzle, type PostgresJsDatabase, type PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import postgres from 'postgres';
import * as schema from './schema';
import type { DatabaseConfig } from './config';

export type Database = PostgresJsDatabase<typeof schema>;

/** A connection or an open transaction; stores accept either. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export interface DatabaseClient {
  db: Database;
  close(): Promise<void>;
}

/**
 * Database client for the F3 PostgreSQL database
 *
 * Import runs are single-transaction batch jobs, so one connection is enough.
 * postgres-js connects lazily: nothing touches the network until the first query.
 */
export function createDb(config: DatabaseConfig): DatabaseClient {
  const options = {
    max: 1,
    idle_timeout: 20,
    connect_timeout: 10,
  };

  const client = 'url' in config
    ? postgres(config.url, options)
    : postgres({
        ...options,
        host: config.host,
        port: config.port,
        database: config.database,
        username: config.username,
        password: config.password,
      });

  return {
    db: drizzle(client, { schema }),
    close: () => client.end(),
  };
}

export { schema };
