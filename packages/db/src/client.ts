import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = PostgresJsDatabase<typeof schema> & { $client: postgres.Sql };

interface DbHolder {
  client: postgres.Sql;
  db: DrizzleDB;
}

export interface DbConnectionOptions {
  url: string;
  poolSize: number;
}

// Survives module re-evaluation (watch mode, hot reload) so a reload never
// leaks a second pool.
const globalForDb = globalThis as typeof globalThis & {
  __kitchenflow_db?: DbHolder;
  __kitchenflow_db_options?: DbConnectionOptions;
};

/** Set connection options; takes effect when the pool is next created. */
export function configureDb(options: DbConnectionOptions): void {
  globalForDb.__kitchenflow_db_options = options;
}

function getHolder(): DbHolder {
  if (!globalForDb.__kitchenflow_db) {
    const options = globalForDb.__kitchenflow_db_options;
    if (!options) {
      throw new Error('Database not configured. Call configureDb() at startup.');
    }
    const client = postgres(options.url, {
      max: options.poolSize,
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    globalForDb.__kitchenflow_db = { client, db: drizzle(client, { schema }) };
  }
  return globalForDb.__kitchenflow_db;
}

/** Lazily connected database handle. Nothing connects until first use. */
export function getDb(): DrizzleDB {
  return getHolder().db;
}

export async function closeDb(): Promise<void> {
  const holder = globalForDb.__kitchenflow_db;
  if (!holder) return;
  globalForDb.__kitchenflow_db = undefined;
  await holder.client.end({ timeout: 5 });
}

export type Database = DrizzleDB;
export type Transaction = Parameters<Parameters<DrizzleDB['transaction']>[0]>[0];

export { sql, schema };
