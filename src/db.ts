/**
 * Knowledge Retrieval API - Relational Store Connection
 *
 * Provides a singleton PostgreSQL pool for the canonical dataset/document/segment
 * tables. Callers depend on the narrow SqlPool/SqlClient shapes so tests can
 * substitute an in-process fake.
 */

import { Pool } from "pg";
import { DATABASE_URL, DATABASE_POOL_MAX } from "./config";
import { logError } from "./utils";

export interface SqlQueryResult {
  rows: unknown[];
  rowCount?: number | null;
}

export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlQueryResult>;
  release(err?: Error | boolean): void;
}

export interface SqlPool {
  connect(): Promise<SqlClient>;
}

let pool: Pool | null = null;

/**
 * Get the canonical store pool
 *
 * Lazily created on first call; idle-client errors are logged instead of
 * crashing the process.
 */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool({ connectionString: DATABASE_URL, max: DATABASE_POOL_MAX });
    pool.on('error', (err) => {
      logError('Idle database client error', err);
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    const current = pool;
    pool = null;
    await current.end();
  }
}

/**
 * Run `fn` with a client acquired from the pool, releasing it even when
 * `fn` throws. A failed client is released with the error so pg discards it.
 */
export async function withClient<T>(sqlPool: SqlPool, fn: (client: SqlClient) => Promise<T>): Promise<T> {
  const client = await sqlPool.connect();
  let failure: Error | undefined;
  try {
    return await fn(client);
  } catch (err) {
    failure = err instanceof Error ? err : new Error(String(err));
    throw err;
  } finally {
    client.release(failure);
  }
}
