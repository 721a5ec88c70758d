import pg from "pg";
import type { Env } from "../config/env.js";

const { Pool } = pg;

// Shared Postgres connection pool
export function createPool(env: Env): pg.Pool {
  return new Pool({
    connectionString: env.db_connection_string,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
    max: env.DB_POOL_MAX || 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: env.DB_CONNECT_TIMEOUT_MS,
  });
}

export async function withClient<T>(
  pool: pg.Pool,
  fn: (client: pg.PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    return await fn(client);
  } finally {
    client.release();
  }
}
