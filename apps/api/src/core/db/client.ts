import { Pool, type PoolClient } from 'pg';

export type DbOptions = {
  connectionString: string;
  ssl: boolean;
  max: number;
};

/**
 * pg-connection-string warns about sslmode in the URL; SSL is driven by
 * DATABASE_SSL instead, so drop those params before handing it to pg.
 */
export function stripSslMode(cs: string) {
  try {
    const u = new URL(cs);
    u.searchParams.delete('sslmode');
    u.searchParams.delete('ssl');
    u.searchParams.delete('uselibpqcompat');
    return u.toString();
  } catch {
    return cs;
  }
}

export function createPool(opts: DbOptions): Pool {
  return new Pool({
    connectionString: stripSslMode(opts.connectionString),
    max: opts.max,
    ssl: opts.ssl ? { rejectUnauthorized: false } : undefined
  });
}

export async function connectDB(pool: Pool) {
  const client = await pool.connect();
  client.release();
  console.log('📦 Database connected');
}

export async function disconnectDB(pool: Pool) {
  await pool.end();
  console.log('📦 Database disconnected');
}

/**
 * BEGIN / fn(client) / COMMIT, ROLLBACK on failure, always release().
 */
export async function withTx<T>(
  pool: Pool,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (e) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      console.error('[db] rollback failed', rollbackErr);
    }
    throw e;
  } finally {
    client.release();
  }
}
