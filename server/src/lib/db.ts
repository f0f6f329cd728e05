import { Pool, PoolClient } from 'pg';
import { env } from '../config/env';

let pool: Pool | null = null;

export function getDb() {
  if (!pool) {
    pool = new Pool({
      connectionString: env.databaseUrl,
      ssl: env.nodeEnv === 'production' ? { rejectUnauthorized: false } : undefined,
      connectionTimeoutMillis: 5000,
    });
    pool.on('error', (err) => {
      console.error('[db] idle client error', err);
    });
  }
  return pool;
}

export async function ensureDb() {
  const p = getDb();
  try {
    await p.query('SELECT 1');
  } catch (err) {
    console.error('[db] connection test failed', err);
    throw err;
  }
  return p;
}

/** Runs `work` inside BEGIN/COMMIT on one pooled client, rolling back if it throws. */
export async function withTransaction<T>(db: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await db.connect();
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      console.error('[db] rollback failed', rollbackErr);
    });
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDb() {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
