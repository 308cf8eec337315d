/**
 * PostgreSQL access for the destination dataset.
 *
 * Expects a `weekend_places` table with one row per destination
 * (name, city, state, category, rating).
 */

import { Pool, type PoolConfig } from 'pg';
import { env, isDevelopment } from './env';

const dbConfig: PoolConfig = {
  host: env.POSTGRES_HOST,
  port: env.POSTGRES_PORT,
  database: env.POSTGRES_DB,
  user: env.POSTGRES_USER,
  password: env.POSTGRES_PASSWORD,
  max: 5,
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 5000,
};

// Singleton pool instance
let pool: Pool | null = null;

/**
 * Get the connection pool (lazy initialization).
 */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(dbConfig);

    pool.on('error', (err) => {
      console.error('[DB] Unexpected pool error:', err);
    });
  }
  return pool;
}

/**
 * Check that the database answers and has the places table.
 */
export async function isDatabaseAvailable(): Promise<boolean> {
  try {
    const result = await getPool().query<{ exists: boolean }>(
      "SELECT EXISTS (SELECT 1 FROM information_schema.tables WHERE table_name = 'weekend_places') as exists"
    );
    return result.rows[0]?.exists === true;
  } catch (error) {
    if (isDevelopment) {
      console.log('[DB] Database not available:', error instanceof Error ? error.message : error);
    }
    return false;
  }
}

/**
 * Row shape of `weekend_places`. Rating is NUMERIC, which pg returns as text.
 */
export interface DbDestination {
  name: string | null;
  city: string | null;
  state: string | null;
  category: string | null;
  rating: string | number | null;
}

export async function queryDestinations(): Promise<DbDestination[]> {
  const result = await getPool().query<DbDestination>(`
    SELECT name, city, state, category, rating
    FROM public.weekend_places
    ORDER BY id ASC
  `);
  return result.rows;
}
