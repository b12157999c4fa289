import { Pool, type PoolConfig, type PoolClient } from 'pg';
import { errorMessage } from '@appraise/domain';
import { createLogger } from '@appraise/shared';

const logger = createLogger({ name: 'db' });

let pool: Pool | null = null;

export function getPool(): Pool {
  if (!pool) throw new Error('Database pool not initialized. Call initPool first.');
  return pool;
}

export function initPool(config: PoolConfig): Pool {
  pool = new Pool(config);
  pool.on('error', (err) => {
    logger.error({ err: err.message }, 'Unexpected database pool error');
  });
  logger.info({}, 'Database pool initialized');
  return pool;
}

export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info({}, 'Database pool closed');
  }
}

/**
 * Runs fn inside BEGIN/COMMIT. A connection whose ROLLBACK fails is destroyed instead of
 * returned to the pool, and the caller still sees the error fn threw.
 */
export async function withTransaction<T>(
  fn: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await getPool().connect();
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error(errorMessage(rollbackErr));
      logger.error(
        { err: broken.message, original: errorMessage(err) },
        'Rollback failed; discarding connection',
      );
    }
    throw err;
  } finally {
    client.release(broken);
  }
}
