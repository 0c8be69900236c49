import { Pool } from 'pg';
import { errorMessage } from '../errors';
import type { Logger } from '../logger';

function describeUrl(databaseUrl: string) {
  return {
    host: databaseUrl.split('@')[1]?.split('/')[0] || 'unknown',
    database: databaseUrl.split('/').pop() || 'unknown',
  };
}

export function createPool(databaseUrl: string, poolSize: number, logger: Logger): Pool {
  const pool = new Pool({
    connectionString: databaseUrl,
    max: poolSize,
  });

  pool.on('connect', () => {
    logger.info({
      module: 'db.pool',
      ...describeUrl(databaseUrl),
      pool_size: poolSize,
    }, 'Pool connected');
  });

  pool.on('error', (err) => {
    logger.fatal({
      module: 'db.pool',
      error_detail: err.message,
    }, 'Pool connection fail');
  });

  return pool;
}

export async function checkConnection(pool: Pool, databaseUrl: string, logger: Logger): Promise<void> {
  try {
    await pool.query('SELECT 1');
  } catch (err) {
    logger.fatal({
      module: 'db.pool',
      host: describeUrl(databaseUrl).host,
      error_detail: errorMessage(err),
    }, 'Pool connection fail');
    throw err;
  }
}
