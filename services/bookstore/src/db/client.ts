import { Pool } from 'pg';
import type { Logger } from 'pino';
import type { SqlExecutor, SqlRow } from '../contracts/bookStorage';

export function createPool(connectionString: string, logger: Logger): Pool {
  const pool = new Pool({ connectionString });
  // idle clients can error when the server drops them; log instead of crashing
  pool.on('error', (err) => {
    logger.error({ err }, 'idle postgres client error');
  });
  return pool;
}

export class PoolExecutor implements SqlExecutor {
  constructor(private readonly pool: Pool) {}

  async query(text: string, values: unknown[] = []): Promise<SqlRow[]> {
    const res = await this.pool.query(text, values);
    return res.rows;
  }
}
