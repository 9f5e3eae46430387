import pg from 'pg';
import pino from 'pino';
import { config } from '../config/index.js';

const log = pino({ name: 'pool' });

/** Shared pool behind every result set; satisfies `Queryable`. */
export const pool = new pg.Pool({
  connectionString: config.DATABASE_URL,
  max: config.DB_POOL_MAX,
});

pool.on('error', (err) => {
  log.error({ err }, 'Idle pg client errored');
});

/** Waits for checked-out clients, then closes every connection. */
export async function closePool(): Promise<void> {
  log.info({ total: pool.totalCount, idle: pool.idleCount }, 'Closing database pool');
  await pool.end();
}
