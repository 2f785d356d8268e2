/**
 * Database client and connection pool
 */

import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import { createLogger } from '../utils/logger.js';
import * as schema from './schema.js';

const { Pool } = pg;
const log = createLogger('Database');

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseHandle {
  db: Database;
  close: () => Promise<void>;
  checkConnection: () => Promise<boolean>;
}

export function createDatabase(connectionString: string): DatabaseHandle {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  // An idle client erroring must not crash the process
  pool.on('error', (error) => {
    log.error('Idle database client error', { error: error.message });
  });

  return {
    db: drizzle(pool, { schema }),
    close: async () => {
      await pool.end();
    },
    checkConnection: async () => {
      try {
        const client = await pool.connect();
        await client.query('SELECT 1');
        client.release();
        return true;
      } catch (error) {
        log.error('Database connection check failed', {
          error: error instanceof Error ? error.message : String(error),
        });
        return false;
      }
    },
  };
}
