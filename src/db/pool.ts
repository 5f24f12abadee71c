/**
 * MySQL connection pool
 *
 * Named placeholders are enabled on every connection: `WHERE id = :id`.
 */

import mysql from 'mysql2/promise';
import type { Pool, PoolOptions, RowDataPacket, ResultSetHeader } from 'mysql2/promise';
import { getLogger, registerComponent } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { type DatabaseConfig, DEFAULT_POOL_SIZE, DEFAULT_QUEUE_LIMIT, getDatabaseConfig } from './config.js';

const DB_DEADLOCK_RETRIES = 3;
const ER_LOCK_DEADLOCK = 1213;
const ER_LOCK_WAIT_TIMEOUT = 1205;

let pool: Pool | null = null;

let dbLogger: Logger | null = null;
function getDbLogger(): Logger {
  if (!dbLogger) {
    registerComponent('database', 'Database pool and queries');
    dbLogger = getLogger('database');
  }
  return dbLogger;
}

/**
 * Initialize the database connection pool. Falls back to the environment
 * configuration when no config is given.
 */
export function initPool(config: DatabaseConfig = getDatabaseConfig()): Pool {
  if (pool) {
    return pool;
  }

  const poolOptions: PoolOptions = {
    waitForConnections: true,
    ...config,
    namedPlaceholders: true,
  };

  const created = mysql.createPool(poolOptions);
  pool = created;

  const logger = getDbLogger();
  const limit = poolOptions.connectionLimit ?? DEFAULT_POOL_SIZE;
  const queueLimit = poolOptions.queueLimit ?? DEFAULT_QUEUE_LIMIT;
  logger.info(
    `Database pool initialized: ${config.host}:${config.port}/${config.database}, connectionLimit=${limit}, queueLimit=${queueLimit}`
  );

  created.on('connection', (connection: mysql.PoolConnection) => {
    if (logger.isDebugEnabled()) {
      logger.debug(`New connection established (threadId: ${connection.threadId})`);
    }
  });

  created.on('enqueue', () => {
    logger.warn(`Connection pool saturated, query queued (connectionLimit: ${limit})`);
  });

  return created;
}

/**
 * Get the current pool instance
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool not initialized. Call initPool() first.');
  }
  return pool;
}

/**
 * Close the connection pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    const closing = pool;
    pool = null;
    await closing.end();
  }
}

/**
 * Named-placeholder values; a subset of what mysql2 accepts for both query and execute
 */
export type SqlValue = string | number | boolean | Date | null;
export type SqlParams = Record<string, SqlValue>;

/**
 * Execute a SELECT query and return rows
 */
export async function query<T extends RowDataPacket>(
  sql: string,
  params?: SqlParams
): Promise<T[]> {
  const [rows] = await getPool().query<T[]>(sql, params);
  return rows;
}

/**
 * Execute an INSERT/UPDATE/DELETE statement and return the result header
 */
export async function execute(
  sql: string,
  params?: SqlParams
): Promise<ResultSetHeader> {
  const [result] = await getPool().execute<ResultSetHeader>(sql, params);
  return result;
}

/**
 * Execute multiple statements in a transaction
 */
export async function transaction<T>(
  callback: (connection: mysql.PoolConnection) => Promise<T>
): Promise<T> {
  const connection = await getPool().getConnection();

  try {
    await connection.beginTransaction();
    const result = await callback(connection);
    await connection.commit();
    return result;
  } catch (error) {
    await connection.rollback();
    throw error;
  } finally {
    connection.release();
  }
}

/**
 * Check if the database connection is healthy
 */
export async function healthCheck(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    getDbLogger().warn('Database health check failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

function errorNumber(error: unknown): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  if ('errno' in error) return error.errno;
  if ('code' in error) return error.code;
  return undefined;
}

/**
 * Run a database operation, retrying on MySQL deadlock (1213) and lock wait
 * timeout (1205) with exponential backoff.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  maxRetries: number = DB_DEADLOCK_RETRIES
): Promise<T> {
  const logger = getDbLogger();
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const errno = errorNumber(error);
      if ((errno === ER_LOCK_DEADLOCK || errno === ER_LOCK_WAIT_TIMEOUT) && attempt < maxRetries) {
        const delay = 100 * Math.pow(2, attempt - 1);
        logger.warn(
          `Deadlock detected (errno ${String(errno)}), retrying in ${delay}ms (attempt ${attempt}/${maxRetries})`
        );
        await new Promise((resolve) => setTimeout(resolve, delay));
        continue;
      }
      throw error;
    }
  }
}
