/**
 * Database Configuration
 *
 * Connection settings derived from environment variables. Cached after the
 * first read; use resetDatabaseConfig() in tests.
 */

export interface DatabaseConfig {
  /** DB_HOST, default localhost */
  host: string;
  /** DB_PORT, default 3306 */
  port: number;
  /** DB_NAME, default clinical_converter */
  database: string;
  /** DB_USER, default root */
  user: string;
  /** DB_PASSWORD, default empty */
  password: string;
  /** DB_POOL_SIZE, default 10 */
  connectionLimit?: number;
  /** DB_QUEUE_LIMIT, default 200 */
  queueLimit?: number;
  /** DB_CONNECT_TIMEOUT in ms, default 10000 */
  connectTimeout?: number;
  /** DB_TIMEZONE, default +00:00 */
  timezone?: string;
  waitForConnections?: boolean;
}

export const DEFAULT_POOL_SIZE = 10;
export const DEFAULT_QUEUE_LIMIT = 200;

let cachedConfig: DatabaseConfig | null = null;

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function getDatabaseConfig(): DatabaseConfig {
  if (cachedConfig) return cachedConfig;

  cachedConfig = {
    host: process.env['DB_HOST'] || 'localhost',
    port: parseNumber(process.env['DB_PORT'], 3306),
    database: process.env['DB_NAME'] || 'clinical_converter',
    user: process.env['DB_USER'] || 'root',
    password: process.env['DB_PASSWORD'] ?? '',
    connectionLimit: parseNumber(process.env['DB_POOL_SIZE'], DEFAULT_POOL_SIZE),
    queueLimit: parseNumber(process.env['DB_QUEUE_LIMIT'], DEFAULT_QUEUE_LIMIT),
    connectTimeout: parseNumber(process.env['DB_CONNECT_TIMEOUT'], 10000),
    timezone: process.env['DB_TIMEZONE'] || '+00:00',
    waitForConnections: true,
  };

  return cachedConfig;
}

/**
 * Reset cached configuration (for testing)
 */
export function resetDatabaseConfig(): void {
  cachedConfig = null;
}
