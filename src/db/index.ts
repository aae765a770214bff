/**
 * PostgreSQL Database Connection
 */

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { TransientStoreError } from '../errors/index.js';
import { SCHEMA, MIGRATIONS } from './schema.js';

let pool: Pool | null = null;

/**
 * Anything that can run a query: the pool or a checked-out client
 */
export interface Queryable {
  query<T extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<T>>;
}

/**
 * What repositories need from a pool: queries and a client for transactions
 */
export interface PoolLike extends Queryable {
  connect(): Promise<PoolClient>;
}

/**
 * Get the initialized pool
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Build a pool with bounded connect and statement times
 */
export function createPool(): Pool {
  return new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: config.database.connectTimeoutMs,
    statement_timeout: config.database.statementTimeoutMs,
    query_timeout: config.database.statementTimeoutMs + 1000,
  });
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(): Promise<Pool> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return pool;
  }

  const created = createPool();
  created.on('error', (error) => {
    logger.error({ error }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await created.connect();
    logger.info('Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await created.end();
    throw toStoreError(error);
  }

  pool = created;
  await initSchema(created);
  return created;
}

/**
 * Initialize database schema
 */
async function initSchema(target: Pool): Promise<void> {
  try {
    await target.query(SCHEMA);
    for (const migration of MIGRATIONS) {
      await target.query(migration);
    }
    logger.info({ migrations: MIGRATIONS.length }, 'Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Execute a query, mapping infrastructure failures to TransientStoreError.
 * Constraint violations pass through untouched for the caller to map.
 */
export async function runQuery<T extends QueryResultRow>(
  db: Queryable,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  try {
    return await db.query<T>(text, params);
  } catch (error) {
    throw toStoreError(error);
  }
}

/**
 * Run `work` inside BEGIN/COMMIT on one client; ROLLBACK on any failure
 */
export async function withTransaction<T>(
  work: (client: PoolClient) => Promise<T>,
  target: PoolLike = getPool()
): Promise<T> {
  let client: PoolClient;
  try {
    client = await target.connect();
  } catch (error) {
    throw toStoreError(error);
  }

  // Set when the connection can no longer be trusted; pg then destroys it
  let broken: Error | undefined;

  try {
    await runQuery(client, 'BEGIN');
    const result = await work(client);
    await runQuery(client, 'COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
      logger.error({ error: rollbackError }, 'Rollback failed, discarding connection');
    }
    throw error;
  } finally {
    client.release(broken);
  }
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Error mapping
// ═══════════════════════════════════════════════════════════════════════════════

const TRANSIENT_SQLSTATES = new Set([
  '57014', // query_canceled (statement_timeout)
  '57P01', // admin_shutdown
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '53300', // too_many_connections
  '55P03', // lock_not_available
]);

const TRANSIENT_NODE_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EPIPE', 'ENOTFOUND']);

const TRANSIENT_MESSAGES = [
  'timeout exceeded when trying to connect',
  'Query read timeout',
  'Connection terminated',
];

export function getErrorCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

export function isTransientDbError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code && (TRANSIENT_SQLSTATES.has(code) || code.startsWith('08') || TRANSIENT_NODE_CODES.has(code))) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return TRANSIENT_MESSAGES.some((fragment) => message.includes(fragment));
}

/**
 * Wrap infrastructure failures; leave everything else as is
 */
export function toStoreError(error: unknown): unknown {
  if (error instanceof TransientStoreError || !isTransientDbError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientStoreError(`Database unavailable: ${message}`, error);
}

export { Pool };
export type { PoolClient };
