/**
 * Database Connection Module
 *
 * One pg pool per process, pooled queries, and transactions that roll back on
 * any error. A statement or transaction that fails because the connection was
 * lost is retried once on a fresh connection; domain errors thrown inside a
 * transaction callback propagate unchanged after rollback.
 *
 * @module db
 */

import { Pool, type PoolClient, type QueryResultRow } from 'pg';

import { getDatabaseConfig, toPgPoolConfig, type DatabaseConfig } from '../config/database.js';
import { isWorkflowError } from '../types/errors.js';

/**
 * Tracing fields attached to every statement log
 */
export interface QueryOptions {
  readonly correlationId?: string;
  readonly operation?: string;
}

export interface QueryExecutionResult<T extends QueryResultRow = QueryResultRow> {
  readonly queryId: string;
  readonly rows: T[];
  readonly rowCount: number;
  readonly executionTimeMs: number;
}

/**
 * Anything that can run a parameterized query: a transaction client
 */
export type Queryable = Pick<PoolClient, 'query'>;

export type TransactionCallback<T> = (client: Queryable) => Promise<T>;

export interface TransactionOptions extends QueryOptions {
  readonly isolationLevel?: 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

  /**
   * `statement_timeout` for the transaction, in milliseconds
   */
  readonly timeout?: number;
}

export interface PoolStats {
  readonly totalCount: number;
  readonly idleCount: number;
  readonly waitingCount: number;
  readonly timestamp: Date;
}

export interface DatabaseHealthCheck {
  readonly healthy: boolean;
  readonly latencyMs?: number;
  readonly poolStats?: PoolStats;
  readonly error?: string;
  readonly timestamp: Date;
}

/**
 * Infrastructure failure reported by the database layer
 */
export class DatabaseError extends Error {
  /**
   * PostgreSQL SQLSTATE or Node socket error code
   */
  public readonly code?: string;

  constructor(message: string, code?: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatabaseError';
    this.code = code;
  }
}

/**
 * Error codes treated as a lost connection; SQLSTATE class 08 is matched by prefix
 */
const TRANSIENT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  '57P01', // admin_shutdown
  '57P02', // crash_shutdown
  '57P03', // cannot_connect_now
]);

const SHUTDOWN_POLL_MS = 100;

let pool: Pool | null = null;
let poolConfig: DatabaseConfig | null = null;
let closing = false;
let inFlight = 0;

function nextId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function wrapError(prefix: string, error: unknown): DatabaseError {
  const code = getErrorCode(error);
  return new DatabaseError(`[DATABASE] ${prefix}: ${getErrorMessage(error)}${code ? ` (${code})` : ''}`, code, error);
}

function assertOpen(action: string): void {
  if (closing) {
    throw new DatabaseError(`[DATABASE] Cannot ${action} during shutdown`);
  }
}

/**
 * Whether an error means the connection was lost rather than the statement
 * being wrong
 */
export function isTransientConnectionError(error: unknown): boolean {
  const code = getErrorCode(error);
  if (code !== undefined && (TRANSIENT_ERROR_CODES.has(code) || code.startsWith('08'))) {
    return true;
  }

  const message = getErrorMessage(error);
  return message.includes('Connection terminated') || message.includes('Client has encountered a connection error');
}

function poolCounts(target: Pool): Omit<PoolStats, 'timestamp'> {
  return { totalCount: target.totalCount, idleCount: target.idleCount, waitingCount: target.waitingCount };
}

/**
 * Create the pool on first call; later calls return it
 *
 * @throws DatabaseError during shutdown
 */
export function initializePool(): Pool {
  if (pool) {
    return pool;
  }
  assertOpen('initialize pool');

  const config = getDatabaseConfig();
  const created = new Pool(toPgPoolConfig(config));

  created.on('connect', () => {
    console.log('[DATABASE] Pool client connected', poolCounts(created));
  });
  created.on('remove', () => {
    console.log('[DATABASE] Pool client removed', poolCounts(created));
  });
  created.on('error', (error) => {
    // Idle clients that die are evicted by pg; the next checkout opens a new one.
    console.error('[DATABASE] Idle client error:', {
      error: error.message,
      code: getErrorCode(error),
      timestamp: new Date().toISOString(),
    });
  });

  console.log('[DATABASE] Pool created', {
    host: config.host,
    port: config.port,
    database: config.database,
    min: config.pool.min,
    max: config.pool.max,
  });

  pool = created;
  poolConfig = config;
  return created;
}

function activePool(): Pool {
  return pool ?? initializePool();
}

/**
 * Run one statement on the pool
 *
 * @throws DatabaseError when the statement fails, or the connection is lost twice
 */
export async function executeQuery<T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<QueryExecutionResult<T>> {
  assertOpen('execute query');

  const target = activePool();
  const queryId = nextId('query');
  const startTime = Date.now();
  const trace = { queryId, operation: options?.operation, correlationId: options?.correlationId };

  inFlight++;
  try {
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await target.query<T>(sql, params);
        const rowCount = result.rowCount ?? 0;
        const executionTimeMs = Date.now() - startTime;

        if (poolConfig?.enableLogging) {
          console.log('[DATABASE] Query executed:', { ...trace, rowCount, executionTimeMs, attempt });
        }

        return { queryId, rows: result.rows, rowCount, executionTimeMs };
      } catch (error) {
        if (attempt === 1 && isTransientConnectionError(error)) {
          console.warn('[DATABASE] Connection lost, retrying query on a fresh connection:', {
            ...trace,
            code: getErrorCode(error),
          });
          continue;
        }

        console.error('[DATABASE] Query execution failed:', {
          ...trace,
          error: getErrorMessage(error),
          code: getErrorCode(error),
          executionTimeMs: Date.now() - startTime,
          timestamp: new Date().toISOString(),
        });
        throw wrapError('Query execution failed', error);
      }
    }
  } finally {
    inFlight--;
  }
}

/**
 * Rows of one statement on the pool
 */
export async function queryMany<T extends QueryResultRow = QueryResultRow>(
  sql: string,
  params?: unknown[],
  options?: QueryOptions
): Promise<T[]> {
  const result = await executeQuery<T>(sql, params, options);
  return result.rows;
}

async function rollbackQuietly(client: PoolClient, transactionId: string): Promise<void> {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError) {
    console.error('[DATABASE] Rollback failed:', { transactionId, error: getErrorMessage(rollbackError) });
  }
}

/**
 * Run `callback` inside BEGIN/COMMIT on a dedicated client
 *
 * WorkflowErrors from the callback are rethrown as they are after rollback.
 * A lost connection before COMMIT was sent reruns the whole callback once on
 * a new client; the broken client is destroyed rather than returned.
 *
 * @throws WorkflowError from the callback, or DatabaseError
 */
export async function executeTransaction<T>(
  callback: TransactionCallback<T>,
  options?: TransactionOptions
): Promise<T> {
  assertOpen('execute transaction');

  const target = activePool();
  const transactionId = nextId('tx');
  const startTime = Date.now();
  const trace = { transactionId, operation: options?.operation, correlationId: options?.correlationId };

  inFlight++;
  try {
    for (let attempt = 1; ; attempt++) {
      let client: PoolClient | null = null;
      let commitSent = false;
      let brokenConnection: Error | undefined;

      try {
        client = await target.connect();
        await client.query(`BEGIN ISOLATION LEVEL ${options?.isolationLevel ?? 'READ COMMITTED'}`);
        if (options?.timeout) {
          await client.query(`SET LOCAL statement_timeout = ${Math.trunc(options.timeout)}`);
        }

        const result = await callback(client);

        commitSent = true;
        await client.query('COMMIT');

        console.log('[DATABASE] Transaction committed:', {
          ...trace,
          attempt,
          executionTimeMs: Date.now() - startTime,
        });
        return result;
      } catch (error) {
        const transient = isTransientConnectionError(error);

        if (transient) {
          brokenConnection = error instanceof Error ? error : new Error(String(error));
        } else if (client) {
          await rollbackQuietly(client, transactionId);
        }

        if (isWorkflowError(error)) {
          console.warn('[DATABASE] Transaction rolled back by domain rule:', { ...trace, code: error.code });
          throw error;
        }

        if (transient && !commitSent && attempt === 1) {
          console.warn('[DATABASE] Connection lost, retrying transaction on a fresh connection:', {
            ...trace,
            code: getErrorCode(error),
          });
          continue;
        }

        console.error('[DATABASE] Transaction failed:', {
          ...trace,
          attempt,
          error: getErrorMessage(error),
          code: getErrorCode(error),
          executionTimeMs: Date.now() - startTime,
        });
        throw wrapError('Transaction failed', error);
      } finally {
        client?.release(brokenConnection);
      }
    }
  } finally {
    inFlight--;
  }
}

/**
 * Pool counters at this moment
 */
export function getPoolStats(): PoolStats {
  return { ...poolCounts(activePool()), timestamp: new Date() };
}

/**
 * Round-trip `SELECT 1` and report latency and pool counters
 */
export async function testConnection(): Promise<DatabaseHealthCheck> {
  const timestamp = new Date();
  const startTime = Date.now();

  try {
    await activePool().query('SELECT 1 AS ok');
    return { healthy: true, latencyMs: Date.now() - startTime, poolStats: getPoolStats(), timestamp };
  } catch (error) {
    console.error('[DATABASE] Connection test failed:', {
      error: getErrorMessage(error),
      timestamp: timestamp.toISOString(),
    });
    return { healthy: false, error: getErrorMessage(error), timestamp };
  }
}

/**
 * Close the pool, first waiting up to `timeout` ms for in-flight work unless `force` is set
 */
export async function shutdown(options?: { readonly timeout?: number; readonly force?: boolean }): Promise<void> {
  if (closing) {
    console.warn('[DATABASE] Shutdown already in progress');
    return;
  }

  const current = pool;
  if (!current) {
    return;
  }

  closing = true;
  const deadline = Date.now() + (options?.timeout ?? 30000);
  const startTime = Date.now();

  try {
    if (!options?.force) {
      while (inFlight > 0 && Date.now() < deadline) {
        await new Promise((resolve) => setTimeout(resolve, SHUTDOWN_POLL_MS));
      }
      if (inFlight > 0) {
        console.warn('[DATABASE] Closing pool with work still in flight:', {
          inFlight,
          elapsedMs: Date.now() - startTime,
        });
      }
    }

    await current.end();
    pool = null;
    poolConfig = null;

    console.log('[DATABASE] Pool closed', { elapsedMs: Date.now() - startTime });
  } catch (error) {
    throw wrapError('Shutdown failed', error);
  } finally {
    closing = false;
  }
}
