import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';
import { ConflictError, DomainError, PersistenceError } from '../utils/errors';

export function buildPoolConfig(env: NodeJS.ProcessEnv = process.env): PoolConfig {
     const isTest = env.NODE_ENV === 'test';
     return {
          connectionString: env.DATABASE_URL,
          // In test mode, use minimal connections and short timeouts
          min: isTest ? 0 : parseInt(env.DB_POOL_MIN || '2', 10),
          max: isTest ? 2 : parseInt(env.DB_POOL_MAX || '10', 10),
          idleTimeoutMillis: isTest ? 100 : parseInt(env.DB_IDLE_TIMEOUT_MS || '10000', 10),
          connectionTimeoutMillis: parseInt(env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
          application_name: env.SERVICE_NAME || 'stockbill',
     };
}

export const pool = new Pool(buildPoolConfig());

// Log pool errors
pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

// serialization_failure, deadlock_detected
const RETRYABLE_SQLSTATES = new Set(['40001', '40P01']);

export function isRetryableTransactionError(err: unknown): boolean {
     return (
          typeof err === 'object' &&
          err !== null &&
          'code' in err &&
          typeof err.code === 'string' &&
          RETRYABLE_SQLSTATES.has(err.code)
     );
}

// Connection health check
export async function checkConnection(): Promise<boolean> {
     try {
          const client = await pool.connect();
          await client.query('SELECT 1');
          client.release();
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

// Transaction helper
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               logger.error({ err: rollbackError }, 'Rollback failed');
          }
          throw err;
     } finally {
          client.release();
     }
}

/**
 * Runs fn in a transaction, retrying on serialization failures and deadlocks.
 * Domain errors pass through untouched; a conflict that survives every retry
 * becomes a ConflictError and any other store error a PersistenceError.
 */
export async function withTransactionRetry<T>(
     fn: (client: PoolClient) => Promise<T>,
     retries: number = 1
): Promise<T> {
     for (let attempt = 0; ; attempt++) {
          try {
               return await withTransaction(fn);
          } catch (err) {
               if (err instanceof DomainError) {
                    throw err;
               }

               if (isRetryableTransactionError(err)) {
                    if (attempt < retries) {
                         logger.warn({ err, attempt: attempt + 1 }, 'Transaction conflict, retrying');
                         continue;
                    }
                    throw new ConflictError();
               }

               logger.error({ err }, 'Transaction failed');
               throw new PersistenceError(
                    'The operation could not be stored; nothing was committed',
                    err instanceof Error ? err.message : String(err)
               );
          }
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

// Graceful shutdown
let poolClosed = false;

export async function closePool(): Promise<void> {
     // Signal handlers and service shutdown can both get here
     if (poolClosed) return;
     poolClosed = true;
     await pool.end();
     logger.info('Database pool closed');
}

// Handle shutdown signals (disabled in test mode)
if (process.env.NODE_ENV !== 'test') {
     process.on('SIGINT', async () => {
          await closePool();
          process.exit(0);
     });

     process.on('SIGTERM', async () => {
          await closePool();
          process.exit(0);
     });
}
