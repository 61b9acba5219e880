import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

function intFromEnv(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
     const raw = env[name];
     const value = raw === undefined || raw === '' ? NaN : parseInt(raw, 10);
     return Number.isNaN(value) ? fallback : value;
}

export function poolConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PoolConfig {
     const testing = env.NODE_ENV === 'test';
     return {
          connectionString: env.DATABASE_URL,
          // Tests keep the pool small and let idle clients go quickly
          min: testing ? 0 : intFromEnv(env, 'DB_POOL_MIN', 2),
          max: testing ? 2 : intFromEnv(env, 'DB_POOL_MAX', 10),
          idleTimeoutMillis: testing ? 100 : intFromEnv(env, 'DB_IDLE_TIMEOUT_MS', 10000),
          connectionTimeoutMillis: intFromEnv(env, 'DB_CONNECTION_TIMEOUT_MS', 5000),
          application_name: env.SERVICE_NAME || 'commerce-backoffice',
          // Stock and order rows are held with FOR UPDATE; a stuck writer surfaces as an error
          lock_timeout: intFromEnv(env, 'DB_LOCK_TIMEOUT_MS', 10000),
     };
}

export const pool = new Pool(poolConfigFromEnv());

pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export async function checkConnection(): Promise<boolean> {
     try {
          await withConnection((client) => client.query('SELECT 1'));
          return true;
     } catch (error) {
          logger.error({ error }, 'Database connection check failed');
          return false;
     }
}

/**
 * Run `fn` inside BEGIN/COMMIT on one pooled client. A client whose ROLLBACK
 * fails is discarded instead of going back to the pool.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     let broken: Error | undefined;
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          try {
               await client.query('ROLLBACK');
          } catch (rollbackError) {
               broken = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
               logger.error({ err: broken }, 'Rollback failed, discarding connection');
          }
          throw err;
     } finally {
          client.release(broken);
     }
}

export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
