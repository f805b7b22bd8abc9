/**
 * PostgreSQL connection pool.
 *
 * Builds a `pg` pool from environment variables. The pool is created by
 * the process owner and passed to whatever needs it; nothing here holds a
 * module-level instance.
 *
 * @module db/pool
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/** Parameterised query function, the only database surface the sinks use. */
export type QueryFn = (text: string, params?: unknown[]) => Promise<pg.QueryResult>;

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(env: Record<string, string | undefined> = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '5432', 10),
    database: env['DB_NAME'] ?? 'alert_relay',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: parseInt(env['DB_POOL_MAX'] ?? '5', 10),
    idleTimeoutMillis: parseInt(env['DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    ssl: env['DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Bind a {@link QueryFn} to a pool. */
export function createQuery(pool: pg.Pool): QueryFn {
  return (text, params) => pool.query(text, params);
}
