/**
 * PostgreSQL connection handling shared by the repositories.
 */

import pg from 'pg';
const { Pool } = pg;
import type { DatabaseConfig } from '../config/schema.js';
import { classifyDriverError } from './errors.js';
import type { QueryContext } from './types.js';

export type PgPool = pg.Pool;
export type Row = pg.QueryResultRow;

export function createPool(config: DatabaseConfig): PgPool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: true } : false,
    max: config.maxConnections,
    idleTimeoutMillis: config.idleTimeoutMillis,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });

  // Idle client errors would otherwise crash the process
  pool.on('error', (error) => {
    console.error('[PostgreSQL] Idle client error:', error.message);
  });

  return pool;
}

/**
 * Run a parameterized query, honouring the request's cancellation signal.
 *
 * pg cannot cancel an in-flight query from a signal, so the signal is
 * checked before the query is sent.
 */
export async function runQuery<R extends Row>(
  pool: PgPool,
  text: string,
  values: unknown[],
  ctx?: QueryContext
): Promise<pg.QueryResult<R>> {
  try {
    ctx?.signal?.throwIfAborted();
    return await pool.query<R>(text, values);
  } catch (error) {
    throw classifyDriverError(error);
  }
}

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Ids that cannot be UUIDs cannot exist; skip the round-trip (and the cast error). */
export function isUuid(value: string): boolean {
  return UUID_PATTERN.test(value);
}
