// src/db/postgres.ts
// PostgreSQL adapter: implements DbAdapter using the `pg` connection pool.
// SQL strings are written with SQLite-style '?' placeholders; this adapter
// converts them to PostgreSQL's positional '$1, $2, ...' syntax automatically.

import pg from 'pg';
import { createLogger } from '../observability/index.js';
import type { DbAdapter, RunResult } from './types.js';

const log = createLogger('db/postgres');

/* ---------- Placeholder Conversion ---------- */

/**
 * Convert SQLite '?' placeholders to PostgreSQL positional placeholders.
 * Example: "WHERE id = ? AND name = ?" → "WHERE id = $1 AND name = $2"
 */
export function toPositional(sql: string): string {
  let i = 0;
  return sql.replace(/\?/g, () => `$${++i}`);
}

/** Anything that can run a query: the pool itself or a pinned client. */
type Queryable = pg.Pool | pg.PoolClient;

async function runOn(target: Queryable, sql: string, params: unknown[]): Promise<RunResult> {
  const result = await target.query(toPositional(sql), params);
  // RETURNING id populates lastInsertRowid; otherwise it stays 0.
  const lastRow = result.rows[0] as { id?: number | bigint } | undefined;
  return {
    changes: result.rowCount ?? 0,
    lastInsertRowid: lastRow?.id ?? 0,
  };
}

/* ---------- PostgresAdapter ---------- */

export class PostgresAdapter implements DbAdapter {
  readonly dbType = 'postgresql' as const;
  private pool: pg.Pool;

  constructor(connectionString: string) {
    this.pool = new pg.Pool({ connectionString, max: 10 });
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const result = await this.pool.query(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.pool.query(toPositional(sql), params);
    return result.rows as T[];
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return runOn(this.pool, sql, params);
  }

  async exec(sql: string): Promise<void> {
    await this.pool.query(sql);
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(new PostgresTxAdapter(client));
      await client.query('COMMIT');
      return result;
    } catch (e) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        // Connection already broken; keep the original error
        log.warn({ err: rollbackErr }, 'ROLLBACK failed');
      }
      throw e;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

/* ---------- PostgresTxAdapter (transaction-scoped) ---------- */

/**
 * Uses a pinned PoolClient so all operations in the transaction
 * share the same server-side connection and session state.
 */
class PostgresTxAdapter implements DbAdapter {
  readonly dbType = 'postgresql' as const;
  private client: pg.PoolClient;

  constructor(client: pg.PoolClient) {
    this.client = client;
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const result = await this.client.query(toPositional(sql), params);
    return result.rows[0] as T | undefined;
  }

  async queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const result = await this.client.query(toPositional(sql), params);
    return result.rows as T[];
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    return runOn(this.client, sql, params);
  }

  async exec(sql: string): Promise<void> {
    await this.client.query(sql);
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // Already inside a transaction; execute directly.
    return fn(this);
  }

  close(): Promise<void> {
    // The outer PostgresAdapter.transaction() releases the client.
    return Promise.resolve();
  }
}
