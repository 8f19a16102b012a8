// src/db/types.ts
// Database adapter interface: unified async API for SQLite and PostgreSQL

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Both SQLite (better-sqlite3) and PostgreSQL (pg) implement this.
 *
 * Query methods use SQLite '?' placeholders in SQL strings.
 * The PostgresAdapter converts '?' to '$1, $2, ...' before execution.
 */
export interface DbAdapter {
  /** Identifies the underlying database driver. */
  readonly dbType: 'sqlite' | 'postgresql';

  /**
   * Execute a SELECT query and return the first matching row, or undefined if no match.
   * @param sql    SQL string with '?' parameter placeholders
   * @param params Ordered parameter values matching the placeholders
   */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  /**
   * Execute a SELECT query and return all matching rows.
   */
  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /**
   * Execute an INSERT, UPDATE, or DELETE statement.
   */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /**
   * Execute raw SQL without parameters. Used for DDL and savepoints.
   * For multi-statement DDL, separate statements with semicolons.
   */
  exec(sql: string): Promise<void>;

  /**
   * Execute a series of operations atomically.
   * The callback receives a transaction-bound adapter. On error, ROLLBACK is
   * issued and the error rethrown.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  /** Close the database connection (pool). */
  close(): Promise<void>;
}
