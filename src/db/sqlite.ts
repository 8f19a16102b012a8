// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// All methods return Promises that resolve synchronously (better-sqlite3 is sync).

import Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types.js';

export class SqliteAdapter implements DbAdapter {
  readonly dbType = 'sqlite' as const;
  private _db: Database.Database;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /** Open an in-memory database. Used by tests and throwaway seeding runs. */
  static memory(): SqliteAdapter {
    return new SqliteAdapter(new Database(':memory:'));
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row = this._db.prepare(sql).get(...params) as T | undefined;
    return Promise.resolve(row);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows = this._db.prepare(sql).all(...params) as T[];
    return Promise.resolve(rows);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() doesn't take async callbacks, so
    // BEGIN/COMMIT/ROLLBACK are issued by hand. Deferred foreign keys are
    // checked at COMMIT; a violation there rolls the whole transaction back.
    this._db.exec('BEGIN');
    try {
      const result = await fn(this);
      this._db.exec('COMMIT');
      return result;
    } catch (e) {
      if (this._db.inTransaction) {
        this._db.exec('ROLLBACK');
      }
      throw e;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
