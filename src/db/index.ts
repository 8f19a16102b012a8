// src/db/index.ts
// Database adapter factory. Creates the correct DbAdapter based on
// DATABASE_URL (postgresql://... → PostgresAdapter, otherwise SqliteAdapter).

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createLogger } from '../observability/index.js';
import { SqliteAdapter } from './sqlite.js';
import { PostgresAdapter } from './postgres.js';
import type { DbAdapter } from './types.js';

export type { DbAdapter, RunResult } from './types.js';
export { SqliteAdapter } from './sqlite.js';
export { PostgresAdapter } from './postgres.js';

const log = createLogger('db');

let _adapter: SqliteAdapter | PostgresAdapter | null = null;

/**
 * Create (or return the cached) database adapter.
 *
 * - If DATABASE_URL starts with 'postgres', a PostgresAdapter is created.
 * - Otherwise a SqliteAdapter is created at SEED_DB_PATH (default data/seedbed.db).
 */
export function createAdapter(): SqliteAdapter | PostgresAdapter {
  if (_adapter) return _adapter;

  if (config.database.driver === 'postgresql') {
    _adapter = new PostgresAdapter(config.database.url);
  } else {
    const dbPath = config.database.sqlitePath;
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    const rawDb = new Database(dbPath);
    rawDb.pragma('journal_mode = WAL');
    _adapter = new SqliteAdapter(rawDb);
  }

  return _adapter;
}

/**
 * Run `fn` against `db`, then close it. An error from `fn` wins over an
 * error from closing; a close error alone is rethrown.
 */
export async function withAdapter<T>(
  db: DbAdapter,
  fn: (db: DbAdapter) => Promise<T>
): Promise<T> {
  let result: T;
  try {
    result = await fn(db);
  } catch (err) {
    try {
      await db.close();
    } catch (closeErr) {
      log.warn({ err: closeErr }, 'Failed to close database');
    }
    throw err;
  }
  await db.close();
  return result;
}
