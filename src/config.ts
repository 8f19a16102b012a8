/* src/config.ts
   Centralized config: database target & fixture roots */
import path from 'node:path';
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

export type DatabaseDriver = 'sqlite' | 'postgresql';

// Determine database driver from DATABASE_URL scheme
const databaseUrl = env('DATABASE_URL', 'sqlite://local');
const databaseDriver: DatabaseDriver = databaseUrl.startsWith('postgres')
  ? 'postgresql'
  : 'sqlite';

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),

  // ── Database ─────────────────────────────────────────────────────
  database: {
    url: databaseUrl,
    driver: databaseDriver,
    sqlitePath: path.resolve(process.cwd(), env('SEED_DB_PATH', 'data/seedbed.db')),
  },

  // ── Migrations ───────────────────────────────────────────────────
  migrations: {
    dir: path.resolve(process.cwd(), env('MIGRATIONS_DIR', 'migrations')),
  },

  // ── Fixtures ─────────────────────────────────────────────────────
  // Each root is searched for fixtures/<name>, in order.
  fixtures: {
    roots: env('FIXTURE_ROOTS', '.')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean)
      .map(p => path.resolve(process.cwd(), p)),
  },
} as const;
