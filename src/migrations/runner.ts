// src/migrations/runner.ts
// Database migration runner with up/down support.
//
// Manages versioned SQL migrations stored in the migrations/ directory.
// Each migration file contains up and down SQL separated by a "-- DOWN" marker.
// Works against any DbAdapter, so the same files serve SQLite and PostgreSQL;
// they are written in the subset of SQL both engines accept.

import fs from "node:fs";
import path from "node:path";
import { createLogger } from "../observability/index.js";
import type { DbAdapter } from "../db/types.js";

const log = createLogger("migrations");

/* ---------- Types ---------- */
export interface Migration {
  version: string;
  name: string;
  up: string;
  down: string;
}

export interface MigrationStatus {
  version: string;
  name: string;
  applied: boolean;
  appliedAt: number | null;
}

/* ---------- Constants ---------- */
const MIGRATION_TABLE = "schema_migrations";
const DOWN_MARKER = "-- DOWN";

function fullNameOf(m: Migration): string {
  return `${m.version}_${m.name}`;
}

/* ---------- Migration Runner ---------- */
export class AsyncMigrationRunner {
  private adapter: DbAdapter;
  private migrationsDir: string;

  constructor(adapter: DbAdapter, migrationsDir: string) {
    this.adapter = adapter;
    this.migrationsDir = migrationsDir;
  }

  /** Ensure the schema_migrations table exists */
  async ensureMigrationTable(): Promise<void> {
    const ddl = this.adapter.dbType === "postgresql"
      ? `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
           id BIGSERIAL PRIMARY KEY,
           name TEXT NOT NULL UNIQUE,
           applied_at BIGINT NOT NULL
         );`
      : `CREATE TABLE IF NOT EXISTS ${MIGRATION_TABLE} (
           id INTEGER PRIMARY KEY AUTOINCREMENT,
           name TEXT NOT NULL UNIQUE,
           applied_at INTEGER NOT NULL
         );`;
    await this.adapter.exec(ddl);
  }

  /** Parse a migration file into up and down SQL */
  private parseMigrationFile(filePath: string): { up: string; down: string } {
    const content = fs.readFileSync(filePath, "utf-8");
    const markerIndex = content.indexOf(DOWN_MARKER);
    if (markerIndex === -1) {
      return { up: content.trim(), down: "" };
    }
    return {
      up: content.slice(0, markerIndex).trim(),
      down: content.slice(markerIndex + DOWN_MARKER.length).trim(),
    };
  }

  /** Extract version and name from a filename such as "001_contacts.sql" */
  private parseFilename(filename: string): { version: string; name: string } | null {
    const match = filename.match(/^(\d+)_(.+)\.sql$/);
    if (!match) return null;
    return { version: match[1], name: match[2] };
  }

  /** Get all migration files, ordered by filename */
  getAllMigrations(): Migration[] {
    if (!fs.existsSync(this.migrationsDir)) return [];
    const files = fs.readdirSync(this.migrationsDir)
      .filter(f => f.endsWith(".sql"))
      .sort();
    const migrations: Migration[] = [];
    for (const file of files) {
      const parsed = this.parseFilename(file);
      if (!parsed) continue;
      const { up, down } = this.parseMigrationFile(path.join(this.migrationsDir, file));
      migrations.push({ version: parsed.version, name: parsed.name, up, down });
    }
    return migrations;
  }

  /** Applied migrations, oldest first */
  async getApplied(): Promise<Array<{ name: string; appliedAt: number }>> {
    await this.ensureMigrationTable();
    const rows = await this.adapter.queryAll<{ name: string; applied_at: number | string }>(
      `SELECT name, applied_at FROM ${MIGRATION_TABLE} ORDER BY id ASC`
    );
    // pg returns BIGINT as string
    return rows.map(r => ({ name: r.name, appliedAt: Number(r.applied_at) }));
  }

  async getPending(): Promise<Migration[]> {
    const applied = new Set((await this.getApplied()).map(m => m.name));
    return this.getAllMigrations().filter(m => !applied.has(fullNameOf(m)));
  }

  async getStatus(): Promise<MigrationStatus[]> {
    const appliedMap = new Map((await this.getApplied()).map(m => [m.name, m.appliedAt]));
    return this.getAllMigrations().map(m => {
      const appliedAt = appliedMap.get(fullNameOf(m));
      return {
        version: m.version,
        name: m.name,
        applied: appliedAt !== undefined,
        appliedAt: appliedAt ?? null,
      };
    });
  }

  /** Run all pending migrations, stopping at the first failure */
  async runAll(): Promise<{ applied: string[]; skipped: string[] }> {
    const pending = await this.getPending();
    const applied: string[] = [];
    const skipped: string[] = [];

    for (const migration of pending) {
      const fullName = fullNameOf(migration);
      try {
        await this.adapter.transaction(async (tx) => {
          await tx.exec(migration.up);
          await tx.run(
            `INSERT INTO ${MIGRATION_TABLE} (name, applied_at) VALUES (?, ?)`,
            [fullName, Date.now()]
          );
        });
        applied.push(fullName);
        log.info({ migration: fullName }, "Applied migration");
      } catch (err) {
        log.error({ err, migration: fullName }, "Failed to apply migration");
        skipped.push(fullName);
        break;
      }
    }

    return { applied, skipped };
  }

  /** Roll back the most recently applied migration. Returns its name, or null if none. */
  async rollbackLast(): Promise<string | null> {
    const applied = await this.getApplied();
    const last = applied[applied.length - 1];
    if (!last) return null;

    const migration = this.getAllMigrations().find(m => fullNameOf(m) === last.name);
    if (!migration) {
      throw new Error(`Migration file for ${last.name} not found`);
    }
    if (!migration.down) {
      throw new Error(`Migration ${last.name} has no down migration defined`);
    }

    await this.adapter.transaction(async (tx) => {
      await tx.exec(migration.down);
      await tx.run(`DELETE FROM ${MIGRATION_TABLE} WHERE name = ?`, [last.name]);
    });
    log.info({ migration: last.name }, "Rolled back migration");
    return last.name;
  }
}
