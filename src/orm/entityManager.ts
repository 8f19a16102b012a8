// src/orm/entityManager.ts
// Writes entity instances to their tables and reads them back.
//
// An EntityManager is bound to one DbAdapter, normally the transaction-scoped
// adapter handed out by db.transaction(). It never begins or commits a
// transaction itself.

import { nanoid } from "nanoid";
import { UTCDate } from "@date-fns/utc";
import type { DbAdapter } from "../db/types.js";
import { createLogger } from "../observability/index.js";
import {
  Model,
  columnOf,
  type EntityType,
  type ManyToManyField,
  type RelationField,
  type ScalarField,
} from "./types.js";

/* ---------- Contracts ---------- */

/** The single write operation the fixture loader depends on. */
export interface EntityStore {
  manage(entity: Model): Promise<void>;
}

/** Thrown for instances whose class is not one of the manager's entity types */
export class UnknownEntityTypeError extends Error {
  constructor(typeName: string) {
    super(`Not a known entity type: ${typeName}`);
    this.name = "UnknownEntityTypeError";
  }
}

const log = createLogger("orm");

/* ---------- Constants ---------- */

const ID_LENGTH = 12;
const SAVEPOINT = "seedbed_manage";

/* ---------- SQL helpers ---------- */

function upsertSql(table: string, columns: string[]): string {
  const updates = columns
    .filter(c => c !== "id")
    .map(c => `${c} = excluded.${c}`);
  const onConflict = updates.length > 0
    ? `DO UPDATE SET ${updates.join(", ")}`
    : "DO NOTHING";
  return `INSERT INTO ${table} (${columns.join(", ")}) VALUES (${columns.map(() => "?").join(", ")}) ON CONFLICT (id) ${onConflict}`;
}

function toColumnValue(name: string, field: ScalarField, value: unknown): unknown {
  if (value === null) return null;
  switch (field.type) {
    case "boolean":
      if (typeof value !== "boolean") throw new TypeError(`${name}: expected a boolean`);
      return value ? 1 : 0;
    case "instant":
      if (!(value instanceof Date)) throw new TypeError(`${name}: expected a date`);
      return value.toISOString();
    default:
      return value;
  }
}

function fromColumnValue(field: ScalarField, raw: unknown): unknown {
  switch (field.type) {
    case "boolean":
      return raw === 1 || raw === true;
    case "integer":
    case "decimal":
      return Number(raw);
    case "instant":
      return new UTCDate(String(raw));
    default:
      return String(raw);
  }
}

/* ---------- EntityManager ---------- */

export class EntityManager implements EntityStore {
  private db: DbAdapter;
  private byName = new Map<string, EntityType>();
  private byModel = new Map<unknown, EntityType>();

  constructor(db: DbAdapter, types: readonly EntityType[]) {
    this.db = db;
    for (const type of types) {
      this.byName.set(type.name, type);
      this.byModel.set(type.model, type);
    }
  }

  /** Entity type of an instance, by its class */
  typeOf(entity: Model): EntityType {
    const type = this.byModel.get(entity.constructor);
    if (!type) throw new UnknownEntityTypeError(entity.constructor.name);
    return type;
  }

  /**
   * Insert or update one entity, including the join rows of its manyToMany
   * fields. Referenced entities that have no id yet get one now; their own
   * rows are written when they are managed. Fields left undefined are not
   * written, so column defaults apply on insert.
   *
   * Runs inside a savepoint: a failure undoes this entity's writes only and
   * leaves the surrounding transaction usable.
   */
  async manage(entity: Model): Promise<void> {
    const type = this.typeOf(entity);
    const id = (entity.id ??= nanoid(ID_LENGTH));

    const columns = ["id"];
    const values: unknown[] = [id];
    const joins: Array<{ field: ManyToManyField; refs: string[] }> = [];

    for (const [name, field] of Object.entries(type.fields)) {
      const value = entity[name];
      if (value === undefined) continue;

      if (field.type === "manyToMany") {
        joins.push({ field, refs: this.referenceIds(name, field, value) });
      } else if (field.type === "manyToOne") {
        columns.push(columnOf(name, field));
        values.push(this.referenceId(name, field, value));
      } else {
        columns.push(columnOf(name, field));
        values.push(toColumnValue(name, field, value));
      }
    }

    await this.db.exec(`SAVEPOINT ${SAVEPOINT}`);
    try {
      await this.db.run(upsertSql(type.table, columns), values);
      for (const { field, refs } of joins) {
        await this.db.run(
          `DELETE FROM ${field.joinTable} WHERE ${field.joinColumn} = ?`,
          [id]
        );
        for (const ref of refs) {
          await this.db.run(
            `INSERT INTO ${field.joinTable} (${field.joinColumn}, ${field.inverseColumn}) VALUES (?, ?)`,
            [id, ref]
          );
        }
      }
      await this.db.exec(`RELEASE SAVEPOINT ${SAVEPOINT}`);
    } catch (err) {
      try {
        await this.db.exec(`ROLLBACK TO SAVEPOINT ${SAVEPOINT}`);
        await this.db.exec(`RELEASE SAVEPOINT ${SAVEPOINT}`);
      } catch (rollbackErr) {
        // Rethrow the write error, not this one
        log.warn({ err: rollbackErr, entityType: type.name }, "Savepoint rollback failed");
      }
      throw err;
    }
  }

  /** Get an entity by id */
  async find<T extends Model>(type: EntityType<T>, id: string): Promise<T | null> {
    const row = await this.db.queryOne(`SELECT * FROM ${type.table} WHERE id = ?`, [id]);
    return row ? this.hydrate(type, row) : null;
  }

  /** Get the first entity whose scalar or manyToOne field equals value */
  async findBy<T extends Model>(type: EntityType<T>, field: string, value: unknown): Promise<T | null> {
    const def = type.fields[field];
    if (!def || def.type === "manyToMany") {
      throw new Error(`Cannot query ${type.name} by "${field}"`);
    }
    const row = await this.db.queryOne(
      `SELECT * FROM ${type.table} WHERE ${columnOf(field, def)} = ? ORDER BY id LIMIT 1`,
      [value]
    );
    return row ? this.hydrate(type, row) : null;
  }

  /** Get all entities of a type, ordered by id */
  async all<T extends Model>(type: EntityType<T>): Promise<T[]> {
    const rows = await this.db.queryAll(`SELECT * FROM ${type.table} ORDER BY id`);
    const entities: T[] = [];
    for (const row of rows) {
      entities.push(await this.hydrate(type, row));
    }
    return entities;
  }

  async count(type: EntityType): Promise<number> {
    const row = await this.db.queryOne<{ n: number | string }>(
      `SELECT COUNT(*) AS n FROM ${type.table}`
    );
    // pg returns COUNT(*) as string
    return Number(row?.n ?? 0);
  }

  /* ---------- Internals ---------- */

  private referenceId(name: string, field: RelationField, value: unknown): string | null {
    if (value === null) return null;
    if (!(value instanceof Model)) {
      throw new TypeError(`${name}: expected a ${field.target}`);
    }
    const target = this.typeOf(value);
    if (target.name !== field.target) {
      throw new TypeError(`${name}: expected a ${field.target}, got a ${target.name}`);
    }
    return (value.id ??= nanoid(ID_LENGTH));
  }

  private referenceIds(name: string, field: ManyToManyField, value: unknown): string[] {
    if (value === null) return [];
    if (!Array.isArray(value)) {
      throw new TypeError(`${name}: expected a list of ${field.target}`);
    }
    const ids = new Set<string>();
    for (const item of value) {
      const id = this.referenceId(name, field, item);
      if (id !== null) ids.add(id);
    }
    return [...ids];
  }

  /** Id-only instance standing in for a related row */
  private reference(targetName: string, id: string): Model {
    const type = this.byName.get(targetName);
    if (!type) throw new UnknownEntityTypeError(targetName);
    const ref = new type.model();
    ref.id = id;
    return ref;
  }

  private async hydrate<T extends Model>(type: EntityType<T>, row: Record<string, unknown>): Promise<T> {
    const instance = new type.model();
    const entity: Model = instance;
    entity.id = String(row.id);

    for (const [name, field] of Object.entries(type.fields)) {
      if (field.type === "manyToMany") {
        const refs = await this.db.queryAll<{ ref: string }>(
          `SELECT ${field.inverseColumn} AS ref FROM ${field.joinTable} WHERE ${field.joinColumn} = ? ORDER BY ${field.inverseColumn}`,
          [entity.id]
        );
        entity[name] = refs.map(r => this.reference(field.target, r.ref));
        continue;
      }

      const raw = row[columnOf(name, field)];
      if (raw === null || raw === undefined) {
        entity[name] = null;
      } else if (field.type === "manyToOne") {
        entity[name] = this.reference(field.target, String(raw));
      } else {
        entity[name] = fromColumnValue(field, raw);
      }
    }

    return instance;
  }
}
