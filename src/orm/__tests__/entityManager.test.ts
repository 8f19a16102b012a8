import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { UTCDate } from "@date-fns/utc";
import { SqliteAdapter, type DbAdapter, type RunResult } from "../../db/index.js";
import { AsyncMigrationRunner } from "../../migrations/runner.js";
import {
  Circle,
  CircleType,
  Contact,
  ContactType,
  Sequence,
  SequenceType,
  Title,
  models,
} from "../../models/index.js";
import { EntityManager, UnknownEntityTypeError } from "../entityManager.js";
import { Model, columnOf, toSnakeCase } from "../types.js";

const MIGRATIONS = fileURLToPath(new URL("../../../migrations", import.meta.url));

let db: SqliteAdapter;
let em: EntityManager;

beforeEach(async () => {
  db = SqliteAdapter.memory();
  await new AsyncMigrationRunner(db, MIGRATIONS).runAll();
  em = new EntityManager(db, models());
});

afterEach(async () => {
  await db.close();
});

function circle(code: string, name?: string): Circle {
  return Object.assign(new Circle(), { code, name });
}

/* ============= column naming ============= */

describe("column naming", () => {
  it("snake-cases field names", () => {
    expect(toSnakeCase("dateOfBirth")).toBe("date_of_birth");
    expect(toSnakeCase("vip")).toBe("vip");
  });

  it("suffixes manyToOne columns with _id unless a column is given", () => {
    expect(columnOf("partner", { type: "manyToOne", target: "Contact" })).toBe("partner_id");
    expect(columnOf("next", { type: "integer", column: "next_num" })).toBe("next_num");
  });
});

/* ============= manage ============= */

describe("EntityManager.manage", () => {
  it("assigns an id and inserts the row", async () => {
    const family = circle("family", "Family");

    await em.manage(family);

    expect(family.id).toHaveLength(12);
    const found = await em.find(CircleType, family.id ?? "");
    expect(found).toBeInstanceOf(Circle);
    expect(found?.code).toBe("family");
    expect(found?.name).toBe("Family");
  });

  it("updates the row when managed again", async () => {
    const family = circle("family", "Family");
    await em.manage(family);

    family.name = "Close family";
    await em.manage(family);

    expect(await em.count(CircleType)).toBe(1);
    expect((await em.findBy(CircleType, "code", "family"))?.name).toBe("Close family");
  });

  it("lets column defaults apply to fields that were never set", async () => {
    const seq = Object.assign(new Sequence(), { name: "seq.test" });

    await em.manage(seq);

    const found = await em.find(SequenceType, seq.id ?? "");
    expect(found?.padding).toBe(0);
    expect(found?.increment).toBe(1);
    expect(found?.next).toBe(1);
    expect(found?.prefix).toBeNull();
  });

  it("round-trips booleans, decimals and instants", async () => {
    const contact = Object.assign(new Contact(), {
      firstName: "Ada",
      vip: true,
      creditLimit: 99.5,
      registeredAt: new UTCDate(Date.UTC(2020, 0, 2, 3, 4, 5)),
    });

    await em.manage(contact);

    const found = await em.find(ContactType, contact.id ?? "");
    expect(found?.vip).toBe(true);
    expect(found?.creditLimit).toBe(99.5);
    expect(found?.registeredAt).toBeInstanceOf(UTCDate);
    expect(found?.registeredAt?.toISOString()).toBe("2020-01-02T03:04:05.000Z");
    expect(found?.email).toBeNull();
  });

  it("writes manyToMany join rows once per distinct target", async () => {
    const friends = circle("friends");
    const work = circle("work");
    await em.manage(friends);
    await em.manage(work);

    const contact = Object.assign(new Contact(), {
      firstName: "Ada",
      circles: [friends, work, friends],
    });
    await em.manage(contact);

    const found = await em.find(ContactType, contact.id ?? "");
    expect(found?.circles?.map(c => c.id).sort()).toEqual([friends.id, work.id].sort());
    expect(found?.circles?.[0]).toBeInstanceOf(Circle);
  });

  it("replaces join rows when the list changes", async () => {
    const friends = circle("friends");
    const work = circle("work");
    await em.manage(friends);
    await em.manage(work);
    const contact = Object.assign(new Contact(), { firstName: "Ada", circles: [friends, work] });
    await em.manage(contact);

    contact.circles = [work];
    await em.manage(contact);

    const found = await em.find(ContactType, contact.id ?? "");
    expect(found?.circles?.map(c => c.id)).toEqual([work.id]);
  });

  it("gives unsaved referenced entities an id", async () => {
    const title = Object.assign(new Title(), { code: "dr" });
    const contact = Object.assign(new Contact(), { firstName: "Ada", title });

    await db.transaction(async (tx) => {
      const txEm = new EntityManager(tx, models());
      await txEm.manage(contact);
      expect(title.id).toHaveLength(12);
      await txEm.manage(title);
    });

    const found = await em.find(ContactType, contact.id ?? "");
    expect(found?.title?.id).toBe(title.id);
  });

  it("undoes only the failing entity inside a transaction", async () => {
    const friends = circle("friends");
    const nameless = Object.assign(new Contact(), { lastName: "Nobody", circles: [friends] });

    await db.transaction(async (tx) => {
      const txEm = new EntityManager(tx, models());
      await txEm.manage(friends);
      await expect(txEm.manage(nameless)).rejects.toThrow("NOT NULL constraint failed");
    });

    expect(await em.count(CircleType)).toBe(1);
    expect(await em.count(ContactType)).toBe(0);
  });

  it("rejects instances of unregistered classes", async () => {
    class Stray extends Model {}

    await expect(em.manage(new Stray())).rejects.toBeInstanceOf(UnknownEntityTypeError);
    await expect(em.manage(new Stray())).rejects.toThrow("Not a known entity type: Stray");
  });

  it("rejects a reference of the wrong entity type", async () => {
    const contact = Object.assign(new Contact(), { firstName: "Ada" });
    contact.title = circle("oops");

    await expect(em.manage(contact)).rejects.toThrow("title: expected a Title, got a Circle");
    expect(await em.count(ContactType)).toBe(0);
  });
});

/* ============= queries ============= */

describe("EntityManager queries", () => {
  it("returns null for unknown ids and unmatched values", async () => {
    expect(await em.find(CircleType, "missing")).toBeNull();
    expect(await em.findBy(CircleType, "code", "missing")).toBeNull();
  });

  it("lists all entities of a type ordered by id", async () => {
    const b = Object.assign(circle("b"), { id: "id-b" });
    const a = Object.assign(circle("a"), { id: "id-a" });
    await em.manage(b);
    await em.manage(a);

    const all = await em.all(CircleType);

    expect(all.map(c => c.code)).toEqual(["a", "b"]);
  });

  it("refuses to query by a manyToMany field", async () => {
    await expect(em.findBy(ContactType, "circles", "x")).rejects.toThrow(
      'Cannot query Contact by "circles"'
    );
  });

  it("maps an instance back to its entity type", () => {
    expect(em.typeOf(new Contact())).toBe(ContactType);
  });
});

/* ============= failing connection ============= */

// Every write fails, and so does rolling back to the savepoint
class BrokenAdapter implements DbAdapter {
  readonly dbType = "sqlite" as const;
  statements: string[] = [];

  queryOne<T>(): Promise<T | undefined> {
    return Promise.resolve(undefined);
  }

  queryAll<T>(): Promise<T[]> {
    return Promise.resolve([]);
  }

  run(sql: string): Promise<RunResult> {
    this.statements.push(sql);
    return Promise.reject(new Error("disk I/O error"));
  }

  exec(sql: string): Promise<void> {
    this.statements.push(sql);
    return sql.startsWith("ROLLBACK")
      ? Promise.reject(new Error("connection lost"))
      : Promise.resolve();
  }

  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    return fn(this);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }
}

describe("EntityManager.manage — failing connection", () => {
  it("rejects with the write error when the savepoint rollback also fails", async () => {
    const broken = new BrokenAdapter();
    const brokenEm = new EntityManager(broken, models());

    await expect(brokenEm.manage(circle("family"))).rejects.toThrow("disk I/O error");
    expect(broken.statements[0]).toBe("SAVEPOINT seedbed_manage");
    expect(broken.statements[2]).toBe("ROLLBACK TO SAVEPOINT seedbed_manage");
  });
});
