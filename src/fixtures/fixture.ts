// src/fixtures/fixture.ts
// Loads YAML fixtures from fixtures/<name> into the store.
//
// A load goes: locate file → parse → construct → persist. Anything failing
// before persistence rejects the load with nothing written; persistence
// failures are per entity and only show up in the report.
//
// Example document:
//
//   - !Circle: &family
//     code: family
//     name: Family
//
//   - !Contact:
//     firstName: John
//     circles: [*family]

import fs from "node:fs";
import path from "node:path";
import { LineCounter, parseDocument, type Document } from "yaml";
import { config } from "../config.js";
import type { DbAdapter } from "../db/types.js";
import { enabledModels } from "../modules/registry.js";
import { createChildLogger, createLogger } from "../observability/index.js";
import { EntityManager, type EntityStore, type EntityType, type Model } from "../orm/index.js";
import { commitInReverse, type CommitReport } from "./committer.js";
import { FixtureError, MissingFixtureError, ParseError } from "./errors.js";
import { GraphBuilder } from "./graphBuilder.js";
import { createTypeRegistry } from "./tags.js";

const log = createLogger("fixtures");

/** Directory under each root that holds fixture files */
const FIXTURES_DIR = "fixtures";

/* ---------- Types ---------- */

export interface FixtureOptions {
  /** Receives every constructed entity, in reverse construction order */
  store: EntityStore;
  /** Entity types that tags may name; read once per load. Defaults to the enabled modules' types. */
  models?: () => readonly EntityType[];
  /** Directories searched, in order, for fixtures/<name>. Defaults to FIXTURE_ROOTS. */
  roots?: readonly string[];
}

export interface LoadReport extends CommitReport {
  fixture: string;
  /** Number of entity instances built from the document */
  constructed: number;
}

/* ---------- Helpers ---------- */

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Parse fixture text; the first syntax error aborts with its position */
export function parseFixture(source: string): Document {
  const lineCounter = new LineCounter();
  const doc = parseDocument(source, {
    schema: "yaml-1.1",
    merge: true,
    prettyErrors: false,
    lineCounter,
  });

  const [first] = doc.errors;
  if (first) {
    throw new ParseError(first.message, lineCounter.linePos(first.pos[0]));
  }
  return doc;
}

/* ---------- Fixture ---------- */

export class Fixture {
  private store: EntityStore;
  private models: () => readonly EntityType[];
  private roots: readonly string[];

  constructor(options: FixtureOptions) {
    this.store = options.store;
    this.models = options.models ?? enabledModels;
    this.roots = options.roots ?? config.fixtures.roots;
  }

  /**
   * Load one fixture file.
   *
   * @throws MissingFixtureError when no root has fixtures/<name>
   * @throws ParseError when the file is not well-formed YAML
   * @throws UnknownTagError when a tag names no registered entity type
   * @throws ConstructionError when a value does not fit its field
   */
  async load(name: string): Promise<LoadReport> {
    const loadLog = createChildLogger(log, { fixture: name });

    const record = this.construct(name);
    loadLog.debug({ constructed: record.length }, "Fixture constructed");

    const commit = await commitInReverse(record, this.store, loadLog);
    loadLog.info(
      { constructed: record.length, managed: commit.managed, failed: commit.failures.length },
      "Fixture loaded"
    );

    return { fixture: name, constructed: record.length, ...commit };
  }

  /** Parse and build the fixture; the file is closed on every path out */
  private construct(name: string): readonly Model[] {
    const fd = this.open(name);
    try {
      const doc = parseFixture(fs.readFileSync(fd, "utf-8"));
      const builder = new GraphBuilder(doc, createTypeRegistry(this.models()));
      builder.build();
      return builder.record;
    } catch (err) {
      if (err instanceof FixtureError) {
        err.fixture ??= name;
      }
      throw err;
    } finally {
      fs.closeSync(fd);
    }
  }

  /** Open fixtures/<name> under the first root that has it as a file */
  private open(name: string): number {
    for (const root of this.roots) {
      let fd: number;
      try {
        fd = fs.openSync(path.join(root, FIXTURES_DIR, name), "r");
      } catch (err) {
        if (isMissingFile(err)) continue;
        throw err;
      }
      if (fs.fstatSync(fd).isFile()) return fd;
      fs.closeSync(fd);
    }
    throw new MissingFixtureError(name);
  }
}

/* ---------- Transactional loading ---------- */

export interface LoadFixturesOptions {
  models?: () => readonly EntityType[];
  roots?: readonly string[];
}

/**
 * Load fixtures, in order, inside one transaction on `db`. A fixture that
 * fails to load rolls back everything loaded by this call.
 */
export async function loadFixtures(
  db: DbAdapter,
  names: readonly string[],
  options: LoadFixturesOptions = {}
): Promise<LoadReport[]> {
  const models = options.models ?? enabledModels;

  return db.transaction(async (tx) => {
    const fixture = new Fixture({
      store: new EntityManager(tx, models()),
      models,
      roots: options.roots,
    });
    const reports: LoadReport[] = [];
    for (const name of names) {
      reports.push(await fixture.load(name));
    }
    return reports;
  });
}
