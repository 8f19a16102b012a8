// src/fixtures/committer.ts
// Hands constructed entities to the store, last-constructed first.
//
// Each manage() call stands alone: a failure is recorded and the next entity
// is tried. Nothing here begins, commits or rolls back a transaction.

import type { Logger } from "pino";
import type { EntityStore, Model } from "../orm/index.js";
import { createLogger } from "../observability/index.js";
import { PersistenceError } from "./errors.js";

const defaultLog = createLogger("fixtures/commit");

export interface CommitReport {
  /** Number of manage() calls made */
  attempted: number;
  /** Number of manage() calls that succeeded */
  managed: number;
  failures: PersistenceError[];
}

export async function commitInReverse(
  record: readonly Model[],
  store: EntityStore,
  log: Logger = defaultLog
): Promise<CommitReport> {
  const failures: PersistenceError[] = [];
  let managed = 0;

  for (let index = record.length - 1; index >= 0; index--) {
    const entity = record[index];
    try {
      await store.manage(entity);
      managed++;
    } catch (err) {
      const failure = new PersistenceError(entity.constructor.name, index, err);
      failures.push(failure);
      log.warn({ err, entityType: failure.entityType, index }, "Entity not persisted");
    }
  }

  return { attempted: record.length, managed, failures };
}
