// src/store/sequences.ts
// Named number sequences: prefix + zero-padded counter + suffix.
//
// Tables: meta_sequence (seeded from fixtures, see fixtures/sequence-data.yml)
//
// Functions take the adapter explicitly so they run inside the caller's
// transaction; reading and advancing a sequence must share one.

import type { DbAdapter } from "../db/types.js";

/* ---------- Types ---------- */

// Row type (snake_case, matches DB)
interface SequenceRow {
  id: string;
  name: string;
  prefix: string | null;
  suffix: string | null;
  padding: number;
  increment_by: number;
  next_num: number;
}

/** Thrown when no sequence has the requested name */
export class SequenceNotFoundError extends Error {
  constructor(name: string) {
    super(`No such sequence: ${name}`);
    this.name = "SequenceNotFoundError";
  }
}

/* ---------- Formatting ---------- */

export function formatSequenceValue(
  value: number,
  opts: { prefix?: string | null; suffix?: string | null; padding?: number }
): string {
  const padded = String(value).padStart(opts.padding ?? 0, "0");
  return `${opts.prefix ?? ""}${padded}${opts.suffix ?? ""}`;
}

/* ---------- Operations ---------- */

async function getRow(db: DbAdapter, name: string): Promise<SequenceRow> {
  const row = await db.queryOne<SequenceRow>(
    `SELECT * FROM meta_sequence WHERE name = ?`,
    [name]
  );
  if (!row) throw new SequenceNotFoundError(name);
  return row;
}

/** Return the next value of a sequence and advance it */
export async function nextValue(db: DbAdapter, name: string): Promise<string> {
  const row = await getRow(db, name);
  const current = Number(row.next_num);

  await db.run(
    `UPDATE meta_sequence SET next_num = ? WHERE id = ?`,
    [current + Number(row.increment_by), row.id]
  );

  return formatSequenceValue(current, {
    prefix: row.prefix,
    suffix: row.suffix,
    padding: Number(row.padding),
  });
}

/** Make `value` the next number handed out by a sequence */
export async function setNext(db: DbAdapter, name: string, value: number): Promise<void> {
  const row = await getRow(db, name);
  await db.run(`UPDATE meta_sequence SET next_num = ? WHERE id = ?`, [value, row.id]);
}

export const SequenceStore = {
  nextValue,
  setNext,
  format: formatSequenceValue,
};
