// src/db.ts

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

export type Db = Database.Database;

// journal_mode stays at the default rollback journal: baseline files are
// copied byte-for-byte and must not leave state behind in a -wal file.
const PRAGMAS = ["busy_timeout = 5000", "synchronous = NORMAL"];

export function openDb(dbPath: string, opts: { readonly?: boolean } = {}): Db {
  if (dbPath !== ":memory:" && !opts.readonly) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath, {
    readonly: opts.readonly ?? false,
    fileMustExist: opts.readonly ?? false,
  });
  if (!opts.readonly) {
    for (const pragma of PRAGMAS) {
      try {
        db.pragma(pragma);
      } catch {
        // another process holding a lock may refuse a pragma; keep going
      }
    }
  }
  return db;
}

/** Run `fn` inside BEGIN IMMEDIATE … COMMIT, rolling back on error. */
export function inTransaction<T>(db: Db, fn: () => T): T {
  db.exec("BEGIN IMMEDIATE");
  try {
    const result = fn();
    db.exec("COMMIT");
    return result;
  } catch (e) {
    if (db.inTransaction) {
      db.exec("ROLLBACK");
    }
    throw e;
  }
}
