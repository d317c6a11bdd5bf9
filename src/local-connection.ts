// src/local-connection.ts

import { openDb, inTransaction, type Db } from "./db.js";
import type { SqlConnection, SqlRow, SqlValue } from "./connection.js";

function toSqlValue(value: unknown): SqlValue {
  if (
    value === null ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    typeof value === "string" ||
    value instanceof Uint8Array
  ) {
    return value;
  }
  if (value === undefined) return null;
  throw new TypeError(`unexpected column value of type ${typeof value}`);
}

function toSqlRow(row: unknown): SqlRow {
  if (!Array.isArray(row)) {
    throw new TypeError("expected a raw row array");
  }
  return row.map(toSqlValue);
}

/**
 * A plain on-disk database with no remote behind it. Used for
 * local-only diff application and as the in-process stand-in for a
 * remote database in tests.
 */
export class LocalConnection implements SqlConnection {
  readonly kind = "local" as const;
  readonly label: string;
  private readonly db: Db;

  constructor(
    public readonly path: string,
    opts: { readonly?: boolean } = {},
  ) {
    this.db = openDb(path, opts);
    this.label = `local:${path}`;
  }

  async execute(sql: string): Promise<number> {
    return this.db.prepare(sql).run().changes;
  }

  async executeBatch(sql: string): Promise<void> {
    inTransaction(this.db, () => this.db.exec(sql));
  }

  async query(sql: string): Promise<SqlRow[]> {
    const stmt = this.db.prepare(sql);
    if (!stmt.reader) {
      stmt.run();
      return [];
    }
    return stmt.raw(true).safeIntegers(true).all().map(toSqlRow);
  }

  async sync(): Promise<void> {
    throw new Error(`${this.label} has no remote to sync with`);
  }

  async close(): Promise<void> {
    if (this.db.open) this.db.close();
  }
}
