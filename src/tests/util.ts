import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import Database from "better-sqlite3";
import type { ConnectionKind, SqlConnection, SqlRow } from "../connection.js";
import type { Category, Statement } from "../statements.js";

export function wait(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

export async function mkTmp(prefix: string): Promise<string> {
  return await fsp.mkdtemp(path.join(os.tmpdir(), `diff-sync-${prefix}-`));
}

/** Create (or extend) a database file by running `sql` against it. */
export function seedDb(dbPath: string, sql: string): void {
  const db = new Database(dbPath);
  try {
    db.exec(sql);
  } finally {
    db.close();
  }
}

export function readRows<T = unknown>(dbPath: string, sql: string): T[] {
  const db = new Database(dbPath, { readonly: true });
  try {
    return db.prepare<[], T>(sql).all();
  } finally {
    db.close();
  }
}

export function stmt(sql: string, category: Category): Statement {
  return { sql, category, idempotent: false };
}

export function stmts(n: number, category: Category, prefix = "s"): Statement[] {
  return Array.from({ length: n }, (_, i) => stmt(`${prefix}${i}`, category));
}

type Handler = (sql: string, call: number) => Promise<number>;

/**
 * Records every call and answers through `handler`. `sync` and `close`
 * only count.
 */
export class FakeConnection implements SqlConnection {
  readonly label = "fake";
  calls: { method: "execute" | "executeBatch"; sql: string }[] = [];
  syncs = 0;
  closed = 0;

  constructor(
    private readonly handler: Handler = async () => 1,
    readonly kind: ConnectionKind = "remote",
  ) {}

  async execute(sql: string): Promise<number> {
    this.calls.push({ method: "execute", sql });
    return await this.handler(sql, this.calls.length);
  }

  async executeBatch(sql: string): Promise<void> {
    this.calls.push({ method: "executeBatch", sql });
    await this.handler(sql, this.calls.length);
  }

  async query(): Promise<SqlRow[]> {
    return [];
  }

  async sync(): Promise<void> {
    this.syncs += 1;
  }

  async close(): Promise<void> {
    this.closed += 1;
  }
}
