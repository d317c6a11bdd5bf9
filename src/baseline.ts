// src/baseline.ts
//
// A baseline is the last state successfully pushed to the remote, kept
// twice: as a database file (the "from" side of the next diff) and as
// the textual dump it was built from. Both halves are always rewritten
// together.

import { copyFile, readFile, rename, rm, writeFile } from "node:fs/promises";
import type { SqlConnection, SqlValue } from "./connection.js";
import { inTransaction, openDb } from "./db.js";
import { CollaboratorError, errorMessage } from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { makeIdempotent } from "./statements.js";
import { fileExists } from "./util.js";

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function toBytes(value: Uint8Array | ArrayBuffer): Buffer {
  return value instanceof Uint8Array
    ? Buffer.from(value.buffer, value.byteOffset, value.byteLength)
    : Buffer.from(value);
}

/** SQL literal for a column value, stable across dumps. */
export function renderLiteral(value: SqlValue): string {
  if (value === null) return "NULL";
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") {
    if (Number.isNaN(value)) return "NULL";
    if (!Number.isFinite(value)) return value > 0 ? "1e999" : "-1e999";
    const text = String(value);
    // keep REALs real: 2.0 must not come back as INTEGER 2
    return /^-?\d+$/.test(text) ? `${text}.0` : text;
  }
  if (typeof value === "string") return `'${value.replace(/'/g, "''")}'`;
  return `X'${toBytes(value).toString("hex").toUpperCase()}'`;
}

function asText(value: SqlValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function asInt(value: SqlValue | undefined): number {
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "number") return value;
  return 0;
}

interface ColumnInfo {
  name: string;
  pk: number;
}

async function tableColumns(
  conn: SqlConnection,
  table: string,
): Promise<ColumnInfo[]> {
  const rows = await conn.query(`PRAGMA table_info(${quoteIdent(table)})`);
  const out: ColumnInfo[] = [];
  for (const row of rows) {
    const name = asText(row[1]);
    if (name !== undefined) out.push({ name, pk: asInt(row[5]) });
  }
  return out;
}

function orderBy(columns: readonly ColumnInfo[], withoutRowid: boolean): string {
  const pk = columns
    .filter((c) => c.pk > 0)
    .sort((a, b) => a.pk - b.pk)
    .map((c) => quoteIdent(c.name));
  if (pk.length) return pk.join(", ");
  return withoutRowid ? columns.map((c) => quoteIdent(c.name)).join(", ") : "rowid";
}

/** Tables a virtual table module owns (`docs_data`, `docs_config`, ...). */
async function shadowTables(conn: SqlConnection): Promise<Set<string>> {
  const rows = await conn.query("PRAGMA table_list");
  const out = new Set<string>();
  for (const row of rows) {
    const name = asText(row[1]);
    if (asText(row[0]) === "main" && asText(row[2]) === "shadow" && name) {
      out.add(name);
    }
  }
  return out;
}

/**
 * Schema and data as SQL text: idempotent CREATE TABLEs by name, one
 * INSERT per row in key order, then indexes, views and triggers.
 * Shadow tables are left out; a virtual table's rows are dumped through
 * its own columns so rebuilding it repopulates the module's storage.
 * Dumping an unchanged database twice yields identical text.
 */
export async function dumpDatabase(conn: SqlConnection): Promise<string> {
  const lines: string[] = [];
  const shadows = await shadowTables(conn);
  const tables = await conn.query(
    "SELECT name, sql FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name",
  );
  const dataTables: { name: string; withoutRowid: boolean }[] = [];
  for (const row of tables) {
    const name = asText(row[0]);
    const sql = asText(row[1]);
    if (!name || !sql || shadows.has(name)) continue;
    lines.push(`${makeIdempotent(sql)};`);
    dataTables.push({ name, withoutRowid: /\bWITHOUT\s+ROWID\b/i.test(sql) });
  }

  for (const { name, withoutRowid } of dataTables) {
    const columns = await tableColumns(conn, name);
    if (!columns.length) continue;
    const columnList = columns.map((c) => quoteIdent(c.name)).join(", ");
    const rows = await conn.query(
      `SELECT ${columnList} FROM ${quoteIdent(name)} ORDER BY ${orderBy(columns, withoutRowid)}`,
    );
    for (const row of rows) {
      const values = columns.map((_, i) => renderLiteral(row[i] ?? null));
      lines.push(
        `INSERT INTO ${quoteIdent(name)} (${columnList}) VALUES (${values.join(", ")});`,
      );
    }
  }

  const objects = await conn.query(
    "SELECT sql FROM sqlite_master WHERE type IN ('index', 'view', 'trigger') AND name NOT LIKE 'sqlite_%' AND sql IS NOT NULL ORDER BY CASE type WHEN 'index' THEN 0 WHEN 'view' THEN 1 ELSE 2 END, name",
  );
  for (const row of objects) {
    const sql = asText(row[0]);
    if (sql) lines.push(`${makeIdempotent(sql)};`);
  }
  return lines.length ? lines.join("\n") + "\n" : "";
}

async function removeDbFiles(dbPath: string): Promise<void> {
  for (const suffix of ["", "-journal", "-wal", "-shm"]) {
    await rm(dbPath + suffix, { force: true });
  }
}

/** Replace whatever is at `dbPath` with a fresh database built from `dump`. */
export async function materializeDump(
  dump: string,
  dbPath: string,
): Promise<void> {
  await removeDbFiles(dbPath);
  const db = openDb(dbPath);
  try {
    inTransaction(db, () => db.exec(dump));
  } catch (err) {
    db.close();
    await removeDbFiles(dbPath);
    throw new CollaboratorError(
      `failed to build ${dbPath} from dump: ${errorMessage(err)}`,
      "materialize",
      null,
      errorMessage(err),
      { dbPath },
    );
  }
  db.close();
}

export interface BaselinePaths {
  dbPath: string;
  dumpPath: string;
}

export class Baseline {
  readonly dbPath: string;
  readonly dumpPath: string;
  private readonly logger: Logger;

  constructor({ dbPath, dumpPath }: BaselinePaths, logger?: Logger) {
    this.dbPath = dbPath;
    this.dumpPath = dumpPath;
    this.logger = logger ?? new NullLogger();
  }

  async exists(): Promise<boolean> {
    return await fileExists(this.dbPath);
  }

  async readDump(): Promise<string> {
    return await readFile(this.dumpPath, "utf8");
  }

  /** Copy the baseline database file to `dest`. */
  async snapshot(dest: string): Promise<void> {
    await removeDbFiles(dest);
    await copyFile(this.dbPath, dest);
  }

  /**
   * Rebuild both halves from `dump`. The new database is built beside
   * the old one and renamed into place, so a failed rebuild leaves the
   * previous baseline intact.
   */
  async refresh(dump: string): Promise<void> {
    const started = Date.now();
    const tmpDb = `${this.dbPath}.tmp`;
    const tmpDump = `${this.dumpPath}.tmp`;
    await materializeDump(dump, tmpDb);
    await writeFile(tmpDump, dump, "utf8");
    await removeDbFiles(this.dbPath);
    await rename(tmpDb, this.dbPath);
    await rename(tmpDump, this.dumpPath);
    this.logger.info("baseline refreshed", {
      db: this.dbPath,
      dump: this.dumpPath,
      bytes: Buffer.byteLength(dump),
      elapsedMs: Date.now() - started,
    });
  }

  /** Dump `conn` and rebuild the baseline from it. */
  async refreshFrom(conn: SqlConnection): Promise<string> {
    const dump = await dumpDatabase(conn);
    await this.refresh(dump);
    return dump;
  }
}
