// src/connection.ts

export type SqlValue = null | number | bigint | string | Uint8Array | ArrayBuffer;
export type SqlRow = SqlValue[];

export type ConnectionKind = "local" | "remote" | "replica" | "synced";

/**
 * What the sync engine needs from a database. Errors surface as thrown
 * `Error`s whose message is human readable.
 */
export interface SqlConnection {
  readonly kind: ConnectionKind;
  readonly label: string;
  /** Run one statement; resolves to the affected row count. */
  execute(sql: string): Promise<number>;
  /** Run `;`-separated statements as one unit. */
  executeBatch(sql: string): Promise<void>;
  /** Rows as positional value arrays. */
  query(sql: string): Promise<SqlRow[]>;
  /** Exchange frames with the remote; fails on connections without one. */
  sync(): Promise<void>;
  close(): Promise<void>;
}

export function isSyncCapable(conn: SqlConnection): boolean {
  return conn.kind === "replica" || conn.kind === "synced";
}

export async function countTables(conn: SqlConnection): Promise<number> {
  const rows = await conn.query(
    "SELECT COUNT(*) FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%'",
  );
  const value = rows[0]?.[0];
  return typeof value === "bigint" ? Number(value) : Number(value ?? 0);
}
