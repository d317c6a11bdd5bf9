// src/libsql-connection.ts

import { createClient, type Client, type Config } from "@libsql/client";
import type { ConnectionKind, SqlConnection, SqlRow } from "./connection.js";

export interface RemoteCredentials {
  url: string;
  authToken: string;
}

export type LibsqlTarget =
  | ({ kind: "remote" } & RemoteCredentials)
  | ({ kind: "replica" | "synced"; path: string } & RemoteCredentials)
  | { kind: "local"; path: string };

function fileUrl(path: string): string {
  return path.startsWith("file:") ? path : `file:${path}`;
}

export function clientConfig(target: LibsqlTarget): Config {
  switch (target.kind) {
    case "remote":
      return {
        url: target.url,
        authToken: target.authToken,
        intMode: "bigint",
      };
    case "replica":
    case "synced":
      return {
        url: fileUrl(target.path),
        syncUrl: target.url,
        authToken: target.authToken,
        intMode: "bigint",
      };
    case "local":
      return { url: fileUrl(target.path), intMode: "bigint" };
  }
}

export function describeTarget(target: LibsqlTarget): string {
  switch (target.kind) {
    case "remote":
      return `remote:${target.url}`;
    case "local":
      return `local:${target.path}`;
    default:
      return `${target.kind}:${target.path}<-${target.url}`;
  }
}

/** `SqlConnection` over an `@libsql/client` client. */
export class LibsqlConnection implements SqlConnection {
  readonly kind: ConnectionKind;
  readonly label: string;

  constructor(
    private readonly client: Client,
    target: LibsqlTarget,
  ) {
    this.kind = target.kind;
    this.label = describeTarget(target);
  }

  static open(target: LibsqlTarget): LibsqlConnection {
    return new LibsqlConnection(createClient(clientConfig(target)), target);
  }

  async execute(sql: string): Promise<number> {
    const rs = await this.client.execute(sql);
    return rs.rowsAffected;
  }

  async executeBatch(sql: string): Promise<void> {
    await this.client.executeMultiple(sql);
  }

  async query(sql: string): Promise<SqlRow[]> {
    const rs = await this.client.execute(sql);
    return rs.rows.map((row) => rs.columns.map((_, i) => row[i] ?? null));
  }

  async sync(): Promise<void> {
    if (this.kind !== "replica" && this.kind !== "synced") {
      throw new Error(`${this.label} has no remote to sync with`);
    }
    await this.client.sync();
  }

  async close(): Promise<void> {
    this.client.close();
  }
}
