// src/connection-registry.ts

import type { SqlConnection } from "./connection.js";

export type ConnectionHandle = `conn_${number}`;

/**
 * Hands out opaque handles for open connections. Callers own the
 * lifetime: every handle returned by `create` should eventually be
 * passed to `dispose` (or cleared with `disposeAll`).
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, SqlConnection>();
  private nextId = 0;

  get size(): number {
    return this.connections.size;
  }

  async create(
    factory: () => SqlConnection | Promise<SqlConnection>,
  ): Promise<ConnectionHandle> {
    const conn = await factory();
    // ids are never reused, even after dispose
    const handle: ConnectionHandle = `conn_${this.nextId++}`;
    this.connections.set(handle, conn);
    return handle;
  }

  has(handle: string): boolean {
    return this.connections.has(handle);
  }

  lookup(handle: string): SqlConnection {
    const conn = this.connections.get(handle);
    if (!conn) {
      throw new Error(`Connection not found: ${handle}`);
    }
    return conn;
  }

  async dispose(handle: string): Promise<void> {
    const conn = this.lookup(handle);
    this.connections.delete(handle);
    await conn.close();
  }

  async disposeAll(): Promise<void> {
    const open = [...this.connections.values()];
    this.connections.clear();
    for (const conn of open) {
      await conn.close();
    }
  }
}
