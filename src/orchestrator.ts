// src/orchestrator.ts

import { copyFile, readFile, rm, writeFile } from "node:fs/promises";
import { Baseline, dumpDatabase } from "./baseline.js";
import { planBatches, type BatchLimits } from "./batch-plan.js";
import {
  SyncSession,
  type RetryPolicies,
  type RunSummary,
} from "./batch-exec.js";
import { DEFAULT_PATHS, directDelayMs, replicaPushDelayMs } from "./config.js";
import { ConnectionRegistry } from "./connection-registry.js";
import { countTables, type SqlConnection } from "./connection.js";
import {
  CollaboratorError,
  PreconditionError,
  errorMessage,
  toFailure,
  type SyncFailure,
} from "./errors.js";
import {
  LibsqlConnection,
  type RemoteCredentials,
} from "./libsql-connection.js";
import { LocalConnection } from "./local-connection.js";
import { NullLogger, type Logger } from "./logger.js";
import { sqldiff, type DiffFn } from "./sqldiff.js";
import {
  CATEGORIES,
  countStatements,
  prepareDiff,
  type ClassificationPolicy,
} from "./statements.js";
import { fileExists } from "./util.js";

export type Workflow =
  | "replica-sync"
  | "copy"
  | "replica-push"
  | "dump-init"
  | "dump-push"
  | "offline-sync"
  | "libsql-sync"
  | "apply-diff"
  | "init"
  | "test";

export type SyncDirection = "pull" | "push" | "both";

export interface CompleteDetails {
  /** nothing to apply: the diff had no statements */
  noChanges?: boolean;
  summary?: RunSummary;
  diffBytes?: number;
  tables?: number;
}

export type SyncOutcome =
  | ({ status: "complete"; workflow: Workflow } & CompleteDetails)
  | {
      status: "failed";
      workflow: Workflow;
      failure: SyncFailure;
      summary?: RunSummary;
    };

type ConnectionFactory = () => SqlConnection | Promise<SqlConnection>;

export interface OrchestratorDeps {
  diff: DiffFn;
  /** direct connection to the remote database */
  openRemote: ConnectionFactory;
  /** embedded replica at `path` kept in step with the remote */
  openReplica: (path: string) => SqlConnection | Promise<SqlConnection>;
  /** local database at `path` that accepts writes and syncs them */
  openSynced: (path: string) => SqlConnection | Promise<SqlConnection>;
  openLocal: (path: string) => SqlConnection | Promise<SqlConnection>;
}

export interface OrchestratorOptions {
  logger?: Logger;
  registry?: ConnectionRegistry;
  policy?: ClassificationPolicy;
  limits?: Partial<BatchLimits>;
  retry?: Partial<RetryPolicies>;
  baseline?: { dbPath?: string; dumpPath?: string };
  tempSnapshotPath?: string;
  tempPushReplicaPath?: string;
  replicaDelayMs?: number;
  directDelayMs?: number;
}

export function libsqlDeps(
  creds: RemoteCredentials,
  logger?: Logger,
): OrchestratorDeps {
  return {
    diff: sqldiff(logger),
    openRemote: () => LibsqlConnection.open({ kind: "remote", ...creds }),
    openReplica: (path) =>
      LibsqlConnection.open({ kind: "replica", path, ...creds }),
    openSynced: (path) =>
      LibsqlConnection.open({ kind: "synced", path, ...creds }),
    openLocal: (path) => new LocalConnection(path),
  };
}

interface RunState {
  session?: SyncSession;
}

async function requireFile(path: string, what: string): Promise<void> {
  if (!(await fileExists(path))) {
    throw new PreconditionError(`${what} ${path} does not exist`, { path });
  }
}

export class SyncOrchestrator {
  readonly registry: ConnectionRegistry;
  readonly baseline: Baseline;
  private readonly logger: Logger;
  private readonly opts: OrchestratorOptions;

  constructor(
    private readonly deps: OrchestratorDeps,
    opts: OrchestratorOptions = {},
  ) {
    this.opts = opts;
    this.logger = opts.logger ?? new NullLogger();
    this.registry = opts.registry ?? new ConnectionRegistry();
    this.baseline = new Baseline(
      {
        dbPath: opts.baseline?.dbPath ?? DEFAULT_PATHS.baselineDb,
        dumpPath: opts.baseline?.dumpPath ?? DEFAULT_PATHS.baselineDump,
      },
      this.logger.child("baseline"),
    );
  }

  /** Pull the remote into an embedded replica with one `sync()`. */
  replicaSync(replicaPath: string): Promise<SyncOutcome> {
    return this.guard("replica-sync", async () => {
      await this.withConnection(
        () => this.deps.openReplica(replicaPath),
        (conn) => this.syncOrFail(conn, "sync replica"),
      );
      this.logger.info(`synced remote into ${replicaPath}`);
      return {};
    });
  }

  copyDatabase(source: string, dest: string): Promise<SyncOutcome> {
    return this.guard("copy", async () => {
      await this.copy(source, dest);
      return {};
    });
  }

  /**
   * Diff the replica against the working copy and replay the diff
   * through a temporary replica, then bring the local replica forward.
   */
  replicaPush(
    replicaPath: string,
    workingPath: string,
    diffFile: string,
  ): Promise<SyncOutcome> {
    return this.guard("replica-push", async (state) => {
      await requireFile(replicaPath, "Local replica");
      await requireFile(workingPath, "Working copy");
      const diff = await this.diff(replicaPath, workingPath);
      if (!countStatements(prepareDiff(diff))) {
        this.logger.info("no changes detected - databases are identical");
        return { noChanges: true };
      }
      await this.saveDiff(diffFile, diff);

      const tempReplica =
        this.opts.tempPushReplicaPath ?? DEFAULT_PATHS.tempPushReplica;
      let summary: RunSummary;
      try {
        summary = await this.withConnection(
          () => this.deps.openReplica(tempReplica),
          async (conn) => {
            await this.syncOrFail(conn, "sync replica before push");
            const result = await this.apply(
              conn,
              diff,
              this.opts.replicaDelayMs ?? replicaPushDelayMs(),
              state,
            );
            await this.syncOrFail(conn, "sync changes to remote");
            return result;
          },
        );
      } finally {
        await rm(tempReplica, { force: true });
      }

      const refreshed = await this.replicaSync(replicaPath);
      if (refreshed.status === "failed") {
        throw new CollaboratorError(refreshed.failure.message, "sync");
      }
      return { summary, diffBytes: Buffer.byteLength(diff) };
    });
  }

  /** Dump the remote into a fresh baseline and copy it to the working path. */
  dumpInit(workingPath: string): Promise<SyncOutcome> {
    return this.guard("dump-init", async () => {
      const dump = await this.withConnection(this.deps.openRemote, (conn) =>
        this.dump(conn),
      );
      await this.baseline.refresh(dump);
      await this.copy(this.baseline.dbPath, workingPath);
      return {};
    });
  }

  /**
   * Diff the baseline against the working copy, replay the diff on the
   * remote, and rebuild the baseline from a fresh remote dump.
   */
  dumpPush(workingPath: string, diffFile: string): Promise<SyncOutcome> {
    return this.guard("dump-push", async (state) => {
      await requireFile(workingPath, "Local database");
      if (!(await this.baseline.exists())) {
        throw new PreconditionError(
          `Baseline database ${this.baseline.dbPath} does not exist. Run dump-init first.`,
        );
      }
      const snapshot = this.opts.tempSnapshotPath ?? DEFAULT_PATHS.tempSnapshot;
      let diff: string;
      try {
        await this.baseline.snapshot(snapshot);
        diff = await this.diff(snapshot, workingPath);
      } finally {
        await rm(snapshot, { force: true });
      }
      if (!countStatements(prepareDiff(diff))) {
        this.logger.info("no changes detected - databases are identical");
        return { noChanges: true };
      }
      await this.saveDiff(diffFile, diff);

      const summary = await this.withConnection(
        this.deps.openRemote,
        async (conn) => {
          const result = await this.apply(
            conn,
            diff,
            this.opts.directDelayMs ?? directDelayMs(),
            state,
          );
          const dump = await this.dump(conn);
          try {
            await this.baseline.refresh(dump);
          } catch (err) {
            throw new CollaboratorError(
              `changes were applied but the baseline could not be refreshed: ${errorMessage(err)}`,
              "baseline",
            );
          }
          return result;
        },
      );
      return { summary, diffBytes: Buffer.byteLength(diff) };
    });
  }

  /** Hand both directions to the replication primitive. */
  offlineSync(
    dbPath: string,
    direction: SyncDirection = "both",
  ): Promise<SyncOutcome> {
    return this.guard("offline-sync", async () => {
      const tables = await this.withConnection(
        () => this.deps.openSynced(dbPath),
        async (conn) => {
          this.logger.info(`syncing ${dbPath}`, { direction });
          await this.syncOrFail(conn, `sync (${direction})`);
          return await this.reportTables(conn);
        },
      );
      return { tables };
    });
  }

  /** Pull, report the table count, then push. */
  libsqlSync(dbPath: string): Promise<SyncOutcome> {
    return this.guard("libsql-sync", async () => {
      const tables = await this.withConnection(
        () => this.deps.openSynced(dbPath),
        async (conn) => {
          await this.syncOrFail(conn, "pull from remote");
          const count = await this.reportTables(conn);
          await this.syncOrFail(conn, "push to remote");
          return count;
        },
      );
      return { tables };
    });
  }

  /**
   * Apply a diff file to `dbPath`, either as a plain local database
   * (`noSync`) or as a synced database followed by one `sync()`.
   */
  applyDiffFile(
    dbPath: string,
    diffFile: string,
    { noSync = false }: { noSync?: boolean } = {},
  ): Promise<SyncOutcome> {
    return this.guard("apply-diff", async (state) => {
      await requireFile(dbPath, "Local database");
      await requireFile(diffFile, "Diff file");
      const diff = await readFile(diffFile, "utf8");
      if (!countStatements(prepareDiff(diff))) {
        this.logger.info("no changes detected - diff file is empty");
        return { noChanges: true };
      }
      this.logger.info(`read diff file ${diffFile}`, {
        bytes: Buffer.byteLength(diff),
      });
      const open = noSync ? this.deps.openLocal : this.deps.openSynced;
      const summary = await this.withConnection(
        () => open(dbPath),
        async (conn) => {
          const result = await this.apply(
            conn,
            diff,
            this.opts.directDelayMs ?? directDelayMs(),
            state,
          );
          if (noSync) {
            this.logger.info("skipping sync (local only)");
          } else {
            await this.syncOrFail(conn, "sync applied changes");
          }
          return result;
        },
      );
      return { summary, diffBytes: Buffer.byteLength(diff) };
    });
  }

  /** Sync the replica and copy it to a working copy. */
  initWorkflow(replicaPath: string, workingPath: string): Promise<SyncOutcome> {
    return this.guard("init", async () => {
      const synced = await this.replicaSync(replicaPath);
      if (synced.status === "failed") {
        throw new CollaboratorError(synced.failure.message, "sync");
      }
      await this.copy(replicaPath, workingPath);
      this.logger.info(`working copy ready at ${workingPath}`, {
        pull: `sync --replica-path ${replicaPath}`,
        push: `push --replica-path ${replicaPath} --working-path ${workingPath}`,
      });
      return {};
    });
  }

  /**
   * Round-trip trivial queries over a connection to the remote, or to a
   * throwaway in-memory database when `local` is set. Writes nothing.
   */
  testConnection({ local = false }: { local?: boolean } = {}): Promise<SyncOutcome> {
    return this.guard("test", async () => {
      const tables = await this.withConnection(
        local ? () => this.deps.openLocal(":memory:") : this.deps.openRemote,
        async (conn) => {
          const started = Date.now();
          let value: unknown;
          try {
            await conn.executeBatch("SELECT 1; SELECT 1;");
            value = (await conn.query("SELECT 1"))[0]?.[0];
          } catch (err) {
            throw new CollaboratorError(
              `test query against ${conn.label} failed: ${errorMessage(err)}`,
              "connect",
            );
          }
          if (Number(value) !== 1) {
            throw new CollaboratorError(
              `test query against ${conn.label} returned ${String(value)}`,
              "connect",
            );
          }
          this.logger.info(`connected to ${conn.label}`, {
            elapsedMs: Date.now() - started,
          });
          return await this.reportTables(conn);
        },
      );
      return { tables };
    });
  }

  private async guard(
    workflow: Workflow,
    body: (state: RunState) => Promise<CompleteDetails>,
  ): Promise<SyncOutcome> {
    const state: RunState = {};
    const started = Date.now();
    try {
      const details = await body(state);
      this.logger.info(`${workflow} complete`, {
        elapsedMs: Date.now() - started,
      });
      return { status: "complete", workflow, ...details };
    } catch (err) {
      const failure = toFailure(err, "execute");
      this.logger.error(`${workflow} failed`, { ...failure });
      return {
        status: "failed",
        workflow,
        failure,
        summary: state.session?.summary(started),
      };
    }
  }

  private async withConnection<T>(
    factory: ConnectionFactory,
    fn: (conn: SqlConnection) => Promise<T>,
  ): Promise<T> {
    let handle: string;
    try {
      handle = await this.registry.create(factory);
    } catch (err) {
      throw new CollaboratorError(
        `failed to open connection: ${errorMessage(err)}`,
        "connect",
      );
    }
    try {
      return await fn(this.registry.lookup(handle));
    } finally {
      await this.registry.dispose(handle);
    }
  }

  private async syncOrFail(conn: SqlConnection, what: string): Promise<void> {
    const started = Date.now();
    try {
      await conn.sync();
    } catch (err) {
      throw new CollaboratorError(
        `${what} failed: ${errorMessage(err)}`,
        "sync",
      );
    }
    this.logger.info(`${what} done`, { elapsedMs: Date.now() - started });
  }

  private async reportTables(conn: SqlConnection): Promise<number | undefined> {
    try {
      const tables = await countTables(conn);
      this.logger.info(`database contains ${tables} tables`);
      return tables;
    } catch (err) {
      this.logger.warn("could not query database schema", {
        error: errorMessage(err),
      });
      return undefined;
    }
  }

  private async diff(fromPath: string, toPath: string): Promise<string> {
    const started = Date.now();
    const text = await this.deps.diff(fromPath, toPath);
    this.logger.info("generated diff", {
      from: fromPath,
      to: toPath,
      bytes: Buffer.byteLength(text),
      elapsedMs: Date.now() - started,
    });
    return text;
  }

  private async dump(conn: SqlConnection): Promise<string> {
    const started = Date.now();
    let dump: string;
    try {
      dump = await dumpDatabase(conn);
    } catch (err) {
      throw new CollaboratorError(
        `failed to dump ${conn.label}: ${errorMessage(err)}`,
        "dump",
      );
    }
    this.logger.info("retrieved dump", {
      source: conn.label,
      bytes: Buffer.byteLength(dump),
      elapsedMs: Date.now() - started,
    });
    return dump;
  }

  private async saveDiff(diffFile: string, diff: string): Promise<void> {
    await writeFile(diffFile, diff, "utf8");
    this.logger.info(`saved diff to ${diffFile}`);
  }

  private async copy(source: string, dest: string): Promise<void> {
    await requireFile(source, "Source database");
    const started = Date.now();
    await copyFile(source, dest);
    this.logger.info(`copied ${source} to ${dest}`, {
      elapsedMs: Date.now() - started,
    });
  }

  private async apply(
    conn: SqlConnection,
    diff: string,
    delayMs: number,
    state: RunState,
  ): Promise<RunSummary> {
    const buckets = prepareDiff(diff, this.opts.policy);
    this.logger.info(`applying ${countStatements(buckets)} statements`, {
      target: conn.label,
      ...Object.fromEntries(CATEGORIES.map((c) => [c, buckets[c].length])),
    });
    const session = new SyncSession(conn, {
      retry: this.opts.retry,
      delayMs,
      logger: this.logger.child("exec"),
    });
    state.session = session;
    return await session.run(planBatches(buckets, this.opts.limits));
  }
}
