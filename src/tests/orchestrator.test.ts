import fsp from "node:fs/promises";
import path from "node:path";
import { retryPolicy } from "../batch-exec.js";
import type { SqlConnection } from "../connection.js";
import { CollaboratorError } from "../errors.js";
import { LocalConnection } from "../local-connection.js";
import { MemoryLogger } from "../logger.js";
import {
  SyncOrchestrator,
  type OrchestratorDeps,
  type OrchestratorOptions,
} from "../orchestrator.js";
import { fileExists } from "../util.js";
import { FakeConnection, mkTmp, readRows, seedDb } from "./util.js";

const SEED = [
  "CREATE TABLE t(id INTEGER PRIMARY KEY, name TEXT);",
  "INSERT INTO t VALUES(1,'a');",
  "INSERT INTO t VALUES(2,'b');",
].join("\n");

function refuse(): SqlConnection {
  throw new Error("unexpected connection");
}

function deps(overrides: Partial<OrchestratorDeps> = {}): OrchestratorDeps {
  return {
    diff: async () => "",
    openRemote: refuse,
    openReplica: refuse,
    openSynced: refuse,
    openLocal: (p) => new LocalConnection(p),
    ...overrides,
  };
}

class FailingSync extends FakeConnection {
  async sync(): Promise<void> {
    throw new Error("sync server unreachable");
  }
}

describe("SyncOrchestrator", () => {
  let tmp: string;
  let options: OrchestratorOptions;

  beforeEach(async () => {
    tmp = await mkTmp("orchestrator");
    options = {
      baseline: {
        dbPath: path.join(tmp, "baseline.db"),
        dumpPath: path.join(tmp, "original_dump.sql"),
      },
      tempSnapshotPath: path.join(tmp, "temp_original.db"),
      tempPushReplicaPath: path.join(tmp, "temp_push_replica.db"),
      replicaDelayMs: 0,
      directDelayMs: 0,
    };
  });

  afterEach(async () => {
    await fsp.rm(tmp, { recursive: true, force: true });
  });

  describe("applyDiffFile", () => {
    it("does not open a connection for an empty diff", async () => {
      const db = path.join(tmp, "local.db");
      const diffFile = path.join(tmp, "diff.sql");
      seedDb(db, SEED);
      await fsp.writeFile(diffFile, "BEGIN TRANSACTION;\nCOMMIT;\n");
      const openLocal = jest.fn((p: string) => new LocalConnection(p));
      const openSynced = jest.fn(refuse);
      const o = new SyncOrchestrator(deps({ openLocal, openSynced }), options);
      const outcome = await o.applyDiffFile(db, diffFile);
      expect(outcome).toEqual({
        status: "complete",
        workflow: "apply-diff",
        noChanges: true,
      });
      expect(openLocal).not.toHaveBeenCalled();
      expect(openSynced).not.toHaveBeenCalled();
    });

    it("applies a diff to a local database without syncing", async () => {
      const db = path.join(tmp, "local.db");
      const diffFile = path.join(tmp, "diff.sql");
      seedDb(db, SEED);
      await fsp.writeFile(
        diffFile,
        [
          "BEGIN TRANSACTION;",
          "INSERT INTO t VALUES(3,'c');",
          "DELETE FROM t WHERE id=1;",
          "CREATE TABLE u(x);",
          "COMMIT;",
        ].join("\n"),
      );
      const logger = new MemoryLogger();
      const o = new SyncOrchestrator(deps(), { ...options, logger });
      const outcome = await o.applyDiffFile(db, diffFile, { noSync: true });
      expect(outcome).toMatchObject({
        status: "complete",
        summary: { batches: 3, statements: 3 },
      });
      expect(readRows(db, "SELECT id FROM t ORDER BY id")).toEqual([
        { id: 2 },
        { id: 3 },
      ]);
      expect(readRows(db, "SELECT name FROM sqlite_master WHERE name='u'")).toEqual([
        { name: "u" },
      ]);
      expect(logger.messages("info")).toContain("skipping sync (local only)");
      expect(o.registry.size).toBe(0);
    });

    it("syncs a synced database after applying", async () => {
      const db = path.join(tmp, "local.db");
      const diffFile = path.join(tmp, "diff.sql");
      seedDb(db, SEED);
      await fsp.writeFile(diffFile, "UPDATE t SET name='z' WHERE id=2;\n");
      const synced = new FakeConnection(async () => 1, "synced");
      const o = new SyncOrchestrator(
        deps({ openSynced: () => synced }),
        options,
      );
      const outcome = await o.applyDiffFile(db, diffFile);
      expect(outcome.status).toBe("complete");
      expect(synced.calls).toEqual([
        { method: "execute", sql: "UPDATE t SET name='z' WHERE id=2" },
      ]);
      expect(synced.syncs).toBe(1);
      expect(synced.closed).toBe(1);
    });

    it("fails the precondition when the database is missing", async () => {
      const db = path.join(tmp, "missing.db");
      const o = new SyncOrchestrator(deps(), options);
      const outcome = await o.applyDiffFile(db, path.join(tmp, "diff.sql"));
      expect(outcome).toEqual({
        status: "failed",
        workflow: "apply-diff",
        failure: {
          phase: "precondition",
          message: `Local database ${db} does not exist`,
        },
        summary: undefined,
      });
    });

    it("reports a sync failure after the batches applied", async () => {
      const db = path.join(tmp, "local.db");
      const diffFile = path.join(tmp, "diff.sql");
      seedDb(db, SEED);
      await fsp.writeFile(diffFile, "DELETE FROM t WHERE id=2;\n");
      const o = new SyncOrchestrator(
        deps({ openSynced: () => new FailingSync(async () => 1, "synced") }),
        options,
      );
      const outcome = await o.applyDiffFile(db, diffFile);
      expect(outcome).toMatchObject({
        status: "failed",
        failure: {
          phase: "sync",
          message: "sync applied changes failed: sync server unreachable",
        },
        summary: { batches: 1 },
      });
    });
  });

  describe("dump workflows", () => {
    let remote: string;
    let working: string;
    let diffFile: string;

    beforeEach(() => {
      remote = path.join(tmp, "remote.db");
      working = path.join(tmp, "working_copy.db");
      diffFile = path.join(tmp, "diff.sql");
      seedDb(remote, SEED);
    });

    it("requires a baseline before pushing", async () => {
      seedDb(working, SEED);
      const o = new SyncOrchestrator(deps(), options);
      const outcome = await o.dumpPush(working, diffFile);
      expect(outcome).toMatchObject({
        status: "failed",
        failure: {
          phase: "precondition",
          message: `Baseline database ${path.join(tmp, "baseline.db")} does not exist. Run dump-init first.`,
        },
      });
    });

    it("initializes, pushes a change, and refreshes the baseline", async () => {
      const diffCalls: [string, string][] = [];
      const o = new SyncOrchestrator(
        deps({
          openRemote: () => new LocalConnection(remote),
          diff: async (from, to) => {
            diffCalls.push([from, to]);
            return "BEGIN TRANSACTION;\nINSERT INTO t VALUES(3,'c');\nCOMMIT;\n";
          },
        }),
        options,
      );

      expect(await o.dumpInit(working)).toEqual({
        status: "complete",
        workflow: "dump-init",
      });
      expect(readRows(working, "SELECT id FROM t ORDER BY id")).toEqual([
        { id: 1 },
        { id: 2 },
      ]);

      seedDb(working, "INSERT INTO t VALUES(3,'c');");
      const outcome = await o.dumpPush(working, diffFile);
      expect(outcome).toMatchObject({
        status: "complete",
        workflow: "dump-push",
        summary: { batches: 1, statements: 1 },
      });
      expect(diffCalls).toEqual([[path.join(tmp, "temp_original.db"), working]]);
      expect(await fileExists(path.join(tmp, "temp_original.db"))).toBe(false);
      expect(await fsp.readFile(diffFile, "utf8")).toContain(
        "INSERT INTO t VALUES(3,'c');",
      );
      expect(readRows(remote, "SELECT id FROM t ORDER BY id")).toEqual([
        { id: 1 },
        { id: 2 },
        { id: 3 },
      ]);
      expect(await o.baseline.readDump()).toContain(
        `INSERT INTO "t" ("id", "name") VALUES (3, 'c');`,
      );
      expect(
        readRows(path.join(tmp, "baseline.db"), "SELECT COUNT(*) AS n FROM t"),
      ).toEqual([{ n: 3 }]);
    });

    it("reports the failing batch and leaves the baseline alone", async () => {
      const o = new SyncOrchestrator(
        deps({
          openRemote: () => new LocalConnection(remote),
          diff: async () => "INSERT INTO missing VALUES(1);\n",
        }),
        { ...options, retry: { INSERT: retryPolicy(200, 1, 100) } },
      );
      expect((await o.dumpInit(working)).status).toBe("complete");
      const before = await o.baseline.readDump();

      const outcome = await o.dumpPush(working, diffFile);
      expect(outcome).toMatchObject({
        status: "failed",
        workflow: "dump-push",
        failure: { phase: "execute", category: "INSERT", index: 1 },
        summary: { batches: 0, counters: { INSERT: { failed: 1 } } },
      });
      expect(outcome.status === "failed" && outcome.failure.message).toBe(
        "INSERT batch 1/1 failed after 2 attempts: no such table: missing",
      );
      expect(await o.baseline.readDump()).toBe(before);
    });

    it("removes the snapshot and connects nowhere when the diff fails", async () => {
      const openRemote = jest.fn(refuse);
      const o = new SyncOrchestrator(
        deps({
          openRemote,
          diff: async () => {
            throw new CollaboratorError(
              "sqldiff exited with code 1",
              "diff",
              1,
              "unable to open database",
            );
          },
        }),
        options,
      );
      await o.baseline.refresh(SEED);
      seedDb(working, SEED);
      expect(await o.dumpPush(working, diffFile)).toEqual({
        status: "failed",
        workflow: "dump-push",
        failure: { phase: "diff", message: "sqldiff exited with code 1" },
        summary: undefined,
      });
      expect(await fileExists(path.join(tmp, "temp_original.db"))).toBe(false);
      expect(await fileExists(diffFile)).toBe(false);
      expect(openRemote).not.toHaveBeenCalled();
    });

    it("reports no changes for an empty diff without connecting", async () => {
      const openRemote = jest.fn(refuse);
      const o = new SyncOrchestrator(
        deps({ openRemote, diff: async () => "BEGIN TRANSACTION;\nCOMMIT;\n" }),
        options,
      );
      await o.baseline.refresh(SEED);
      seedDb(working, SEED);
      expect(await o.dumpPush(working, diffFile)).toEqual({
        status: "complete",
        workflow: "dump-push",
        noChanges: true,
      });
      expect(await fileExists(path.join(tmp, "temp_original.db"))).toBe(false);
      expect(openRemote).not.toHaveBeenCalled();
    });

    it("turns a connection failure into a connect-phase outcome", async () => {
      const o = new SyncOrchestrator(
        deps({
          openRemote: () => {
            throw new Error("URL_INVALID");
          },
        }),
        options,
      );
      expect(await o.dumpInit(working)).toMatchObject({
        status: "failed",
        failure: {
          phase: "connect",
          message: "failed to open connection: URL_INVALID",
        },
      });
    });
  });

  describe("replica workflows", () => {
    it("pushes through a temporary replica and re-syncs the local one", async () => {
      const replica = path.join(tmp, "local_replica.db");
      const working = path.join(tmp, "working_copy.db");
      seedDb(replica, SEED);
      seedDb(working, SEED);
      const opened: { path: string; conn: FakeConnection }[] = [];
      const o = new SyncOrchestrator(
        deps({
          openReplica: (p) => {
            const conn = new FakeConnection(async () => 1, "replica");
            opened.push({ path: p, conn });
            return conn;
          },
          diff: async () =>
            "BEGIN TRANSACTION;\nDELETE FROM t WHERE id=1;\nINSERT INTO t VALUES(4,'d');\nCOMMIT;\n",
        }),
        options,
      );
      const outcome = await o.replicaPush(
        replica,
        working,
        path.join(tmp, "diff.sql"),
      );
      expect(outcome).toMatchObject({
        status: "complete",
        workflow: "replica-push",
        summary: { batches: 2, statements: 2 },
      });
      expect(opened.map((c) => c.path)).toEqual([
        path.join(tmp, "temp_push_replica.db"),
        replica,
      ]);
      const [temp, local] = opened;
      expect(temp?.conn.calls.map((c) => c.sql)).toEqual([
        "DELETE FROM t WHERE id=1",
        "INSERT INTO t VALUES(4,'d')",
      ]);
      expect(temp?.conn.syncs).toBe(2);
      expect(local?.conn.syncs).toBe(1);
    });

    it("reports no changes for identical databases", async () => {
      const replica = path.join(tmp, "local_replica.db");
      const working = path.join(tmp, "working_copy.db");
      seedDb(replica, SEED);
      seedDb(working, SEED);
      const openReplica = jest.fn(refuse);
      const o = new SyncOrchestrator(deps({ openReplica }), options);
      expect(
        await o.replicaPush(replica, working, path.join(tmp, "diff.sql")),
      ).toEqual({ status: "complete", workflow: "replica-push", noChanges: true });
      expect(openReplica).not.toHaveBeenCalled();
      expect(await fileExists(path.join(tmp, "diff.sql"))).toBe(false);
    });

    it("syncs the replica and copies it to a working copy", async () => {
      const replica = path.join(tmp, "local_replica.db");
      const working = path.join(tmp, "working_copy.db");
      seedDb(replica, SEED);
      const conn = new FakeConnection(async () => 1, "replica");
      const o = new SyncOrchestrator(deps({ openReplica: () => conn }), options);
      expect(await o.initWorkflow(replica, working)).toEqual({
        status: "complete",
        workflow: "init",
      });
      expect(conn.syncs).toBe(1);
      expect(readRows(working, "SELECT COUNT(*) AS n FROM t")).toEqual([{ n: 2 }]);
    });

    it("fails the copy when the source is missing", async () => {
      const o = new SyncOrchestrator(deps(), options);
      const source = path.join(tmp, "nope.db");
      expect(
        await o.copyDatabase(source, path.join(tmp, "out.db")),
      ).toMatchObject({
        status: "failed",
        failure: {
          phase: "precondition",
          message: `Source database ${source} does not exist`,
        },
      });
    });
  });

  describe("connection check", () => {
    it("queries an in-memory database without touching the remote", async () => {
      const openRemote = jest.fn(refuse);
      const o = new SyncOrchestrator(deps({ openRemote }), options);
      expect(await o.testConnection({ local: true })).toEqual({
        status: "complete",
        workflow: "test",
        tables: 0,
      });
      expect(openRemote).not.toHaveBeenCalled();
      expect(o.registry.size).toBe(0);
    });

    it("reports the remote's table count", async () => {
      const remote = path.join(tmp, "remote.db");
      seedDb(remote, SEED);
      const o = new SyncOrchestrator(
        deps({ openRemote: () => new LocalConnection(remote) }),
        options,
      );
      expect(await o.testConnection()).toEqual({
        status: "complete",
        workflow: "test",
        tables: 1,
      });
    });

    it("fails in the connect phase when the answer is wrong", async () => {
      const conn = new FakeConnection();
      const o = new SyncOrchestrator(deps({ openRemote: () => conn }), options);
      expect(await o.testConnection()).toMatchObject({
        status: "failed",
        workflow: "test",
        failure: {
          phase: "connect",
          message: "test query against fake returned undefined",
        },
      });
      expect(conn.calls).toEqual([
        { method: "executeBatch", sql: "SELECT 1; SELECT 1;" },
      ]);
      expect(conn.closed).toBe(1);
    });
  });

  describe("replication primitive", () => {
    it("pulls, reports tables, and pushes", async () => {
      const conn = new FakeConnection(async () => 1, "synced");
      const o = new SyncOrchestrator(deps({ openSynced: () => conn }), options);
      expect(await o.libsqlSync(path.join(tmp, "db"))).toEqual({
        status: "complete",
        workflow: "libsql-sync",
        tables: 0,
      });
      expect(conn.syncs).toBe(2);
    });

    it("reports a sync failure in the sync phase", async () => {
      const o = new SyncOrchestrator(
        deps({ openSynced: () => new FailingSync(async () => 1, "synced") }),
        options,
      );
      expect(await o.offlineSync(path.join(tmp, "db"), "push")).toMatchObject({
        status: "failed",
        workflow: "offline-sync",
        failure: {
          phase: "sync",
          message: "sync (push) failed: sync server unreachable",
        },
      });
      expect(o.registry.size).toBe(0);
    });
  });
});
