// src/sync-cli.ts

import { Command, Option } from "commander";
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import { DEFAULT_BATCH_LIMITS, type BatchLimits } from "./batch-plan.js";
import {
  DEFAULT_RETRY_POLICIES,
  retryPolicy,
  type RetryPolicies,
  type RunSummary,
} from "./batch-exec.js";
import {
  DEFAULT_PATHS,
  SYNC_URL_FLAGS,
  resolveCredentials,
  type CredentialFlags,
} from "./config.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage } from "./errors.js";
import type { RemoteCredentials } from "./libsql-connection.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import {
  SyncOrchestrator,
  libsqlDeps,
  type OrchestratorDeps,
  type OrchestratorOptions,
  type SyncDirection,
  type SyncOutcome,
} from "./orchestrator.js";
import { CATEGORIES } from "./statements.js";
import { fmtMs, parsePositiveInt } from "./util.js";

/** Builds the dependencies a command runs against; swapped out in tests. */
export type DepsFactory = (
  creds: RemoteCredentials | undefined,
  logger: Logger,
) => OrchestratorDeps;

const NO_REMOTE: RemoteCredentials = { url: "", authToken: "" };

const defaultDeps: DepsFactory = (creds, logger) =>
  libsqlDeps(creds ?? NO_REMOTE, logger);

interface RemoteOpts {
  url?: string;
  token?: string;
}

/** Remote options plus the flag names the command spells them with. */
type RemoteRequest = RemoteOpts & { flags?: CredentialFlags };

interface ApplyOpts {
  table?: string[];
  deleteBatch?: string;
  insertBatch?: string;
  maxRetries?: string;
}

function collectList(value: string, previous: string[] = []): string[] {
  return previous.concat(
    value
      .split(",")
      .map((v) => v.trim())
      .filter(Boolean),
  );
}

function withApplyOptions(cmd: Command): Command {
  return cmd
    .option(
      "--table <name>",
      "only batch DELETE/INSERT statements for these tables (repeat or comma-separated)",
      collectList,
    )
    .option(
      "--delete-batch <n>",
      "DELETE statements per batch",
      String(DEFAULT_BATCH_LIMITS.DELETE),
    )
    .option(
      "--insert-batch <n>",
      "INSERT statements per batch",
      String(DEFAULT_BATCH_LIMITS.INSERT),
    )
    .option("--max-retries <n>", "retries per batch after the first attempt", "1");
}

export function retryPoliciesFor(maxRetries: number): RetryPolicies {
  const out: Partial<RetryPolicies> = {};
  for (const category of CATEGORIES) {
    const [first = 10_000, retry = first] =
      DEFAULT_RETRY_POLICIES[category].timeoutsMs;
    out[category] = retryPolicy(first, maxRetries, retry);
  }
  return { ...DEFAULT_RETRY_POLICIES, ...out };
}

export function applyOptionsFrom(opts: ApplyOpts): OrchestratorOptions {
  const limits: Partial<BatchLimits> = {
    DELETE: parsePositiveInt(opts.deleteBatch, DEFAULT_BATCH_LIMITS.DELETE),
    INSERT: parsePositiveInt(opts.insertBatch, DEFAULT_BATCH_LIMITS.INSERT),
  };
  const maxRetries = Number.parseInt(opts.maxRetries ?? "1", 10);
  return {
    limits,
    retry: retryPoliciesFor(
      Number.isInteger(maxRetries) && maxRetries >= 0 ? maxRetries : 1,
    ),
    policy: opts.table?.length ? { tables: opts.table } : {},
  };
}

export function renderSummary(summary: RunSummary): string {
  const table = new AsciiTable3("Applied")
    .setHeading("Category", "Batches", "Statements", "Affected", "Failed")
    .setStyle("unicode-round");
  table.setAlign(1, AlignmentEnum.LEFT);
  for (const category of CATEGORIES) {
    const c = summary.counters[category];
    table.addRow(category, c.batches, c.statements, c.affected, c.failed);
  }
  table.addRow(
    "total",
    summary.batches,
    summary.statements,
    summary.affected,
    "",
  );
  return `${table.toString().trimEnd()}\nelapsed ${fmtMs(summary.elapsedMs)}`;
}

export function describeOutcome(outcome: SyncOutcome): string {
  if (outcome.status === "complete") {
    if (outcome.noChanges) return `${outcome.workflow}: no changes`;
    const tables =
      outcome.tables !== undefined ? ` (${outcome.tables} tables)` : "";
    return `${outcome.workflow}: complete${tables}`;
  }
  const { phase, category, index, message } = outcome.failure;
  const where =
    category !== undefined
      ? ` (${category}${index !== undefined ? ` batch ${index}` : ""})`
      : "";
  return `${outcome.workflow}: failed during ${phase}${where}: ${message}`;
}

function report(outcome: SyncOutcome): void {
  if (outcome.summary) console.log(renderSummary(outcome.summary));
  if (outcome.status === "complete") {
    console.log(describeOutcome(outcome));
  } else {
    console.error(describeOutcome(outcome));
    process.exitCode = 1;
  }
}

function loggerFor(command: Command): Logger {
  const raw: unknown = command.optsWithGlobals().logLevel;
  return new ConsoleLogger(
    parseLogLevel(typeof raw === "string" ? raw : undefined),
  );
}

export function buildProgram(makeDeps: DepsFactory = defaultDeps): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Push a local SQLite working copy to a remote libSQL database as a batched SQL diff",
    )
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    )
    .option("--baseline-db <file>", "baseline database", DEFAULT_PATHS.baselineDb)
    .option(
      "--original-dump <file>",
      "baseline dump file",
      DEFAULT_PATHS.baselineDump,
    );

  /**
   * Resolve credentials when the command talks to the remote, build an
   * orchestrator, run `fn`, and report. Configuration errors are
   * reported like any other failure.
   */
  const run = async (
    command: Command,
    remote: RemoteRequest | undefined,
    extra: OrchestratorOptions,
    fn: (orchestrator: SyncOrchestrator) => Promise<SyncOutcome>,
  ) => {
    const logger = loggerFor(command);
    let creds: RemoteCredentials | undefined;
    try {
      creds = remote
        ? resolveCredentials(remote, process.env, remote.flags)
        : undefined;
    } catch (err) {
      console.error(errorMessage(err));
      process.exitCode = 1;
      return;
    }
    const globals = command.optsWithGlobals();
    const baselineDb: unknown = globals.baselineDb;
    const originalDump: unknown = globals.originalDump;
    const orchestrator = new SyncOrchestrator(makeDeps(creds, logger), {
      logger,
      baseline: {
        dbPath: typeof baselineDb === "string" ? baselineDb : undefined,
        dumpPath: typeof originalDump === "string" ? originalDump : undefined,
      },
      ...extra,
    });
    try {
      report(await fn(orchestrator));
    } finally {
      await orchestrator.registry.disposeAll();
    }
  };

  program
    .command("sync")
    .description("Sync from the remote into a local embedded replica")
    .option("-r, --replica-path <path>", "local replica", DEFAULT_PATHS.replica)
    .option("-u, --url <url>", "remote database URL")
    .option("-t, --token <token>", "remote auth token")
    .action(
      async (opts: RemoteOpts & { replicaPath: string }, command: Command) =>
        run(command, opts, {}, (o) => o.replicaSync(opts.replicaPath)),
    );

  program
    .command("copy")
    .description("Copy a database file (replica to working copy)")
    .option("-s, --source <path>", "source database", DEFAULT_PATHS.replica)
    .option("-d, --dest <path>", "destination database", DEFAULT_PATHS.working)
    .action(async (opts: { source: string; dest: string }, command: Command) =>
      run(command, undefined, {}, (o) => o.copyDatabase(opts.source, opts.dest)),
    );

  withApplyOptions(
    program
      .command("push")
      .description("Diff replica against working copy and apply it through a replica")
      .option("-r, --replica-path <path>", "local replica", DEFAULT_PATHS.replica)
      .option("-w, --working-path <path>", "working copy", DEFAULT_PATHS.working)
      .option("--url <url>", "remote database URL")
      .option("--token <token>", "remote auth token")
      .option("--diff-file <file>", "where to keep the diff", DEFAULT_PATHS.diff),
  ).action(
    async (
      opts: RemoteOpts &
        ApplyOpts & { replicaPath: string; workingPath: string; diffFile: string },
      command: Command,
    ) =>
      run(command, opts, applyOptionsFrom(opts), (o) =>
        o.replicaPush(opts.replicaPath, opts.workingPath, opts.diffFile),
      ),
  );

  program
    .command("dump-init")
    .description("Build the baseline from a remote dump and copy it to the working copy")
    .option("-d, --db-path <path>", "working copy", DEFAULT_PATHS.working)
    .option("-u, --url <url>", "remote database URL")
    .option("-t, --token <token>", "remote auth token")
    .action(async (opts: RemoteOpts & { dbPath: string }, command: Command) =>
      run(command, opts, {}, (o) => o.dumpInit(opts.dbPath)),
    );

  withApplyOptions(
    program
      .command("dump-push")
      .description("Diff baseline against working copy, apply to the remote, refresh the baseline")
      .option("-d, --db-path <path>", "working copy", DEFAULT_PATHS.working)
      .option("-u, --url <url>", "remote database URL")
      .option("-t, --token <token>", "remote auth token")
      .option("--diff-file <file>", "where to keep the diff", DEFAULT_PATHS.diff),
  ).action(
    async (
      opts: RemoteOpts & ApplyOpts & { dbPath: string; diffFile: string },
      command: Command,
    ) =>
      run(command, opts, applyOptionsFrom(opts), (o) =>
        o.dumpPush(opts.dbPath, opts.diffFile),
      ),
  );

  withApplyOptions(
    program
      .command("apply-diff")
      .description("Apply a diff file to a database, then sync it to the remote")
      .option("-d, --db-path <path>", "database to apply to", DEFAULT_PATHS.replica)
      .option("-f, --diff-file <file>", "diff file", DEFAULT_PATHS.diff)
      .option("-s, --sync-url <url>", "remote database URL")
      .option("-t, --token <token>", "remote auth token")
      .option("--no-sync", "apply locally only and skip the sync"),
  ).action(
    async (
      opts: ApplyOpts & {
        dbPath: string;
        diffFile: string;
        syncUrl?: string;
        token?: string;
        sync: boolean;
      },
      command: Command,
    ) =>
      run(
        command,
        opts.sync
          ? { url: opts.syncUrl, token: opts.token, flags: SYNC_URL_FLAGS }
          : undefined,
        applyOptionsFrom(opts),
        (o) => o.applyDiffFile(opts.dbPath, opts.diffFile, { noSync: !opts.sync }),
      ),
  );

  program
    .command("offline-sync")
    .description("Sync a database with the remote using the replication primitive")
    .option("-d, --db-path <path>", "local database", DEFAULT_PATHS.working)
    .option("-s, --sync-url <url>", "remote database URL")
    .option("-t, --token <token>", "remote auth token")
    .addOption(
      new Option("--direction <direction>", "which way to sync")
        .choices(["pull", "push", "both"])
        .default("both"),
    )
    .action(
      async (
        opts: {
          dbPath: string;
          syncUrl?: string;
          token?: string;
          direction: SyncDirection;
        },
        command: Command,
      ) =>
        run(
          command,
          { url: opts.syncUrl, token: opts.token, flags: SYNC_URL_FLAGS },
          {},
          (o) => o.offlineSync(opts.dbPath, opts.direction),
        ),
    );

  program
    .command("libsql-sync")
    .description("Bidirectional sync: pull, report, push")
    .option("-d, --db-path <path>", "local database", DEFAULT_PATHS.working)
    .option("-s, --sync-url <url>", "remote database URL")
    .option("-t, --token <token>", "remote auth token")
    .action(
      async (
        opts: { dbPath: string; syncUrl?: string; token?: string },
        command: Command,
      ) =>
        run(
          command,
          { url: opts.syncUrl, token: opts.token, flags: SYNC_URL_FLAGS },
          {},
          (o) => o.libsqlSync(opts.dbPath),
        ),
    );

  program
    .command("test")
    .description("Check that the remote (or an in-memory database) answers queries")
    .option("-u, --url <url>", "remote database URL")
    .option("-t, --token <token>", "remote auth token")
    .option("--local", "use an in-memory database instead of the remote")
    .action(
      async (opts: RemoteOpts & { local?: boolean }, command: Command) =>
        run(command, opts.local ? undefined : opts, {}, (o) =>
          o.testConnection({ local: opts.local }),
        ),
    );

  program
    .command("workflow")
    .description("Sync the replica and create a working copy from it")
    .option("-r, --replica-path <path>", "local replica", DEFAULT_PATHS.replica)
    .option("-w, --working-path <path>", "working copy", DEFAULT_PATHS.working)
    .option("--url <url>", "remote database URL")
    .option("--token <token>", "remote auth token")
    .action(
      async (
        opts: RemoteOpts & { replicaPath: string; workingPath: string },
        command: Command,
      ) =>
        run(command, opts, {}, (o) =>
          o.initWorkflow(opts.replicaPath, opts.workingPath),
        ),
    );

  return program;
}
