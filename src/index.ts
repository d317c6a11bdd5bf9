// src/index.ts

export {
  CATEGORIES,
  categorize,
  classifyStatements,
  countStatements,
  emptyBuckets,
  inExecutionOrder,
  isGuardedCreate,
  makeIdempotent,
  parseStatements,
  prepareDiff,
  rewriteCreates,
  targetTable,
  type Buckets,
  type Category,
  type ClassificationPolicy,
  type Statement,
} from "./statements.js";
export {
  DEFAULT_BATCH_LIMITS,
  chunk,
  joinStatements,
  planBatches,
  planCategory,
  type Batch,
  type BatchLimits,
} from "./batch-plan.js";
export {
  DEFAULT_RETRY_POLICIES,
  SyncSession,
  executeBatch,
  retryPolicy,
  withTimeout,
  type CategoryCounters,
  type RetryPolicies,
  type RetryPolicy,
  type RunSummary,
  type SessionOptions,
} from "./batch-exec.js";
export {
  countTables,
  isSyncCapable,
  type ConnectionKind,
  type SqlConnection,
  type SqlRow,
  type SqlValue,
} from "./connection.js";
export { ConnectionRegistry } from "./connection-registry.js";
export { LocalConnection } from "./local-connection.js";
export {
  LibsqlConnection,
  describeTarget,
  type LibsqlTarget,
  type RemoteCredentials,
} from "./libsql-connection.js";
export {
  Baseline,
  dumpDatabase,
  materializeDump,
  renderLiteral,
} from "./baseline.js";
export { runSqlDiff, sqldiff, type DiffFn } from "./sqldiff.js";
export {
  DEFAULT_PATHS,
  resolveCredentials,
  resolveSetting,
} from "./config.js";
export {
  SyncOrchestrator,
  libsqlDeps,
  type OrchestratorDeps,
  type OrchestratorOptions,
  type SyncDirection,
  type SyncOutcome,
  type Workflow,
} from "./orchestrator.js";
export {
  BatchExecutionError,
  BatchTimeoutError,
  CollaboratorError,
  ConfigError,
  DiffSyncError,
  PreconditionError,
  toFailure,
  type Phase,
  type SyncFailure,
} from "./errors.js";
export {
  ConsoleLogger,
  MemoryLogger,
  NullLogger,
  StructuredLogger,
  formatEntry,
  type LogEntry,
  type LogLevel,
  type Logger,
} from "./logger.js";
