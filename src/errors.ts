// src/errors.ts

import type { Category } from "./statements.js";

/** Stage of a workflow in which a failure surfaced. */
export type Phase =
  | "precondition"
  | "config"
  | "connect"
  | "diff"
  | "dump"
  | "materialize"
  | "execute"
  | "sync"
  | "baseline";

export class DiffSyncError extends Error {
  constructor(
    message: string,
    public readonly phase: Phase,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "DiffSyncError";
  }
}

/** A required input file or database is missing. */
export class PreconditionError extends DiffSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "precondition", context);
    this.name = "PreconditionError";
  }
}

export class ConfigError extends DiffSyncError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "config", context);
    this.name = "ConfigError";
  }
}

/**
 * An external tool (sqldiff, the replication primitive, a dump query)
 * failed or could not be reached. No batch has executed yet when the
 * diff or dump collaborators fail.
 */
export class CollaboratorError extends DiffSyncError {
  constructor(
    message: string,
    phase: Phase,
    public readonly code: number | null = null,
    public readonly stderr = "",
    context?: Record<string, unknown>,
  ) {
    super(message, phase, context);
    this.name = "CollaboratorError";
  }
}

export class BatchTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`);
    this.name = "BatchTimeoutError";
  }
}

/** A batch failed on every attempt its retry budget allowed. */
export class BatchExecutionError extends DiffSyncError {
  constructor(
    public readonly category: Category,
    public readonly index: number,
    public readonly total: number,
    public readonly attempts: number,
    public readonly timedOut: boolean,
    public readonly lastError: unknown,
  ) {
    super(
      `${category} batch ${index}/${total} ${
        timedOut ? "timed out" : "failed"
      } after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${errorMessage(lastError)}`,
      "execute",
      { category, index, total, attempts, timedOut },
    );
    this.name = "BatchExecutionError";
  }
}

export interface SyncFailure {
  phase: Phase;
  message: string;
  category?: Category;
  index?: number;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? "unknown error");
}

export function toFailure(err: unknown, fallback: Phase): SyncFailure {
  if (err instanceof BatchExecutionError) {
    return {
      phase: err.phase,
      message: err.message,
      category: err.category,
      index: err.index,
    };
  }
  if (err instanceof DiffSyncError) {
    return { phase: err.phase, message: err.message };
  }
  return { phase: fallback, message: errorMessage(err) };
}
