// src/batch-exec.ts

import type { Batch } from "./batch-plan.js";
import type { SqlConnection } from "./connection.js";
import {
  BatchExecutionError,
  BatchTimeoutError,
  errorMessage,
} from "./errors.js";
import { NullLogger, type Logger } from "./logger.js";
import { CATEGORIES, type Category } from "./statements.js";
import { truncate, wait } from "./util.js";

/** One attempt per entry; each entry is that attempt's timeout. */
export interface RetryPolicy {
  timeoutsMs: readonly number[];
}

export type RetryPolicies = Record<Category, RetryPolicy>;

/**
 * First attempt at `timeoutMs`, then `maxRetries` more at a shorter
 * timeout (two thirds of the first unless given).
 */
export function retryPolicy(
  timeoutMs: number,
  maxRetries = 1,
  retryTimeoutMs = Math.ceil((timeoutMs * 2) / 3),
): RetryPolicy {
  if (!(timeoutMs > 0) || !(retryTimeoutMs > 0)) {
    throw new RangeError("timeouts must be positive");
  }
  if (!Number.isInteger(maxRetries) || maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer`);
  }
  return {
    timeoutsMs: [timeoutMs, ...Array<number>(maxRetries).fill(retryTimeoutMs)],
  };
}

export const DEFAULT_RETRY_POLICIES: RetryPolicies = {
  CREATE: retryPolicy(10_000, 1, 5_000),
  DELETE: retryPolicy(15_000, 1, 10_000),
  INSERT: retryPolicy(20_000, 1, 15_000),
  OTHER: retryPolicy(10_000, 1, 5_000),
};

/**
 * Race `promise` against a timer. A timeout only stops the waiting: the
 * work may still land, so `onLate` sees whatever it settles to later.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onLate?: (outcome: { ok: boolean; error?: unknown }) => void,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let expired = false;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      reject(new BatchTimeoutError(ms));
    }, ms);
  });
  void promise.then(
    () => {
      if (expired) onLate?.({ ok: true });
    },
    (error: unknown) => {
      if (expired) onLate?.({ ok: false, error });
    },
  );
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

async function runOnce(conn: SqlConnection, batch: Batch): Promise<number> {
  const [only] = batch.statements;
  if (batch.statements.length === 1 && only) {
    return await conn.execute(only.sql);
  }
  await conn.executeBatch(batch.sql);
  // no per-statement counts for a joined batch; report statements applied
  return batch.statements.length;
}

export interface ExecuteOptions {
  logger?: Logger;
}

/**
 * Execute one batch under `policy`. Resolves to an advisory affected
 * count; rejects with `BatchExecutionError` once every attempt failed.
 */
export async function executeBatch(
  conn: SqlConnection,
  batch: Batch,
  policy: RetryPolicy,
  { logger = new NullLogger() }: ExecuteOptions = {},
): Promise<number> {
  const attempts = policy.timeoutsMs.length;
  if (attempts === 0) {
    throw new RangeError("retry policy allows no attempts");
  }
  let lastError: unknown;
  let timedOut = false;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    const timeoutMs = policy.timeoutsMs[attempt - 1] ?? 0;
    try {
      return await withTimeout(runOnce(conn, batch), timeoutMs, (late) =>
        logger.debug("timed-out attempt settled late", {
          category: batch.category,
          index: batch.index,
          attempt,
          ok: late.ok,
          error: late.ok ? undefined : errorMessage(late.error),
        }),
      );
    } catch (err) {
      lastError = err;
      timedOut = err instanceof BatchTimeoutError;
      if (attempt < attempts) {
        logger.warn(
          `${batch.category} batch ${batch.index}/${batch.total} ${
            timedOut ? "timed out" : "failed"
          }, retrying`,
          {
            attempt,
            nextTimeoutMs: policy.timeoutsMs[attempt],
            error: errorMessage(err),
          },
        );
      }
    }
  }
  throw new BatchExecutionError(
    batch.category,
    batch.index,
    batch.total,
    attempts,
    timedOut,
    lastError,
  );
}

export interface CategoryCounters {
  batches: number;
  statements: number;
  affected: number;
  failed: number;
}

export interface RunSummary {
  batches: number;
  statements: number;
  affected: number;
  elapsedMs: number;
  counters: Record<Category, CategoryCounters>;
}

export interface SessionOptions {
  retry?: Partial<RetryPolicies>;
  /** pause between consecutive batches */
  delayMs?: number;
  logger?: Logger;
  clock?: () => number;
}

function emptyCounters(): Record<Category, CategoryCounters> {
  const make = (): CategoryCounters => ({
    batches: 0,
    statements: 0,
    affected: 0,
    failed: 0,
  });
  return { CREATE: make(), DELETE: make(), INSERT: make(), OTHER: make() };
}

/**
 * One push or apply against one connection. Batches run strictly in the
 * order given; the first terminal failure stops the run and nothing
 * already applied is rolled back.
 */
export class SyncSession {
  readonly counters = emptyCounters();
  private readonly policies: RetryPolicies;
  private readonly delayMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    readonly conn: SqlConnection,
    { retry = {}, delayMs = 0, logger, clock }: SessionOptions = {},
  ) {
    this.policies = { ...DEFAULT_RETRY_POLICIES, ...retry };
    this.delayMs = delayMs;
    this.logger = logger ?? new NullLogger();
    this.clock = clock ?? (() => Date.now());
  }

  async run(batches: readonly Batch[]): Promise<RunSummary> {
    const started = this.clock();
    for (const category of CATEGORIES) {
      const group = batches.filter((b) => b.category === category);
      if (!group.length) continue;
      const count = group.reduce((n, b) => n + b.statements.length, 0);
      this.logger.info(`executing ${count} ${category} statements`, {
        batches: group.length,
      });
      const categoryStart = this.clock();
      for (const batch of group) {
        await this.runBatch(batch, started);
        if (this.delayMs > 0 && batch !== batches[batches.length - 1]) {
          await wait(this.delayMs);
        }
      }
      this.logger.info(`completed ${count} ${category} statements`, {
        elapsedMs: this.clock() - categoryStart,
        affected: this.counters[category].affected,
      });
    }
    return this.summary(started);
  }

  private async runBatch(batch: Batch, started: number): Promise<void> {
    const counters = this.counters[batch.category];
    const batchStart = this.clock();
    if (batch.statements.length === 1 && batch.statements[0]) {
      this.logger.debug(
        `${batch.category} ${batch.index}/${batch.total}: ${truncate(batch.statements[0].sql, 100)}`,
      );
    }
    let affected: number;
    try {
      affected = await executeBatch(
        this.conn,
        batch,
        this.policies[batch.category],
        { logger: this.logger },
      );
    } catch (err) {
      counters.failed += 1;
      this.logger.error(
        `${batch.category} batch ${batch.index}/${batch.total} aborted the run`,
        { error: errorMessage(err), appliedBatches: this.totals().batches },
      );
      throw err;
    }
    counters.batches += 1;
    counters.statements += batch.statements.length;
    counters.affected += affected;
    this.logger.info(
      `${batch.category} batch ${batch.index}/${batch.total} done`,
      {
        statements: batch.statements.length,
        batchMs: this.clock() - batchStart,
        elapsedMs: this.clock() - started,
      },
    );
  }

  private totals() {
    return CATEGORIES.reduce(
      (acc, c) => ({
        batches: acc.batches + this.counters[c].batches,
        statements: acc.statements + this.counters[c].statements,
        affected: acc.affected + this.counters[c].affected,
      }),
      { batches: 0, statements: 0, affected: 0 },
    );
  }

  summary(started = this.clock()): RunSummary {
    return {
      ...this.totals(),
      elapsedMs: this.clock() - started,
      counters: this.counters,
    };
  }
}
