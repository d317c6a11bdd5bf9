// src/batch-plan.ts

import {
  CATEGORIES,
  type Buckets,
  type Category,
  type Statement,
} from "./statements.js";

export type BatchLimits = Record<Category, number>;

// CREATE and OTHER run one statement at a time so a failure points at a
// single statement; DELETE favors throughput, INSERT keeps payloads moderate.
export const DEFAULT_BATCH_LIMITS: BatchLimits = {
  CREATE: 1,
  DELETE: 2_000,
  INSERT: 1_000,
  OTHER: 1,
};

export interface Batch {
  category: Category;
  /** 1-based position within the category */
  index: number;
  /** number of batches in the category */
  total: number;
  statements: Statement[];
  sql: string;
}

export function joinStatements(statements: readonly Statement[]): string {
  return statements.map((s) => s.sql).join(";\n") + ";";
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`batch size must be a positive integer (got ${size})`);
  }
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

export function planCategory(
  category: Category,
  statements: readonly Statement[],
  limit: number,
): Batch[] {
  const groups = chunk(statements, limit);
  return groups.map((group, i) => ({
    category,
    index: i + 1,
    total: groups.length,
    statements: group,
    sql: joinStatements(group),
  }));
}

/**
 * Batches for every bucket, CREATE → DELETE → INSERT → OTHER, each
 * category's statements in their original order.
 */
export function planBatches(
  buckets: Buckets,
  limits: Partial<BatchLimits> = {},
): Batch[] {
  const resolved: BatchLimits = { ...DEFAULT_BATCH_LIMITS, ...limits };
  return CATEGORIES.flatMap((category) =>
    planCategory(category, buckets[category], resolved[category]),
  );
}
