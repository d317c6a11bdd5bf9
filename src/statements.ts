// src/statements.ts
//
// Turns raw sqldiff output into ordered, categorized statements.

export const CATEGORIES = ["CREATE", "DELETE", "INSERT", "OTHER"] as const;
export type Category = (typeof CATEGORIES)[number];

export interface Statement {
  sql: string;
  category: Category;
  idempotent: boolean;
}

export type Buckets = Record<Category, Statement[]>;

/**
 * Restricts which tables the bulk DELETE/INSERT buckets accept. A
 * DELETE or INSERT against a table outside `tables` is executed one at
 * a time with everything else in OTHER. Omit `tables` to accept all.
 */
export interface ClassificationPolicy {
  tables?: readonly string[];
}

const WRAPPER_MARKERS = new Set([
  "BEGIN",
  "BEGIN TRANSACTION",
  "COMMIT",
  "COMMIT TRANSACTION",
  "END TRANSACTION",
]);

const CREATE_TRIGGER_RE = /^CREATE\s+(?:(?:TEMP|TEMPORARY)\s+)?TRIGGER\b/i;

function isWrapperMarker(piece: string): boolean {
  return WRAPPER_MARKERS.has(piece.replace(/\s+/g, " ").toUpperCase());
}

const LITERAL_RE = /'(?:[^']|'')*'|"(?:[^"]|"")*"/g;

/**
 * A trigger body ends at the END that closes its BEGIN, not at an END
 * that closes a CASE expression inside it.
 */
function triggerClosed(text: string): boolean {
  const bare = text.replace(LITERAL_RE, "''");
  if (!/\bEND$/i.test(bare)) return false;
  const cases = bare.match(/\bCASE\b/gi)?.length ?? 0;
  const ends = bare.match(/\bEND\b/gi)?.length ?? 0;
  return ends > cases;
}

/**
 * Split diff text on `;`, ignoring terminators inside quoted literals
 * and inside trigger bodies, and drop empty pieces and the
 * BEGIN/COMMIT pair the diff tool wraps its output in.
 */
export function parseStatements(diff: string): string[] {
  const out: string[] = [];
  let current = "";
  let quote: string | null = null;

  const flush = () => {
    const piece = current.trim();
    current = "";
    if (piece && !isWrapperMarker(piece)) out.push(piece);
  };

  for (const ch of diff) {
    if (quote) {
      current += ch;
      // doubled quotes toggle twice, which leaves us inside the literal
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === ";") {
      const trimmed = current.trim();
      if (CREATE_TRIGGER_RE.test(trimmed) && !triggerClosed(trimmed)) {
        current += ch;
        continue;
      }
      flush();
      continue;
    }
    current += ch;
  }
  flush();
  return out;
}

function unquoteIdentifier(raw: string): string {
  const first = raw[0];
  if (first === '"' || first === "`") {
    return raw.slice(1, -1).split(first + first).join(first);
  }
  if (first === "[") return raw.slice(1, -1);
  return raw;
}

const IDENT = String.raw`("(?:[^"]|"")*"|\[[^\]]*\]|` + "`(?:[^`]|``)*`" + String.raw`|[^\s(]+)`;
const DELETE_TARGET_RE = new RegExp(String.raw`^DELETE\s+FROM\s+` + IDENT, "i");
const INSERT_TARGET_RE = new RegExp(
  String.raw`^INSERT\s+(?:OR\s+\w+\s+)?INTO\s+` + IDENT,
  "i",
);

/** Table a DELETE or INSERT statement writes to, without quoting. */
export function targetTable(sql: string): string | undefined {
  const m = DELETE_TARGET_RE.exec(sql) ?? INSERT_TARGET_RE.exec(sql);
  if (!m?.[1]) return undefined;
  return unquoteIdentifier(m[1]);
}

export function categorize(
  sql: string,
  policy: ClassificationPolicy = {},
): Category {
  const head = sql.trimStart();
  if (/^CREATE\b/i.test(head)) return "CREATE";
  let category: Category;
  if (/^DELETE\b/i.test(head)) category = "DELETE";
  else if (/^INSERT\b/i.test(head)) category = "INSERT";
  else return "OTHER";

  if (policy.tables) {
    const table = targetTable(head)?.toLowerCase();
    const allowed = policy.tables.some((t) => t.toLowerCase() === table);
    if (!allowed) return "OTHER";
  }
  return category;
}

export function emptyBuckets(): Buckets {
  return { CREATE: [], DELETE: [], INSERT: [], OTHER: [] };
}

/**
 * Partition statements into the four buckets. Every statement lands in
 * exactly one bucket and keeps its relative order within it.
 */
export function classifyStatements(
  statements: readonly string[],
  policy: ClassificationPolicy = {},
): Buckets {
  const buckets = emptyBuckets();
  for (const sql of statements) {
    const category = categorize(sql, policy);
    buckets[category].push({ sql, category, idempotent: false });
  }
  return buckets;
}

const CREATE_GUARD_RE =
  /^(CREATE\s+(?:(?:TEMP|TEMPORARY)\s+)?(?:UNIQUE\s+INDEX|INDEX|VIRTUAL\s+TABLE|TABLE|VIEW|TRIGGER))(?!\s+IF\s+NOT\s+EXISTS\b)\s+/i;

/**
 * Insert `IF NOT EXISTS` into a CREATE TABLE/INDEX/UNIQUE INDEX/VIEW/TRIGGER
 * statement that lacks it. Anything else comes back trimmed but unchanged.
 */
export function makeIdempotent(sql: string): string {
  const trimmed = sql.trim();
  return trimmed.replace(CREATE_GUARD_RE, "$1 IF NOT EXISTS ");
}

export function isGuardedCreate(sql: string): boolean {
  return /^CREATE\s+(?:(?:TEMP|TEMPORARY)\s+)?(?:UNIQUE\s+INDEX|INDEX|VIRTUAL\s+TABLE|TABLE|VIEW|TRIGGER)\s+IF\s+NOT\s+EXISTS\b/i.test(
    sql.trim(),
  );
}

/** Rewrite the CREATE bucket so each statement survives re-execution. */
export function rewriteCreates(buckets: Buckets): Buckets {
  return {
    ...buckets,
    CREATE: buckets.CREATE.map((stmt) => {
      const sql = makeIdempotent(stmt.sql);
      return { ...stmt, sql, idempotent: isGuardedCreate(sql) };
    }),
  };
}

/** Flatten buckets back into execution order. */
export function inExecutionOrder(buckets: Buckets): Statement[] {
  return CATEGORIES.flatMap((category) => buckets[category]);
}

export function countStatements(buckets: Buckets): number {
  return CATEGORIES.reduce((n, c) => n + buckets[c].length, 0);
}

/** parse → classify → rewrite */
export function prepareDiff(
  diff: string,
  policy: ClassificationPolicy = {},
): Buckets {
  return rewriteCreates(classifyStatements(parseStatements(diff), policy));
}
