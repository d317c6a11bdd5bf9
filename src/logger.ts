// src/logger.ts

import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: "·",
  info: "ℹ️",
  warn: "⚠️",
  error: "⛔",
};

export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: LogMeta;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export interface LoggerOptions {
  scope?: string;
  /** receives every entry, whatever its level */
  sink?: (entry: LogEntry) => void;
  /** entries at or above this level also go to stderr */
  echoLevel?: LogLevel;
  clock?: () => number;
}

/** DIFFSYNC_DISABLE_LOG_ECHO=1 silences stderr; "0" and "false" do not. */
function echoDisabled(): boolean {
  const raw = process.env.DIFFSYNC_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

function serializeMeta(meta: LogMeta): string {
  try {
    return JSON.stringify(meta, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value,
    );
  } catch {
    return inspect(meta, { depth: 4 });
  }
}

/** The stderr line for an entry. */
export function formatEntry({ level, scope, message, meta }: LogEntry): string {
  const line = `${LEVEL_TAG[level]} ${scope ? `[${scope}] ` : ""}${message}`;
  return meta ? `${line} ${serializeMeta(meta)}` : line;
}

export class StructuredLogger implements Logger {
  private readonly opts: LoggerOptions;

  constructor(opts: LoggerOptions = {}) {
    this.opts = opts;
  }

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  log(level: LogLevel, message: string, meta?: LogMeta): void {
    const { clock, sink, scope, echoLevel } = this.opts;
    const entry: LogEntry = {
      ts: clock ? clock() : Date.now(),
      level,
      scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    sink?.(entry);
    if (echoLevel && this.isLevelEnabled(level) && !echoDisabled()) {
      console.error(formatEntry(entry));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const min = this.opts.echoLevel;
    return min ? LEVEL_RANK[level] >= LEVEL_RANK[min] : true;
  }
}

export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echoLevel: minLevel });
  }
}

/** Keeps entries in memory instead of echoing them; for tests. */
export class MemoryLogger extends StructuredLogger {
  readonly entries: LogEntry[];

  constructor({ scope, clock }: { scope?: string; clock?: () => number } = {}) {
    const entries: LogEntry[] = [];
    super({ scope, clock, sink: (entry) => entries.push(entry) });
    this.entries = entries;
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((e) => level === undefined || e.level === level)
      .map((e) => e.message);
  }
}

function isLogLevel(raw: string): raw is LogLevel {
  return LOG_LEVELS.some((lvl) => lvl === raw);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}
