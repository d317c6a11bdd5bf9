// src/sqldiff.ts

import { spawn } from "node:child_process";
import { CollaboratorError } from "./errors.js";
import type { Logger } from "./logger.js";

export type DiffFn = (fromPath: string, toPath: string) => Promise<string>;

export function sqldiffBinary(): string {
  return process.env.DIFFSYNC_SQLDIFF || "sqldiff";
}

/**
 * SQL that turns the database at `fromPath` into the one at `toPath`,
 * as printed by `sqldiff --transaction`.
 */
export async function runSqlDiff(
  fromPath: string,
  toPath: string,
  { logger, binary = sqldiffBinary() }: { logger?: Logger; binary?: string } = {},
): Promise<string> {
  const args = ["--transaction", fromPath, toPath];
  logger?.debug("sqldiff exec", { command: [binary, ...args].join(" ") });
  let stdout = "",
    stderr = "";
  await new Promise<void>((resolve, reject) => {
    const p = spawn(binary, args, { stdio: ["ignore", "pipe", "pipe"] });
    p.stdout?.setEncoding("utf8");
    p.stderr?.setEncoding("utf8");
    p.stdout?.on("data", (c: string) => (stdout += c));
    p.stderr?.on("data", (c: string) => (stderr += c));
    p.once("close", (code: number | null) =>
      code === 0
        ? resolve()
        : reject(
            new CollaboratorError(
              `${binary} exited ${code}: ${stderr.trim()}`,
              "diff",
              code,
              stderr,
              { fromPath, toPath },
            ),
          ),
    );
    p.once("error", (err) =>
      reject(
        new CollaboratorError(
          `failed to run ${binary} (is it installed and on PATH?): ${err.message}`,
          "diff",
          null,
          "",
          { fromPath, toPath },
        ),
      ),
    );
  });
  return stdout;
}

export function sqldiff(logger?: Logger): DiffFn {
  return (fromPath, toPath) => runSqlDiff(fromPath, toPath, { logger });
}
