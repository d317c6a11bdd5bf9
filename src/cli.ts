#!/usr/bin/env node
// src/cli.ts
import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { buildProgram } from "./sync-cli.js";

function packageVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (pkg && typeof pkg === "object" && "version" in pkg) {
      return String(pkg.version);
    }
  } catch (err) {
    console.error(`could not read package version: ${String(err)}`);
  }
  return "0.0.0";
}

const program = buildProgram().version(packageVersion());

// Default help when no subcommand given
if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(err instanceof Error ? (err.stack ?? err.message) : err);
  process.exit(1);
});
