// src/config.ts

import { ConfigError } from "./errors.js";
import type { RemoteCredentials } from "./libsql-connection.js";
import { parseNonNegativeInt } from "./util.js";

export const URL_ENV = "TURSO_DATABASE_URL";
export const TOKEN_ENV = "TURSO_AUTH_TOKEN";

export const DEFAULT_PATHS = {
  replica: "local_replica.db",
  working: "working_copy.db",
  diff: "diff.sql",
  baselineDb: "baseline.db",
  baselineDump: "original_dump.sql",
  tempSnapshot: "temp_original.db",
  tempPushReplica: "temp_push_replica.db",
} as const;

type Env = Record<string, string | undefined>;

/** Command-line flags that stand in for the credential variables. */
export interface CredentialFlags {
  url: string;
  token: string;
}

export const REMOTE_FLAGS: CredentialFlags = { url: "--url", token: "--token" };
export const SYNC_URL_FLAGS: CredentialFlags = {
  url: "--sync-url",
  token: "--token",
};

/** The flag value if given, else the environment variable, else an error. */
export function resolveSetting(
  arg: string | undefined,
  envVar: string,
  flag: string,
  env: Env = process.env,
): string {
  if (arg) return arg;
  const value = env[envVar];
  if (value) return value;
  throw new ConfigError(
    `${envVar} not provided as argument or environment variable. Set ${envVar} or use ${flag}`,
    { envVar, flag },
  );
}

export function resolveCredentials(
  opts: { url?: string; token?: string },
  env: Env = process.env,
  flags: CredentialFlags = REMOTE_FLAGS,
): RemoteCredentials {
  return {
    url: resolveSetting(opts.url, URL_ENV, flags.url, env),
    authToken: resolveSetting(opts.token, TOKEN_ENV, flags.token, env),
  };
}

/** Pause between batches when pushing through a temporary replica. */
export function replicaPushDelayMs(env: Env = process.env): number {
  return parseNonNegativeInt(env.DIFFSYNC_BATCH_DELAY_MS, 100);
}

/** Pause between batches for direct remote and local application. */
export function directDelayMs(env: Env = process.env): number {
  return parseNonNegativeInt(env.DIFFSYNC_DIRECT_DELAY_MS, 0);
}
