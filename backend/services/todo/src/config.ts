// backend/services/todo/src/config.ts

/**
 * Config is a pure function of the env record (bootstrap.ts loads .env files
 * first). Every value has a default suitable for local/containerised use;
 * malformed values fail fast before any connection attempt.
 */

import type { LevelWithSilent } from "pino";
import {
  type EnvRecord,
  envInt,
  envOneOf,
  envString,
} from "@shared/env/EnvLoader";

const LOG_LEVELS: readonly LevelWithSilent[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
];

export type TodoConfig = {
  env: string;
  host: string;
  port: number;
  mongoUri: string;
  dbName: string;
  dbConnectMaxAttempts: number;
  dbConnectRetryDelayMs: number;
  logLevel: LevelWithSilent;
};

export const DEFAULTS = {
  host: "0.0.0.0",
  port: 5001,
  mongoUri: "mongodb://todo-db:27017/",
  dbName: "todo_db",
  dbConnectMaxAttempts: 10,
  dbConnectRetryDelayMs: 5_000,
  logLevel: "info",
} as const;

export function loadConfig(env: EnvRecord = process.env): TodoConfig {
  return {
    env: envString(env, "NODE_ENV", "development"),
    host: envString(env, "HOST", DEFAULTS.host),
    port: envInt(env, "PORT", DEFAULTS.port, { min: 0, max: 65_535 }),
    mongoUri: envString(env, "MONGO_URI", DEFAULTS.mongoUri),
    dbName: envString(env, "DB_NAME", DEFAULTS.dbName),
    dbConnectMaxAttempts: envInt(
      env,
      "DB_CONNECT_MAX_ATTEMPTS",
      DEFAULTS.dbConnectMaxAttempts,
      { min: 1 }
    ),
    dbConnectRetryDelayMs: envInt(
      env,
      "DB_CONNECT_RETRY_DELAY_MS",
      DEFAULTS.dbConnectRetryDelayMs,
      { min: 0 }
    ),
    logLevel: envOneOf(env, "LOG_LEVEL", LOG_LEVELS, DEFAULTS.logLevel),
  };
}
