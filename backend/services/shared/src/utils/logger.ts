// backend/services/shared/src/utils/logger.ts
import type { Request } from "express";
import pino, {
  type Logger,
  type LoggerOptions,
  type LevelWithSilent,
  stdTimeFunctions,
} from "pino";

/**
 * Shared Logger (authoritative)
 *
 * Each service calls `initLogger(SERVICE_NAME)` at bootstrap, BEFORE creating
 * any request loggers (pino-http binds a child of whatever `logger` is then).
 *
 * Usage:
 *   import { initLogger } from "@shared/utils/logger";
 *   initLogger(SERVICE_NAME);
 */

const validLevels: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

export function isLogLevel(v: string): v is LevelWithSilent {
  return validLevels.has(v);
}

// Import-time default only; services validate LOG_LEVEL in their config and
// hand the result to initLogger().
function levelFromEnv(): LevelWithSilent {
  const v = (process.env.LOG_LEVEL || "info").trim();
  return isLogLevel(v) ? v : "info";
}

// NOTE: no "service" in base until initLogger() runs.
let SERVICE_NAME = "";

const pinoOptions: LoggerOptions = {
  level: levelFromEnv(),
  base: {},
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    remove: true,
    paths: ["req.headers.authorization", "req.headers.cookie"],
  },
};

export let logger: Logger = pino(pinoOptions);

/** Initialize the shared logger for this running service. Call once at bootstrap. */
export function initLogger(serviceName: string, level?: LevelWithSilent): void {
  SERVICE_NAME = String(serviceName || "").trim();
  if (!SERVICE_NAME) throw new Error("initLogger requires serviceName");
  logger = pino({
    ...pinoOptions,
    level: level ?? pinoOptions.level,
    base: { service: SERVICE_NAME },
  });
}

// ───────────────────────────── Request context helper ─────────────────────────
export type LogContext = {
  requestId: string | null;
  path: string;
  method: string;
  entityId?: string;
  service?: string;
};

export function requestIdOf(req: Request): string | null {
  if (req.id != null) return String(req.id);
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  const v = Array.isArray(hdr) ? hdr[0] : hdr;
  return v || null;
}

export function extractLogContext(req: Request): LogContext {
  return {
    requestId: requestIdOf(req),
    path: req.originalUrl,
    method: req.method,
    entityId: req.params?.id,
    service: SERVICE_NAME || undefined,
  };
}
