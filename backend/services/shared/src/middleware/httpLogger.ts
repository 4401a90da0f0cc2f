// backend/services/shared/src/middleware/httpLogger.ts

/**
 * Structured request logs for every service, correlated by `reqId`.
 *
 * Order:
 * - Mount first, so `req.id` and `req.log` exist for everything downstream
 *   (handlers, the JSON error tail).
 *
 * Notes:
 * - Severity mapping: 2xx/3xx=info, 4xx=warn, 5xx/error=error.
 * - Health probes are not auto-logged.
 * - An incoming correlation header is reused; a UUID is minted only if missing.
 */

import pinoHttp from "pino-http";
import { randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { logger as rootLogger } from "../utils/logger";

const QUIET_PATHS = new Set([
  "/health",
  "/healthz",
  "/readyz",
  "/favicon.ico",
]);

function headerId(req: IncomingMessage): string | undefined {
  const hdr =
    req.headers["x-request-id"] ||
    req.headers["x-correlation-id"] ||
    req.headers["x-amzn-trace-id"];
  return Array.isArray(hdr) ? hdr[0] : hdr;
}

export function makeHttpLogger(serviceName: string) {
  const logger = rootLogger.child({ service: serviceName });

  return pinoHttp({
    logger,

    genReqId: (req, res) => {
      const id = headerId(req) || randomUUID();
      res.setHeader("x-request-id", id);
      return id;
    },

    customLogLevel: (
      _req: IncomingMessage,
      res: ServerResponse,
      err?: Error
    ) => {
      if (err) return "error";
      const s = res.statusCode;
      if (s >= 500) return "error";
      if (s >= 400) return "warn";
      return "info";
    },

    customProps: (req: IncomingMessage) => ({
      service: serviceName,
      reqId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => QUIET_PATHS.has(req.url ?? ""),
    },

    serializers: {
      req(req: IncomingMessage) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
      err(err: Error) {
        return { type: err.name, msg: err.message };
      },
    },
  });
}
