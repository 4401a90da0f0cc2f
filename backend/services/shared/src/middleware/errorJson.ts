// backend/services/shared/src/middleware/errorJson.ts

/**
 * Transport-level JSON tails. Every non-2xx body is `{ error: string }`.
 *
 * - notFoundJson: unknown paths.
 * - methodNotAllowed: known path, unsupported verb (sets `Allow`).
 * - errorJson: anything passed to next(err) or thrown synchronously.
 */

import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { extractLogContext, logger } from "../utils/logger";

export type ErrorBody = { error: string };

export function notFoundJson(): RequestHandler {
  return (_req: Request, res: Response) => {
    const body: ErrorBody = { error: "Not Found" };
    res.status(404).json(body);
  };
}

export function methodNotAllowed(allowed: string[]): RequestHandler {
  const allow = allowed.map((m) => m.toUpperCase()).join(", ");
  return (_req: Request, res: Response) => {
    const body: ErrorBody = { error: "Method Not Allowed" };
    res.status(405).set("Allow", allow).json(body);
  };
}

function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 500;
  const raw =
    "statusCode" in err ? err.statusCode : "status" in err ? err.status : 500;
  const n = Number(raw);
  return Number.isInteger(n) && n >= 400 && n < 600 ? n : 500;
}

function messageOf(err: unknown): string {
  if (err instanceof Error && err.message) return err.message;
  if (typeof err === "string" && err) return err;
  return "Unexpected error";
}

export function errorJson(): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const status = statusOf(err);
    const ctx = extractLogContext(req);
    const log = req.log ?? logger;
    if (status >= 500) {
      log.error({ ...ctx, status, err }, "request error");
    } else {
      log.warn({ ...ctx, status, detail: messageOf(err) }, "request rejected");
    }
    const body: ErrorBody = { error: messageOf(err) };
    res.status(status).json(body);
  };
}
