// backend/services/shared/src/app/createServiceApp.ts

/**
 * Shared app builder. Assembles the service stack in a fixed order:
 *   http logger → CORS + JSON parser → health (open) → routes → 404 → error.
 *
 * Services pass a `mountRoutes` callback; routes are one-liners that bind
 * handlers only. Dependencies (repositories, clients) are closed over by the
 * callback, never read from module globals.
 */

import express, { type Express } from "express";
import { makeHttpLogger } from "../middleware/httpLogger";
import { coreMiddleware } from "../middleware/core";
import { notFoundJson, errorJson } from "../middleware/errorJson";
import { createHealthRouter, type ReadinessFn } from "../health";

export type CreateServiceAppOptions = {
  /** Service slug (e.g. "todo"). Used in logs. */
  serviceName: string;
  mountRoutes: (router: express.Router) => void;
  readiness?: ReadinessFn;
};

export function createServiceApp(opts: CreateServiceAppOptions): Express {
  const { serviceName, mountRoutes, readiness } = opts;

  const app = express();
  app.disable("x-powered-by");

  // ── Telemetry ───────────────────────────────────────────────────────────────
  app.use(makeHttpLogger(serviceName));

  // ── CORS + body parsing ─────────────────────────────────────────────────────
  app.use(coreMiddleware());

  // ── Health (public) ─────────────────────────────────────────────────────────
  app.use(createHealthRouter({ readiness }));

  // ── Routes ──────────────────────────────────────────────────────────────────
  const api = express.Router();
  mountRoutes(api);
  app.use(api);

  // ── Tails: 404 + error formatter ────────────────────────────────────────────
  app.use(notFoundJson());
  app.use(errorJson());

  return app;
}
