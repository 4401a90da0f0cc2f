// backend/services/shared/src/health.ts

/**
 * Liveness answers "is the process up?" (no dependencies, always 200).
 * Readiness answers "can this instance take traffic?" via an optional,
 * fast check supplied by the service.
 *
 * Exposes:
 *   GET /healthz  -> liveness  { status: "ok" }
 *   GET /readyz   -> readiness { status: "ok", ...details } | 503
 */

import express from "express";
import { asyncHandler } from "./middleware/asyncHandler";

export type ReadinessDetails = Record<string, string | number | boolean>;
export type ReadinessFn = () => Promise<ReadinessDetails> | ReadinessDetails;

export type HealthRouterOptions = {
  readiness?: ReadinessFn;
};

export function createHealthRouter(opts: HealthRouterOptions = {}) {
  const router = express.Router();

  router.get("/healthz", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  router.get(
    "/readyz",
    asyncHandler(async (req, res) => {
      try {
        const details = opts.readiness ? await opts.readiness() : {};
        res.status(200).json({ status: "ok", ...details });
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        req.log?.warn({ error }, "readiness check failed");
        res.status(503).json({ status: "unavailable", error });
      }
    })
  );

  return router;
}
