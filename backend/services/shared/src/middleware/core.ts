// backend/services/shared/src/middleware/core.ts
import express, { type RequestHandler } from "express";
import cors from "cors";

/** CORS for any origin (wildcard), then the JSON body parser. */
export function coreMiddleware(): RequestHandler[] {
  return [cors({ origin: "*" }), express.json({ limit: "1mb" })];
}
