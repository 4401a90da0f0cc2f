// backend/services/todo/src/routes/todoRoutes.ts
import { Router } from "express";
import { asyncHandler } from "@shared/middleware/asyncHandler";
import { methodNotAllowed } from "@shared/middleware/errorJson";
import type { TodoRepo } from "../repo/todoRepo";

// Direct handler imports (no barrels)
import { create } from "../controllers/todo/handlers/create";
import { list } from "../controllers/todo/handlers/list";
import { findById } from "../controllers/todo/handlers/findById";
import { update } from "../controllers/todo/handlers/update";
import { remove } from "../controllers/todo/handlers/remove";

/**
 * Collection:  POST /   (store assigns id)   GET /
 * Item:        GET /:id   PUT /:id (partial merge)   DELETE /:id
 */
export function todoRoutes(repo: TodoRepo): Router {
  const router = Router();

  // one-liners only; no logic here
  router
    .route("/")
    .get(asyncHandler(list(repo)))
    .post(asyncHandler(create(repo)))
    .all(methodNotAllowed(["GET", "POST"]));

  router
    .route("/:id")
    .get(asyncHandler(findById(repo)))
    .put(asyncHandler(update(repo)))
    .delete(asyncHandler(remove(repo)))
    .all(methodNotAllowed(["GET", "PUT", "DELETE"]));

  return router;
}
