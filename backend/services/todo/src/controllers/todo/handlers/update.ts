// backend/services/todo/src/controllers/todo/handlers/update.ts
import type { Request, Response } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import { parseTodoId, parseTodoPatch } from "../../../validators/todo.dto";
import type { TodoRepo } from "../../../repo/todoRepo";
import { MSG_NOT_FOUND_OR_UNCHANGED, respond } from "../respond";

/**
 * Partial update. Only supplied fields change; the response is a
 * confirmation, not the record. A miss and a no-op share one 404.
 */
export function update(repo: TodoRepo) {
  return async (req: Request, res: Response) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId, id: req.params.id }, "[todo.controller.update] enter");

    const id = parseTodoId(req.params.id);
    const patch = parseTodoPatch(req.body);
    const outcome =
      id.kind !== "success"
        ? id
        : patch.kind !== "success"
          ? patch
          : await repo.update(id.value, patch.value);

    logger.debug(
      { requestId, outcome: outcome.kind },
      "[todo.controller.update] exit"
    );
    respond(res, outcome, {
      body: () => ({ message: "To-do item updated successfully" }),
      notFoundMessage: MSG_NOT_FOUND_OR_UNCHANGED,
    });
  };
}
