// backend/services/todo/src/controllers/todo/handlers/remove.ts
import type { Request, Response } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import { parseTodoId } from "../../../validators/todo.dto";
import type { TodoRepo } from "../../../repo/todoRepo";
import { MSG_NOT_FOUND, respond } from "../respond";

export function remove(repo: TodoRepo) {
  return async (req: Request, res: Response) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId, id: req.params.id }, "[todo.controller.remove] enter");

    const id = parseTodoId(req.params.id);
    const outcome = id.kind === "success" ? await repo.remove(id.value) : id;

    logger.debug(
      { requestId, outcome: outcome.kind },
      "[todo.controller.remove] exit"
    );
    respond(res, outcome, {
      body: () => ({ message: "To-do item deleted successfully" }),
      notFoundMessage: MSG_NOT_FOUND,
    });
  };
}
