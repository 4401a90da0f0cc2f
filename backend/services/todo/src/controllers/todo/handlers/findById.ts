// backend/services/todo/src/controllers/todo/handlers/findById.ts
import type { Request, Response } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import { parseTodoId } from "../../../validators/todo.dto";
import type { TodoRepo } from "../../../repo/todoRepo";
import { MSG_NOT_FOUND, respond } from "../respond";

export function findById(repo: TodoRepo) {
  return async (req: Request, res: Response) => {
    const requestId = requestIdOf(req);
    const id = parseTodoId(req.params.id);
    logger.debug({ requestId, id: req.params.id }, "[todo.controller.findById] enter");

    const outcome = id.kind === "success" ? await repo.findById(id.value) : id;

    logger.debug(
      { requestId, outcome: outcome.kind },
      "[todo.controller.findById] exit"
    );
    respond(res, outcome, { body: (todo) => todo, notFoundMessage: MSG_NOT_FOUND });
  };
}
