// backend/services/todo/src/controllers/todo/handlers/list.ts
import type { Request, Response } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import type { TodoRepo } from "../../../repo/todoRepo";
import { respond } from "../respond";

export function list(repo: TodoRepo) {
  return async (req: Request, res: Response) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[todo.controller.list] enter");
    const outcome = await repo.list();
    logger.debug(
      {
        requestId,
        count: outcome.kind === "success" ? outcome.value.length : undefined,
      },
      "[todo.controller.list] exit"
    );
    respond(res, outcome, { body: (items) => items });
  };
}
