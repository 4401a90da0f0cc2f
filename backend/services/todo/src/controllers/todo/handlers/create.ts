// backend/services/todo/src/controllers/todo/handlers/create.ts
import type { Request, Response } from "express";
import { logger, requestIdOf } from "@shared/utils/logger";
import { parseCreateTodo } from "../../../validators/todo.dto";
import type { TodoRepo } from "../../../repo/todoRepo";
import { respond } from "../respond";

/**
 * Create Todo: 201 with the stored record; `completed` always starts false.
 */
export function create(repo: TodoRepo) {
  return async (req: Request, res: Response) => {
    const requestId = requestIdOf(req);
    logger.debug({ requestId }, "[todo.controller.create] enter");

    const dto = parseCreateTodo(req.body);
    const outcome = dto.kind === "success" ? await repo.create(dto.value) : dto;

    logger.debug(
      { requestId, outcome: outcome.kind },
      "[todo.controller.create] exit"
    );
    respond(res, outcome, { successStatus: 201, body: (todo) => todo });
  };
}
