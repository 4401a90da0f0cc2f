// backend/services/todo/src/validators/todo.dto.ts
import { z } from "zod";
import {
  type Outcome,
  success,
  validationFailed,
} from "../contracts/outcome";
import type { NewTodo, TodoPatch } from "../contracts/todo";

export const MSG_MISSING_TASK = 'Missing "task" field';
export const MSG_NO_UPDATE_DATA = "No data provided for update";
export const MSG_NO_VALID_FIELDS = "No valid fields to update";

const task = z
  .string({
    required_error: MSG_MISSING_TASK,
    invalid_type_error: '"task" must be a non-empty string',
  })
  .min(1, '"task" must be a non-empty string');

const completed = z.boolean({
  invalid_type_error: '"completed" must be a boolean',
});

/**
 * CREATE (API surface): caller supplies only `task`; `completed` starts false.
 */
export const createTodoDto = z.object({ task });

/**
 * UPDATE (API surface): partial on the mutable fields; unknown keys dropped.
 */
export const updateTodoDto = z.object({
  task: task.optional(),
  completed: completed.optional(),
});

/**
 * PARAMS: /:id must be a 24-hex ObjectId; anything else is a client error.
 */
export const todoIdDto = z.string().regex(/^[0-9a-fA-F]{24}$/);

function isJsonObject(body: unknown): body is Record<string, unknown> {
  return typeof body === "object" && body !== null && !Array.isArray(body);
}

function firstIssue(err: z.ZodError): string {
  return err.issues[0]?.message ?? "Invalid request body";
}

export function parseCreateTodo(body: unknown): Outcome<NewTodo> {
  if (!isJsonObject(body)) return validationFailed(MSG_MISSING_TASK);
  const r = createTodoDto.safeParse(body);
  return r.success ? success(r.data) : validationFailed(firstIssue(r.error));
}

export function parseTodoPatch(body: unknown): Outcome<TodoPatch> {
  if (!isJsonObject(body) || Object.keys(body).length === 0) {
    return validationFailed(MSG_NO_UPDATE_DATA);
  }
  if (!("task" in body) && !("completed" in body)) {
    return validationFailed(MSG_NO_VALID_FIELDS);
  }
  const r = updateTodoDto.safeParse(body);
  return r.success ? success(r.data) : validationFailed(firstIssue(r.error));
}

export function parseTodoId(raw: string): Outcome<string> {
  return todoIdDto.safeParse(raw).success
    ? success(raw)
    : validationFailed(`Invalid to-do id "${raw}"`);
}
