// backend/services/todo/src/mappers/todo.mapper.ts
import type { Todo } from "../contracts/todo";
import type { TodoDoc } from "../models/Todo";

/**
 * DB → wire. `_id` becomes `id`; nothing else leaves the store shape.
 */
export function dbToDomain(doc: TodoDoc): Todo {
  return {
    id: doc._id.toHexString(),
    task: doc.task,
    completed: doc.completed,
  };
}
