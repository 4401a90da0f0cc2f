// backend/services/todo/src/repo/todoRepo.ts
import type { Outcome } from "../contracts/outcome";
import type { NewTodo, Todo, TodoPatch } from "../contracts/todo";

/**
 * Store port. Each method issues exactly one store operation and reports
 * driver failures as `storeUnavailable` instead of throwing.
 */
export interface TodoRepo {
  create(input: NewTodo): Promise<Outcome<Todo>>;
  list(): Promise<Outcome<Todo[]>>;
  findById(id: string): Promise<Outcome<Todo>>;
  /** success when at least one field changed; notFound | noChange otherwise. */
  update(id: string, patch: TodoPatch): Promise<Outcome<void>>;
  remove(id: string): Promise<Outcome<void>>;
}
