// backend/services/todo/src/contracts/todo.ts

/** Wire + domain shape. `id` is the store-assigned ObjectId as 24-char hex. */
export type Todo = {
  id: string;
  task: string;
  completed: boolean;
};

export type NewTodo = Pick<Todo, "task">;

/** Partial update: only supplied fields change. */
export type TodoPatch = Partial<Pick<Todo, "task" | "completed">>;
