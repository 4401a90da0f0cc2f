// backend/services/todo/src/models/Todo.ts
import { Schema, type Connection, type Model, type Types } from "mongoose";

export interface TodoDoc {
  _id: Types.ObjectId;
  task: string;
  completed: boolean;
}

export const TODO_COLLECTION = "todos";

const TodoSchema = new Schema<TodoDoc>(
  {
    task: { type: String, required: true },
    completed: { type: Boolean, required: true, default: false },
  },
  {
    strict: true,
    versionKey: false,
    // Fail fast instead of queueing when the connection drops.
    bufferCommands: false,
    collection: TODO_COLLECTION,
  }
);

export type TodoModel = Model<TodoDoc>;

/** Bind the schema to an explicit connection (no default-connection models). */
export function createTodoModel(connection: Connection): TodoModel {
  return connection.model<TodoDoc>("Todo", TodoSchema);
}
