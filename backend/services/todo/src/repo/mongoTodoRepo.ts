// backend/services/todo/src/repo/mongoTodoRepo.ts
import type { Connection } from "mongoose";
import {
  type Outcome,
  storeUnavailable,
  success,
} from "../contracts/outcome";
import type { NewTodo, Todo, TodoPatch } from "../contracts/todo";
import { createTodoModel, type TodoDoc, type TodoModel } from "../models/Todo";
import { dbToDomain } from "../mappers/todo.mapper";
import type { TodoRepo } from "./todoRepo";

/**
 * Mongo-backed repo over the connection opened at startup.
 * Ids reaching this layer are already validated as ObjectId hex.
 */
export class MongoTodoRepo implements TodoRepo {
  private readonly model: TodoModel;

  constructor(connection: Connection) {
    this.model = createTodoModel(connection);
  }

  async create(input: NewTodo): Promise<Outcome<Todo>> {
    try {
      const [doc] = await this.model.create([
        { task: input.task, completed: false },
      ]);
      return success(dbToDomain(doc));
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async list(): Promise<Outcome<Todo[]>> {
    try {
      const docs = await this.model.find({}).lean<TodoDoc[]>().exec();
      return success(docs.map(dbToDomain));
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async findById(id: string): Promise<Outcome<Todo>> {
    try {
      const doc = await this.model.findById(id).lean<TodoDoc>().exec();
      return doc ? success(dbToDomain(doc)) : { kind: "notFound" };
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async update(id: string, patch: TodoPatch): Promise<Outcome<void>> {
    try {
      const res = await this.model
        .updateOne({ _id: id }, { $set: patch })
        .exec();
      if (res.matchedCount === 0) return { kind: "notFound" };
      if (res.modifiedCount === 0) return { kind: "noChange" };
      return success(undefined);
    } catch (err) {
      return storeUnavailable(err);
    }
  }

  async remove(id: string): Promise<Outcome<void>> {
    try {
      const res = await this.model.deleteOne({ _id: id }).exec();
      return res.deletedCount > 0 ? success(undefined) : { kind: "notFound" };
    } catch (err) {
      return storeUnavailable(err);
    }
  }
}
