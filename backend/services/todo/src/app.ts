// backend/services/todo/src/app.ts
/**
 * Todo service app. The repository (and its connection) is constructed by
 * the entrypoint and injected here, so tests can swap in an in-memory repo.
 */

import type { Express } from "express";
import { createServiceApp } from "@shared/app/createServiceApp";
import type { ReadinessFn } from "@shared/health";
import { todoRoutes } from "./routes/todoRoutes";
import type { TodoRepo } from "./repo/todoRepo";

export const SERVICE_NAME = "todo" as const;

export type TodoAppDeps = {
  repo: TodoRepo;
  readiness?: ReadinessFn;
};

export function createTodoApp(deps: TodoAppDeps): Express {
  return createServiceApp({
    serviceName: SERVICE_NAME,
    readiness: deps.readiness,
    mountRoutes: (api) => {
      api.use("/todos", todoRoutes(deps.repo));
    },
  });
}
