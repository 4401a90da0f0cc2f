// backend/services/todo/test/todo.update.spec.ts
import { describe, it, expect } from "vitest";
import { makeAgent, MISSING_ID } from "./helpers/app";

const UPDATED = { message: "To-do item updated successfully" };
const MISS_OR_NOOP = { error: "To-do item not found or no changes made" };

describe("PUT /todos/:id", () => {
  it("updates only completed and leaves task as it was", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");

    const res = await agent.put(`/todos/${todo.id}`).send({ completed: true }).expect(200);
    expect(res.body).toEqual(UPDATED);

    const got = await agent.get(`/todos/${todo.id}`).expect(200);
    expect(got.body).toEqual({ id: todo.id, task: "buy milk", completed: true });
  });

  it("updates only task and leaves completed as it was", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk", true);

    await agent.put(`/todos/${todo.id}`).send({ task: "buy oat milk" }).expect(200);

    const got = await agent.get(`/todos/${todo.id}`).expect(200);
    expect(got.body).toEqual({ id: todo.id, task: "buy oat milk", completed: true });
  });

  it("drops unknown keys alongside a valid field", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");

    await agent
      .put(`/todos/${todo.id}`)
      .send({ task: "buy bread", priority: "high" })
      .expect(200);

    const got = await agent.get(`/todos/${todo.id}`).expect(200);
    expect(got.body).toEqual({ id: todo.id, task: "buy bread", completed: false });
  });

  it("404 when the values are already current", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");
    const res = await agent.put(`/todos/${todo.id}`).send({ task: "buy milk" }).expect(404);
    expect(res.body).toEqual(MISS_OR_NOOP);
  });

  it("404 when the id is not stored", async () => {
    const { agent } = makeAgent();
    const res = await agent.put(`/todos/${MISSING_ID}`).send({ completed: true }).expect(404);
    expect(res.body).toEqual(MISS_OR_NOOP);
  });

  it("400 when the body is empty", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");
    const noBody = await agent.put(`/todos/${todo.id}`).expect(400);
    expect(noBody.body).toEqual({ error: "No data provided for update" });
    const emptyObject = await agent.put(`/todos/${todo.id}`).send({}).expect(400);
    expect(emptyObject.body).toEqual({ error: "No data provided for update" });
  });

  it("400 when no recognised field is present", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");
    const res = await agent.put(`/todos/${todo.id}`).send({ priority: "high" }).expect(400);
    expect(res.body).toEqual({ error: "No valid fields to update" });
  });

  it("400 when a field has the wrong type", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");
    const res = await agent.put(`/todos/${todo.id}`).send({ completed: "yes" }).expect(400);
    expect(res.body).toEqual({ error: '"completed" must be a boolean' });

    const got = await agent.get(`/todos/${todo.id}`).expect(200);
    expect(got.body.completed).toBe(false);
  });

  it("400 for a malformed id, checked before the body", async () => {
    const { agent } = makeAgent();
    const res = await agent.put("/todos/abc").send({}).expect(400);
    expect(res.body).toEqual({ error: 'Invalid to-do id "abc"' });
  });

  it("500 when the store fails", async () => {
    const { agent, repo } = makeAgent();
    const todo = repo.seed("buy milk");
    repo.failWith("not primary");
    const res = await agent.put(`/todos/${todo.id}`).send({ completed: true }).expect(500);
    expect(res.body).toEqual({ error: "not primary" });
  });
});
