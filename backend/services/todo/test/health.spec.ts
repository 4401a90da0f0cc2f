// backend/services/todo/test/health.spec.ts
import { describe, it, expect } from "vitest";
import mongoose from "mongoose";
import { mongoReadiness } from "../src/db";
import { makeAgent } from "./helpers/app";

describe("health + routing", () => {
  it("GET /healthz is 200 without touching the store", async () => {
    const { agent, repo } = makeAgent();
    repo.failWith("down");
    const res = await agent.get("/healthz").expect(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("GET /readyz is 200 when no readiness check is wired", async () => {
    const { agent } = makeAgent();
    const res = await agent.get("/readyz").expect(200);
    expect(res.body).toEqual({ status: "ok" });
  });

  it("GET /readyz merges readiness details", async () => {
    const { agent } = makeAgent({ readiness: () => ({ mongo: "ok" }) });
    const res = await agent.get("/readyz").expect(200);
    expect(res.body).toEqual({ status: "ok", mongo: "ok" });
  });

  it("GET /readyz is 503 while the Mongo connection is not open", async () => {
    const { agent } = makeAgent({
      readiness: mongoReadiness(mongoose.createConnection()),
    });
    const res = await agent.get("/readyz").expect(503);
    expect(res.body).toEqual({ status: "unavailable", error: "mongo readyState=0" });
  });

  it("unknown routes are a JSON 404", async () => {
    const { agent } = makeAgent();
    const res = await agent.get("/nope").expect(404);
    expect(res.body).toEqual({ error: "Not Found" });
  });

  it("unsupported methods are a JSON 405 with Allow", async () => {
    const { agent } = makeAgent();
    const coll = await agent.patch("/todos").send({}).expect(405);
    expect(coll.body).toEqual({ error: "Method Not Allowed" });
    expect(coll.headers["allow"]).toBe("GET, POST");

    const item = await agent.post("/todos/0123456789abcdef01234567").expect(405);
    expect(item.headers["allow"]).toBe("GET, PUT, DELETE");
  });

  it("answers CORS preflight for any origin", async () => {
    const { agent } = makeAgent();
    const res = await agent
      .options("/todos")
      .set("Origin", "http://example.test")
      .set("Access-Control-Request-Method", "POST")
      .expect(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("does not advertise the framework", async () => {
    const { agent } = makeAgent();
    const res = await agent.get("/healthz");
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });
});
