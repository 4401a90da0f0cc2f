// backend/services/shared/test/logger.spec.ts
import { describe, it, expect, vi, afterEach } from "vitest";
import express from "express";
import request from "supertest";
import { makeHttpLogger } from "../src/middleware/httpLogger";
import { extractLogContext, isLogLevel } from "../src/utils/logger";

function contextApp(withHttpLogger: boolean) {
  const app = express();
  if (withHttpLogger) app.use(makeHttpLogger("test"));
  app.get("/items/:id", (req, res) => {
    res.json(extractLogContext(req));
  });
  return app;
}

describe("isLogLevel", () => {
  it("accepts pino levels and silent", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});

describe("import-time level", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it("falls back to info on an unknown LOG_LEVEL and takes the level from initLogger", async () => {
    vi.stubEnv("LOG_LEVEL", "loud");
    vi.resetModules();

    const fresh = await import("../src/utils/logger");
    expect(fresh.logger.level).toBe("info");

    fresh.initLogger("todo", "warn");
    expect(fresh.logger.level).toBe("warn");
  });
});

describe("extractLogContext", () => {
  it("collects the request id, path, method and :id param", async () => {
    const res = await request(contextApp(true))
      .get("/items/42?x=1")
      .set("x-request-id", "req-9")
      .expect(200);
    expect(res.body).toEqual({
      requestId: "req-9",
      path: "/items/42?x=1",
      method: "GET",
      entityId: "42",
    });
    expect(res.headers["x-request-id"]).toBe("req-9");
  });

  it("mints a request id when none is supplied", async () => {
    const res = await request(contextApp(true)).get("/items/1").expect(200);
    expect(res.body.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.headers["x-request-id"]).toBe(res.body.requestId);
  });

  it("reads correlation headers when no http logger ran", async () => {
    const res = await request(contextApp(false))
      .get("/items/1")
      .set("x-correlation-id", "corr-1")
      .expect(200);
    expect(res.body.requestId).toBe("corr-1");
  });

  it("reports a null request id when nothing identifies the request", async () => {
    const res = await request(contextApp(false)).get("/items/1").expect(200);
    expect(res.body.requestId).toBeNull();
  });
});
