// backend/services/shared/test/core.spec.ts
import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import { coreMiddleware } from "../src/middleware/core";

function echoApp() {
  const app = express();
  app.use(coreMiddleware());
  app.post("/echo", (req, res) => {
    res.json({ received: req.body });
  });
  return app;
}

describe("coreMiddleware", () => {
  it("answers preflight for any origin", async () => {
    const res = await request(echoApp())
      .options("/echo")
      .set("Origin", "http://example.test")
      .set("Access-Control-Request-Method", "POST")
      .expect(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("parses JSON bodies and tags the response for any origin", async () => {
    const res = await request(echoApp())
      .post("/echo")
      .set("Origin", "http://other.test")
      .send({ task: "buy milk" })
      .expect(200);
    expect(res.body).toEqual({ received: { task: "buy milk" } });
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });
});
