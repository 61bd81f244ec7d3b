import { describe, it, expect } from "vitest";
import express from "express";
import request from "supertest";
import { correlationId } from "../src/middleware.js";

function createApp() {
  const app = express();
  app.use(correlationId());
  app.get("/echo", (_req, res) => {
    res.json({ correlationId: res.locals.correlationId });
  });
  return app;
}

describe("correlationId", () => {
  it("echoes a well-formed incoming id", async () => {
    const res = await request(createApp()).get("/echo").set("X-Correlation-Id", "req-12345678");
    expect(res.headers["x-correlation-id"]).toBe("req-12345678");
    expect(res.body.correlationId).toBe("req-12345678");
  });

  it("replaces a malformed id with a generated uuid", async () => {
    const res = await request(createApp()).get("/echo").set("X-Correlation-Id", "bad id!");
    expect(res.body.correlationId).not.toBe("bad id!");
    expect(res.body.correlationId).toMatch(/^[0-9a-f-]{36}$/);
    expect(res.headers["x-correlation-id"]).toBe(res.body.correlationId);
  });
});
