import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import type express from "express";
import { bootstrapAdmin, createApp } from "../src/api/server.js";
import { createFixture, useTestJwtEnv, type Fixture } from "./helpers.js";

let fx: Fixture;
let app: express.Express;

beforeAll(() => {
  useTestJwtEnv();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

beforeEach(() => {
  fx = createFixture("auth-api-test-");
  app = createApp(fx.services, { nodeEnv: "test" });
});

afterEach(() => {
  fx.close();
});

const newUser = {
  email: "Amina@Example.org",
  password: "test-password",
  firstName: "Amina",
  lastName: "Juma",
};

describe("GET /health", () => {
  it("is public and carries the security headers", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "ok" });
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.headers["x-frame-options"]).toBe("DENY");
    expect(res.headers["cache-control"]).toBe("no-store");
    expect(res.headers["x-powered-by"]).toBeUndefined();
  });
});

describe("POST /auth/register", () => {
  it("creates an UNASSIGNED account without exposing the password hash", async () => {
    const res = await request(app).post("/auth/register").send(newUser);
    expect(res.status).toBe(201);
    expect(res.body.data.email).toBe("amina@example.org");
    expect(res.body.data.role).toBe("UNASSIGNED");
    expect(res.body.data.passwordHash).toBeUndefined();
  });

  it("refuses a duplicate email with 409", async () => {
    await request(app).post("/auth/register").send(newUser);
    const res = await request(app).post("/auth/register").send({ ...newUser, email: "amina@example.org" });
    expect(res.status).toBe(409);
  });

  it("validates the payload", async () => {
    const res = await request(app).post("/auth/register").send({ ...newUser, email: "not-an-email", password: "short" });
    expect(res.status).toBe(400);
    expect(res.body.issues.map((i: { path: string }) => i.path)).toEqual(["email", "password"]);
  });
});

describe("POST /auth/login", () => {
  beforeEach(async () => {
    await request(app).post("/auth/register").send(newUser);
  });

  it("issues a token that authenticates as bearer and as cookie", async () => {
    const login = await request(app).post("/auth/login").send({ email: "amina@example.org", password: "test-password" });
    expect(login.status).toBe(200);
    expect(typeof login.body.data.token).toBe("string");

    const viaBearer = await request(app).get("/auth/me").set("Authorization", `Bearer ${login.body.data.token}`);
    expect(viaBearer.body.data.email).toBe("amina@example.org");

    const setCookie: string[] = login.headers["set-cookie"];
    const cookie = setCookie[0]?.split(";")[0] ?? "";
    expect(cookie.startsWith("jwt=")).toBe(true);
    const viaCookie = await request(app).get("/auth/me").set("Cookie", cookie);
    expect(viaCookie.body.data.role).toBe("UNASSIGNED");
  });

  it("answers wrong credentials with 401", async () => {
    const wrongPassword = await request(app).post("/auth/login").send({ email: "amina@example.org", password: "nope-nope" });
    const unknown = await request(app).post("/auth/login").send({ email: "nobody@example.org", password: "test-password" });
    expect(wrongPassword.status).toBe(401);
    expect(unknown.status).toBe(401);
    expect(wrongPassword.body.error).toBe("Invalid credentials");
  });

  it("answers an inactive account with 403", async () => {
    const user = fx.services.users.findByEmail("amina@example.org");
    if (!user) throw new Error("setup failed");
    fx.services.users.setActive(user.id, false);
    const res = await request(app).post("/auth/login").send({ email: "amina@example.org", password: "test-password" });
    expect(res.status).toBe(403);
    expect(res.body.code).toBe("ACCOUNT_INACTIVE");
  });
});

describe("bootstrapAdmin", () => {
  it("creates a usable ADMIN account once", async () => {
    const config = { ADMIN_BOOTSTRAP_EMAIL: "root@example.org", ADMIN_BOOTSTRAP_PASSWORD: "test-password" };
    await bootstrapAdmin(fx.services, config);
    await bootstrapAdmin(fx.services, config);
    expect(fx.services.users.countByRole("ADMIN")).toBe(1);

    const login = await request(app).post("/auth/login").send({ email: "root@example.org", password: "test-password" });
    expect(login.status).toBe(200);
    expect(login.body.data.user.role).toBe("ADMIN");
  });

  it("does nothing without credentials", async () => {
    await bootstrapAdmin(fx.services, { ADMIN_BOOTSTRAP_EMAIL: undefined, ADMIN_BOOTSTRAP_PASSWORD: undefined });
    expect(fx.services.users.countByRole("ADMIN")).toBe(0);
  });
});

describe("unknown routes", () => {
  it("answer 404 in the envelope", async () => {
    const res = await request(app).get("/nowhere");
    expect(res.status).toBe(404);
    expect(res.body.success).toBe(false);
  });
});
