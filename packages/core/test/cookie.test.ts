import { describe, it, expect, afterEach } from "vitest";
import express from "express";
import request from "supertest";
import { createJwtCookie, setJwtCookieOnResponse } from "../src/cookie.js";

const savedNodeEnv = process.env.NODE_ENV;

afterEach(() => {
  if (savedNodeEnv === undefined) delete process.env.NODE_ENV;
  else process.env.NODE_ENV = savedNodeEnv;
  delete process.env.COOKIE_DOMAIN;
});

describe("createJwtCookie", () => {
  it("builds an httpOnly, lax, root-path cookie", () => {
    process.env.NODE_ENV = "test";
    expect(createJwtCookie("abc", { maxAge: 60 })).toBe("jwt=abc; Max-Age=60; Path=/; HttpOnly; SameSite=Lax");
  });

  it("marks the cookie secure in production and scopes it to COOKIE_DOMAIN", () => {
    process.env.NODE_ENV = "production";
    process.env.COOKIE_DOMAIN = "example.org";
    const cookie = createJwtCookie("abc");
    expect(cookie).toContain("Domain=example.org");
    expect(cookie).toContain("Secure");
    expect(cookie).toContain("Max-Age=3600");
  });
});

describe("setJwtCookieOnResponse", () => {
  it("appends to cookies already set on the response", async () => {
    const app = express();
    app.get("/", (_req, res) => {
      res.setHeader("Set-Cookie", "theme=dark");
      setJwtCookieOnResponse(res, "abc");
      res.end();
    });
    const res = await request(app).get("/");
    const cookies: string[] = res.headers["set-cookie"];
    expect(cookies).toHaveLength(2);
    expect(cookies[0]).toBe("theme=dark");
    expect(cookies[1]?.startsWith("jwt=abc;")).toBe(true);
  });
});
