import type { Response } from "express";
import { serialize } from "cookie";
import { SESSION_COOKIE_NAME } from "./auth.js";

export type JwtCookieOptions = {
  /** Seconds. */
  maxAge?: number;
  sameSite?: "strict" | "lax" | "none";
};

export function createJwtCookie(jwt: string, opts?: JwtCookieOptions): string {
  const maxAge = opts?.maxAge ?? 60 * 60;
  const sameSite = opts?.sameSite ?? "lax";
  const domain = process.env.COOKIE_DOMAIN || undefined;
  const cookieOpts: Parameters<typeof serialize>[2] = {
    path: "/",
    httpOnly: true,
    secure: process.env.NODE_ENV === "production",
    sameSite,
    maxAge,
  };
  if (domain) cookieOpts.domain = domain;
  return serialize(SESSION_COOKIE_NAME, jwt, cookieOpts);
}

export function setJwtCookieOnResponse(res: Response, jwt: string, opts?: JwtCookieOptions): void {
  const cookie = createJwtCookie(jwt, opts);
  const existing = res.getHeader("Set-Cookie");
  if (existing) {
    const arr = Array.isArray(existing) ? existing : [String(existing)];
    res.setHeader("Set-Cookie", [...arr, cookie]);
  } else {
    res.setHeader("Set-Cookie", cookie);
  }
}
