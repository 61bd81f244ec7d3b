import type { Request, RequestHandler } from "express";
import type { JWTPayload } from "jose";
import { verifyJwt } from "./jwt.js";

export type AuthContext = JWTPayload;

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      auth?: AuthContext;
    }
  }
}

export const SESSION_COOKIE_NAME = "jwt";

/** Extract JWT from cookie or Authorization: Bearer header. */
export function extractToken(req: Request): string | null {
  const cookies: Record<string, unknown> | undefined = req.cookies;
  const fromCookie = cookies?.[SESSION_COOKIE_NAME];
  if (typeof fromCookie === "string" && fromCookie) return fromCookie;
  const authHeader = req.headers.authorization;
  if (typeof authHeader === "string" && authHeader.startsWith("Bearer ")) {
    return authHeader.slice(7);
  }
  return null;
}

/**
 * Verifies the token when one is present and sets `req.auth`. A missing or
 * invalid token leaves the request unauthenticated; routes decide whether
 * that is acceptable.
 */
export function createOptionalJwtAuthenticationMiddleware(): RequestHandler {
  return async (req, _res, next) => {
    const token = extractToken(req);
    if (!token) return next();
    try {
      req.auth = await verifyJwt(token);
    } catch {
      // optional: an invalid token leaves the request unauthenticated
      delete req.auth;
    }
    next();
  };
}

export function getAuthContext(req: Request): AuthContext | null {
  return req.auth ?? null;
}
