// ── Actor resolution ────────────────────────────────────────────────────────
//
// Turns a bearer credential into the Actor value the guard and workflow take
// as an explicit argument. Role and scope are read from the users table on
// every call, so an approved role takes effect on the requester's next
// request without a new token.
//
import type { NextFunction, Request, RequestHandler, Response } from "express";
import { getAuthContext, verifyJwt, type AuthContext } from "@meplatform/core";
import { toActor, type Actor, type Role } from "../engine/types.js";
import type { UserStore } from "../engine/userStore.js";
import { getCorrelationId } from "./serverMiddleware.js";

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      actor?: Actor;
    }
  }
}

export class ActorResolver {
  constructor(private readonly users: UserStore) {}

  /** Null for an invalid or expired token, or a subject with no user row. */
  async resolve(token: string): Promise<Actor | null> {
    let claims: AuthContext;
    try {
      claims = await verifyJwt(token);
    } catch {
      return null;
    }
    return this.fromClaims(claims);
  }

  /** Claims already verified upstream. */
  fromClaims(claims: AuthContext): Actor | null {
    if (!claims.sub) return null;
    const user = this.users.findById(claims.sub);
    return user ? toActor(user) : null;
  }
}

/**
 * Runs after the core optional JWT middleware and turns its verified claims
 * into an Actor once per request. Routes that need one add `requireActor()`.
 */
export function createActorMiddleware(resolver: ActorResolver): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const claims = getAuthContext(req);
    const actor = claims ? resolver.fromClaims(claims) : null;
    if (actor) req.actor = actor;
    next();
  };
}

export function getActor(req: Request): Actor | null {
  return req.actor ?? null;
}

export function requireActor(): RequestHandler {
  return (req, res, next) => {
    if (!req.actor) {
      res.status(401).json({ success: false, correlationId: getCorrelationId(res), error: "Unauthorized" });
      return;
    }
    next();
  };
}

/** Role gate. Inactive accounts are refused whatever their role. */
export function requireRoles(...allowedRoles: Role[]): RequestHandler {
  return (req, res, next) => {
    const actor = req.actor;
    const correlationId = getCorrelationId(res);
    if (!actor) {
      res.status(401).json({ success: false, correlationId, error: "Unauthorized" });
      return;
    }
    if (!actor.active) {
      res.status(403).json({ success: false, correlationId, error: "Your account is not active", code: "ACCOUNT_INACTIVE" });
      return;
    }
    if (!allowedRoles.includes(actor.role)) {
      res.status(403).json({ success: false, correlationId, error: "Forbidden", code: "PERMISSION_DENIED" });
      return;
    }
    next();
  };
}
