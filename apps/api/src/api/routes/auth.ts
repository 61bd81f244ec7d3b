// ── Registration, login, logout, identity routes ────────────────────────────
import express from "express";
import bcrypt from "bcryptjs";
import { SESSION_COOKIE_NAME, setJwtCookieOnResponse, signJwt } from "@meplatform/core";
import type { AccountService } from "../../engine/accounts.js";
import type { UserStore } from "../../engine/userStore.js";
import { getActor, requireActor } from "../actorResolver.js";
import { sendData, sendFailure, sendInvalidPayload } from "../httpErrors.js";
import { loginRequestSchema, registerRequestSchema } from "../schemas.js";
import { getCorrelationId, logServerInfo } from "../serverMiddleware.js";

export const SESSION_TTL = "8h";
export const SESSION_MAX_AGE_SECONDS = 8 * 60 * 60;
export const BCRYPT_ROUNDS = 10;

type AuthRoutesOptions = {
  accounts: AccountService;
  users: UserStore;
  nodeEnv: string;
};

export function createAuthRoutes(opts: AuthRoutesOptions): express.Router {
  const router = express.Router();
  const { accounts, users } = opts;

  // POST /auth/register  { email, password, firstName, lastName }
  router.post("/auth/register", async (req, res, next) => {
    const correlationId = getCorrelationId(res);
    const parsed = registerRequestSchema.safeParse(req.body);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const { password, ...profile } = parsed.data;
    try {
      const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
      const result = accounts.register({ ...profile, passwordHash }, { correlationId });
      if (!result.ok) { sendFailure(res, result.error); return; }
      logServerInfo("auth.register", correlationId, { userId: result.value.id });
      sendData(res, result.value, 201);
    } catch (error) {
      next(error);
    }
  });

  // POST /auth/login  { email, password }
  router.post("/auth/login", async (req, res, next) => {
    const correlationId = getCorrelationId(res);
    const parsed = loginRequestSchema.safeParse(req.body);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    try {
      const credentials = users.findCredentials(parsed.data.email);
      const matches = credentials ? await bcrypt.compare(parsed.data.password, credentials.passwordHash) : false;
      if (!credentials || !matches) {
        res.status(401).json({ success: false, correlationId, error: "Invalid credentials" });
        return;
      }
      const { user } = credentials;
      if (!user.active) {
        res.status(403).json({ success: false, correlationId, error: "Your account is not active", code: "ACCOUNT_INACTIVE" });
        return;
      }

      const token = await signJwt({ sub: user.id, email: user.email }, { expiresIn: SESSION_TTL });
      setJwtCookieOnResponse(res, token, { maxAge: SESSION_MAX_AGE_SECONDS, sameSite: "lax" });
      logServerInfo("auth.login", correlationId, { userId: user.id });
      sendData(res, { token, user });
    } catch (error) {
      next(error);
    }
  });

  router.post("/auth/logout", requireActor(), (_req, res) => {
    res.clearCookie(SESSION_COOKIE_NAME, { httpOnly: true, secure: opts.nodeEnv === "production", sameSite: "lax", path: "/" });
    sendData(res, { loggedOut: true });
  });

  router.get("/auth/me", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }
    sendData(res, actor);
  });

  return router;
}
