// ── M&E platform API server ─────────────────────────────────────────────────
import path from "node:path";
import { fileURLToPath } from "node:url";
import bcrypt from "bcryptjs";
import type Database from "better-sqlite3";
import express from "express";
import { cookieParserMiddleware, correlationId, createOptionalJwtAuthenticationMiddleware } from "@meplatform/core";
import { AccountService } from "../engine/accounts.js";
import { AuditTrail } from "../engine/auditTrail.js";
import { openDatabase } from "../engine/database.js";
import { NotificationDispatch } from "../engine/notificationDispatch.js";
import { RoleRequestStore } from "../engine/roleRequestStore.js";
import { RoleRequestWorkflow } from "../engine/roleRequestWorkflow.js";
import { TenantScopeGuard } from "../engine/tenantScopeGuard.js";
import { TenantStore } from "../engine/tenantStore.js";
import { UserStore } from "../engine/userStore.js";
import { ActorResolver, createActorMiddleware } from "./actorResolver.js";
import { createAuditLogRoutes } from "./routes/auditLogs.js";
import { BCRYPT_ROUNDS, createAuthRoutes } from "./routes/auth.js";
import { createNotificationRoutes } from "./routes/notifications.js";
import { createRoleRequestRoutes } from "./routes/roleRequests.js";
import { createTenantRoutes } from "./routes/tenants.js";
import {
  createRequestLogger,
  createSecurityHeadersMiddleware,
  getCorrelationId,
  logServerError,
  logServerInfo,
} from "./serverMiddleware.js";
import { loadConfig, StartupConfigError, type AppConfig } from "./startupConfig.js";

const __filename = fileURLToPath(import.meta.url);

// ── Services ────────────────────────────────────────────────────────────────

export type Services = {
  db: Database.Database;
  users: UserStore;
  tenants: TenantStore;
  requests: RoleRequestStore;
  notifications: NotificationDispatch;
  audit: AuditTrail;
  guard: TenantScopeGuard;
  workflow: RoleRequestWorkflow;
  accounts: AccountService;
  actors: ActorResolver;
};

/** Every store shares `db`, so a workflow transaction spans all of them. */
export function createServices(db: Database.Database): Services {
  const users = new UserStore(db);
  const tenants = new TenantStore(db);
  const requests = new RoleRequestStore(db);
  const notifications = new NotificationDispatch(db);
  const audit = new AuditTrail(db);
  const guard = new TenantScopeGuard(users);
  const workflow = new RoleRequestWorkflow({ db, users, tenants, requests, notifications, audit, guard });
  const accounts = new AccountService({ db, users, tenants, audit, guard });
  const actors = new ActorResolver(users);
  return { db, users, tenants, requests, notifications, audit, guard, workflow, accounts, actors };
}

// ── createApp ───────────────────────────────────────────────────────────────

export type CreateAppOptions = {
  nodeEnv?: string;
  /** Upper bound for JSON request bodies. */
  jsonLimit?: string;
};

export function createApp(services: Services, options: CreateAppOptions = {}): express.Express {
  const nodeEnv = options.nodeEnv ?? process.env.NODE_ENV ?? "development";
  const app = express();
  app.disable("x-powered-by");

  app.use(correlationId());
  app.use(createRequestLogger(nodeEnv));
  app.use(createSecurityHeadersMiddleware());
  app.use(express.json({ limit: options.jsonLimit ?? "100kb" }));
  app.use(cookieParserMiddleware());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.use(createOptionalJwtAuthenticationMiddleware());
  app.use(createActorMiddleware(services.actors));

  app.use(createAuthRoutes({ accounts: services.accounts, users: services.users, nodeEnv }));
  app.use(createRoleRequestRoutes({ workflow: services.workflow }));
  app.use(createNotificationRoutes({ notifications: services.notifications }));
  app.use(createAuditLogRoutes({ audit: services.audit, guard: services.guard }));
  app.use(createTenantRoutes({ accounts: services.accounts }));

  app.use((_req, res) => {
    res.status(404).json({ success: false, correlationId: getCorrelationId(res), error: "Not Found" });
  });

  // ── Global error handler ──────────────────────────────────────────────
  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const correlationId = getCorrelationId(res);
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, correlationId, error: "Invalid JSON body" });
      return;
    }
    logServerError(`${req.method} ${req.path}`, correlationId, error);
    res.status(500).json({ success: false, correlationId, error: "Internal server error" });
  });

  return app;
}

// ── ADMIN bootstrap ─────────────────────────────────────────────────────────

/** Creates the first ADMIN from configuration when none exists yet. */
export async function bootstrapAdmin(
  services: Services,
  config: Pick<AppConfig, "ADMIN_BOOTSTRAP_EMAIL" | "ADMIN_BOOTSTRAP_PASSWORD">,
): Promise<void> {
  const email = config.ADMIN_BOOTSTRAP_EMAIL;
  const password = config.ADMIN_BOOTSTRAP_PASSWORD;
  if (!email || !password) return;
  if (services.users.countByRole("ADMIN") > 0) return;

  const passwordHash = await bcrypt.hash(password, BCRYPT_ROUNDS);
  const result = services.accounts.bootstrapAdmin({ email, firstName: "Platform", lastName: "Admin", passwordHash });
  if (!result.ok) throw new Error(`ADMIN bootstrap failed: ${result.error.message}`);
  if (result.value) logServerInfo("bootstrap.admin", "startup", { userId: result.value.id, email: result.value.email });
}

// ── Standalone launcher ─────────────────────────────────────────────────────

export async function startServer(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof StartupConfigError) {
      // eslint-disable-next-line no-console
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const services = createServices(openDatabase(config.DB_PATH));
  await bootstrapAdmin(services, config);

  const app = createApp(services, { nodeEnv: config.NODE_ENV });
  app.listen(config.PORT, () => {
    logServerInfo("server", "startup", { port: config.PORT, dbPath: path.resolve(config.DB_PATH) });
  });
}

if (process.argv[1] && path.resolve(process.argv[1]) === __filename) {
  startServer().catch((error: unknown) => {
    logServerError("server", "startup", error);
    process.exit(1);
  });
}
