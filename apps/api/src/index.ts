export { createApp, createServices, bootstrapAdmin, startServer, type Services, type CreateAppOptions } from "./api/server.js";
export { loadConfig, StartupConfigError, type AppConfig } from "./api/startupConfig.js";
export { openDatabase, runInTransaction } from "./engine/database.js";
export { RoleRequestWorkflow } from "./engine/roleRequestWorkflow.js";
export { TenantScopeGuard } from "./engine/tenantScopeGuard.js";
export type { Result, WorkflowError, WorkflowErrorKind } from "./engine/result.js";
export type * from "./engine/types.js";
