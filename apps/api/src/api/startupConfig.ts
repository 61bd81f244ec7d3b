// ── Startup configuration validation ────────────────────────────────────────
//
// Validates required and optional environment variables at process start
// using zod. On failure the launcher logs the formatted issues and exits
// non-zero.

import path from "node:path";
import { z } from "zod";

// ── Schema ──────────────────────────────────────────────────────────────────

/** Non-empty trimmed string (rejects "" and whitespace-only). */
const nonEmptyString = z.string().trim().min(1);

/** Blank strings count as absent. */
const optionalString = z.string().optional().transform((value) => (value ?? "").trim() || undefined);

export const DEFAULT_DATA_DIR = "./data";
export const DB_FILE_NAME = "meplatform.db";

export const startupConfigSchema = z
  .object({
    // ── Required ────────────────────────────────────────────────────────
    JWT_SECRET: nonEmptyString,
    AUTH_ISSUER: nonEmptyString,
    AUTH_AUDIENCE: nonEmptyString,

    // ── Optional ────────────────────────────────────────────────────────
    DATA_DIR: optionalString.transform((value) => value ?? DEFAULT_DATA_DIR),
    DB_PATH: optionalString,
    PORT: optionalString.pipe(z.coerce.number().int().min(1).max(65535).default(3000)),
    NODE_ENV: optionalString.transform((value) => value ?? "development"),
    ADMIN_BOOTSTRAP_EMAIL: optionalString.pipe(z.string().email().optional()),
    ADMIN_BOOTSTRAP_PASSWORD: optionalString.pipe(z.string().min(8).optional()),
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.ADMIN_BOOTSTRAP_EMAIL) !== Boolean(env.ADMIN_BOOTSTRAP_PASSWORD)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ADMIN_BOOTSTRAP_PASSWORD"],
        message: "ADMIN_BOOTSTRAP_EMAIL and ADMIN_BOOTSTRAP_PASSWORD must be set together",
      });
    }
  })
  .transform((env) => ({
    ...env,
    DB_PATH: env.DB_PATH ?? path.join(env.DATA_DIR, DB_FILE_NAME),
  }));

export type AppConfig = z.infer<typeof startupConfigSchema>;

// ── Loader ──────────────────────────────────────────────────────────────────

/**
 * Parse and validate startup configuration from `process.env`.
 *
 * Throws a `StartupConfigError` with formatted messages on failure.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const result = startupConfigSchema.safeParse(env);

  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `  • ${issue.path.join(".")}: ${issue.message}`,
    );
    throw new StartupConfigError(
      `Startup config validation failed:\n${messages.join("\n")}`,
      result.error.issues,
    );
  }

  return result.data;
}

/** Typed error thrown by loadConfig() so callers can inspect issues programmatically. */
export class StartupConfigError extends Error {
  readonly issues: z.ZodIssue[];
  constructor(message: string, issues: z.ZodIssue[]) {
    super(message);
    this.name = "StartupConfigError";
    this.issues = issues;
  }
}
