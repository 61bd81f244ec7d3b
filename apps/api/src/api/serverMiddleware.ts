// ── Express middleware: security headers, request logging, structured logs ──
import crypto from "node:crypto";
import express from "express";

// ── Security headers middleware ─────────────────────────────────────────────

export function createSecurityHeadersMiddleware() {
  return (_req: express.Request, res: express.Response, next: express.NextFunction): void => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    res.setHeader("X-Frame-Options", "DENY");
    res.setHeader("Cache-Control", "no-store");
    res.setHeader("Content-Security-Policy", "default-src 'none'; frame-ancestors 'none'");
    next();
  };
}

// ── Correlation ID ──────────────────────────────────────────────────────────

export function getCorrelationId(res: express.Response): string {
  const fromLocals = typeof res.locals?.correlationId === "string" ? res.locals.correlationId : "";
  return fromLocals || crypto.randomUUID();
}

// ── Structured logging ──────────────────────────────────────────────────────

export function logServerError(scope: string, correlationId: string, error: unknown): void {
  const serialized = {
    level: "error",
    scope,
    correlationId,
    name: error instanceof Error ? error.name : "UnknownError",
    message: error instanceof Error ? error.message : "Unhandled server error",
    timestamp: new Date().toISOString(),
  };
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(serialized));
}

export function logServerInfo(scope: string, correlationId: string, details: Record<string, unknown>): void {
  const serialized = {
    level: "info",
    scope,
    correlationId,
    timestamp: new Date().toISOString(),
    ...details,
  };
  // eslint-disable-next-line no-console
  console.info(JSON.stringify(serialized));
}

/** One info line per finished request. Silent under NODE_ENV=test. */
export function createRequestLogger(nodeEnv: string) {
  return (req: express.Request, res: express.Response, next: express.NextFunction): void => {
    if (nodeEnv === "test") return next();
    const startedAt = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1_000_000;
      logServerInfo("http", getCorrelationId(res), {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Math.round(durationMs),
      });
    });
    next();
  };
}
