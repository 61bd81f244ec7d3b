// ── Result → HTTP response mapping ─────────────────────────────────────────
import type express from "express";
import type { z } from "zod";
import type { WorkflowError, WorkflowErrorKind } from "../engine/result.js";
import { getCorrelationId } from "./serverMiddleware.js";

export const STATUS_BY_KIND: Record<WorkflowErrorKind, number> = {
  NOT_FOUND: 404,
  ALREADY_EXISTS: 409,
  INVALID_STATE: 409,
  PERMISSION_DENIED: 403,
  INVALID_INPUT: 400,
  ACCOUNT_INACTIVE: 403,
  NO_ELIGIBLE_APPROVER: 503,
};

export function sendFailure(res: express.Response, error: WorkflowError): void {
  res.status(STATUS_BY_KIND[error.kind]).json({
    success: false,
    correlationId: getCorrelationId(res),
    error: error.message,
    code: error.kind,
  });
}

export function sendInvalidPayload(res: express.Response, issues: z.ZodIssue[]): void {
  res.status(400).json({
    success: false,
    correlationId: getCorrelationId(res),
    error: "Invalid request payload",
    code: "INVALID_INPUT",
    issues: issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  });
}

export function sendData(res: express.Response, data: unknown, status = 200): void {
  res.status(status).json({ success: true, correlationId: getCorrelationId(res), data });
}
