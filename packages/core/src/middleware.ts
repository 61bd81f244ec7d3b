import type { RequestHandler } from "express";
import cookieParser from "cookie-parser";
import crypto from "node:crypto";

export const CORRELATION_ID_HEADER = "x-correlation-id";
export const CORRELATION_ID_PATTERN = /^[A-Za-z0-9._:-]{8,128}$/;

export function cookieParserMiddleware(): RequestHandler {
  return cookieParser();
}

function normalizeCorrelationId(value: string | undefined): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  return CORRELATION_ID_PATTERN.test(trimmed) ? trimmed : null;
}

/**
 * Correlation ID middleware.
 * Reads `x-correlation-id` from the incoming request or generates a new UUID,
 * stores it on `res.locals.correlationId` and echoes the header on the response.
 */
export function correlationId(): RequestHandler {
  return (req, res, next) => {
    const id = normalizeCorrelationId(req.get(CORRELATION_ID_HEADER)) ?? crypto.randomUUID();
    res.locals.correlationId = id;
    res.setHeader("X-Correlation-Id", id);
    next();
  };
}
