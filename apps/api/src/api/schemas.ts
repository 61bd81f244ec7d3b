// ── Request payload schemas ─────────────────────────────────────────────────
import { z } from "zod";
import { NOTIFICATION_TYPES, PRIORITIES, REQUEST_STATUSES } from "../engine/types.js";

const trimmed = z.string().trim();
const paging = {
  limit: z.coerce.number().int().min(1).max(500).optional(),
  offset: z.coerce.number().int().min(0).optional(),
};

export const registerRequestSchema = z.object({
  email: trimmed.email().max(254),
  password: z.string().min(8).max(200),
  firstName: trimmed.min(1).max(100),
  lastName: trimmed.min(1).max(100),
});

export const loginRequestSchema = z.object({
  email: trimmed.min(1),
  password: z.string().min(1),
});

export const createRoleRequestSchema = z.object({
  partnerId: z.string(),
  centerId: z.string().nullish(),
  requestedRole: z.string(),
});

export const rejectRoleRequestSchema = z.object({
  comment: z.string().optional(),
});

export const roleRequestListQuerySchema = z.object({
  status: z.enum(REQUEST_STATUSES).optional(),
  ...paging,
});

export const notificationListQuerySchema = z.object({
  all: z.enum(["true", "false"]).optional(),
  type: z.enum(NOTIFICATION_TYPES).optional(),
  priority: z.enum(PRIORITIES).optional(),
  ...paging,
});

export const auditLogQuerySchema = z.object({
  actorId: trimmed.min(1).optional(),
  action: trimmed.min(1).optional(),
  entityType: trimmed.min(1).optional(),
  from: z.string().datetime().optional(),
  to: z.string().datetime().optional(),
  partnerId: trimmed.min(1).optional(),
  ...paging,
});

export const createPartnerSchema = z.object({
  partnerId: trimmed.regex(/^[A-Za-z0-9_-]{2,32}$/, "partnerId must be 2-32 letters, digits, '_' or '-'"),
  name: trimmed.min(1).max(200),
  country: trimmed.max(100).nullish(),
});

export const createCenterSchema = z.object({
  name: trimmed.min(1).max(200),
  location: trimmed.max(200).nullish(),
});
