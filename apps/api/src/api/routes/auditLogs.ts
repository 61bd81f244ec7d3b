// ── Audit log routes ────────────────────────────────────────────────────────
//
// ADMIN and DONOR read the whole trail. An ME_OFFICER only sees entries
// written by users of their own partner.
//
import express from "express";
import type { AuditTrail } from "../../engine/auditTrail.js";
import type { TenantScopeGuard } from "../../engine/tenantScopeGuard.js";
import type { Role } from "../../engine/types.js";
import { getActor, requireRoles } from "../actorResolver.js";
import { sendData, sendInvalidPayload } from "../httpErrors.js";
import { auditLogQuerySchema } from "../schemas.js";
import { getCorrelationId } from "../serverMiddleware.js";

const AUDIT_READERS: Role[] = ["ADMIN", "DONOR", "ME_OFFICER"];

export type AuditLogRouteOptions = {
  audit: AuditTrail;
  guard: TenantScopeGuard;
};

export function createAuditLogRoutes(opts: AuditLogRouteOptions): express.Router {
  const router = express.Router();
  const { audit, guard } = opts;

  // GET /audit-logs?action=APPROVE_ROLE_REQUEST&from=…&to=…&partnerId=DSE201
  router.get("/audit-logs", requireRoles(...AUDIT_READERS), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = auditLogQuerySchema.safeParse(req.query);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const scopePartnerId = actor.role === "ME_OFFICER" ? actor.partnerId : parsed.data.partnerId ?? null;
    if (actor.role === "ME_OFFICER") {
      const requested = parsed.data.partnerId ?? actor.partnerId;
      if (!scopePartnerId || !requested || !guard.authorize(actor, AUDIT_READERS, requested).allowed) {
        res.status(403).json({ success: false, correlationId, error: "Forbidden", code: "PERMISSION_DENIED" });
        return;
      }
    }

    const entries = audit.query({ ...parsed.data, partnerId: scopePartnerId ?? undefined });
    sendData(res, { entries, total: entries.length });
  });

  return router;
}
