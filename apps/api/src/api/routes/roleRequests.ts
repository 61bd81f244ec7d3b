// ── Role request routes ─────────────────────────────────────────────────────
//
// Lifecycle:
//   UNASSIGNED user       → POST /requests                (create PENDING)
//   Addressed approver    → POST /requests/:id/approve    (PENDING → APPROVED)
//                         → POST /requests/:id/reject     (PENDING → REJECTED, comment required)
//
import express from "express";
import type { RoleRequestWorkflow } from "../../engine/roleRequestWorkflow.js";
import { APPROVER_ROLES } from "../../engine/tenantScopeGuard.js";
import { getActor, requireActor, requireRoles } from "../actorResolver.js";
import { sendData, sendFailure, sendInvalidPayload } from "../httpErrors.js";
import { createRoleRequestSchema, rejectRoleRequestSchema, roleRequestListQuerySchema } from "../schemas.js";
import { getCorrelationId, logServerInfo } from "../serverMiddleware.js";

export type RoleRequestRouteOptions = {
  workflow: RoleRequestWorkflow;
};

export function createRoleRequestRoutes(opts: RoleRequestRouteOptions): express.Router {
  const router = express.Router();
  const { workflow } = opts;

  // ── Create ──────────────────────────────────────────────────────────
  // POST /requests  { partnerId, centerId?, requestedRole }
  router.post("/requests", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = createRoleRequestSchema.safeParse(req.body);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const result = workflow.createRequest(actor, parsed.data, { correlationId });
    if (!result.ok) { sendFailure(res, result.error); return; }

    logServerInfo("role-request.create", correlationId, {
      requestId: result.value.id,
      requesterId: actor.userId,
      requestedRole: result.value.requestedRole,
      partnerId: result.value.partnerId,
    });
    sendData(res, result.value, 201);
  });

  // ── Own requests ────────────────────────────────────────────────────
  // GET /requests?status=PENDING&limit=50&offset=0
  router.get("/requests", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = roleRequestListQuerySchema.safeParse(req.query);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const requests = workflow.listOwn(actor, parsed.data);
    sendData(res, { requests, total: requests.length });
  });

  // ── Requests addressed to the caller ───────────────────────────────
  // GET /requests/addressed?status=PENDING
  router.get("/requests/addressed", requireRoles(...APPROVER_ROLES), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = roleRequestListQuerySchema.safeParse(req.query);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const result = workflow.listAddressed(actor, parsed.data);
    if (!result.ok) { sendFailure(res, result.error); return; }
    sendData(res, { requests: result.value, total: result.value.length });
  });

  // ── Single request ──────────────────────────────────────────────────
  router.get("/requests/:id", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const result = workflow.findById(actor, req.params.id);
    if (!result.ok) { sendFailure(res, result.error); return; }
    sendData(res, result.value);
  });

  // ── Approve ─────────────────────────────────────────────────────────
  router.post("/requests/:id/approve", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const result = workflow.approve(actor, req.params.id, { correlationId });
    if (!result.ok) { sendFailure(res, result.error); return; }

    logServerInfo("role-request.approve", correlationId, {
      requestId: result.value.id,
      approverId: actor.userId,
      requesterId: result.value.requesterId,
    });
    sendData(res, result.value);
  });

  // ── Reject ──────────────────────────────────────────────────────────
  // POST /requests/:id/reject  { comment }
  router.post("/requests/:id/reject", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = rejectRoleRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const result = workflow.reject(actor, req.params.id, parsed.data.comment ?? "", { correlationId });
    if (!result.ok) { sendFailure(res, result.error); return; }

    logServerInfo("role-request.reject", correlationId, {
      requestId: result.value.id,
      approverId: actor.userId,
      requesterId: result.value.requesterId,
    });
    sendData(res, result.value);
  });

  return router;
}
