// ── Tenant and account administration routes ────────────────────────────────
//
// Partner and center setup plus account activation. Writes are ADMIN-only;
// center listings are open to anyone whose scope covers the partner.
//
import express from "express";
import type { AccountService } from "../../engine/accounts.js";
import { getActor, requireActor } from "../actorResolver.js";
import { sendData, sendFailure, sendInvalidPayload } from "../httpErrors.js";
import { createCenterSchema, createPartnerSchema } from "../schemas.js";
import { getCorrelationId, logServerInfo } from "../serverMiddleware.js";

export type TenantRouteOptions = {
  accounts: AccountService;
};

export function createTenantRoutes(opts: TenantRouteOptions): express.Router {
  const router = express.Router();
  const { accounts } = opts;

  // POST /admin/partners  { partnerId, name, country? }
  router.post("/admin/partners", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = createPartnerSchema.safeParse(req.body);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const result = accounts.createPartner(actor, parsed.data, { correlationId });
    if (!result.ok) { sendFailure(res, result.error); return; }
    logServerInfo("admin.partner.create", correlationId, { partnerId: result.value.partnerId });
    sendData(res, result.value, 201);
  });

  // POST /admin/partners/:partnerId/centers  { name, location? }
  router.post("/admin/partners/:partnerId/centers", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = createCenterSchema.safeParse(req.body);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }

    const result = accounts.createCenter(actor, { ...parsed.data, partnerId: req.params.partnerId }, { correlationId });
    if (!result.ok) { sendFailure(res, result.error); return; }
    logServerInfo("admin.center.create", correlationId, { partnerId: result.value.partnerId, centerId: result.value.id });
    sendData(res, result.value, 201);
  });

  router.get("/partners/:partnerId/centers", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const result = accounts.listCenters(actor, req.params.partnerId);
    if (!result.ok) { sendFailure(res, result.error); return; }
    sendData(res, { centers: result.value });
  });

  for (const [action, active] of [["activate", true], ["deactivate", false]] as const) {
    router.post(`/admin/users/:id/${action}`, requireActor(), (req, res) => {
      const actor = getActor(req);
      const correlationId = getCorrelationId(res);
      if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

      const result = accounts.setActive(actor, req.params.id, active, { correlationId });
      if (!result.ok) { sendFailure(res, result.error); return; }
      logServerInfo(`admin.user.${action}`, correlationId, { userId: result.value.id });
      sendData(res, result.value);
    });
  }

  return router;
}
