// ── Notification routes ─────────────────────────────────────────────────────
import express from "express";
import type { NotificationDispatch } from "../../engine/notificationDispatch.js";
import { getActor, requireActor } from "../actorResolver.js";
import { sendData, sendInvalidPayload } from "../httpErrors.js";
import { notificationListQuerySchema } from "../schemas.js";
import { getCorrelationId } from "../serverMiddleware.js";

export type NotificationRouteOptions = {
  notifications: NotificationDispatch;
};

export function createNotificationRoutes(opts: NotificationRouteOptions): express.Router {
  const router = express.Router();
  const { notifications } = opts;

  // GET /notifications?all=true&type=APPROVAL_REQUEST&priority=HIGH&limit=50&offset=0
  router.get("/notifications", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    const parsed = notificationListQuerySchema.safeParse(req.query);
    if (!parsed.success) { sendInvalidPayload(res, parsed.error.issues); return; }
    const { all, ...filters } = parsed.data;

    sendData(res, notifications.listForRecipient(actor.userId, { ...filters, unreadOnly: all !== "true" }));
  });

  router.post("/notifications/read-all", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    sendData(res, { updated: notifications.markAllReadForRecipient(actor.userId) });
  });

  // Someone else's notification is indistinguishable from a missing one.
  router.post("/notifications/:id/read", requireActor(), (req, res) => {
    const actor = getActor(req);
    const correlationId = getCorrelationId(res);
    if (!actor) { res.status(401).json({ success: false, correlationId, error: "Unauthorized" }); return; }

    if (!notifications.markReadForRecipient(req.params.id, actor.userId)) {
      res.status(404).json({ success: false, correlationId, error: "Notification not found", code: "NOT_FOUND" });
      return;
    }
    sendData(res, notifications.findById(req.params.id));
  });

  return router;
}
