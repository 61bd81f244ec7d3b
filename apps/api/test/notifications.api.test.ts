import { describe, it, expect, beforeAll, beforeEach, afterEach, vi } from "vitest";
import request from "supertest";
import type express from "express";
import { createApp } from "../src/api/server.js";
import type { User } from "../src/engine/types.js";
import { actorOf, bearer, createFixture, seedTenancy, seedUser, useTestJwtEnv, type Fixture } from "./helpers.js";

let fx: Fixture;
let app: express.Express;
let u1: User;
let m1: User;
let requestId: string;

beforeAll(() => {
  useTestJwtEnv();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

beforeEach(() => {
  fx = createFixture("notification-api-test-");
  app = createApp(fx.services, { nodeEnv: "test" });
  seedTenancy(fx.services);
  u1 = seedUser(fx.services, "u1@example.org");
  m1 = seedUser(fx.services, "m1@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });
  const created = fx.services.workflow.createRequest(actorOf(fx.services, u1.id), { partnerId: "DSE201", requestedRole: "FACILITATOR" });
  if (!created.ok) throw new Error(created.error.message);
  requestId = created.value.id;
});

afterEach(() => {
  fx.close();
});

describe("GET /notifications", () => {
  it("lists the caller's unread notifications with an unread count", async () => {
    const res = await request(app).get("/notifications").set("Authorization", await bearer(m1));
    expect(res.status).toBe(200);
    expect(res.body.data.unreadCount).toBe(1);
    expect(res.body.data.notifications).toHaveLength(1);
    expect(res.body.data.notifications[0].type).toBe("APPROVAL_REQUEST");
    expect(res.body.data.notifications[0].roleRequestId).toBe(requestId);

    const mine = await request(app).get("/notifications").set("Authorization", await bearer(u1));
    expect(mine.body.data.total).toBe(0);
  });

  it("includes read notifications with all=true and filters by priority", async () => {
    fx.services.workflow.approve(actorOf(fx.services, m1.id), requestId);

    const unread = await request(app).get("/notifications").set("Authorization", await bearer(m1));
    expect(unread.body.data.total).toBe(0);
    const all = await request(app).get("/notifications?all=true").set("Authorization", await bearer(m1));
    expect(all.body.data.total).toBe(1);

    const low = await request(app).get("/notifications?priority=LOW").set("Authorization", await bearer(u1));
    expect(low.body.data.notifications[0].title).toBe("Role Request Approved");
    const high = await request(app).get("/notifications?priority=HIGH").set("Authorization", await bearer(u1));
    expect(high.body.data.total).toBe(0);
  });

  it("rejects unknown filter values", async () => {
    const res = await request(app).get("/notifications?type=SPAM").set("Authorization", await bearer(m1));
    expect(res.status).toBe(400);
  });
});

describe("marking notifications read", () => {
  it("is idempotent for the recipient and 404 for anyone else", async () => {
    const [notification] = fx.services.notifications.listForRoleRequest(requestId);
    if (!notification) throw new Error("setup failed");

    const foreign = await request(app).post(`/notifications/${notification.id}/read`).set("Authorization", await bearer(u1));
    expect(foreign.status).toBe(404);

    for (let i = 0; i < 2; i++) {
      const res = await request(app).post(`/notifications/${notification.id}/read`).set("Authorization", await bearer(m1));
      expect(res.status).toBe(200);
      expect(res.body.data.read).toBe(true);
    }
  });

  it("marks everything read at once", async () => {
    const first = await request(app).post("/notifications/read-all").set("Authorization", await bearer(m1));
    const second = await request(app).post("/notifications/read-all").set("Authorization", await bearer(m1));
    expect(first.body.data).toEqual({ updated: 1 });
    expect(second.body.data).toEqual({ updated: 0 });
  });
});
