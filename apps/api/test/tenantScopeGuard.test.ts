import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { APPROVER_ROLES, approverRolesFor, isEligibleApproverRole } from "../src/engine/tenantScopeGuard.js";
import type { Actor } from "../src/engine/types.js";
import { createFixture, seedTenancy, seedUser, type Fixture } from "./helpers.js";

let fx: Fixture;

beforeEach(() => {
  fx = createFixture("guard-test-");
});

afterEach(() => {
  fx.close();
});

function actor(overrides: Partial<Actor>): Actor {
  return {
    userId: "actor-1",
    email: "actor@example.org",
    role: "UNASSIGNED",
    partnerId: null,
    centerId: null,
    active: true,
    verified: true,
    ...overrides,
  };
}

describe("TenantScopeGuard.authorize", () => {
  it("denies inactive actors before anything else", () => {
    const decision = fx.services.guard.authorize(actor({ role: "ADMIN", active: false }), ["ADMIN"], null);
    expect(decision).toEqual({ allowed: false, reason: "account inactive" });
  });

  it("denies roles outside the required set", () => {
    const decision = fx.services.guard.authorize(actor({ role: "FACILITATOR", partnerId: "DSE201" }), APPROVER_ROLES, "DSE201");
    expect(decision).toEqual({ allowed: false, reason: "role not permitted" });
  });

  it("applies only the role gate to unscoped resources", () => {
    expect(fx.services.guard.authorize(actor({ role: "ME_OFFICER", partnerId: "KLA305" }), APPROVER_ROLES, null))
      .toEqual({ allowed: true });
  });

  it("lets ADMIN and DONOR through any partner", () => {
    expect(fx.services.guard.authorize(actor({ role: "ADMIN" }), APPROVER_ROLES, "DSE201")).toEqual({ allowed: true });
    expect(fx.services.guard.authorize(actor({ role: "DONOR" }), APPROVER_ROLES, "DSE201")).toEqual({ allowed: true });
  });

  it("holds ME_OFFICER to their partner", () => {
    const m = actor({ role: "ME_OFFICER", partnerId: "DSE201" });
    expect(fx.services.guard.authorize(m, APPROVER_ROLES, "DSE201")).toEqual({ allowed: true });
    expect(fx.services.guard.authorize(m, APPROVER_ROLES, "KLA305")).toEqual({ allowed: false, reason: "cross-tenant access" });
  });

  it("holds FACILITATOR to their partner and, when given, their center", () => {
    const f = actor({ role: "FACILITATOR", partnerId: "DSE201", centerId: "center-1" });
    const roles = ["FACILITATOR"] as const;
    expect(fx.services.guard.authorize(f, roles, "DSE201")).toEqual({ allowed: true });
    expect(fx.services.guard.authorize(f, roles, "DSE201", "center-1")).toEqual({ allowed: true });
    expect(fx.services.guard.authorize(f, roles, "DSE201", "center-2")).toEqual({ allowed: false, reason: "cross-tenant access" });
    expect(fx.services.guard.authorize(f, roles, "KLA305")).toEqual({ allowed: false, reason: "cross-tenant access" });
  });

  it("gives UNASSIGNED no scope", () => {
    expect(fx.services.guard.authorize(actor({}), ["UNASSIGNED"], "DSE201")).toEqual({ allowed: false, reason: "cross-tenant access" });
    expect(fx.services.guard.authorize(actor({}), ["UNASSIGNED"], null)).toEqual({ allowed: true });
  });
});

describe("approver eligibility", () => {
  it("excludes UNASSIGNED and FACILITATOR", () => {
    expect(isEligibleApproverRole("UNASSIGNED")).toBe(false);
    expect(isEligibleApproverRole("FACILITATOR")).toBe(false);
    expect(isEligibleApproverRole("ME_OFFICER")).toBe(true);
    expect(isEligibleApproverRole("DONOR")).toBe(true);
    expect(isEligibleApproverRole("ADMIN")).toBe(true);
  });

  it("routes FACILITATOR requests to the partner and the rest to ADMIN", () => {
    expect(approverRolesFor("FACILITATOR")).toEqual(["ME_OFFICER", "DONOR"]);
    expect(approverRolesFor("ME_OFFICER")).toEqual(["ADMIN"]);
    expect(approverRolesFor("DONOR")).toEqual(["ADMIN"]);
  });
});

describe("TenantScopeGuard.selectApprover", () => {
  beforeEach(() => {
    seedTenancy(fx.services);
  });

  it("prefers the earliest ME_OFFICER of the partner", () => {
    seedUser(fx.services, "donor@example.org", { role: "DONOR", partnerId: "DSE201" });
    const m1 = seedUser(fx.services, "m1@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });
    seedUser(fx.services, "m2@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });

    const result = fx.services.guard.selectApprover("DSE201", null, "FACILITATOR");
    expect(result.ok && result.value.id).toBe(m1.id);
  });

  it("falls back to a DONOR of the partner", () => {
    seedUser(fx.services, "m-other@example.org", { role: "ME_OFFICER", partnerId: "KLA305" });
    seedUser(fx.services, "m-off@example.org", { role: "ME_OFFICER", partnerId: "DSE201", active: false });
    const donor = seedUser(fx.services, "donor@example.org", { role: "DONOR", partnerId: "DSE201" });

    const result = fx.services.guard.selectApprover("DSE201", null, "FACILITATOR");
    expect(result.ok && result.value.id).toBe(donor.id);
  });

  it("never selects an approver from another partner", () => {
    seedUser(fx.services, "m-other@example.org", { role: "ME_OFFICER", partnerId: "KLA305" });
    const result = fx.services.guard.selectApprover("DSE201", null, "FACILITATOR");
    expect(result.ok ? null : result.error.kind).toBe("NO_ELIGIBLE_APPROVER");
  });

  it("sends ME_OFFICER and DONOR requests to the earliest active ADMIN", () => {
    seedUser(fx.services, "admin-off@example.org", { role: "ADMIN", active: false });
    const admin = seedUser(fx.services, "admin@example.org", { role: "ADMIN" });
    seedUser(fx.services, "admin2@example.org", { role: "ADMIN" });

    for (const role of ["ME_OFFICER", "DONOR"] as const) {
      const result = fx.services.guard.selectApprover("DSE201", null, role);
      expect(result.ok && result.value.id).toBe(admin.id);
    }
  });

  it("reports a missing ADMIN", () => {
    seedUser(fx.services, "m1@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });
    const result = fx.services.guard.selectApprover("DSE201", null, "ME_OFFICER");
    expect(result.ok ? null : result.error.kind).toBe("NO_ELIGIBLE_APPROVER");
  });
});
