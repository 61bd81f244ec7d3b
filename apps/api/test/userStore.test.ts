import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createFixture, seedTenancy, seedUser, TEST_PASSWORD_HASH, type Fixture } from "./helpers.js";

let fx: Fixture;

beforeEach(() => {
  fx = createFixture("user-store-test-");
});

afterEach(() => {
  fx.close();
});

describe("UserStore", () => {
  it("creates active, unverified UNASSIGNED users with a normalized email", () => {
    const user = seedUser(fx.services, "  Amina.Juma@Example.ORG ");
    expect(user.email).toBe("amina.juma@example.org");
    expect(user.role).toBe("UNASSIGNED");
    expect(user.active).toBe(true);
    expect(user.verified).toBe(false);
    expect(user.partnerId).toBeNull();
    expect(user.centerId).toBeNull();
  });

  it("finds users by email regardless of case", () => {
    const user = seedUser(fx.services, "u1@example.org");
    expect(fx.services.users.findByEmail("U1@EXAMPLE.ORG")?.id).toBe(user.id);
    expect(fx.services.users.findByEmail("nobody@example.org")).toBeNull();
  });

  it("returns credentials only through findCredentials", () => {
    const user = seedUser(fx.services, "u1@example.org");
    const credentials = fx.services.users.findCredentials("u1@example.org");
    expect(credentials?.user.id).toBe(user.id);
    expect(credentials?.passwordHash).toBe(TEST_PASSWORD_HASH);
    expect(Object.keys(user)).not.toContain("passwordHash");
  });

  it("orders active users by the given roles, then by creation order", () => {
    seedTenancy(fx.services);
    const donor = seedUser(fx.services, "donor@example.org", { role: "DONOR", partnerId: "DSE201" });
    const m1 = seedUser(fx.services, "m1@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });
    const m2 = seedUser(fx.services, "m2@example.org", { role: "ME_OFFICER", partnerId: "DSE201" });
    seedUser(fx.services, "m3@example.org", { role: "ME_OFFICER", partnerId: "DSE201", active: false });
    seedUser(fx.services, "m4@example.org", { role: "ME_OFFICER", partnerId: "KLA305" });

    const found = fx.services.users.findActiveByRoles(["ME_OFFICER", "DONOR"], "DSE201");
    expect(found.map((u) => u.id)).toEqual([m1.id, m2.id, donor.id]);
  });

  it("searches every partner when none is given", () => {
    seedTenancy(fx.services);
    const a = seedUser(fx.services, "a@example.org", { role: "ADMIN" });
    const b = seedUser(fx.services, "b@example.org", { role: "ME_OFFICER", partnerId: "KLA305" });
    expect(fx.services.users.findActiveByRoles(["ADMIN", "ME_OFFICER"]).map((u) => u.id)).toEqual([a.id, b.id]);
    expect(fx.services.users.findActiveByRoles([])).toEqual([]);
  });

  it("assigns role and scope", () => {
    const { center } = seedTenancy(fx.services);
    const user = seedUser(fx.services, "u1@example.org");
    expect(fx.services.users.assignRole(user.id, "FACILITATOR", "DSE201", center.id)).toBe(true);
    const updated = fx.services.users.findById(user.id);
    expect(updated?.role).toBe("FACILITATOR");
    expect(updated?.partnerId).toBe("DSE201");
    expect(updated?.centerId).toBe(center.id);
    expect(fx.services.users.assignRole("missing", "DONOR", null, null)).toBe(false);
  });

  it("toggles the active flag", () => {
    const user = seedUser(fx.services, "u1@example.org");
    expect(fx.services.users.setActive(user.id, false)).toBe(true);
    expect(fx.services.users.findById(user.id)?.active).toBe(false);
    expect(fx.services.users.setActive("missing", true)).toBe(false);
  });

  it("counts users by role", () => {
    seedUser(fx.services, "a@example.org", { role: "ADMIN" });
    seedUser(fx.services, "u@example.org");
    expect(fx.services.users.countByRole("ADMIN")).toBe(1);
    expect(fx.services.users.countByRole("DONOR")).toBe(0);
  });
});

describe("TenantStore", () => {
  it("resolves a center only through its owning partner", () => {
    const { center } = seedTenancy(fx.services);
    expect(fx.services.tenants.findCenterOfPartner("DSE201", center.id)?.name).toBe("C1");
    expect(fx.services.tenants.findCenterOfPartner("KLA305", center.id)).toBeNull();
  });

  it("lists a partner's centers by name", () => {
    seedTenancy(fx.services);
    fx.services.tenants.createCenter({ partnerId: "DSE201", name: "A0" });
    expect(fx.services.tenants.listCenters("DSE201").map((c) => c.name)).toEqual(["A0", "C1"]);
  });

  it("rejects a duplicate center name within a partner", () => {
    seedTenancy(fx.services);
    expect(() => fx.services.tenants.createCenter({ partnerId: "DSE201", name: "C1" })).toThrow();
  });
});
