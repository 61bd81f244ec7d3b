// ── Account management ──────────────────────────────────────────────────────
//
// Registration, ADMIN bootstrap, tenant setup and account activation. None of
// these assign roles to existing users; that only happens when a role request
// is approved.
//
import type Database from "better-sqlite3";
import { AUDIT_ACTIONS, type AuditRecorder } from "./auditTrail.js";
import { isUniqueViolation, runInTransaction } from "./database.js";
import { fail, ok, type Result } from "./result.js";
import type { TenantScopeGuard } from "./tenantScopeGuard.js";
import type { CreateCenterInput, CreatePartnerInput, TenantStore } from "./tenantStore.js";
import { toActor, type Actor, type Center, type Partner, type Role, type User } from "./types.js";
import type { UserStore } from "./userStore.js";

export type AccountServiceDeps = {
  db: Database.Database;
  users: UserStore;
  tenants: TenantStore;
  audit: AuditRecorder;
  guard: TenantScopeGuard;
};

export type RegisterInput = {
  email: string;
  firstName: string;
  lastName: string;
  passwordHash: string;
};

type Context = { correlationId?: string | null };

const ADMIN_ONLY: readonly Role[] = ["ADMIN"];
const CENTER_READERS: readonly Role[] = ["ADMIN", "DONOR", "ME_OFFICER", "FACILITATOR"];

export class AccountService {
  constructor(private readonly deps: AccountServiceDeps) {}

  /** Self-service sign-up. New accounts are active, unverified and UNASSIGNED. */
  register(input: RegisterInput, context: Context = {}): Result<User> {
    const { users, audit } = this.deps;
    return runInTransaction<User>(this.deps.db, () => {
      if (users.findByEmail(input.email)) return fail("ALREADY_EXISTS", "An account with this email already exists");
      let user: User;
      try {
        user = users.create({ ...input, role: "UNASSIGNED" });
      } catch (error) {
        if (isUniqueViolation(error)) return fail("ALREADY_EXISTS", "An account with this email already exists");
        throw error;
      }
      audit.record(toActor(user), AUDIT_ACTIONS.REGISTER_USER, "User", user.id, `Registered ${user.email}`, context.correlationId);
      return ok(user);
    });
  }

  /**
   * Creates the first ADMIN. Returns null without writing anything when an
   * ADMIN already exists.
   */
  bootstrapAdmin(input: RegisterInput): Result<User | null> {
    const { users, audit } = this.deps;
    return runInTransaction<User | null>(this.deps.db, () => {
      if (users.countByRole("ADMIN") > 0) return ok(null);
      if (users.findByEmail(input.email)) {
        return fail("ALREADY_EXISTS", "The bootstrap email belongs to an existing non-admin account");
      }
      const admin = users.create({ ...input, role: "ADMIN", verified: true });
      audit.record(toActor(admin), AUDIT_ACTIONS.BOOTSTRAP_ADMIN, "User", admin.id, `Bootstrapped ADMIN ${admin.email}`);
      return ok(admin);
    });
  }

  createPartner(actor: Actor, input: CreatePartnerInput, context: Context = {}): Result<Partner> {
    const { tenants, audit, guard } = this.deps;
    if (!guard.authorize(actor, ADMIN_ONLY, null).allowed) return fail("PERMISSION_DENIED", "Forbidden");
    return runInTransaction<Partner>(this.deps.db, () => {
      if (tenants.findPartner(input.partnerId.trim())) return fail("ALREADY_EXISTS", "Partner already exists");
      const partner = tenants.createPartner(input);
      audit.record(actor, AUDIT_ACTIONS.CREATE_PARTNER, "Partner", partner.partnerId, `Created partner ${partner.name}`, context.correlationId);
      return ok(partner);
    });
  }

  createCenter(actor: Actor, input: CreateCenterInput, context: Context = {}): Result<Center> {
    const { tenants, audit, guard } = this.deps;
    if (!guard.authorize(actor, ADMIN_ONLY, null).allowed) return fail("PERMISSION_DENIED", "Forbidden");
    return runInTransaction<Center>(this.deps.db, () => {
      const partner = tenants.findPartner(input.partnerId);
      if (!partner) return fail("NOT_FOUND", "Partner does not exist");
      let center: Center;
      try {
        center = tenants.createCenter(input);
      } catch (error) {
        if (isUniqueViolation(error)) return fail("ALREADY_EXISTS", `${partner.name} already has a center with this name`);
        throw error;
      }
      audit.record(
        actor,
        AUDIT_ACTIONS.CREATE_CENTER,
        "Center",
        center.id,
        `Created center ${center.name} for partner ${partner.partnerId}`,
        context.correlationId,
      );
      return ok(center);
    });
  }

  /** Scope is checked before existence so a denial says nothing about other tenants. */
  listCenters(actor: Actor, partnerId: string): Result<Center[]> {
    const { tenants, guard } = this.deps;
    const decision = guard.authorize(actor, CENTER_READERS, partnerId);
    if (!decision.allowed) {
      return decision.reason === "account inactive"
        ? fail("ACCOUNT_INACTIVE", "Your account is not active")
        : fail("PERMISSION_DENIED", "Forbidden");
    }
    if (!tenants.findPartner(partnerId)) return fail("NOT_FOUND", "Partner does not exist");
    return ok(tenants.listCenters(partnerId));
  }

  setActive(actor: Actor, userId: string, active: boolean, context: Context = {}): Result<User> {
    const { users, audit, guard } = this.deps;
    if (!guard.authorize(actor, ADMIN_ONLY, null).allowed) return fail("PERMISSION_DENIED", "Forbidden");
    if (!active && userId === actor.userId) return fail("INVALID_INPUT", "You cannot deactivate your own account");
    return runInTransaction<User>(this.deps.db, () => {
      if (!users.setActive(userId, active)) return fail("NOT_FOUND", "User not found");
      const updated = users.findById(userId);
      if (!updated) return fail("NOT_FOUND", "User not found");
      audit.record(
        actor,
        active ? AUDIT_ACTIONS.ACTIVATE_USER : AUDIT_ACTIONS.DEACTIVATE_USER,
        "User",
        updated.id,
        `${active ? "Activated" : "Deactivated"} ${updated.email}`,
        context.correlationId,
      );
      return ok(updated);
    });
  }
}
